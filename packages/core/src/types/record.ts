/**
 * Record types for raw feed data
 */

/** A named record as read from a feed, before validation */
export type RawRecord = {
  [key: string]: unknown;
};

/**
 * Column-oriented approach feed document: a field-name manifest plus
 * positional value rows
 */
export interface ApproachDocument {
  fields: string[];
  data: unknown[];
}

/** A record dropped by an extractor */
export interface SkippedRecord {
  /** Zero-based position of the record in its source */
  index: number;
  /** Why the record was dropped */
  error: Error;
  /** The offending record (or raw row, when it could not be named) */
  record: unknown;
}

export interface NeoSerialized {
  designation: string;
  name: string;
  diameter_km: number;
  potentially_hazardous: boolean;
}

export interface CloseApproachSerialized {
  datetime_utc: string;
  distance_au: number;
  velocity_km_s: number;
}
