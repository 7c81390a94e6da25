/**
 * Record extractors
 *
 * Turn raw feed records into entities one record at a time. A record that
 * fails validation is reported and dropped; it never stops the batch.
 */

import {
  CloseApproach,
  Logger,
  NearEarthObject,
  NeoWatchError,
  ValidationError,
  approachRecordSchema,
  neoRecordSchema,
  parseWithSchema,
} from '@neowatch/core';
import type { ApproachDocument, RawRecord, SkippedRecord } from '@neowatch/core';

export interface ExtractOptions {
  /** Diagnostic channel for skipped records (default: warn-level stderr logger) */
  logger?: Logger;
  /** Called once per skipped record, after it is logged */
  onSkip?: (skipped: SkippedRecord) => void;
}

export const defaultLogger = new Logger({ level: 'warn' });

function extractEach<T>(
  records: Iterable<unknown>,
  kind: string,
  build: (record: unknown) => T,
  options: ExtractOptions
): T[] {
  const logger = options.logger ?? defaultLogger;
  const entities: T[] = [];
  let index = 0;

  for (const record of records) {
    try {
      entities.push(build(record));
    } catch (error) {
      // Anything that is not a record-level error is a bug; let it surface.
      if (!(error instanceof NeoWatchError)) throw error;

      logger.warn(`Skipping malformed ${kind} record`, { index, error });
      options.onSkip?.({ index, error, record });
    }
    index++;
  }

  return entities;
}

/**
 * Extract NearEarthObjects from NEO feed records, in source order.
 * Duplicate designations are kept as separate objects.
 */
export function extractObjects(
  records: Iterable<RawRecord>,
  options: ExtractOptions = {}
): NearEarthObject[] {
  return extractEach(
    records,
    'NEO',
    (record) => new NearEarthObject(parseWithSchema(neoRecordSchema, record, 'Malformed NEO record')),
    options
  );
}

/**
 * Name the positional values of one row after the field manifest. Values
 * beyond the manifest are dropped; missing trailing values stay absent.
 *
 * @throws ValidationError if the row is not an array
 */
export function zipRow(fields: readonly string[], row: unknown): RawRecord {
  if (!Array.isArray(row)) {
    throw new ValidationError(`Malformed approach row: expected an array, got ${typeof row}`);
  }

  const record: RawRecord = Object.create(null);
  fields.forEach((field, i) => {
    if (i < row.length) {
      record[field] = row[i];
    }
  });
  return record;
}

/**
 * Extract CloseApproaches from a column-oriented document, in source order.
 * Every approach comes back unlinked.
 */
export function extractApproaches(
  document: ApproachDocument,
  options: ExtractOptions = {}
): CloseApproach[] {
  const { fields } = document;
  return extractEach(
    document.data,
    'close-approach',
    (row) =>
      new CloseApproach(
        parseWithSchema(approachRecordSchema, zipRow(fields, row), 'Malformed close-approach record')
      ),
    options
  );
}
