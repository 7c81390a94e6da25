/**
 * NearEarthObject
 *
 * A near-Earth object: primary designation (required, unique), IAU name
 * (optional), diameter in km (NaN when unknown) and the potentially-hazardous
 * flag. Its close approaches are attached by the linkage step, never by the
 * constructor.
 */

import type { NeoSerialized } from '../types/index.js';
import { neoInfoSchema, parseWithSchema } from '../validation/index.js';
import type { CloseApproach } from './close-approach.js';

/** Named constructor fields; unrecognized keys are ignored */
export interface NeoInfo {
  designation?: string;
  /** Absent or empty means "no name" */
  name?: string | null;
  /** Kilometers, as a number or a decimal string; absent or "" means unknown (NaN) */
  diameter?: number | string | null;
  /** Default: false */
  hazardous?: boolean;
  [key: string]: unknown;
}

export class NearEarthObject {
  readonly designation: string;
  readonly name: string | null;
  readonly diameter: number;
  readonly hazardous: boolean;
  private readonly _approaches: CloseApproach[] = [];

  /**
   * @throws ValidationError if the designation is missing or a field has the wrong type
   */
  constructor(info: NeoInfo) {
    const parsed = parseWithSchema(neoInfoSchema, info, 'Invalid NearEarthObject');
    this.designation = parsed.designation;
    this.name = parsed.name;
    this.diameter = parsed.diameter;
    this.hazardous = parsed.hazardous;
  }

  /** Linked close approaches, in feed order */
  get approaches(): readonly CloseApproach[] {
    return this._approaches;
  }

  get fullname(): string {
    return this.name ? `${this.designation} (${this.name})` : this.designation;
  }

  /**
   * @internal Linkage step only; `approach.neo` must already point here.
   */
  attachApproach(approach: CloseApproach): void {
    if (approach.neo !== this) {
      throw new Error(
        `Cannot attach approach at ${approach.timeStr} to ${this.designation}: it is linked elsewhere`
      );
    }
    this._approaches.push(approach);
  }

  toString(): string {
    const size = Number.isNaN(this.diameter)
      ? 'an unknown diameter'
      : `a diameter of ${this.diameter.toFixed(3)} km`;
    const hazard = this.hazardous ? 'is potentially hazardous' : 'is not potentially hazardous';
    return `NEO ${this.fullname} has ${size} and ${hazard}.`;
  }

  serialize(): NeoSerialized {
    return {
      designation: this.designation,
      name: this.name ?? '',
      diameter_km: this.diameter,
      potentially_hazardous: this.hazardous,
    };
  }
}
