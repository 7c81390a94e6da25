/**
 * CloseApproach
 *
 * One close approach to Earth: time of closest approach (UTC), nominal
 * distance in au and relative velocity in km/s. Until the linkage step runs
 * it only knows its object's designation; afterwards it holds a reference to
 * the NearEarthObject and the designation key is dropped.
 */

import { ValidationError } from '../errors/index.js';
import { formatInstant, isUnsetInstant, parseInstant, type Instant } from '../time/index.js';
import type { CloseApproachSerialized } from '../types/index.js';
import { closeApproachInfoSchema, parseWithSchema } from '../validation/index.js';
import type { NearEarthObject } from './near-earth-object.js';

/** Named constructor fields; unrecognized keys are ignored */
export interface CloseApproachInfo {
  /** Designation of the approaching object, used for linkage */
  designation?: string;
  /** Feed date-time string ("1900-Jan-01 12:00") or an instant; required */
  time?: string | Date | null;
  /** Astronomical units, number or decimal string; absent or "" means unknown (NaN) */
  distance?: number | string | null;
  /** km/s, number or decimal string; absent or "" means unknown (NaN) */
  velocity?: number | string | null;
  [key: string]: unknown;
}

export class CloseApproach {
  readonly distance: number;
  readonly velocity: number;
  private readonly _time: Instant;
  private _designation: string | null;
  private _neo: NearEarthObject | null = null;

  /**
   * @throws ValidationError if the designation or time is missing
   * @throws FormatError if the time string is not recognized
   */
  constructor(info: CloseApproachInfo) {
    const parsed = parseWithSchema(closeApproachInfoSchema, info, 'Invalid CloseApproach');
    const time =
      parsed.time instanceof Date ? new Date(parsed.time.getTime()) : parseInstant(parsed.time);

    if (isUnsetInstant(time)) {
      throw new ValidationError('Invalid CloseApproach: time is required', 'time');
    }

    this._designation = parsed.designation;
    this._time = time;
    this.distance = parsed.distance;
    this.velocity = parsed.velocity;
  }

  get time(): Instant {
    return new Date(this._time.getTime());
  }

  get timeStr(): string {
    return formatInstant(this._time);
  }

  get neo(): NearEarthObject | null {
    return this._neo;
  }

  /**
   * @internal Designation key awaiting linkage; null once linked.
   */
  get pendingDesignation(): string | null {
    return this._designation;
  }

  /**
   * @internal Linkage step only. An approach is linked at most once.
   */
  attachTo(neo: NearEarthObject): void {
    if (this._neo !== null) {
      throw new Error(
        `Approach at ${this.timeStr} is already linked to ${this._neo.designation}`
      );
    }
    this._neo = neo;
    this._designation = null;
  }

  /**
   * @throws Error when called before the approach is linked
   */
  toString(): string {
    if (this._neo === null) {
      throw new Error(`Approach at ${this.timeStr} is not linked to a NearEarthObject`);
    }
    return (
      `On ${this.timeStr}, '${this._neo.fullname}' approaches Earth at a distance of ` +
      `${this.distance.toFixed(2)} au and a velocity of ${this.velocity.toFixed(2)} km/s.`
    );
  }

  serialize(): CloseApproachSerialized {
    return {
      datetime_utc: this.timeStr,
      distance_au: this.distance,
      velocity_km_s: this.velocity,
    };
  }
}
