/**
 * NeoDatabase
 *
 * Holds the loaded catalog and its close approaches, links them once at
 * construction, and answers lookups and approach queries.
 */

import { Logger, indexByDesignation, link } from '@neowatch/core';
import type { CloseApproach, LinkResult, NearEarthObject } from '@neowatch/core';
import { matchesAll, type AttributeFilter } from './filters.js';

export interface NeoDatabaseOptions {
  /** Receives linkage warnings and the link summary */
  logger?: Logger;
}

const defaultLogger = new Logger({ level: 'warn' });

export class NeoDatabase {
  private readonly _neos: NearEarthObject[];
  private readonly _approaches: CloseApproach[];
  private readonly byDesignation: Map<string, NearEarthObject>;
  private readonly byName = new Map<string, NearEarthObject>();
  readonly linkResult: LinkResult;

  constructor(
    neos: Iterable<NearEarthObject>,
    approaches: Iterable<CloseApproach>,
    options: NeoDatabaseOptions = {}
  ) {
    const logger = options.logger ?? defaultLogger;
    this._neos = Array.from(neos);
    this._approaches = Array.from(approaches);

    this.linkResult = link(this._neos, this._approaches, { logger });
    this.byDesignation = indexByDesignation(this._neos);
    for (const neo of this._neos) {
      if (neo.name !== null) this.byName.set(neo.name, neo);
    }

    logger.debug('Linked close approaches', {
      neos: this._neos.length,
      approaches: this._approaches.length,
      ...this.linkResult,
    });
  }

  get neos(): readonly NearEarthObject[] {
    return this._neos;
  }

  get approaches(): readonly CloseApproach[] {
    return this._approaches;
  }

  /** Exact, case-sensitive match on the primary designation */
  getNeoByDesignation(designation: string): NearEarthObject | null {
    return this.byDesignation.get(designation) ?? null;
  }

  /** Exact, case-sensitive match on the IAU name; unnamed objects never match */
  getNeoByName(name: string): NearEarthObject | null {
    return this.byName.get(name) ?? null;
  }

  /**
   * Approaches matching every filter, in source order. Lazy: nothing is
   * evaluated until the caller iterates.
   */
  *query(filters: readonly AttributeFilter[] = []): Generator<CloseApproach> {
    for (const approach of this._approaches) {
      if (matchesAll(approach, filters)) {
        yield approach;
      }
    }
  }
}
