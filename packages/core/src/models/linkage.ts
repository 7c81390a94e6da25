/**
 * Linkage step
 *
 * Resolves each approach's designation key into a two-way relation with the
 * matching NearEarthObject. Both collections keep owning their entities; the
 * relation links are set here and nowhere else.
 */

import type { Logger } from '../logging/index.js';
import type { CloseApproach } from './close-approach.js';
import type { NearEarthObject } from './near-earth-object.js';

export interface LinkOptions {
  /** Receives a warning for every designation that appears more than once */
  logger?: Logger;
}

export interface LinkResult {
  /** Approaches linked by this call */
  linked: number;
  /** Approaches whose designation matched no object */
  unlinked: number;
}

/**
 * Index objects by designation. A repeated designation overwrites the earlier
 * object (last write wins, in collection order).
 */
export function indexByDesignation(
  neos: Iterable<NearEarthObject>,
  logger?: Logger
): Map<string, NearEarthObject> {
  const index = new Map<string, NearEarthObject>();
  for (const neo of neos) {
    const previous = index.get(neo.designation);
    if (previous) {
      logger?.warn('Duplicate designation; earlier object is unreachable by designation', {
        designation: neo.designation,
        kept: neo.fullname,
        shadowed: previous.fullname,
      });
    }
    index.set(neo.designation, neo);
  }
  return index;
}

/**
 * Link approaches to their objects in place.
 *
 * Each object's `approaches` grows in the order the approaches are given.
 * Unmatched approaches stay in their collection, unlinked. Approaches that are
 * already linked are left alone, so calling this twice does not double-append.
 */
export function link(
  neos: Iterable<NearEarthObject>,
  approaches: Iterable<CloseApproach>,
  options: LinkOptions = {}
): LinkResult {
  const index = indexByDesignation(neos, options.logger);
  let linked = 0;
  let unlinked = 0;

  for (const approach of approaches) {
    const designation = approach.pendingDesignation;
    if (designation === null) continue;

    const neo = index.get(designation);
    if (!neo) {
      unlinked++;
      continue;
    }

    approach.attachTo(neo);
    neo.attachApproach(approach);
    linked++;
  }

  return { linked, unlinked };
}
