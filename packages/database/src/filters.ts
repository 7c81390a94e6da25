/**
 * Close-approach filters
 *
 * Query options become a list of attribute conditions; an approach matches a
 * query when it satisfies every condition.
 */

import { z } from 'zod';
import {
  FormatError,
  NeoWatchError,
  formatDate,
  formatZodIssues,
  isUnsetInstant,
  parseInstant,
} from '@neowatch/core';
import type { CloseApproach } from '@neowatch/core';

export type FilterOperator = 'eq' | 'gte' | 'lte';

export type FilterAttribute = 'date' | 'distance' | 'velocity' | 'diameter' | 'hazardous';

export type FilterValue = string | number | boolean;

export interface AttributeFilter {
  attribute: FilterAttribute;
  op: FilterOperator;
  value: FilterValue;
}

export interface QueryOptions {
  /** Exact UTC calendar date, YYYY-MM-DD */
  date?: string;
  startDate?: string;
  endDate?: string;
  /** au */
  distanceMin?: number;
  distanceMax?: number;
  /** km/s */
  velocityMin?: number;
  velocityMax?: number;
  /** km; never matches an object of unknown size */
  diameterMin?: number;
  diameterMax?: number;
  hazardous?: boolean;
}

const dateOption = z.string().transform((value, ctx) => {
  try {
    const instant = parseInstant(value);
    if (!isUnsetInstant(instant)) return formatDate(instant);
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be empty' });
  } catch (error) {
    if (!(error instanceof FormatError)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a date: "${value}"` });
  }
  return z.NEVER;
});

const boundOption = z.number().finite();

const queryOptionsSchema = z
  .object({
    date: dateOption.optional(),
    startDate: dateOption.optional(),
    endDate: dateOption.optional(),
    distanceMin: boundOption.optional(),
    distanceMax: boundOption.optional(),
    velocityMin: boundOption.optional(),
    velocityMax: boundOption.optional(),
    diameterMin: boundOption.optional(),
    diameterMax: boundOption.optional(),
    hazardous: z.boolean().optional(),
  })
  .strict();

const ACCESSORS: Record<FilterAttribute, (approach: CloseApproach) => FilterValue | null> = {
  date: (approach) => formatDate(approach.time),
  distance: (approach) => approach.distance,
  velocity: (approach) => approach.velocity,
  diameter: (approach) => approach.neo?.diameter ?? null,
  hazardous: (approach) => approach.neo?.hazardous ?? null,
};

/**
 * Build the conditions for a query.
 * @throws NeoWatchError with code INVALID_QUERY for an unknown option or a bad value
 */
export function createFilters(options: QueryOptions = {}): AttributeFilter[] {
  const result = queryOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new NeoWatchError({
      code: 'INVALID_QUERY',
      message: formatZodIssues('Invalid query', result.error),
      suggestion: 'Dates use YYYY-MM-DD; distance, velocity and diameter bounds are numbers.',
    });
  }

  const parsed = result.data;
  const filters: AttributeFilter[] = [];
  const add = (attribute: FilterAttribute, op: FilterOperator, value: FilterValue | undefined) => {
    if (value !== undefined) filters.push({ attribute, op, value });
  };

  add('date', 'eq', parsed.date);
  add('date', 'gte', parsed.startDate);
  add('date', 'lte', parsed.endDate);
  add('distance', 'gte', parsed.distanceMin);
  add('distance', 'lte', parsed.distanceMax);
  add('velocity', 'gte', parsed.velocityMin);
  add('velocity', 'lte', parsed.velocityMax);
  add('diameter', 'gte', parsed.diameterMin);
  add('diameter', 'lte', parsed.diameterMax);
  add('hazardous', 'eq', parsed.hazardous);

  return filters;
}

function matchCondition(value: FilterValue, op: FilterOperator, target: FilterValue): boolean {
  switch (op) {
    case 'eq':
      return value === target;

    case 'gte':
      return typeof value === 'number' && typeof target === 'number'
        ? value >= target
        : String(value) >= String(target);

    case 'lte':
      return typeof value === 'number' && typeof target === 'number'
        ? value <= target
        : String(value) <= String(target);
  }
}

/**
 * Unlinked approaches have no object attributes, and NaN is not comparable;
 * neither matches any condition.
 */
export function matchesFilter(approach: CloseApproach, filter: AttributeFilter): boolean {
  const value = ACCESSORS[filter.attribute](approach);
  if (value === null || Number.isNaN(value)) return false;
  return matchCondition(value, filter.op, filter.value);
}

export function matchesAll(approach: CloseApproach, filters: readonly AttributeFilter[]): boolean {
  return filters.every((filter) => matchesFilter(approach, filter));
}

function* take<T>(items: Iterable<T>, n: number): Generator<T> {
  if (n === 0) {
    yield* items;
    return;
  }

  let count = 0;
  for (const item of items) {
    yield item;
    if (++count >= n) return;
  }
}

/**
 * The first `n` items; `n` of 0 or undefined means all of them.
 * @throws NeoWatchError with code INVALID_QUERY if n is not a non-negative integer
 */
export function limit<T>(items: Iterable<T>, n?: number): Generator<T> {
  if (n !== undefined && !(Number.isInteger(n) && n >= 0)) {
    throw new NeoWatchError({
      code: 'INVALID_QUERY',
      message: `Invalid limit: ${n}`,
      suggestion: 'Use a non-negative integer; 0 means no limit.',
    });
  }
  return take(items, n ?? 0);
}
