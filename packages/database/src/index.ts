/**
 * @neowatch/database
 *
 * In-memory NEO database and close-approach query filters
 */

export { NeoDatabase } from './database.js';
export type { NeoDatabaseOptions } from './database.js';

export { createFilters, matchesFilter, matchesAll, limit } from './filters.js';
export type {
  AttributeFilter,
  FilterAttribute,
  FilterOperator,
  FilterValue,
  QueryOptions,
} from './filters.js';
