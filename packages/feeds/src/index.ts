/**
 * @neowatch/feeds
 *
 * Readers for the NEO CSV and close-approach JSON feeds, record extractors and
 * output writers
 */

export { BaseFileFeed } from './base-file-feed.js';
export type { FileFeedConfig } from './base-file-feed.js';

export { NeoCsvFeed, createNeoCsvFeed } from './csv-feed.js';
export type { NeoCsvFeedConfig } from './csv-feed.js';

export { ApproachJsonFeed, createApproachJsonFeed } from './json-feed.js';
export type { ApproachJsonFeedConfig } from './json-feed.js';

export { extractObjects, extractApproaches, zipRow, defaultLogger } from './extract.js';
export type { ExtractOptions } from './extract.js';

export { loadNeos, loadApproaches } from './load.js';
export type { LoadOptions } from './load.js';

export {
  OUTPUT_COLUMNS,
  toOutputRows,
  serializeApproachesCsv,
  serializeApproachesJson,
  formatForPath,
  writeApproaches,
} from './writers.js';
export type {
  OutputFormat,
  OutputRow,
  NestedOutputRecord,
  CsvWriteOptions,
  WriteOptions,
} from './writers.js';

// Re-export core types for convenience
export type {
  RawRecord,
  ApproachDocument,
  SkippedRecord,
} from '@neowatch/core';
