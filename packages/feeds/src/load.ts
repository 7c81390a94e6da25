/**
 * File-to-entities helpers: read a feed, extract its records, log a summary.
 */

import type { CloseApproach, NearEarthObject, SkippedRecord } from '@neowatch/core';
import { NeoCsvFeed } from './csv-feed.js';
import { ApproachJsonFeed } from './json-feed.js';
import { defaultLogger, extractApproaches, extractObjects, type ExtractOptions } from './extract.js';

export interface LoadOptions extends ExtractOptions {
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

function tally(options: LoadOptions) {
  let skipped = 0;
  const onSkip = (record: SkippedRecord) => {
    skipped++;
    options.onSkip?.(record);
  };
  return { onSkip, skipped: () => skipped };
}

/**
 * Read near-Earth objects from a CSV file.
 * @throws SourceReadError if the file is unreadable or has no usable header
 */
export function loadNeos(filePath: string, options: LoadOptions = {}): NearEarthObject[] {
  const logger = (options.logger ?? defaultLogger).child({ feed: 'neos', filePath });
  const records = new NeoCsvFeed({ filePath, encoding: options.encoding }).read();
  const counter = tally(options);

  const neos = extractObjects(records, { logger, onSkip: counter.onSkip });

  logger.info(`Loaded ${neos.length} of ${records.length} NEO records`, {
    skipped: counter.skipped(),
  });
  return neos;
}

/**
 * Read close approaches from a JSON file.
 * @throws SourceReadError if the file is unreadable or lacks fields/data
 */
export function loadApproaches(filePath: string, options: LoadOptions = {}): CloseApproach[] {
  const logger = (options.logger ?? defaultLogger).child({ feed: 'approaches', filePath });
  const document = new ApproachJsonFeed({ filePath, encoding: options.encoding }).read();
  const counter = tally(options);

  const approaches = extractApproaches(document, { logger, onSkip: counter.onSkip });

  logger.info(`Loaded ${approaches.length} of ${document.data.length} close-approach records`, {
    skipped: counter.skipped(),
  });
  return approaches;
}
