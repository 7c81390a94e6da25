/**
 * Close-approach JSON feed
 * Reads the column-oriented document ({ fields, data }) without touching the
 * rows; zipping and validation happen per record in the extractor.
 */

import type { ApproachDocument } from '@neowatch/core';
import { approachDocumentSchema, formatZodIssues } from '@neowatch/core';
import { BaseFileFeed, type FileFeedConfig } from './base-file-feed.js';

export type ApproachJsonFeedConfig = FileFeedConfig;

export class ApproachJsonFeed extends BaseFileFeed<ApproachJsonFeedConfig, ApproachDocument> {
  protected parseContent(content: string): ApproachDocument {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw this.schemaMismatch(
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    const result = approachDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw this.schemaMismatch(
        formatZodIssues('Invalid close-approach document', result.error),
        'Expected an object with a "fields" array of column names and a "data" array of rows.'
      );
    }

    return result.data;
  }
}

/**
 * Factory function to create a close-approach JSON feed
 */
export function createApproachJsonFeed(config: ApproachJsonFeedConfig): ApproachJsonFeed {
  return new ApproachJsonFeed(config);
}
