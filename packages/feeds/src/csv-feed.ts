/**
 * NEO CSV feed
 * Reads the tabular NEO feed into named records. Cells stay strings exactly as
 * written (no trimming, no casting); typing is the extractor's job.
 */

import { parse } from 'csv-parse/sync';
import type { RawRecord } from '@neowatch/core';
import { BaseFileFeed, type FileFeedConfig } from './base-file-feed.js';

export interface NeoCsvFeedConfig extends FileFeedConfig {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
  /** Columns the header row must contain (default: ['pdes']) */
  requiredColumns?: string[];
}

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((cell) => String(cell ?? '')) : [];
}

export class NeoCsvFeed extends BaseFileFeed<NeoCsvFeedConfig, RawRecord[]> {
  protected parseContent(content: string): RawRecord[] {
    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: false, // Parse rows first so we can safely map headers ourselves
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: this.config.skipEmptyLines !== false, // Default true
        relax_column_count: true, // Short rows are a per-record problem, not a file problem
        trim: false,
        cast: false,
      });
    } catch (error) {
      throw this.schemaMismatch(
        `Malformed CSV: ${error instanceof Error ? error.message : String(error)}`,
        'Check quoting and delimiters in the file.',
        error instanceof Error ? error : undefined
      );
    }

    const rows = Array.isArray(parsed) ? parsed.map(toCells) : [];
    const [headers, ...dataRows] = rows;

    if (!headers || headers.length === 0) {
      throw this.schemaMismatch(
        `Missing header row in ${this.config.filePath}`,
        'The first line must name the columns, e.g. "pdes,name,diameter,pha".'
      );
    }

    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw this.schemaMismatch(
          `Unsafe CSV header name: ${header}`,
          'Rename the column to a safe field name and try again.'
        );
      }
    }

    const missing = (this.config.requiredColumns ?? ['pdes']).filter(
      (column) => !headers.includes(column)
    );
    if (missing.length > 0) {
      throw this.schemaMismatch(
        `Missing required column(s): ${missing.join(', ')}`,
        'The NEO feed needs at least a "pdes" (primary designation) column.'
      );
    }

    return dataRows.map((row) => {
      const record: RawRecord = Object.create(null);
      headers.forEach((key, i) => {
        const cell = row[i];
        if (cell !== undefined) {
          record[key] = cell;
        }
      });
      return record;
    });
  }
}

/**
 * Factory function to create a NEO CSV feed
 */
export function createNeoCsvFeed(config: NeoCsvFeedConfig): NeoCsvFeed {
  return new NeoCsvFeed(config);
}
