/**
 * Base class for file-based feeds
 * Reads the whole file in one synchronous call and hands the text to the
 * format-specific parser. Any failure here is fatal for the load.
 */

import { readFileSync } from 'node:fs';
import { SourceReadError } from '@neowatch/core';

export interface FileFeedConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Abstract base class for file feeds
 */
export abstract class BaseFileFeed<TConfig extends FileFeedConfig, TContent> {
  readonly config: TConfig;

  constructor(config: TConfig) {
    this.config = config;
  }

  /**
   * Read and parse the file
   * @throws SourceReadError if the file cannot be read or has the wrong shape
   */
  read(): TContent {
    let content: string;
    try {
      content = readFileSync(this.config.filePath, this.config.encoding ?? 'utf-8');
    } catch (error) {
      throw this.toReadError(error);
    }

    // Handle UTF-8 BOM (common on Windows exports)
    return this.parseContent(content.replace(/^\uFEFF/, ''));
  }

  protected toReadError(error: unknown): SourceReadError {
    const { filePath } = this.config;
    const cause = error instanceof Error ? error : undefined;
    const code = errnoCode(error);

    if (code === 'ENOENT') {
      return new SourceReadError({
        code: 'FILE_NOT_FOUND',
        message: `File not found: ${filePath}`,
        filePath,
        suggestion: 'Check that the file path is correct and the file exists.',
        cause,
      });
    }

    if (code === 'EACCES' || code === 'EPERM') {
      return new SourceReadError({
        code: 'PERMISSION_DENIED',
        message: `Cannot read file: ${filePath}`,
        filePath,
        suggestion: 'Check file permissions.',
        cause,
      });
    }

    return new SourceReadError({
      code: 'READ_FAILED',
      message: `Failed to read file ${filePath}: ${cause?.message ?? String(error)}`,
      filePath,
      cause,
    });
  }

  protected schemaMismatch(message: string, suggestion?: string, cause?: Error): SourceReadError {
    return new SourceReadError({
      code: 'SCHEMA_MISMATCH',
      message,
      filePath: this.config.filePath,
      suggestion,
      cause,
    });
  }

  /**
   * Parse file content (implemented by subclasses)
   */
  protected abstract parseContent(content: string): TContent;
}
