/**
 * Output writers
 * Render close approaches, merged with their object's fields, as CSV or JSON.
 */

import { writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { NeoWatchError } from '@neowatch/core';
import type { CloseApproach, CloseApproachSerialized, NeoSerialized } from '@neowatch/core';

export type OutputFormat = 'csv' | 'json';

/** One flat output row; object fields are null for an unlinked approach */
export interface OutputRow {
  datetime_utc: string;
  distance_au: number;
  velocity_km_s: number;
  designation: string | null;
  name: string | null;
  diameter_km: number | null;
  potentially_hazardous: boolean | null;
}

export interface NestedOutputRecord extends CloseApproachSerialized {
  neo: NeoSerialized | null;
}

export interface CsvWriteOptions {
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

export interface WriteOptions extends CsvWriteOptions {
  /** Output format (default: inferred from the file extension) */
  format?: OutputFormat;
}

export const OUTPUT_COLUMNS: readonly (keyof OutputRow)[] = [
  'datetime_utc',
  'distance_au',
  'velocity_km_s',
  'designation',
  'name',
  'diameter_km',
  'potentially_hazardous',
];

function sanitizeFormulaValue(value: string | null, prefix: string): string | null {
  if (value === null || value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

export function toOutputRows(approaches: Iterable<CloseApproach>): OutputRow[] {
  return Array.from(approaches, (approach) => {
    const neo = approach.neo?.serialize() ?? null;
    return {
      ...approach.serialize(),
      designation: neo?.designation ?? null,
      name: neo?.name ?? null,
      diameter_km: neo?.diameter_km ?? null,
      potentially_hazardous: neo?.potentially_hazardous ?? null,
    };
  });
}

export function serializeApproachesCsv(
  approaches: Iterable<CloseApproach>,
  options: CsvWriteOptions = {}
): string {
  const prefix = options.formulaEscapePrefix ?? "'";
  const rows = toOutputRows(approaches);
  const outputRows =
    options.sanitizeFormulas !== false
      ? rows.map((row) => ({
          ...row,
          designation: sanitizeFormulaValue(row.designation, prefix),
          name: sanitizeFormulaValue(row.name, prefix),
        }))
      : rows;

  return stringify(outputRows, {
    header: true,
    columns: [...OUTPUT_COLUMNS],
    cast: { boolean: (value) => String(value) },
  });
}

export function serializeApproachesJson(approaches: Iterable<CloseApproach>): string {
  const records: NestedOutputRecord[] = Array.from(approaches, (approach) => ({
    ...approach.serialize(),
    neo: approach.neo?.serialize() ?? null,
  }));
  // JSON has no NaN; unknown measurements render as null.
  return JSON.stringify(records, null, 2);
}

export function formatForPath(filePath: string): OutputFormat {
  const extension = extname(filePath).toLowerCase();
  if (extension === '.csv') return 'csv';
  if (extension === '.json') return 'json';

  throw new NeoWatchError({
    code: 'UNSUPPORTED_FORMAT',
    message: `Cannot infer output format from "${filePath}"`,
    suggestion: 'Use a .csv or .json file name.',
    context: { filePath },
  });
}

/**
 * Write approaches to a file; returns the number of records written.
 */
export async function writeApproaches(
  approaches: Iterable<CloseApproach>,
  filePath: string,
  options: WriteOptions = {}
): Promise<number> {
  const format = options.format ?? formatForPath(filePath);
  const list = Array.from(approaches);
  const content =
    format === 'csv' ? serializeApproachesCsv(list, options) : serializeApproachesJson(list);

  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new NeoWatchError({
      code: 'WRITE_FAILED',
      message: `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  return list.length;
}
