import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { LogFormat, LogLevel } from '@neowatch/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to expand from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value.
 * @throws ConfigError for a variable that is unset and has no default
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];
export const LOG_FORMATS = ['text', 'json'] as const satisfies readonly LogFormat[];

const ENCODINGS = [
  'utf-8',
  'utf8',
  'utf16le',
  'latin1',
  'ascii',
] as const satisfies readonly BufferEncoding[];

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    sources: z
      .object({
        neos: z.string().min(1).optional(),
        approaches: z.string().min(1).optional(),
        encoding: z.enum(ENCODINGS).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        format: z.enum(LOG_FORMATS).optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        csvSanitizeFormulas: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Read, expand and validate a JSON config file. Relative paths resolve
 * against `cwd`.
 * @throws ConfigError
 */
export async function loadConfig(
  configPath: string,
  options: EnvExpansionOptions & { cwd?: string } = {}
): Promise<ConfigFile> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${absolutePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export interface Settings {
  neoFile: string;
  approachFile: string;
  encoding: BufferEncoding;
  logLevel: LogLevel;
  logFormat: LogFormat;
  csvSanitizeFormulas: boolean;
}

/** Values given on the command line; each one overrides the config file */
export interface SettingsOverrides {
  neoFile?: string;
  approachFile?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  neoFile: 'data/neos.csv',
  approachFile: 'data/cad.json',
  encoding: 'utf-8',
  logLevel: 'warn',
  logFormat: 'text',
  csvSanitizeFormulas: true,
};

export function resolveSettings(config: ConfigFile, overrides: SettingsOverrides = {}): Settings {
  return {
    neoFile: overrides.neoFile ?? config.sources?.neos ?? DEFAULT_SETTINGS.neoFile,
    approachFile:
      overrides.approachFile ?? config.sources?.approaches ?? DEFAULT_SETTINGS.approachFile,
    encoding: config.sources?.encoding ?? DEFAULT_SETTINGS.encoding,
    logLevel: overrides.logLevel ?? config.logging?.level ?? DEFAULT_SETTINGS.logLevel,
    logFormat: overrides.logFormat ?? config.logging?.format ?? DEFAULT_SETTINGS.logFormat,
    csvSanitizeFormulas:
      config.output?.csvSanitizeFormulas ?? DEFAULT_SETTINGS.csvSanitizeFormulas,
  };
}
