/**
 * Command runner
 *
 *   neowatch inspect --pdes <designation> | --name <name> [--verbose]
 *   neowatch query [filters] [--limit N] [--outfile path]
 *
 * Global options: --config, --neofile, --cadfile, --log-level, --log-format
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { Logger, wrapError } from '@neowatch/core';
import type { CloseApproach, LogSink, NearEarthObject } from '@neowatch/core';
import { NeoDatabase, createFilters, limit } from '@neowatch/database';
import { loadApproaches, loadNeos, writeApproaches } from '@neowatch/feeds';
import {
  ConfigError,
  LOG_FORMATS,
  LOG_LEVELS,
  formatZodError,
  loadConfig,
  resolveSettings,
  type ConfigFile,
  type Settings,
} from './config.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export const USAGE = `Usage:
  neowatch inspect (--pdes <designation> | --name <name>) [--verbose]
  neowatch query [--date YYYY-MM-DD] [--start-date YYYY-MM-DD] [--end-date YYYY-MM-DD]
                 [--min-distance au] [--max-distance au]
                 [--min-velocity km/s] [--max-velocity km/s]
                 [--min-diameter km] [--max-diameter km]
                 [--hazardous | --not-hazardous] [--limit N] [--outfile out.csv|out.json]

Options:
  --config <file>       JSON config file
  --neofile <file>      NEO CSV feed (default: data/neos.csv)
  --cadfile <file>      Close-approach JSON feed (default: data/cad.json)
  --log-level <level>   debug | info | warn | error (default: warn)
  --log-format <format> text | json (default: text)
  -h, --help            Show this help
`;

const OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  config: { type: 'string' },
  neofile: { type: 'string' },
  cadfile: { type: 'string' },
  'log-level': { type: 'string' },
  'log-format': { type: 'string' },
  pdes: { type: 'string' },
  name: { type: 'string' },
  verbose: { type: 'boolean' },
  date: { type: 'string' },
  'start-date': { type: 'string' },
  'end-date': { type: 'string' },
  'min-distance': { type: 'string' },
  'max-distance': { type: 'string' },
  'min-velocity': { type: 'string' },
  'max-velocity': { type: 'string' },
  'min-diameter': { type: 'string' },
  'max-diameter': { type: 'string' },
  hazardous: { type: 'boolean' },
  'not-hazardous': { type: 'boolean' },
  limit: { type: 'string' },
  outfile: { type: 'string' },
} as const;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const numberFlag = z
  .string()
  .regex(/^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/, 'must be a number')
  .transform(Number);

const globalFlags = z.object({
  config: z.string().min(1).optional(),
  neofile: z.string().min(1).optional(),
  cadfile: z.string().min(1).optional(),
  'log-level': z.enum(LOG_LEVELS).optional(),
  'log-format': z.enum(LOG_FORMATS).optional(),
});

const inspectFlags = globalFlags
  .extend({
    pdes: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    verbose: z.boolean().optional(),
  })
  .strict()
  .refine((flags) => (flags.pdes === undefined) !== (flags.name === undefined), {
    message: 'give exactly one of --pdes or --name',
  });

const queryFlags = globalFlags
  .extend({
    date: z.string().optional(),
    'start-date': z.string().optional(),
    'end-date': z.string().optional(),
    'min-distance': numberFlag.optional(),
    'max-distance': numberFlag.optional(),
    'min-velocity': numberFlag.optional(),
    'max-velocity': numberFlag.optional(),
    'min-diameter': numberFlag.optional(),
    'max-diameter': numberFlag.optional(),
    hazardous: z.boolean().optional(),
    'not-hazardous': z.boolean().optional(),
    limit: z
      .string()
      .regex(/^\d+$/, 'must be a non-negative integer')
      .transform(Number)
      .optional(),
    outfile: z.string().min(1).optional(),
  })
  .strict()
  .refine((flags) => !(flags.hazardous && flags['not-hazardous']), {
    message: '--hazardous and --not-hazardous are mutually exclusive',
  });

type GlobalFlags = z.infer<typeof globalFlags>;
type InspectFlags = z.infer<typeof inspectFlags>;
type QueryFlags = z.infer<typeof queryFlags>;

type Command =
  | { name: 'help' }
  | { name: 'inspect'; flags: InspectFlags }
  | { name: 'query'; flags: QueryFlags };

function isParseArgsError(error: unknown): error is Error {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

function validate<T extends z.ZodTypeAny>(schema: T, values: unknown, command: string): z.output<T> {
  const result = schema.safeParse(values);
  if (!result.success) {
    throw new UsageError(formatZodError(result.error, `Invalid options for "${command}"`));
  }
  return result.data;
}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    if (isParseArgsError(error)) throw new UsageError(error.message);
    throw error;
  }
}

function parseCommand(argv: string[]): Command {
  const parsed = parseArgv(argv);
  const { help, ...values } = parsed.values;
  if (help) return { name: 'help' };

  const [command, ...extra] = parsed.positionals;
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra.join(' ')}`);
  }

  switch (command) {
    case 'inspect':
      return { name: 'inspect', flags: validate(inspectFlags, values, command) };
    case 'query':
      return { name: 'query', flags: validate(queryFlags, values, command) };
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

interface Context {
  io: CliIO;
  logger: Logger;
  settings: Settings;
  database: NeoDatabase;
}

function print(io: CliIO, line: string): void {
  io.stdout.write(`${line}\n`);
}

function describeApproach(approach: CloseApproach): string {
  if (approach.neo) return approach.toString();
  return (
    `On ${approach.timeStr}, an object not in the loaded catalog approaches Earth at a distance of ` +
    `${approach.distance.toFixed(2)} au and a velocity of ${approach.velocity.toFixed(2)} km/s.`
  );
}

function inspect({ io, database }: Context, flags: InspectFlags): number {
  let neo: NearEarthObject | null = null;
  if (flags.pdes !== undefined) neo = database.getNeoByDesignation(flags.pdes);
  if (flags.name !== undefined) neo = database.getNeoByName(flags.name);

  if (!neo) {
    print(io, 'No matching NEOs exist in the database.');
    return EXIT_OK;
  }

  print(io, neo.toString());
  if (flags.verbose) {
    for (const approach of neo.approaches) {
      print(io, `- ${approach.toString()}`);
    }
  }
  return EXIT_OK;
}

async function query({ io, logger, settings, database }: Context, flags: QueryFlags): Promise<number> {
  const filters = createFilters({
    date: flags.date,
    startDate: flags['start-date'],
    endDate: flags['end-date'],
    distanceMin: flags['min-distance'],
    distanceMax: flags['max-distance'],
    velocityMin: flags['min-velocity'],
    velocityMax: flags['max-velocity'],
    diameterMin: flags['min-diameter'],
    diameterMax: flags['max-diameter'],
    hazardous: flags.hazardous ? true : flags['not-hazardous'] ? false : undefined,
  });
  const results = limit(database.query(filters), flags.limit);

  if (flags.outfile === undefined) {
    for (const approach of results) {
      print(io, describeApproach(approach));
    }
    return EXIT_OK;
  }

  const outfile = resolve(io.cwd ?? process.cwd(), flags.outfile);
  const count = await writeApproaches(results, outfile, {
    sanitizeFormulas: settings.csvSanitizeFormulas,
  });
  logger.info(`Wrote ${count} close approaches`, { outfile });
  return EXIT_OK;
}

async function createContext(io: CliIO, flags: GlobalFlags): Promise<Context> {
  const cwd = io.cwd ?? process.cwd();
  const config: ConfigFile = flags.config
    ? await loadConfig(flags.config, { cwd, env: io.env })
    : {};
  const settings = resolveSettings(config, {
    neoFile: flags.neofile,
    approachFile: flags.cadfile,
    logLevel: flags['log-level'],
    logFormat: flags['log-format'],
  });
  const logger = new Logger({
    level: settings.logLevel,
    format: settings.logFormat,
    sink: io.stderr,
  });

  const neos = loadNeos(resolve(cwd, settings.neoFile), { logger, encoding: settings.encoding });
  const approaches = loadApproaches(resolve(cwd, settings.approachFile), {
    logger,
    encoding: settings.encoding,
  });
  const database = new NeoDatabase(neos, approaches, { logger });
  logger.info(`Linked ${database.linkResult.linked} of ${approaches.length} close approaches`, {
    unlinked: database.linkResult.unlinked,
  });

  return { io, logger, settings, database };
}

const defaultIO: CliIO = { stdout: process.stdout, stderr: process.stderr };

/**
 * Run one command; resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr.write(`${error.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (command.name === 'help') {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }

  try {
    const context = await createContext(io, command.flags);
    return command.name === 'inspect'
      ? inspect(context, command.flags)
      : await query(context, command.flags);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`${error.message}\n`);
      return EXIT_FAILURE;
    }
    const failure = wrapError(error);
    io.stderr.write(`${failure.toActionableMessage()}\n`);
    return failure.code === 'INVALID_QUERY' ? EXIT_USAGE : EXIT_FAILURE;
  }
}
