import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ConfigError,
  DEFAULT_SETTINGS,
  expandEnvVars,
  loadConfig,
  resolveSettings,
} from '../src/index.js';

describe('expandEnvVars', () => {
  const env = { DATA_DIR: '/srv/feeds', EMPTY: '' };

  it('expands placeholders in nested strings', () => {
    expect(
      expandEnvVars({ sources: { neos: '${DATA_DIR}/neos.csv', list: ['${DATA_DIR}'] }, n: 1 }, { env })
    ).toEqual({ sources: { neos: '/srv/feeds/neos.csv', list: ['/srv/feeds'] }, n: 1 });
  });

  it('falls back to the default for unset or empty variables', () => {
    expect(expandEnvVars('${MISSING:-data}/cad.json', { env })).toBe('data/cad.json');
    expect(expandEnvVars('${EMPTY:-x}', { env })).toBe('x');
  });

  it('fails on a missing variable without a default', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(ConfigError);
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(
      'Missing required environment variable: MISSING'
    );
  });

  it('leaves the placeholder when missing variables are allowed', () => {
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('loadConfig', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'neowatch-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(content: string): string {
    const filePath = join(dir, 'neowatch.json');
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('reads a config file with a BOM and expands variables', async () => {
    const filePath = write(
      '\uFEFF' +
        JSON.stringify({
          sources: { neos: '${FEEDS}/neos.csv' },
          logging: { level: 'info' },
          output: { csvSanitizeFormulas: false },
        })
    );

    await expect(loadConfig(filePath, { env: { FEEDS: '/data' } })).resolves.toEqual({
      sources: { neos: '/data/neos.csv' },
      logging: { level: 'info' },
      output: { csvSanitizeFormulas: false },
    });
  });

  it('resolves a relative path against cwd', async () => {
    write('{}');
    await expect(loadConfig('neowatch.json', { cwd: dir })).resolves.toEqual({});
  });

  it('rejects unknown keys and bad values', async () => {
    const filePath = write(JSON.stringify({ sources: { neos: 'a.csv', extra: 1 }, logging: { level: 'loud' } }));
    const error = await loadConfig(filePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(String(error)).toMatch(/Invalid config file/);
    expect(String(error)).toMatch(/logging\.level/);
  });

  it('rejects invalid JSON', async () => {
    const filePath = write('{ "sources": ');
    await expect(loadConfig(filePath)).rejects.toThrow(/Invalid JSON/);
  });

  it('reports a missing file', async () => {
    await expect(loadConfig(join(dir, 'nope.json'))).rejects.toThrow(/Cannot read config file/);
  });
});

describe('resolveSettings', () => {
  it('uses defaults when nothing is configured', () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('prefers command-line values over the file', () => {
    const settings = resolveSettings(
      {
        sources: { neos: 'file.csv', approaches: 'file.json', encoding: 'latin1' },
        logging: { level: 'debug', format: 'json' },
      },
      { neoFile: 'flag.csv', logLevel: 'error' }
    );

    expect(settings).toEqual({
      neoFile: 'flag.csv',
      approachFile: 'file.json',
      encoding: 'latin1',
      logLevel: 'error',
      logFormat: 'json',
      csvSanitizeFormulas: true,
    });
  });
});
