import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, SourceReadError, link } from '@neowatch/core';
import {
  createApproachJsonFeed,
  createNeoCsvFeed,
  loadApproaches,
  loadNeos,
} from '../src/index.js';

let tmpDir = '';

function fixture(name: string, content: string): string {
  tmpDir = tmpDir || mkdtempSync(join(tmpdir(), 'neowatch-feeds-'));
  const filePath = join(tmpDir, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

function capture(level: 'info' | 'warn' = 'warn') {
  const lines: string[] = [];
  const logger = new Logger({ level, format: 'json', sink: { write: (l: string) => lines.push(l) } });
  return { logger, records: () => lines.map((line) => JSON.parse(line)) };
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('end-to-end load and link', () => {
  it('builds one linked object and approach from the two feeds', () => {
    const neoPath = fixture('neos.csv', 'pdes,name,diameter,pha\n433,Eros,16.84,N\n');
    const cadPath = fixture(
      'cad.json',
      JSON.stringify({
        fields: ['des', 'cd', 'dist', 'v_rel'],
        data: [['433', '1900-Jan-01 12:00', '0.15', '5.3']],
      })
    );

    const neos = loadNeos(neoPath);
    const approaches = loadApproaches(cadPath);
    link(neos, approaches);

    expect(neos).toHaveLength(1);
    expect(approaches).toHaveLength(1);
    const [neo] = neos;
    const [approach] = approaches;
    expect(neo?.fullname).toBe('433 (Eros)');
    expect(neo?.hazardous).toBe(false);
    expect(approach?.timeStr).toBe('1900-01-01 12:00');
    expect(approach?.distance).toBe(0.15);
    expect(approach?.velocity).toBe(5.3);
    expect(approach?.neo?.designation).toBe('433');
    expect(neo?.approaches).toHaveLength(1);
    expect(neo?.approaches[0]).toBe(approach);
  });
});

describe('NeoCsvFeed', () => {
  it('ignores extra columns and keeps cells as written', () => {
    const filePath = fixture(
      'neos.csv',
      'id,spkid,pdes,name,diameter,albedo,pha\na0000433,2000433,433,Eros,16.84,0.25,N\n'
    );

    const [record] = createNeoCsvFeed({ filePath }).read();

    expect(record?.pdes).toBe('433');
    expect(record?.diameter).toBe('16.84');
    expect(record?.albedo).toBe('0.25');
  });

  it('strips a UTF-8 BOM before reading the header', () => {
    const filePath = fixture('bom.csv', '\uFEFFpdes,name\n433,Eros\n');
    const [record] = createNeoCsvFeed({ filePath }).read();
    expect(record?.pdes).toBe('433');
  });

  it('tolerates short rows', () => {
    const filePath = fixture('short.csv', 'pdes,name,diameter,pha\n433,Eros\n1036,Ganymed,37.675,N\n');
    const records = createNeoCsvFeed({ filePath }).read();
    expect(records).toHaveLength(2);
    expect(Object.keys(records[0] ?? {})).toEqual(['pdes', 'name']);
  });

  it('fails the load for a missing file', () => {
    const filePath = join(tmpdir(), 'neowatch-does-not-exist.csv');
    expect(() => loadNeos(filePath)).toThrow(SourceReadError);
    expect(() => loadNeos(filePath)).toThrow(/File not found/);
  });

  it('fails the load for an empty file', () => {
    const filePath = fixture('empty.csv', '');
    expect(() => createNeoCsvFeed({ filePath }).read()).toThrow(/Missing header row/);
  });

  it('fails the load when the designation column is missing', () => {
    const filePath = fixture('nodes.csv', 'name,diameter\nEros,16.84\n');
    let caught: unknown;
    try {
      loadNeos(filePath);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SourceReadError);
    expect(caught).toMatchObject({ code: 'SCHEMA_MISMATCH', filePath });
  });

  it('rejects unsafe header names', () => {
    const filePath = fixture('proto.csv', 'pdes,__proto__\n433,x\n');
    expect(() => createNeoCsvFeed({ filePath }).read()).toThrow(/Unsafe CSV header/);
  });
});

describe('ApproachJsonFeed', () => {
  it('returns the document with its manifest and rows', () => {
    const filePath = fixture(
      'cad.json',
      JSON.stringify({ signature: { version: '1.5' }, count: '1', fields: ['des'], data: [['433']] })
    );
    expect(createApproachJsonFeed({ filePath }).read()).toEqual({
      fields: ['des'],
      data: [['433']],
    });
  });

  it.each([
    ['missing data', JSON.stringify({ fields: ['des'] })],
    ['missing fields', JSON.stringify({ data: [] })],
    ['non-string field names', JSON.stringify({ fields: [1], data: [] })],
    ['a top-level array', JSON.stringify([['433']])],
    ['invalid JSON', '{"fields": ['],
  ])('fails the load for %s', (_label, content) => {
    const filePath = fixture('bad.json', content);
    let caught: unknown;
    try {
      loadApproaches(filePath);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SourceReadError);
    expect(caught).toMatchObject({ code: 'SCHEMA_MISMATCH' });
  });
});

describe('load summaries', () => {
  it('logs skipped records and a summary per feed', () => {
    const filePath = fixture('neos.csv', 'pdes,name,diameter\n433,Eros,16.84\n,Nameless,1\n');
    const { logger, records } = capture('info');
    let skipped = 0;

    const neos = loadNeos(filePath, { logger, onSkip: () => skipped++ });

    expect(neos).toHaveLength(1);
    expect(skipped).toBe(1);
    expect(records()).toEqual([
      expect.objectContaining({
        level: 'warn',
        msg: 'Skipping malformed NEO record',
        feed: 'neos',
        index: 1,
      }),
      expect.objectContaining({
        level: 'info',
        msg: 'Loaded 1 of 2 NEO records',
        feed: 'neos',
        filePath,
        skipped: 1,
      }),
    ]);
  });

  it('drops N of M approach rows and still succeeds', () => {
    const filePath = fixture(
      'cad.json',
      JSON.stringify({
        fields: ['des', 'cd', 'dist', 'v_rel'],
        data: [
          ['433', '1900-Jan-01 12:00', '0.15', '5.3'],
          ['433', '1900-Jan-02 12:00', 'n/a', '5.3'],
          ['433', '1900-Jan-03 12:00', '0.16', '5.4'],
        ],
      })
    );
    const { logger, records } = capture('info');

    const approaches = loadApproaches(filePath, { logger });

    expect(approaches).toHaveLength(2);
    expect(records().at(-1)).toMatchObject({
      msg: 'Loaded 2 of 3 close-approach records',
      skipped: 1,
    });
  });
});
