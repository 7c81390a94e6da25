import { describe, expect, it } from 'vitest';
import { FormatError, Logger, ValidationError } from '@neowatch/core';
import type { RawRecord, SkippedRecord } from '@neowatch/core';
import { extractApproaches, extractObjects, zipRow } from '../src/index.js';

function quietLogger(lines: string[] = []): Logger {
  return new Logger({ level: 'warn', format: 'json', sink: { write: (l: string) => lines.push(l) } });
}

describe('extractObjects', () => {
  const records: RawRecord[] = [
    { pdes: '433', name: 'Eros', diameter: '16.84', pha: 'N' },
    { pdes: '2020 AB1', name: '', diameter: '', pha: '' },
    { pdes: '99942', name: 'Apophis', diameter: '0.37', pha: 'Y' },
  ];

  it('normalizes names, diameters and hazard flags', () => {
    const [eros, unnamed, apophis] = extractObjects(records, { logger: quietLogger() });

    expect(eros?.fullname).toBe('433 (Eros)');
    expect(eros?.diameter).toBe(16.84);
    expect(eros?.hazardous).toBe(false);

    expect(unnamed?.name).toBeNull();
    expect(Number.isNaN(unnamed?.diameter)).toBe(true);
    expect(unnamed?.hazardous).toBe(false);

    expect(apophis?.hazardous).toBe(true);
  });

  it('treats any non-empty flag other than N as hazardous', () => {
    const neos = extractObjects(
      [{ pdes: 'a', pha: 'Y' }, { pdes: 'b', pha: 'y' }, { pdes: 'c', pha: 'N' }, { pdes: 'd' }],
      { logger: quietLogger() }
    );
    expect(neos.map((neo) => neo.hazardous)).toEqual([true, true, false, false]);
  });

  it('reads "2.3" as 2.3', () => {
    const [neo] = extractObjects([{ pdes: '1', diameter: '2.3' }]);
    expect(neo?.diameter).toBe(2.3);
  });

  it('skips diameters and distances that overflow to infinity', () => {
    const skipped: SkippedRecord[] = [];
    const neos = extractObjects([{ pdes: '1', diameter: '1e999' }], {
      logger: quietLogger(),
      onSkip: (s) => skipped.push(s),
    });
    expect(neos).toEqual([]);
    expect(skipped[0]?.error.message).toBe('Malformed NEO record: diameter: Not a finite number: 1e999');

    const approaches = extractApproaches(
      { fields: ['des', 'cd', 'dist', 'v_rel'], data: [['1', '2000-Jan-01 00:00', '1e999', '5']] },
      { logger: quietLogger() }
    );
    expect(approaches).toEqual([]);
  });

  it('skips malformed records and keeps going', () => {
    const skipped: SkippedRecord[] = [];
    const lines: string[] = [];
    const neos = extractObjects(
      [
        { pdes: '433', name: 'Eros' },
        { pdes: '', name: 'No designation' },
        { pdes: '1036', name: 'Ganymed' },
        { pdes: '4179', diameter: 'about 4' },
        { name: 'Missing column' },
      ],
      { logger: quietLogger(lines), onSkip: (s) => skipped.push(s) }
    );

    expect(neos.map((neo) => neo.designation)).toEqual(['433', '1036']);
    expect(skipped.map((s) => s.index)).toEqual([1, 3, 4]);
    expect(skipped.every((s) => s.error instanceof ValidationError)).toBe(true);
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[1] ?? '{}')).toMatchObject({
      level: 'warn',
      msg: 'Skipping malformed NEO record',
      index: 3,
      error: { code: 'VALIDATION_ERROR' },
    });
  });

  it('keeps duplicate designations as separate objects, in source order', () => {
    const neos = extractObjects([
      { pdes: '433', name: 'First' },
      { pdes: '433', name: 'Second' },
    ]);
    expect(neos.map((neo) => neo.name)).toEqual(['First', 'Second']);
  });
});

describe('zipRow', () => {
  it('names values after the manifest', () => {
    expect({ ...zipRow(['des', 'cd'], ['433', '1900-Jan-01 12:00']) }).toEqual({
      des: '433',
      cd: '1900-Jan-01 12:00',
    });
  });

  it('drops extra values and leaves missing ones absent', () => {
    expect({ ...zipRow(['des', 'cd'], ['433', 'x', 'extra']) }).toEqual({ des: '433', cd: 'x' });
    expect(Object.keys(zipRow(['des', 'cd'], ['433']))).toEqual(['des']);
  });

  it('rejects rows that are not arrays', () => {
    expect(() => zipRow(['des'], { des: '433' })).toThrow(ValidationError);
  });
});

describe('extractApproaches', () => {
  const fields = ['des', 'orbit_id', 'jd', 'cd', 'dist', 'dist_min', 'dist_max', 'v_rel'];

  it('zips the manifest before reading fields', () => {
    const [approach] = extractApproaches({
      fields,
      data: [['433', '659', '2415021.0', '1900-Jan-01 12:00', '0.15', '0.14', '0.16', '5.3']],
    });

    expect(approach?.timeStr).toBe('1900-01-01 12:00');
    expect(approach?.distance).toBe(0.15);
    expect(approach?.velocity).toBe(5.3);
    expect(approach?.pendingDesignation).toBe('433');
    expect(approach?.neo).toBeNull();
  });

  it('accepts numeric values as numbers', () => {
    const [approach] = extractApproaches({
      fields: ['des', 'cd', 'dist', 'v_rel'],
      data: [['433', '1900-Jan-01 12:00', 0.15, 5.3]],
    });
    expect(approach?.distance).toBe(0.15);
  });

  it('skips malformed rows without aborting the batch', () => {
    const skipped: SkippedRecord[] = [];
    const data = [
      ['433', '1900-Jan-01 12:00', '0.15', '5.3'],
      ['433', '1900-Jan-02 12:00', 'n/a', '5.3'],
      ['433', '1900-Jxx-03 12:00', '0.15', '5.3'],
      ['433', '1900-Jan-04 12:00', '0.15'],
      'not a row',
      [null, '1900-Jan-05 12:00', '0.15', '5.3'],
      ['1036', '1900-Jan-06 12:00', '0.2', '7'],
    ];

    const approaches = extractApproaches(
      { fields: ['des', 'cd', 'dist', 'v_rel'], data },
      { logger: quietLogger(), onSkip: (s) => skipped.push(s) }
    );

    expect(approaches).toHaveLength(data.length - skipped.length);
    expect(approaches.map((a) => a.timeStr)).toEqual(['1900-01-01 12:00', '1900-01-06 12:00']);
    expect(skipped.map((s) => s.index)).toEqual([1, 2, 3, 4, 5]);
    expect(skipped[1]?.error).toBeInstanceOf(FormatError);
    expect(skipped[3]?.record).toBe('not a row');
  });

  it('returns nothing for an empty document', () => {
    expect(extractApproaches({ fields: [], data: [] })).toEqual([]);
  });
});
