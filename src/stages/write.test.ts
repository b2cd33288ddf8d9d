import * as fs from 'fs-extra';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OutputDirectoryError } from '../errors';
import type { UnderFiveTable } from '../types';
import { toCsv, writeCsv } from './write';

const TEST_DIR = './tmp/test-write';

const TABLE: UnderFiveTable = {
  columns: ['state_leg_district', 'pop_under5'],
  rows: [
    { geography: { state_leg_district: '001' }, pop_under5: 30 },
    { geography: { state_leg_district: '002' }, pop_under5: 12 }
  ]
};

describe('toCsv', () => {
  it('writes a header row and one record per row without an index', () => {
    expect(toCsv(TABLE)).toBe('state_leg_district,pop_under5\n001,30\n002,12\n');
  });

  it('keeps leading zeros of district identifiers', () => {
    const csv = toCsv({ columns: ['district', 'pop_under5'], rows: [{ geography: { district: '007' }, pop_under5: 0 }] });

    expect(csv).toBe('district,pop_under5\n007,0\n');
  });

  it('quotes values containing the delimiter', () => {
    const csv = toCsv({ columns: ['ward', 'pop_under5'], rows: [{ geography: { ward: 'Ward 1, North' }, pop_under5: 5 }] });

    expect(csv).toBe('ward,pop_under5\n"Ward 1, North",5\n');
  });

  it('writes large totals as exact integers', () => {
    const csv = toCsv({ columns: ['district', 'pop_under5'], rows: [{ geography: { district: '001' }, pop_under5: 123456789012 }] });

    expect(csv).toBe('district,pop_under5\n001,123456789012\n');
  });

  it('writes only the header for an empty table', () => {
    expect(toCsv({ columns: ['state_leg_district', 'pop_under5'], rows: [] })).toBe('state_leg_district,pop_under5\n');
  });
});

describe('writeCsv', () => {
  const output = { baseDir: TEST_DIR, dataDir: 'data', fileName: 'acs_ward_under5_pop.csv' };
  const target = path.join(TEST_DIR, 'data', 'acs_ward_under5_pop.csv');

  beforeEach(async () => {
    await fs.ensureDir(path.join(TEST_DIR, 'data'));
  });

  afterEach(async () => {
    await fs.remove(TEST_DIR);
  });

  it('writes the table and returns the file path', async () => {
    const written = await writeCsv(TABLE, output);

    expect(written).toBe(target);
    expect(await fs.readFile(target, 'utf8')).toBe('state_leg_district,pop_under5\n001,30\n002,12\n');
  });

  it('overwrites an existing file', async () => {
    await fs.writeFile(target, 'stale contents that are longer than the new file\n'.repeat(10));

    await writeCsv(TABLE, output);

    expect(await fs.readFile(target, 'utf8')).toBe('state_leg_district,pop_under5\n001,30\n002,12\n');
  });

  it('produces byte-identical files for identical input', async () => {
    await writeCsv(TABLE, output);
    const first = await fs.readFile(target);
    await writeCsv(TABLE, output);
    const second = await fs.readFile(target);

    expect(second.equals(first)).toBe(true);
  });

  it('fails without creating a missing directory', async () => {
    const missing = { ...output, dataDir: 'nope' };

    await expect(writeCsv(TABLE, missing)).rejects.toThrow(OutputDirectoryError);
    expect(await fs.pathExists(path.join(TEST_DIR, 'nope'))).toBe(false);
  });
});
