import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvExporter } from './csv-exporter.js';

describe('CsvExporter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'csv-exporter-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes Perspectives.csv without a header', async () => {
    const exporter = new CsvExporter(dir);

    const file = await exporter.exportPerspectives([
      { id: '13', name: 'Business Unit' },
      { id: '11', name: 'Environment' },
    ]);

    expect(file).toBe(path.join(dir, 'Perspectives.csv'));
    expect(await readFile(file, 'utf8')).toBe('13,Business Unit\n11,Environment\n');
  });

  it('names the group file after the perspective', async () => {
    const exporter = new CsvExporter(dir);

    const file = await exporter.exportGroups({ id: '13', name: 'Business Unit' }, [
      { refId: '7', name: 'Dev' },
      { refId: '5', name: 'Prod, EU' },
    ]);

    expect(file).toBe(path.join(dir, 'Business_Unit.csv'));
    expect(await readFile(file, 'utf8')).toBe('7,Dev\n5,"Prod, EU"\n');
  });

  it('keeps perspectives whose names sanitize alike in separate files', async () => {
    const exporter = new CsvExporter(dir);

    const first = await exporter.exportGroups({ id: '21', name: 'A/B' }, [{ refId: '1', name: 'One' }]);
    const second = await exporter.exportGroups({ id: '22', name: 'A B' }, [{ refId: '2', name: 'Two' }]);

    expect(first).toBe(path.join(dir, 'A_B.csv'));
    expect(second).toBe(path.join(dir, 'A_B_22.csv'));
    expect(await readFile(first, 'utf8')).toBe('1,One\n');
    expect(await readFile(second, 'utf8')).toBe('2,Two\n');
  });

  it('never names a group file Perspectives.csv', async () => {
    const exporter = new CsvExporter(dir);

    await exporter.exportPerspectives([{ id: '30', name: 'Perspectives' }]);
    const file = await exporter.exportGroups({ id: '30', name: 'Perspectives' }, [{ refId: '9', name: 'Nine' }]);

    expect(file).toBe(path.join(dir, 'Perspectives_30.csv'));
    expect(await readFile(path.join(dir, 'Perspectives.csv'), 'utf8')).toBe('30,Perspectives\n');
  });

  it('falls back to a counter when the id-suffixed name is taken too', () => {
    const exporter = new CsvExporter(dir);

    expect(exporter.groupFileName({ id: '5', name: 'X' })).toBe('X.csv');
    expect(exporter.groupFileName({ id: '5', name: 'X' })).toBe('X_5.csv');
    expect(exporter.groupFileName({ id: '5', name: 'X' })).toBe('X_5_2.csv');
  });

  it('writes an empty file for a perspective without groups', async () => {
    const file = await new CsvExporter(dir).exportGroups({ id: '1', name: 'Empty' }, []);

    expect(await readFile(file, 'utf8')).toBe('');
  });

  it('creates the output directory', async () => {
    const nested = path.join(dir, 'exports', 'today');

    const file = await new CsvExporter(nested).exportPerspectives([{ id: '1', name: 'One' }]);

    expect(await readFile(file, 'utf8')).toBe('1,One\n');
  });
});
