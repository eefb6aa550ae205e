import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { EXPORT_COLUMNS } from '../src/services/exportService';
import { seedStore } from '../src/services/seedService';
import { OperationCancelledError, StorageUnavailableError } from '../src/utils/errors';
import { mariaSantos, setupTestStore } from './setup';

/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF records
 */
function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\r' && text[i + 1] === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      i++;
    } else {
      field += ch;
    }
  }

  return records;
}

describe('exportPatientsCsv', () => {
  const ctx = setupTestStore({ synchronous: 'NORMAL' });

  it('writes every exported field so it reads back exactly', async () => {
    const { store, dir } = ctx();
    const maria = store.createPatient({
      ...mariaSantos,
      civilStatus: 'married',
      contactNumber: '0917 123 4567',
      address: 'Blk 4, Lot "7"\nQuezon City',
    });
    const jose = store.createPatient({ lastName: 'Abad', firstName: 'Jose', middleName: 'Cruz', sex: 'M' });
    store.createVisit({ patientId: maria.id, visitDate: '2024-01-15', weightKg: 60 });
    const destination = path.join(dir, 'patients.csv');

    const rows = await store.exportPatientsCsv({}, destination);

    expect(rows).toBe(2);
    expect(parseCsv(fs.readFileSync(destination, 'utf8'))).toEqual([
      [...EXPORT_COLUMNS],
      ['00-00-02', 'Abad', 'Jose', 'Cruz', '', '', 'M', '', '', '', '', jose.createdAt.slice(0, 10)],
      [
        '00-00-01',
        'Santos',
        'Maria',
        '',
        '1990-05-10',
        '34',
        'F',
        'married',
        '0917 123 4567',
        'Blk 4, Lot "7"\nQuezon City',
        '2024-01-15',
        maria.createdAt.slice(0, 10),
      ],
    ]);
    expect(fs.existsSync(`${destination}.partial`)).toBe(false);
  });

  it('exports only the patients matching the filter', async () => {
    const { store, dir } = ctx();
    store.createPatient(mariaSantos);
    store.createPatient({ lastName: 'Abad', firstName: 'Jose', sex: 'M' });
    const destination = path.join(dir, 'women.csv');

    const rows = await store.exportPatientsCsv({ sex: 'F' }, destination);

    const records = parseCsv(fs.readFileSync(destination, 'utf8'));
    expect(rows).toBe(1);
    expect(records.map((record) => record[1])).toEqual(['last_name', 'Santos']);
  });

  it('writes a header only when nothing matches', async () => {
    const { store, dir } = ctx();
    const destination = path.join(dir, 'empty.csv');

    expect(await store.exportPatientsCsv({}, destination)).toBe(0);
    expect(fs.readFileSync(destination, 'utf8')).toBe(`${EXPORT_COLUMNS.join(',')}\r\n`);
  });

  it('exports large result sets in full', async () => {
    const { store, dir, clock } = ctx();
    seedStore(store, { patients: 230, maxVisitsPerPatient: 0, seed: 20240615, now: clock.now() });
    const destination = path.join(dir, 'all.csv');

    const rows = await store.exportPatientsCsv({}, destination);

    const references = parseCsv(fs.readFileSync(destination, 'utf8'))
      .slice(1)
      .map((record) => record[0])
      .sort();
    expect(rows).toBe(230);
    expect(new Set(references).size).toBe(230);
    expect(references[0]).toBe('00-00-01');
    expect(references[229]).toBe('00-02-30');
  });

  it('leaves no file behind when cancelled', async () => {
    const { store, dir } = ctx();
    store.createPatient(mariaSantos);
    const destination = path.join(dir, 'cancelled.csv');

    await expect(store.exportPatientsCsv({}, destination, { signal: { aborted: true } })).rejects.toThrow(
      OperationCancelledError
    );
    expect(fs.existsSync(destination)).toBe(false);
    expect(fs.existsSync(`${destination}.partial`)).toBe(false);
  });

  it('fails with StorageUnavailable when the destination cannot be written', async () => {
    const { store, dir } = ctx();

    await expect(store.exportPatientsCsv({}, path.join(dir, 'missing', 'patients.csv'))).rejects.toThrow(
      StorageUnavailableError
    );
  });
});
