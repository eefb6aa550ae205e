import path from 'path';
import { describe, it, expect } from 'vitest';
import { ConnectionPool } from '../src/config/database';
import { storeConfigSchema } from '../src/config/config';
import { SchemaMigrator } from '../src/database/migrator';
import { migrations } from '../src/database/migrations';
import { ClinicStore } from '../src/store';
import { IncompatibleSchemaError, StorageUnavailableError } from '../src/utils/errors';
import { TestClock, mariaSantos, setupTestStore } from './setup';

/**
 * A second store file, opened beside the active store
 */
function openSourceStore(file: string, steps = migrations): ClinicStore {
  const pool = new ConnectionPool(storeConfigSchema.parse({ path: file, poolSize: 1 }));
  const now = new TestClock(2024, 5, 1).now;
  const migrator = new SchemaMigrator(pool, steps, now);
  return new ClinicStore(pool, migrator, migrator.migrate(), now);
}

describe('mergeFrom', () => {
  const ctx = setupTestStore();

  function prepareSource(dir: string): string {
    const file = path.join(dir, 'workstation.db');
    const source = openSourceStore(file);

    const maria = source.createPatient(mariaSantos);
    const jose = source.createPatient({ lastName: 'Abad', firstName: 'Jose', sex: 'M' });
    const ana = source.createPatient({ lastName: 'Cruz', firstName: 'Ana', sex: 'F' });
    source.createVisit({ patientId: maria.id, visitDate: '2024-01-15', weightKg: 60 });
    source.createVisit({ patientId: maria.id, visitDate: '2024-02-20' });
    source.createVisit({ patientId: jose.id, visitDate: '2024-03-01', visitTime: '09:30' });
    source.deletePatient(ana.id);

    source.close();
    return file;
  }

  it('adds new patients and visits and skips what the store already has', () => {
    const { store, dir } = ctx();
    const maria = store.createPatient(mariaSantos);
    store.createVisit({ patientId: maria.id, visitDate: '2024-01-15' });
    const source = prepareSource(dir);

    const report = store.mergeFrom(source);

    expect(report).toEqual({ patientsAdded: 1, patientsSkipped: 1, visitsAdded: 2, visitsSkipped: 1 });
    expect(store.getPatientByReference(2)).toMatchObject({ lastName: 'Abad', firstName: 'Jose', sex: 'M' });
    expect(store.getPatientSummary(maria.id)).toMatchObject({ totalVisits: 2, lastVisit: '2024-02-20' });
  });

  it('changes nothing when merged twice', () => {
    const { store, dir } = ctx();
    const source = prepareSource(dir);
    store.mergeFrom(source);

    const again = store.mergeFrom(source);

    expect(again).toEqual({ patientsAdded: 0, patientsSkipped: 2, visitsAdded: 0, visitsSkipped: 3 });
    expect(store.getStat('totalVisits')).toBe(3);
  });

  it('invalidates every stat', () => {
    const { store, dir } = ctx();
    const source = prepareSource(dir);
    expect(store.getStat('totalPatients')).toBe(0);
    expect(store.getStat('totalVisits')).toBe(0);

    store.mergeFrom(source);

    expect(store.getStat('totalPatients')).toBe(2);
    expect(store.getStat('totalVisits')).toBe(3);
    expect(store.getStat('patientsBySex')).toEqual({ M: 1, F: 1, unspecified: 0 });
  });

  it('continues reference numbers after the merged ones', () => {
    const { store, dir } = ctx();
    store.mergeFrom(prepareSource(dir));

    expect(store.createPatient({ lastName: 'Reyes', firstName: 'Luz' }).referenceNumber).toBe(3);
  });

  it('rejects a source at another schema version', () => {
    const { store, dir } = ctx();
    const file = path.join(dir, 'old.db');
    openSourceStore(file, migrations.slice(0, 2)).close();

    expect(() => store.mergeFrom(file)).toThrow(IncompatibleSchemaError);
    expect(store.getStat('totalPatients')).toBe(0);
  });

  it('fails with StorageUnavailable for a missing source', () => {
    const { store, dir } = ctx();

    expect(() => store.mergeFrom(path.join(dir, 'absent.db'))).toThrow(StorageUnavailableError);
  });
});
