import { describe, it, expect, vi } from 'vitest';
import { StatsCache } from '../src/services/statsCache';
import type { StatComputers } from '../src/services/statsCache';
import { AppError, NotFoundError } from '../src/utils/errors';
import { TestClock, createPatients, mariaSantos, setupTestStore } from './setup';

function fakeComputers() {
  return {
    totalPatients: vi.fn((_today: string) => 3),
    totalVisits: vi.fn((_today: string) => 10),
    visitsToday: vi.fn((today: string) => (today === '2024-06-15' ? 2 : 0)),
    visitsByMonth: vi.fn((_today: string): Record<string, number> => ({ '2024-06': 2 })),
    patientsBySex: vi.fn((_today: string) => ({ M: 1, F: 2, unspecified: 0 })),
  } satisfies StatComputers;
}

describe('StatsCache', () => {
  it('computes on first read and serves the cached value after', () => {
    const computers = fakeComputers();
    const cache = new StatsCache(computers, new TestClock(2024, 6, 15).now);

    expect(cache.get('totalPatients')).toBe(3);
    expect(cache.get('totalPatients')).toBe(3);
    expect(computers.totalPatients).toHaveBeenCalledTimes(1);
    expect(cache.recomputeCount('totalPatients')).toBe(1);
  });

  it('flags on invalidate and recomputes only on the next read', () => {
    const computers = fakeComputers();
    const cache = new StatsCache(computers, new TestClock(2024, 6, 15).now);
    cache.get('totalPatients');
    cache.get('totalVisits');

    cache.invalidate(['totalPatients']);

    expect(computers.totalPatients).toHaveBeenCalledTimes(1);
    expect(cache.isDirty('totalPatients')).toBe(true);
    expect(cache.isDirty('totalVisits')).toBe(false);

    computers.totalPatients.mockReturnValue(4);
    expect(cache.get('totalPatients')).toBe(4);
    cache.get('totalVisits');
    expect(computers.totalPatients).toHaveBeenCalledTimes(2);
    expect(computers.totalVisits).toHaveBeenCalledTimes(1);
  });

  it('hands out copies the cached value does not share', () => {
    const computers = fakeComputers();
    const cache = new StatsCache(computers, new TestClock(2024, 6, 15).now);

    const first = cache.get('patientsBySex');
    first.F = 99;
    const months = cache.get('visitsByMonth');
    months['2024-06'] = 99;

    expect(cache.get('patientsBySex')).toEqual({ M: 1, F: 2, unspecified: 0 });
    expect(cache.get('visitsByMonth')).toEqual({ '2024-06': 2 });
    expect(computers.patientsBySex).toHaveBeenCalledTimes(1);
  });

  it('bumps the generation once per non-empty invalidation', () => {
    const cache = new StatsCache(fakeComputers(), new TestClock(2024, 6, 15).now);

    cache.invalidate('totalVisits');
    cache.invalidate([]);
    cache.invalidateAll();

    expect(cache.currentGeneration).toBe(2);
  });

  it('keeps a stat dirty when its recomputation fails', () => {
    const computers = fakeComputers();
    const cache = new StatsCache(computers, new TestClock(2024, 6, 15).now);
    cache.get('totalVisits');
    cache.invalidate('totalVisits');
    computers.totalVisits.mockImplementationOnce(() => {
      throw new Error('disk gone');
    });

    expect(() => cache.get('totalVisits')).toThrow('Failed to recompute totalVisits: disk gone');
    expect(cache.isDirty('totalVisits')).toBe(true);

    expect(cache.get('totalVisits')).toBe(10);
    expect(cache.isDirty('totalVisits')).toBe(false);
    expect(cache.recomputeCount('totalVisits')).toBe(2);
  });

  it('passes store errors through unchanged', () => {
    const computers = fakeComputers();
    const cache = new StatsCache(computers, new TestClock(2024, 6, 15).now);
    const failure = new NotFoundError('Patient', 1);
    computers.totalPatients.mockImplementationOnce(() => {
      throw failure;
    });

    let caught: unknown;
    try {
      cache.get('totalPatients');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBe(failure);
    expect(caught).toBeInstanceOf(AppError);
  });

  it('expires date-relative stats when the day changes', () => {
    const computers = fakeComputers();
    const clock = new TestClock(2024, 6, 15, 23);
    const cache = new StatsCache(computers, clock.now);
    expect(cache.get('visitsToday')).toBe(2);
    cache.get('totalPatients');

    clock.advanceMinutes(120);

    expect(cache.isDirty('visitsToday')).toBe(true);
    expect(cache.get('visitsToday')).toBe(0);
    expect(computers.visitsToday).toHaveBeenLastCalledWith('2024-06-16');
    cache.get('totalPatients');
    expect(computers.totalPatients).toHaveBeenCalledTimes(1);
  });
});

describe('Store stats', () => {
  const ctx = setupTestStore();

  it('follows the worked clinic scenario', () => {
    const { store } = ctx();

    const maria = store.createPatient(mariaSantos);
    expect(maria.reference).toBe('00-00-01');
    expect(store.getStat('totalPatients')).toBe(1);

    store.createVisit({ patientId: maria.id, visitDate: '2024-01-15', weightKg: 60 });
    expect(store.getStat('totalVisits')).toBe(1);
    expect(store.getStat('totalPatients')).toBe(1);
    expect(store.stats.recomputeCount('totalPatients')).toBe(1);
  });

  it('never serves a stale value after a mutation', () => {
    const { store } = ctx();
    expect(store.getStat('totalPatients')).toBe(0);
    expect(store.getStat('visitsToday')).toBe(0);

    const patient = store.createPatient(mariaSantos);
    expect(store.getStat('totalPatients')).toBe(1);

    const visit = store.createVisit({ patientId: patient.id, visitDate: '2024-06-15' });
    expect(store.getStat('visitsToday')).toBe(1);

    store.updateVisit(visit.id, { visitDate: '2024-06-14' });
    expect(store.getStat('visitsToday')).toBe(0);

    store.deleteVisit(visit.id);
    store.deletePatient(patient.id);
    expect(store.getStat('totalPatients')).toBe(0);
    expect(store.getStat('totalVisits')).toBe(0);
  });

  it('recomputes only the stats a mutation affects', () => {
    const { store } = ctx();
    const patient = store.createPatient(mariaSantos);
    store.statsSnapshot();

    store.updatePatient(patient.id, { sex: 'M' });
    const snapshot = store.statsSnapshot();

    expect(snapshot.patientsBySex).toEqual({ M: 1, F: 0, unspecified: 0 });
    expect(store.stats.recomputeCount('patientsBySex')).toBe(2);
    expect(store.stats.recomputeCount('totalPatients')).toBe(1);
    expect(store.stats.recomputeCount('totalVisits')).toBe(1);
    expect(store.stats.recomputeCount('visitsToday')).toBe(1);
    expect(store.stats.recomputeCount('visitsByMonth')).toBe(1);
  });

  it('counts visits per month over the last twelve months', () => {
    const { store } = ctx();
    const patient = store.createPatient(mariaSantos);
    for (const visitDate of ['2024-06-01', '2024-06-15', '2024-05-20', '2023-07-01', '2023-06-30']) {
      store.createVisit({ patientId: patient.id, visitDate });
    }

    const byMonth = store.getStat('visitsByMonth');

    expect(Object.keys(byMonth)).toEqual([
      '2023-07', '2023-08', '2023-09', '2023-10', '2023-11', '2023-12',
      '2024-01', '2024-02', '2024-03', '2024-04', '2024-05', '2024-06',
    ]);
    expect(byMonth['2024-06']).toBe(2);
    expect(byMonth['2024-05']).toBe(1);
    expect(byMonth['2023-07']).toBe(1);
    expect(byMonth['2023-12']).toBe(0);
  });

  it('breaks patients down by sex', () => {
    const { store } = ctx();
    createPatients(store, [
      mariaSantos,
      { lastName: 'Cruz', firstName: 'Ana', sex: 'F' },
      { lastName: 'Abad', firstName: 'Jose', sex: 'M' },
      { lastName: 'Reyes', firstName: 'Sam' },
    ]);

    expect(store.getStat('patientsBySex')).toEqual({ M: 1, F: 2, unspecified: 1 });
  });

  it('keeps serving the stored breakdown after a caller edits its copy', () => {
    const { store } = ctx();
    store.createPatient(mariaSantos);

    store.getStat('patientsBySex').F = 99;

    expect(store.getStat('patientsBySex')).toEqual({ M: 0, F: 1, unspecified: 0 });
  });

  it('marks every stat dirty on invalidateStats', () => {
    const { store } = ctx();
    store.statsSnapshot();

    store.invalidateStats();

    expect(store.stats.isDirty('totalPatients')).toBe(true);
    expect(store.stats.isDirty('visitsByMonth')).toBe(true);
  });
});
