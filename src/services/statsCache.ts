import { loggers } from '../utils/logger';
import { AppError, errorMessage } from '../utils/errors';
import { localDateString } from '../utils/dates';
import type { Sex } from '../types/records';

/**
 * Stats Cache
 * Dashboard aggregates kept in memory behind dirty flags. Mutations only
 * flag the stats they affect; the next read recomputes.
 */

export const statNames = ['totalPatients', 'totalVisits', 'visitsToday', 'visitsByMonth', 'patientsBySex'] as const;

export type StatName = (typeof statNames)[number];

export interface StatValues {
  totalPatients: number;
  totalVisits: number;
  visitsToday: number;
  /** Visit counts keyed YYYY-MM over the last 12 months, oldest first */
  visitsByMonth: Record<string, number>;
  patientsBySex: Record<Sex | 'unspecified', number>;
}

export interface CachedStat<T> {
  key: StatName;
  value: T;
  dirty: boolean;
  generation: number;
  computedAt: string;
  /** Calendar day a date-relative stat was computed for */
  computedFor: string | null;
}

export type StatComputers = { [K in StatName]: (referenceDate: string) => StatValues[K] };

export interface StatsInvalidator {
  invalidate(names: StatName | readonly StatName[]): void;
}

// Stale once the local calendar day changes
const DATE_RELATIVE: ReadonlySet<StatName> = new Set<StatName>(['visitsToday', 'visitsByMonth']);

export function isStatName(value: string): value is StatName {
  return statNames.some((name) => name === value);
}

export class StatsCache implements StatsInvalidator {
  private readonly entries: { [K in StatName]?: CachedStat<StatValues[K]> } = {};
  private readonly recomputes: Record<StatName, number> = {
    totalPatients: 0,
    totalVisits: 0,
    visitsToday: 0,
    visitsByMonth: 0,
    patientsBySex: 0,
  };
  private generation = 0;

  constructor(
    private readonly computers: StatComputers,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Current value of a stat, recomputed first when it is absent, dirty or
   * computed for another day. Callers get their own copy.
   */
  get<K extends StatName>(name: K): StatValues[K] {
    const today = localDateString(this.now());
    const entry = this.entries[name];

    if (entry && !entry.dirty && !this.isExpired(entry, today)) {
      loggers.cacheHit(name);
      return structuredClone(entry.value);
    }

    loggers.cacheMiss(name, !entry ? 'absent' : entry.dirty ? 'dirty' : 'expired');

    const started = Date.now();
    let value: StatValues[K];

    try {
      value = this.computers[name](today);
    } catch (error) {
      // The entry keeps its flag; no fallback value is reported
      if (error instanceof AppError) {
        throw error;
      }
      const failure = new AppError(`Failed to recompute ${name}: ${errorMessage(error)}`);
      failure.cause = error;
      throw failure;
    }

    this.entries[name] = {
      key: name,
      value,
      dirty: false,
      generation: this.generation,
      computedAt: this.now().toISOString(),
      computedFor: DATE_RELATIVE.has(name) ? today : null,
    };
    this.recomputes[name] += 1;

    loggers.cacheRecompute(name, Date.now() - started);
    return structuredClone(value);
  }

  /**
   * Flag stats as dirty. Never recomputes.
   */
  invalidate(names: StatName | readonly StatName[]): void {
    const list: readonly StatName[] = typeof names === 'string' ? [names] : names;
    if (list.length === 0) {
      return;
    }

    this.generation += 1;
    for (const name of list) {
      const entry = this.entries[name];
      if (entry) {
        entry.dirty = true;
      }
    }

    loggers.cacheInvalidate(list);
  }

  invalidateAll(): void {
    this.invalidate(statNames);
  }

  isDirty(name: StatName): boolean {
    const entry = this.entries[name];
    return !entry || entry.dirty || this.isExpired(entry, localDateString(this.now()));
  }

  recomputeCount(name: StatName): number {
    return this.recomputes[name];
  }

  get currentGeneration(): number {
    return this.generation;
  }

  snapshot(): StatValues {
    return {
      totalPatients: this.get('totalPatients'),
      totalVisits: this.get('totalVisits'),
      visitsToday: this.get('visitsToday'),
      visitsByMonth: this.get('visitsByMonth'),
      patientsBySex: this.get('patientsBySex'),
    };
  }

  private isExpired(entry: { computedFor: string | null }, today: string): boolean {
    return entry.computedFor !== null && entry.computedFor !== today;
  }
}
