import type { ConnectionPool } from '../config/database';
import type { StatsInvalidator } from '../services/statsCache';

/**
 * What every model needs from the store it belongs to
 */
export interface ModelContext {
  pool: ConnectionPool;
  stats: StatsInvalidator;
  now: () => Date;
}

/**
 * Narrow a stored string to one of a fixed set of values
 */
export function oneOf<T extends string>(values: readonly T[], value: string | null): T | null {
  return values.find((candidate) => candidate === value) ?? null;
}

export function pageOffset(page: number, pageSize: number): number {
  return (Math.max(page, 1) - 1) * pageSize;
}
