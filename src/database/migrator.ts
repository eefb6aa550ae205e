import type { ConnectionPool, SqliteDatabase } from '../config/database';
import logger, { loggers } from '../utils/logger';
import { IncompatibleSchemaError, MigrationFailedError } from '../utils/errors';
import { migrations as defaultMigrations } from './migrations';

/**
 * Schema Migrator
 * Brings a store file up to the current schema version, one step per
 * transaction. A failed step leaves the store at the previous version.
 */

export interface Migration {
  version: number;
  name: string;
  up(db: SqliteDatabase): void;
}

export type MigratorState =
  | { status: 'uninitialized' }
  | { status: 'migrating'; from: number; to: number }
  | { status: 'ready'; version: number };

export interface MigrationReport {
  from: number;
  to: number;
  applied: number[];
}

/**
 * Current version recorded in the store; 0 when the store has never been
 * initialized
 */
export function readSchemaVersion(db: SqliteDatabase): number {
  const table = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get();

  if (!table) {
    return 0;
  }

  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version WHERE id = 1').get();
  return row?.version ?? 0;
}

function writeSchemaVersion(db: SqliteDatabase, version: number, appliedAt: string): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);

  db.prepare<[number, string]>(
    `INSERT INTO schema_version (id, version, applied_at) VALUES (1, ?, ?)
     ON CONFLICT(id) DO UPDATE SET version = excluded.version, applied_at = excluded.applied_at`
  ).run(version, appliedAt);
}

export class SchemaMigrator {
  private state: MigratorState = { status: 'uninitialized' };

  constructor(
    private readonly pool: ConnectionPool,
    private readonly steps: readonly Migration[] = defaultMigrations,
    private readonly now: () => Date = () => new Date()
  ) {
    steps.forEach((step, index) => {
      if (step.version !== index + 1) {
        throw new Error(`Migration ${step.name} has version ${step.version}, expected ${index + 1}`);
      }
    });
  }

  get latestVersion(): number {
    return this.steps.length;
  }

  getState(): MigratorState {
    return this.state;
  }

  currentVersion(): number {
    return this.pool.withConnection(readSchemaVersion);
  }

  /**
   * Apply every pending step in order. Safe to call on a current store: it
   * then reads the version and changes nothing.
   */
  migrate(): MigrationReport {
    const from = this.currentVersion();

    if (from > this.latestVersion) {
      throw new IncompatibleSchemaError(from, this.latestVersion);
    }

    const applied: number[] = [];

    for (const step of this.steps.slice(from)) {
      this.state = { status: 'migrating', from: step.version - 1, to: step.version };
      loggers.migration(step.version, step.name, 'applying');

      try {
        this.pool.transaction((db) => {
          const current = readSchemaVersion(db);
          if (current !== step.version - 1) {
            throw new Error(`store is at version ${current}, expected ${step.version - 1}`);
          }

          step.up(db);
          writeSchemaVersion(db, step.version, this.now().toISOString());
        });
      } catch (error) {
        this.state = { status: 'uninitialized' };
        loggers.migration(step.version, step.name, 'failed');
        throw new MigrationFailedError(step.version, step.name, error);
      }

      applied.push(step.version);
      loggers.migration(step.version, step.name, 'applied');
    }

    this.state = { status: 'ready', version: this.latestVersion };

    if (applied.length > 0) {
      logger.info('Store schema upgraded', { from, to: this.latestVersion });
    }

    return { from, to: this.latestVersion, applied };
  }
}
