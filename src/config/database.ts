import Database from 'better-sqlite3';
import logger from '../utils/logger';
import { ConstraintViolationError, StorageUnavailableError, ValidationError, errorMessage } from '../utils/errors';
import type { StoreConfig } from './config';

/**
 * SQLite Connection Pool
 * A small fixed set of connections to the single store file. Pooling only
 * saves open/close cost; there is one process and one user.
 */

export type SqliteDatabase = Database.Database;

/**
 * Open one connection and apply the durability pragmas
 */
export function openConnection(config: StoreConfig, options: { readonly?: boolean } = {}): SqliteDatabase {
  let db: SqliteDatabase | undefined;

  try {
    db = new Database(config.path, {
      timeout: config.busyTimeoutMs,
      readonly: options.readonly ?? false,
      fileMustExist: options.readonly ?? false,
    });

    if (!options.readonly) {
      db.pragma(`journal_mode = ${config.journalMode}`);
      db.pragma(`synchronous = ${config.synchronous}`);
    }
    db.pragma('foreign_keys = ON');

    // Touches the file header: a file that is not a database fails here
    db.prepare('SELECT count(*) AS n FROM sqlite_master').get();

    return db;
  } catch (error) {
    if (db?.open) {
      db.close();
    }

    logger.error('Failed to open store', {
      path: config.path,
      error: errorMessage(error),
    });

    throw new StorageUnavailableError(`Cannot open store: ${errorMessage(error)}`, config.path, {
      cause: error,
    });
  }
}

/**
 * Scoped handle to a pooled connection. The database is unreachable through
 * the handle once it has been released.
 */
export class PooledConnection {
  private connection: SqliteDatabase | null;

  constructor(readonly id: number, connection: SqliteDatabase, private readonly storePath: string) {
    this.connection = connection;
  }

  get db(): SqliteDatabase {
    if (!this.connection) {
      throw new StorageUnavailableError(`Connection handle ${this.id} used after release`, this.storePath);
    }
    return this.connection;
  }

  get released(): boolean {
    return this.connection === null;
  }

  /** @internal */
  detach(): SqliteDatabase {
    const connection = this.db;
    this.connection = null;
    return connection;
  }
}

export interface PoolStats {
  size: number;
  idle: number;
  inUse: number;
}

export class ConnectionPool {
  private readonly idle: SqliteDatabase[] = [];
  private readonly checkedOut = new Set<PooledConnection>();
  private nextHandleId = 1;
  private closed = false;

  constructor(readonly config: StoreConfig) {
    if (config.path === ':memory:' && config.poolSize > 1) {
      throw new ValidationError('poolSize', 'an in-memory store supports a single connection');
    }

    try {
      for (let i = 0; i < config.poolSize; i++) {
        this.idle.push(openConnection(config));
      }
    } catch (error) {
      this.idle.forEach((db) => db.close());
      this.idle.length = 0;
      throw error;
    }

    logger.info('Store connection pool opened', {
      path: config.path,
      poolSize: config.poolSize,
      journalMode: config.journalMode,
      synchronous: config.synchronous,
    });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Check a connection out of the pool
   */
  acquire(): PooledConnection {
    if (this.closed) {
      throw new StorageUnavailableError('Store is closed', this.config.path);
    }

    const connection = this.idle.pop();
    if (!connection) {
      throw new StorageUnavailableError(
        `Connection pool exhausted (${this.config.poolSize} in use)`,
        this.config.path
      );
    }

    const handle = new PooledConnection(this.nextHandleId++, connection, this.config.path);
    this.checkedOut.add(handle);
    return handle;
  }

  /**
   * Return a connection to the pool
   */
  release(handle: PooledConnection): void {
    // closeAll already closed it
    if (this.closed && handle.released) {
      return;
    }

    if (!this.checkedOut.has(handle)) {
      throw new StorageUnavailableError(
        `Connection handle ${handle.id} is not checked out from this pool`,
        this.config.path
      );
    }

    this.checkedOut.delete(handle);
    const connection = handle.detach();

    if (this.closed) {
      connection.close();
      return;
    }

    // A connection must never go back with an open transaction
    if (connection.inTransaction) {
      logger.warn('Rolling back transaction left open on released connection', { handle: handle.id });
      connection.exec('ROLLBACK');
    }

    this.idle.push(connection);
  }

  /**
   * Run fn with a connection that is released when fn returns or throws
   */
  withConnection<T>(fn: (db: SqliteDatabase) => T): T {
    const handle = this.acquire();
    try {
      return fn(handle.db);
    } finally {
      this.release(handle);
    }
  }

  /**
   * Run fn inside a BEGIN IMMEDIATE transaction; commits on return, rolls
   * back on throw
   */
  transaction<T>(fn: (db: SqliteDatabase) => T): T {
    return this.withConnection((db) => db.transaction(() => fn(db)).immediate());
  }

  /**
   * Run fn while no other handle is checked out
   */
  exclusive<T>(operation: string, fn: (db: SqliteDatabase) => T): T {
    if (this.checkedOut.size > 0) {
      throw new ConstraintViolationError(
        'exclusive_access',
        `${operation} requires exclusive access to the store`,
        { inUse: this.checkedOut.size }
      );
    }
    return this.withConnection(fn);
  }

  stats(): PoolStats {
    return {
      size: this.config.poolSize,
      idle: this.idle.length,
      inUse: this.checkedOut.size,
    };
  }

  /**
   * Close every connection, including checked-out ones; their open
   * transactions roll back.
   */
  closeAll(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const db of this.idle.splice(0)) {
      try {
        db.close();
      } catch (error) {
        logger.error('Error closing store connection', { error: errorMessage(error) });
      }
    }

    if (this.checkedOut.size > 0) {
      logger.warn('Store closed with connections still checked out', { inUse: this.checkedOut.size });
      for (const handle of this.checkedOut) {
        handle.detach().close();
      }
      this.checkedOut.clear();
    }

    logger.info('Store connection pool closed', { path: this.config.path });
  }
}
