import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConnectionPool } from '../src/config/database';
import { storeConfigSchema } from '../src/config/config';
import { ConstraintViolationError, StorageUnavailableError, ValidationError } from '../src/utils/errors';
import { makeTempDir, removeDir } from './setup';

describe('ConnectionPool', () => {
  let dir: string;
  let pool: ConnectionPool;

  beforeEach(() => {
    dir = makeTempDir();
    pool = new ConnectionPool(storeConfigSchema.parse({ path: path.join(dir, 'pool.db'), poolSize: 2 }));
    pool.withConnection((db) => db.exec('CREATE TABLE items (id INTEGER PRIMARY KEY, label TEXT NOT NULL)'));
  });

  afterEach(() => {
    pool.closeAll();
    removeDir(dir);
  });

  const countItems = () =>
    pool.withConnection((db) => db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM items').get()?.count);

  it('applies the durability pragmas to every connection', () => {
    const first = pool.acquire();
    const second = pool.acquire();

    for (const handle of [first, second]) {
      expect(handle.db.pragma('journal_mode', { simple: true })).toBe('wal');
      expect(handle.db.pragma('synchronous', { simple: true })).toBe(2);
      expect(handle.db.pragma('foreign_keys', { simple: true })).toBe(1);
    }

    pool.release(first);
    pool.release(second);
  });

  it('honours DELETE journal mode and NORMAL synchronous', () => {
    const other = new ConnectionPool(
      storeConfigSchema.parse({ path: path.join(dir, 'other.db'), poolSize: 1, journalMode: 'DELETE', synchronous: 'NORMAL' })
    );

    other.withConnection((db) => {
      expect(db.pragma('journal_mode', { simple: true })).toBe('delete');
      expect(db.pragma('synchronous', { simple: true })).toBe(1);
    });
    other.closeAll();
  });

  it('refuses to hand out more connections than its size', () => {
    const first = pool.acquire();
    const second = pool.acquire();

    expect(() => pool.acquire()).toThrow(StorageUnavailableError);
    expect(pool.stats()).toEqual({ size: 2, idle: 0, inUse: 2 });

    pool.release(first);
    pool.release(second);
    expect(pool.stats()).toEqual({ size: 2, idle: 2, inUse: 0 });
  });

  it('makes a handle unusable after release', () => {
    const handle = pool.acquire();
    pool.release(handle);

    expect(handle.released).toBe(true);
    expect(() => handle.db).toThrow(StorageUnavailableError);
    expect(() => pool.release(handle)).toThrow(StorageUnavailableError);
  });

  it('rolls back a transaction left open on a released connection', () => {
    const handle = pool.acquire();
    handle.db.exec('BEGIN');
    handle.db.prepare("INSERT INTO items (label) VALUES ('uncommitted')").run();
    pool.release(handle);

    expect(countItems()).toBe(0);
  });

  it('commits a transaction that returns and rolls back one that throws', () => {
    pool.transaction((db) => {
      db.prepare("INSERT INTO items (label) VALUES ('kept')").run();
    });

    expect(() =>
      pool.transaction((db) => {
        db.prepare("INSERT INTO items (label) VALUES ('discarded')").run();
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(countItems()).toBe(1);
    expect(pool.stats().inUse).toBe(0);
  });

  it('refuses exclusive work while a handle is checked out', () => {
    const handle = pool.acquire();

    expect(() => pool.exclusive('Backup', () => undefined)).toThrow(ConstraintViolationError);

    pool.release(handle);
    expect(pool.exclusive('Backup', () => 'done')).toBe('done');
  });

  it('refuses to acquire after closeAll', () => {
    pool.closeAll();

    expect(pool.isOpen).toBe(false);
    expect(() => pool.acquire()).toThrow(StorageUnavailableError);
  });

  it('closes checked-out connections on closeAll', () => {
    const handle = pool.acquire();
    pool.closeAll();

    expect(handle.released).toBe(true);
    expect(() => pool.release(handle)).not.toThrow();
  });

  it('allows a single connection to an in-memory store', () => {
    expect(() => new ConnectionPool(storeConfigSchema.parse({ path: ':memory:', poolSize: 2 }))).toThrow(ValidationError);

    const memory = new ConnectionPool(storeConfigSchema.parse({ path: ':memory:', poolSize: 1 }));
    expect(memory.stats().size).toBe(1);
    memory.closeAll();
  });

  it('fails with StorageUnavailable when the directory does not exist', () => {
    const missing = path.join(dir, 'missing', 'store.db');
    expect(() => new ConnectionPool(storeConfigSchema.parse({ path: missing }))).toThrow(StorageUnavailableError);
  });
});
