import type { SqliteDatabase } from '../config/database';
import { loggers } from '../utils/logger';
import { ConstraintViolationError, NotFoundError, sqliteCode } from '../utils/errors';
import type { DbAccount } from '../types/database';
import { accountRoles } from '../types/records';
import type { Account, AccountRole } from '../types/records';
import type { ModelContext } from './context';
import { oneOf } from './context';

/**
 * Account Model
 * Stores accounts with bcrypt hashes only; hashing happens in the auth
 * service before anything reaches this model. Account changes never touch
 * the stats cache.
 */

export interface CreateAccountRow {
  username: string;
  passwordHash: string;
  role: AccountRole;
}

export interface UpdateAccountRow {
  username?: string;
  passwordHash?: string;
  role?: AccountRole;
}

export interface AccountWithHash extends Account {
  passwordHash: string;
}

function toAccount(row: DbAccount): Account {
  return {
    id: row.id,
    username: row.username,
    role: oneOf(accountRoles, row.role) ?? 'staff',
    createdAt: row.created_at,
    lastLoginAt: row.last_login_at,
  };
}

function requireAccount(db: SqliteDatabase, id: number): DbAccount {
  const row = db.prepare<[number], DbAccount>('SELECT * FROM accounts WHERE id = ?').get(id);
  if (!row) {
    throw new NotFoundError('Account', id);
  }
  return row;
}

function usernameTaken(error: unknown): boolean {
  return sqliteCode(error) === 'SQLITE_CONSTRAINT_UNIQUE';
}

function countAccounts(db: SqliteDatabase): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM accounts').get();
  return row?.count ?? 0;
}

function countAdmins(db: SqliteDatabase): number {
  const row = db
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM accounts WHERE role = 'admin'")
    .get();
  return row?.count ?? 0;
}

function lastAdmin(id: number): ConstraintViolationError {
  return new ConstraintViolationError('last_admin', 'At least one admin account must remain', { id });
}

export interface CreateAccountOptions {
  /** Refuse the insert unless the table is empty (first-run setup) */
  firstRun?: boolean;
}

export class AccountModel {
  constructor(private readonly ctx: ModelContext) {}

  create(input: CreateAccountRow, options: CreateAccountOptions = {}): Account {
    try {
      const account = this.ctx.pool.transaction((db) => {
        if (options.firstRun && countAccounts(db) > 0) {
          throw new ConstraintViolationError('setup_complete', 'An account already exists');
        }

        const result = db
          .prepare<[string, string, string, string]>(
            'INSERT INTO accounts (username, password_hash, role, created_at) VALUES (?, ?, ?, ?)'
          )
          .run(input.username, input.passwordHash, input.role, this.ctx.now().toISOString());

        return toAccount(requireAccount(db, Number(result.lastInsertRowid)));
      });

      loggers.dbOperation('INSERT', 'accounts', { id: account.id });
      return account;
    } catch (error) {
      if (usernameTaken(error)) {
        throw new ConstraintViolationError('username_taken', 'Username is already taken');
      }
      throw error;
    }
  }

  update(id: number, input: UpdateAccountRow): Account {
    try {
      const account = this.ctx.pool.transaction((db) => {
        const current = requireAccount(db, id);
        if (current.role === 'admin' && input.role === 'staff' && countAdmins(db) <= 1) {
          throw lastAdmin(id);
        }

        db.prepare<[string, string, string, number]>(
          'UPDATE accounts SET username = ?, password_hash = ?, role = ? WHERE id = ?'
        ).run(
          input.username ?? current.username,
          input.passwordHash ?? current.password_hash,
          input.role ?? current.role,
          id
        );

        return toAccount(requireAccount(db, id));
      });

      loggers.dbOperation('UPDATE', 'accounts', { id, passwordChanged: input.passwordHash !== undefined });
      return account;
    } catch (error) {
      if (usernameTaken(error)) {
        throw new ConstraintViolationError('username_taken', 'Username is already taken');
      }
      throw error;
    }
  }

  get(id: number): Account {
    return this.ctx.pool.withConnection((db) => toAccount(requireAccount(db, id)));
  }

  /**
   * Account with its hash, for credential checks only. Case-insensitive.
   */
  findByUsername(username: string): AccountWithHash | null {
    const row = this.ctx.pool.withConnection((db) =>
      db.prepare<[string], DbAccount>('SELECT * FROM accounts WHERE username = ? COLLATE NOCASE').get(username)
    );
    return row ? { ...toAccount(row), passwordHash: row.password_hash } : null;
  }

  list(): Account[] {
    return this.ctx.pool.withConnection((db) =>
      db
        .prepare<[], DbAccount>('SELECT * FROM accounts ORDER BY username COLLATE NOCASE ASC')
        .all()
        .map(toAccount)
    );
  }

  /**
   * Delete an account. Neither the last account nor the last admin can be
   * deleted.
   */
  delete(id: number): void {
    this.ctx.pool.transaction((db) => {
      const current = requireAccount(db, id);

      if (countAccounts(db) <= 1) {
        throw new ConstraintViolationError('last_account', 'The last account cannot be deleted', { id });
      }
      if (current.role === 'admin' && countAdmins(db) <= 1) {
        throw lastAdmin(id);
      }

      db.prepare<[number]>('DELETE FROM accounts WHERE id = ?').run(id);
    });

    loggers.dbOperation('DELETE', 'accounts', { id });
  }

  recordLogin(id: number): void {
    this.ctx.pool.transaction((db) => {
      db.prepare<[string, number]>('UPDATE accounts SET last_login_at = ? WHERE id = ?').run(
        this.ctx.now().toISOString(),
        id
      );
    });
  }

  hasAccounts(): boolean {
    return this.ctx.pool.withConnection(countAccounts) > 0;
  }
}
