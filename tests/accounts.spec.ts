import { describe, it, expect } from 'vitest';
import { ConstraintViolationError } from '../src/utils/errors';
import { setupTestStore } from './setup';

const PASSWORD = 'test-secret';

describe('Accounts', () => {
  const ctx = setupTestStore();

  it('reports first run until an account exists', async () => {
    const { store } = ctx();

    expect(store.needsFirstRun()).toBe(true);
    await store.createAccount({ username: 'admin', password: PASSWORD });
    expect(store.needsFirstRun()).toBe(false);
  });

  it('stores a bcrypt hash and never returns it', async () => {
    const { store, clock } = ctx();

    const account = await store.createAccount({ username: 'admin', password: PASSWORD });
    const stored = store.accounts.findByUsername('admin');

    expect(account).toEqual({
      id: 1,
      username: 'admin',
      role: 'admin',
      createdAt: clock.now().toISOString(),
      lastLoginAt: null,
    });
    expect(stored?.passwordHash).not.toBe(PASSWORD);
    expect(stored?.passwordHash.startsWith('$2')).toBe(true);
  });

  it('rejects a username that differs only in case', async () => {
    const { store } = ctx();
    await store.createAccount({ username: 'Admin', password: PASSWORD });

    await expect(store.createAccount({ username: 'admin', password: PASSWORD })).rejects.toMatchObject({
      constraint: 'username_taken',
    });
  });

  it('rejects a short password', async () => {
    const { store } = ctx();

    await expect(store.createAccount({ username: 'admin', password: 'short' })).rejects.toThrow(
      'Invalid password: must be at least 8 characters'
    );
  });

  describe('verifyCredentials', () => {
    it('accepts the right password and records the login', async () => {
      const { store, clock } = ctx();
      await store.createAccount({ username: 'admin', password: PASSWORD });
      clock.advanceMinutes(1);

      const account = await store.verifyCredentials(' ADMIN ', PASSWORD);

      expect(account?.username).toBe('admin');
      expect(account?.lastLoginAt).toBe(clock.now().toISOString());
    });

    it('rejects a wrong password or an unknown user', async () => {
      const { store } = ctx();
      await store.createAccount({ username: 'admin', password: PASSWORD });

      expect(await store.verifyCredentials('admin', 'wrong-secret')).toBeNull();
      expect(await store.verifyCredentials('nobody', PASSWORD)).toBeNull();
      expect(store.getAccount(1).lastLoginAt).toBeNull();
    });

    it('uses the new password after an update', async () => {
      const { store } = ctx();
      const account = await store.createAccount({ username: 'admin', password: PASSWORD });

      await store.updateAccount(account.id, { password: 'test-secret-2' });

      expect(await store.verifyCredentials('admin', PASSWORD)).toBeNull();
      expect((await store.verifyCredentials('admin', 'test-secret-2'))?.id).toBe(account.id);
    });
  });

  describe('setupFirstAdmin', () => {
    it('creates an admin on an empty store', async () => {
      const { store } = ctx();

      const account = await store.setupFirstAdmin({ username: 'admin', password: PASSWORD });

      expect(account.role).toBe('admin');
    });

    it('refuses once any account exists', async () => {
      const { store } = ctx();
      await store.createAccount({ username: 'front.desk', password: PASSWORD, role: 'staff' });

      await expect(store.setupFirstAdmin({ username: 'admin', password: PASSWORD })).rejects.toMatchObject({
        constraint: 'setup_complete',
      });
      expect(store.listAccounts()).toHaveLength(1);
    });
  });

  describe('last admin', () => {
    it('refuses to demote the only admin', async () => {
      const { store } = ctx();
      const admin = await store.createAccount({ username: 'admin', password: PASSWORD });
      await store.createAccount({ username: 'front.desk', password: PASSWORD, role: 'staff' });

      await expect(store.updateAccount(admin.id, { role: 'staff' })).rejects.toMatchObject({
        constraint: 'last_admin',
      });
      expect(store.getAccount(admin.id).role).toBe('admin');
    });

    it('refuses to delete the only admin while staff remain', async () => {
      const { store } = ctx();
      const admin = await store.createAccount({ username: 'admin', password: PASSWORD });
      await store.createAccount({ username: 'front.desk', password: PASSWORD, role: 'staff' });

      expect(() => store.deleteAccount(admin.id)).toThrow('At least one admin account must remain');
      expect(store.listAccounts()).toHaveLength(2);
    });

    it('allows demoting an admin while another admin remains', async () => {
      const { store } = ctx();
      const first = await store.createAccount({ username: 'admin', password: PASSWORD });
      await store.createAccount({ username: 'second.admin', password: PASSWORD });

      const demoted = await store.updateAccount(first.id, { role: 'staff' });

      expect(demoted.role).toBe('staff');
    });
  });

  describe('deleteAccount', () => {
    it('keeps the last account', async () => {
      const { store } = ctx();
      const account = await store.createAccount({ username: 'admin', password: PASSWORD });

      expect(() => store.deleteAccount(account.id)).toThrow(ConstraintViolationError);
      expect(store.listAccounts()).toHaveLength(1);
    });

    it('deletes an account while another remains', async () => {
      const { store } = ctx();
      await store.createAccount({ username: 'admin', password: PASSWORD });
      const staff = await store.createAccount({ username: 'front.desk', password: PASSWORD, role: 'staff' });

      store.deleteAccount(staff.id);

      expect(store.listAccounts().map((a) => a.username)).toEqual(['admin']);
    });
  });

  it('leaves the stats cache alone', async () => {
    const { store } = ctx();
    store.getStat('totalPatients');

    await store.createAccount({ username: 'admin', password: PASSWORD });
    store.getStat('totalPatients');

    expect(store.stats.recomputeCount('totalPatients')).toBe(1);
    expect(store.stats.currentGeneration).toBe(0);
  });
});
