import type { Migration } from '../migrator';

/**
 * Migration 003: Patient Profile
 *
 * Adds the profile fields recorded at registration, soft deletion for
 * patients (reference numbers stay reserved), registration-date lookups and
 * account login tracking.
 */

const PROFILE_COLUMNS = ['civil_status', 'occupation', 'parents', 'parent_contact', 'school', 'notes'];

export const migration: Migration = {
  version: 3,
  name: 'patient_profile',
  up(db) {
    for (const column of PROFILE_COLUMNS) {
      db.exec(`ALTER TABLE patients ADD COLUMN ${column} TEXT`);
    }

    db.exec(`
      ALTER TABLE patients ADD COLUMN deleted_at TEXT;
      CREATE INDEX idx_patients_created ON patients(created_at);
      ALTER TABLE accounts ADD COLUMN last_login_at TEXT;
    `);
  },
};
