import type { Migration } from '../migrator';

/**
 * Migration 002: Visit Types
 *
 * Distinguishes first visits, follow-ups and back-entered ("encode") paper
 * records, and tracks when a visit was last edited.
 */
export const migration: Migration = {
  version: 2,
  name: 'visit_types',
  up(db) {
    db.exec(`
      ALTER TABLE visits ADD COLUMN visit_type TEXT NOT NULL DEFAULT 'new'
        CHECK (visit_type IN ('new', 'follow-up', 'encode'));
      ALTER TABLE visits ADD COLUMN updated_at TEXT;
    `);
  },
};
