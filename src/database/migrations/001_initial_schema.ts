import type { Migration } from '../migrator';

/**
 * Migration 001: Initial Schema
 *
 * Patients, visits and accounts with the indices search depends on:
 * sort name (alphabetical order and prefix search), reference number
 * (unique, exact match), date of birth (age brackets), visit date (date
 * ranges) and visit (patient, date) for last-visit lookups.
 */
export const migration: Migration = {
  version: 1,
  name: 'initial_schema',
  up(db) {
    db.exec(`
      CREATE TABLE patients (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        reference_number INTEGER NOT NULL,
        last_name TEXT NOT NULL,
        first_name TEXT NOT NULL,
        middle_name TEXT,
        sort_name TEXT NOT NULL,
        date_of_birth TEXT,
        sex TEXT CHECK (sex IN ('M', 'F')),
        contact_number TEXT,
        address TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE UNIQUE INDEX idx_patients_reference ON patients(reference_number);
      CREATE INDEX idx_patients_sort_name ON patients(sort_name);
      CREATE INDEX idx_patients_dob ON patients(date_of_birth);

      CREATE TABLE visits (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        patient_id INTEGER NOT NULL REFERENCES patients(id) ON DELETE RESTRICT,
        visit_date TEXT NOT NULL,
        visit_time TEXT,
        weight_kg REAL,
        height_cm REAL,
        blood_pressure TEXT,
        temperature_c REAL,
        notes TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX idx_visits_date ON visits(visit_date);
      CREATE INDEX idx_visits_patient_date ON visits(patient_id, visit_date);

      CREATE TABLE accounts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL,
        password_hash TEXT NOT NULL,
        role TEXT NOT NULL DEFAULT 'admin' CHECK (role IN ('admin', 'staff')),
        created_at TEXT NOT NULL
      );

      CREATE UNIQUE INDEX idx_accounts_username ON accounts(username COLLATE NOCASE);
    `);
  },
};
