import type { SqliteDatabase } from '../config/database';
import { loggers } from '../utils/logger';
import { ConstraintViolationError, NotFoundError, ValidationError } from '../utils/errors';
import { localDateString } from '../utils/dates';
import { formatReferenceNumber } from '../utils/referenceNumber';
import {
  PatientInput,
  PatientUpdate,
  parseInput,
  patientInputSchema,
  patientUpdateSchema,
} from '../utils/validation';
import type { DbPatient } from '../types/database';
import { civilStatuses, sexes } from '../types/records';
import type { Page, Patient, PatientSummary, Sex } from '../types/records';
import type { StatName } from '../services/statsCache';
import { ModelContext, oneOf, pageOffset } from './context';

/**
 * Patient Model
 * CRUD over the patients table. Patients are soft-deleted so their reference
 * numbers are never handed out again.
 */

const AFFECTS = {
  create: ['totalPatients', 'patientsBySex'],
  update: ['patientsBySex'],
  delete: ['totalPatients', 'patientsBySex'],
  merge: ['totalPatients', 'patientsBySex'],
} as const satisfies Record<string, readonly StatName[]>;

export function normalizeName(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Key for alphabetical order and prefix search: "last first middle"
 */
export function sortName(lastName: string, firstName: string, middleName?: string | null): string {
  return normalizeName([lastName, firstName, middleName ?? ''].join(' '));
}

export function displayName(lastName: string, firstName: string, middleName?: string | null): string {
  return middleName ? `${lastName}, ${firstName} ${middleName}` : `${lastName}, ${firstName}`;
}

export function toPatient(row: DbPatient): Patient {
  return {
    id: row.id,
    referenceNumber: row.reference_number,
    reference: formatReferenceNumber(row.reference_number),
    lastName: row.last_name,
    firstName: row.first_name,
    middleName: row.middle_name,
    dateOfBirth: row.date_of_birth,
    sex: oneOf(sexes, row.sex),
    civilStatus: oneOf(civilStatuses, row.civil_status),
    occupation: row.occupation,
    parents: row.parents,
    parentContact: row.parent_contact,
    school: row.school,
    contactNumber: row.contact_number,
    address: row.address,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Active (not soft-deleted) patient row, or null
 */
export function findActivePatient(db: SqliteDatabase, id: number): DbPatient | null {
  const row = db
    .prepare<[number], DbPatient>('SELECT * FROM patients WHERE id = ? AND deleted_at IS NULL')
    .get(id);
  return row ?? null;
}

function requireActivePatient(db: SqliteDatabase, id: number): DbPatient {
  const row = findActivePatient(db, id);
  if (!row) {
    throw new NotFoundError('Patient', id);
  }
  return row;
}

/**
 * Next reference number: one past the highest ever assigned, soft-deleted
 * patients included. Must run inside the inserting transaction.
 */
export function nextReferenceNumber(db: SqliteDatabase): number {
  const row = db
    .prepare<[], { next: number }>('SELECT COALESCE(MAX(reference_number), 0) + 1 AS next FROM patients')
    .get();
  return row?.next ?? 1;
}

type PatientColumns = Omit<DbPatient, 'id' | 'deleted_at'>;

export function insertPatientRow(db: SqliteDatabase, columns: PatientColumns): number {
  const result = db
    .prepare<PatientColumns>(
      `INSERT INTO patients (
        reference_number, last_name, first_name, middle_name, sort_name, date_of_birth, sex,
        civil_status, occupation, parents, parent_contact, school, contact_number, address, notes,
        created_at, updated_at
      ) VALUES (
        @reference_number, @last_name, @first_name, @middle_name, @sort_name, @date_of_birth, @sex,
        @civil_status, @occupation, @parents, @parent_contact, @school, @contact_number, @address, @notes,
        @created_at, @updated_at
      )`
    )
    .run(columns);
  return Number(result.lastInsertRowid);
}

const keep = <T>(next: T | undefined, current: T): T => (next === undefined ? current : next);

export interface MergeResult {
  target: Patient;
  movedVisits: number;
}

export class PatientModel {
  constructor(private readonly ctx: ModelContext) {}

  private assertNotFuture(dateOfBirth: string | null | undefined): void {
    if (dateOfBirth && dateOfBirth > localDateString(this.ctx.now())) {
      throw new ValidationError('dateOfBirth', 'must not be in the future');
    }
  }

  /**
   * Create a patient and assign the next reference number in the same
   * transaction
   */
  create(input: PatientInput): Patient {
    const data = parseInput(patientInputSchema, input);
    this.assertNotFuture(data.dateOfBirth);

    const timestamp = this.ctx.now().toISOString();

    const patient = this.ctx.pool.transaction((db) => {
      const id = insertPatientRow(db, {
        reference_number: nextReferenceNumber(db),
        last_name: data.lastName,
        first_name: data.firstName,
        middle_name: data.middleName ?? null,
        sort_name: sortName(data.lastName, data.firstName, data.middleName),
        date_of_birth: data.dateOfBirth ?? null,
        sex: data.sex ?? null,
        civil_status: data.civilStatus ?? null,
        occupation: data.occupation ?? null,
        parents: data.parents ?? null,
        parent_contact: data.parentContact ?? null,
        school: data.school ?? null,
        contact_number: data.contactNumber ?? null,
        address: data.address ?? null,
        notes: data.notes ?? null,
        created_at: timestamp,
        updated_at: timestamp,
      });

      return toPatient(requireActivePatient(db, id));
    });

    loggers.dbOperation('INSERT', 'patients', { id: patient.id, referenceNumber: patient.referenceNumber });
    this.ctx.stats.invalidate(AFFECTS.create);

    return patient;
  }

  /**
   * Update profile fields. The reference number cannot be changed.
   */
  update(id: number, changes: PatientUpdate): Patient {
    const data = parseInput(patientUpdateSchema, changes);
    this.assertNotFuture(data.dateOfBirth);

    const patient = this.ctx.pool.transaction((db) => {
      const current = requireActivePatient(db, id);

      const lastName = keep(data.lastName, current.last_name);
      const firstName = keep(data.firstName, current.first_name);
      const middleName = keep(data.middleName, current.middle_name);

      db.prepare<Omit<DbPatient, 'reference_number' | 'created_at' | 'deleted_at'>>(
        `UPDATE patients SET
          last_name = @last_name, first_name = @first_name, middle_name = @middle_name,
          sort_name = @sort_name, date_of_birth = @date_of_birth, sex = @sex,
          civil_status = @civil_status, occupation = @occupation, parents = @parents,
          parent_contact = @parent_contact, school = @school, contact_number = @contact_number,
          address = @address, notes = @notes, updated_at = @updated_at
        WHERE id = @id`
      ).run({
        id,
        last_name: lastName,
        first_name: firstName,
        middle_name: middleName,
        sort_name: sortName(lastName, firstName, middleName),
        date_of_birth: keep(data.dateOfBirth, current.date_of_birth),
        sex: keep(data.sex, current.sex),
        civil_status: keep(data.civilStatus, current.civil_status),
        occupation: keep(data.occupation, current.occupation),
        parents: keep(data.parents, current.parents),
        parent_contact: keep(data.parentContact, current.parent_contact),
        school: keep(data.school, current.school),
        contact_number: keep(data.contactNumber, current.contact_number),
        address: keep(data.address, current.address),
        notes: keep(data.notes, current.notes),
        updated_at: this.ctx.now().toISOString(),
      });

      return toPatient(requireActivePatient(db, id));
    });

    loggers.dbOperation('UPDATE', 'patients', { id });
    this.ctx.stats.invalidate(AFFECTS.update);

    return patient;
  }

  get(id: number): Patient {
    return this.ctx.pool.withConnection((db) => toPatient(requireActivePatient(db, id)));
  }

  getByReference(referenceNumber: number): Patient {
    const row = this.ctx.pool.withConnection((db) =>
      db
        .prepare<[number], DbPatient>('SELECT * FROM patients WHERE reference_number = ? AND deleted_at IS NULL')
        .get(referenceNumber)
    );

    if (!row) {
      throw new NotFoundError('Patient with reference', formatReferenceNumber(referenceNumber));
    }
    return toPatient(row);
  }

  /**
   * Soft delete. Blocked while the patient has visits; merge the patient
   * into another record to retire one with history.
   */
  delete(id: number): void {
    this.ctx.pool.transaction((db) => {
      requireActivePatient(db, id);

      const visits = db
        .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM visits WHERE patient_id = ?')
        .get(id);

      if (visits && visits.count > 0) {
        throw new ConstraintViolationError(
          'patient_has_visits',
          `Patient ${id} has ${visits.count} visit(s) and cannot be deleted`,
          { patientId: id, visits: visits.count }
        );
      }

      db.prepare<[string, number]>('UPDATE patients SET deleted_at = ? WHERE id = ?').run(
        this.ctx.now().toISOString(),
        id
      );
    });

    loggers.dbOperation('DELETE', 'patients', { id });
    this.ctx.stats.invalidate(AFFECTS.delete);
  }

  /**
   * Move every visit of the source patient to the target, then retire the
   * source
   */
  merge(sourceId: number, targetId: number): MergeResult {
    if (sourceId === targetId) {
      throw new ValidationError('targetId', 'must differ from the source patient');
    }

    const result = this.ctx.pool.transaction((db) => {
      requireActivePatient(db, sourceId);
      requireActivePatient(db, targetId);

      const timestamp = this.ctx.now().toISOString();
      const moved = db
        .prepare<[number, string, number]>('UPDATE visits SET patient_id = ?, updated_at = ? WHERE patient_id = ?')
        .run(targetId, timestamp, sourceId);

      db.prepare<[string, number]>('UPDATE patients SET deleted_at = ? WHERE id = ?').run(timestamp, sourceId);

      return {
        target: toPatient(requireActivePatient(db, targetId)),
        movedVisits: moved.changes,
      };
    });

    loggers.dbOperation('MERGE', 'patients', { sourceId, targetId, movedVisits: result.movedVisits });
    this.ctx.stats.invalidate(AFFECTS.merge);

    return result;
  }

  /**
   * Page of active patients in alphabetical order
   */
  list(page: number = 1, pageSize: number = 25): Page<Patient> {
    return this.ctx.pool.withConnection((db) => {
      const rows = db
        .prepare<[number, number], DbPatient>(
          `SELECT * FROM patients INDEXED BY idx_patients_sort_name
           WHERE deleted_at IS NULL AND sort_name >= ''
           ORDER BY sort_name ASC, id ASC
           LIMIT ? OFFSET ?`
        )
        .all(pageSize, pageOffset(page, pageSize));

      loggers.dbOperation('SELECT', 'patients', { page, count: rows.length });

      return {
        items: rows.map(toPatient),
        page,
        pageSize,
        total: countActivePatients(db),
      };
    });
  }

  summary(id: number): PatientSummary {
    return this.ctx.pool.withConnection((db) => {
      requireActivePatient(db, id);

      const row = db
        .prepare<[number], { total: number; first_visit: string | null; last_visit: string | null }>(
          `SELECT COUNT(*) AS total, MIN(visit_date) AS first_visit, MAX(visit_date) AS last_visit
           FROM visits WHERE patient_id = ?`
        )
        .get(id);

      return {
        patientId: id,
        totalVisits: row?.total ?? 0,
        firstVisit: row?.first_visit ?? null,
        lastVisit: row?.last_visit ?? null,
      };
    });
  }

  countActive(): number {
    return this.ctx.pool.withConnection(countActivePatients);
  }

  countBySex(): Record<Sex | 'unspecified', number> {
    return this.ctx.pool.withConnection((db) => {
      const counts: Record<Sex | 'unspecified', number> = { M: 0, F: 0, unspecified: 0 };
      const rows = db
        .prepare<[], { sex: string | null; count: number }>(
          'SELECT sex, COUNT(*) AS count FROM patients WHERE deleted_at IS NULL GROUP BY sex'
        )
        .all();

      for (const row of rows) {
        counts[oneOf(sexes, row.sex) ?? 'unspecified'] += row.count;
      }
      return counts;
    });
  }
}

function countActivePatients(db: SqliteDatabase): number {
  const row = db
    .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM patients WHERE deleted_at IS NULL')
    .get();
  return row?.count ?? 0;
}
