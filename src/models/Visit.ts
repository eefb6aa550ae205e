import type { SqliteDatabase } from '../config/database';
import { loggers } from '../utils/logger';
import { NotFoundError, ValidationError } from '../utils/errors';
import { formatReferenceNumber } from '../utils/referenceNumber';
import { VisitInput, VisitUpdate, parseInput, visitInputSchema, visitUpdateSchema } from '../utils/validation';
import type { DbVisit } from '../types/database';
import { visitTypes } from '../types/records';
import type { DateRange, Page, Visit, VisitWithPatient } from '../types/records';
import type { StatName } from '../services/statsCache';
import { ModelContext, oneOf, pageOffset } from './context';
import { displayName, findActivePatient } from './Patient';

/**
 * Visit Model
 */

const AFFECTS = {
  create: ['totalVisits', 'visitsToday', 'visitsByMonth'],
  update: ['visitsToday', 'visitsByMonth'],
  delete: ['totalVisits', 'visitsToday', 'visitsByMonth'],
} as const satisfies Record<string, readonly StatName[]>;

export interface DbVisitWithPatient extends DbVisit {
  reference_number: number;
  last_name: string;
  first_name: string;
  middle_name: string | null;
}

export function toVisit(row: DbVisit): Visit {
  return {
    id: row.id,
    patientId: row.patient_id,
    visitDate: row.visit_date,
    visitTime: row.visit_time,
    weightKg: row.weight_kg,
    heightCm: row.height_cm,
    bloodPressure: row.blood_pressure,
    temperatureC: row.temperature_c,
    notes: row.notes,
    visitType: oneOf(visitTypes, row.visit_type) ?? 'new',
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toVisitWithPatient(row: DbVisitWithPatient): VisitWithPatient {
  return {
    ...toVisit(row),
    reference: formatReferenceNumber(row.reference_number),
    patientName: displayName(row.last_name, row.first_name, row.middle_name),
  };
}

export const VISIT_WITH_PATIENT_COLUMNS = `v.*, p.reference_number, p.last_name, p.first_name, p.middle_name`;

type VisitColumns = Omit<DbVisit, 'id'>;

export function insertVisitRow(db: SqliteDatabase, columns: VisitColumns): number {
  const result = db
    .prepare<VisitColumns>(
      `INSERT INTO visits (
        patient_id, visit_date, visit_time, weight_kg, height_cm, blood_pressure, temperature_c,
        notes, visit_type, created_at, updated_at
      ) VALUES (
        @patient_id, @visit_date, @visit_time, @weight_kg, @height_cm, @blood_pressure, @temperature_c,
        @notes, @visit_type, @created_at, @updated_at
      )`
    )
    .run(columns);
  return Number(result.lastInsertRowid);
}

function requireVisit(db: SqliteDatabase, id: number): DbVisit {
  const row = db.prepare<[number], DbVisit>('SELECT * FROM visits WHERE id = ?').get(id);
  if (!row) {
    throw new NotFoundError('Visit', id);
  }
  return row;
}

const keep = <T>(next: T | undefined, current: T): T => (next === undefined ? current : next);

export class VisitModel {
  constructor(private readonly ctx: ModelContext) {}

  create(input: VisitInput): Visit {
    const data = parseInput(visitInputSchema, input);

    const visit = this.ctx.pool.transaction((db) => {
      if (!findActivePatient(db, data.patientId)) {
        throw new ValidationError('patientId', 'does not reference an existing patient');
      }

      const id = insertVisitRow(db, {
        patient_id: data.patientId,
        visit_date: data.visitDate,
        visit_time: data.visitTime ?? null,
        weight_kg: data.weightKg ?? null,
        height_cm: data.heightCm ?? null,
        blood_pressure: data.bloodPressure ?? null,
        temperature_c: data.temperatureC ?? null,
        notes: data.notes ?? null,
        visit_type: data.visitType,
        created_at: this.ctx.now().toISOString(),
        updated_at: null,
      });

      return toVisit(requireVisit(db, id));
    });

    loggers.dbOperation('INSERT', 'visits', { id: visit.id, patientId: visit.patientId });
    this.ctx.stats.invalidate(AFFECTS.create);

    return visit;
  }

  update(id: number, changes: VisitUpdate): Visit {
    const data = parseInput(visitUpdateSchema, changes);

    const visit = this.ctx.pool.transaction((db) => {
      const current = requireVisit(db, id);

      db.prepare<Omit<DbVisit, 'patient_id' | 'created_at'>>(
        `UPDATE visits SET
          visit_date = @visit_date, visit_time = @visit_time, weight_kg = @weight_kg,
          height_cm = @height_cm, blood_pressure = @blood_pressure, temperature_c = @temperature_c,
          notes = @notes, visit_type = @visit_type, updated_at = @updated_at
        WHERE id = @id`
      ).run({
        id,
        visit_date: keep(data.visitDate, current.visit_date),
        visit_time: keep(data.visitTime, current.visit_time),
        weight_kg: keep(data.weightKg, current.weight_kg),
        height_cm: keep(data.heightCm, current.height_cm),
        blood_pressure: keep(data.bloodPressure, current.blood_pressure),
        temperature_c: keep(data.temperatureC, current.temperature_c),
        notes: keep(data.notes, current.notes),
        visit_type: keep(data.visitType, current.visit_type),
        updated_at: this.ctx.now().toISOString(),
      });

      return toVisit(requireVisit(db, id));
    });

    loggers.dbOperation('UPDATE', 'visits', { id });
    this.ctx.stats.invalidate(AFFECTS.update);

    return visit;
  }

  get(id: number): Visit {
    return this.ctx.pool.withConnection((db) => toVisit(requireVisit(db, id)));
  }

  delete(id: number): void {
    this.ctx.pool.transaction((db) => {
      requireVisit(db, id);
      db.prepare<[number]>('DELETE FROM visits WHERE id = ?').run(id);
    });

    loggers.dbOperation('DELETE', 'visits', { id });
    this.ctx.stats.invalidate(AFFECTS.delete);
  }

  /**
   * A patient's visits, most recent first
   */
  listForPatient(patientId: number, page: number = 1, pageSize: number = 25, range: DateRange = {}): Page<Visit> {
    return this.ctx.pool.withConnection((db) => {
      if (!findActivePatient(db, patientId)) {
        throw new NotFoundError('Patient', patientId);
      }

      const params = {
        patientId,
        from: range.from ?? null,
        to: range.to ?? null,
      };
      const where = `patient_id = @patientId
        AND (@from IS NULL OR visit_date >= @from)
        AND (@to IS NULL OR visit_date <= @to)`;

      const rows = db
        .prepare<typeof params & { limit: number; offset: number }, DbVisit>(
          `SELECT * FROM visits WHERE ${where}
           ORDER BY visit_date DESC, visit_time IS NULL, visit_time DESC, id DESC
           LIMIT @limit OFFSET @offset`
        )
        .all({ ...params, limit: pageSize, offset: pageOffset(page, pageSize) });

      const total = db
        .prepare<typeof params, { count: number }>(`SELECT COUNT(*) AS count FROM visits WHERE ${where}`)
        .get(params);

      return {
        items: rows.map(toVisit),
        page,
        pageSize,
        total: total?.count ?? 0,
      };
    });
  }

  /**
   * Every visit on one day with the patient's name, in time order
   */
  listByDate(date: string): VisitWithPatient[] {
    return this.ctx.pool.withConnection((db) =>
      db
        .prepare<[string], DbVisitWithPatient>(
          `SELECT ${VISIT_WITH_PATIENT_COLUMNS}
           FROM visits v JOIN patients p ON p.id = v.patient_id
           WHERE v.visit_date = ?
           ORDER BY v.visit_time IS NULL, v.visit_time, v.id`
        )
        .all(date)
        .map(toVisitWithPatient)
    );
  }

  /**
   * Most recent visit date among back-entered paper records; lets encoding
   * resume where it stopped
   */
  lastEncodedVisitDate(): string | null {
    return this.ctx.pool.withConnection((db) => {
      const row = db
        .prepare<[], { last: string | null }>("SELECT MAX(visit_date) AS last FROM visits WHERE visit_type = 'encode'")
        .get();
      return row?.last ?? null;
    });
  }

  countAll(): number {
    return this.ctx.pool.withConnection((db) => {
      const row = db
        .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM visits')
        .get();
      return row?.count ?? 0;
    });
  }

  countOnDate(date: string): number {
    return this.ctx.pool.withConnection((db) => {
      const row = db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM visits WHERE visit_date = ?')
        .get(date);
      return row?.count ?? 0;
    });
  }

  /**
   * Visit counts for each month key (YYYY-MM); months without visits count 0
   */
  countByMonth(monthKeys: readonly string[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const key of monthKeys) {
      counts[key] = 0;
    }
    if (monthKeys.length === 0) {
      return counts;
    }

    const from = `${monthKeys[0]}-01`;
    const to = `${monthKeys[monthKeys.length - 1]}-31`;

    const rows = this.ctx.pool.withConnection((db) =>
      db
        .prepare<[string, string], { month: string; count: number }>(
          `SELECT substr(visit_date, 1, 7) AS month, COUNT(*) AS count
           FROM visits WHERE visit_date BETWEEN ? AND ?
           GROUP BY month`
        )
        .all(from, to)
    );

    for (const row of rows) {
      if (row.month in counts) {
        counts[row.month] = row.count;
      }
    }
    return counts;
  }
}
