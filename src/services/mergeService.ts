import { openConnection } from '../config/database';
import type { ConnectionPool } from '../config/database';
import { readSchemaVersion } from '../database/migrator';
import logger, { loggers } from '../utils/logger';
import { IncompatibleSchemaError } from '../utils/errors';
import { insertPatientRow } from '../models/Patient';
import { insertVisitRow } from '../models/Visit';
import type { DbPatient, DbVisit } from '../types/database';
import { statNames } from './statsCache';
import type { StatsInvalidator } from './statsCache';

/**
 * Merge Service
 * Imports patients and visits from another store file, e.g. a second
 * workstation's records or an old backup.
 */

export interface MergeReport {
  patientsAdded: number;
  patientsSkipped: number;
  visitsAdded: number;
  visitsSkipped: number;
}

/**
 * Patients whose reference number already exists map onto the existing
 * record; a visit the target already has (same patient, date and time) is
 * skipped. Runs in one transaction on the target.
 */
export function mergeFrom(
  pool: ConnectionPool,
  stats: StatsInvalidator,
  sourcePath: string,
  latestVersion: number
): MergeReport {
  const source = openConnection({ ...pool.config, path: sourcePath }, { readonly: true });

  try {
    const sourceVersion = readSchemaVersion(source);
    if (sourceVersion !== latestVersion) {
      throw new IncompatibleSchemaError(sourceVersion, latestVersion, sourcePath);
    }

    const sourcePatients = source
      .prepare<[], DbPatient>('SELECT * FROM patients WHERE deleted_at IS NULL ORDER BY reference_number')
      .all();
    const sourceVisits = source.prepare<[number], DbVisit>(
      'SELECT * FROM visits WHERE patient_id = ? ORDER BY visit_date, id'
    );

    const report = pool.transaction((db) => {
      const result: MergeReport = { patientsAdded: 0, patientsSkipped: 0, visitsAdded: 0, visitsSkipped: 0 };

      const findByReference = db.prepare<[number], DbPatient>('SELECT * FROM patients WHERE reference_number = ?');
      const visitExists = db.prepare<[number, string, string | null], { found: number }>(
        'SELECT 1 AS found FROM visits WHERE patient_id = ? AND visit_date = ? AND visit_time IS ? LIMIT 1'
      );

      for (const patient of sourcePatients) {
        const existing = findByReference.get(patient.reference_number);
        let targetId: number | null;

        if (existing) {
          result.patientsSkipped++;
          // A retired record keeps its number but takes no new visits
          targetId = existing.deleted_at === null ? existing.id : null;
        } else {
          targetId = insertPatientRow(db, {
            reference_number: patient.reference_number,
            last_name: patient.last_name,
            first_name: patient.first_name,
            middle_name: patient.middle_name,
            sort_name: patient.sort_name,
            date_of_birth: patient.date_of_birth,
            sex: patient.sex,
            civil_status: patient.civil_status,
            occupation: patient.occupation,
            parents: patient.parents,
            parent_contact: patient.parent_contact,
            school: patient.school,
            contact_number: patient.contact_number,
            address: patient.address,
            notes: patient.notes,
            created_at: patient.created_at,
            updated_at: patient.updated_at,
          });
          result.patientsAdded++;
        }

        for (const visit of sourceVisits.all(patient.id)) {
          if (targetId === null || visitExists.get(targetId, visit.visit_date, visit.visit_time)) {
            result.visitsSkipped++;
            continue;
          }

          insertVisitRow(db, {
            patient_id: targetId,
            visit_date: visit.visit_date,
            visit_time: visit.visit_time,
            weight_kg: visit.weight_kg,
            height_cm: visit.height_cm,
            blood_pressure: visit.blood_pressure,
            temperature_c: visit.temperature_c,
            notes: visit.notes,
            visit_type: visit.visit_type,
            created_at: visit.created_at,
            updated_at: visit.updated_at,
          });
          result.visitsAdded++;
        }
      }

      return result;
    });

    loggers.dbOperation('MERGE', 'patients', { ...report });
    logger.info('Store merged', { ...report });
    stats.invalidate(statNames);

    return report;
  } finally {
    source.close();
  }
}
