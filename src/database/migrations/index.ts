import type { Migration } from '../migrator';
import { migration as initialSchema } from './001_initial_schema';
import { migration as visitTypes } from './002_visit_types';
import { migration as patientProfile } from './003_patient_profile';

/**
 * Ordered migration steps. Append only; a shipped step never changes.
 */
export const migrations: readonly Migration[] = [initialSchema, visitTypes, patientProfile];

export const LATEST_SCHEMA_VERSION = migrations.length;
