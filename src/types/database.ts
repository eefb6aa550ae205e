/**
 * Database row types
 * Match the SQLite schema built by src/database/migrations
 */

export interface DbPatient {
  id: number;
  reference_number: number;
  last_name: string;
  first_name: string;
  middle_name: string | null;
  sort_name: string;
  date_of_birth: string | null;
  sex: string | null;
  civil_status: string | null;
  occupation: string | null;
  parents: string | null;
  parent_contact: string | null;
  school: string | null;
  contact_number: string | null;
  address: string | null;
  notes: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

export interface DbVisit {
  id: number;
  patient_id: number;
  visit_date: string;
  visit_time: string | null;
  weight_kg: number | null;
  height_cm: number | null;
  blood_pressure: string | null;
  temperature_c: number | null;
  notes: string | null;
  visit_type: string;
  created_at: string;
  updated_at: string | null;
}

export interface DbAccount {
  id: number;
  username: string;
  password_hash: string;
  role: string;
  created_at: string;
  last_login_at: string | null;
}
