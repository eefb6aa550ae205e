/**
 * Record types exposed by the store
 */

export const sexes = ['M', 'F'] as const;
export const civilStatuses = ['single', 'married', 'widowed', 'separated'] as const;
export const visitTypes = ['new', 'follow-up', 'encode'] as const;
export const accountRoles = ['admin', 'staff'] as const;

export type Sex = (typeof sexes)[number];
export type CivilStatus = (typeof civilStatuses)[number];
export type VisitType = (typeof visitTypes)[number];
export type AccountRole = (typeof accountRoles)[number];

export interface Patient {
  id: number;
  referenceNumber: number;
  /** Display form, e.g. 00-00-01 */
  reference: string;
  lastName: string;
  firstName: string;
  middleName: string | null;
  dateOfBirth: string | null;
  sex: Sex | null;
  civilStatus: CivilStatus | null;
  occupation: string | null;
  parents: string | null;
  parentContact: string | null;
  school: string | null;
  contactNumber: string | null;
  address: string | null;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Visit {
  id: number;
  patientId: number;
  visitDate: string;
  visitTime: string | null;
  weightKg: number | null;
  heightCm: number | null;
  bloodPressure: string | null;
  temperatureC: number | null;
  notes: string | null;
  visitType: VisitType;
  createdAt: string;
  updatedAt: string | null;
}

/**
 * Visit joined with the owning patient's identity, for visit logs
 */
export interface VisitWithPatient extends Visit {
  reference: string;
  patientName: string;
}

export interface Account {
  id: number;
  username: string;
  role: AccountRole;
  createdAt: string;
  lastLoginAt: string | null;
}

export interface PatientSummary {
  patientId: number;
  totalVisits: number;
  firstVisit: string | null;
  lastVisit: string | null;
}

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
}

export interface DateRange {
  from?: string;
  to?: string;
}
