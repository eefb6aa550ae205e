import { z } from 'zod';
import type { ConnectionPool } from '../config/database';
import { config } from '../config/config';
import { loggers } from '../utils/logger';
import { OperationCancelledError } from '../utils/errors';
import { birthDateBounds, computeAge, localDateString } from '../utils/dates';
import { parseReferenceNumber } from '../utils/referenceNumber';
import { calendarDateSchema, dateRangeSchema, paginationFields, parseInput } from '../utils/validation';
import { normalizeName, toPatient } from '../models/Patient';
import { DbVisitWithPatient, VISIT_WITH_PATIENT_COLUMNS, toVisitWithPatient } from '../models/Visit';
import { pageOffset } from '../models/context';
import type { DbPatient } from '../types/database';
import { civilStatuses, sexes } from '../types/records';
import type { Page, Patient, VisitWithPatient } from '../types/records';

/**
 * Search Service
 * Patient search over the indexed columns. One index narrows the candidate
 * set, every other criterion is a residual condition, and rows are streamed
 * so only the requested page is ever held.
 */

const letter = z
  .string()
  .regex(/^[A-Za-z]$/, 'must be a single letter')
  .transform((value) => value.toLowerCase());

const age = z.coerce.number().int().min(0, 'must not be negative').max(150, 'must be at most 150');

export const sortFields = ['name', 'age', 'recentVisit'] as const;
export type SortField = (typeof sortFields)[number];

export const searchFilterSchema = z
  .object({
    referenceNumber: z
      .string()
      .trim()
      .refine((value) => parseReferenceNumber(value) !== null, {
        message: 'must be digits, optionally grouped with dashes',
      })
      .optional(),
    name: z.string().trim().min(1, 'must not be empty').max(100, 'must be at most 100 characters').optional(),
    nameMatch: z.enum(['prefix', 'substring']).default('prefix'),
    alphabet: z
      .object({ from: letter, to: letter })
      .strict()
      .refine((range) => range.from <= range.to, { message: 'from must not be after to' })
      .optional(),
    ageRange: z
      .object({ min: age.optional(), max: age.optional() })
      .strict()
      .refine((range) => range.min === undefined || range.max === undefined || range.min <= range.max, {
        message: 'min must not exceed max',
      })
      .optional(),
    sex: z.enum(sexes).optional(),
    civilStatus: z.enum(civilStatuses).optional(),
    visitDateRange: dateRangeSchema.optional(),
    registeredRange: dateRangeSchema.optional(),
    sortBy: z.enum(sortFields).default('name'),
    order: z.enum(['asc', 'desc']).optional(),
    ...paginationFields,
    referenceDate: calendarDateSchema.optional(),
  })
  .strict();

export type SearchFilterInput = z.input<typeof searchFilterSchema>;
export type SearchFilter = z.output<typeof searchFilterSchema>;
export type CursorFilterInput = Omit<SearchFilterInput, 'page' | 'pageSize'>;

export const visitSearchSchema = z
  .object({
    query: z.string().trim().min(1, 'must not be empty').max(100, 'must be at most 100 characters').optional(),
    dateRange: dateRangeSchema.optional(),
    ...paginationFields,
  })
  .strict();

export type VisitSearchInput = z.input<typeof visitSearchSchema>;

export type SearchStrategy = 'reference' | 'namePrefix' | 'alphabet' | 'visitDate' | 'birthDate' | 'fullScan';

export interface QueryPlan {
  strategy: SearchStrategy;
  /** Index that narrows the candidates; null for a full scan */
  index: string | null;
  /** Criteria applied to the narrowed rows */
  residual: string[];
}

/**
 * Anything with an `aborted` flag; an AbortSignal qualifies
 */
export interface CancellationToken {
  readonly aborted: boolean;
}

export interface SearchOptions {
  signal?: CancellationToken;
}

export interface SearchResult {
  patient: Patient;
  /** Completed years on the reference date; null without a date of birth */
  age: number | null;
  lastVisit: string | null;
}

export interface SearchPage extends Page<SearchResult> {
  strategy: SearchStrategy;
  referenceDate: string;
}

export interface SearchCursor {
  strategy: SearchStrategy;
  referenceDate: string;
  rows: Generator<SearchResult, void, undefined>;
}

type SqlParam = string | number;

interface Criterion {
  name: string;
  sql: string;
  params: SqlParam[];
  /** Present when the criterion can narrow through an index */
  access?: {
    strategy: SearchStrategy;
    index: string;
    /** Index hint on the patients table; absent when the index sits in a subquery */
    patientsIndex?: string;
    sql?: string;
  };
}

interface CompiledSearch {
  plan: QueryPlan;
  sql: string;
  params: SqlParam[];
}

interface SearchRow extends DbPatient {
  last_visit: string | null;
}

const MAX_CODE_POINT = 0x10ffff;

/**
 * Smallest string greater than every string starting with the prefix, or
 * null when there is none (empty prefix, or only maximal code points)
 */
export function prefixUpperBound(prefix: string): string | null {
  const chars = Array.from(prefix);

  for (let last = chars.pop(); last !== undefined; last = chars.pop()) {
    const code = last.codePointAt(0) ?? 0;
    if (code < MAX_CODE_POINT) {
      return chars.join('') + String.fromCodePoint(code + 1);
    }
  }
  return null;
}

function sortNameRange(from: string, prefix: string): { sql: string; params: SqlParam[] } {
  const upper = prefixUpperBound(prefix);
  return upper === null
    ? { sql: 'p.sort_name >= ?', params: [from] }
    : { sql: 'p.sort_name >= ? AND p.sort_name < ?', params: [from, upper] };
}

function toSearchResult(row: SearchRow, referenceDate: string): SearchResult {
  return {
    patient: toPatient(row),
    age: row.date_of_birth ? computeAge(row.date_of_birth, referenceDate) : null,
    lastVisit: row.last_visit,
  };
}

function rangeBounds(column: string, range: { from?: string; to?: string } | undefined): { sql: string; params: SqlParam[] } | null {
  const parts: string[] = [];
  const params: SqlParam[] = [];

  if (range?.from) {
    parts.push(`${column} >= ?`);
    params.push(range.from);
  }
  if (range?.to) {
    parts.push(`${column} <= ?`);
    params.push(range.to);
  }

  return parts.length > 0 ? { sql: parts.join(' AND '), params } : null;
}

function collectCriteria(filter: SearchFilter, referenceDate: string): Criterion[] {
  const criteria: Criterion[] = [];

  // Pushed in plan priority order: the first with `access` wins
  if (filter.referenceNumber !== undefined) {
    const reference = parseReferenceNumber(filter.referenceNumber) ?? 0;
    criteria.push({
      name: 'referenceNumber',
      sql: 'p.reference_number = ?',
      params: [reference],
      access: { strategy: 'reference', index: 'idx_patients_reference', patientsIndex: 'idx_patients_reference' },
    });
  }

  if (filter.name !== undefined) {
    const name = normalizeName(filter.name);
    criteria.push(
      filter.nameMatch === 'prefix'
        ? {
            name: 'name',
            ...sortNameRange(name, name),
            access: { strategy: 'namePrefix', index: 'idx_patients_sort_name', patientsIndex: 'idx_patients_sort_name' },
          }
        : { name: 'name', sql: 'instr(p.sort_name, ?) > 0', params: [name] }
    );
  }

  if (filter.alphabet) {
    criteria.push({
      name: 'alphabet',
      ...sortNameRange(filter.alphabet.from, filter.alphabet.to),
      access: { strategy: 'alphabet', index: 'idx_patients_sort_name', patientsIndex: 'idx_patients_sort_name' },
    });
  }

  const visits = rangeBounds('v.visit_date', filter.visitDateRange);
  if (visits) {
    criteria.push({
      name: 'visitDateRange',
      sql: `EXISTS (SELECT 1 FROM visits v WHERE v.patient_id = p.id AND ${visits.sql})`,
      params: visits.params,
      access: {
        strategy: 'visitDate',
        index: 'idx_visits_date',
        sql: `p.id IN (SELECT v.patient_id FROM visits v INDEXED BY idx_visits_date WHERE ${visits.sql})`,
      },
    });
  }

  if (filter.ageRange && (filter.ageRange.min !== undefined || filter.ageRange.max !== undefined)) {
    const bounds = birthDateBounds(referenceDate, filter.ageRange.min, filter.ageRange.max);
    const parts: string[] = [];
    const params: SqlParam[] = [];

    if (bounds.latest) {
      parts.push('p.date_of_birth <= ?');
      params.push(bounds.latest);
    }
    if (bounds.earliestExclusive) {
      parts.push('p.date_of_birth > ?');
      params.push(bounds.earliestExclusive);
    }

    criteria.push({
      name: 'ageRange',
      sql: parts.join(' AND '),
      params,
      access: { strategy: 'birthDate', index: 'idx_patients_dob', patientsIndex: 'idx_patients_dob' },
    });
  }

  if (filter.sex) {
    criteria.push({ name: 'sex', sql: 'p.sex = ?', params: [filter.sex] });
  }

  if (filter.civilStatus) {
    criteria.push({ name: 'civilStatus', sql: 'p.civil_status = ?', params: [filter.civilStatus] });
  }

  const registered = rangeBounds('substr(p.created_at, 1, 10)', filter.registeredRange);
  if (registered) {
    criteria.push({ name: 'registeredRange', ...registered });
  }

  return criteria;
}

function orderClause(sortBy: SortField, order: 'asc' | 'desc'): string {
  const direction = order === 'asc' ? 'ASC' : 'DESC';

  switch (sortBy) {
    case 'name':
      return `p.sort_name ${direction}, p.id ${direction}`;
    case 'age':
      // Youngest first when ascending; unknown ages last either way
      return `p.date_of_birth IS NULL, p.date_of_birth ${order === 'asc' ? 'DESC' : 'ASC'}, p.sort_name ASC, p.id ASC`;
    case 'recentVisit':
      return `last_visit IS NULL, last_visit ${direction}, p.sort_name ASC, p.id ASC`;
  }
}

const defaultOrder: Record<SortField, 'asc' | 'desc'> = {
  name: 'asc',
  age: 'asc',
  recentVisit: 'desc',
};

/**
 * Choose the access path and build the statement for a parsed filter
 */
export function compileSearch(filter: SearchFilter, referenceDate: string): CompiledSearch {
  const criteria = collectCriteria(filter, referenceDate);
  const driver = criteria.find((criterion) => criterion.access !== undefined);

  const conditions: string[] = ['p.deleted_at IS NULL'];
  const params: SqlParam[] = [];
  const residual: string[] = [];

  let from = 'patients p';
  if (driver?.access) {
    if (driver.access.patientsIndex) {
      from = `patients p INDEXED BY ${driver.access.patientsIndex}`;
    }
    conditions.unshift(driver.access.sql ?? driver.sql);
    params.push(...driver.params);
  }

  for (const criterion of criteria) {
    if (criterion === driver) {
      continue;
    }
    conditions.push(criterion.sql);
    params.push(...criterion.params);
    residual.push(criterion.name);
  }

  const sql = `SELECT p.*, (SELECT MAX(lv.visit_date) FROM visits lv WHERE lv.patient_id = p.id) AS last_visit
    FROM ${from}
    WHERE ${conditions.join(' AND ')}
    ORDER BY ${orderClause(filter.sortBy, filter.order ?? defaultOrder[filter.sortBy])}`;

  return {
    plan: {
      strategy: driver?.access?.strategy ?? 'fullScan',
      index: driver?.access?.index ?? null,
      residual,
    },
    sql,
    params,
  };
}

function throwIfCancelled(signal: CancellationToken | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError('Search');
  }
}

export class SearchService {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly now: () => Date = () => new Date()
  ) {}

  private prepare(input: SearchFilterInput): { filter: SearchFilter; referenceDate: string } {
    const filter = parseInput(searchFilterSchema, input);
    return { filter, referenceDate: filter.referenceDate ?? localDateString(this.now()) };
  }

  /**
   * Access path the engine would take for a filter
   */
  explain(input: SearchFilterInput): QueryPlan {
    const { filter, referenceDate } = this.prepare(input);
    return compileSearch(filter, referenceDate).plan;
  }

  /**
   * SQLite's own plan for the compiled statement
   */
  queryPlanDetails(input: SearchFilterInput): string[] {
    const { filter, referenceDate } = this.prepare(input);
    const compiled = compileSearch(filter, referenceDate);

    return this.pool.withConnection((db) =>
      db
        .prepare<SqlParam[], { detail: string }>(`EXPLAIN QUERY PLAN ${compiled.sql}`)
        .all(...compiled.params)
        .map((row) => row.detail)
    );
  }

  /**
   * One page of matching patients with the total match count
   */
  search(input: SearchFilterInput, options: SearchOptions = {}): SearchPage {
    const { filter, referenceDate } = this.prepare(input);
    const compiled = compileSearch(filter, referenceDate);
    const interval = config.search.cancellationCheckInterval;

    throwIfCancelled(options.signal);

    const started = Date.now();
    const offset = pageOffset(filter.page, filter.pageSize);
    const items: SearchResult[] = [];
    let total = 0;

    this.pool.withConnection((db) => {
      const rows = db.prepare<SqlParam[], SearchRow>(compiled.sql).iterate(...compiled.params);

      for (const row of rows) {
        if (total > 0 && total % interval === 0) {
          throwIfCancelled(options.signal);
        }

        if (total >= offset && items.length < filter.pageSize) {
          items.push(toSearchResult(row, referenceDate));
        }
        total++;
      }
    });

    loggers.search(compiled.plan.strategy, total, Date.now() - started);

    return {
      items,
      page: filter.page,
      pageSize: filter.pageSize,
      total,
      strategy: compiled.plan.strategy,
      referenceDate,
    };
  }

  /**
   * Every match in order from a single statement, so all rows come from one
   * read snapshot. The connection stays checked out until the rows are
   * exhausted or the generator is closed.
   */
  cursor(input: CursorFilterInput, options: SearchOptions = {}): SearchCursor {
    const { filter, referenceDate } = this.prepare(input);
    const compiled = compileSearch(filter, referenceDate);

    throwIfCancelled(options.signal);

    return {
      strategy: compiled.plan.strategy,
      referenceDate,
      rows: this.streamRows(compiled, referenceDate, options.signal),
    };
  }

  private *streamRows(
    compiled: CompiledSearch,
    referenceDate: string,
    signal: CancellationToken | undefined
  ): Generator<SearchResult, void, undefined> {
    const interval = config.search.cancellationCheckInterval;
    const handle = this.pool.acquire();
    const started = Date.now();
    let count = 0;

    try {
      for (const row of handle.db.prepare<SqlParam[], SearchRow>(compiled.sql).iterate(...compiled.params)) {
        if (count > 0 && count % interval === 0) {
          throwIfCancelled(signal);
        }
        yield toSearchResult(row, referenceDate);
        count++;
      }
    } finally {
      this.pool.release(handle);
      loggers.search(compiled.plan.strategy, count, Date.now() - started);
    }
  }

  /**
   * Visit log: visits joined with patient names, most recent first. The
   * query matches a reference number or part of a patient's name.
   */
  searchVisits(input: VisitSearchInput): Page<VisitWithPatient> {
    const filter = parseInput(visitSearchSchema, input);

    const conditions: string[] = ['p.deleted_at IS NULL'];
    const params: SqlParam[] = [];

    if (filter.query) {
      const reference = parseReferenceNumber(filter.query);
      if (reference !== null) {
        conditions.push('(p.reference_number = ? OR instr(p.sort_name, ?) > 0)');
        params.push(reference, normalizeName(filter.query));
      } else {
        conditions.push('instr(p.sort_name, ?) > 0');
        params.push(normalizeName(filter.query));
      }
    }

    const dates = rangeBounds('v.visit_date', filter.dateRange);
    if (dates) {
      conditions.push(dates.sql);
      params.push(...dates.params);
    }

    const where = conditions.join(' AND ');

    return this.pool.withConnection((db) => {
      const count = db
        .prepare<SqlParam[], { count: number }>(
          `SELECT COUNT(*) AS count FROM visits v JOIN patients p ON p.id = v.patient_id WHERE ${where}`
        )
        .get(...params);

      const rows = db
        .prepare<SqlParam[], DbVisitWithPatient>(
          `SELECT ${VISIT_WITH_PATIENT_COLUMNS}
           FROM visits v JOIN patients p ON p.id = v.patient_id
           WHERE ${where}
           ORDER BY v.visit_date DESC, v.visit_time IS NULL, v.visit_time DESC, v.id DESC
           LIMIT ? OFFSET ?`
        )
        .all(...params, filter.pageSize, pageOffset(filter.page, filter.pageSize));

      return {
        items: rows.map(toVisitWithPatient),
        page: filter.page,
        pageSize: filter.pageSize,
        total: count?.count ?? 0,
      };
    });
  }
}
