import { ConnectionPool } from './config/database';
import type { PoolStats } from './config/database';
import { storeConfigSchema } from './config/config';
import type { StoreConfig, StoreConfigInput } from './config/config';
import { SchemaMigrator } from './database/migrator';
import type { Migration, MigrationReport } from './database/migrator';
import logger from './utils/logger';
import { ConstraintViolationError, StorageUnavailableError, errorMessage } from './utils/errors';
import { recentMonthKeys } from './utils/dates';
import {
  AccountInput,
  AccountUpdate,
  PatientInput,
  PatientUpdate,
  VisitInput,
  VisitUpdate,
  accountInputSchema,
  accountUpdateSchema,
  dateRangeSchema,
  paginationSchema,
  parseInput,
  visitDateQuerySchema,
} from './utils/validation';
import { PatientModel } from './models/Patient';
import type { MergeResult } from './models/Patient';
import { VisitModel } from './models/Visit';
import { AccountModel } from './models/Account';
import type { ModelContext } from './models/context';
import { StatsCache, statNames } from './services/statsCache';
import type { StatName, StatValues } from './services/statsCache';
import { SearchService } from './services/searchService';
import type {
  CursorFilterInput,
  QueryPlan,
  SearchCursor,
  SearchFilterInput,
  SearchOptions,
  SearchPage,
  VisitSearchInput,
} from './services/searchService';
import { comparePassword, hashPassword } from './services/authService';
import { exportPatientsCsv } from './services/exportService';
import type { ExportFilter } from './services/exportService';
import { backupTo } from './services/backupService';
import type { BackupOptions, BackupResult } from './services/backupService';
import { mergeFrom } from './services/mergeService';
import type { MergeReport } from './services/mergeService';
import type { Account, DateRange, Page, Patient, PatientSummary, Visit, VisitWithPatient } from './types/records';

/**
 * Clinic Store
 * Entry point to the records layer: opens the pool, migrates the schema and
 * wires the repository, search and stats cache together.
 */

export interface OpenStoreOptions {
  /** Clock for timestamps, date-relative stats and the default search date */
  now?: () => Date;
  /** Close the store on process exit, SIGINT and SIGTERM */
  handleSignals?: boolean;
  migrations?: readonly Migration[];
}

export type StoreOverrides = Omit<StoreConfigInput, 'path'>;

const MONTHS_IN_TREND = 12;

export class ClinicStore {
  readonly patients: PatientModel;
  readonly visits: VisitModel;
  readonly accounts: AccountModel;
  readonly stats: StatsCache;
  private readonly searchService: SearchService;

  constructor(
    private readonly pool: ConnectionPool,
    private readonly migrator: SchemaMigrator,
    readonly migration: MigrationReport,
    now: () => Date
  ) {
    this.stats = new StatsCache(
      {
        totalPatients: () => this.patients.countActive(),
        totalVisits: () => this.visits.countAll(),
        visitsToday: (today) => this.visits.countOnDate(today),
        visitsByMonth: (today) => this.visits.countByMonth(recentMonthKeys(today, MONTHS_IN_TREND)),
        patientsBySex: () => this.patients.countBySex(),
      },
      now
    );

    const context: ModelContext = { pool, stats: this.stats, now };
    this.patients = new PatientModel(context);
    this.visits = new VisitModel(context);
    this.accounts = new AccountModel(context);
    this.searchService = new SearchService(pool, now);
  }

  get config(): StoreConfig {
    return this.pool.config;
  }

  get path(): string {
    return this.pool.config.path;
  }

  get isOpen(): boolean {
    return this.pool.isOpen;
  }

  // Patients

  createPatient(input: PatientInput): Patient {
    return this.patients.create(input);
  }

  updatePatient(id: number, changes: PatientUpdate): Patient {
    return this.patients.update(id, changes);
  }

  getPatient(id: number): Patient {
    return this.patients.get(id);
  }

  getPatientByReference(referenceNumber: number): Patient {
    return this.patients.getByReference(referenceNumber);
  }

  deletePatient(id: number): void {
    this.patients.delete(id);
  }

  listPatients(page?: number, pageSize?: number): Page<Patient> {
    const paging = parseInput(paginationSchema, { page, pageSize });
    return this.patients.list(paging.page, paging.pageSize);
  }

  mergePatients(sourceId: number, targetId: number): MergeResult {
    return this.patients.merge(sourceId, targetId);
  }

  getPatientSummary(id: number): PatientSummary {
    return this.patients.summary(id);
  }

  // Visits

  createVisit(input: VisitInput): Visit {
    return this.visits.create(input);
  }

  updateVisit(id: number, changes: VisitUpdate): Visit {
    return this.visits.update(id, changes);
  }

  getVisit(id: number): Visit {
    return this.visits.get(id);
  }

  deleteVisit(id: number): void {
    this.visits.delete(id);
  }

  listVisitsForPatient(patientId: number, page?: number, pageSize?: number, dateRange?: DateRange): Page<Visit> {
    const paging = parseInput(paginationSchema, { page, pageSize });
    const range = parseInput(dateRangeSchema, dateRange ?? {});
    return this.visits.listForPatient(patientId, paging.page, paging.pageSize, range);
  }

  listVisitsByDate(date: string): VisitWithPatient[] {
    const query = parseInput(visitDateQuerySchema, { date });
    return this.visits.listByDate(query.date);
  }

  getLastEncodedVisitDate(): string | null {
    return this.visits.lastEncodedVisitDate();
  }

  // Accounts

  async createAccount(input: AccountInput): Promise<Account> {
    const data = parseInput(accountInputSchema, input);
    const passwordHash = await hashPassword(data.password);
    return this.accounts.create({ username: data.username, role: data.role, passwordHash });
  }

  /**
   * Create the first admin account. Refused with `setup_complete` once any
   * account exists, checked in the same transaction as the insert.
   */
  async setupFirstAdmin(input: Omit<AccountInput, 'role'>): Promise<Account> {
    const data = parseInput(accountInputSchema, { ...input, role: 'admin' });
    const passwordHash = await hashPassword(data.password);
    return this.accounts.create({ username: data.username, role: data.role, passwordHash }, { firstRun: true });
  }

  async updateAccount(id: number, changes: AccountUpdate): Promise<Account> {
    const data = parseInput(accountUpdateSchema, changes);
    const passwordHash = data.password === undefined ? undefined : await hashPassword(data.password);
    return this.accounts.update(id, { username: data.username, role: data.role, passwordHash });
  }

  getAccount(id: number): Account {
    return this.accounts.get(id);
  }

  deleteAccount(id: number): void {
    this.accounts.delete(id);
  }

  listAccounts(): Account[] {
    return this.accounts.list();
  }

  hasAccounts(): boolean {
    return this.accounts.hasAccounts();
  }

  /**
   * The account when the password matches, otherwise null. A successful
   * check records the login time.
   */
  async verifyCredentials(username: string, password: string): Promise<Account | null> {
    const account = this.accounts.findByUsername(username.trim());
    if (!account) {
      return null;
    }

    if (!(await comparePassword(password, account.passwordHash))) {
      logger.warn('Failed login attempt', { accountId: account.id });
      return null;
    }

    this.accounts.recordLogin(account.id);
    return this.accounts.get(account.id);
  }

  needsFirstRun(): boolean {
    return !this.accounts.hasAccounts();
  }

  // Search

  search(filter: SearchFilterInput, options?: SearchOptions): SearchPage {
    return this.searchService.search(filter, options);
  }

  /**
   * All matches from one statement; see SearchService.cursor
   */
  searchCursor(filter: CursorFilterInput, options?: SearchOptions): SearchCursor {
    return this.searchService.cursor(filter, options);
  }

  explain(filter: SearchFilterInput): QueryPlan {
    return this.searchService.explain(filter);
  }

  queryPlanDetails(filter: SearchFilterInput): string[] {
    return this.searchService.queryPlanDetails(filter);
  }

  searchVisits(filter: VisitSearchInput): Page<VisitWithPatient> {
    return this.searchService.searchVisits(filter);
  }

  // Stats

  getStat<K extends StatName>(name: K): StatValues[K] {
    return this.stats.get(name);
  }

  invalidateStats(names: StatName | readonly StatName[] = statNames): void {
    this.stats.invalidate(names);
  }

  statsSnapshot(): StatValues {
    return this.stats.snapshot();
  }

  // Operations

  backupTo(destinationPath: string, options?: BackupOptions): Promise<BackupResult> {
    return backupTo(this.pool, destinationPath, options);
  }

  exportPatientsCsv(filter: ExportFilter, destinationPath: string, options?: SearchOptions): Promise<number> {
    return exportPatientsCsv(this.searchService, filter, destinationPath, options);
  }

  mergeFrom(sourcePath: string): MergeReport {
    return mergeFrom(this.pool, this.stats, sourcePath, this.migrator.latestVersion);
  }

  schemaVersion(): number {
    return this.migrator.currentVersion();
  }

  poolStats(): PoolStats {
    return this.pool.stats();
  }

  close(): void {
    if (activeStore === this) {
      closeStore();
      return;
    }
    this.pool.closeAll();
  }

  /** @internal */
  shutdown(): void {
    this.pool.closeAll();
  }
}

let activeStore: ClinicStore | null = null;

type SignalName = 'SIGINT' | 'SIGTERM';

interface RegisteredHandlers {
  exit: () => void;
  signal: (signal: SignalName) => void;
}

let handlers: RegisteredHandlers | null = null;

function registerProcessHandlers(): void {
  const exit = () => {
    closeStore();
  };

  const signal = (name: SignalName) => {
    logger.info(`Received ${name}, closing store`);
    closeStore();
    // Handlers are gone now; re-raise for the default termination
    process.kill(process.pid, name);
  };

  process.on('exit', exit);
  process.on('SIGINT', signal);
  process.on('SIGTERM', signal);
  handlers = { exit, signal };
}

function removeProcessHandlers(): void {
  if (!handlers) {
    return;
  }
  process.off('exit', handlers.exit);
  process.off('SIGINT', handlers.signal);
  process.off('SIGTERM', handlers.signal);
  handlers = null;
}

/**
 * Open the store at path, migrating it to the current schema before
 * returning. Only one store is open per process.
 */
export function openStore(path: string, overrides: StoreOverrides = {}, options: OpenStoreOptions = {}): ClinicStore {
  if (activeStore) {
    throw new ConstraintViolationError('store_open', 'A store is already open; close it first', {
      path: activeStore.path,
    });
  }

  const storeConfig = parseInput(storeConfigSchema, { ...overrides, path });
  const now = options.now ?? (() => new Date());

  const pool = new ConnectionPool(storeConfig);
  const migrator = new SchemaMigrator(pool, options.migrations, now);

  let report: MigrationReport;
  try {
    report = migrator.migrate();
  } catch (error) {
    pool.closeAll();
    logger.error('Store failed to open', { path: storeConfig.path, error: errorMessage(error) });
    throw error;
  }

  activeStore = new ClinicStore(pool, migrator, report, now);

  if (options.handleSignals) {
    registerProcessHandlers();
  }

  logger.info('Store opened', { path: storeConfig.path, schemaVersion: report.to, applied: report.applied.length });
  return activeStore;
}

/**
 * Close the open store, if any. Safe to call more than once.
 */
export function closeStore(): void {
  removeProcessHandlers();

  const store = activeStore;
  if (!store) {
    return;
  }

  activeStore = null;
  store.shutdown();
  logger.info('Store closed', { path: store.path });
}

/**
 * The open store; used by the HTTP controllers and the CLI
 */
export function getStore(): ClinicStore {
  if (!activeStore) {
    throw new StorageUnavailableError('Store is not open', '');
  }
  return activeStore;
}
