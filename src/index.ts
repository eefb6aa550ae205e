/**
 * Public API of the clinic records store
 */

export { ClinicStore, openStore, closeStore, getStore } from './store';
export type { OpenStoreOptions, StoreOverrides } from './store';

export { storeConfigSchema, journalModes, synchronousModes } from './config/config';
export type { StoreConfig, StoreConfigInput, JournalMode, SynchronousMode } from './config/config';
export { ConnectionPool, PooledConnection, openConnection } from './config/database';
export type { PoolStats } from './config/database';

export { SchemaMigrator, readSchemaVersion } from './database/migrator';
export type { Migration, MigrationReport, MigratorState } from './database/migrator';
export { migrations, LATEST_SCHEMA_VERSION } from './database/migrations';

export { StatsCache, statNames, isStatName } from './services/statsCache';
export type { StatName, StatValues, CachedStat, StatComputers } from './services/statsCache';
export { SearchService, searchFilterSchema, visitSearchSchema } from './services/searchService';
export type {
  CancellationToken,
  CursorFilterInput,
  QueryPlan,
  SearchFilter,
  SearchCursor,
  SearchFilterInput,
  SearchOptions,
  SearchPage,
  SearchResult,
  SearchStrategy,
  SortField,
  VisitSearchInput,
} from './services/searchService';
export { EXPORT_COLUMNS } from './services/exportService';
export type { ExportFilter } from './services/exportService';
export type { BackupOptions, BackupResult } from './services/backupService';
export type { MergeReport } from './services/mergeService';
export type { MergeResult } from './models/Patient';

export * from './utils/errors';
export { computeAge, localDateString } from './utils/dates';
export { formatReferenceNumber, parseReferenceNumber } from './utils/referenceNumber';
export type {
  AccountInput,
  AccountUpdate,
  PatientInput,
  PatientUpdate,
  VisitInput,
  VisitUpdate,
} from './utils/validation';
export * from './types/records';
