#!/usr/bin/env node
/**
 * Clinic Store CLI
 * Operator commands against a store file: migrate, stats, backup, export,
 * merge, account setup and demo data.
 */

import { Command } from 'commander';
import path from 'path';
import { config } from './config/config';
import { closeStore, openStore } from './store';
import type { ClinicStore } from './store';
import { seedStore } from './services/seedService';
import type { ExportFilter } from './services/exportService';
import { sortFields } from './services/searchService';
import { oneOf } from './models/context';
import { civilStatuses, sexes } from './types/records';
import { AppError, ValidationError, errorMessage } from './utils/errors';

interface GlobalOptions {
  db: string;
}

const program = new Command();

program
  .name('clinic-store')
  .description('Operator tools for the clinic records store')
  .version('1.0.0')
  .option('--db <path>', 'Store file', config.store.path);

/**
 * Open the store named by --db, run the command and close it. Errors print
 * and exit non-zero.
 */
async function withStore(action: (store: ClinicStore) => Promise<void> | void): Promise<void> {
  const { db } = program.opts<GlobalOptions>();

  try {
    const store = openStore(path.resolve(db), config.store, { handleSignals: true });
    await action(store);
  } catch (error) {
    const code = error instanceof AppError ? error.code : 'INTERNAL_ERROR';
    console.error(`Error [${code}]: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    closeStore();
  }
}

const print = (value: unknown) => console.log(JSON.stringify(value, null, 2));

function toInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

// Migrate command
program
  .command('migrate')
  .description('Create the store or bring it to the current schema version')
  .action(() =>
    withStore((store) => {
      const { from, to, applied } = store.migration;
      console.log(
        applied.length > 0 ? `Migrated from version ${from} to ${to} (${applied.join(', ')})` : `Already at version ${to}`
      );
    })
  );

// Stats command
program
  .command('stats')
  .description('Print the dashboard statistics')
  .action(() =>
    withStore((store) => {
      print(store.statsSnapshot());
    })
  );

// Backup command
program
  .command('backup <destination>')
  .description('Write a consistent copy of the store')
  .option('-f, --overwrite', 'Replace an existing file at the destination')
  .action((destination: string, options: { overwrite?: boolean }) =>
    withStore(async (store) => {
      const result = await store.backupTo(destination, { overwrite: options.overwrite });
      console.log(`Backup written to ${result.path} (${result.sizeBytes} bytes)`);
    })
  );

interface ExportOptions {
  name?: string;
  sex?: string;
  civilStatus?: string;
  ageMin?: number;
  ageMax?: number;
  visitFrom?: string;
  visitTo?: string;
  sortBy: string;
}

// Export command
program
  .command('export <destination>')
  .description('Export matching patients to a CSV file')
  .option('-n, --name <prefix>', 'Last name prefix')
  .option('-s, --sex <sex>', 'M or F')
  .option('-c, --civil-status <status>', civilStatuses.join(', '))
  .option('--age-min <years>', 'Minimum age', toInteger)
  .option('--age-max <years>', 'Maximum age', toInteger)
  .option('--visit-from <date>', 'Visited on or after (YYYY-MM-DD)')
  .option('--visit-to <date>', 'Visited on or before (YYYY-MM-DD)')
  .option('--sort-by <field>', 'name, age or recentVisit', 'name')
  .action((destination: string, options: ExportOptions) =>
    withStore(async (store) => {
      const sex = options.sex === undefined ? undefined : oneOf(sexes, options.sex.toUpperCase());
      if (sex === null) {
        throw new ValidationError('sex', 'must be M or F');
      }
      const civilStatus =
        options.civilStatus === undefined ? undefined : oneOf(civilStatuses, options.civilStatus.toLowerCase());
      if (civilStatus === null) {
        throw new ValidationError('civilStatus', `must be one of ${civilStatuses.join(', ')}`);
      }
      const sortBy = oneOf(sortFields, options.sortBy);
      if (sortBy === null) {
        throw new ValidationError('sortBy', `must be one of ${sortFields.join(', ')}`);
      }

      const filter: ExportFilter = { name: options.name, sex, civilStatus, sortBy };
      if (options.ageMin !== undefined || options.ageMax !== undefined) {
        filter.ageRange = { min: options.ageMin, max: options.ageMax };
      }
      if (options.visitFrom !== undefined || options.visitTo !== undefined) {
        filter.visitDateRange = { from: options.visitFrom, to: options.visitTo };
      }

      const rows = await store.exportPatientsCsv(filter, destination);
      console.log(`Exported ${rows} patient(s) to ${destination}`);
    })
  );

// Merge command
program
  .command('merge <source>')
  .description('Import patients and visits from another store file')
  .action((source: string) =>
    withStore((store) => {
      print(store.mergeFrom(path.resolve(source)));
    })
  );

// Create admin command
program
  .command('create-admin <username>')
  .description('Create an admin account; the password is read from ADMIN_PASSWORD')
  .action((username: string) =>
    withStore(async (store) => {
      const password = process.env.ADMIN_PASSWORD;
      if (!password) {
        throw new Error('Set ADMIN_PASSWORD to the new account password');
      }

      const account = await store.createAccount({ username, password, role: 'admin' });
      console.log(`Created admin account ${account.username} (id ${account.id})`);
    })
  );

// Seed command
program
  .command('seed')
  .description('Fill the store with made-up patients and visits')
  .option('-p, --patients <count>', 'Number of patients', toInteger, 50)
  .option('--seed <number>', 'Random seed for a reproducible run', toInteger)
  .action((options: { patients: number; seed?: number }) =>
    withStore((store) => {
      const report = seedStore(store, { patients: options.patients, seed: options.seed });
      console.log(`Seeded ${report.patients} patient(s) and ${report.visits} visit(s) (seed ${report.seed})`);
    })
  );

// Parse and run
program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
