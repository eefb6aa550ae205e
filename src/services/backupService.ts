import fs from 'fs';
import path from 'path';
import type { ConnectionPool } from '../config/database';
import logger from '../utils/logger';
import {
  AppError,
  ConstraintViolationError,
  StorageUnavailableError,
  ValidationError,
  errorMessage,
} from '../utils/errors';

/**
 * Backup Service
 * Point-in-time copies of the store through VACUUM INTO, written beside the
 * destination and renamed into place.
 */

export interface BackupOptions {
  overwrite?: boolean;
}

export interface BackupResult {
  path: string;
  sizeBytes: number;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function backupTo(
  pool: ConnectionPool,
  destinationPath: string,
  options: BackupOptions = {}
): Promise<BackupResult> {
  const destination = path.resolve(destinationPath);

  if (destination === path.resolve(pool.config.path)) {
    throw new ValidationError('destinationPath', 'must differ from the store file');
  }

  if (!options.overwrite && (await exists(destination))) {
    throw new ConstraintViolationError('destination_exists', 'Backup destination already exists', {
      path: destination,
    });
  }

  const partialPath = `${destination}.partial`;
  const started = Date.now();

  try {
    await fs.promises.rm(partialPath, { force: true });

    // Consistent snapshot: runs outside any write transaction
    pool.exclusive('Backup', (db) => {
      db.prepare<[string]>('VACUUM INTO ?').run(partialPath);
    });

    await fs.promises.rename(partialPath, destination);
    const { size } = await fs.promises.stat(destination);

    logger.info('Store backed up', { sizeBytes: size, duration: `${Date.now() - started}ms` });

    return { path: destination, sizeBytes: size };
  } catch (error) {
    await fs.promises.rm(partialPath, { force: true });

    if (error instanceof AppError) {
      throw error;
    }

    logger.error('Backup failed', { error: errorMessage(error) });
    throw new StorageUnavailableError(`Backup failed: ${errorMessage(error)}`, destination, { cause: error });
  }
}
