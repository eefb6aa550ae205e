import fs from 'fs';
import { once } from 'events';
import { finished } from 'stream/promises';
import logger from '../utils/logger';
import { AppError, StorageUnavailableError, errorMessage } from '../utils/errors';
import { csvRecord } from '../utils/csv';
import type { CsvValue } from '../utils/csv';
import type { CursorFilterInput, SearchOptions, SearchResult, SearchService } from './searchService';

/**
 * Export Service
 * Streams every search match from one statement to a CSV file. The file is written beside the
 * destination and renamed into place once complete.
 */

export const EXPORT_COLUMNS = [
  'reference_number',
  'last_name',
  'first_name',
  'middle_name',
  'date_of_birth',
  'age',
  'sex',
  'civil_status',
  'contact_number',
  'address',
  'last_visit',
  'registered_at',
] as const;

export type ExportFilter = CursorFilterInput;

function toCsvRow({ patient, age, lastVisit }: SearchResult): CsvValue[] {
  return [
    patient.reference,
    patient.lastName,
    patient.firstName,
    patient.middleName,
    patient.dateOfBirth,
    age,
    patient.sex,
    patient.civilStatus,
    patient.contactNumber,
    patient.address,
    lastVisit,
    patient.createdAt.slice(0, 10),
  ];
}

/**
 * Write every patient matching the filter to destinationPath; resolves to
 * the number of data rows written
 */
export async function exportPatientsCsv(
  search: SearchService,
  filter: ExportFilter,
  destinationPath: string,
  options: SearchOptions = {}
): Promise<number> {
  const partialPath = `${destinationPath}.partial`;
  const started = Date.now();

  const stream = fs.createWriteStream(partialPath, { encoding: 'utf8' });
  let streamError: Error | undefined;

  const write = async (chunk: string): Promise<void> => {
    if (streamError) {
      throw streamError;
    }
    if (!stream.write(chunk)) {
      await once(stream, 'drain');
    }
  };

  try {
    await once(stream, 'open');
    stream.on('error', (error) => {
      streamError = error;
    });

    await write(csvRecord(EXPORT_COLUMNS));

    const cursor = search.cursor(filter, options);
    let rows = 0;

    for (const item of cursor.rows) {
      await write(csvRecord(toCsvRow(item)));
      rows++;
    }

    stream.end();
    await finished(stream);
    await fs.promises.rename(partialPath, destinationPath);

    logger.info('Patients exported to CSV', { rows, duration: `${Date.now() - started}ms` });
    return rows;
  } catch (error) {
    stream.destroy();
    await fs.promises.rm(partialPath, { force: true });

    logger.error('CSV export failed', { error: errorMessage(error) });

    if (error instanceof AppError) {
      throw error;
    }
    throw new StorageUnavailableError(`Export failed: ${errorMessage(error)}`, destinationPath, { cause: error });
  }
}
