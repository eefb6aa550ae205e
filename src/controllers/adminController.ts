import { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/errorHandler';
import { getStore } from '../store';
import { searchFilterSchema } from '../services/searchService';
import { parseInput } from '../utils/validation';

/**
 * Admin Controller
 * Backup, CSV export, store merge and store status. Paths are on the
 * machine running the store.
 */

const backupSchema = z.object({
  destination: z.string().trim().min(1, 'is required'),
  overwrite: z.boolean().default(false),
});

const exportSchema = z.object({
  destination: z.string().trim().min(1, 'is required'),
  filter: searchFilterSchema.omit({ page: true, pageSize: true }).default({}),
});

const mergeSchema = z.object({
  source: z.string().trim().min(1, 'is required'),
});

/**
 * POST /api/admin/backup
 */
export const backup = asyncHandler(async (req: Request, res: Response) => {
  const { destination, overwrite } = parseInput(backupSchema, req.body);
  const result = await getStore().backupTo(destination, { overwrite });

  res.status(201).json({
    status: 'success',
    data: result,
  });
});

/**
 * POST /api/admin/export
 */
export const exportCsv = asyncHandler(async (req: Request, res: Response) => {
  const { destination, filter } = parseInput(exportSchema, req.body);
  const rows = await getStore().exportPatientsCsv(filter, destination);

  res.status(201).json({
    status: 'success',
    data: { path: destination, rows },
  });
});

/**
 * POST /api/admin/merge
 */
export const merge = asyncHandler(async (req: Request, res: Response) => {
  const { source } = parseInput(mergeSchema, req.body);

  res.json({
    status: 'success',
    data: getStore().mergeFrom(source),
  });
});

/**
 * GET /api/admin/status
 */
export const getStatus = asyncHandler(async (_req: Request, res: Response) => {
  const store = getStore();

  res.json({
    status: 'success',
    data: {
      schemaVersion: store.schemaVersion(),
      pool: store.poolStats(),
      journalMode: store.config.journalMode,
      synchronous: store.config.synchronous,
    },
  });
});
