import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { getStore } from '../store';
import { isStatName } from '../services/statsCache';
import { NotFoundError } from '../utils/errors';

/**
 * Stats Controller
 * Dashboard aggregates served from the stats cache
 */

/**
 * GET /api/stats
 */
export const getStats = asyncHandler(async (_req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().statsSnapshot(),
  });
});

/**
 * GET /api/stats/:name
 */
export const getStat = asyncHandler(async (req: Request, res: Response) => {
  const { name } = req.params;
  if (!isStatName(name)) {
    throw new NotFoundError('Stat', name);
  }

  res.json({
    status: 'success',
    data: { name, value: getStore().getStat(name) },
  });
});
