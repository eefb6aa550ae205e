import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { getStore } from '../store';
import { visitSearchSchema } from '../services/searchService';
import { idParamSchema, parseInput, visitDateQuerySchema } from '../utils/validation';

/**
 * Visit Controller
 */

function visitId(req: Request): number {
  return parseInput(idParamSchema, req.params).id;
}

/**
 * GET /api/visits?query=santos&dateRange[from]=2024-01-01
 * Visit log, most recent first
 */
export const searchVisits = asyncHandler(async (req: Request, res: Response) => {
  const filter = parseInput(visitSearchSchema, req.query);
  const page = getStore().searchVisits(filter);

  res.json({
    status: 'success',
    data: page.items,
    pagination: {
      page: page.page,
      pageSize: page.pageSize,
      totalCount: page.total,
    },
  });
});

/**
 * GET /api/visits/by-date/:date
 */
export const getVisitsByDate = asyncHandler(async (req: Request, res: Response) => {
  const { date } = parseInput(visitDateQuerySchema, req.params);

  res.json({
    status: 'success',
    data: getStore().listVisitsByDate(date),
  });
});

/**
 * GET /api/visits/last-encoded
 * Where back-entry of paper records stopped
 */
export const getLastEncoded = asyncHandler(async (_req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: { visitDate: getStore().getLastEncodedVisitDate() },
  });
});

/**
 * POST /api/visits
 */
export const createVisit = asyncHandler(async (req: Request, res: Response) => {
  res.status(201).json({
    status: 'success',
    data: getStore().createVisit(req.body),
  });
});

/**
 * GET /api/visits/:id
 */
export const getVisit = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().getVisit(visitId(req)),
  });
});

/**
 * PUT /api/visits/:id
 */
export const updateVisit = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().updateVisit(visitId(req), req.body),
  });
});

/**
 * DELETE /api/visits/:id
 */
export const deleteVisit = asyncHandler(async (req: Request, res: Response) => {
  getStore().deleteVisit(visitId(req));
  res.status(204).send();
});
