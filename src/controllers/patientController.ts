import { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/errorHandler';
import { getStore } from '../store';
import { searchFilterSchema } from '../services/searchService';
import { calendarDateSchema, idParamSchema, idSchema, paginationFields, parseInput } from '../utils/validation';

/**
 * Patient Controller
 * /api/patients endpoints over the store's patient operations
 */

const visitListQuerySchema = z.object({
  ...paginationFields,
  from: calendarDateSchema.optional(),
  to: calendarDateSchema.optional(),
});

const mergeBodySchema = z.object({ targetId: idSchema });

function patientId(req: Request): number {
  return parseInput(idParamSchema, req.params).id;
}

/**
 * GET /api/patients
 * Search with filter fields as query parameters, e.g.
 * ?name=san&ageRange[min]=30&ageRange[max]=40&sortBy=recentVisit
 */
export const searchPatients = asyncHandler(async (req: Request, res: Response) => {
  const filter = parseInput(searchFilterSchema, req.query);
  const result = getStore().search(filter);

  res.json({
    status: 'success',
    data: result.items,
    pagination: {
      page: result.page,
      pageSize: result.pageSize,
      totalCount: result.total,
    },
    meta: {
      strategy: result.strategy,
      referenceDate: result.referenceDate,
    },
  });
});

/**
 * POST /api/patients
 */
export const createPatient = asyncHandler(async (req: Request, res: Response) => {
  const patient = getStore().createPatient(req.body);

  res.status(201).json({
    status: 'success',
    data: patient,
  });
});

/**
 * GET /api/patients/:id
 */
export const getPatient = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().getPatient(patientId(req)),
  });
});

/**
 * PUT /api/patients/:id
 */
export const updatePatient = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().updatePatient(patientId(req), req.body),
  });
});

/**
 * DELETE /api/patients/:id
 */
export const deletePatient = asyncHandler(async (req: Request, res: Response) => {
  getStore().deletePatient(patientId(req));
  res.status(204).send();
});

/**
 * GET /api/patients/:id/visits?page=1&pageSize=25&from=2024-01-01
 */
export const getPatientVisits = asyncHandler(async (req: Request, res: Response) => {
  const query = parseInput(visitListQuerySchema, req.query);
  const page = getStore().listVisitsForPatient(patientId(req), query.page, query.pageSize, {
    from: query.from,
    to: query.to,
  });

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
 * GET /api/patients/:id/summary
 */
export const getPatientSummary = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().getPatientSummary(patientId(req)),
  });
});

/**
 * POST /api/patients/:id/merge
 * Move this patient's visits onto body.targetId and retire this record
 */
export const mergePatient = asyncHandler(async (req: Request, res: Response) => {
  const { targetId } = parseInput(mergeBodySchema, req.body);

  res.json({
    status: 'success',
    data: getStore().mergePatients(patientId(req), targetId),
  });
});
