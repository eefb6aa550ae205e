import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { getStore } from '../store';
import { idParamSchema, parseInput } from '../utils/validation';

/**
 * Account Controller
 * Account management for administrators
 */

function accountId(req: Request): number {
  return parseInput(idParamSchema, req.params).id;
}

/**
 * GET /api/accounts
 */
export const listAccounts = asyncHandler(async (_req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().listAccounts(),
  });
});

/**
 * POST /api/accounts
 */
export const createAccount = asyncHandler(async (req: Request, res: Response) => {
  const account = await getStore().createAccount(req.body);

  res.status(201).json({
    status: 'success',
    data: account,
  });
});

/**
 * GET /api/accounts/:id
 */
export const getAccount = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    status: 'success',
    data: getStore().getAccount(accountId(req)),
  });
});

/**
 * PUT /api/accounts/:id
 */
export const updateAccount = asyncHandler(async (req: Request, res: Response) => {
  const account = await getStore().updateAccount(accountId(req), req.body);

  res.json({
    status: 'success',
    data: account,
  });
});

/**
 * DELETE /api/accounts/:id
 */
export const deleteAccount = asyncHandler(async (req: Request, res: Response) => {
  getStore().deleteAccount(accountId(req));
  res.status(204).send();
});
