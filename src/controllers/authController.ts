import { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/errorHandler';
import { getStore } from '../store';
import { generateToken } from '../services/authService';
import { ConstraintViolationError, UnauthorizedError } from '../utils/errors';
import { parseInput } from '../utils/validation';
import logger from '../utils/logger';

/**
 * Auth Controller
 * Login, first-run detection and first admin setup
 */

const loginSchema = z.object({
  username: z.string().trim().min(1, 'is required'),
  password: z.string().min(1, 'is required'),
});

const setupSchema = z.object({
  username: z.string(),
  password: z.string(),
});

/**
 * POST /api/auth/login
 * Authenticate and return a token
 */
export const login = asyncHandler(async (req: Request, res: Response) => {
  const { username, password } = parseInput(loginSchema, req.body);

  const account = await getStore().verifyCredentials(username, password);
  if (!account) {
    throw new UnauthorizedError('Invalid username or password');
  }

  res.json({
    status: 'success',
    data: {
      account,
      token: generateToken(account),
    },
  });
});

/**
 * GET /api/auth/status
 * Whether the first-run admin setup is still pending
 */
export const getStatus = asyncHandler(async (_req: Request, res: Response) => {
  const store = getStore();

  res.json({
    status: 'success',
    data: {
      needsFirstRun: store.needsFirstRun(),
      schemaVersion: store.schemaVersion(),
    },
  });
});

/**
 * POST /api/auth/setup
 * Create the first admin account; refused once any account exists
 */
export const setup = asyncHandler(async (req: Request, res: Response) => {
  const store = getStore();
  const { username, password } = parseInput(setupSchema, req.body);

  if (!store.needsFirstRun()) {
    throw new ConstraintViolationError('setup_complete', 'An account already exists');
  }

  const account = await store.setupFirstAdmin({ username, password });
  logger.info('First admin account created', { accountId: account.id });

  res.status(201).json({
    status: 'success',
    data: {
      account,
      token: generateToken(account),
    },
  });
});
