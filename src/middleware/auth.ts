import { Request, Response, NextFunction } from 'express';
import { verifyToken } from '../services/authService';
import type { JwtPayload } from '../services/authService';
import { ForbiddenError, UnauthorizedError } from '../utils/errors';

declare global {
  namespace Express {
    interface Request {
      account?: JwtPayload;
    }
  }
}

/**
 * Require a valid Bearer token; the decoded account lands on req.account
 */
export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  const authHeader = req.header('Authorization');
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return next(new UnauthorizedError());
  }

  const payload = verifyToken(authHeader.substring(7));
  if (!payload) {
    return next(new UnauthorizedError('Invalid or expired token'));
  }

  req.account = payload;
  next();
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (req.account?.role !== 'admin') {
    return next(new ForbiddenError('Administrator role required'));
  }
  next();
}
