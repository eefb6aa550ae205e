import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config/config';
import type { Account, AccountRole } from '../types/records';
import { accountRoles } from '../types/records';

/**
 * Auth Service
 * Password hashing and JWT tokens for the local API
 */

export interface JwtPayload {
  accountId: number;
  username: string;
  role: AccountRole;
}

const jwtPayloadSchema = z.object({
  accountId: z.number().int().positive(),
  username: z.string(),
  role: z.enum(accountRoles),
});

/**
 * Hash a password using bcrypt
 */
export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.auth.saltRounds);
}

/**
 * Compare a password with a hash
 */
export async function comparePassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

/**
 * Generate a JWT token for an account
 */
export function generateToken(account: Account): string {
  const payload: JwtPayload = {
    accountId: account.id,
    username: account.username,
    role: account.role,
  };

  return jwt.sign(payload, config.auth.jwtSecret, { expiresIn: config.auth.jwtExpiresInSeconds });
}

/**
 * Verify and decode a JWT token
 */
export function verifyToken(token: string): JwtPayload | null {
  try {
    const decoded = jwtPayloadSchema.safeParse(jwt.verify(token, config.auth.jwtSecret));
    return decoded.success ? decoded.data : null;
  } catch {
    return null;
  }
}
