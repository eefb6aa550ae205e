import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

/**
 * Store and server configuration
 * Read once from the environment (and .env) and validated with zod.
 */

export const journalModes = ['WAL', 'DELETE'] as const;
export const synchronousModes = ['FULL', 'NORMAL'] as const;

export type JournalMode = (typeof journalModes)[number];
export type SynchronousMode = (typeof synchronousModes)[number];

export const storeConfigSchema = z.object({
  path: z.string().min(1, 'Store path is required'),
  poolSize: z.number().int().min(1).max(8).default(2),
  journalMode: z.enum(journalModes).default('WAL'),
  synchronous: z.enum(synchronousModes).default('FULL'),
  busyTimeoutMs: z.number().int().min(0).default(5000),
});

/**
 * Small enumerated configuration object consumed by openStore
 */
export type StoreConfig = z.infer<typeof storeConfigSchema>;
export type StoreConfigInput = z.input<typeof storeConfigSchema>;

const envSchema = z.object({
  CLINIC_DB_PATH: z.string().default(path.join(process.cwd(), 'data', 'clinic.db')),
  CLINIC_POOL_SIZE: z.coerce.number().int().min(1).max(8).default(2),
  CLINIC_JOURNAL_MODE: z.enum(journalModes).default('WAL'),
  CLINIC_SYNCHRONOUS: z.enum(synchronousModes).default('FULL'),
  CLINIC_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  PORT: z.coerce.number().int().min(1).max(65535).default(3002),
  HOST: z.string().default('127.0.0.1'),
  JWT_SECRET: z.string().min(1).default('clinic-store-dev-secret'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(8 * 60 * 60),
});

const env = envSchema.parse(process.env);

export const config = {
  store: {
    path: env.CLINIC_DB_PATH,
    poolSize: env.CLINIC_POOL_SIZE,
    journalMode: env.CLINIC_JOURNAL_MODE,
    synchronous: env.CLINIC_SYNCHRONOUS,
    busyTimeoutMs: env.CLINIC_BUSY_TIMEOUT_MS,
  } satisfies StoreConfig,

  server: {
    port: env.PORT,
    host: env.HOST,
  },

  auth: {
    jwtSecret: env.JWT_SECRET,
    jwtExpiresInSeconds: env.JWT_EXPIRES_IN_SECONDS,
    saltRounds: 10,
  },

  search: {
    defaultPageSize: 25,
    maxPageSize: 200,
    // rows streamed between cancellation checks
    cancellationCheckInterval: 64,
  },
};

export type Config = typeof config;
