import { config as loadEnv } from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
const candidatePath = path.resolve(__dirname, '..', envFile);

if (fs.existsSync(candidatePath)) {
  loadEnv({ path: candidatePath });
} else {
  loadEnv();
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(4010),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
    DATABASE_APPLY_SCHEMA: booleanFlag.default('false'),
    JWT_ACCESS_SECRET: z.string().min(32, 'JWT_ACCESS_SECRET must be at least 32 characters'),
    ACCESS_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 15),
    REFRESH_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 24 * 30),
    VERIFICATION_CODE_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(5 * 60),
    VERIFICATION_CODE_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
    VERIFICATION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    UNIT_OF_WORK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    COOKIE_DOMAIN: z.string().optional(),
    COOKIE_SECURE: booleanFlag.default('true'),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(200),
    RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().default(1),
  })
  .transform((value) => ({
    ...value,
    isProduction: value.NODE_ENV === 'production',
  }));

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
