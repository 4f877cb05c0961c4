/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * SECRETS:
 * - JWT_SECRET is read once here at startup and handed to AccessTokenService.
 *   It is never rotated within a run; changing it invalidates every token.
 *
 * BOOLEANS:
 * - Boolean flags accept only "true"/"false". z.coerce.boolean() would turn
 *   the string "false" into true.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().default(3000),

  DATABASE_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('scheduling-backend'),

  // Bearer tokens
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).max(1440).default(30),

  // Password storage
  PASSWORD_STORAGE: z.enum(['plain', 'bcrypt']).default('plain'),
  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Require bearer auth + ownership on POST /schedule/delete
  SCHEDULE_DELETE_REQUIRE_AUTH: BooleanFlagSchema,
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;

  logLevel: string;
  serviceName: string;

  auth: {
    jwtSecret: string;
    accessTokenTtlMinutes: number;
    passwordStorage: 'plain' | 'bcrypt';
    bcryptCost: number;
  };

  schedules: {
    deleteRequiresAuth: boolean;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    auth: {
      jwtSecret: parsed.JWT_SECRET,
      accessTokenTtlMinutes: parsed.ACCESS_TOKEN_TTL_MINUTES,
      passwordStorage: parsed.PASSWORD_STORAGE,
      bcryptCost: parsed.BCRYPT_COST,
    },

    schedules: {
      deleteRequiresAuth: parsed.SCHEDULE_DELETE_REQUIRE_AUTH,
    },
  };
}
