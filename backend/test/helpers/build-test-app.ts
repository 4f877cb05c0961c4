import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { createTestDb } from './test-db';

export const TEST_JWT_SECRET = 'test-secret-test-secret-test-secret';

type ConfigOverrides = Partial<Omit<AppConfig, 'auth' | 'schedules'>> & {
  auth?: Partial<AppConfig['auth']>;
  schedules?: Partial<AppConfig['schedules']>;
};

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Every app gets its own in-memory database (no DATABASE_URL needed).
 * - Pass `now` to pin the token clock.
 */
export async function buildTestApp(
  overrides: ConfigOverrides = {},
  opts: { now?: () => number } = {},
) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,
    databaseUrl: 'sqlite::memory:',

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'scheduling-backend-test',

    auth: {
      jwtSecret: TEST_JWT_SECRET,
      accessTokenTtlMinutes: 30,
      passwordStorage: 'plain',
      bcryptCost: 12,
    },

    schedules: {
      deleteRequiresAuth: false,
    },
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    // ensure nested objects merge correctly
    auth: {
      ...baseConfig.auth,
      ...(overrides.auth ?? {}),
    },
    schedules: {
      ...baseConfig.schedules,
      ...(overrides.schedules ?? {}),
    },
  };

  const db = await createTestDb();
  const built = await buildApp(config, { db, now: opts.now });

  return {
    app: built.app,
    deps: built.deps,
    close: built.close,
  };
}
