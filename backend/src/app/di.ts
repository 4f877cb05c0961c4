/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Tests inject their own Db (in-memory SQLite) through `opts.db`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (password storage, delete auth) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { createPasswordHasher } from '../shared/security/create-password-hasher';
import { AccessTokenService } from '../shared/security/access-token';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createDatabaseModule } from '../modules/databases/database.module';
import type { DatabaseModule } from '../modules/databases/database.module';

import { createScheduleModule } from '../modules/schedules/schedule.module';
import type { ScheduleModule } from '../modules/schedules/schedule.module';

export type AppDeps = {
  db: Db;
  logger: Logger;

  passwordHasher: PasswordHasher;
  accessTokens: AccessTokenService;

  // modules
  users: UserModule;
  auth: AuthModule;
  databases: DatabaseModule;
  schedules: ScheduleModule;

  // lifecycle
  close: () => Promise<void>;
};

export type BuildDepsOptions = {
  /** Use an existing Db instead of connecting to config.databaseUrl. */
  db?: Db;
  /** Clock for token issuance/validation (ms since epoch). */
  now?: () => number;
};

export async function buildDeps(config: AppConfig, opts: BuildDepsOptions = {}): Promise<AppDeps> {
  logger.level = config.logLevel;

  const db = opts.db ?? createDb(config.databaseUrl);

  const passwordHasher = createPasswordHasher({
    storage: config.auth.passwordStorage,
    bcryptCost: config.auth.bcryptCost,
  });

  const accessTokens = new AccessTokenService({
    secret: config.auth.jwtSecret,
    ttlSeconds: config.auth.accessTokenTtlMinutes * 60,
    now: opts.now,
  });

  if (config.auth.passwordStorage === 'plain') {
    logger.warn('auth.password_storage.plaintext', {
      flow: 'startup',
      hint: 'set PASSWORD_STORAGE=bcrypt to hash passwords at registration',
    });
  }

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });

  const auth = createAuthModule({
    db,
    passwordHasher,
    accessTokens,
    logger,
    userRepo: users.userRepo,
  });

  const databases = createDatabaseModule({ db, logger });

  const schedules = createScheduleModule({
    db,
    logger,
    deleteRequiresAuth: config.schedules.deleteRequiresAuth,
  });

  return {
    db,
    logger,
    passwordHasher,
    accessTokens,
    users,
    auth,
    databases,
    schedules,
    close: async () => {
      await db.destroy();
    },
  };
}
