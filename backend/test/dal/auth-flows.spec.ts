import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { AppError } from '../../src/shared/http/errors';
import { selectUserByEmailSql } from '../../src/modules/users/dal/user.query-sql';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import type { DbExecutor } from '../../src/shared/db/db';
import { executeRegisterFlow } from '../../src/modules/auth/flows/register/execute-register-flow';

const META = { ip: '127.0.0.1', requestId: 'req-test' };

async function expectAppError(promise: Promise<unknown>, code: string) {
  await expect(promise).rejects.toBeInstanceOf(AppError);
  await expect(promise).rejects.toMatchObject({ code });
}

/** Another registration for the same email commits between lookup and insert. */
class RacingUserRepo extends UserRepo {
  withDb(db: DbExecutor): UserRepo {
    return new RacingUserRepo(db);
  }

  async insertUser(params: Parameters<UserRepo['insertUser']>[0]) {
    await super.insertUser({ ...params, name: `${params.name}-first` });
    return super.insertUser(params);
  }
}

describe('AuthService flows', () => {
  it('register then authenticate by email or by name returns the user', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const auth = deps.auth.authService;
      const user = await auth.register({
        ...META,
        name: 'alice',
        email: 'alice@example.com',
        password: 'p1',
      });

      expect(await auth.authenticate('alice@example.com', 'p1')).toEqual(user);
      expect(await auth.authenticate('alice', 'p1')).toEqual(user);
    } finally {
      await close();
    }
  });

  it('wrong password and unknown identifier fail the same way', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const auth = deps.auth.authService;
      await auth.register({ ...META, name: 'alice', email: 'alice@example.com', password: 'p1' });

      await expectAppError(auth.authenticate('alice@example.com', 'nope'), 'INVALID_CREDENTIALS');
      await expectAppError(auth.authenticate('ghost@example.com', 'p1'), 'INVALID_CREDENTIALS');
      await expectAppError(auth.authenticate('ghost', 'p1'), 'INVALID_CREDENTIALS');
    } finally {
      await close();
    }
  });

  it('registering the same email twice fails with DUPLICATE_EMAIL', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const auth = deps.auth.authService;
      await auth.register({ ...META, name: 'alice', email: 'alice@example.com', password: 'p1' });

      await expectAppError(
        auth.register({ ...META, name: 'alice2', email: 'ALICE@example.com', password: 'p2' }),
        'DUPLICATE_EMAIL',
      );

      const count = await deps.db
        .selectFrom('users')
        .select((eb) => eb.fn.countAll<number>().as('n'))
        .executeTakeFirstOrThrow();
      expect(Number(count.n)).toBe(1);
    } finally {
      await close();
    }
  });

  it('an email unique violation past the lookup still maps to DUPLICATE_EMAIL', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const register = executeRegisterFlow(
        {
          db: deps.db,
          passwordHasher: deps.passwordHasher,
          userRepo: new RacingUserRepo(deps.db),
          logger: deps.logger,
        },
        { ...META, name: 'alice', email: 'alice@example.com', password: 'p1' },
      );

      await expect(register).rejects.toMatchObject({
        code: 'DUPLICATE_EMAIL',
        status: 400,
        message: 'Email already registered',
      });
    } finally {
      await close();
    }
  });

  it('a duplicate name is not reported as a duplicate email', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const auth = deps.auth.authService;
      await auth.register({ ...META, name: 'alice', email: 'alice@example.com', password: 'p1' });

      const second = auth.register({
        ...META,
        name: 'alice',
        email: 'other@example.com',
        password: 'p2',
      });

      await expect(second).rejects.not.toBeInstanceOf(AppError);
      await expect(second).rejects.toThrow('UNIQUE constraint failed: users.name');
    } finally {
      await close();
    }
  });

  it('bcrypt storage never keeps the raw password', async () => {
    const { deps, close } = await buildTestApp({
      auth: { passwordStorage: 'bcrypt', bcryptCost: 4 },
    });
    try {
      const auth = deps.auth.authService;
      const user = await auth.register({
        ...META,
        name: 'alice',
        email: 'alice@example.com',
        password: 'p1',
      });

      const row = await selectUserByEmailSql(deps.db, 'alice@example.com');
      expect(row?.password).not.toBe('p1');
      expect(row?.password.startsWith('$2b$04$')).toBe(true);

      expect(await auth.authenticate('alice@example.com', 'p1')).toEqual(user);
    } finally {
      await close();
    }
  });

  it('login issues a token that resolves back to the user', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const auth = deps.auth.authService;
      const user = await auth.register({
        ...META,
        name: 'alice',
        email: 'alice@example.com',
        password: 'p1',
      });

      const res = await auth.login({ ...META, identifier: 'alice', password: 'p1' });

      expect(res.token_type).toBe('Bearer');
      expect(deps.accessTokens.validate(res.access_token)).toBe('alice@example.com');
      expect(await auth.resolveBearerToken(res.access_token)).toEqual(user);
    } finally {
      await close();
    }
  });

  it('resolveBearerToken rejects bad tokens and tokens for deleted users', async () => {
    const { deps, close } = await buildTestApp();
    try {
      const auth = deps.auth.authService;

      await expectAppError(auth.resolveBearerToken('not-a-token'), 'INVALID_TOKEN');

      const orphan = deps.accessTokens.issue('gone@example.com');
      await expect(auth.resolveBearerToken(orphan)).rejects.toMatchObject({
        code: 'USER_NOT_FOUND',
        status: 401,
        message: 'User not found: gone@example.com',
      });
    } finally {
      await close();
    }
  });
});
