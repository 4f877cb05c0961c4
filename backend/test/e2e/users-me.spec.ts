import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { bearer, registerAndLogin } from '../helpers/auth-http';

const ALICE = { name: 'alice', email: 'alice@example.com', password: 'p1' };

function makeClock(startMs: number) {
  let current = startMs;
  return {
    now: () => current,
    advanceSeconds: (s: number) => {
      current += s * 1000;
    },
  };
}

describe('GET /users/me/', () => {
  it('register → login → me returns the same user', async () => {
    const { app, close } = await buildTestApp();
    try {
      const { user, token } = await registerAndLogin(app, ALICE);

      const res = await app.inject({ method: 'GET', url: '/users/me/', headers: bearer(token) });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(user);
    } finally {
      await close();
    }
  });

  it('401 Not authenticated without a token', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/users/me/' });

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.json()).toEqual({ detail: 'Not authenticated', code: 'UNAUTHORIZED' });
    } finally {
      await close();
    }
  });

  it('401 Could not validate credentials for a garbage token', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/users/me/',
        headers: bearer('not-a-token'),
      });

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.json()).toEqual({
        detail: 'Could not validate credentials',
        code: 'INVALID_TOKEN',
      });
    } finally {
      await close();
    }
  });

  it('rejects the token once the clock passes its expiry', async () => {
    const clock = makeClock(1_700_000_000_000);
    const { app, close } = await buildTestApp({}, { now: clock.now });
    try {
      const { token } = await registerAndLogin(app, ALICE);

      clock.advanceSeconds(30 * 60 - 1);
      const stillValid = await app.inject({
        method: 'GET',
        url: '/users/me/',
        headers: bearer(token),
      });
      expect(stillValid.statusCode).toBe(200);

      clock.advanceSeconds(1);
      const expired = await app.inject({ method: 'GET', url: '/users/me/', headers: bearer(token) });
      expect(expired.statusCode).toBe(401);
      expect(expired.json().code).toBe('INVALID_TOKEN');
    } finally {
      await close();
    }
  });

  it('401 User not found once the account is gone', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const { user, token } = await registerAndLogin(app, ALICE);
      await deps.db.deleteFrom('users').where('id', '=', user.id).execute();

      const res = await app.inject({ method: 'GET', url: '/users/me/', headers: bearer(token) });

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.json()).toEqual({
        detail: 'User not found: alice@example.com',
        code: 'USER_NOT_FOUND',
      });
    } finally {
      await close();
    }
  });
});
