import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { UserResponseSchema } from '../helpers/auth-http';

describe('POST /register', () => {
  it('creates the user and never echoes the password', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { name: 'alice', email: 'alice@example.com', password: 'p1' },
      });

      expect(res.statusCode).toBe(200);

      const body = res.json();
      expect(Object.keys(body).sort()).toEqual(['email', 'id', 'name']);

      const user = UserResponseSchema.parse(body);
      expect(user.name).toBe('alice');
      expect(user.email).toBe('alice@example.com');
    } finally {
      await close();
    }
  });

  it('ignores a client-supplied id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const clientId = '11111111-1111-4111-8111-111111111111';
      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { id: clientId, name: 'alice', email: 'alice@example.com', password: 'p1' },
      });

      expect(res.statusCode).toBe(200);
      expect(UserResponseSchema.parse(res.json()).id).not.toBe(clientId);
    } finally {
      await close();
    }
  });

  it('rejects a duplicate email with 400', async () => {
    const { app, close } = await buildTestApp();
    try {
      const payload = { name: 'alice', email: 'alice@example.com', password: 'p1' };
      await app.inject({ method: 'POST', url: '/register', payload });

      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { ...payload, name: 'alice-again' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ detail: 'Email already registered', code: 'DUPLICATE_EMAIL' });
    } finally {
      await close();
    }
  });

  it('rejects an email that login could not look up by email', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { name: 'oneil', email: "o'neil@x.com", password: 'p1' },
      });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        status_code: 10422,
        message: 'email: Invalid email address',
        data: null,
      });
    } finally {
      await close();
    }
  });

  it('returns the 422 envelope for a missing field', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/register',
        payload: { name: 'alice', email: 'alice@example.com' },
      });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        status_code: 10422,
        message: 'password: Required',
        data: null,
      });
    } finally {
      await close();
    }
  });
});
