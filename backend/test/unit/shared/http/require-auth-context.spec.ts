import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { requireUser } from '../../../../src/shared/http/require-auth-context';
import type { AuthContext } from '../../../../src/shared/http/auth-context';
import { AuthErrors } from '../../../../src/modules/auth/auth.errors';

function makeReq(authContext: AuthContext | null): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

function catchAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

const alice = { id: 'usr_1', name: 'alice', email: 'alice@example.com' };

describe('requireUser', () => {
  it('returns the resolved user', () => {
    expect(requireUser(makeReq({ user: alice, failure: null }))).toEqual(alice);
  });

  it('throws 401 Not authenticated when no context is present', () => {
    const e = catchAppError(() => requireUser(makeReq(null)));

    expect(e.status).toBe(401);
    expect(e.code).toBe('UNAUTHORIZED');
    expect(e.message).toBe('Not authenticated');
    expect(e.headers).toEqual({ 'WWW-Authenticate': 'Bearer' });
  });

  it('throws 401 Not authenticated when no token was presented', () => {
    const e = catchAppError(() => requireUser(makeReq({ user: null, failure: null })));

    expect(e.code).toBe('UNAUTHORIZED');
  });

  it('rethrows the recorded failure for a rejected token', () => {
    const failure = AuthErrors.invalidToken({ reason: 'expired' });

    const e = catchAppError(() => requireUser(makeReq({ user: null, failure })));

    expect(e).toBe(failure);
    expect(e.status).toBe(401);
    expect(e.message).toBe('Could not validate credentials');
  });
});
