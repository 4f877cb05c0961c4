/**
 * src/shared/security/access-token.ts
 *
 * WHY:
 * - Stateless bearer tokens: a signed JWT carrying the subject (user email)
 *   and an absolute expiry. Nothing is stored server-side, so there is no
 *   revocation; a token is valid until `exp`.
 * - The signing secret is process-wide config, handed in once by the
 *   composition root and never rotated within a run.
 *
 * HOW TO USE:
 * - const tokens = new AccessTokenService({ secret, ttlSeconds: 1800 })
 * - const token = tokens.issue('alice@example.com')
 * - const sub = tokens.validate(token)   // throws InvalidTokenError
 *
 * RULES:
 * - HS256 only. `alg` in the header is never trusted for verification.
 * - Callers must treat every InvalidTokenError the same (401), whatever the reason.
 */

import jwt from 'jsonwebtoken';

export const ACCESS_TOKEN_ALGORITHM = 'HS256';
export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 30 * 60;

export type InvalidTokenReason = 'malformed' | 'bad_signature' | 'expired' | 'missing_subject';

export class InvalidTokenError extends Error {
  constructor(public readonly reason: InvalidTokenReason) {
    super('Invalid access token');
    this.name = 'InvalidTokenError';
  }
}

export type AccessTokenClock = () => number;

export class AccessTokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: AccessTokenClock;

  constructor(opts: { secret: string; ttlSeconds?: number; now?: AccessTokenClock }) {
    this.secret = opts.secret;
    this.ttlSeconds = opts.ttlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
    this.now = opts.now ?? Date.now;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  issue(subject: string, ttlSeconds: number = this.ttlSeconds): string {
    const iat = this.nowSeconds();

    return jwt.sign({ sub: subject, iat, exp: iat + ttlSeconds }, this.secret, {
      algorithm: ACCESS_TOKEN_ALGORITHM,
    });
  }

  /** Verifies signature + expiry and returns the subject claim. */
  validate(token: string): string {
    let payload: string | jwt.JwtPayload;

    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [ACCESS_TOKEN_ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (err: unknown) {
      if (err instanceof jwt.TokenExpiredError) throw new InvalidTokenError('expired');
      if (err instanceof jwt.JsonWebTokenError) {
        throw new InvalidTokenError(
          err.message === 'invalid signature' ? 'bad_signature' : 'malformed',
        );
      }
      throw err;
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || !payload.sub) {
      throw new InvalidTokenError('missing_subject');
    }

    return payload.sub;
  }
}
