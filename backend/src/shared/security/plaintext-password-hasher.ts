/**
 * backend/src/shared/security/plaintext-password-hasher.ts
 *
 * WHY:
 * - Existing user rows store the password exactly as registered.
 *   Verification is a direct equality check against that value.
 *
 * SECURITY:
 * - No hashing and no constant-time comparison. Set PASSWORD_STORAGE=bcrypt
 *   for new deployments; see BcryptPasswordHasher.
 */

import type { PasswordHasher } from './password-hasher';

export class PlaintextPasswordHasher implements PasswordHasher {
  async hash(plain: string): Promise<string> {
    return plain;
  }

  async verify(plain: string, stored: string): Promise<boolean> {
    return plain === stored;
  }
}
