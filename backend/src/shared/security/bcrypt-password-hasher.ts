/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - The hashed storage mode (PASSWORD_STORAGE=bcrypt).
 * - Rows written under this mode hold a bcrypt hash; they never verify under
 *   the plain mode and plain rows never verify here.
 *
 * RULES:
 * - Cost comes from config (BCRYPT_COST); createPasswordHasher passes it in.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly opts: { cost: number }) {}

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.opts.cost);
  }

  async verify(plain: string, stored: string): Promise<boolean> {
    return bcrypt.compare(plain, stored);
  }
}
