/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on an interface (DIP), not on a storage scheme directly.
 * - Two schemes exist: plaintext (stored as registered) and bcrypt.
 *   Switching changes what is stored, so existing rows only verify under the
 *   scheme they were written with.
 *
 * HOW TO USE:
 * - const stored = await hasher.hash(password)   // at registration
 * - const ok = await hasher.verify(password, stored)
 */

export type PasswordStorage = 'plain' | 'bcrypt';

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, stored: string): Promise<boolean>;
}
