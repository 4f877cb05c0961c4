/**
 * backend/src/shared/security/create-password-hasher.ts
 *
 * WHY:
 * - The composition root picks the storage scheme from config; nothing else
 *   should branch on it.
 */

import type { PasswordHasher, PasswordStorage } from './password-hasher';
import { PlaintextPasswordHasher } from './plaintext-password-hasher';
import { BcryptPasswordHasher } from './bcrypt-password-hasher';

export function createPasswordHasher(opts: {
  storage: PasswordStorage;
  bcryptCost: number;
}): PasswordHasher {
  switch (opts.storage) {
    case 'plain':
      return new PlaintextPasswordHasher();
    case 'bcrypt':
      return new BcryptPasswordHasher({ cost: opts.bcryptCost });
  }
}
