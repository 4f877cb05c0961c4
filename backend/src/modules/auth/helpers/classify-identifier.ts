/**
 * backend/src/modules/auth/helpers/classify-identifier.ts
 *
 * WHY:
 * - Login accepts either an email or a user name in the same field.
 *   The shape of the identifier decides which lookup runs.
 */

import { EMAIL_IDENTIFIER_PATTERN } from '../auth.constants';
import type { IdentifierKind } from '../auth.types';

export function classifyIdentifier(identifier: string): IdentifierKind {
  return EMAIL_IDENTIFIER_PATTERN.test(identifier) ? 'email' : 'name';
}
