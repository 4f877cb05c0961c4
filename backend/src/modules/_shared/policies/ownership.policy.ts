/**
 * backend/src/modules/_shared/policies/ownership.policy.ts
 *
 * WHY:
 * - Every owned resource (database, schedule) answers to the same rule:
 *   only its recorded owner may act on it.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * HOW TO USE:
 * - Creation: stamp `owner = user.id` server-side (the rule holds by construction).
 * - Listing: filter by `owner = user.id`.
 * - Deleting: put `owner = user.id` in the DELETE itself.
 * - Acting on one existing resource: `authorize(user, resource.owner)`.
 */

import type { User } from '../../users';

export type OwnedResource = Readonly<{ owner: string }>;

export function authorize(user: Pick<User, 'id'>, resourceOwnerId: string): boolean {
  return user.id === resourceOwnerId;
}

/** Narrows a looked-up resource to "exists and belongs to user". */
export function isOwnedBy<R extends OwnedResource>(
  resource: R | undefined,
  user: Pick<User, 'id'>,
): resource is R {
  return resource !== undefined && authorize(user, resource.owner);
}
