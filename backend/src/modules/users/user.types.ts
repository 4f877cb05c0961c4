/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module (the credential store).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - `User` is the public shape and never carries the stored password.
 *   `UserCredentials` does, and must not leave the auth module.
 */

export type UserId = string;

export type User = {
  id: UserId;
  name: string;
  email: string;
};

export type UserCredentials = User & {
  password: string;
};
