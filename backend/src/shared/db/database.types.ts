/**
 * backend/src/shared/db/database.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the whole schema, kept beside the migrations
 *   that create them.
 *
 * RULES:
 * - Keep aligned with src/shared/db/migrations (same column names, snake_case).
 * - Ids are UUIDs generated by the application, not by the database.
 * - Schedule times are ISO-8601 strings (UTC, normalised on write).
 */

export interface Users {
  id: string;
  name: string;
  email: string;
  /** Stored as produced by the configured PasswordHasher (plain or bcrypt). */
  password: string;
}

export interface Databases {
  id: string;
  name: string;
  owner: string;
}

export interface Schedules {
  id: string;
  owner: string;
  database_id: string | null;
  title: string;
  description: string | null;
  starts_at: string;
  ends_at: string;
}

export interface DB {
  users: Users;
  databases: Databases;
  schedules: Schedules;
}
