/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

/**
 * An identifier matching this is looked up as an email; anything else is a
 * user name.
 */
export const EMAIL_IDENTIFIER_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;

export const TOKEN_TYPE = 'Bearer';
