/**
 * backend/test/setup-env.ts
 *
 * WHY:
 * - Tests never read backend/.env; every value they need is set here or passed
 *   to buildTestApp() directly.
 * - Keeps winston quiet unless something is actually broken.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
