/**
 * src/modules/databases/database.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const DatabaseErrors = {
  /** Missing OR owned by someone else; the two are indistinguishable. */
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Database not found', meta);
  },
} as const;
