/**
 * src/modules/databases/database.schemas.ts
 *
 * RULES:
 * - Unknown keys (`id`, `owner`) are stripped; both are set server-side.
 */

import { z } from 'zod';

export const createDatabaseSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
});

export type CreateDatabaseInput = z.infer<typeof createDatabaseSchema>;
