/**
 * src/modules/schedules/schedule.schemas.ts
 *
 * RULES:
 * - Unknown keys (`id`, `owner`) are stripped; both are set server-side.
 * - Times must carry an explicit offset or `Z`.
 */

import { z } from 'zod';

const isoDateTime = z.string().datetime({ offset: true, message: 'Invalid ISO-8601 date-time' });

export const createScheduleSchema = z
  .object({
    title: z.string().trim().min(1, 'Title is required').max(200),
    description: z.string().max(2000).nullish(),
    startsAt: isoDateTime,
    endsAt: isoDateTime,
    databaseId: z.string().uuid('Invalid database id').nullish(),
  })
  .refine((v) => Date.parse(v.endsAt) >= Date.parse(v.startsAt), {
    message: 'endsAt must not be before startsAt',
    path: ['endsAt'],
  });

export type CreateScheduleInput = z.infer<typeof createScheduleSchema>;

export const deleteScheduleSchema = z.object({
  UUID: z.string().uuid('Invalid schedule id'),
});
