import { z } from 'zod';

export const DEFAULT_JOB_LIST_LIMIT = 50;
export const MAX_JOB_LIST_LIMIT = 200;

/** GET /api/jobs query */
export const jobListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_JOB_LIST_LIMIT).default(DEFAULT_JOB_LIST_LIMIT),
});

export type JobListQuery = z.infer<typeof jobListQuerySchema>;
