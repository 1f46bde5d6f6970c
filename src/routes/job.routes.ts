import { Router, Request, Response } from 'express';
import { getAllJobs, getJob, getQueueStats } from '../services/job-queue.service';
import { MAX_JOB_LIST_LIMIT, jobListQuerySchema } from '../validators/job.validator';

/** Read-only view of the in-memory job records */
export function createJobRouter(): Router {
  const router = Router();

  /** GET /api/jobs - Recent jobs, newest first */
  router.get('/', (req: Request, res: Response) => {
    const parsed = jobListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: `"limit" must be an integer from 1 to ${MAX_JOB_LIST_LIMIT}`,
      });
      return;
    }

    res.json({ success: true, data: getAllJobs(parsed.data.limit), stats: getQueueStats() });
  });

  /** GET /api/jobs/:id - One job record */
  router.get('/:id', (req: Request, res: Response) => {
    const job = getJob(req.params.id);
    if (!job) {
      res.status(404).json({ success: false, error: 'Job not found' });
      return;
    }
    res.json({ success: true, data: job });
  });

  return router;
}
