import { v4 as uuidv4 } from 'uuid';
import type { PrintJob, PrintJobSource, PrintJobStatus, PrintRequest } from '../models/print-job.model';
import type { PrintErrorCode } from '../utils/errors';
import { logger } from '../utils/logger';

/** In-memory job records with 1-hour auto-expiry */
const jobs = new Map<string, PrintJob>();

const JOB_TTL_MS = 60 * 60 * 1000; // 1 hour

const FINAL_STATUSES: readonly PrintJobStatus[] = ['done', 'failed'];

/** Create a new job record in the idle state */
export function createJob(source: PrintJobSource, request: PrintRequest): PrintJob {
  const job: PrintJob = {
    id: uuidv4(),
    status: 'idle',
    source,
    mode: request.qr === undefined ? 'text' : 'qr',
    createdAt: new Date(),
  };

  jobs.set(job.id, job);
  scheduleCleanup(job.id);
  logger.debug({ jobId: job.id, source, mode: job.mode }, 'Print job created');
  return job;
}

/** Move a job to a new state */
export function updateJobStatus(
  jobId: string,
  status: PrintJobStatus,
  details: {
    readonly printer?: string;
    readonly bytes?: number;
    readonly error?: { readonly code: PrintErrorCode; readonly message: string };
  } = {}
): PrintJob | undefined {
  const job = jobs.get(jobId);
  if (!job) return undefined;

  const updated: PrintJob = {
    ...job,
    ...details,
    status,
    completedAt: FINAL_STATUSES.includes(status) ? new Date() : undefined,
  };

  jobs.set(jobId, updated);
  logger.debug({ jobId, status }, 'Job status updated');
  return updated;
}

/** Get a job by ID */
export function getJob(jobId: string): PrintJob | undefined {
  return jobs.get(jobId);
}

/** Get all jobs (most recent first) */
export function getAllJobs(limit = 50): PrintJob[] {
  return Array.from(jobs.values())
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
    .slice(0, limit);
}

/** Drop every record; used between tests */
export function clearJobs(): void {
  jobs.clear();
}

function scheduleCleanup(jobId: string): void {
  const timer = setTimeout(() => {
    if (jobs.has(jobId)) {
      jobs.delete(jobId);
      logger.debug({ jobId }, 'Expired job cleaned up');
    }
  }, JOB_TTL_MS);
  timer.unref();
}

/** Get queue stats */
export function getQueueStats() {
  const all = Array.from(jobs.values());
  const finished = (status: PrintJobStatus) => all.filter((j) => j.status === status).length;
  return {
    total: all.length,
    active: all.filter((j) => !FINAL_STATUSES.includes(j.status)).length,
    done: finished('done'),
    failed: finished('failed'),
  };
}
