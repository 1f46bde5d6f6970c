/**
 * Print Coordinator: runs one request through
 *   idle -> resolving -> composing -> encoding -> delivering -> done | failed
 * while holding the process-wide JobLock.
 *
 * BLE jobs get a wall-clock deadline; when it fires the job is aborted and
 * reported as TimeoutError. The lock is released once the transport has
 * closed the link, or after a short grace period. The printer may be left
 * mid-label. Serial jobs run without an engine deadline.
 *
 * Errors never escape: every failure becomes a PrintOutcome plus one log line.
 */

import type { TargetSpec } from '../models/device-profile.model';
import type { PrintJob, PrintJobSource, PrintRequest } from '../models/print-job.model';
import { PrintError, TimeoutError, describeError, toPrintError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { RasterImage } from '../utils/raster';
import type { DeviceResolver } from './device-resolver.service';
import type { CommandEncoder } from './encoder.service';
import { createJob, updateJobStatus } from './job-queue.service';
import { JobLock } from './job-lock.service';
import { compose, type FontSource } from './layout.service';
import type { Transport } from './transport.service';

export const DEFAULT_BLE_DEADLINE_MS = 60_000;

/** How long a timed-out job may take to close its link before the lock is released anyway */
export const DEFAULT_ABANDON_GRACE_MS = 5_000;

export type PrintOutcome =
  | { readonly ok: true; readonly job: PrintJob }
  | { readonly ok: false; readonly job: PrintJob; readonly error: PrintError };

export type PreviewOutcome =
  | { readonly ok: true; readonly job: PrintJob; readonly image: RasterImage }
  | { readonly ok: false; readonly job: PrintJob; readonly error: PrintError };

export interface PrintCoordinatorDeps {
  readonly target: TargetSpec;
  readonly resolver: DeviceResolver;
  readonly encoder: CommandEncoder;
  readonly transport: Transport;
  readonly fontSource: FontSource;
  readonly deadlineMs?: number;
  readonly abandonGraceMs?: number;
  readonly lock?: JobLock;
}

export class PrintCoordinator {
  private readonly lock: JobLock;
  private readonly deadlineMs: number;
  private readonly abandonGraceMs: number;

  constructor(private readonly deps: PrintCoordinatorDeps) {
    this.lock = deps.lock ?? new JobLock();
    this.deadlineMs = deps.deadlineMs ?? DEFAULT_BLE_DEADLINE_MS;
    this.abandonGraceMs = deps.abandonGraceMs ?? DEFAULT_ABANDON_GRACE_MS;
  }

  get transportKind() {
    return this.deps.target.kind;
  }

  /** Compose, encode and deliver one request */
  async print(request: PrintRequest): Promise<PrintOutcome> {
    const job = createJob('print', request);

    return this.lock.runExclusive(async () => {
      try {
        const bytes = await this.withDeadline((signal) => this.runPrint(job.id, request, signal));
        const done = updateJobStatus(job.id, 'done') ?? job;
        logger.info({ jobId: job.id, printer: done.printer, bytes }, 'Print job completed');
        return { ok: true, job: done };
      } catch (err) {
        const failure = this.fail(job, 'print', err);
        return { ok: false, job: failure.job, error: failure.error };
      }
    });
  }

  /** Resolve and compose only; nothing is sent to the printer */
  async preview(request: PrintRequest): Promise<PreviewOutcome> {
    const job = createJob('preview', request);

    return this.lock.runExclusive(async () => {
      try {
        const image = await this.withDeadline((signal) => this.runPreview(job.id, request, signal));
        const done = updateJobStatus(job.id, 'done') ?? job;
        logger.info({ jobId: job.id, width: image.width, height: image.height }, 'Preview composed');
        return { ok: true, job: done, image };
      } catch (err) {
        const failure = this.fail(job, 'preview', err);
        return { ok: false, job: failure.job, error: failure.error };
      }
    });
  }

  private async runPreview(jobId: string, request: PrintRequest, signal?: AbortSignal): Promise<RasterImage> {
    updateJobStatus(jobId, 'resolving');
    const device = await this.deps.resolver.resolve(this.deps.target, signal);
    signal?.throwIfAborted();

    updateJobStatus(jobId, 'composing', { printer: device.profile.model });
    return compose(request.text, request.qr, device.profile.widthDots, this.deps.fontSource);
  }

  private async runPrint(jobId: string, request: PrintRequest, signal?: AbortSignal): Promise<number> {
    updateJobStatus(jobId, 'resolving');
    const device = await this.deps.resolver.resolve(this.deps.target, signal);
    signal?.throwIfAborted();

    updateJobStatus(jobId, 'composing', { printer: device.profile.model });
    const image = compose(request.text, request.qr, device.profile.widthDots, this.deps.fontSource);

    updateJobStatus(jobId, 'encoding');
    const bytes = this.deps.encoder.encode(image, device.profile);
    signal?.throwIfAborted();

    updateJobStatus(jobId, 'delivering', { bytes: bytes.length });
    await this.deps.transport.deliver(bytes, device, signal);
    return bytes.length;
  }

  /** Race BLE work against the deadline; serial work runs unbounded */
  private async withDeadline<T>(work: (signal?: AbortSignal) => Promise<T>): Promise<T> {
    if (this.deps.target.kind !== 'ble') {
      return work(undefined);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(this.deadlineMs);
        controller.abort(error);
        reject(error);
      }, this.deadlineMs);
    });

    const running = work(controller.signal);
    try {
      return await Promise.race([running, deadline]);
    } finally {
      clearTimeout(timer);
      if (controller.signal.aborted) {
        await this.settleAbandoned(running);
      }
    }
  }

  /**
   * Hold the lock until the abandoned work has stopped (and its transport has
   * closed the link), bounded by the grace period.
   */
  private async settleAbandoned(running: Promise<unknown>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => resolve('expired'), this.abandonGraceMs);
    });
    const stopped = running.then(
      () => 'finished' as const,
      (err: unknown) => {
        logger.debug({ error: describeError(err) }, 'Abandoned job stopped');
        return 'stopped' as const;
      },
    );

    try {
      const result = await Promise.race([stopped, grace]);
      if (result === 'expired') {
        logger.warn({ graceMs: this.abandonGraceMs }, 'Abandoned job still running; releasing the printer lock');
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(job: PrintJob, source: PrintJobSource, err: unknown): { job: PrintJob; error: PrintError } {
    const error = toPrintError(err);
    const failed = updateJobStatus(job.id, 'failed', {
      error: { code: error.code, message: error.message },
    }) ?? job;
    logger.error({ jobId: job.id, source, code: error.code, error: describeError(error) }, 'Print job failed');
    return { job: failed, error };
  }
}
