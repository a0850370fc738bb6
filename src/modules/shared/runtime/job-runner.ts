/**
 * JOB RUNNER
 * ==========
 *
 * Runs background work as observable jobs.
 *
 * Each submitted job gets an id, a status, and on failure the terminal error.
 * Callers poll `get(id)`, await `waitFor(id)` or subscribe with `onSettled`.
 * Running jobs can be cancelled through their AbortSignal.
 */

import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../../../common/clock.js';
import { ConflictError, NotFoundError, toAppError, type ErrorCode } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type JobStatus = 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

export interface JobRecord<R> {
  id: string;
  name: string;
  status: JobStatus;
  submittedAt: string;
  finishedAt?: string;
  durationMs?: number;
  result?: R;
  error?: { code: ErrorCode; message: string };
}

export type JobTask<R> = (signal: AbortSignal) => Promise<R>;
export type JobListener<R> = (job: JobRecord<R>) => void;

export interface JobRunnerOptions {
  /** Finished jobs kept for polling */
  historyLimit?: number;
  clock?: Clock;
  logger?: Logger;
}

interface JobSlot<R> {
  record: JobRecord<R>;
  controller: AbortController;
  done: Promise<JobRecord<R>>;
}

// ═══════════════════════════════════════════════════════════════
// RUNNER
// ═══════════════════════════════════════════════════════════════

export class JobRunner<R> {
  private readonly jobs = new Map<string, JobSlot<R>>();
  private readonly listeners = new Set<JobListener<R>>();
  private readonly historyLimit: number;
  private readonly clock: Clock;

  constructor(private readonly options: JobRunnerOptions = {}) {
    this.historyLimit = options.historyLimit ?? 50;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Starts the task and returns its record immediately.
   */
  submit(name: string, task: JobTask<R>): JobRecord<R> {
    const record: JobRecord<R> = {
      id: uuidv4(),
      name,
      status: 'RUNNING',
      submittedAt: this.clock.utcNow().toISOString(),
    };
    const controller = new AbortController();
    const done = this.execute(record, controller.signal, task);

    this.jobs.set(record.id, { record, controller, done });
    this.options.logger?.info({ jobId: record.id, name }, 'Job submitted');
    return { ...record };
  }

  get(id: string): JobRecord<R> | null {
    const slot = this.jobs.get(id);
    return slot ? { ...slot.record } : null;
  }

  /** Newest first */
  list(limit = 20): JobRecord<R>[] {
    return [...this.jobs.values()]
      .map((slot) => ({ ...slot.record }))
      .reverse()
      .slice(0, limit);
  }

  running(): JobRecord<R>[] {
    return this.list(this.jobs.size).filter((job) => job.status === 'RUNNING');
  }

  async waitFor(id: string): Promise<JobRecord<R>> {
    const slot = this.jobs.get(id);
    if (!slot) throw new NotFoundError(`Job ${id} not found`);
    return slot.done;
  }

  cancel(id: string): JobRecord<R> {
    const slot = this.jobs.get(id);
    if (!slot) throw new NotFoundError(`Job ${id} not found`);
    if (slot.record.status !== 'RUNNING') {
      throw new ConflictError(`Job ${id} already finished with status ${slot.record.status}`);
    }
    slot.controller.abort();
    return { ...slot.record };
  }

  /** Cancels every running job; used on shutdown */
  cancelAll(): void {
    for (const slot of this.jobs.values()) {
      if (slot.record.status === 'RUNNING') slot.controller.abort();
    }
  }

  /** Resolves once every job running at call time has settled */
  async drain(): Promise<void> {
    const pending = [...this.jobs.values()]
      .filter((slot) => slot.record.status === 'RUNNING')
      .map((slot) => slot.done);
    await Promise.all(pending);
  }

  /** Returns an unsubscribe function */
  onSettled(listener: JobListener<R>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async execute(record: JobRecord<R>, signal: AbortSignal, task: JobTask<R>): Promise<JobRecord<R>> {
    const startedAt = this.clock.now();

    try {
      // Yield once so submit() registers the slot before the task runs
      await Promise.resolve();
      record.result = await task(signal);
      record.status = 'SUCCEEDED';
    } catch (err) {
      const error = toAppError(err);
      record.status = signal.aborted || error.code === 'CANCELLED' ? 'CANCELLED' : 'FAILED';
      record.error = { code: error.code, message: error.message };
      if (record.status === 'FAILED') {
        this.options.logger?.error({ jobId: record.id, name: record.name, code: error.code, error: error.message }, 'Job failed');
      }
    }

    record.finishedAt = this.clock.utcNow().toISOString();
    record.durationMs = this.clock.now() - startedAt;
    this.options.logger?.info(
      { jobId: record.id, name: record.name, status: record.status, durationMs: record.durationMs },
      'Job settled'
    );

    this.notify(record);
    this.prune();
    return { ...record };
  }

  private notify(record: JobRecord<R>): void {
    for (const listener of this.listeners) {
      try {
        listener({ ...record });
      } catch (err) {
        this.options.logger?.warn({ jobId: record.id, error: toAppError(err).message }, 'Job listener threw');
      }
    }
  }

  private prune(): void {
    const finished = [...this.jobs.values()].filter((slot) => slot.record.status !== 'RUNNING');
    const excess = finished.length - this.historyLimit;
    for (let i = 0; i < excess; i++) {
      this.jobs.delete(finished[i].record.id);
    }
  }
}
