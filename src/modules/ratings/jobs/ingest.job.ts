/**
 * Ratings Ingest Job
 *
 * Entry points that start an ingestion run as a tracked job: the HTTP
 * trigger, the boot-time fill of an empty store, and an optional cron.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { ValidationError } from '../../../common/errors.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import type { JobRecord, JobRunner } from '../../shared/runtime/job-runner.js';
import type { IngestSummary } from '../contracts/ratings.contracts.js';
import type { RatingsIngestService } from '../ingest/ratings.ingest.service.js';
import type { RatingRepository } from '../storage/ratings.repository.js';

export const INGEST_JOB_NAME = 'ratings-ingest';

export interface IngestJobDeps {
  ingest: RatingsIngestService;
  repository: RatingRepository;
  runner: JobRunner<IngestSummary>;
  logger?: Logger;
}

export class RatingsIngestJob {
  private readonly logger: Logger;
  private cronTask: ScheduledTask | null = null;

  constructor(private readonly deps: IngestJobDeps) {
    this.logger = deps.logger ?? createLogger('ingest-job');
  }

  /**
   * Fire-and-forget: returns the job record at once, the run continues in the
   * background and is observable through the runner.
   */
  trigger(source: 'api' | 'boot' | 'cron' = 'api'): JobRecord<IngestSummary> {
    const job = this.deps.runner.submit(INGEST_JOB_NAME, (signal) => this.deps.ingest.ingestAll(signal));
    this.logger.info({ jobId: job.id, source }, 'Ingestion triggered');
    return job;
  }

  /**
   * Starts a run only when nothing is stored yet.
   */
  async triggerIfEmpty(): Promise<JobRecord<IngestSummary> | null> {
    const stored = await this.deps.repository.count();
    if (stored > 0) {
      this.logger.info({ stored }, 'Ratings present, skipping boot ingestion');
      return null;
    }
    return this.trigger('boot');
  }

  start(expression: string): void {
    if (this.cronTask) {
      this.logger.warn({ expression }, 'Ingest cron already running');
      return;
    }
    if (!cron.validate(expression)) {
      throw new ValidationError(`Invalid INGEST_CRON expression "${expression}"`);
    }

    this.cronTask = cron.schedule(
      expression,
      () => {
        if (this.deps.runner.running().some((job) => job.name === INGEST_JOB_NAME)) {
          this.logger.info({}, 'Ingestion still running, skipping scheduled run');
          return;
        }
        this.trigger('cron');
      },
      { timezone: 'UTC' }
    );
    this.logger.info({ expression }, 'Ingest cron started');
  }

  stop(): void {
    if (this.cronTask) {
      this.cronTask.stop();
      this.cronTask = null;
      this.logger.info({}, 'Ingest cron stopped');
    }
  }

  getStatus(): { scheduled: boolean; running: number; last: JobRecord<IngestSummary> | null } {
    return {
      scheduled: this.cronTask !== null,
      running: this.deps.runner.running().length,
      last: this.deps.runner.list(1)[0] ?? null,
    };
  }
}
