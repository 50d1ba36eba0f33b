/**
 * Cron Scheduler
 *
 * Schedules jobs by cron expression. node-cron fires the triggers,
 * cron-parser computes next-run times. Each job has its own handler; the
 * gateway uses it for configured `cron:<id>` submissions and for the daily
 * session-reset sweep.
 */

import cron, { type ScheduledTask } from 'node-cron';
import cronParser from 'cron-parser';
import { DebugLogger, type Logger } from '@laneway/core/debug-logger';

import { JobLock } from './job-lock.js';
import type {
  CronJob,
  JobConfig,
  JobEvent,
  JobEventHandler,
  JobHandler,
  JobResult,
  SchedulerOptions,
} from './types.js';
import { SchedulerError } from './types.js';

interface InternalJob extends CronJob {
  task?: ScheduledTask;
  handler: JobHandler;
}

export class CronScheduler {
  private readonly jobs = new Map<string, InternalJob>();
  private readonly lock = new JobLock();
  private readonly timezone: string;
  private readonly eventHandlers: JobEventHandler[] = [];
  private readonly logger: Logger;

  constructor(options: SchedulerOptions = {}, logger: Logger = new DebugLogger('CronScheduler')) {
    this.timezone = options.timezone ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
    this.logger = logger;
  }

  /**
   * Register a job
   *
   * @returns Job ID
   * @throws SchedulerError if the cron expression is invalid or the id is taken
   */
  addJob(config: JobConfig, handler: JobHandler): string {
    if (this.jobs.has(config.id)) {
      throw new SchedulerError(`Job already exists: ${config.id}`, 'JOB_EXISTS');
    }
    if (!cron.validate(config.cronExpr)) {
      throw new SchedulerError(`Invalid cron expression: ${config.cronExpr}`, 'INVALID_CRON');
    }

    const enabled = config.enabled ?? true;
    const job: InternalJob = {
      ...config,
      enabled,
      isRunning: false,
      nextRun: enabled ? this.calculateNextRun(config.cronExpr) : undefined,
      handler,
    };

    job.task = cron.schedule(
      config.cronExpr,
      () => {
        this.trigger(config.id);
      },
      {
        scheduled: enabled,
        timezone: this.timezone,
      }
    );

    this.jobs.set(config.id, job);
    this.logger.debug(`Job added: ${config.id} (${config.cronExpr})`);
    return config.id;
  }

  /**
   * @throws SchedulerError if job not found
   */
  removeJob(jobId: string): void {
    const job = this.requireJob(jobId);
    job.task?.stop();
    this.lock.release(jobId);
    this.jobs.delete(jobId);
  }

  /**
   * @throws SchedulerError if job not found
   */
  enableJob(jobId: string): void {
    const job = this.requireJob(jobId);
    job.task?.start();
    job.enabled = true;
    job.nextRun = this.calculateNextRun(job.cronExpr);
  }

  /**
   * @throws SchedulerError if job not found
   */
  disableJob(jobId: string): void {
    const job = this.requireJob(jobId);
    job.task?.stop();
    job.enabled = false;
    job.nextRun = undefined;
  }

  /**
   * Execute a job immediately, outside its schedule
   *
   * @throws SchedulerError if job not found
   */
  async runNow(jobId: string): Promise<JobResult> {
    this.requireJob(jobId);
    return this.executeJob(jobId);
  }

  getJob(jobId: string): CronJob | null {
    const job = this.jobs.get(jobId);
    return job ? this.toPublicJob(job) : null;
  }

  listJobs(): CronJob[] {
    return Array.from(this.jobs.values()).map((job) => this.toPublicJob(job));
  }

  isJobRunning(jobId: string): boolean {
    return this.lock.isLocked(jobId);
  }

  onEvent(handler: JobEventHandler): void {
    this.eventHandlers.push(handler);
  }

  /**
   * Next fire time of a cron expression in the scheduler's timezone
   *
   * @throws SchedulerError (INVALID_CRON) if the expression cannot be parsed
   */
  calculateNextRun(cronExpr: string, from: Date = new Date()): Date {
    try {
      const interval = cronParser.parseExpression(cronExpr, {
        currentDate: from,
        tz: this.timezone,
      });
      return interval.next().toDate();
    } catch (error) {
      throw new SchedulerError(
        `Invalid cron expression: ${cronExpr}`,
        'INVALID_CRON',
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Stop all jobs and clean up
   */
  shutdown(): void {
    for (const [jobId, job] of this.jobs) {
      job.task?.stop();
      this.lock.release(jobId);
    }
    this.jobs.clear();
  }

  static validate(cronExpr: string): boolean {
    return cron.validate(cronExpr);
  }

  private requireJob(jobId: string): InternalJob {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new SchedulerError(`Job not found: ${jobId}`, 'JOB_NOT_FOUND');
    }
    return job;
  }

  /**
   * Timer callback; executeJob never rejects for a registered job
   */
  private trigger(jobId: string): void {
    this.executeJob(jobId).catch((error: unknown) => {
      this.logger.error(`Scheduled run of ${jobId} failed:`, error);
    });
  }

  private async executeJob(jobId: string): Promise<JobResult> {
    const job = this.requireJob(jobId);

    if (!this.lock.acquire(jobId)) {
      const now = new Date();
      this.emitEvent({ type: 'skipped', jobId, timestamp: now, reason: 'Job is already running' });
      return {
        success: false,
        startedAt: now,
        completedAt: now,
        duration: 0,
        error: 'Job is already running',
      };
    }

    const startedAt = new Date();
    job.isRunning = true;
    job.lastRun = startedAt;
    this.emitEvent({ type: 'started', jobId, timestamp: startedAt });

    const result = await this.invoke(job, startedAt);

    job.isRunning = false;
    job.lastResult = result;
    job.nextRun = job.enabled ? this.calculateNextRun(job.cronExpr) : undefined;
    this.lock.release(jobId);

    this.emitEvent({
      type: result.success ? 'completed' : 'failed',
      jobId,
      timestamp: result.completedAt,
      result,
    });
    return result;
  }

  private async invoke(job: InternalJob, startedAt: Date): Promise<JobResult> {
    try {
      const output = await job.handler(this.toPublicJob(job));
      const completedAt = new Date();
      return {
        success: true,
        startedAt,
        completedAt,
        duration: completedAt.getTime() - startedAt.getTime(),
        output: typeof output === 'string' ? output : undefined,
      };
    } catch (error) {
      const completedAt = new Date();
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Job ${job.id} failed: ${message}`);
      return {
        success: false,
        startedAt,
        completedAt,
        duration: completedAt.getTime() - startedAt.getTime(),
        error: message,
      };
    }
  }

  private toPublicJob(job: InternalJob): CronJob {
    const { task: _task, handler: _handler, ...publicJob } = job;
    return publicJob;
  }

  private emitEvent(event: JobEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn(`Job event handler threw (${event.type}):`, error);
      }
    }
  }
}
