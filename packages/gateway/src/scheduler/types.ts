/**
 * Type definitions for the Cron Scheduler
 */

export type JobStatus = 'idle' | 'running' | 'completed' | 'failed';

/**
 * Job configuration for registration
 */
export interface JobConfig {
  /** Unique job identifier; also the `cron:<id>` session key suffix */
  id: string;
  /** Human-readable job name */
  name: string;
  /** Cron expression (e.g., "0/30 * * * *" for every 30 minutes) */
  cronExpr: string;
  /** Message body submitted on each run */
  body?: string;
  /** Whether job is enabled (default: true) */
  enabled?: boolean;
}

/**
 * Full job information including runtime state
 */
export interface CronJob extends JobConfig {
  enabled: boolean;
  isRunning: boolean;
  lastRun?: Date;
  nextRun?: Date;
  lastResult?: JobResult;
}

export interface JobResult {
  success: boolean;
  startedAt: Date;
  completedAt: Date;
  /** Duration in milliseconds */
  duration: number;
  error?: string;
  /** Whatever the handler returned, e.g. the submitted unit id */
  output?: string;
}

/**
 * Work done on every trigger of a job
 */
export type JobHandler = (job: CronJob) => Promise<string | void> | string | void;

export interface SchedulerOptions {
  /** Timezone for cron expressions (default: local) */
  timezone?: string;
}

export type JobEventType = 'started' | 'completed' | 'failed' | 'skipped';

export interface JobEvent {
  type: JobEventType;
  jobId: string;
  timestamp: Date;
  result?: JobResult;
  reason?: string;
}

export type JobEventHandler = (event: JobEvent) => void;

export type SchedulerErrorCode =
  | 'INVALID_CRON'
  | 'JOB_NOT_FOUND'
  | 'JOB_EXISTS'
  | 'JOB_RUNNING'
  | 'SCHEDULER_ERROR';

export class SchedulerError extends Error {
  constructor(
    message: string,
    public readonly code: SchedulerErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SchedulerError';
  }
}
