/**
 * Cron scheduling for jobs and session maintenance
 */

export { CronScheduler } from './cron-scheduler.js';
export { JobLock, type LockInfo } from './job-lock.js';
export {
  SchedulerError,
  type CronJob,
  type JobConfig,
  type JobEvent,
  type JobEventHandler,
  type JobEventType,
  type JobHandler,
  type JobResult,
  type JobStatus,
  type SchedulerErrorCode,
  type SchedulerOptions,
} from './types.js';
