export {
  ReconciliationSweepJob,
  type ReconciliationSweepDeps,
  type ReconciliationSweepOptions,
} from './ReconciliationSweepJob.js';
export {
  ExpiryReminderJob,
  type ExpiryReminderDeps,
  type ExpiryReminderOptions,
  type ExpiryReminderStats,
} from './ExpiryReminderJob.js';
export { JobScheduler, type ScheduledJob, type JobSchedulerOptions } from './JobScheduler.js';
