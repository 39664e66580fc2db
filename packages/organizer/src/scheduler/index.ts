export {
  TaskScheduler,
  DEFAULT_SHUTDOWN_GRACE_MS,
  type ScheduledJob,
  type TaskSchedulerConfig,
  type FamilyStatus,
  type SchedulerStopResult,
} from './taskScheduler.js';
