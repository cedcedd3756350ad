/**
 * AdFeed — Scheduler Module
 */

export {
  JobScheduler,
  DEFAULT_FIRST_RUN_DELAY_MS,
  type SchedulerState,
  type CycleTrigger,
  type CycleSkip,
  type JobSchedulerConfig,
} from './scheduler';
export {
  runCycle,
  delay,
  jitterMs,
  CycleAbortedError,
  DEFAULT_JITTER,
  type CycleReport,
  type TargetReport,
  type CycleDependencies,
  type CycleOptions,
  type JitterRange,
} from './cycle';
