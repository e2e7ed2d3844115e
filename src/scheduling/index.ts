// Scheduling module — schedule entity, store, materializer, and polling scheduler
export type {
  ScheduleType,
  ScheduleStatus,
  CommandTemplate,
  Schedule,
  ScheduleCreateInput,
  SerializedSchedule,
} from './types.js';

export {
  applyDispatchFailure,
  applySuccessfulCycle,
  computeNextRun,
  createSchedule,
  describeSchedule,
  expireIfEnded,
  isDue,
  isTerminalSchedule,
  pauseSchedule,
  resumeSchedule,
  serializeSchedule,
  validateCron,
} from './schedule.js';

export { createInMemoryScheduleStore } from './schedule-store.js';
export type { ScheduleStore } from './schedule-store.js';

export { createTemplateMaterializer } from './materializer.js';
export type { CommandMaterializer, TemplateMaterializerOptions } from './materializer.js';

export { createScheduler } from './scheduler.js';
export type { Scheduler, SchedulerOptions, SchedulerStats, TickSummary } from './scheduler.js';
