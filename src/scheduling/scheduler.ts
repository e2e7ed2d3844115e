/**
 * Scheduler — polling loop that fires due schedules through the Executor.
 *
 * One tick: complete schedules past their end time, start every due
 * schedule in registration order, wait for all of them to settle, then
 * drop completed and failed ones. Due schedules run side by side; each
 * one's bookkeeping is applied as soon as its own commands finish.
 * Within a schedule the template's commands run one after another; the
 * cycle counts as dispatched once every command produced a result,
 * whatever its exit code. Anything thrown on the way (materialization,
 * the safety gate, the executor itself) is a dispatch failure.
 *
 * `stop()` never waits on or cancels executions already handed to the
 * Executor. Shut the Executor down, then await `idle()`.
 */
import type { Logger } from '@/observability/logger.js';
import { DispatchError, InvalidStateError, errorMessage } from '@/core/errors.js';
import type { ScheduleId } from '@/core/types.js';
import type { Executor } from '@/execution/executor.js';
import type { ExecutionOutcome } from '@/execution/types.js';
import {
  applyDispatchFailure,
  applySuccessfulCycle,
  computeNextRun,
  createSchedule,
  expireIfEnded,
  isDue,
  isTerminalSchedule,
  pauseSchedule,
  resumeSchedule,
} from './schedule.js';
import { createInMemoryScheduleStore } from './schedule-store.js';
import type { ScheduleStore } from './schedule-store.js';
import { createTemplateMaterializer } from './materializer.js';
import type { CommandMaterializer } from './materializer.js';
import type { Schedule, ScheduleCreateInput, ScheduleStatus } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface SchedulerOptions {
  executor: Executor;
  logger: Logger;
  store?: ScheduleStore;
  /** Defaults to a template materializer with safe mode on. */
  materialize?: CommandMaterializer;
  /** Delay between ticks. Defaults to 1_000. */
  pollIntervalMs?: number;
  /** Delay after a tick that threw. Defaults to 5_000. */
  errorBackoffMs?: number;
  /** Invoked once per command result. Errors it throws are logged. */
  onExecution?: (schedule: Schedule, outcome: ExecutionOutcome) => void;
  /** Clock. Defaults to `() => new Date()`. */
  now?: () => Date;
}

export interface TickSummary {
  /** Schedules found due this tick. */
  due: number;
  dispatched: number;
  dispatchFailures: number;
  /** Active schedules completed because their end time passed. */
  expired: number;
  /** Terminal schedules dropped at the end of the tick. */
  removed: number;
}

export interface SchedulerStats {
  running: boolean;
  total: number;
  byStatus: Record<ScheduleStatus, number>;
  /** Soonest `nextRun` among active schedules. */
  nextExecution?: Date;
}

export interface Scheduler {
  /**
   * Register a schedule, building it first when given create input.
   * Active schedules get `nextRun` recomputed.
   * @throws ValidationError for invalid input
   * @throws InvalidStateError for a terminal or already registered schedule
   */
  add(schedule: Schedule | ScheduleCreateInput): Schedule;
  /** Idempotent. True when something was removed. */
  remove(id: ScheduleId): boolean;
  /** active → paused. False when the schedule is missing or not active. */
  pause(id: ScheduleId): boolean;
  /** paused → active. False when the schedule is missing or not paused. */
  resume(id: ScheduleId): boolean;
  get(id: ScheduleId): Schedule | undefined;
  list(): Schedule[];
  getStats(): SchedulerStats;
  getDueSchedules(now?: Date): Schedule[];
  /** Run one polling pass. Concurrent calls share the pass in progress. */
  tick(): Promise<TickSummary>;
  /** Start the polling loop. No-op when already running. */
  start(): void;
  /** Stop the polling loop. Returns at once; the tick in progress keeps running. */
  stop(): void;
  /** Settles once the tick in progress, if any, has finished. */
  idle(): Promise<void>;
  isRunning(): boolean;
}

// ─── Helpers ────────────────────────────────────────────────────

const DEFAULT_POLL_INTERVAL_MS = 1_000;
const DEFAULT_ERROR_BACKOFF_MS = 5_000;

function isSchedule(value: Schedule | ScheduleCreateInput): value is Schedule {
  return 'id' in value;
}

function emptyStatusCounts(): Record<ScheduleStatus, number> {
  return { active: 0, inactive: 0, paused: 0, completed: 0, failed: 0 };
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a Scheduler. The loop does not run until `start()`. */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const {
    executor,
    logger,
    store = createInMemoryScheduleStore(),
    materialize = createTemplateMaterializer(),
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    errorBackoffMs = DEFAULT_ERROR_BACKOFF_MS,
    onExecution,
    now = (): Date => new Date(),
  } = options;

  let running = false;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let activeTick: Promise<TickSummary> | null = null;
  let loopIteration: Promise<void> | null = null;

  function getDueSchedules(at: Date = now()): Schedule[] {
    return store.list().filter((schedule) => isDue(schedule, at));
  }

  function notify(schedule: Schedule, outcome: ExecutionOutcome): void {
    if (!onExecution) return;
    try {
      onExecution(schedule, outcome);
    } catch (error) {
      logger.error('Execution listener failed', {
        component: 'scheduler',
        scheduleId: schedule.id,
        error: errorMessage(error),
      });
    }
  }

  /** Run every command of one due schedule, in template order. */
  async function dispatch(schedule: Schedule): Promise<void> {
    const commands = materialize(schedule);
    for (const command of commands) {
      const { completion } = executor.start(command);
      const outcome = await completion;
      notify(schedule, outcome);
    }
  }

  /** Dispatch one schedule and store the resulting transition. True on success. */
  async function runCycle(schedule: Schedule): Promise<boolean> {
    logger.info('Executing schedule', {
      component: 'scheduler',
      scheduleId: schedule.id,
      name: schedule.name,
    });

    let dispatched: boolean;
    try {
      await dispatch(schedule);
      dispatched = true;
    } catch (error) {
      const dispatchError = new DispatchError(
        schedule.id,
        errorMessage(error),
        error instanceof Error ? error : undefined,
      );
      logger.error(dispatchError.message, {
        component: 'scheduler',
        scheduleId: schedule.id,
        retryCount: schedule.retryCount,
        maxRetries: schedule.maxRetries,
      });
      dispatched = false;
    }

    // Re-read: the schedule may have been paused or removed while its commands ran.
    const current = store.get(schedule.id);
    if (!current) {
      logger.debug('Schedule removed during its cycle, dropping update', {
        component: 'scheduler',
        scheduleId: schedule.id,
      });
      return dispatched;
    }

    const completedAt = now();
    const next = dispatched
      ? applySuccessfulCycle(current, completedAt)
      : applyDispatchFailure(current, completedAt);
    store.replace(next);

    if (next.status === 'completed') {
      logger.info('Schedule completed', {
        component: 'scheduler',
        scheduleId: next.id,
        executionCount: next.executionCount,
      });
    } else if (next.status === 'failed') {
      logger.error('Schedule failed after max retries', {
        component: 'scheduler',
        scheduleId: next.id,
        maxRetries: next.maxRetries,
      });
    }

    return dispatched;
  }

  async function runTick(): Promise<TickSummary> {
    const summary: TickSummary = { due: 0, dispatched: 0, dispatchFailures: 0, expired: 0, removed: 0 };
    const tickStartedAt = now();

    for (const schedule of store.list()) {
      const expired = expireIfEnded(schedule, tickStartedAt);
      if (expired !== schedule && store.replace(expired)) {
        summary.expired++;
        logger.info('Schedule passed its end time', {
          component: 'scheduler',
          scheduleId: schedule.id,
        });
      }
    }

    const due = getDueSchedules(tickStartedAt);
    summary.due = due.length;

    // Each cycle starts its first command synchronously, so launch order is FIFO.
    const cycles = await Promise.allSettled(due.map((schedule) => runCycle(schedule)));
    cycles.forEach((cycle, index) => {
      if (cycle.status === 'fulfilled' && cycle.value) {
        summary.dispatched++;
        return;
      }
      summary.dispatchFailures++;
      if (cycle.status === 'rejected') {
        logger.error('Schedule cycle bookkeeping failed', {
          component: 'scheduler',
          scheduleId: due[index]?.id,
          error: errorMessage(cycle.reason),
        });
      }
    });

    for (const schedule of store.list()) {
      if (isTerminalSchedule(schedule.status) && store.delete(schedule.id)) {
        summary.removed++;
      }
    }

    if (summary.due > 0 || summary.removed > 0) {
      logger.debug('Scheduler tick finished', { component: 'scheduler', ...summary });
    }
    return summary;
  }

  function tick(): Promise<TickSummary> {
    if (activeTick) return activeTick;
    activeTick = runTick().finally(() => {
      activeTick = null;
    });
    return activeTick;
  }

  async function iterate(): Promise<void> {
    let delay = pollIntervalMs;
    try {
      await tick();
    } catch (error) {
      logger.error('Scheduler tick failed, backing off', {
        component: 'scheduler',
        error: errorMessage(error),
        errorBackoffMs,
      });
      delay = errorBackoffMs;
    }
    loopIteration = null;
    if (running) scheduleNext(delay);
  }

  function scheduleNext(delay: number): void {
    timer = setTimeout(() => {
      timer = null;
      loopIteration = iterate();
    }, delay);
  }

  return {
    add(input: Schedule | ScheduleCreateInput): Schedule {
      const schedule = isSchedule(input) ? input : createSchedule(input, { now: now() });

      if (isTerminalSchedule(schedule.status)) {
        throw new InvalidStateError(
          `Cannot register schedule in status '${schedule.status}'`,
          { scheduleId: schedule.id, currentStatus: schedule.status },
        );
      }
      if (store.get(schedule.id)) {
        throw new InvalidStateError(`Schedule ${schedule.id} is already registered`, {
          scheduleId: schedule.id,
        });
      }

      const registered = schedule.status === 'active'
        ? { ...schedule, nextRun: computeNextRun(schedule, now()) }
        : schedule;
      store.insert(registered);

      logger.info('Schedule added', {
        component: 'scheduler',
        scheduleId: registered.id,
        name: registered.name,
        scheduleType: registered.scheduleType,
        nextRun: registered.nextRun?.toISOString(),
      });
      return registered;
    },

    remove(id: ScheduleId): boolean {
      const removed = store.delete(id);
      if (removed) {
        logger.info('Schedule removed', { component: 'scheduler', scheduleId: id });
      }
      return removed;
    },

    pause(id: ScheduleId): boolean {
      const schedule = store.get(id);
      if (!schedule) return false;
      const paused = pauseSchedule(schedule, now());
      if (paused === schedule) return false;
      store.replace(paused);
      logger.info('Schedule paused', { component: 'scheduler', scheduleId: id });
      return true;
    },

    resume(id: ScheduleId): boolean {
      const schedule = store.get(id);
      if (!schedule) return false;
      const resumed = resumeSchedule(schedule, now());
      if (resumed === schedule) return false;
      store.replace(resumed);
      logger.info('Schedule resumed', {
        component: 'scheduler',
        scheduleId: id,
        nextRun: resumed.nextRun?.toISOString(),
      });
      return true;
    },

    get(id: ScheduleId): Schedule | undefined {
      return store.get(id);
    },

    list(): Schedule[] {
      return store.list();
    },

    getStats(): SchedulerStats {
      const schedules = store.list();
      const byStatus = emptyStatusCounts();
      let nextExecution: Date | undefined;

      for (const schedule of schedules) {
        byStatus[schedule.status]++;
        if (schedule.status === 'active' && schedule.nextRun) {
          if (!nextExecution || schedule.nextRun < nextExecution) {
            nextExecution = schedule.nextRun;
          }
        }
      }

      return { running, total: schedules.length, byStatus, nextExecution };
    },

    getDueSchedules,

    tick,

    start(): void {
      if (running) return;
      running = true;
      scheduleNext(0);
      logger.info('Scheduler started', { component: 'scheduler', pollIntervalMs });
    },

    stop(): void {
      if (!running) return;
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      logger.info('Scheduler stopped', { component: 'scheduler' });
    },

    async idle(): Promise<void> {
      const pending = [loopIteration, activeTick].filter(
        (work): work is Promise<void> | Promise<TickSummary> => work !== null,
      );
      await Promise.allSettled(pending);
    },

    isRunning(): boolean {
      return running;
    },
  };
}
