/**
 * Schedule entity — construction, cron handling, due check and the
 * transitions the scheduler applies after each cycle.
 *
 * Like Commands, Schedules are immutable values. Every transition returns
 * a new Schedule with `updatedAt` stamped; a transition that does not
 * apply returns the input unchanged.
 */
import { randomUUID } from 'node:crypto';
import { CronExpressionParser } from 'cron-parser';
import { z } from 'zod';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ValidationError, errorMessage } from '@/core/errors.js';
import { toScheduleId } from '@/core/types.js';
import type { Schedule, ScheduleCreateInput, ScheduleStatus, SerializedSchedule } from './types.js';

// ─── Cron ───────────────────────────────────────────────────────

const CRON_FIELDS = ['minute', 'hour', 'day-of-month', 'month', 'day-of-week'] as const;
const CRON_TIMEZONE = 'UTC';

function cronFieldCount(expression: string): number {
  return expression.trim().split(/\s+/).filter((field) => field.length > 0).length;
}

/**
 * Validate a 5-field cron expression. Returns the next 3 fire times
 * strictly after `from` on success.
 */
export function validateCron(
  expression: string,
  from: Date = new Date(),
): Result<Date[], ValidationError> {
  const fieldCount = cronFieldCount(expression);
  if (fieldCount !== CRON_FIELDS.length) {
    return err(new ValidationError(
      `Invalid cron expression: expected ${CRON_FIELDS.length} fields (${CRON_FIELDS.join(' ')}), got ${fieldCount}`,
      { cronExpression: expression },
    ));
  }

  try {
    const interval = CronExpressionParser.parse(expression.trim(), {
      currentDate: from,
      tz: CRON_TIMEZONE,
    });
    const runs: Date[] = [];
    for (let i = 0; i < 3; i++) {
      runs.push(interval.next().toDate());
    }
    return ok(runs);
  } catch (error) {
    return err(new ValidationError(`Invalid cron expression: ${errorMessage(error)}`, {
      cronExpression: expression,
    }));
  }
}

/** Next fire time strictly after `from`, or undefined when the expression does not parse. */
function nextCronRun(expression: string, from: Date): Date | undefined {
  const result = validateCron(expression, from);
  return result.ok ? result.value[0] : undefined;
}

// ─── Validation ─────────────────────────────────────────────────

const commandTemplateSchema = z.object({
  originalRequest: z.string(),
  parsedCommands: z
    .array(z.string().trim().min(1, 'Template commands cannot be empty'))
    .min(1, 'Command template needs at least one command'),
  workingDirectory: z.string().min(1).optional(),
  environmentVariables: z.record(z.string(), z.string()).optional(),
  timeout: z.number().int().positive('Template timeout must be positive').optional(),
  commandType: z.enum(['system', 'script', 'scheduled', 'cron']).optional(),
});

const scheduleCreateSchema = z
  .object({
    name: z.string().trim().min(1, 'Schedule name cannot be empty'),
    description: z.string().optional(),
    scheduleType: z.enum(['once', 'recurring', 'cron']).default('once'),
    status: z.enum(['active', 'inactive']).default('active'),
    cronExpression: z.string().optional(),
    startTime: z.date().optional(),
    endTime: z.date().optional(),
    maxExecutions: z.number().int().positive('Max executions must be positive').optional(),
    maxRetries: z.number().int().nonnegative('Max retries must be non-negative').default(3),
    commandTemplate: commandTemplateSchema,
  })
  .superRefine((input, ctx) => {
    if (input.cronExpression !== undefined) {
      const cron = validateCron(input.cronExpression);
      if (!cron.ok) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cronExpression'],
          message: cron.error.message,
        });
      }
    } else if (input.scheduleType === 'cron') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cronExpression'],
        message: 'Cron schedules require a cron expression',
      });
    }

    if (input.startTime && input.endTime && input.endTime < input.startTime) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endTime'],
        message: 'End time cannot be before start time',
      });
    }
  });

// ─── Construction ───────────────────────────────────────────────

/**
 * Build a Schedule from producer input. Active schedules get their first
 * `nextRun`; a `once` schedule without `startTime` starts at `now`.
 *
 * @throws ValidationError
 */
export function createSchedule(input: ScheduleCreateInput, options?: { now?: Date }): Schedule {
  const parsed = scheduleCreateSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(issues.map((issue) => issue.message).join('; '), { issues });
  }

  const data = parsed.data;
  const now = options?.now ?? new Date();

  const schedule: Schedule = {
    id: toScheduleId(randomUUID()),
    name: data.name,
    description: data.description,
    scheduleType: data.scheduleType,
    status: data.status,
    cronExpression: data.cronExpression?.trim(),
    startTime: data.startTime ?? (data.scheduleType === 'once' ? now : undefined),
    endTime: data.endTime,
    maxExecutions: data.maxExecutions,
    executionCount: 0,
    retryCount: 0,
    maxRetries: data.maxRetries,
    commandTemplate: data.commandTemplate,
    createdAt: now,
    updatedAt: now,
  };

  return schedule.status === 'active'
    ? { ...schedule, nextRun: computeNextRun(schedule, now) }
    : schedule;
}

// ─── Timing ─────────────────────────────────────────────────────

/**
 * Next fire time as of `now`:
 * - `once`: its `startTime`
 * - `cron`: next cron instant strictly after `now`
 * - `recurring`: like `cron` when it carries an expression, otherwise never
 */
export function computeNextRun(schedule: Schedule, now: Date): Date | undefined {
  switch (schedule.scheduleType) {
    case 'once':
      return schedule.startTime;
    case 'cron':
    case 'recurring':
      return schedule.cronExpression !== undefined
        ? nextCronRun(schedule.cronExpression, now)
        : undefined;
    default: {
      const unreachable: never = schedule.scheduleType;
      return unreachable;
    }
  }
}

export function isDue(schedule: Schedule, now: Date): boolean {
  if (schedule.status !== 'active') return false;
  if (!schedule.nextRun || now < schedule.nextRun) return false;
  if (schedule.maxExecutions !== undefined && schedule.executionCount >= schedule.maxExecutions) {
    return false;
  }
  if (schedule.endTime && now > schedule.endTime) return false;
  return true;
}

export function isTerminalSchedule(status: ScheduleStatus): boolean {
  return status === 'completed' || status === 'failed';
}

// ─── Cycle Transitions ──────────────────────────────────────────

/**
 * Record a cycle whose commands were all dispatched.
 * Individual command failures still count as a dispatched cycle.
 */
export function applySuccessfulCycle(schedule: Schedule, now: Date): Schedule {
  const executionCount = schedule.executionCount + 1;
  const exhausted =
    schedule.scheduleType === 'once'
    || (schedule.maxExecutions !== undefined && executionCount >= schedule.maxExecutions);

  const next: Schedule = {
    ...schedule,
    executionCount,
    lastRun: now,
    retryCount: 0,
    updatedAt: now,
  };

  return exhausted
    ? { ...next, status: 'completed', nextRun: undefined }
    : { ...next, nextRun: computeNextRun(next, now) };
}

/**
 * Record a cycle that could not be dispatched. Every failure increments
 * `retryCount`; the one arriving with no retries left fails the schedule.
 * Otherwise `nextRun` is kept, so the same window is retried on the next poll.
 */
export function applyDispatchFailure(schedule: Schedule, now: Date): Schedule {
  const retryCount = schedule.retryCount + 1;
  if (schedule.retryCount >= schedule.maxRetries) {
    return { ...schedule, status: 'failed', retryCount, nextRun: undefined, updatedAt: now };
  }
  return { ...schedule, retryCount, updatedAt: now };
}

/** Complete an active schedule whose `endTime` has passed. */
export function expireIfEnded(schedule: Schedule, now: Date): Schedule {
  if (schedule.status !== 'active' || !schedule.endTime || now <= schedule.endTime) {
    return schedule;
  }
  return { ...schedule, status: 'completed', nextRun: undefined, updatedAt: now };
}

// ─── Operational Controls ───────────────────────────────────────

/** active → paused. */
export function pauseSchedule(schedule: Schedule, now: Date = new Date()): Schedule {
  if (schedule.status !== 'active') return schedule;
  return { ...schedule, status: 'paused', updatedAt: now };
}

/** paused → active, with `nextRun` recomputed. */
export function resumeSchedule(schedule: Schedule, now: Date = new Date()): Schedule {
  if (schedule.status !== 'paused') return schedule;
  const resumed: Schedule = { ...schedule, status: 'active', updatedAt: now };
  return { ...resumed, nextRun: computeNextRun(resumed, now) };
}

// ─── Serialization ──────────────────────────────────────────────

export function serializeSchedule(schedule: Schedule): SerializedSchedule {
  const template = schedule.commandTemplate;
  return {
    id: schedule.id,
    name: schedule.name,
    description: schedule.description ?? null,
    scheduleType: schedule.scheduleType,
    status: schedule.status,
    cronExpression: schedule.cronExpression ?? null,
    startTime: schedule.startTime?.toISOString() ?? null,
    endTime: schedule.endTime?.toISOString() ?? null,
    nextRun: schedule.nextRun?.toISOString() ?? null,
    lastRun: schedule.lastRun?.toISOString() ?? null,
    maxExecutions: schedule.maxExecutions ?? null,
    executionCount: schedule.executionCount,
    retryCount: schedule.retryCount,
    maxRetries: schedule.maxRetries,
    commandTemplate: {
      originalRequest: template.originalRequest,
      parsedCommands: [...template.parsedCommands],
      workingDirectory: template.workingDirectory ?? null,
      environmentVariables: { ...template.environmentVariables },
      timeout: template.timeout ?? null,
      commandType: template.commandType ?? null,
    },
    createdAt: schedule.createdAt.toISOString(),
    updatedAt: schedule.updatedAt.toISOString(),
  };
}

export function describeSchedule(schedule: Schedule): string {
  return `Schedule(id=${schedule.id}, name='${schedule.name}', status=${schedule.status}, type=${schedule.scheduleType})`;
}
