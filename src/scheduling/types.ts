/**
 * Schedules — recurrence descriptors for a template of commands.
 *
 * Only `active` schedules with a `nextRun` can become due. `completed` and
 * `failed` are terminal: the scheduler drops them at the end of each tick.
 */
import type { ScheduleId } from '@/core/types.js';
import type { CommandType } from '@/commands/types.js';

// ─── Enums ──────────────────────────────────────────────────────

export type ScheduleType = 'once' | 'recurring' | 'cron';

export type ScheduleStatus = 'active' | 'inactive' | 'paused' | 'completed' | 'failed';

// ─── Command Template ───────────────────────────────────────────

/** Everything needed to materialize fresh Commands each time the schedule fires. */
export interface CommandTemplate {
  originalRequest: string;
  /** Run in order, one Command each. */
  parsedCommands: readonly string[];
  workingDirectory?: string;
  environmentVariables?: Readonly<Record<string, string>>;
  /** Seconds. Falls back to the materializer's default. */
  timeout?: number;
  commandType?: CommandType;
}

// ─── Schedule ───────────────────────────────────────────────────

export interface Schedule {
  readonly id: ScheduleId;
  readonly name: string;
  readonly description?: string;
  readonly scheduleType: ScheduleType;
  readonly status: ScheduleStatus;

  /** Standard 5-field expression, evaluated in UTC. */
  readonly cronExpression?: string;
  readonly startTime?: Date;
  readonly endTime?: Date;
  /** Maintained by the scheduler. */
  readonly nextRun?: Date;
  readonly lastRun?: Date;

  readonly maxExecutions?: number;
  readonly executionCount: number;
  /** Retries consumed since the last successful cycle. */
  readonly retryCount: number;
  readonly maxRetries: number;

  readonly commandTemplate: CommandTemplate;

  readonly createdAt: Date;
  readonly updatedAt: Date;
}

// ─── Inputs ─────────────────────────────────────────────────────

export interface ScheduleCreateInput {
  name: string;
  description?: string;
  /** Defaults to `once`. */
  scheduleType?: ScheduleType;
  /** Only `active` or `inactive` at creation. Defaults to `active`. */
  status?: 'active' | 'inactive';
  cronExpression?: string;
  startTime?: Date;
  endTime?: Date;
  maxExecutions?: number;
  /** Defaults to 3. */
  maxRetries?: number;
  commandTemplate: CommandTemplate;
}

// ─── Serialized Form ────────────────────────────────────────────

export interface SerializedSchedule {
  id: string;
  name: string;
  description: string | null;
  scheduleType: ScheduleType;
  status: ScheduleStatus;
  cronExpression: string | null;
  startTime: string | null;
  endTime: string | null;
  nextRun: string | null;
  lastRun: string | null;
  maxExecutions: number | null;
  executionCount: number;
  retryCount: number;
  maxRetries: number;
  commandTemplate: {
    originalRequest: string;
    parsedCommands: string[];
    workingDirectory: string | null;
    environmentVariables: Record<string, string>;
    timeout: number | null;
    commandType: CommandType | null;
  };
  createdAt: string;
  updatedAt: string;
}
