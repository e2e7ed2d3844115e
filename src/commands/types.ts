/**
 * Command — one concrete shell invocation plus its execution and safety metadata.
 *
 * Lifecycle: pending → running → completed | failed, with pending | running → cancelled.
 * Only the state-machine functions in `command.ts` produce new states.
 */
import type { CommandId, ScheduleId } from '@/core/types.js';

// ─── Enums ──────────────────────────────────────────────────────

/** Informational classification; never changes how the executor runs a command. */
export type CommandType = 'system' | 'script' | 'scheduled' | 'cron';

export type CommandStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

// ─── Command ────────────────────────────────────────────────────

export interface Command {
  readonly id: CommandId;
  readonly originalRequest: string;
  /** Literal shell invocation, trimmed. */
  readonly parsedCommand: string;
  readonly commandType: CommandType;
  readonly status: CommandStatus;

  readonly workingDirectory?: string;
  /** Merged over the inherited process environment; these win. */
  readonly environmentVariables: Readonly<Record<string, string>>;
  /** Wall-clock limit in seconds. */
  readonly timeout: number;

  /** Enforced by the interactive layer, not the core. */
  readonly requiresConfirmation: boolean;
  readonly safeMode: boolean;
  /** Producer's precomputed verdict. Advisory only: the gate recomputes it. */
  readonly allowedInSafeMode: boolean;

  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly executedAt?: Date;
  readonly completedAt?: Date;

  readonly exitCode?: number;
  readonly stdout?: string;
  readonly stderr?: string;
  /** Seconds. */
  readonly executionTime?: number;

  readonly scheduleId?: ScheduleId;
  readonly parentCommandId?: CommandId;
}

// ─── Inputs ─────────────────────────────────────────────────────

export interface CommandCreateInput {
  originalRequest: string;
  parsedCommand: string;
  commandType?: CommandType;
  workingDirectory?: string;
  environmentVariables?: Record<string, string>;
  timeout?: number;
  requiresConfirmation?: boolean;
  safeMode?: boolean;
  allowedInSafeMode?: boolean;
  scheduleId?: ScheduleId;
  parentCommandId?: CommandId;
}

/** Process outcome recorded by `completeExecution`. */
export interface CompletionInput {
  exitCode: number;
  stdout?: string;
  stderr?: string;
  /** Seconds. */
  executionTime?: number;
}

// ─── Serialized Form ────────────────────────────────────────────

/** JSON shape for persistence or reporting: ISO-8601 instants, UUID strings, lowercase tags. */
export interface SerializedCommand {
  id: string;
  originalRequest: string;
  parsedCommand: string;
  commandType: CommandType;
  status: CommandStatus;
  workingDirectory: string | null;
  environmentVariables: Record<string, string>;
  timeout: number;
  requiresConfirmation: boolean;
  safeMode: boolean;
  allowedInSafeMode: boolean;
  createdAt: string;
  updatedAt: string;
  executedAt: string | null;
  completedAt: string | null;
  exitCode: number | null;
  stdout: string | null;
  stderr: string | null;
  executionTime: number | null;
  scheduleId: string | null;
  parentCommandId: string | null;
}
