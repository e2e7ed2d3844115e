/**
 * Execution — outcome records and live telemetry for spawned commands.
 */
import type { CommandId, ExecutionHandle, ExecutionResultId, ScheduleId } from '@/core/types.js';
import type { Command } from '@/commands/types.js';

// ─── Execution Result ───────────────────────────────────────────

/**
 * Immutable record of one execution attempt.
 * A retried schedule produces a new result per attempt.
 */
export interface ExecutionResult {
  readonly id: ExecutionResultId;
  readonly commandId: CommandId;
  readonly scheduleId?: ScheduleId;
  readonly startedAt: Date;
  readonly completedAt?: Date;
  /** Seconds between `startedAt` and `completedAt`; unset if either is missing. */
  readonly duration?: number;
  readonly success: boolean;
  readonly exitCode?: number;
  readonly stdout?: string;
  readonly stderr?: string;
  /** True when the wall-clock deadline terminated the process. */
  readonly timedOut: boolean;
  /** True when `cancel()` or `shutdown()` terminated the process. */
  readonly cancelled: boolean;
  /** Copied from the command for audit. */
  readonly environment: Readonly<Record<string, string>>;
  readonly workingDirectory?: string;
}

/** Result plus the command in its final state. */
export interface ExecutionOutcome {
  readonly result: ExecutionResult;
  readonly command: Command;
}

// ─── In-flight Execution ────────────────────────────────────────

/** Returned by `Executor.start()`; the handle is what `cancel()` takes. */
export interface RunningExecution {
  readonly handle: ExecutionHandle;
  /** Undefined when the process failed to launch. */
  readonly pid?: number;
  /** The command in its `running` state. */
  readonly command: Command;
  readonly completion: Promise<ExecutionOutcome>;
}

// ─── Telemetry ──────────────────────────────────────────────────

/** One OS-level sample of a process. */
export interface ProcessSample {
  pid: number;
  /** Raw `ps` state code, e.g. `S`, `R`, `Ss`. */
  status: string;
  cpuPercent: number;
  memoryBytes: number;
}

export interface ProcessTelemetry extends ProcessSample {
  commandId: CommandId;
  parsedCommand: string;
  startedAt: Date;
}

export interface ProcessInspector {
  /** Sample the given pids. Pids that no longer exist are absent from the map. */
  inspect(pids: readonly number[]): Promise<Map<number, ProcessSample>>;
}
