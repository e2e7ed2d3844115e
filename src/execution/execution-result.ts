/**
 * ExecutionResult construction and derived predicates.
 */
import { randomUUID } from 'node:crypto';
import { toExecutionResultId } from '@/core/types.js';
import type { Command } from '@/commands/types.js';
import type { ExecutionResult } from './types.js';

/** Seconds between two instants, or undefined when the end is missing. */
export function calculateDuration(startedAt: Date, completedAt?: Date): number | undefined {
  if (!completedAt) return undefined;
  return (completedAt.getTime() - startedAt.getTime()) / 1000;
}

export interface ExecutionResultFields {
  startedAt: Date;
  completedAt: Date;
  success: boolean;
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  cancelled?: boolean;
}

/** Build a frozen result for one attempt of `command`. */
export function createExecutionResult(command: Command, fields: ExecutionResultFields): ExecutionResult {
  return Object.freeze({
    id: toExecutionResultId(randomUUID()),
    commandId: command.id,
    scheduleId: command.scheduleId,
    startedAt: fields.startedAt,
    completedAt: fields.completedAt,
    duration: calculateDuration(fields.startedAt, fields.completedAt),
    success: fields.success,
    exitCode: fields.exitCode,
    stdout: fields.stdout,
    stderr: fields.stderr,
    timedOut: fields.timedOut ?? false,
    cancelled: fields.cancelled ?? false,
    environment: { ...command.environmentVariables },
    workingDirectory: command.workingDirectory,
  });
}

/** `success` and, when an exit code is present, that it is 0. */
export function isSuccessful(result: ExecutionResult): boolean {
  return result.success && (result.exitCode === undefined || result.exitCode === 0);
}

export function hasOutput(result: ExecutionResult): boolean {
  return (result.stdout ?? '').length > 0;
}

export function hasErrors(result: ExecutionResult): boolean {
  return (result.stderr ?? '').length > 0;
}

/** JSON shape for persistence or reporting. */
export function serializeExecutionResult(result: ExecutionResult): Record<string, unknown> {
  return {
    id: result.id,
    commandId: result.commandId,
    scheduleId: result.scheduleId ?? null,
    startedAt: result.startedAt.toISOString(),
    completedAt: result.completedAt?.toISOString() ?? null,
    duration: result.duration ?? null,
    success: result.success,
    exitCode: result.exitCode ?? null,
    stdout: result.stdout ?? null,
    stderr: result.stderr ?? null,
    timedOut: result.timedOut,
    cancelled: result.cancelled,
    environment: { ...result.environment },
    workingDirectory: result.workingDirectory ?? null,
  };
}
