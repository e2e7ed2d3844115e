/**
 * Command entity — construction, safety gate, and state machine.
 *
 * Commands are immutable values: each transition returns a new Command
 * with `updatedAt` stamped, and throws `InvalidStateError` when the
 * transition is not legal from the current status.
 */
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { InvalidStateError, ValidationError } from '@/core/errors.js';
import { toCommandId } from '@/core/types.js';
import { DEFAULT_DENY_LIST, isSafeCommand } from './safety.js';
import type {
  Command,
  CommandCreateInput,
  CommandStatus,
  CompletionInput,
  SerializedCommand,
} from './types.js';

// ─── Validation ─────────────────────────────────────────────────

export const DEFAULT_COMMAND_TIMEOUT_SECONDS = 300;

const commandCreateSchema = z.object({
  originalRequest: z.string(),
  parsedCommand: z
    .string()
    .transform((value) => value.trim())
    .pipe(z.string().min(1, 'Parsed command cannot be empty')),
  commandType: z.enum(['system', 'script', 'scheduled', 'cron']).default('system'),
  workingDirectory: z.string().min(1).optional(),
  environmentVariables: z.record(z.string(), z.string()).default({}),
  timeout: z
    .number()
    .int('Timeout must be a whole number of seconds')
    .positive('Timeout must be positive')
    .default(DEFAULT_COMMAND_TIMEOUT_SECONDS),
  requiresConfirmation: z.boolean().default(true),
  safeMode: z.boolean().default(true),
  allowedInSafeMode: z.boolean().optional(),
  scheduleId: z.string().min(1).optional(),
  parentCommandId: z.string().min(1).optional(),
});

// ─── Construction ───────────────────────────────────────────────

/**
 * Build a pending Command from producer input.
 *
 * @throws ValidationError when `parsedCommand` is blank or `timeout` is not a positive integer
 */
export function createCommand(
  input: CommandCreateInput,
  options?: { denyList?: readonly string[]; now?: Date },
): Command {
  const parsed = commandCreateSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(issues.map((issue) => issue.message).join('; '), { issues });
  }

  const data = parsed.data;
  const now = options?.now ?? new Date();

  return {
    id: toCommandId(randomUUID()),
    originalRequest: data.originalRequest,
    parsedCommand: data.parsedCommand,
    commandType: data.commandType,
    status: 'pending',
    workingDirectory: data.workingDirectory,
    environmentVariables: data.environmentVariables,
    timeout: data.timeout,
    requiresConfirmation: data.requiresConfirmation,
    safeMode: data.safeMode,
    allowedInSafeMode:
      data.allowedInSafeMode ?? isSafeCommand(data.parsedCommand, options?.denyList ?? DEFAULT_DENY_LIST),
    createdAt: now,
    updatedAt: now,
    scheduleId: input.scheduleId,
    parentCommandId: input.parentCommandId,
  };
}

// ─── Gate ───────────────────────────────────────────────────────

/**
 * The only check the executor performs before spawning.
 * Safety is recomputed here; `allowedInSafeMode` is never trusted.
 */
export function canExecute(
  command: Command,
  denyList: readonly string[] = DEFAULT_DENY_LIST,
): boolean {
  if (command.status !== 'pending') return false;
  if (command.safeMode && !isSafeCommand(command.parsedCommand, denyList)) return false;
  return true;
}

/** Terminal statuses accept no further transition. */
export function isTerminal(status: CommandStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

// ─── Transitions ────────────────────────────────────────────────

/** pending → running. */
export function startExecution(
  command: Command,
  options?: { denyList?: readonly string[]; now?: Date },
): Command {
  if (!canExecute(command, options?.denyList)) {
    throw new InvalidStateError(
      command.status === 'pending'
        ? `Command ${command.id} is blocked by safe mode`
        : `Cannot execute command in status '${command.status}'. Only 'pending' commands can be executed.`,
      { commandId: command.id, currentStatus: command.status, safeMode: command.safeMode },
    );
  }

  const now = options?.now ?? new Date();
  return { ...command, status: 'running', executedAt: now, updatedAt: now };
}

/** running → completed (exit code 0) | failed (anything else). */
export function completeExecution(
  command: Command,
  completion: CompletionInput,
  now: Date = new Date(),
): Command {
  if (command.status !== 'running') {
    throw new InvalidStateError(
      `Cannot complete command in status '${command.status}'. Only 'running' commands can be completed.`,
      { commandId: command.id, currentStatus: command.status },
    );
  }

  return {
    ...command,
    status: completion.exitCode === 0 ? 'completed' : 'failed',
    exitCode: completion.exitCode,
    stdout: completion.stdout ?? '',
    stderr: completion.stderr ?? '',
    executionTime: completion.executionTime ?? 0,
    completedAt: now,
    updatedAt: now,
  };
}

/** pending | running → cancelled. */
export function cancelExecution(command: Command, now: Date = new Date()): Command {
  if (command.status !== 'pending' && command.status !== 'running') {
    throw new InvalidStateError(
      `Cannot cancel command in status '${command.status}'`,
      { commandId: command.id, currentStatus: command.status },
    );
  }

  return { ...command, status: 'cancelled', completedAt: now, updatedAt: now };
}

// ─── Serialization ──────────────────────────────────────────────

export function serializeCommand(command: Command): SerializedCommand {
  return {
    id: command.id,
    originalRequest: command.originalRequest,
    parsedCommand: command.parsedCommand,
    commandType: command.commandType,
    status: command.status,
    workingDirectory: command.workingDirectory ?? null,
    environmentVariables: { ...command.environmentVariables },
    timeout: command.timeout,
    requiresConfirmation: command.requiresConfirmation,
    safeMode: command.safeMode,
    allowedInSafeMode: command.allowedInSafeMode,
    createdAt: command.createdAt.toISOString(),
    updatedAt: command.updatedAt.toISOString(),
    executedAt: command.executedAt?.toISOString() ?? null,
    completedAt: command.completedAt?.toISOString() ?? null,
    exitCode: command.exitCode ?? null,
    stdout: command.stdout ?? null,
    stderr: command.stderr ?? null,
    executionTime: command.executionTime ?? null,
    scheduleId: command.scheduleId ?? null,
    parentCommandId: command.parentCommandId ?? null,
  };
}

export function describeCommand(command: Command): string {
  return `Command(id=${command.id}, cmd='${command.parsedCommand}', status=${command.status})`;
}
