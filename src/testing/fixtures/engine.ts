/**
 * Shared fixtures for command, execution and scheduling tests.
 */
import { vi } from 'vitest';
import type { Logger } from '@/observability/logger.js';
import { completeExecution, createCommand, startExecution } from '@/commands/command.js';
import type { Command, CommandCreateInput, CompletionInput } from '@/commands/types.js';
import { toExecutionHandle } from '@/core/types.js';
import type { Executor } from '@/execution/executor.js';
import { createExecutionResult } from '@/execution/execution-result.js';
import type { RunningExecution } from '@/execution/types.js';
import { createSchedule } from '@/scheduling/schedule.js';
import type { Schedule, ScheduleCreateInput } from '@/scheduling/types.js';

// ─── Mock Factories ─────────────────────────────────────────────

/** Logger whose every method is a vi.fn(). */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/**
 * In-process Executor that never spawns. `run` decides each command's
 * completion; throwing from it makes `start()` throw, like a rejected
 * dispatch.
 */
export function createMockExecutor(
  run: (command: Command) => CompletionInput = () => ({ exitCode: 0 }),
): Executor {
  let sequence = 0;

  function start(command: Command): RunningExecution {
    const running = startExecution(command);
    const completion = run(running);
    const startedAt = running.executedAt ?? new Date();
    const completedAt = new Date();
    sequence++;

    return {
      handle: toExecutionHandle(`exec_mock_${sequence}`),
      pid: 10_000 + sequence,
      command: running,
      completion: Promise.resolve({
        result: createExecutionResult(running, {
          startedAt,
          completedAt,
          success: completion.exitCode === 0,
          exitCode: completion.exitCode,
          stdout: completion.stdout ?? '',
          stderr: completion.stderr ?? '',
        }),
        command: completeExecution(running, completion, completedAt),
      }),
    };
  }

  return {
    start: vi.fn(start),
    execute: vi.fn(async (command: Command) => (await start(command).completion).result),
    cancel: vi.fn(() => false),
    listRunning: vi.fn(() => Promise.resolve(new Map())),
    runningCount: vi.fn(() => 0),
    shutdown: vi.fn(() => Promise.resolve()),
  };
}

// ─── Sample Data Factories ──────────────────────────────────────

/** A pending command that the executor accepts as-is. */
export function createSampleCommand(overrides?: Partial<CommandCreateInput>): Command {
  return createCommand({
    originalRequest: 'say hello',
    parsedCommand: 'echo hello',
    safeMode: false,
    timeout: 10,
    ...overrides,
  });
}

/** An active cron schedule firing every minute. */
export function createSampleSchedule(
  overrides?: Partial<ScheduleCreateInput>,
  now: Date = new Date('2026-03-01T10:00:30.000Z'),
): Schedule {
  return createSchedule(
    {
      name: 'heartbeat',
      scheduleType: 'cron',
      cronExpression: '* * * * *',
      commandTemplate: {
        originalRequest: 'write a heartbeat',
        parsedCommands: ['echo beat'],
      },
      ...overrides,
    },
    { now },
  );
}

// ─── Process Helpers ────────────────────────────────────────────

/** Signal 0 checks existence without delivering anything. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
