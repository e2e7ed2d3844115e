/**
 * Executor — runs one Command per OS process with an enforced timeout.
 *
 * Each process is spawned through the shell in its own process group so
 * that timeout, cancel and shutdown can signal the whole tree: SIGTERM
 * first, SIGKILL once the grace period has passed. Output is buffered
 * until the process closes.
 *
 * Non-zero exits, timeouts and launch failures are results, not errors.
 * The only thing that throws is asking to execute a command that
 * `canExecute` rejects.
 */
import { spawn } from 'node:child_process';
import type { ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import { nanoid } from 'nanoid';
import type { Logger } from '@/observability/logger.js';
import { InvalidStateError, errorMessage } from '@/core/errors.js';
import { toExecutionHandle } from '@/core/types.js';
import type { ExecutionHandle } from '@/core/types.js';
import { DEFAULT_DENY_LIST } from '@/commands/safety.js';
import { cancelExecution, completeExecution, startExecution } from '@/commands/command.js';
import type { Command } from '@/commands/types.js';
import { createExecutionResult } from './execution-result.js';
import { createPsInspector } from './process-inspector.js';
import type {
  ExecutionOutcome,
  ExecutionResult,
  ProcessInspector,
  ProcessSample,
  ProcessTelemetry,
  RunningExecution,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ExecutorOptions {
  logger: Logger;
  /** Wait between SIGTERM and SIGKILL. Defaults to 5_000. */
  gracePeriodMs?: number;
  /** Deny list used by the safe-mode gate. Defaults to the built-in list. */
  denyList?: readonly string[];
  /** Source of live telemetry for `listRunning()`. Defaults to `ps`. */
  inspector?: ProcessInspector;
}

export interface Executor {
  /**
   * Spawn the command and return its handle right away.
   * @throws InvalidStateError when `canExecute(command)` is false or after `shutdown()`
   */
  start(command: Command): RunningExecution;
  /** Run the command to completion. Rejects with InvalidStateError when it may not run. */
  execute(command: Command): Promise<ExecutionResult>;
  /** Terminate an in-flight execution. False when the handle is unknown or already finished. */
  cancel(handle: ExecutionHandle): boolean;
  /** Live telemetry per handle. Processes that already exited are omitted. */
  listRunning(): Promise<Map<ExecutionHandle, ProcessTelemetry>>;
  /** Number of in-flight executions. */
  runningCount(): number;
  /** Terminate every in-flight execution and wait for all of them to close. Later starts throw. */
  shutdown(): Promise<void>;
}

type TerminationReason = 'timeout' | 'cancelled';

interface RegistryEntry {
  readonly handle: ExecutionHandle;
  readonly child: ChildProcessByStdio<null, Readable, Readable>;
  readonly command: Command;
  readonly startedAt: Date;
  readonly completion: Promise<ExecutionOutcome>;
  reason: TerminationReason | null;
  killTimer: ReturnType<typeof setTimeout> | null;
}

// ─── Helpers ────────────────────────────────────────────────────

const DEFAULT_GRACE_PERIOD_MS = 5_000;
/** setTimeout clamps larger delays to 1ms. */
const MAX_TIMER_MS = 2 ** 31 - 1;

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

function joinLines(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join('\n');
}

// ─── Factory ────────────────────────────────────────────────────

/** Create an Executor. Each call owns its own registry of in-flight processes. */
export function createExecutor(options: ExecutorOptions): Executor {
  const {
    logger,
    gracePeriodMs = DEFAULT_GRACE_PERIOD_MS,
    denyList = DEFAULT_DENY_LIST,
    inspector = createPsInspector(),
  } = options;

  const registry = new Map<ExecutionHandle, RegistryEntry>();
  let closed = false;

  /** Signal the whole process group; fall back to the direct child. */
  function signalGroup(entry: RegistryEntry, signal: NodeJS.Signals): void {
    const pid = entry.child.pid;
    if (pid === undefined) return;

    try {
      if (process.platform === 'win32') {
        entry.child.kill(signal);
      } else {
        process.kill(-pid, signal);
      }
    } catch (error) {
      if (isNoSuchProcess(error)) return;
      logger.warn('Process group signal failed, signalling child directly', {
        component: 'executor',
        handle: entry.handle,
        pid,
        signal,
        error: errorMessage(error),
      });
      entry.child.kill(signal);
    }
  }

  /** SIGTERM now, SIGKILL after the grace period. Idempotent per entry. */
  function terminate(entry: RegistryEntry, reason: TerminationReason): void {
    if (entry.reason !== null) return;
    entry.reason = reason;

    logger.info('Terminating execution', {
      component: 'executor',
      handle: entry.handle,
      commandId: entry.command.id,
      reason,
    });

    signalGroup(entry, 'SIGTERM');
    entry.killTimer = setTimeout(() => {
      logger.warn('Grace period expired, killing process group', {
        component: 'executor',
        handle: entry.handle,
        commandId: entry.command.id,
        gracePeriodMs,
      });
      signalGroup(entry, 'SIGKILL');
    }, gracePeriodMs);
  }

  /** Outcome for a process that never started. Uses exit code 1 on the command. */
  function launchFailure(running: Command, startedAt: Date, error: unknown): ExecutionOutcome {
    const completedAt = new Date();
    const stderr = `Failed to start command: ${errorMessage(error)}`;
    const executionTime = (completedAt.getTime() - startedAt.getTime()) / 1000;

    logger.error('Command failed to launch', {
      component: 'executor',
      commandId: running.id,
      error: errorMessage(error),
    });

    return {
      result: createExecutionResult(running, {
        startedAt,
        completedAt,
        success: false,
        exitCode: 1,
        stdout: '',
        stderr,
      }),
      command: completeExecution(running, { exitCode: 1, stdout: '', stderr, executionTime }, completedAt),
    };
  }

  function start(command: Command): RunningExecution {
    if (closed) {
      throw new InvalidStateError('Executor is shut down', { commandId: command.id });
    }
    const running = startExecution(command, { denyList });
    const handle = toExecutionHandle(`exec_${nanoid()}`);
    const startedAt = running.executedAt ?? new Date();

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(running.parsedCommand, {
        cwd: running.workingDirectory,
        env: { ...process.env, ...running.environmentVariables },
        shell: true,
        detached: process.platform !== 'win32',
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      return {
        handle,
        command: running,
        completion: Promise.resolve(launchFailure(running, startedAt, error)),
      };
    }

    // Callbacks below run after `entry` is initialized; events are never emitted synchronously.
    const completion = new Promise<ExecutionOutcome>((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const deadline = setTimeout(() => {
        logger.warn('Command timed out', {
          component: 'executor',
          handle,
          commandId: running.id,
          timeoutSeconds: running.timeout,
        });
        terminate(entry, 'timeout');
      }, Math.min(running.timeout * 1000, MAX_TIMER_MS));

      function settle(outcome: () => ExecutionOutcome): void {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        if (entry.killTimer) clearTimeout(entry.killTimer);
        registry.delete(handle);
        resolve(outcome());
      }

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error: Error) => {
        if (child.pid !== undefined) {
          // A started process only errors here when a signal could not be delivered.
          logger.warn('Child process error', {
            component: 'executor',
            handle,
            commandId: running.id,
            error: error.message,
          });
          return;
        }
        settle(() => launchFailure(running, startedAt, error));
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (child.pid === undefined) {
          settle(() => launchFailure(running, startedAt, new Error(`spawn failed with code ${String(code)}`)));
          return;
        }
        settle(() => {
          const completedAt = new Date();
          const executionTime = (completedAt.getTime() - startedAt.getTime()) / 1000;

          if (entry.reason === 'timeout') {
            const message = `Command timed out after ${running.timeout} seconds`;
            return {
              result: createExecutionResult(running, {
                startedAt,
                completedAt,
                success: false,
                exitCode: -1,
                stdout: '',
                stderr: message,
                timedOut: true,
              }),
              command: completeExecution(
                running,
                { exitCode: -1, stdout: '', stderr: message, executionTime },
                completedAt,
              ),
            };
          }

          if (entry.reason === 'cancelled') {
            return {
              result: createExecutionResult(running, {
                startedAt,
                completedAt,
                success: false,
                exitCode: -1,
                stdout,
                stderr: joinLines(stderr, 'Command was cancelled'),
                cancelled: true,
              }),
              command: cancelExecution(running, completedAt),
            };
          }

          const exitCode = code ?? -1;
          const finalStderr = code === null && signal !== null
            ? joinLines(stderr, `Process terminated by ${signal}`)
            : stderr;

          logger.info('Command finished', {
            component: 'executor',
            handle,
            commandId: running.id,
            exitCode,
            executionTime,
          });

          return {
            result: createExecutionResult(running, {
              startedAt,
              completedAt,
              success: exitCode === 0,
              exitCode,
              stdout,
              stderr: finalStderr,
            }),
            command: completeExecution(
              running,
              { exitCode, stdout, stderr: finalStderr, executionTime },
              completedAt,
            ),
          };
        });
      });
    });

    const entry: RegistryEntry = {
      handle,
      child,
      command: running,
      startedAt,
      completion,
      reason: null,
      killTimer: null,
    };
    registry.set(handle, entry);

    logger.info('Command started', {
      component: 'executor',
      handle,
      commandId: running.id,
      pid: child.pid,
      timeoutSeconds: running.timeout,
    });

    return { handle, pid: child.pid, command: running, completion };
  }

  return {
    start,

    async execute(command: Command): Promise<ExecutionResult> {
      const outcome = await start(command).completion;
      return outcome.result;
    },

    cancel(handle: ExecutionHandle): boolean {
      const entry = registry.get(handle);
      if (!entry) return false;
      terminate(entry, 'cancelled');
      return true;
    },

    async listRunning(): Promise<Map<ExecutionHandle, ProcessTelemetry>> {
      const tracked = [...registry.values()].flatMap((entry) =>
        entry.child.pid === undefined ? [] : [{ entry, pid: entry.child.pid }],
      );
      const running = new Map<ExecutionHandle, ProcessTelemetry>();
      if (tracked.length === 0) return running;

      let samples: Map<number, ProcessSample>;
      try {
        samples = await inspector.inspect(tracked.map(({ pid }) => pid));
      } catch (error) {
        logger.warn('Process inspection failed', {
          component: 'executor',
          error: errorMessage(error),
        });
        return running;
      }

      for (const { entry, pid } of tracked) {
        const sample = samples.get(pid);
        if (!sample) continue;
        running.set(entry.handle, {
          ...sample,
          commandId: entry.command.id,
          parsedCommand: entry.command.parsedCommand,
          startedAt: entry.startedAt,
        });
      }

      return running;
    },

    runningCount(): number {
      return registry.size;
    },

    async shutdown(): Promise<void> {
      closed = true;
      const entries = [...registry.values()];
      if (entries.length > 0) {
        logger.info('Shutting down executor', {
          component: 'executor',
          inFlight: entries.length,
        });
      }

      for (const entry of entries) {
        terminate(entry, 'cancelled');
      }
      await Promise.all(entries.map((entry) => entry.completion));
      registry.clear();
    },
  };
}
