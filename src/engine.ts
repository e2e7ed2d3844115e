/**
 * Engine — composition root for one executor and one scheduler.
 *
 * Each engine owns its instances; nothing is shared at module level.
 * Shutdown order: stop the scheduler loop, terminate every in-flight
 * process (scheduled ones included), then wait for the interrupted tick
 * to record its cancelled results.
 */
import type { Logger } from '@/observability/logger.js';
import type { EngineConfig } from '@/config/types.js';
import { createCommand } from '@/commands/command.js';
import { DEFAULT_DENY_LIST } from '@/commands/safety.js';
import type { Command, CommandCreateInput } from '@/commands/types.js';
import { createExecutor } from '@/execution/executor.js';
import type { Executor } from '@/execution/executor.js';
import type { ExecutionOutcome, ProcessInspector } from '@/execution/types.js';
import { createTemplateMaterializer } from '@/scheduling/materializer.js';
import { createScheduler } from '@/scheduling/scheduler.js';
import type { Scheduler } from '@/scheduling/scheduler.js';
import type { Schedule } from '@/scheduling/types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface EngineOptions {
  config: EngineConfig;
  logger: Logger;
  /** Telemetry source for `executor.listRunning()`. */
  inspector?: ProcessInspector;
  /** Invoked for every command a schedule runs. */
  onExecution?: (schedule: Schedule, outcome: ExecutionOutcome) => void;
}

export interface Engine {
  readonly config: EngineConfig;
  readonly executor: Executor;
  readonly scheduler: Scheduler;
  /** Build a pending Command with the configured timeout and safety defaults. */
  buildCommand(input: CommandCreateInput): Command;
  /** Start the scheduler loop, unless disabled in config. */
  start(): void;
  /** Stop the scheduler and terminate in-flight executions, scheduled ones included. Idempotent. */
  shutdown(): Promise<void>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createEngine(options: EngineOptions): Engine {
  const { config, logger, inspector, onExecution } = options;
  const denyList = config.safety.denyList ?? DEFAULT_DENY_LIST;

  const executor = createExecutor({
    logger: logger.child({ component: 'executor' }),
    gracePeriodMs: config.executor.gracePeriodMs,
    denyList,
    inspector,
  });

  const scheduler = createScheduler({
    executor,
    logger: logger.child({ component: 'scheduler' }),
    materialize: createTemplateMaterializer({
      defaultTimeout: config.executor.defaultTimeoutSeconds,
      safeMode: config.safety.safeMode,
      denyList,
    }),
    pollIntervalMs: config.scheduler.pollIntervalMs,
    errorBackoffMs: config.scheduler.errorBackoffMs,
    onExecution,
  });

  let shutdownPromise: Promise<void> | null = null;

  async function runShutdown(): Promise<void> {
    logger.info('Shutting down engine', {
      component: 'engine',
      inFlight: executor.runningCount(),
    });
    scheduler.stop();
    await executor.shutdown();
    await scheduler.idle();
    logger.info('Engine stopped', { component: 'engine' });
  }

  return {
    config,
    executor,
    scheduler,

    buildCommand(input: CommandCreateInput): Command {
      return createCommand(
        {
          ...input,
          timeout: input.timeout ?? config.executor.defaultTimeoutSeconds,
          safeMode: input.safeMode ?? config.safety.safeMode,
          requiresConfirmation: input.requiresConfirmation ?? config.safety.requireConfirmation,
        },
        { denyList },
      );
    },

    start(): void {
      if (!config.scheduler.enabled) {
        logger.info('Scheduler disabled by configuration', { component: 'engine' });
        return;
      }
      scheduler.start();
    },

    shutdown(): Promise<void> {
      shutdownPromise ??= runShutdown();
      return shutdownPromise;
    },
  };
}
