/**
 * `runwarden` — run shell commands once or on a schedule under the
 * safety gate, timeout and process-group cleanup.
 *
 * Results go to stdout, logs to stderr.
 *
 * Usage: runwarden <run|schedule|check|cron|config|help> ...
 */
import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { createLogger } from '@/observability/logger.js';
import { errorMessage, RunwardenError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { loadEngineConfig, resolveConfig } from '@/config/loader.js';
import type { ConfigError } from '@/config/loader.js';
import type { EngineConfig } from '@/config/types.js';
import { canExecute, serializeCommand } from '@/commands/command.js';
import { DEFAULT_DENY_LIST, findDeniedPatterns } from '@/commands/safety.js';
import { serializeExecutionResult } from '@/execution/execution-result.js';
import type { ExecutionOutcome } from '@/execution/types.js';
import { validateCron, serializeSchedule } from '@/scheduling/schedule.js';
import type { Schedule } from '@/scheduling/types.js';
import { createEngine } from '@/engine.js';
import { parseCliArgs, USAGE } from './args.js';
import type { CliCommand } from './args.js';
import {
  BOLD,
  DIM,
  RED,
  RESET,
  YELLOW,
  formatCronPreview,
  formatExecutionResult,
  formatSafetyVerdict,
  formatStats,
} from './format.js';

type RunArgs = Extract<CliCommand, { kind: 'run' }>;
type ScheduleArgs = Extract<CliCommand, { kind: 'schedule' }>;

// ─── Helpers ────────────────────────────────────────────────────

function printError(error: unknown): void {
  console.error(`${RED}${errorMessage(error)}${RESET}`);
  const issues = error instanceof RunwardenError ? error.context?.['issues'] : undefined;
  if (!Array.isArray(issues)) return;
  const list: readonly unknown[] = issues;
  for (const issue of list) {
    console.error(`  ${DIM}${JSON.stringify(issue)}${RESET}`);
  }
}

/** LOG_LEVEL in the environment wins over the config file. */
function logLevelFor(config: EngineConfig): string {
  return process.env['LOG_LEVEL'] ?? config.logLevel;
}

function loadConfig(configPath: string | undefined): Promise<Result<EngineConfig, ConfigError>> {
  return configPath ? loadEngineConfig(configPath) : Promise.resolve(resolveConfig());
}

/** Exit status mirrors the command's where it has one. */
function exitStatusOf(outcome: ExecutionOutcome): number {
  const { result } = outcome;
  if (result.success) return 0;
  return result.exitCode !== undefined && result.exitCode > 0 ? result.exitCode : 1;
}

function printOutcome(outcome: ExecutionOutcome, json: boolean, label?: string): void {
  if (json) {
    console.log(JSON.stringify({
      command: serializeCommand(outcome.command),
      result: serializeExecutionResult(outcome.result),
    }));
    return;
  }
  if (label) console.log(`${DIM}[${label}]${RESET} ${outcome.command.parsedCommand}`);
  console.log(formatExecutionResult(outcome.result));
}

// ─── Subcommands ────────────────────────────────────────────────

async function runOnce(args: RunArgs, config: EngineConfig): Promise<number> {
  const logger = createLogger({ level: logLevelFor(config), destination: 'stderr' });
  const engine = createEngine({ config, logger });
  const denyList = config.safety.denyList ?? DEFAULT_DENY_LIST;

  try {
    const command = engine.buildCommand({
      originalRequest: args.command,
      parsedCommand: args.command,
      timeout: args.timeout,
      workingDirectory: args.cwd,
      safeMode: args.unsafe ? false : undefined,
      requiresConfirmation: false,
    });

    if (!canExecute(command, denyList)) {
      console.error(formatSafetyVerdict(command.parsedCommand, findDeniedPatterns(command.parsedCommand, denyList)));
      console.error(`${YELLOW}Refusing to run in safe mode. Pass --unsafe to override.${RESET}`);
      return 1;
    }

    const running = engine.executor.start(command);
    const cancel = (): void => {
      engine.executor.cancel(running.handle);
    };
    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);

    try {
      const outcome = await running.completion;
      printOutcome(outcome, args.json);
      return exitStatusOf(outcome);
    } finally {
      process.off('SIGINT', cancel);
      process.off('SIGTERM', cancel);
    }
  } finally {
    await engine.shutdown();
  }
}

async function runSchedule(args: ScheduleArgs, config: EngineConfig): Promise<number> {
  const effective: EngineConfig = {
    ...config,
    scheduler: { ...config.scheduler, enabled: true },
    safety: args.unsafe ? { ...config.safety, safeMode: false } : config.safety,
  };
  const logger = createLogger({ level: logLevelFor(effective), destination: 'stderr' });
  const engine = createEngine({
    config: effective,
    logger,
    onExecution: (schedule: Schedule, outcome: ExecutionOutcome) => {
      printOutcome(outcome, args.json, schedule.name);
    },
  });

  let schedule: Schedule;
  try {
    schedule = engine.scheduler.add({
      name: args.name ?? args.command,
      scheduleType: args.cron !== undefined ? 'cron' : 'once',
      cronExpression: args.cron,
      startTime: args.at,
      maxExecutions: args.maxExecutions,
      maxRetries: args.maxRetries,
      commandTemplate: { originalRequest: args.command, parsedCommands: [args.command] },
    });
  } catch (error) {
    printError(error);
    await engine.shutdown();
    return 1;
  }

  if (args.json) {
    console.log(JSON.stringify({ schedule: serializeSchedule(schedule) }));
  } else {
    console.log(`${BOLD}Scheduled${RESET} ${schedule.name}, next run ${schedule.nextRun?.toISOString() ?? 'never'}`);
    console.log(`${DIM}Press Ctrl+C to stop.${RESET}`);
  }

  engine.start();

  // Run until interrupted or until the schedule leaves the scheduler.
  await new Promise<void>((resolve) => {
    const finish = (): void => {
      clearInterval(watch);
      process.off('SIGINT', finish);
      process.off('SIGTERM', finish);
      resolve();
    };
    const watch = setInterval(() => {
      if (!engine.scheduler.get(schedule.id)) finish();
    }, effective.scheduler.pollIntervalMs);
    process.once('SIGINT', finish);
    process.once('SIGTERM', finish);
  });

  const stats = engine.scheduler.getStats();
  await engine.shutdown();
  if (!args.json) console.log(formatStats({ ...stats, running: false }));
  return 0;
}

// ─── Main ───────────────────────────────────────────────────────

/** Run the CLI and return the process exit status. */
export async function main(argv: readonly string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    printError(parsed.error);
    console.error(`\n${USAGE}`);
    return 2;
  }
  const cli = parsed.value;

  if (cli.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  if (cli.kind === 'cron') {
    const runs = validateCron(cli.expression);
    if (!runs.ok) {
      printError(runs.error);
      return 1;
    }
    console.log(formatCronPreview(cli.expression, runs.value));
    return 0;
  }

  const loaded = await loadConfig(cli.configPath);
  if (!loaded.ok) {
    printError(loaded.error);
    return 1;
  }
  const config = loaded.value;

  switch (cli.kind) {
    case 'config':
      console.log(JSON.stringify(config, null, 2));
      return 0;
    case 'check': {
      const matched = findDeniedPatterns(cli.command, config.safety.denyList ?? DEFAULT_DENY_LIST);
      console.log(formatSafetyVerdict(cli.command, matched));
      return matched.length === 0 ? 0 : 1;
    }
    case 'run':
      return runOnce(cli, config);
    case 'schedule':
      return runSchedule(cli, config);
  }
}

// ─── Entry Point ────────────────────────────────────────────────

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main(process.argv.slice(2)).then(
    (status) => {
      process.exitCode = status;
    },
    (e: unknown) => {
      console.error('Fatal error:', e);
      process.exit(1);
    },
  );
}
