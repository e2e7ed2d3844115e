/**
 * Argument parsing for the `runwarden` binary.
 *
 * Everything after `--` is the shell command, kept verbatim. Tokens that
 * are not options before `--` are joined into the command as well, so
 * `runwarden run echo hi` works for simple cases.
 */
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ValidationError } from '@/core/errors.js';

// ─── Types ──────────────────────────────────────────────────────

export type CliCommand =
  | {
    kind: 'run';
    command: string;
    timeout?: number;
    cwd?: string;
    unsafe: boolean;
    json: boolean;
    configPath?: string;
  }
  | {
    kind: 'schedule';
    command: string;
    cron?: string;
    at?: Date;
    maxExecutions?: number;
    maxRetries?: number;
    name?: string;
    unsafe: boolean;
    json: boolean;
    configPath?: string;
  }
  | { kind: 'check'; command: string; configPath?: string }
  | { kind: 'cron'; expression: string }
  | { kind: 'config'; configPath?: string }
  | { kind: 'help' };

type Subcommand = Exclude<CliCommand['kind'], 'help'>;

/** Options each subcommand accepts; `true` marks flags that take a value. */
const OPTIONS: Record<Subcommand, Record<string, boolean>> = {
  run: { '--timeout': true, '--cwd': true, '--unsafe': false, '--json': false, '--config': true },
  schedule: {
    '--cron': true,
    '--at': true,
    '--max': true,
    '--retries': true,
    '--name': true,
    '--unsafe': false,
    '--json': false,
    '--config': true,
  },
  check: { '--config': true },
  cron: {},
  config: { '--config': true },
};

export const USAGE = `Usage:
  runwarden run [--timeout SECONDS] [--cwd DIR] [--unsafe] [--json] [--config FILE] -- <command>
  runwarden schedule (--cron EXPR | --at ISO) [--max N] [--retries N] [--name NAME] [--unsafe] [--json] [--config FILE] -- <command>
  runwarden check [--config FILE] <command>
  runwarden cron <expression>
  runwarden config [--config FILE]
  runwarden help`;

// ─── Helpers ────────────────────────────────────────────────────

function isSubcommand(value: string): value is Subcommand {
  return Object.hasOwn(OPTIONS, value);
}

function fail(message: string): Result<never, ValidationError> {
  return err(new ValidationError(message));
}

function parseInteger(flag: string, value: string, min: number): Result<number, ValidationError> {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < min) {
    return fail(`Option ${flag} must be ${min > 0 ? 'a positive' : 'a non-negative'} integer`);
  }
  return ok(parsed);
}

interface SplitArgs {
  options: Map<string, string | true>;
  positional: string[];
}

function splitArgs(subcommand: Subcommand, tokens: string[]): Result<SplitArgs, ValidationError> {
  const accepted = OPTIONS[subcommand];
  const options = new Map<string, string | true>();
  const positional: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;

    if (token === '--') {
      positional.push(...tokens.slice(i + 1));
      break;
    }

    if (token.startsWith('--') && subcommand !== 'cron') {
      const takesValue = accepted[token];
      if (takesValue === undefined) return fail(`Unknown option for ${subcommand}: ${token}`);
      if (!takesValue) {
        options.set(token, true);
        continue;
      }
      const value = tokens[i + 1];
      if (value === undefined || value === '--') return fail(`Option ${token} needs a value`);
      options.set(token, value);
      i++;
      continue;
    }

    positional.push(token);
  }

  return ok({ options, positional });
}

function stringOption(options: Map<string, string | true>, flag: string): string | undefined {
  const value = options.get(flag);
  return typeof value === 'string' ? value : undefined;
}

// ─── Parser ─────────────────────────────────────────────────────

/** Parse `argv` without the node binary and script path. */
export function parseCliArgs(argv: readonly string[]): Result<CliCommand, ValidationError> {
  const [first, ...rest] = argv;
  if (first === undefined || first === 'help' || first === '--help' || first === '-h') {
    return ok({ kind: 'help' });
  }
  if (!isSubcommand(first)) return fail(`Unknown command: ${first}`);

  const split = splitArgs(first, rest);
  if (!split.ok) return split;
  const { options, positional } = split.value;
  const joined = positional.join(' ').trim();
  const configPath = stringOption(options, '--config');

  switch (first) {
    case 'config':
      return ok({ kind: 'config', configPath });

    case 'cron':
      if (!joined) return fail('No cron expression given');
      return ok({ kind: 'cron', expression: joined });

    case 'check':
      if (!joined) return fail('No command given');
      return ok({ kind: 'check', command: joined, configPath });

    case 'run': {
      if (!joined) return fail('No command given');
      const timeoutText = stringOption(options, '--timeout');
      let timeout: number | undefined;
      if (timeoutText !== undefined) {
        const parsed = parseInteger('--timeout', timeoutText, 1);
        if (!parsed.ok) return parsed;
        timeout = parsed.value;
      }
      return ok({
        kind: 'run',
        command: joined,
        timeout,
        cwd: stringOption(options, '--cwd'),
        unsafe: options.has('--unsafe'),
        json: options.has('--json'),
        configPath,
      });
    }

    case 'schedule': {
      if (!joined) return fail('No command given');
      const cron = stringOption(options, '--cron');
      const atText = stringOption(options, '--at');
      if ((cron === undefined) === (atText === undefined)) {
        return fail('Schedule needs exactly one of --cron or --at');
      }

      let at: Date | undefined;
      if (atText !== undefined) {
        at = new Date(atText);
        if (Number.isNaN(at.getTime())) return fail(`Option --at is not a valid date: ${atText}`);
      }

      let maxExecutions: number | undefined;
      const maxText = stringOption(options, '--max');
      if (maxText !== undefined) {
        const parsed = parseInteger('--max', maxText, 1);
        if (!parsed.ok) return parsed;
        maxExecutions = parsed.value;
      }

      let maxRetries: number | undefined;
      const retriesText = stringOption(options, '--retries');
      if (retriesText !== undefined) {
        const parsed = parseInteger('--retries', retriesText, 0);
        if (!parsed.ok) return parsed;
        maxRetries = parsed.value;
      }

      return ok({
        kind: 'schedule',
        command: joined,
        cron,
        at,
        maxExecutions,
        maxRetries,
        name: stringOption(options, '--name'),
        unsafe: options.has('--unsafe'),
        json: options.has('--json'),
        configPath,
      });
    }

    default: {
      const unreachable: never = first;
      return unreachable;
    }
  }
}
