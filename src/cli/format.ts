/**
 * Terminal rendering for CLI output.
 */
import type { ExecutionResult } from '@/execution/types.js';
import type { SchedulerStats } from '@/scheduling/scheduler.js';

// ─── ANSI Colors ────────────────────────────────────────────────

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';

// ─── Execution Results ──────────────────────────────────────────

function formatSeconds(seconds: number | undefined): string {
  return `${(seconds ?? 0).toFixed(2)}s`;
}

export function formatResultStatus(result: ExecutionResult): string {
  const elapsed = `${DIM}(${formatSeconds(result.duration)})${RESET}`;
  if (result.timedOut) return `${YELLOW}timed out${RESET} ${elapsed}`;
  if (result.cancelled) return `${YELLOW}cancelled${RESET} ${elapsed}`;
  if (result.success) return `${GREEN}ok${RESET} ${elapsed}`;
  return `${RED}exit ${result.exitCode ?? '?'}${RESET} ${elapsed}`;
}

/** Status line, then stdout, then stderr in red. Trailing newlines are dropped. */
export function formatExecutionResult(result: ExecutionResult): string {
  const lines = [formatResultStatus(result)];
  const stdout = (result.stdout ?? '').trimEnd();
  const stderr = (result.stderr ?? '').trimEnd();
  if (stdout) lines.push(stdout);
  if (stderr) lines.push(`${RED}${stderr}${RESET}`);
  return lines.join('\n');
}

// ─── Scheduler ──────────────────────────────────────────────────

export function formatStats(stats: SchedulerStats): string {
  const counts = Object.entries(stats.byStatus)
    .map(([status, count]) => `${status} ${count}`)
    .join(', ');
  return [
    `${BOLD}Scheduler:${RESET} ${stats.running ? 'running' : 'stopped'}`,
    `${BOLD}Schedules:${RESET} ${stats.total} (${counts})`,
    `${BOLD}Next run:${RESET} ${stats.nextExecution?.toISOString() ?? 'none'}`,
  ].join('\n');
}

export function formatCronPreview(expression: string, runs: readonly Date[]): string {
  return [
    `${BOLD}${expression}${RESET} ${DIM}(UTC)${RESET}`,
    ...runs.map((run, i) => `  ${i + 1}. ${run.toISOString()}`),
  ].join('\n');
}

// ─── Safety ─────────────────────────────────────────────────────

export function formatSafetyVerdict(command: string, matched: readonly string[]): string {
  if (matched.length === 0) return `${GREEN}allowed${RESET} ${command}`;
  const patterns = matched.map((pattern) => `"${pattern}"`).join(', ');
  return `${RED}blocked${RESET} ${command} ${DIM}(matched ${patterns})${RESET}`;
}
