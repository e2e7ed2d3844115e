/**
 * Tests for CLI output formatting.
 */
import { describe, it, expect } from 'vitest';
import { createExecutionResult } from '@/execution/execution-result.js';
import type { ExecutionResultFields } from '@/execution/execution-result.js';
import type { ExecutionResult } from '@/execution/types.js';
import { createSampleCommand } from '@/testing/fixtures/engine.js';
import {
  formatCronPreview,
  formatExecutionResult,
  formatSafetyVerdict,
  formatStats,
} from './format.js';

// ─── ANSI helpers (match source) ────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

function resultWith(fields: Partial<ExecutionResultFields>): ExecutionResult {
  return createExecutionResult(createSampleCommand(), {
    startedAt: new Date('2026-01-01T00:00:00.000Z'),
    completedAt: new Date('2026-01-01T00:00:00.250Z'),
    success: true,
    ...fields,
  });
}

// ─── formatExecutionResult ──────────────────────────────────────

describe('formatExecutionResult', () => {
  it('shows ok, duration and stdout without the trailing newline', () => {
    const output = formatExecutionResult(resultWith({ exitCode: 0, stdout: 'hello\n', stderr: '' }));
    expect(output).toBe(`${GREEN}ok${RESET} ${DIM}(0.25s)${RESET}\nhello`);
  });

  it('shows the exit code and stderr in red on failure', () => {
    const output = formatExecutionResult(resultWith({ success: false, exitCode: 3, stdout: '', stderr: 'bad\n' }));
    expect(output).toBe(`${RED}exit 3${RESET} ${DIM}(0.25s)${RESET}\n${RED}bad${RESET}`);
  });

  it('labels timeouts and cancellations', () => {
    expect(formatExecutionResult(resultWith({ success: false, exitCode: -1, timedOut: true }))).toBe(
      `${YELLOW}timed out${RESET} ${DIM}(0.25s)${RESET}`,
    );
    expect(formatExecutionResult(resultWith({ success: false, exitCode: -1, cancelled: true }))).toBe(
      `${YELLOW}cancelled${RESET} ${DIM}(0.25s)${RESET}`,
    );
  });
});

// ─── formatStats ────────────────────────────────────────────────

describe('formatStats', () => {
  it('lists counts per status and the next run', () => {
    const output = formatStats({
      running: true,
      total: 3,
      byStatus: { active: 2, inactive: 0, paused: 1, completed: 0, failed: 0 },
      nextExecution: new Date('2026-03-01T10:01:00.000Z'),
    });

    expect(output).toBe([
      `${BOLD}Scheduler:${RESET} running`,
      `${BOLD}Schedules:${RESET} 3 (active 2, inactive 0, paused 1, completed 0, failed 0)`,
      `${BOLD}Next run:${RESET} 2026-03-01T10:01:00.000Z`,
    ].join('\n'));
  });

  it('says none without a next run', () => {
    const output = formatStats({
      running: false,
      total: 0,
      byStatus: { active: 0, inactive: 0, paused: 0, completed: 0, failed: 0 },
    });
    expect(output.split('\n')[2]).toBe(`${BOLD}Next run:${RESET} none`);
  });
});

// ─── Others ─────────────────────────────────────────────────────

describe('formatCronPreview', () => {
  it('numbers each fire time', () => {
    expect(formatCronPreview('0 9 * * *', [
      new Date('2026-03-02T09:00:00.000Z'),
      new Date('2026-03-03T09:00:00.000Z'),
    ])).toBe(
      `${BOLD}0 9 * * *${RESET} ${DIM}(UTC)${RESET}\n  1. 2026-03-02T09:00:00.000Z\n  2. 2026-03-03T09:00:00.000Z`,
    );
  });
});

describe('formatSafetyVerdict', () => {
  it('marks allowed commands', () => {
    expect(formatSafetyVerdict('ls -la', [])).toBe(`${GREEN}allowed${RESET} ls -la`);
  });

  it('lists the matched patterns for blocked commands', () => {
    expect(formatSafetyVerdict('sudo rm -rf /', ['rm ', 'sudo'])).toBe(
      `${RED}blocked${RESET} sudo rm -rf / ${DIM}(matched "rm ", "sudo")${RESET}`,
    );
  });
});
