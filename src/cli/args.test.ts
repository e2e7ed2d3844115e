/**
 * Tests for CLI argument parsing.
 */
import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './args.js';

function errorOf(argv: string[]): string | undefined {
  const result = parseCliArgs(argv);
  return result.ok ? undefined : result.error.message;
}

// ─── Subcommand selection ───────────────────────────────────────

describe('parseCliArgs', () => {
  it('returns help when no args given', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, value: { kind: 'help' } });
    expect(parseCliArgs(['--help'])).toEqual({ ok: true, value: { kind: 'help' } });
  });

  it('rejects unknown subcommands', () => {
    expect(errorOf(['frobnicate'])).toBe('Unknown command: frobnicate');
  });

  // ── run ──────────────────────────────────────────────────────

  describe('run', () => {
    it('parses every option and the command after --', () => {
      const result = parseCliArgs([
        'run', '--timeout', '5', '--cwd', '/tmp', '--unsafe', '--json', '--config', 'engine.json',
        '--', 'echo', 'hi',
      ]);

      expect(result).toEqual({
        ok: true,
        value: {
          kind: 'run',
          command: 'echo hi',
          timeout: 5,
          cwd: '/tmp',
          unsafe: true,
          json: true,
          configPath: 'engine.json',
        },
      });
    });

    it('accepts a bare command without --', () => {
      const result = parseCliArgs(['run', 'echo', 'hi']);
      expect(result.ok && result.value).toEqual({
        kind: 'run',
        command: 'echo hi',
        unsafe: false,
        json: false,
      });
    });

    it('keeps options after -- as part of the command', () => {
      const result = parseCliArgs(['run', '--', 'ls', '--all']);
      expect(result.ok && result.value.kind === 'run' && result.value.command).toBe('ls --all');
    });

    it('rejects a non-positive timeout', () => {
      expect(errorOf(['run', '--timeout', '0', '--', 'true'])).toBe('Option --timeout must be a positive integer');
      expect(errorOf(['run', '--timeout', '1.5', '--', 'true'])).toBe('Option --timeout must be a positive integer');
    });

    it('rejects an option without its value', () => {
      expect(errorOf(['run', '--timeout'])).toBe('Option --timeout needs a value');
      expect(errorOf(['run', '--cwd', '--', 'true'])).toBe('Option --cwd needs a value');
    });

    it('rejects unknown options', () => {
      expect(errorOf(['run', '--cron', '* * * * *', '--', 'true'])).toBe('Unknown option for run: --cron');
    });

    it('requires a command', () => {
      expect(errorOf(['run'])).toBe('No command given');
      expect(errorOf(['run', '--', '  '])).toBe('No command given');
    });
  });

  // ── schedule ─────────────────────────────────────────────────

  describe('schedule', () => {
    it('parses a cron schedule', () => {
      const result = parseCliArgs([
        'schedule', '--cron', '*/5 * * * *', '--max', '3', '--retries', '0', '--name', 'tick',
        '--', 'echo', 'tick',
      ]);

      expect(result.ok && result.value).toEqual({
        kind: 'schedule',
        command: 'echo tick',
        cron: '*/5 * * * *',
        maxExecutions: 3,
        maxRetries: 0,
        name: 'tick',
        unsafe: false,
        json: false,
      });
    });

    it('parses a one-off schedule time', () => {
      const result = parseCliArgs(['schedule', '--at', '2026-05-01T08:00:00Z', '--', 'echo', 'once']);
      expect(result.ok && result.value.kind === 'schedule' && result.value.at).toEqual(
        new Date('2026-05-01T08:00:00.000Z'),
      );
    });

    it('requires exactly one of --cron and --at', () => {
      const message = 'Schedule needs exactly one of --cron or --at';
      expect(errorOf(['schedule', '--', 'true'])).toBe(message);
      expect(errorOf(['schedule', '--cron', '* * * * *', '--at', '2026-05-01T08:00:00Z', '--', 'true'])).toBe(message);
    });

    it('rejects an invalid date', () => {
      expect(errorOf(['schedule', '--at', 'soon', '--', 'true'])).toBe('Option --at is not a valid date: soon');
    });

    it('rejects invalid counts', () => {
      expect(errorOf(['schedule', '--cron', '* * * * *', '--max', '0', '--', 'true'])).toBe(
        'Option --max must be a positive integer',
      );
      expect(errorOf(['schedule', '--cron', '* * * * *', '--retries', '-1', '--', 'true'])).toBe(
        'Option --retries must be a non-negative integer',
      );
    });
  });

  // ── check / cron / config ────────────────────────────────────

  it('parses check', () => {
    expect(parseCliArgs(['check', 'sudo', 'ls'])).toEqual({
      ok: true,
      value: { kind: 'check', command: 'sudo ls' },
    });
  });

  it('joins cron fields into one expression', () => {
    const result = parseCliArgs(['cron', '0', '9', '*', '*', '1-5']);
    expect(result.ok && result.value).toEqual({ kind: 'cron', expression: '0 9 * * 1-5' });
    expect(errorOf(['cron'])).toBe('No cron expression given');
  });

  it('parses config with a file', () => {
    const result = parseCliArgs(['config', '--config', 'runwarden.json']);
    expect(result.ok && result.value).toEqual({ kind: 'config', configPath: 'runwarden.json' });
  });
});
