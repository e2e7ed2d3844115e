/**
 * Tests for the CLI entry point. `run` spawns real shell processes.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { main } from './main.js';

describe('main', () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.stubEnv('LOG_LEVEL', 'silent');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  function printed(): string {
    return log.mock.calls.map((args) => args.join(' ')).join('\n');
  }

  it('prints usage for help', async () => {
    expect(await main(['help'])).toBe(0);
    expect(printed()).toContain('runwarden run');
  });

  it('exits 2 on bad arguments', async () => {
    expect(await main(['run', '--timeout', 'soon', '--', 'true'])).toBe(2);
    expect(error).toHaveBeenCalledWith('\x1b[31mOption --timeout must be a positive integer\x1b[0m');
  });

  it('previews cron fire times', async () => {
    expect(await main(['cron', '*/10 * * * *'])).toBe(0);
    expect(log.mock.calls[0]?.[0]).toMatch(/^\x1b\[1m\*\/10 \* \* \* \*/);
  });

  it('exits 1 for an invalid cron expression', async () => {
    expect(await main(['cron', 'every', 'day'])).toBe(1);
  });

  it('reports the safety verdict through the exit status', async () => {
    expect(await main(['check', 'ls', '-la'])).toBe(0);
    expect(await main(['check', 'sudo', 'reboot'])).toBe(1);
  });

  it('prints the resolved default configuration', async () => {
    vi.stubEnv('LOG_LEVEL', 'silent');
    expect(await main(['config'])).toBe(0);
    const config: unknown = JSON.parse(printed());
    expect(config).toMatchObject({
      logLevel: 'info',
      executor: { gracePeriodMs: 5000, defaultTimeoutSeconds: 300 },
      safety: { safeMode: true },
    });
  });

  it('exits 1 when the config file is missing', async () => {
    expect(await main(['config', '--config', '/runwarden/missing.json'])).toBe(1);
    expect(error).toHaveBeenCalledWith('\x1b[31mConfiguration file not found: /runwarden/missing.json\x1b[0m');
  });

  it('runs a command and prints its JSON outcome', async () => {
    expect(await main(['run', '--json', '--', 'echo', 'hello'])).toBe(0);

    const output: unknown = JSON.parse(printed());
    expect(output).toMatchObject({
      command: { parsedCommand: 'echo hello', status: 'completed', exitCode: 0 },
      result: { success: true, exitCode: 0, stdout: 'hello\n' },
    });
  });

  it('mirrors the command exit status', async () => {
    expect(await main(['run', '--', 'exit 4'])).toBe(4);
  });

  it('refuses a blocked command in safe mode', async () => {
    expect(await main(['run', '--', 'sudo true'])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      '\x1b[33mRefusing to run in safe mode. Pass --unsafe to override.\x1b[0m',
    );
  });
});
