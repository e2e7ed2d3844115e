/**
 * ProcessInspector backed by `ps`.
 *
 * One `ps` call samples every requested pid. `ps` exits 1 when some of
 * the pids no longer exist; whatever it did print is still used.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ProcessInspector, ProcessSample } from './types.js';

const execFileAsync = promisify(execFile);

export interface PsInspectorOptions {
  /** Upper bound for one `ps` call. Default: 3000ms. */
  timeoutMs?: number;
}

/**
 * Parse `ps -o pid=,stat=,%cpu=,rss=` output.
 * Malformed lines are skipped.
 */
export function parsePsOutput(output: string): Map<number, ProcessSample> {
  const samples = new Map<number, ProcessSample>();

  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 4) continue;

    const [pidText, status, cpuText, rssText] = parts;
    if (pidText === undefined || status === undefined || cpuText === undefined || rssText === undefined) {
      continue;
    }

    const pid = Number.parseInt(pidText, 10);
    if (Number.isNaN(pid)) continue;

    samples.set(pid, {
      pid,
      status,
      cpuPercent: Number.parseFloat(cpuText) || 0,
      memoryBytes: (Number.parseInt(rssText, 10) || 0) * 1024, // KB to bytes
    });
  }

  return samples;
}

function exitCodeOf(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

function stdoutOf(error: unknown): string {
  return error instanceof Error && 'stdout' in error && typeof error.stdout === 'string'
    ? error.stdout
    : '';
}

/** Create an inspector that shells out to `ps`. Returns nothing on Windows. */
export function createPsInspector(options?: PsInspectorOptions): ProcessInspector {
  const timeoutMs = options?.timeoutMs ?? 3_000;

  return {
    async inspect(pids: readonly number[]): Promise<Map<number, ProcessSample>> {
      if (pids.length === 0 || process.platform === 'win32') {
        return new Map();
      }

      try {
        const { stdout } = await execFileAsync(
          'ps',
          ['-o', 'pid=,stat=,%cpu=,rss=', '-p', pids.join(',')],
          { timeout: timeoutMs },
        );
        return parsePsOutput(stdout);
      } catch (error) {
        if (exitCodeOf(error) === 1) {
          return parsePsOutput(stdoutOf(error));
        }
        throw error;
      }
    },
  };
}
