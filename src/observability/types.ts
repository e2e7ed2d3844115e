// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  commandId?: string;
  scheduleId?: string;
  handle?: string;
  [key: string]: unknown;
}
