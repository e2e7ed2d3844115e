/**
 * Zod schemas for validating engine configuration files.
 * Every field has a default, so `{}` is a valid config file.
 */
import { z } from 'zod';

// ─── Executor Config ────────────────────────────────────────────

/**
 * Schema for executor settings.
 * The grace period is the window between SIGTERM and SIGKILL.
 */
export const executorConfigSchema = z.object({
  gracePeriodMs: z.number().int().positive('Grace period must be a positive integer').default(5_000),
  defaultTimeoutSeconds: z
    .number()
    .int()
    .positive('Default timeout must be a positive integer')
    .default(300),
});

// ─── Scheduler Config ───────────────────────────────────────────

export const schedulerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  pollIntervalMs: z.number().int().positive('Poll interval must be a positive integer').default(1_000),
  errorBackoffMs: z.number().int().positive('Error backoff must be a positive integer').default(5_000),
});

// ─── Safety Config ──────────────────────────────────────────────

/**
 * Schema for the safety gate.
 * When `denyList` is omitted the built-in list applies.
 */
export const safetyConfigSchema = z.object({
  safeMode: z.boolean().default(true),
  requireConfirmation: z.boolean().default(true),
  denyList: z.array(z.string().min(1, 'Deny-list entries cannot be empty')).optional(),
});

// ─── Engine Config File ─────────────────────────────────────────

export const engineConfigSchema = z.object({
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  executor: executorConfigSchema.default({}),
  scheduler: schedulerConfigSchema.default({}),
  safety: safetyConfigSchema.default({}),
});

// ─── Inferred Types ─────────────────────────────────────────────

/** Config as written in a file, before defaults are applied. */
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
