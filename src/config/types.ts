import type { z } from 'zod';
import type {
  engineConfigSchema,
  executorConfigSchema,
  safetyConfigSchema,
  schedulerConfigSchema,
} from './schema.js';

// ─── Engine Configuration ───────────────────────────────────────

/** Fully resolved engine configuration, all defaults applied. */
export type EngineConfig = z.infer<typeof engineConfigSchema>;

export type ExecutorConfig = z.infer<typeof executorConfigSchema>;
export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;
export type SafetyConfig = z.infer<typeof safetyConfigSchema>;
