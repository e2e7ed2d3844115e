// ─── Types ──────────────────────────────────────────────────────
export type { EngineConfig, ExecutorConfig, SchedulerConfig, SafetyConfig } from './types.js';
export type { EngineConfigInput } from './schema.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  engineConfigSchema,
  executorConfigSchema,
  safetyConfigSchema,
  schedulerConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  ConfigError,
  defaultConfig,
  loadEngineConfig,
  resolveConfig,
  resolveEnvVars,
} from './loader.js';
