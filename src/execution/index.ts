export type {
  ExecutionResult,
  ExecutionOutcome,
  RunningExecution,
  ProcessSample,
  ProcessTelemetry,
  ProcessInspector,
} from './types.js';
export {
  calculateDuration,
  createExecutionResult,
  isSuccessful,
  hasOutput,
  hasErrors,
  serializeExecutionResult,
} from './execution-result.js';
export type { ExecutionResultFields } from './execution-result.js';
export { createPsInspector, parsePsOutput } from './process-inspector.js';
export type { PsInspectorOptions } from './process-inspector.js';
export { createExecutor } from './executor.js';
export type { Executor, ExecutorOptions } from './executor.js';
