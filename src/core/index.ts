// Core module — branded IDs, Result, error taxonomy
export type {
  CommandId,
  ExecutionHandle,
  ExecutionResultId,
  ScheduleId,
} from './types.js';
export {
  toCommandId,
  toExecutionHandle,
  toExecutionResultId,
  toScheduleId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  RunwardenError,
  ValidationError,
  InvalidStateError,
  DispatchError,
  errorMessage,
} from './errors.js';
