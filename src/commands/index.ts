// Commands module — Command entity, safety gate, state machine
export type {
  Command,
  CommandCreateInput,
  CommandStatus,
  CommandType,
  CompletionInput,
  SerializedCommand,
} from './types.js';

export {
  DEFAULT_COMMAND_TIMEOUT_SECONDS,
  cancelExecution,
  canExecute,
  completeExecution,
  createCommand,
  describeCommand,
  isTerminal,
  serializeCommand,
  startExecution,
} from './command.js';

export { DEFAULT_DENY_LIST, findDeniedPatterns, isSafeCommand } from './safety.js';
