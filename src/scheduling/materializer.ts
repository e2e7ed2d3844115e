/**
 * Turns a schedule's command template into fresh pending Commands.
 * Each firing gets new Command ids; retries never reuse a Command.
 */
import { createCommand, DEFAULT_COMMAND_TIMEOUT_SECONDS } from '@/commands/command.js';
import { DEFAULT_DENY_LIST } from '@/commands/safety.js';
import type { Command } from '@/commands/types.js';
import type { Schedule } from './types.js';

export type CommandMaterializer = (schedule: Schedule) => Command[];

export interface TemplateMaterializerOptions {
  /** Seconds, used when the template sets no timeout. */
  defaultTimeout?: number;
  safeMode?: boolean;
  denyList?: readonly string[];
}

/** Create a materializer. Invalid template entries throw ValidationError. */
export function createTemplateMaterializer(options?: TemplateMaterializerOptions): CommandMaterializer {
  const defaultTimeout = options?.defaultTimeout ?? DEFAULT_COMMAND_TIMEOUT_SECONDS;
  const safeMode = options?.safeMode ?? true;
  const denyList = options?.denyList ?? DEFAULT_DENY_LIST;

  return (schedule) => {
    const template = schedule.commandTemplate;
    return template.parsedCommands.map((parsedCommand) =>
      createCommand(
        {
          originalRequest: template.originalRequest,
          parsedCommand,
          commandType: template.commandType ?? 'scheduled',
          workingDirectory: template.workingDirectory,
          environmentVariables: { ...template.environmentVariables },
          timeout: template.timeout ?? defaultTimeout,
          // Nobody is around to confirm a scheduled run.
          requiresConfirmation: false,
          safeMode,
          scheduleId: schedule.id,
        },
        { denyList },
      ),
    );
  };
}
