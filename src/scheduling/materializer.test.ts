import { describe, it, expect } from 'vitest';
import { createSampleSchedule } from '@/testing/fixtures/engine.js';
import { createTemplateMaterializer } from './materializer.js';

describe('createTemplateMaterializer', () => {
  it('creates one pending command per template entry', () => {
    const schedule = createSampleSchedule({
      commandTemplate: {
        originalRequest: 'rotate logs',
        parsedCommands: ['echo first', 'echo second'],
        workingDirectory: '/var/tmp',
        environmentVariables: { STAGE: 'nightly' },
      },
    });

    const commands = createTemplateMaterializer({ defaultTimeout: 60 })(schedule);

    expect(commands.map((command) => command.parsedCommand)).toEqual(['echo first', 'echo second']);
    for (const command of commands) {
      expect(command.status).toBe('pending');
      expect(command.originalRequest).toBe('rotate logs');
      expect(command.commandType).toBe('scheduled');
      expect(command.scheduleId).toBe(schedule.id);
      expect(command.workingDirectory).toBe('/var/tmp');
      expect(command.environmentVariables).toEqual({ STAGE: 'nightly' });
      expect(command.timeout).toBe(60);
      expect(command.requiresConfirmation).toBe(false);
      expect(command.safeMode).toBe(true);
    }
  });

  it('mints new command ids on every firing', () => {
    const schedule = createSampleSchedule();
    const materialize = createTemplateMaterializer();

    const [first] = materialize(schedule);
    const [second] = materialize(schedule);

    expect(first?.id).toBeDefined();
    expect(first?.id).not.toBe(second?.id);
  });

  it('prefers the template timeout and command type', () => {
    const schedule = createSampleSchedule({
      commandTemplate: {
        originalRequest: 'cron job',
        parsedCommands: ['echo tick'],
        timeout: 15,
        commandType: 'cron',
      },
    });

    const [command] = createTemplateMaterializer({ defaultTimeout: 60 })(schedule);

    expect(command?.timeout).toBe(15);
    expect(command?.commandType).toBe('cron');
  });

  it('computes allowedInSafeMode with the configured deny list', () => {
    const schedule = createSampleSchedule({
      commandTemplate: { originalRequest: 'deploy', parsedCommands: ['deploy --prod'] },
    });

    const [command] = createTemplateMaterializer({ denyList: ['--prod'] })(schedule);

    expect(command?.allowedInSafeMode).toBe(false);
  });

  it('honors safeMode off', () => {
    const [command] = createTemplateMaterializer({ safeMode: false })(createSampleSchedule());
    expect(command?.safeMode).toBe(false);
  });
});
