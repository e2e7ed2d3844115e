import { describe, it, expect, afterEach, vi } from 'vitest';
import { defaultConfig } from '@/config/loader.js';
import type { EngineConfigInput } from '@/config/schema.js';
import type { ExecutionOutcome } from '@/execution/types.js';
import { createMockLogger } from '@/testing/fixtures/engine.js';
import { createEngine } from './engine.js';
import type { Engine } from './engine.js';

describe('createEngine', () => {
  let engine: Engine | undefined;

  afterEach(async () => {
    await engine?.shutdown();
    engine = undefined;
  });

  function setup(
    overrides: EngineConfigInput = {},
    onExecution?: (name: string, outcome: ExecutionOutcome) => void,
  ): Engine {
    engine = createEngine({
      config: defaultConfig(overrides),
      logger: createMockLogger(),
      onExecution: onExecution
        ? (schedule, outcome) => {
          onExecution(schedule.name, outcome);
        }
        : undefined,
    });
    return engine;
  }

  it('builds commands with the configured defaults', () => {
    const command = setup({
      executor: { defaultTimeoutSeconds: 42 },
      safety: { safeMode: false, requireConfirmation: false },
    }).buildCommand({ originalRequest: 'list files', parsedCommand: 'ls' });

    expect(command.timeout).toBe(42);
    expect(command.safeMode).toBe(false);
    expect(command.requiresConfirmation).toBe(false);
    expect(command.status).toBe('pending');
  });

  it('lets explicit command fields win over config', () => {
    const command = setup({ executor: { defaultTimeoutSeconds: 42 } }).buildCommand({
      originalRequest: 'list files',
      parsedCommand: 'ls',
      timeout: 5,
    });

    expect(command.timeout).toBe(5);
  });

  it('applies a configured deny list to the safety verdict', () => {
    const command = setup({ safety: { denyList: ['curl'] } }).buildCommand({
      originalRequest: 'fetch',
      parsedCommand: 'curl http://localhost',
    });

    expect(command.allowedInSafeMode).toBe(false);
  });

  it('gates execution with the configured deny list', async () => {
    const instance = setup({ safety: { denyList: ['printf'] } });
    const command = instance.buildCommand({ originalRequest: 'print', parsedCommand: 'printf hi' });

    await expect(instance.executor.execute(command)).rejects.toThrow('blocked by safe mode');
  });

  it('starts the scheduler loop', () => {
    const instance = setup();
    instance.start();
    expect(instance.scheduler.isRunning()).toBe(true);
  });

  it('leaves the scheduler stopped when disabled', () => {
    const instance = setup({ scheduler: { enabled: false } });
    instance.start();
    expect(instance.scheduler.isRunning()).toBe(false);
  });

  it('stops the scheduler and cancels in-flight executions on shutdown', async () => {
    const instance = setup({ executor: { gracePeriodMs: 500 } });
    instance.start();
    const running = instance.executor.start(
      instance.buildCommand({ originalRequest: 'wait', parsedCommand: 'sleep 10', safeMode: false }),
    );

    await instance.shutdown();

    expect(instance.scheduler.isRunning()).toBe(false);
    expect(instance.executor.runningCount()).toBe(0);
    const { result } = await running.completion;
    expect(result.cancelled).toBe(true);
  }, 10_000);

  it('terminates a command the scheduler started when shutting down', async () => {
    const outcomes: ExecutionOutcome[] = [];
    const instance = setup(
      { executor: { gracePeriodMs: 500 }, scheduler: { pollIntervalMs: 50 } },
      (_name, outcome) => outcomes.push(outcome),
    );
    instance.scheduler.add({
      name: 'long-job',
      commandTemplate: { originalRequest: 'wait a while', parsedCommands: ['sleep 10'] },
    });

    instance.start();
    await vi.waitFor(() => {
      expect(instance.executor.runningCount()).toBe(1);
    }, { timeout: 3_000, interval: 20 });

    const shutdownStartedAt = Date.now();
    await instance.shutdown();

    expect(Date.now() - shutdownStartedAt).toBeLessThan(2_000);
    expect(instance.executor.runningCount()).toBe(0);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]?.result.cancelled).toBe(true);
    expect(outcomes[0]?.command.status).toBe('cancelled');
  }, 10_000);

  it('runs a quick schedule while a slow one registered earlier is still going', async () => {
    const finished: string[] = [];
    const instance = setup(
      { executor: { gracePeriodMs: 500 }, scheduler: { pollIntervalMs: 50 } },
      (name) => finished.push(name),
    );
    instance.scheduler.add({
      name: 'slow',
      commandTemplate: { originalRequest: 'slow job', parsedCommands: ['sleep 10'] },
    });
    instance.scheduler.add({
      name: 'fast',
      commandTemplate: { originalRequest: 'fast job', parsedCommands: ['echo hi'] },
    });

    instance.start();
    await vi.waitFor(() => {
      expect(finished).toEqual(['fast']);
    }, { timeout: 3_000, interval: 20 });

    expect(instance.executor.runningCount()).toBe(1);
    await instance.shutdown();
    expect(finished).toEqual(['fast', 'slow']);
  }, 10_000);

  it('shares one shutdown between callers', () => {
    const instance = setup();
    expect(instance.shutdown()).toBe(instance.shutdown());
  });
});
