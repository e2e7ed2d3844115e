// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a ScheduleId where a CommandId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type CommandId = Brand<string, 'CommandId'>;
export type ScheduleId = Brand<string, 'ScheduleId'>;
export type ExecutionResultId = Brand<string, 'ExecutionResultId'>;
/** Opaque key of one in-flight process inside the executor registry. */
export type ExecutionHandle = Brand<string, 'ExecutionHandle'>;

/** Branding helpers. IDs are minted only here, so the brand stays honest. */
export function toCommandId(value: string): CommandId {
  return value as CommandId;
}

export function toScheduleId(value: string): ScheduleId {
  return value as ScheduleId;
}

export function toExecutionResultId(value: string): ExecutionResultId {
  return value as ExecutionResultId;
}

export function toExecutionHandle(value: string): ExecutionHandle {
  return value as ExecutionHandle;
}
