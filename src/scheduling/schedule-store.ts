/**
 * ScheduleStore — the scheduler's collection of registered schedules.
 *
 * Entries are whole immutable values, so a reader never sees a
 * half-updated schedule. `replace` drops the update when the id has been
 * removed in the meantime; a cycle that finishes after `remove()` must
 * not resurrect its schedule.
 */
import type { ScheduleId } from '@/core/types.js';
import type { Schedule } from './types.js';

export interface ScheduleStore {
  get(id: ScheduleId): Schedule | undefined;
  /** Registration order. */
  list(): Schedule[];
  /** Insert or overwrite. */
  insert(schedule: Schedule): void;
  /** Overwrite an existing entry. False when the id is not registered. */
  replace(schedule: Schedule): boolean;
  delete(id: ScheduleId): boolean;
  size(): number;
}

export function createInMemoryScheduleStore(): ScheduleStore {
  const schedules = new Map<ScheduleId, Schedule>();

  return {
    get(id) {
      return schedules.get(id);
    },

    list() {
      return [...schedules.values()];
    },

    insert(schedule) {
      schedules.set(schedule.id, schedule);
    },

    replace(schedule) {
      if (!schedules.has(schedule.id)) return false;
      schedules.set(schedule.id, schedule);
      return true;
    },

    delete(id) {
      return schedules.delete(id);
    },

    size() {
      return schedules.size;
    },
  };
}
