import { ScheduleRangeError } from "../lib/errors";
import type { ScheduleTable } from "./config";

/**
 * Which event to toot about: an explicit override wins, otherwise the
 * schedule decides by hour. null means nothing is due this hour.
 */
export function selectIndex(
  override: number | null,
  hour: number,
  table: ScheduleTable
): number | null {
  if (override !== null) return override;
  return table.get(hour) ?? null;
}

/** Fail fast when the schedule points past the events we actually parsed */
export function validateSchedule(table: ScheduleTable, entryCount: number) {
  for (const index of table.values()) {
    if (index < 0 || index >= entryCount) {
      throw new ScheduleRangeError(index, entryCount);
    }
  }
}

export function pickRecord<T>(records: readonly T[], index: number): T {
  if (!Number.isInteger(index) || index < 0 || index >= records.length) {
    throw new ScheduleRangeError(index, records.length);
  }
  return records[index];
}
