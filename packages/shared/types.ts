// Single source of truth for slot types shared by the scanner and its tests.
import type { DateTime } from "luxon";

/** One entry of the scheduler's `/slots` response. */
export interface AppointmentSlot {
  locationId: number;
  startTimestamp: string; // YYYY-MM-DDTHH:mm, site-local wall clock
  // Passed through unchecked; the scheduler varies their types.
  endTimestamp?: unknown;
  active?: unknown;
  duration?: unknown; // minutes
  remoteInd?: unknown;
}

/** A slot together with its parsed start time. */
export interface TimedSlot {
  slot: AppointmentSlot;
  start: DateTime;
}

export interface SlotDay {
  date: string; // YYYY-MM-DD
  slots: TimedSlot[];
}

export interface SlotCriteria {
  earlierThan: DateTime;
  skipTimes?: ReadonlySet<string>; // slot keys, see slotKey()
}
