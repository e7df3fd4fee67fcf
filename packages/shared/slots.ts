import { DateTime } from "luxon";
import { z } from "zod";
import type {
  AppointmentSlot,
  SlotCriteria,
  SlotDay,
  TimedSlot,
} from "./types.js";

// Timestamps carry no offset; they are read as wall-clock values in a fixed
// zone so that the host time zone never shifts a slot across midnight.
export const SLOT_ZONE = "UTC";
export const SLOT_KEY_FORMAT = "yyyy-MM-dd'T'HH:mm";
export const DAY_FORMAT = "yyyy-MM-dd";

// Only the fields the scanner reads are checked; the rest ride along as-is.
export const SlotSchema = z.object({
  locationId: z.number().int(),
  startTimestamp: z.string().min(1),
  endTimestamp: z.unknown().optional(),
  active: z.unknown().optional(),
  duration: z.unknown().optional(),
  remoteInd: z.unknown().optional(),
});

export const SlotListSchema = z.array(SlotSchema);

export function parseSlotTimestamp(value: string): DateTime {
  const dt = DateTime.fromISO(value, { zone: SLOT_ZONE });
  if (!dt.isValid) {
    throw new Error(`Invalid slot timestamp (${value}): ${dt.invalidReason}`);
  }
  return dt;
}

/** Parses a YYYY-MM-DD cutoff into the start of that day. */
export function parseCutoff(value: string): DateTime {
  const dt = DateTime.fromISO(value, { zone: SLOT_ZONE });
  if (!dt.isValid) {
    throw new Error(`Invalid cutoff date (${value}): ${dt.invalidReason}`);
  }
  return dt.startOf("day");
}

export function toTimedSlot(slot: AppointmentSlot): TimedSlot {
  return { slot, start: parseSlotTimestamp(slot.startTimestamp) };
}

export function slotKey(slot: TimedSlot): string {
  return slot.start.toFormat(SLOT_KEY_FORMAT);
}

/**
 * Keeps slots whose calendar date is strictly before the cutoff day and
 * whose start is not listed in `skipTimes`, ordered by start time.
 */
export function filterEarlierSlots(
  slots: readonly TimedSlot[],
  criteria: SlotCriteria,
): TimedSlot[] {
  // Compare timestamps, not objects
  const cutoffMs = criteria.earlierThan.startOf("day").toMillis();
  const skip = criteria.skipTimes;

  return slots
    .filter((s) => s.start.toMillis() < cutoffMs)
    .filter((s) => !skip?.has(slotKey(s)))
    .sort((a, b) => a.start.toMillis() - b.start.toMillis());
}

export function groupSlotsByDay(slots: readonly TimedSlot[]): SlotDay[] {
  const byDay = new Map<string, TimedSlot[]>();
  for (const s of slots) {
    const date = s.start.toFormat(DAY_FORMAT);
    const bucket = byDay.get(date);
    if (bucket) bucket.push(s);
    else byDay.set(date, [s]);
  }
  return [...byDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, daySlots]) => ({ date, slots: daySlots }));
}
