import { groupSlotsByDay, type TimedSlot } from "@slot-scanner/shared";
import type { EmailMessage } from "../adapters/email.js";

const SUBJECT_PREFIX = "[Slot Scanner]";

// Plain text only: one "YYYY-MM-DD:" line per day, then a tab-indented time per slot.
export function renderSlotEmail(
  slots: readonly TimedSlot[],
  locationId: number,
): EmailMessage {
  const days = groupSlotsByDay(slots);
  const first = days[0];
  if (!first) throw new Error("cannot render a notification without slots");

  const plural = slots.length > 1 ? "s" : "";
  const extraDays = days.length - 1;
  const more =
    extraDays > 0 ? ` (and ${extraDays} more day${extraDays > 1 ? "s" : ""})` : "";

  const lines = [`New appointment${plural} available at location ${locationId}:`];
  for (const day of days) {
    lines.push(`${day.date}:`);
    for (const s of day.slots) lines.push(`\t${s.start.toFormat("HH:mm")}`);
  }

  return {
    subject: `${SUBJECT_PREFIX} New appointment${plural} available on ${first.date}${more}`,
    text: lines.join("\n"),
  };
}
