import { describe, it, expect } from "vitest";
import {
  filterEarlierSlots,
  groupSlotsByDay,
  parseCutoff,
  parseSlotTimestamp,
  slotKey,
  toTimedSlot,
} from "./slots.js";
import type { TimedSlot } from "./types.js";

function timed(startTimestamp: string, locationId = 5446): TimedSlot {
  return toTimedSlot({ locationId, startTimestamp });
}

const keys = (slots: TimedSlot[]) => slots.map(slotKey);

describe("parseSlotTimestamp", () => {
  it("keeps the wall-clock time of the site", () => {
    const dt = parseSlotTimestamp("2025-06-01T08:15");
    expect(dt.toFormat("yyyy-MM-dd HH:mm")).toBe("2025-06-01 08:15");
  });

  it("rejects values luxon cannot parse", () => {
    expect(() => parseSlotTimestamp("next tuesday")).toThrow(
      /Invalid slot timestamp \(next tuesday\)/,
    );
  });
});

describe("parseCutoff", () => {
  it("returns the start of the given day", () => {
    expect(parseCutoff("2025-12-31").toFormat("yyyy-MM-dd'T'HH:mm")).toBe(
      "2025-12-31T00:00",
    );
  });

  it("rejects impossible dates", () => {
    expect(() => parseCutoff("2025-02-30")).toThrow(/Invalid cutoff date/);
  });
});

describe("filterEarlierSlots", () => {
  const earlierThan = parseCutoff("2025-12-31");

  it("includes every slot dated before the cutoff", () => {
    const slots = [
      timed("2025-01-02T09:00"),
      timed("2025-12-30T23:45"),
      timed("2025-07-04T12:00"),
    ];
    expect(keys(filterEarlierSlots(slots, { earlierThan }))).toEqual([
      "2025-01-02T09:00",
      "2025-07-04T12:00",
      "2025-12-30T23:45",
    ]);
  });

  it("excludes slots on the cutoff day and later", () => {
    const slots = [
      timed("2025-12-31T00:00"),
      timed("2025-12-31T08:00"),
      timed("2026-01-05T10:30"),
    ];
    expect(filterEarlierSlots(slots, { earlierThan })).toEqual([]);
  });

  it("keeps exactly one of a before/after pair", () => {
    const slots = [timed("2026-02-01T08:00"), timed("2025-11-15T14:00")];
    expect(keys(filterEarlierSlots(slots, { earlierThan }))).toEqual([
      "2025-11-15T14:00",
    ]);
  });

  it("drops skipped start times", () => {
    const slots = [timed("2025-12-25T08:00"), timed("2025-12-25T09:00")];
    const skipTimes = new Set(["2025-12-25T08:00"]);
    expect(keys(filterEarlierSlots(slots, { earlierThan, skipTimes }))).toEqual(
      ["2025-12-25T09:00"],
    );
  });

  it("returns an empty list for an empty response", () => {
    expect(filterEarlierSlots([], { earlierThan })).toEqual([]);
  });
});

describe("groupSlotsByDay", () => {
  it("groups by calendar day in ascending order", () => {
    const days = groupSlotsByDay([
      timed("2025-06-03T10:00"),
      timed("2025-06-01T08:00"),
      timed("2025-06-01T08:15"),
    ]);
    expect(days.map((d) => [d.date, keys(d.slots)])).toEqual([
      ["2025-06-01", ["2025-06-01T08:00", "2025-06-01T08:15"]],
      ["2025-06-03", ["2025-06-03T10:00"]],
    ]);
  });
});
