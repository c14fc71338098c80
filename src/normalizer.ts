import { fingerprintIntervals, fingerprintReference } from "./fingerprint";
import { logger } from "./logger";
import {
  MINUTES_PER_DAY,
  buildGrid,
  formatClock,
  parseClock,
  parseTimeRange,
} from "./time";
import type {
  ImageSnapshot,
  Interval,
  IntervalStatus,
  OutagePeriod,
  ProvisionalGroup,
  ProvisionalSlot,
  TimetableSnapshot,
} from "./types";

const log = logger.child("normalizer");

const STATUS_WEIGHT: Record<IntervalStatus, number> = {
  power_on: 0,
  uncertain: 1,
  power_off: 2,
};

export interface NormalizeContext {
  locationId: string;
  date: string;
  capturedAt: string;
  slotMinutes: number;
}

/**
 * Projects provisional slots onto the fixed grid. Each label is widened to
 * whole grid slots (start floors, end ceils); a slot hit by several labels
 * keeps the strongest status. Slots nothing covers default to power_on.
 */
export function toIntervals(slots: readonly ProvisionalSlot[], slotMinutes: number): Interval[] {
  const grid = buildGrid(slotMinutes);
  const statuses = grid.map((): IntervalStatus => "power_on");

  for (const slot of slots) {
    const range = parseTimeRange(slot.label);
    if (!range) {
      log.debug(`Ignoring unreadable slot label "${slot.label}"`);
      continue;
    }
    const first = Math.floor(range.start / slotMinutes);
    const last = Math.min(Math.ceil(range.end / slotMinutes), grid.length);
    for (let index = first; index < last; index++) {
      const current = statuses[index] ?? "power_on";
      if (STATUS_WEIGHT[slot.status] > STATUS_WEIGHT[current]) {
        statuses[index] = slot.status;
      }
    }
  }

  return grid.map((range, index) => ({
    start: formatClock(range.start),
    end: formatClock(range.end),
    status: statuses[index] ?? "power_on",
  }));
}

export function normalizeGroup(
  group: ProvisionalGroup,
  context: NormalizeContext
): TimetableSnapshot {
  const intervals = toIntervals(group.slots, context.slotMinutes);
  const snapshot: TimetableSnapshot = {
    kind: "timetable",
    locationId: context.locationId,
    key: group.key,
    date: context.date,
    intervals,
    fingerprint: fingerprintIntervals(intervals),
    capturedAt: context.capturedAt,
  };
  if (group.confirmedEmpty) {
    snapshot.confirmedEmpty = true;
  }
  return snapshot;
}

export function normalizeTimetable(
  groups: readonly ProvisionalGroup[],
  context: NormalizeContext
): TimetableSnapshot[] {
  return groups.map((group) => normalizeGroup(group, context));
}

/** All-power_on snapshots for groups 1..groupCount when the source confirms a day without outages. */
export function confirmedEmptyTimetable(
  groupCount: number,
  context: NormalizeContext
): TimetableSnapshot[] {
  return Array.from({ length: groupCount }, (_, index) =>
    normalizeGroup({ key: String(index + 1), slots: [], confirmedEmpty: true }, context)
  );
}

export function normalizeImage(
  url: string,
  context: Pick<NormalizeContext, "locationId" | "capturedAt">
): ImageSnapshot {
  return {
    kind: "image",
    locationId: context.locationId,
    url,
    fingerprint: fingerprintReference(url),
    capturedAt: context.capturedAt,
  };
}

/** Collapses contiguous intervals that share a status into periods. */
export function mergeIntervals(intervals: readonly Interval[]): OutagePeriod[] {
  const merged: OutagePeriod[] = [];
  for (const interval of intervals) {
    const previous = merged[merged.length - 1];
    if (previous && previous.status === interval.status && previous.end === interval.start) {
      previous.end = interval.end;
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

/**
 * Checks that intervals are sorted, contiguous and cover exactly one day in
 * equal steps of `slotMinutes`.
 */
export function coversDay(intervals: readonly Interval[], slotMinutes: number): boolean {
  if (intervals.length !== MINUTES_PER_DAY / slotMinutes) {
    return false;
  }
  let cursor = 0;
  for (const interval of intervals) {
    const start = parseClock(interval.start);
    const end = parseClock(interval.end);
    if (start === null || end === null || start !== cursor || end !== cursor + slotMinutes) {
      return false;
    }
    cursor = end;
  }
  return cursor === MINUTES_PER_DAY;
}
