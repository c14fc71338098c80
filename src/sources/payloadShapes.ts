import { z } from "zod";
import type { ProvisionalGroup, ProvisionalSlot } from "../types";
import { MINUTES_PER_DAY, parseTimeRange, type MinuteRange } from "../time";
import { expandMark, markFromToken } from "./statusMarkers";

const LabelledItem = z.object({
  time: z.string(),
  status: z.unknown(),
});

const RangedItem = z.object({
  start: z.string(),
  end: z.string(),
  status: z.unknown(),
});

const GroupRecord = z
  .object({
    group: z.union([z.string(), z.number()]).optional(),
    queue: z.union([z.string(), z.number()]).optional(),
    intervals: z.unknown().optional(),
    schedule: z.unknown().optional(),
    slots: z.unknown().optional(),
    hours: z.unknown().optional(),
  })
  .passthrough();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function slotsFromMark(range: MinuteRange, status: unknown): ProvisionalSlot[] | null {
  const mark = markFromToken(status);
  return mark ? expandMark(range, mark) : null;
}

/**
 * Reads a list of intervals in one of the shapes upstream payloads use:
 * `{ time, status }`, `{ start, end, status }`, bare statuses spread over an
 * even grid, or an object keyed by hour number ("1" is 00:00-01:00).
 */
export function readSlotItems(value: unknown): ProvisionalSlot[] | null {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return [];
    }
    const evenSlot = MINUTES_PER_DAY % value.length === 0 ? MINUTES_PER_DAY / value.length : null;
    const slots: ProvisionalSlot[] = [];

    for (const [index, item] of value.entries()) {
      const labelled = LabelledItem.safeParse(item);
      const ranged = RangedItem.safeParse(item);
      let range: MinuteRange | null = null;
      let status: unknown = item;

      if (labelled.success) {
        range = parseTimeRange(labelled.data.time);
        status = labelled.data.status;
      } else if (ranged.success) {
        range = parseTimeRange(`${ranged.data.start}-${ranged.data.end}`);
        status = ranged.data.status;
      } else if (evenSlot !== null) {
        range = { start: index * evenSlot, end: (index + 1) * evenSlot };
      }

      if (!range) {
        return null;
      }
      const expanded = slotsFromMark(range, status);
      if (!expanded) {
        return null;
      }
      slots.push(...expanded);
    }
    return slots;
  }

  if (isRecord(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0 || !entries.every(([key]) => /^\d{1,2}$/.test(key))) {
      return null;
    }
    const slots: ProvisionalSlot[] = [];
    for (const [key, status] of entries) {
      const hour = parseInt(key, 10);
      if (hour < 1 || hour > 24) {
        return null;
      }
      const expanded = slotsFromMark({ start: (hour - 1) * 60, end: hour * 60 }, status);
      if (!expanded) {
        return null;
      }
      slots.push(...expanded);
    }
    return slots;
  }

  return null;
}

export function groupNumberFrom(value: unknown, groupCount?: number): number | null {
  const match = String(value).match(/\d+/);
  if (!match) {
    return null;
  }
  const group = parseInt(match[0], 10);
  if (group < 1 || (groupCount !== undefined && group > groupCount)) {
    return null;
  }
  return group;
}

export interface GroupPayload {
  date?: string;
  groups: ProvisionalGroup[];
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Normalizes a decoded payload that carries per-group intervals, either as a
 * mapping of group to intervals or as a list of group records. Wrapper
 * objects (`{ data }`, `{ groups }`, `{ schedule }`) are unwrapped. Returns
 * null when the shape is not recognized.
 */
export function readGroupPayload(payload: unknown, groupCount?: number): GroupPayload | null {
  if (Array.isArray(payload)) {
    const groups: ProvisionalGroup[] = [];
    for (const item of payload) {
      const record = GroupRecord.safeParse(item);
      if (!record.success) {
        return null;
      }
      const { group, queue, intervals, schedule, slots, hours } = record.data;
      const groupNumber = groupNumberFrom(group ?? queue, groupCount);
      if (groupNumber === null) {
        continue;
      }
      const items = readSlotItems(intervals ?? schedule ?? slots ?? hours);
      if (items) {
        groups.push({ key: String(groupNumber), slots: items });
      }
    }
    return groups.length > 0 ? { groups } : null;
  }

  if (!isRecord(payload)) {
    return null;
  }

  for (const wrapper of ["groups", "data", "schedule"]) {
    const inner = payload[wrapper];
    if (inner !== undefined && (Array.isArray(inner) || isRecord(inner))) {
      const unwrapped = readGroupPayload(inner, groupCount);
      if (unwrapped) {
        const date = payload.date;
        return typeof date === "string" && DATE_PATTERN.test(date)
          ? { ...unwrapped, date }
          : unwrapped;
      }
    }
  }

  const groups: ProvisionalGroup[] = [];
  for (const [key, value] of Object.entries(payload)) {
    const groupNumber = groupNumberFrom(key, groupCount);
    if (groupNumber === null) {
      continue;
    }
    const items = readSlotItems(value);
    if (items) {
      groups.push({ key: String(groupNumber), slots: items });
    }
  }
  return groups.length > 0 ? { groups } : null;
}
