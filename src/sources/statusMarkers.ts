import type { IntervalStatus, ProvisionalSlot } from "../types";
import { rangeLabel, type MinuteRange } from "../time";

/** Status of one upstream cell; `half` limits the status to that half of the slot. */
export interface SlotMark {
  status: IntervalStatus;
  half?: "first" | "second";
}

export interface CellFeatures {
  classes: string;
  style: string;
  bgcolor: string;
  text: string;
}

const OFF_CLASSES = new Set([
  "red",
  "off",
  "danger",
  "outage",
  "power-off",
  "bg-danger",
  "cell-scheduled",
]);
const ON_CLASSES = new Set([
  "green",
  "on",
  "success",
  "power",
  "power-on",
  "bg-success",
  "cell-non-scheduled",
]);
const MAYBE_CLASSES = new Set([
  "yellow",
  "gray",
  "grey",
  "maybe",
  "warning",
  "possible",
  "bg-warning",
  "cell-scheduled-maybe",
]);

const OFF_COLORS = ["red", "#ff0000", "#f00", "rgb(255,0,0)"];
const ON_COLORS = ["green", "#00ff00", "#0f0", "rgb(0,255,0)"];
const MAYBE_COLORS = ["yellow", "gray", "grey", "#ffff00", "#808080"];

const OFF_WORDS = ["відключення", "немає", "off", "outage"];
const MAYBE_WORDS = ["можливо", "maybe"];

/** Whole colour tokens from an inline style's declaration values and a bgcolor attribute. */
function paintTokens(style: string, bgcolor: string): Set<string> {
  const values = style
    .split(";")
    .map((declaration) => declaration.slice(declaration.indexOf(":") + 1));
  values.push(bgcolor);

  const tokens = new Set<string>();
  for (const value of values) {
    const tidy = value.toLowerCase().replace(/\s*([(),])\s*/g, "$1").replace(/!important/g, "");
    for (const token of tidy.split(/\s+/)) {
      if (token) tokens.add(token);
    }
  }
  return tokens;
}

/**
 * Resolves a table cell to a status. Precedence: outage marker, restoration
 * marker, uncertain marker (class, inline style or bgcolor), then keywords in
 * the cell text, then power on.
 */
export function resolveCellStatus(cell: CellFeatures): SlotMark {
  const classes = cell.classes.toLowerCase().split(/\s+/).filter(Boolean);

  if (classes.includes("cell-first-half")) {
    return { status: "power_off", half: "first" };
  }
  if (classes.includes("cell-second-half")) {
    return { status: "power_off", half: "second" };
  }

  const paint = paintTokens(cell.style, cell.bgcolor);
  const marked = (set: Set<string>, colors: string[]): boolean =>
    classes.some((cls) => set.has(cls)) || colors.some((color) => paint.has(color));

  if (marked(OFF_CLASSES, OFF_COLORS)) {
    return { status: "power_off" };
  }
  if (marked(ON_CLASSES, ON_COLORS)) {
    return { status: "power_on" };
  }
  if (marked(MAYBE_CLASSES, MAYBE_COLORS)) {
    return { status: "uncertain" };
  }

  const text = cell.text.trim().toLowerCase();
  if (OFF_WORDS.some((word) => text.includes(word))) {
    return { status: "power_off" };
  }
  if (MAYBE_WORDS.some((word) => text.includes(word))) {
    return { status: "uncertain" };
  }
  return { status: "power_on" };
}

const TOKEN_MARKS: Record<string, SlotMark> = {
  off: { status: "power_off" },
  power_off: { status: "power_off" },
  outage: { status: "power_off" },
  no: { status: "power_off" },
  on: { status: "power_on" },
  power_on: { status: "power_on" },
  yes: { status: "power_on" },
  maybe: { status: "uncertain" },
  uncertain: { status: "uncertain" },
  first: { status: "power_off", half: "first" },
  second: { status: "power_off", half: "second" },
  mfirst: { status: "uncertain", half: "first" },
  msecond: { status: "uncertain", half: "second" },
};

/** Reads a status value from a structured payload ("off", "no", "maybe", true, 0...). */
export function markFromToken(value: unknown): SlotMark | null {
  if (typeof value === "boolean") {
    // true means power is available
    return { status: value ? "power_on" : "power_off" };
  }
  if (typeof value === "number") {
    if (value === 0) return { status: "power_on" };
    if (value === 1) return { status: "uncertain" };
    if (value === 2) return { status: "power_off" };
    return null;
  }
  if (typeof value !== "string") {
    return null;
  }
  return TOKEN_MARKS[value.trim().toLowerCase()] ?? null;
}

/** Turns one marked range into provisional slots, splitting it when the mark covers a half. */
export function expandMark(range: MinuteRange, mark: SlotMark): ProvisionalSlot[] {
  if (!mark.half) {
    return [{ label: rangeLabel(range), status: mark.status }];
  }

  const middle = range.start + Math.floor((range.end - range.start) / 2);
  const first = { start: range.start, end: middle };
  const second = { start: middle, end: range.end };
  return mark.half === "first"
    ? [
        { label: rangeLabel(first), status: mark.status },
        { label: rangeLabel(second), status: "power_on" },
      ]
    : [
        { label: rangeLabel(first), status: "power_on" },
        { label: rangeLabel(second), status: mark.status },
      ];
}
