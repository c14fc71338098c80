import { createHash } from "crypto";
import type { Interval } from "./types";

export function canonicalIntervals(intervals: readonly Interval[]): string {
  return intervals.map((interval) => `${interval.start}-${interval.end}=${interval.status}`).join("|");
}

function sha1(seed: string): string {
  return createHash("sha1").update(seed).digest("hex");
}

export function fingerprintIntervals(intervals: readonly Interval[]): string {
  return sha1(canonicalIntervals(intervals));
}

export function fingerprintReference(url: string): string {
  return sha1(`image:${url.trim()}`);
}
