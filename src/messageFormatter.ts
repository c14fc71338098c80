import { mergeIntervals } from "./normalizer";
import type { Interval, IntervalStatus, LocationConfig, OutagePeriod } from "./types";

const STATUS_LABEL: Record<IntervalStatus, { emoji: string; text: string }> = {
  power_off: { emoji: "🔴", text: "Відключення" },
  power_on: { emoji: "🟢", text: "Світло є" },
  uncertain: { emoji: "⚪", text: "Можливо" },
};

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function keyLabel(location: LocationConfig, key: string): string {
  return location.strategy === "address" ? `Адреса ${key}` : `Група ${key}`;
}

function header(location: LocationConfig, key: string): string[] {
  return [`🏙 <b>${escapeHtml(location.name)}</b>`, `⚡️ ${escapeHtml(keyLabel(location, key))}`];
}

/**
 * Formats a day's timetable into a readable Telegram message. Contiguous
 * slots with the same status are shown as one period.
 */
export function formatTimetable(
  location: LocationConfig,
  key: string,
  intervals: readonly Interval[],
  updatedAt?: Date
): string {
  const lines = header(location, key);
  if (updatedAt) {
    lines.push(`📅 <b>Оновлено:</b> ${updatedAt.toISOString().slice(0, 16).replace("T", " ")} UTC`);
  }

  const periods = mergeIntervals(intervals);
  const hasOutages = periods.some((period) => period.status !== "power_on");
  if (!hasOutages) {
    lines.push("", "✅ <b>Відключень не заплановано</b>");
  } else {
    lines.push("", "📊 <b>Графік на сьогодні:</b>");
    for (const period of periods) {
      const label = STATUS_LABEL[period.status];
      lines.push(`${label.emoji} ${period.start} - ${period.end} ${label.text}`);
    }
    lines.push(
      "",
      "🔴 - гарантоване відключення",
      "🟢 - гарантоване включення",
      "⚪ - можливе відключення"
    );
  }

  if (location.note) {
    lines.push("", `ℹ️ ${escapeHtml(location.note)}`);
  }
  return lines.join("\n");
}

export function formatLeadAlert(
  location: LocationConfig,
  key: string,
  period: OutagePeriod,
  leadMinutes: number
): string {
  return [
    `⚠️ <b>Увага!</b> Приблизно через ${leadMinutes} хв (о ${period.start}) очікується відключення світла до ${period.end}`,
    "",
    ...header(location, key),
  ].join("\n");
}

export function formatScheduleChanged(
  location: LocationConfig,
  key: string,
  intervals: readonly Interval[]
): string {
  return [
    "🔄 <b>Графік відключень змінено</b>",
    "",
    formatTimetable(location, key, intervals),
  ].join("\n");
}

export function formatImageCaption(location: LocationConfig): string {
  const lines = [`🔄 Оновлено графік відключень: ${location.name}`];
  if (location.note) {
    lines.push(location.note);
  }
  return lines.join("\n");
}
