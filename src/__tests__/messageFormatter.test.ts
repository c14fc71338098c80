import { describe, it, expect } from "vitest";
import {
  escapeHtml,
  formatImageCaption,
  formatLeadAlert,
  formatScheduleChanged,
  formatTimetable,
} from "../messageFormatter";
import type { Interval } from "../types";
import { tableLocation } from "./helpers";

const location = tableLocation();

const intervals: Interval[] = [
  { start: "00:00", end: "08:00", status: "power_on" },
  { start: "08:00", end: "08:30", status: "power_off" },
  { start: "08:30", end: "09:00", status: "power_off" },
  { start: "09:00", end: "12:00", status: "uncertain" },
  { start: "12:00", end: "24:00", status: "power_on" },
];

describe("formatTimetable", () => {
  it("lists merged periods with a legend", () => {
    const lines = formatTimetable(location, "3", intervals, new Date("2026-10-19T08:05:00Z")).split("\n");

    expect(lines[0]).toBe("🏙 <b>Riverside</b>");
    expect(lines[1]).toContain("Група 3");
    expect(lines[2]).toBe("📅 <b>Оновлено:</b> 2026-10-19 08:05 UTC");
    expect(lines.slice(4, 9)).toEqual([
      "📊 <b>Графік на сьогодні:</b>",
      "🟢 00:00 - 08:00 Світло є",
      "🔴 08:00 - 09:00 Відключення",
      "⚪ 09:00 - 12:00 Можливо",
      "🟢 12:00 - 24:00 Світло є",
    ]);
    expect(lines[lines.length - 1]).toBe("⚪ - можливе відключення");
  });

  it("says so when the day has no outages", () => {
    const text = formatTimetable(location, "3", [{ start: "00:00", end: "24:00", status: "power_on" }]);

    expect(text.split("\n").slice(2)).toEqual(["", "✅ <b>Відключень не заплановано</b>"]);
  });

  it("labels address keys and escapes names and notes", () => {
    const address = tableLocation({ strategy: "address", name: "Port & Docks", note: "Times <approx>" });

    const lines = formatTimetable(address, "7:120", []).split("\n");

    expect(lines[0]).toBe("🏙 <b>Port &amp; Docks</b>");
    expect(lines[1]).toContain("Адреса 7:120");
    expect(lines[lines.length - 1]).toContain("Times &lt;approx&gt;");
  });
});

describe("message helpers", () => {
  it("escapes HTML special characters", () => {
    expect(escapeHtml("a < b & c > d")).toBe("a &lt; b &amp; c &gt; d");
  });

  it("formats a lead alert with the outage window", () => {
    const text = formatLeadAlert(location, "3", { start: "10:00", end: "11:00", status: "power_off" }, 30);

    expect(text.split("\n")[0]).toContain("Приблизно через 30 хв (о 10:00) очікується відключення світла до 11:00");
  });

  it("prefixes a changed schedule with a notice", () => {
    const text = formatScheduleChanged(location, "3", intervals);

    expect(text.startsWith("🔄 <b>Графік відключень змінено</b>\n\n🏙 <b>Riverside</b>")).toBe(true);
  });

  it("adds the location note to image captions", () => {
    expect(formatImageCaption(tableLocation({ note: "Check the site" }))).toBe(
      "🔄 Оновлено графік відключень: Riverside\nCheck the site"
    );
  });
});
