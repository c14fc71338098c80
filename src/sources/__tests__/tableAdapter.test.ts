import { describe, it, expect } from "vitest";
import { TableAdapter, parseScheduleTable } from "../tableAdapter";
import { normalizeGroup, normalizeTimetable, type NormalizeContext } from "../../normalizer";
import { httpWith, tableLocation } from "../../__tests__/helpers";

const PAGE_URL = "https://power.example.test/shutdowns";

function page(rows: string, headers = ["00:00-00:30", "00:30-01:00", "01:00-01:30"]): string {
  const head = headers.map((label) => `<th>${label}</th>`).join("");
  return `<html><body>
    <table class="shutdowns-table">
      <thead><tr><th>Група</th>${head}</tr></thead>
      <tbody>${rows}</tbody>
    </table>
  </body></html>`;
}

describe("parseScheduleTable", () => {
  it("reads a group row with coloured cells", () => {
    const html = page(
      '<tr><td>Group 3</td><td class="red"></td><td class="green"></td><td class="green"></td></tr>'
    );

    const parsed = parseScheduleTable(html, 6);

    expect(parsed?.headerFound).toBe(true);
    expect(parsed?.groups).toEqual([
      {
        key: "3",
        slots: [
          { label: "00:00-00:30", status: "power_off" },
          { label: "00:30-01:00", status: "power_on" },
          { label: "01:00-01:30", status: "power_on" },
        ],
      },
    ]);
  });

  it("normalizes the row into a full-day timetable starting with the parsed slots", () => {
    const html = page(
      '<tr><td>Group 3</td><td class="red"></td><td class="green"></td><td class="green"></td></tr>'
    );
    const group = parseScheduleTable(html, 6)?.groups[0];
    expect(group).toBeDefined();
    if (!group) return;

    const snapshot = normalizeGroup(group, {
      locationId: "riverside",
      date: "2026-10-19",
      capturedAt: "2026-10-19T08:00:00.000Z",
      slotMinutes: 30,
    });

    expect(snapshot.key).toBe("3");
    expect(snapshot.intervals.slice(0, 3)).toEqual([
      { start: "00:00", end: "00:30", status: "power_off" },
      { start: "00:30", end: "01:00", status: "power_on" },
      { start: "01:00", end: "01:30", status: "power_on" },
    ]);
    expect(snapshot.intervals).toHaveLength(48);
    expect(snapshot.intervals.slice(3).every((interval) => interval.status === "power_on")).toBe(true);
  });

  it("applies outage, restoration, uncertain and keyword markers in that order", () => {
    const html = page(
      `<tr><td>1</td>
        <td class="green" style="background-color: RED"></td>
        <td class="yellow">відключення</td>
        <td>можливо</td>
      </tr>
      <tr><td>2</td>
        <td bgcolor="#FF0000"></td>
        <td class="cell-non-scheduled"></td>
        <td></td>
      </tr>`
    );

    const groups = parseScheduleTable(html, 6)?.groups ?? [];

    expect(groups.map((group) => group.slots.map((slot) => slot.status))).toEqual([
      ["power_off", "uncertain", "uncertain"],
      ["power_off", "power_on", "power_on"],
    ]);
  });

  it("matches whole colour values rather than prefixes", () => {
    const html = page(
      `<tr><td>1</td>
        <td style="background-color: #f00000"></td>
        <td style="background: greenyellow"></td>
        <td style="color: white; background-color: rgb(255, 0, 0) !important"></td>
      </tr>`
    );

    const groups = parseScheduleTable(html, 6)?.groups ?? [];

    expect(groups[0]?.slots.map((slot) => slot.status)).toEqual(["power_on", "power_on", "power_off"]);
  });

  it("skips rows whose group is missing or outside 1..N", () => {
    const html = page(
      `<tr><td>Група 9</td><td class="red"></td><td></td><td></td></tr>
       <tr><td>Всього</td><td class="red"></td><td></td><td></td></tr>
       <tr><td>Група 2</td><td></td><td class="red"></td><td></td></tr>`
    );

    const groups = parseScheduleTable(html, 6)?.groups ?? [];

    expect(groups.map((group) => group.key)).toEqual(["2"]);
  });

  it("splits half-slot cells into the outage half and the powered half", () => {
    const html = page('<tr><td>4</td><td class="cell-first-half"></td><td class="cell-second-half"></td></tr>', [
      "05-06",
      "06-07",
    ]);

    const groups = parseScheduleTable(html, 6)?.groups ?? [];

    expect(groups[0]?.slots).toEqual([
      { label: "05:00-05:30", status: "power_off" },
      { label: "05:30-06:00", status: "power_on" },
      { label: "06:00-06:30", status: "power_on" },
      { label: "06:30-07:00", status: "power_off" },
    ]);
  });

  it("generates an even grid when the header has no time labels", () => {
    const cells = Array.from({ length: 24 }, (_, hour) => (hour === 2 ? '<td class="red"></td>' : "<td></td>")).join("");
    const html = `<table><tr><th>Група</th><th colspan="24">Години</th></tr><tr><td>1</td>${cells}</tr></table>`;

    const parsed = parseScheduleTable(html, 6);

    expect(parsed?.headerFound).toBe(false);
    expect(parsed?.groups[0]?.slots).toHaveLength(24);
    expect(parsed?.groups[0]?.slots[2]).toEqual({ label: "02:00-03:00", status: "power_off" });
    expect(parsed?.groups[0]?.slots[3]).toEqual({ label: "03:00-04:00", status: "power_on" });
  });

  it("returns null when the document has no table", () => {
    expect(parseScheduleTable("<p>nothing here</p>", 6)).toBeNull();
  });
});

describe("TableAdapter", () => {
  it("returns data for a page with a schedule table", async () => {
    const html = page('<tr><td>1</td><td class="red"></td><td></td><td></td></tr>');
    const adapter = new TableAdapter(httpWith({ [PAGE_URL]: { body: html } }));

    const outcome = await adapter.fetch(tableLocation());

    expect(outcome.kind).toBe("data");
    if (outcome.kind === "data" && outcome.value.kind === "timetable") {
      expect(outcome.value.groups.map((group) => group.key)).toEqual(["1"]);
    }
  });

  it("reports confirmed-empty only when the page says there are no outages", async () => {
    const adapter = new TableAdapter(
      httpWith({ [PAGE_URL]: { body: "<div><p>Відключень   не заплановано</p></div>" } })
    );

    await expect(adapter.fetch(tableLocation())).resolves.toEqual({ kind: "empty" });
  });

  it("ignores empty-day wording that only appears inside scripts", async () => {
    const html = `<html><body>
      <p>Графік оновлюється</p>
      <script>var i18n = {"none": "Відключень не заплановано"};</script>
    </body></html>`;
    const adapter = new TableAdapter(httpWith({ [PAGE_URL]: { body: html } }));

    const outcome = await adapter.fetch(tableLocation());

    expect(outcome).toMatchObject({ kind: "failure", reason: "NoRecognizedFormat" });
  });

  it("honours custom empty markers", async () => {
    const adapter = new TableAdapter(httpWith({ [PAGE_URL]: { body: "<p>All clear today</p>" } }));

    await expect(adapter.fetch(tableLocation({ emptyMarkers: ["all clear"] }))).resolves.toEqual({
      kind: "empty",
    });
  });

  it("fails with NoRecognizedFormat when nothing recognizable is on the page", async () => {
    const adapter = new TableAdapter(httpWith({ [PAGE_URL]: { body: "<p>Maintenance</p>" } }));

    const outcome = await adapter.fetch(tableLocation());

    expect(outcome).toMatchObject({ kind: "failure", reason: "NoRecognizedFormat" });
  });

  it("turns an HTTP error into a failed outcome", async () => {
    const adapter = new TableAdapter(httpWith({ [PAGE_URL]: { status: 503, body: "busy" } }));

    const outcome = await adapter.fetch(tableLocation());

    expect(outcome).toMatchObject({ kind: "failure", reason: "HttpStatus" });
  });

  it("turns a network error into a failed outcome", async () => {
    const adapter = new TableAdapter(httpWith({}));

    const outcome = await adapter.fetch(tableLocation());

    expect(outcome).toMatchObject({ kind: "failure", reason: "NetworkError" });
  });
});

describe("table parsing determinism", () => {
  const context: NormalizeContext = {
    locationId: "riverside",
    date: "2026-10-19",
    capturedAt: "2026-10-19T08:00:00.000Z",
    slotMinutes: 30,
  };

  it("turns the same page into identical snapshots and fingerprints", () => {
    const html = page(
      `<tr><td>1</td><td class="red"></td><td class="cell-second-half"></td><td></td></tr>
       <tr><td>2</td><td></td><td style="background-color: yellow"></td><td class="red"></td></tr>`
    );

    const first = normalizeTimetable(parseScheduleTable(html, 6)?.groups ?? [], context);
    const second = normalizeTimetable(parseScheduleTable(html, 6)?.groups ?? [], context);

    expect(first).toHaveLength(2);
    expect(second).toEqual(first);
    expect(second.map((snapshot) => snapshot.fingerprint)).toEqual(first.map((snapshot) => snapshot.fingerprint));
  });
});
