import * as cheerio from "cheerio";
import type { HttpClient } from "../httpClient";
import { ParseError } from "../errors";
import { MINUTES_PER_DAY, parseTimeRange, type MinuteRange } from "../time";
import type { Extraction, FetchOutcome, LocationConfig, ProvisionalGroup } from "../types";
import { PageSourceAdapter, failure } from "./sourceAdapter";
import { expandMark, resolveCellStatus } from "./statusMarkers";
import { groupNumberFrom } from "./payloadShapes";

const TABLE_SELECTORS = ["table.shutdowns-table", "#discon-fact table", ".schedule-table table"];

export const DEFAULT_EMPTY_MARKERS = [
  "відключень не заплановано",
  "відключення не плануються",
  "відключень немає",
  "no outages",
];

/** True when the visible page text affirmatively says there are no outages. Script bodies do not count. */
export function announcesNoOutages(
  $: cheerio.CheerioAPI,
  location: LocationConfig
): boolean {
  const body = $("body").clone();
  body.find("script, style, noscript, template").remove();
  const text = body.text().toLowerCase().replace(/\s+/g, " ");
  const markers = location.emptyMarkers ?? DEFAULT_EMPTY_MARKERS;
  return markers.some((marker) => text.includes(marker.toLowerCase()));
}

/** Default labels when the header carries no time ranges: `count` even slots across the day. */
function defaultRanges(count: number): MinuteRange[] | null {
  if (count === 0 || MINUTES_PER_DAY % count !== 0) {
    return null;
  }
  const step = MINUTES_PER_DAY / count;
  return Array.from({ length: count }, (_, index) => ({
    start: index * step,
    end: (index + 1) * step,
  }));
}

export interface ParsedTable {
  groups: ProvisionalGroup[];
  headerFound: boolean;
}

/**
 * Reads group rows out of a schedule table. The first cell of a row names the
 * group; the remaining cells align to the time headers from the right, so
 * extra label columns on the left are ignored.
 */
export function parseScheduleTable(html: string, groupCount: number): ParsedTable | null {
  const $ = cheerio.load(html);

  let table = $(TABLE_SELECTORS.join(", ")).first();
  if (table.length === 0) {
    table = $("table").first();
  }
  if (table.length === 0) {
    return null;
  }

  const headerRow = table.find("thead tr").first().length
    ? table.find("thead tr").first()
    : table.find("tr").first();

  const headers: MinuteRange[] = [];
  headerRow.find("th, td").each((_, cell) => {
    const $cell = $(cell);
    const text = $cell.find("div").text().trim() || $cell.text().trim();
    const range = parseTimeRange(text);
    if (range) {
      headers.push(range);
    }
  });

  const bodyRows = table.find("tbody tr").length
    ? table.find("tbody tr")
    : table.find("tr").slice(1);

  const groups: ProvisionalGroup[] = [];
  bodyRows.each((_, row) => {
    const cells = $(row).find("td, th");
    if (cells.length < 2) {
      return;
    }

    const group = groupNumberFrom(cells.first().text().trim(), groupCount);
    if (group === null) {
      return;
    }

    const dataCells = cells.slice(1).toArray();
    const ranges =
      headers.length > 0 ? headers : defaultRanges(dataCells.length);
    if (!ranges) {
      return;
    }

    const offset = Math.max(0, dataCells.length - ranges.length);
    const slots = dataCells.slice(offset).flatMap((cell, index) => {
      const range = ranges[index];
      if (!range) {
        return [];
      }
      const $cell = $(cell);
      const mark = resolveCellStatus({
        classes: $cell.attr("class") ?? "",
        style: $cell.attr("style") ?? "",
        bgcolor: $cell.attr("bgcolor") ?? "",
        text: $cell.text(),
      });
      return expandMark(range, mark);
    });

    groups.push({ key: String(group), slots });
  });

  return { groups, headerFound: headers.length > 0 };
}

export class TableAdapter extends PageSourceAdapter {
  readonly strategy = "table" as const;

  constructor(http: HttpClient) {
    super(http, "table");
  }

  protected extract(html: string, location: LocationConfig): FetchOutcome<Extraction> {
    const groupCount = location.groupCount;
    if (groupCount === undefined) {
      throw new ParseError("MalformedStructure", `Location ${location.id} has no groupCount`);
    }

    const parsed = parseScheduleTable(html, groupCount);
    if (parsed && parsed.groups.length > 0) {
      if (!parsed.headerFound) {
        this.log.debug(`${location.id}: no time headers, using generated grid`);
      }
      this.log.info(`${location.id}: parsed ${parsed.groups.length} group(s) from table`);
      return { kind: "data", value: { kind: "timetable", groups: parsed.groups } };
    }

    if (announcesNoOutages(cheerio.load(html), location)) {
      this.log.info(`${location.id}: page reports no outages`);
      return { kind: "empty" };
    }

    return failure(
      "NoRecognizedFormat",
      parsed
        ? `Table on ${location.url} has no rows for groups 1..${groupCount}`
        : `No schedule table found on ${location.url}`
    );
  }
}
