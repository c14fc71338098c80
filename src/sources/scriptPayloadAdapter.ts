import * as cheerio from "cheerio";
import type { HttpClient } from "../httpClient";
import { ParseError } from "../errors";
import type { Extraction, FetchOutcome, LocationConfig } from "../types";
import { PageSourceAdapter, failure } from "./sourceAdapter";
import { readGroupPayload } from "./payloadShapes";
import { announcesNoOutages } from "./tableAdapter";

const ASSIGNMENT_PATTERNS = [
  /\b(?:var|let|const)\s+(?:schedule|scheduleData|groups|graphs)\s*=\s*/g,
  /\bwindow\.(?:schedule|scheduleData|groups)\s*=\s*/g,
  /\bDisconSchedule\.(?:fact|preset)\s*=\s*/g,
];

/**
 * Returns the JSON literal that starts at `from` (an object or array),
 * matching brackets outside string literals. Null when it does not close.
 */
export function sliceJsonLiteral(source: string, from: number): string | null {
  const open = source[from];
  if (open !== "{" && open !== "[") {
    return null;
  }

  let depth = 0;
  let quote: string | null = null;
  for (let i = from; i < source.length; i++) {
    const char = source[i];
    if (quote) {
      if (char === "\\") {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "{" || char === "[") {
      depth++;
    } else if (char === "}" || char === "]") {
      depth--;
      if (depth === 0) {
        return source.slice(from, i + 1);
      }
    }
  }
  return null;
}

/** Every candidate payload literal assigned in inline scripts or held in a JSON script block. */
export function findScriptPayloads(html: string): string[] {
  const $ = cheerio.load(html);
  const candidates: string[] = [];

  $('script#schedule-data, script[type="application/json"][data-schedule]').each((_, el) => {
    const text = $(el).text().trim();
    if (text) {
      candidates.push(text);
    }
  });

  $("script:not([src])").each((_, el) => {
    const source = $(el).text();
    for (const pattern of ASSIGNMENT_PATTERNS) {
      pattern.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = pattern.exec(source)) !== null) {
        const literal = sliceJsonLiteral(source, match.index + match[0].length);
        if (literal) {
          candidates.push(literal);
        }
      }
    }
  });

  return candidates;
}

export class ScriptPayloadAdapter extends PageSourceAdapter {
  readonly strategy = "script" as const;

  constructor(http: HttpClient) {
    super(http, "script");
  }

  protected extract(html: string, location: LocationConfig): FetchOutcome<Extraction> {
    const candidates = findScriptPayloads(html);
    let malformed = 0;

    for (const candidate of candidates) {
      let decoded: unknown;
      try {
        decoded = JSON.parse(candidate);
      } catch {
        malformed++;
        continue;
      }

      const payload = readGroupPayload(decoded, location.groupCount);
      if (payload) {
        this.log.info(`${location.id}: parsed ${payload.groups.length} group(s) from script payload`);
        return {
          kind: "data",
          value: { kind: "timetable", date: payload.date, groups: payload.groups },
        };
      }
      malformed++;
    }

    // an unreadable payload outranks any empty-day wording on the page
    if (malformed > 0) {
      throw new ParseError(
        "MalformedStructure",
        `${malformed} script payload(s) on ${location.url} could not be read`,
        { locationId: location.id }
      );
    }

    if (announcesNoOutages(cheerio.load(html), location)) {
      return { kind: "empty" };
    }
    return failure("NoRecognizedFormat", `No schedule payload found in scripts on ${location.url}`);
  }
}
