import { z } from "zod";
import type { HttpClient } from "../httpClient";
import { AddressLookupError, FetchError, ParseError, errorMessage } from "../errors";
import { logger } from "../logger";
import type {
  Extraction,
  FetchOutcome,
  KeyFailure,
  LocationConfig,
  LookupEntry,
  ProvisionalGroup,
} from "../types";
import { failure, failureFrom, type FetchContext, type SourceAdapter } from "./sourceAdapter";
import { readSlotItems } from "./payloadShapes";

const Entry = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
});

const EntryList = z.union([
  z.array(Entry),
  z.object({ items: z.array(Entry) }).transform((value) => value.items),
]);

const ScheduleResponse = z.object({
  date: z.string().optional(),
  group: z.union([z.string(), z.number()]).optional(),
  noOutages: z.boolean().optional(),
  intervals: z.unknown().optional(),
});

export interface ResolvedAddress {
  key: string;
  street: LookupEntry;
  house: LookupEntry;
}

/** Splits free text like "Shevchenka st, 12a" into street and house parts. */
export function splitAddress(freeText: string): { street: string; house: string } | null {
  const text = freeText.trim().replace(/\s+/g, " ");
  const comma = text.lastIndexOf(",");
  if (comma > 0) {
    const street = text.slice(0, comma).trim();
    const house = text.slice(comma + 1).trim();
    return street && house ? { street, house } : null;
  }
  const match = text.match(/^(.*\D)\s+(\d+[\p{L}\d/-]*)$/u);
  if (!match || !match[1] || !match[2]) {
    return null;
  }
  return { street: match[1].trim(), house: match[2] };
}

export function addressKey(streetId: string, houseId: string): string {
  return `${streetId}:${houseId}`;
}

export function parseAddressKey(key: string): { streetId: string; houseId: string } | null {
  const separator = key.indexOf(":");
  if (separator <= 0 || separator === key.length - 1) {
    return null;
  }
  return { streetId: key.slice(0, separator), houseId: key.slice(separator + 1) };
}

function normalizeName(value: string): string {
  return value.toLowerCase().replace(/[.,]/g, "").replace(/\s+/g, " ").trim();
}

function pickEntry(entries: LookupEntry[], query: string): LookupEntry | undefined {
  const wanted = normalizeName(query);
  return entries.find((entry) => normalizeName(entry.name) === wanted) ?? entries[0];
}

/**
 * Two-phase lookup against a location's address API: free-text address to
 * street and house identifiers, then identifiers to that address's schedule.
 */
export class AddressLookupAdapter implements SourceAdapter {
  readonly strategy = "address" as const;
  private readonly log = logger.child("source:address");

  constructor(private readonly http: HttpClient) {}

  async findStreets(location: LocationConfig, query: string): Promise<LookupEntry[]> {
    const url = this.endpoint(location, "streets", { q: query });
    return this.readEntries(url);
  }

  async findHouses(
    location: LocationConfig,
    streetId: string,
    query: string
  ): Promise<LookupEntry[]> {
    const url = this.endpoint(location, "houses", { street: streetId, q: query });
    return this.readEntries(url);
  }

  async getScheduleForIds(
    location: LocationConfig,
    streetId: string,
    houseId: string
  ): Promise<FetchOutcome<Extraction>> {
    const key = addressKey(streetId, houseId);
    try {
      const url = this.endpoint(location, "schedule", { street: streetId, house: houseId });
      const parsed = ScheduleResponse.safeParse(await this.readSchedule(url, key));
      if (!parsed.success) {
        throw new ParseError("MalformedStructure", `Unexpected schedule response for ${key}`);
      }

      const { date, noOutages, intervals } = parsed.data;
      if (noOutages) {
        return { kind: "empty" };
      }
      // only an explicit noOutages flag confirms an empty day
      if (intervals === undefined || intervals === null) {
        throw new AddressLookupError("NotFound", `No schedule published for ${key}`, { key });
      }
      const slots = readSlotItems(intervals);
      if (slots === null) {
        throw new ParseError("MalformedStructure", `Unreadable intervals for ${key}`);
      }
      if (slots.length === 0) {
        throw new AddressLookupError("NotFound", `No schedule published for ${key}`, { key });
      }
      return {
        kind: "data",
        value: { kind: "timetable", date, groups: [{ key, slots }] },
      };
    } catch (error) {
      this.log.warn(`Schedule lookup failed for ${location.id} ${key}: ${errorMessage(error)}`);
      return failureFrom(error);
    }
  }

  /** Resolves free text to identifiers. No match at either phase is AddressNotFound. */
  async resolveAddress(
    location: LocationConfig,
    freeText: string
  ): Promise<FetchOutcome<ResolvedAddress>> {
    const parts = splitAddress(freeText);
    if (!parts) {
      return failure("AddressNotFound", `Cannot read street and house from "${freeText}"`);
    }

    try {
      const street = pickEntry(await this.findStreets(location, parts.street), parts.street);
      if (!street) {
        return failure("AddressNotFound", `Street "${parts.street}" not found`);
      }
      const house = pickEntry(
        await this.findHouses(location, street.id, parts.house),
        parts.house
      );
      if (!house) {
        return failure("AddressNotFound", `House "${parts.house}" not found on ${street.name}`);
      }
      return {
        kind: "data",
        value: { key: addressKey(street.id, house.id), street, house },
      };
    } catch (error) {
      return failureFrom(error);
    }
  }

  /**
   * Refreshes every address key subscribers of the location are bound to.
   * Keys that could not be refreshed are listed in `failures` next to the
   * groups that were; the whole fetch fails only when no key succeeded.
   */
  async fetch(
    location: LocationConfig,
    context: FetchContext
  ): Promise<FetchOutcome<Extraction>> {
    const groups: ProvisionalGroup[] = [];
    const failures: KeyFailure[] = [];
    let date: string | undefined;

    for (const key of context.addressKeys) {
      const ids = parseAddressKey(key);
      if (!ids) {
        this.log.warn(`${location.id}: skipping malformed address key "${key}"`);
        failures.push({ key, reason: "AddressNotFound", message: `Malformed address key "${key}"` });
        continue;
      }
      const outcome = await this.getScheduleForIds(location, ids.streetId, ids.houseId);
      if (outcome.kind === "data" && outcome.value.kind === "timetable") {
        date = date ?? outcome.value.date;
        groups.push(...outcome.value.groups);
      } else if (outcome.kind === "empty") {
        groups.push({ key, slots: [], confirmedEmpty: true });
      } else if (outcome.kind === "failure") {
        failures.push({ key, reason: outcome.reason, message: outcome.message });
      }
    }

    const [firstFailure] = failures;
    if (groups.length === 0 && firstFailure) {
      return failure(firstFailure.reason, firstFailure.message);
    }
    return {
      kind: "data",
      value:
        failures.length > 0
          ? { kind: "timetable", date, groups, failures }
          : { kind: "timetable", date, groups },
    };
  }

  private endpoint(
    location: LocationConfig,
    path: string,
    params: Record<string, string>
  ): string {
    if (!location.lookup) {
      throw new AddressLookupError("UpstreamError", `Location ${location.id} has no lookup API`);
    }
    const url = new URL(path, location.lookup.baseUrl.replace(/\/?$/, "/"));
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    return url.toString();
  }

  /** A 404 from the schedule endpoint means the address is unknown upstream. */
  private async readSchedule(url: string, key: string): Promise<unknown> {
    try {
      return await this.http.getJson(url);
    } catch (error) {
      if (error instanceof FetchError && error.kind === "HttpStatus" && error.details?.status === 404) {
        throw new AddressLookupError("NotFound", `Address ${key} is unknown to the lookup API`, {
          key,
          url,
        });
      }
      throw error;
    }
  }

  private async readEntries(url: string): Promise<LookupEntry[]> {
    let body: unknown;
    try {
      body = await this.http.getJson(url);
    } catch (error) {
      throw new AddressLookupError("UpstreamError", `Address lookup failed: ${errorMessage(error)}`, {
        url,
      });
    }
    const parsed = EntryList.safeParse(body);
    if (!parsed.success) {
      throw new AddressLookupError("UpstreamError", `Unexpected lookup response from ${url}`, {
        url,
      });
    }
    return parsed.data;
  }
}
