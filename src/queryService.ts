import type { LocationRegistry } from "./locationRegistry";
import { formatTimetable } from "./messageFormatter";
import type { ScheduleStore } from "./scheduleStore";
import type { AddressLookupAdapter, ResolvedAddress } from "./sources/addressLookupAdapter";
import type { SubscriberRepository } from "./subscriberRepository";
import type {
  Extraction,
  FetchOutcome,
  Interval,
  LookupEntry,
  Subscriber,
} from "./types";

export type AddressLookupResult =
  | { kind: "found"; address: ResolvedAddress }
  | { kind: "not_recognized"; message: string }
  | { kind: "unavailable"; message: string };

/** Read side used by the chat layer, plus the address lookup steps it drives. */
export class QueryService {
  constructor(
    private readonly registry: LocationRegistry,
    private readonly store: ScheduleStore,
    private readonly subscribers: SubscriberRepository,
    private readonly addresses: AddressLookupAdapter
  ) {}

  getSchedule(locationId: string, key: string, date: string): Promise<Interval[] | null> {
    return this.store.getSchedule(locationId, key, date);
  }

  getUsersByLocationAndGroup(locationId: string, key: string): Promise<Subscriber[]> {
    return this.subscribers.getUsersByLocationAndGroup(locationId, key);
  }

  getLastUpdateTime(locationId: string, key: string, date: string): Promise<Date | null> {
    return this.store.getLastUpdateTime(locationId, key, date);
  }

  /** Rendered schedule for a subscriber's key, or null when nothing is stored for that day. */
  async describeSchedule(locationId: string, key: string, date: string): Promise<string | null> {
    const location = this.registry.require(locationId);
    const snapshot = await this.store.getSnapshot(locationId, key, date);
    if (!snapshot) {
      return null;
    }
    return formatTimetable(location, key, snapshot.intervals, new Date(snapshot.updatedAt));
  }

  findStreets(locationId: string, query: string): Promise<LookupEntry[]> {
    return this.addresses.findStreets(this.registry.require(locationId), query);
  }

  findHouses(locationId: string, streetId: string, query: string): Promise<LookupEntry[]> {
    return this.addresses.findHouses(this.registry.require(locationId), streetId, query);
  }

  getScheduleForIds(
    locationId: string,
    streetId: string,
    houseId: string
  ): Promise<FetchOutcome<Extraction>> {
    return this.addresses.getScheduleForIds(this.registry.require(locationId), streetId, houseId);
  }

  /**
   * Resolves a typed address. Nothing matching is "not recognized", shown to
   * the user as such; an unreachable lookup API is "unavailable".
   */
  async lookupAddress(locationId: string, freeText: string): Promise<AddressLookupResult> {
    const outcome = await this.addresses.resolveAddress(this.registry.require(locationId), freeText);
    if (outcome.kind === "data") {
      return { kind: "found", address: outcome.value };
    }
    if (outcome.kind === "failure" && outcome.reason === "AddressNotFound") {
      return { kind: "not_recognized", message: outcome.message };
    }
    return {
      kind: "unavailable",
      message: outcome.kind === "failure" ? outcome.message : "Address lookup returned no result",
    };
  }
}
