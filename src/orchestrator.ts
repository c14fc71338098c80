import cron from "node-cron";
import { shouldAnnounce } from "./changeDetector";
import { errorMessage } from "./errors";
import type { HttpClient } from "./httpClient";
import type { LocationRegistry } from "./locationRegistry";
import { logger } from "./logger";
import {
  confirmedEmptyTimetable,
  normalizeImage,
  normalizeTimetable,
  type NormalizeContext,
} from "./normalizer";
import type { NotificationEvaluator } from "./notificationEvaluator";
import type { ScheduleStore } from "./scheduleStore";
import { createSourceAdapter, type SourceAdapter } from "./sources";
import type { SubscriberRepository } from "./subscriberRepository";
import { zonedClock } from "./time";
import type {
  ChangeResult,
  FailureReason,
  LocationConfig,
  TimetableSnapshot,
} from "./types";

export type KeyState = "unknown" | "fetching" | "fresh" | "failed" | "empty";

export interface KeyStatus {
  state: KeyState;
  checkedAt?: string;
  reason?: FailureReason;
  message?: string;
}

export interface LocationRefresh {
  locationId: string;
  outcome: "data" | "empty" | "failure" | "skipped";
  changes: Record<string, ChangeResult>;
  reason?: FailureReason;
}

export interface OrchestratorSettings {
  timezone: string;
  slotMinutes: number;
  refreshCron: string;
  notifyCron: string;
}

/** Key used for whole-location status while its keys are not yet known. */
export const LOCATION_KEY = "*";

const log = logger.child("orchestrator");

/**
 * Drives the refresh and notification cycles. A location's fetch always
 * completes before its snapshots are stored; different locations run
 * concurrently and a failure in one never stops the others.
 */
export class Orchestrator {
  private readonly adapters = new Map<string, SourceAdapter>();
  private readonly status = new Map<string, Map<string, KeyStatus>>();
  private readonly tasks: cron.ScheduledTask[] = [];
  private refreshing: Promise<LocationRefresh[]> | null = null;
  private sweeping = false;

  constructor(
    private readonly registry: LocationRegistry,
    private readonly store: ScheduleStore,
    private readonly subscribers: SubscriberRepository,
    private readonly evaluator: NotificationEvaluator,
    private readonly http: HttpClient,
    private readonly settings: OrchestratorSettings
  ) {
    for (const location of registry.list()) {
      this.status.set(location.id, new Map<string, KeyStatus>([[LOCATION_KEY, { state: "unknown" }]]));
    }
  }

  /** Runs one refresh pass. A tick that arrives while a pass is running joins it. */
  async refreshAll(now: Date = new Date()): Promise<LocationRefresh[]> {
    if (this.refreshing) {
      log.warn("Previous refresh still running, joining it");
      return this.refreshing;
    }

    this.refreshing = Promise.all(
      this.registry.list().map((location) => this.refreshLocation(location, now))
    );
    try {
      const results = await this.refreshing;
      const failed = results.filter((result) => result.outcome === "failure").length;
      log.info(`Refresh complete: ${results.length - failed} ok, ${failed} failed`);
      return results;
    } finally {
      this.refreshing = null;
    }
  }

  async refreshLocation(location: LocationConfig, now: Date = new Date()): Promise<LocationRefresh> {
    const result: LocationRefresh = { locationId: location.id, outcome: "skipped", changes: {} };
    const checkedAt = now.toISOString();

    try {
      const adapter = this.adapterFor(location);
      const addressKeys =
        location.strategy === "address"
          ? await this.subscribers.getKeysForLocation(location.id)
          : [];
      if (location.strategy === "address" && addressKeys.length === 0) {
        log.debug(`${location.id}: no subscribed addresses, nothing to refresh`);
        return result;
      }

      this.markAll(location.id, { state: "fetching" });
      const outcome = await adapter.fetch(location, { addressKeys });
      const context: NormalizeContext = {
        locationId: location.id,
        date: zonedClock(now, this.settings.timezone).date,
        capturedAt: checkedAt,
        slotMinutes: this.settings.slotMinutes,
      };

      if (outcome.kind === "failure") {
        log.warn(`${location.id}: ${outcome.reason} - ${outcome.message}`);
        this.markAll(location.id, {
          state: "failed",
          checkedAt,
          reason: outcome.reason,
          message: outcome.message,
        });
        return { ...result, outcome: "failure", reason: outcome.reason };
      }

      if (outcome.kind === "empty") {
        const snapshots = confirmedEmptyTimetable(location.groupCount ?? 0, context);
        await this.storeTimetables(location, snapshots, result, "empty");
        this.mark(location.id, LOCATION_KEY, { state: "empty", checkedAt });
        this.settleUnanswered(location.id, checkedAt);
        return { ...result, outcome: "empty" };
      }

      const extraction = outcome.value;
      if (extraction.kind === "image") {
        const image = normalizeImage(extraction.url, context);
        const change = await this.store.upsertImage(image);
        result.changes[LOCATION_KEY] = change;
        this.mark(location.id, LOCATION_KEY, { state: "fresh", checkedAt });
        this.settleUnanswered(location.id, checkedAt);
        if (shouldAnnounce(change)) {
          await this.evaluator.announceImageChange(location, image);
        }
        return { ...result, outcome: "data" };
      }

      const snapshots = normalizeTimetable(extraction.groups, {
        ...context,
        date: extraction.date ?? context.date,
      });
      await this.storeTimetables(location, snapshots, result, "fresh");
      for (const failed of extraction.failures ?? []) {
        log.warn(`${location.id} ${failed.key}: ${failed.reason} - ${failed.message}`);
        this.mark(location.id, failed.key, {
          state: "failed",
          checkedAt,
          reason: failed.reason,
          message: failed.message,
        });
      }
      this.mark(location.id, LOCATION_KEY, { state: "fresh", checkedAt });
      this.settleUnanswered(location.id, checkedAt);
      return { ...result, outcome: "data" };
    } catch (error) {
      log.error(`Refresh failed for ${location.id}: ${errorMessage(error)}`, error);
      this.markAll(location.id, {
        state: "failed",
        checkedAt,
        reason: "Unexpected",
        message: errorMessage(error),
      });
      return { ...result, outcome: "failure", reason: "Unexpected" };
    }
  }

  /** Runs one notification sweep unless the previous one is still going. */
  async sweepNotifications(now: Date = new Date()): Promise<void> {
    if (this.sweeping) {
      log.warn("Previous notification sweep still running, skipping this tick");
      return;
    }
    this.sweeping = true;
    try {
      await this.evaluator.sweep(now);
    } catch (error) {
      log.error(`Notification sweep failed: ${errorMessage(error)}`, error);
    } finally {
      this.sweeping = false;
    }
  }

  getStatus(): Record<string, Record<string, KeyStatus>> {
    const view: Record<string, Record<string, KeyStatus>> = {};
    for (const [locationId, keys] of this.status) {
      view[locationId] = Object.fromEntries(
        Array.from(keys, ([key, status]): [string, KeyStatus] => [key, { ...status }])
      );
    }
    return view;
  }

  /** Performs the first refresh, then schedules both drivers. */
  async start(): Promise<void> {
    await this.refreshAll();

    this.tasks.push(
      cron.schedule(this.settings.refreshCron, () => void this.refreshAll(), {
        timezone: this.settings.timezone,
      }),
      cron.schedule(this.settings.notifyCron, () => void this.sweepNotifications(), {
        timezone: this.settings.timezone,
      })
    );
    log.info(
      `Scheduler ready: refresh "${this.settings.refreshCron}", notifications "${this.settings.notifyCron}"`
    );
  }

  stop(): void {
    for (const task of this.tasks.splice(0)) {
      task.stop();
    }
  }

  private async storeTimetables(
    location: LocationConfig,
    snapshots: readonly TimetableSnapshot[],
    result: LocationRefresh,
    state: "fresh" | "empty"
  ): Promise<void> {
    for (const snapshot of snapshots) {
      const change = await this.store.upsertSnapshot(snapshot);
      result.changes[snapshot.key] = change;
      this.mark(location.id, snapshot.key, {
        state: snapshot.confirmedEmpty ? "empty" : state,
        checkedAt: snapshot.capturedAt,
      });
      if (shouldAnnounce(change)) {
        await this.evaluator.announceScheduleChange(location, snapshot);
      }
    }
    log.info(`${location.id}: stored ${snapshots.length} snapshot(s)`);
  }

  private adapterFor(location: LocationConfig): SourceAdapter {
    let adapter = this.adapters.get(location.id);
    if (!adapter) {
      adapter = createSourceAdapter(location, this.http);
      this.adapters.set(location.id, adapter);
    }
    return adapter;
  }

  private mark(locationId: string, key: string, status: KeyStatus): void {
    let keys = this.status.get(locationId);
    if (!keys) {
      keys = new Map();
      this.status.set(locationId, keys);
    }
    keys.set(key, status);
  }

  /** Keys the source said nothing about this cycle end the cycle as failed. */
  private settleUnanswered(locationId: string, checkedAt: string): void {
    for (const [key, status] of this.status.get(locationId) ?? []) {
      if (status.state === "fetching") {
        this.mark(locationId, key, {
          state: "failed",
          checkedAt,
          reason: "NoRecognizedFormat",
          message: `No data for ${key} in this refresh`,
        });
      }
    }
  }

  private markAll(locationId: string, status: KeyStatus): void {
    const keys = this.status.get(locationId);
    const known = keys ? Array.from(keys.keys()) : [LOCATION_KEY];
    for (const key of known) {
      this.mark(locationId, key, { ...status });
    }
  }
}
