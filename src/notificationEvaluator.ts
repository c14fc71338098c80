import { DeliveryError, errorMessage } from "./errors";
import type { LocationRegistry } from "./locationRegistry";
import { logger } from "./logger";
import {
  formatImageCaption,
  formatLeadAlert,
  formatScheduleChanged,
} from "./messageFormatter";
import { mergeIntervals } from "./normalizer";
import type { NotificationLog } from "./notificationLog";
import type { ScheduleStore } from "./scheduleStore";
import type { SubscriberRepository } from "./subscriberRepository";
import type { DeliveryChannel } from "./telegramService";
import { parseClock, zonedClock } from "./time";
import type {
  ImageSnapshot,
  Interval,
  LocationConfig,
  MessagePayload,
  OutagePeriod,
  Subscriber,
  TimetableSnapshot,
} from "./types";

export interface EvaluatorSettings {
  timezone: string;
  leadMinutes: number;
  toleranceMinutes: number;
  retentionDays: number;
}

export interface SweepSummary {
  notified: number;
  skipped: number;
  failed: number;
}

export interface BroadcastSummary {
  delivered: number;
  failed: number;
}

/**
 * Outage periods whose start lies `leadMinutes` ahead of now, give or take
 * `toleranceMinutes`. Starts are compared as minutes since local midnight.
 */
export function findDueOutages(
  intervals: readonly Interval[],
  nowMinutes: number,
  leadMinutes: number,
  toleranceMinutes: number
): OutagePeriod[] {
  return mergeIntervals(intervals).filter((period) => {
    if (period.status !== "power_off") {
      return false;
    }
    const start = parseClock(period.start);
    if (start === null) {
      return false;
    }
    const lead = start - nowMinutes;
    return Math.abs(lead - leadMinutes) <= toleranceMinutes;
  });
}

const log = logger.child("notifier");

export class NotificationEvaluator {
  constructor(
    private readonly registry: LocationRegistry,
    private readonly store: ScheduleStore,
    private readonly subscribers: SubscriberRepository,
    private readonly notifications: NotificationLog,
    private readonly delivery: DeliveryChannel,
    private readonly settings: EvaluatorSettings
  ) {}

  /**
   * One pass over today's snapshots. The sent record is written before the
   * message goes out, so a failed or repeated send never produces a second
   * alert for the same outage start.
   */
  async sweep(now: Date = new Date()): Promise<SweepSummary> {
    const clock = zonedClock(now, this.settings.timezone);
    const summary: SweepSummary = { notified: 0, skipped: 0, failed: 0 };

    for (const location of this.registry.list()) {
      const snapshots = await this.store.listSnapshots(location.id, clock.date);
      for (const snapshot of snapshots) {
        const due = findDueOutages(
          snapshot.intervals,
          clock.minutes,
          this.settings.leadMinutes,
          this.settings.toleranceMinutes
        );
        if (due.length === 0) {
          continue;
        }

        const recipients = await this.subscribers.getUsersByLocationAndGroup(
          location.id,
          snapshot.key
        );
        for (const period of due) {
          for (const subscriber of recipients) {
            const fresh = await this.notifications.tryRecord(
              {
                subscriberId: subscriber.id,
                locationId: location.id,
                key: snapshot.key,
                date: clock.date,
                intervalStart: period.start,
              },
              now
            );
            if (!fresh) {
              summary.skipped++;
              continue;
            }

            const text = formatLeadAlert(location, snapshot.key, period, this.settings.leadMinutes);
            if (await this.deliver(subscriber, { kind: "text", text })) {
              summary.notified++;
            } else {
              summary.failed++;
            }
          }
        }
      }
    }

    const pruned = await this.notifications.prune(clock.date, this.settings.retentionDays);
    if (pruned > 0) {
      log.debug(`Pruned ${pruned} old notification record(s)`);
    }
    log.info(
      `Sweep ${clock.date} ${now.toISOString()}: ${summary.notified} sent, ${summary.skipped} already sent, ${summary.failed} failed`
    );
    return summary;
  }

  /** Sends the new timetable to subscribers of that key after a detected change. */
  async announceScheduleChange(
    location: LocationConfig,
    snapshot: TimetableSnapshot
  ): Promise<BroadcastSummary> {
    const recipients = await this.subscribers.getUsersByLocationAndGroup(location.id, snapshot.key);
    const text = formatScheduleChanged(location, snapshot.key, snapshot.intervals);
    return this.broadcast(recipients, { kind: "text", text });
  }

  /** Broadcasts a changed schedule image to every subscriber of the location. */
  async announceImageChange(
    location: LocationConfig,
    image: ImageSnapshot
  ): Promise<BroadcastSummary> {
    const recipients = await this.subscribers.getUsersByLocation(location.id);
    return this.broadcast(recipients, {
      kind: "image",
      url: image.url,
      caption: formatImageCaption(location),
    });
  }

  private async broadcast(
    recipients: readonly Subscriber[],
    payload: MessagePayload
  ): Promise<BroadcastSummary> {
    const summary: BroadcastSummary = { delivered: 0, failed: 0 };
    for (const subscriber of recipients) {
      if (await this.deliver(subscriber, payload)) {
        summary.delivered++;
      } else {
        summary.failed++;
      }
    }
    return summary;
  }

  private async deliver(subscriber: Subscriber, payload: MessagePayload): Promise<boolean> {
    try {
      await this.delivery.notify(subscriber.id, payload);
      return true;
    } catch (error) {
      if (error instanceof DeliveryError && error.kind === "RecipientUnreachable") {
        log.warn(`Subscriber ${subscriber.id} is unreachable: ${error.message}`);
      } else {
        log.error(`Failed to notify subscriber ${subscriber.id}: ${errorMessage(error)}`, error);
      }
      return false;
    }
  }
}
