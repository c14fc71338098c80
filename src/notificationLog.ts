import type { StorageService } from "./storageService";
import { shiftDate } from "./time";
import type { NotificationKey, NotificationRecord } from "./types";

export function notificationId(key: NotificationKey): string {
  return [key.subscriberId, key.locationId, key.key, key.date, key.intervalStart].join("|");
}

/** Sent-alert log; one record per (subscriber, location, key, date, interval start). */
export class NotificationLog {
  constructor(private readonly storage: StorageService) {}

  /** Inserts the record unless it exists. Returns whether this call created it. */
  async tryRecord(key: NotificationKey, sentAt: Date): Promise<boolean> {
    const id = notificationId(key);
    return this.storage.transaction((state) => {
      if (state.notificationsSent[id]) {
        return false;
      }
      const record: NotificationRecord = { ...key, sentAt: sentAt.toISOString() };
      state.notificationsSent[id] = record;
      return true;
    });
  }

  async has(key: NotificationKey): Promise<boolean> {
    const id = notificationId(key);
    return this.storage.read((state) => id in state.notificationsSent);
  }

  /** Drops records dated before `today - retentionDays`. Returns how many were removed. */
  async prune(today: string, retentionDays: number): Promise<number> {
    const cutoff = shiftDate(today, -retentionDays);
    return this.storage.transaction((state) => {
      let removed = 0;
      for (const [id, record] of Object.entries(state.notificationsSent)) {
        if (record.date < cutoff) {
          delete state.notificationsSent[id];
          removed++;
        }
      }
      return removed;
    });
  }
}
