import { detectChange } from "./changeDetector";
import { logger } from "./logger";
import type { StorageService, StoredImage, StoredSchedule } from "./storageService";
import type { ChangeResult, ImageSnapshot, Interval, TimetableSnapshot } from "./types";

export function scheduleKey(locationId: string, key: string, date: string): string {
  return `${locationId}|${key}|${date}`;
}

const log = logger.child("store");

/** Owns schedule snapshots and image references; every write is an idempotent upsert. */
export class ScheduleStore {
  constructor(private readonly storage: StorageService) {}

  async upsertSnapshot(snapshot: TimetableSnapshot): Promise<ChangeResult> {
    const id = scheduleKey(snapshot.locationId, snapshot.key, snapshot.date);

    return this.storage.transaction((state) => {
      const previous = state.schedules[id];
      const result = detectChange(previous?.fingerprint, snapshot.fingerprint);

      if (previous && result === "unchanged") {
        previous.checkedAt = snapshot.capturedAt;
        previous.confirmedEmpty = snapshot.confirmedEmpty;
        return result;
      }

      const stored: StoredSchedule = {
        ...snapshot,
        updatedAt: snapshot.capturedAt,
        checkedAt: snapshot.capturedAt,
        revision: (previous?.revision ?? 0) + 1,
      };
      state.schedules[id] = stored;
      log.debug(`${id}: ${result} (revision ${stored.revision})`);
      return result;
    });
  }

  async upsertImage(image: ImageSnapshot): Promise<ChangeResult> {
    return this.storage.transaction((state) => {
      const previous = state.images[image.locationId];
      const result = detectChange(previous?.fingerprint, image.fingerprint);

      if (previous && result === "unchanged") {
        previous.checkedAt = image.capturedAt;
        return result;
      }

      const stored: StoredImage = {
        ...image,
        updatedAt: image.capturedAt,
        checkedAt: image.capturedAt,
        revision: (previous?.revision ?? 0) + 1,
      };
      state.images[image.locationId] = stored;
      log.debug(`${image.locationId} image: ${result}`);
      return result;
    });
  }

  async getSnapshot(
    locationId: string,
    key: string,
    date: string
  ): Promise<StoredSchedule | null> {
    return this.storage.read(
      (state) => state.schedules[scheduleKey(locationId, key, date)] ?? null
    );
  }

  async getSchedule(locationId: string, key: string, date: string): Promise<Interval[] | null> {
    const snapshot = await this.getSnapshot(locationId, key, date);
    return snapshot ? snapshot.intervals : null;
  }

  async getLastUpdateTime(locationId: string, key: string, date: string): Promise<Date | null> {
    const snapshot = await this.getSnapshot(locationId, key, date);
    return snapshot ? new Date(snapshot.updatedAt) : null;
  }

  async listSnapshots(locationId: string, date: string): Promise<StoredSchedule[]> {
    return this.storage.read((state) =>
      Object.values(state.schedules)
        .filter((snapshot) => snapshot.locationId === locationId && snapshot.date === date)
        .sort((a, b) => a.key.localeCompare(b.key, undefined, { numeric: true }))
    );
  }

  async getImage(locationId: string): Promise<StoredImage | null> {
    return this.storage.read((state) => state.images[locationId] ?? null);
  }
}
