import fs from "fs-extra";
import path from "path";
import { StorageError, errorMessage } from "./errors";
import { logger } from "./logger";
import type {
  ImageSnapshot,
  NotificationRecord,
  Subscriber,
  TimetableSnapshot,
} from "./types";

export interface StoredSchedule extends TimetableSnapshot {
  updatedAt: string; // last time the fingerprint changed
  checkedAt: string; // last time the same key was upserted
  revision: number;
}

export interface StoredImage extends ImageSnapshot {
  updatedAt: string;
  checkedAt: string;
  revision: number;
}

export interface PersistedState {
  version: 1;
  subscribers: Record<string, Subscriber>;
  schedules: Record<string, StoredSchedule>;
  images: Record<string, StoredImage>;
  notificationsSent: Record<string, NotificationRecord>;
}

export function emptyState(): PersistedState {
  return {
    version: 1,
    subscribers: {},
    schedules: {},
    images: {},
    notificationsSent: {},
  };
}

const TABLES = ["subscribers", "schedules", "images", "notificationsSent"] as const;

const log = logger.child("storage");

/**
 * JSON document store. One operation holds the document at a time: a
 * transaction loads it, lets the callback mutate it and writes it back
 * (temp file + rename) only when the callback resolved. The slot is
 * released on every exit path.
 */
export class StorageService {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly storagePath: string) {}

  async transaction<T>(work: (state: PersistedState) => T | Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const state = await this.load();
      const result = await work(state);
      await this.save(state);
      return result;
    });
  }

  async read<T>(work: (state: Readonly<PersistedState>) => T | Promise<T>): Promise<T> {
    return this.exclusive(async () => work(await this.load()));
  }

  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const previous = this.queue;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }

  private async load(): Promise<PersistedState> {
    if (!(await fs.pathExists(this.storagePath))) {
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = await fs.readJSON(this.storagePath);
    } catch (error) {
      throw new StorageError(`Failed to read ${this.storagePath}: ${errorMessage(error)}`, {
        path: this.storagePath,
      });
    }
    return this.upgrade(raw);
  }

  private upgrade(raw: unknown): PersistedState {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new StorageError(`Unexpected content in ${this.storagePath}`, {
        path: this.storagePath,
      });
    }
    for (const table of TABLES) {
      const value: unknown = Reflect.get(raw, table);
      if (value !== undefined && (typeof value !== "object" || value === null || Array.isArray(value))) {
        throw new StorageError(`Table "${table}" in ${this.storagePath} is not an object`, {
          path: this.storagePath,
        });
      }
    }
    // Tables missing from older files start empty.
    return { ...emptyState(), ...raw, version: 1 };
  }

  private async save(state: PersistedState): Promise<void> {
    const tempPath = `${this.storagePath}.tmp`;
    try {
      await fs.ensureDir(path.dirname(this.storagePath));
      await fs.writeJSON(tempPath, state, { spaces: 2 });
      await fs.move(tempPath, this.storagePath, { overwrite: true });
    } catch (error) {
      throw new StorageError(`Failed to write ${this.storagePath}: ${errorMessage(error)}`, {
        path: this.storagePath,
      });
    }
    log.debug(`Saved state to ${this.storagePath}`);
  }
}
