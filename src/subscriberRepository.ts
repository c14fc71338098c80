import type { StorageService } from "./storageService";
import type { Subscriber } from "./types";

function copy(subscriber: Subscriber): Subscriber {
  return subscriber.keysByLocation
    ? { ...subscriber, keysByLocation: { ...subscriber.keysByLocation } }
    : { ...subscriber };
}

/**
 * Subscriber records. The chat layer creates and edits them; the core only
 * reads who is bound to a location and key.
 */
export class SubscriberRepository {
  constructor(private readonly storage: StorageService) {}

  async ensureSubscriber(id: string, name?: string, now: Date = new Date()): Promise<Subscriber> {
    return this.storage.transaction((state) => {
      const existing = state.subscribers[id];
      if (existing) {
        if (name !== undefined) {
          existing.name = name;
        }
        return copy(existing);
      }
      const created: Subscriber = {
        id,
        name,
        notificationsEnabled: true,
        createdAt: now.toISOString(),
      };
      state.subscribers[id] = created;
      return copy(created);
    });
  }

  async get(id: string): Promise<Subscriber | null> {
    return this.storage.read((state) => {
      const subscriber = state.subscribers[id];
      return subscriber ? copy(subscriber) : null;
    });
  }

  /** Moving to another location restores the key last chosen there, if any. */
  async setLocation(id: string, locationId: string): Promise<Subscriber | null> {
    return this.update(id, (subscriber) => {
      if (subscriber.locationId === locationId) {
        return;
      }
      subscriber.locationId = locationId;
      const remembered = subscriber.keysByLocation?.[locationId];
      if (remembered === undefined) {
        delete subscriber.key;
      } else {
        subscriber.key = remembered;
      }
    });
  }

  async setKey(id: string, key: string): Promise<Subscriber | null> {
    return this.update(id, (subscriber) => {
      subscriber.key = key;
      if (subscriber.locationId) {
        subscriber.keysByLocation = { ...subscriber.keysByLocation, [subscriber.locationId]: key };
      }
    });
  }

  async toggleNotifications(id: string): Promise<boolean | null> {
    const updated = await this.update(id, (subscriber) => {
      subscriber.notificationsEnabled = !subscriber.notificationsEnabled;
    });
    return updated ? updated.notificationsEnabled : null;
  }

  /** Notification-enabled subscribers bound to a location and group or address key. */
  async getUsersByLocationAndGroup(locationId: string, key: string): Promise<Subscriber[]> {
    return this.storage.read((state) =>
      Object.values(state.subscribers)
        .filter(
          (subscriber) =>
            subscriber.notificationsEnabled &&
            subscriber.locationId === locationId &&
            subscriber.key === key
        )
        .map(copy)
    );
  }

  async getUsersByLocation(locationId: string): Promise<Subscriber[]> {
    return this.storage.read((state) =>
      Object.values(state.subscribers)
        .filter(
          (subscriber) => subscriber.notificationsEnabled && subscriber.locationId === locationId
        )
        .map(copy)
    );
  }

  /** Distinct keys subscribers of a location are bound to, whether or not alerts are on. */
  async getKeysForLocation(locationId: string): Promise<string[]> {
    return this.storage.read((state) => {
      const keys = new Set<string>();
      for (const subscriber of Object.values(state.subscribers)) {
        if (subscriber.locationId === locationId && subscriber.key) {
          keys.add(subscriber.key);
        }
      }
      return Array.from(keys).sort();
    });
  }

  private async update(
    id: string,
    mutate: (subscriber: Subscriber) => void
  ): Promise<Subscriber | null> {
    return this.storage.transaction((state) => {
      const subscriber = state.subscribers[id];
      if (!subscriber) {
        return null;
      }
      mutate(subscriber);
      return copy(subscriber);
    });
  }
}
