import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { detectChange, shouldAnnounce } from "../changeDetector";
import { normalizeGroup, normalizeImage, type NormalizeContext } from "../normalizer";
import { ScheduleStore } from "../scheduleStore";
import { StorageService } from "../storageService";
import { createTempStorage, type TempStorage } from "./helpers";

const context: NormalizeContext = {
  locationId: "riverside",
  date: "2026-10-19",
  capturedAt: "2026-10-19T08:00:00.000Z",
  slotMinutes: 30,
};

const later = { ...context, capturedAt: "2026-10-19T08:30:00.000Z" };

describe("detectChange", () => {
  it("classifies against the previous fingerprint", () => {
    expect(detectChange(undefined, "a")).toBe("new");
    expect(detectChange("a", "a")).toBe("unchanged");
    expect(detectChange("a", "b")).toBe("changed");
  });

  it("only announces real changes", () => {
    expect(shouldAnnounce("new")).toBe(false);
    expect(shouldAnnounce("unchanged")).toBe(false);
    expect(shouldAnnounce("changed")).toBe(true);
  });
});

describe("ScheduleStore", () => {
  let temp: TempStorage;
  let store: ScheduleStore;

  beforeEach(async () => {
    temp = await createTempStorage();
    store = new ScheduleStore(temp.storage);
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("reports new, unchanged and changed in sequence", async () => {
    const first = normalizeGroup({ key: "1", slots: [{ label: "08:00-09:00", status: "power_off" }] }, context);
    const same = normalizeGroup({ key: "1", slots: [{ label: "08:00-09:00", status: "power_off" }] }, later);
    const moved = normalizeGroup({ key: "1", slots: [{ label: "09:00-10:00", status: "power_off" }] }, later);

    expect(await store.upsertSnapshot(first)).toBe("new");
    expect(await store.upsertSnapshot(same)).toBe("unchanged");
    expect(await store.upsertSnapshot(moved)).toBe("changed");

    const stored = await store.getSnapshot("riverside", "1", "2026-10-19");
    expect(stored?.revision).toBe(2);
    expect(stored?.fingerprint).toBe(moved.fingerprint);
  });

  it("keeps updatedAt on an unchanged upsert and advances checkedAt", async () => {
    const snapshot = normalizeGroup({ key: "2", slots: [] }, context);
    await store.upsertSnapshot(snapshot);
    await store.upsertSnapshot({ ...snapshot, capturedAt: later.capturedAt });

    const stored = await store.getSnapshot("riverside", "2", "2026-10-19");
    expect(stored?.updatedAt).toBe(context.capturedAt);
    expect(stored?.checkedAt).toBe(later.capturedAt);
    expect(await store.getLastUpdateTime("riverside", "2", "2026-10-19")).toEqual(
      new Date(context.capturedAt)
    );
  });

  it("returns null for keys it has never seen", async () => {
    expect(await store.getSchedule("riverside", "9", "2026-10-19")).toBeNull();
    expect(await store.getLastUpdateTime("riverside", "9", "2026-10-19")).toBeNull();
  });

  it("lists a location's snapshots for one date in group order", async () => {
    for (const key of ["10", "2", "1"]) {
      await store.upsertSnapshot(normalizeGroup({ key, slots: [] }, context));
    }
    await store.upsertSnapshot(normalizeGroup({ key: "3", slots: [] }, { ...context, date: "2026-10-20" }));
    await store.upsertSnapshot(normalizeGroup({ key: "4", slots: [] }, { ...context, locationId: "hillside" }));

    const listed = await store.listSnapshots("riverside", "2026-10-19");

    expect(listed.map((snapshot) => snapshot.key)).toEqual(["1", "2", "10"]);
  });

  it("tracks image references per location", async () => {
    const image = normalizeImage("https://cdn.example.test/today.png", context);

    expect(await store.upsertImage(image)).toBe("new");
    expect(await store.upsertImage({ ...image, capturedAt: later.capturedAt })).toBe("unchanged");
    expect(await store.upsertImage(normalizeImage("https://cdn.example.test/tomorrow.png", later))).toBe(
      "changed"
    );
    expect((await store.getImage("riverside"))?.url).toBe("https://cdn.example.test/tomorrow.png");
  });

  it("persists snapshots across store instances", async () => {
    await store.upsertSnapshot(normalizeGroup({ key: "1", slots: [] }, context));

    const reopened = new ScheduleStore(new StorageService(temp.storagePath));
    expect(await reopened.getSchedule("riverside", "1", "2026-10-19")).toHaveLength(48);
  });
});
