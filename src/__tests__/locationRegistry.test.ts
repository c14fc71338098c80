import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError } from "../errors";
import { LocationRegistry } from "../locationRegistry";
import { createTempStorage, tableLocation, type TempStorage } from "./helpers";

describe("LocationRegistry", () => {
  it("lists and looks up configured locations", () => {
    const registry = new LocationRegistry([
      tableLocation(),
      { id: "uplands", name: "Uplands", url: "https://uplands.example.test/", strategy: "image" },
    ]);

    expect(registry.list().map((location) => location.id)).toEqual(["riverside", "uplands"]);
    expect(registry.get("uplands")?.strategy).toBe("image");
    expect(registry.get("nowhere")).toBeUndefined();
    expect(() => registry.require("nowhere")).toThrow(ConfigError);
  });

  it("requires a group count for group-based strategies", () => {
    expect(() => new LocationRegistry([tableLocation({ groupCount: undefined })])).toThrow(
      /groupCount: strategy "table" requires groupCount/
    );
  });

  it("requires a lookup API for address locations", () => {
    expect(() => new LocationRegistry([tableLocation({ strategy: "address" })])).toThrow(
      /lookup: strategy "address" requires lookup.baseUrl/
    );
  });

  it("rejects duplicate ids", () => {
    expect(() => new LocationRegistry([tableLocation(), tableLocation()])).toThrow(
      'Duplicate location id "riverside"'
    );
  });

  it("freezes entries", () => {
    const registry = new LocationRegistry([tableLocation()]);

    expect(Object.isFrozen(registry.require("riverside"))).toBe(true);
  });

  describe("fromFile", () => {
    let temp: TempStorage;

    beforeEach(async () => {
      temp = await createTempStorage();
    });

    afterEach(async () => {
      await temp.cleanup();
    });

    it("loads a JSON array of locations", async () => {
      const file = path.join(temp.dir, "locations.json");
      await fs.writeJSON(file, [tableLocation()]);

      const registry = await LocationRegistry.fromFile(file);

      expect(registry.require("riverside").groupCount).toBe(6);
    });

    it("fails with a ConfigError for a missing or malformed file", async () => {
      const file = path.join(temp.dir, "locations.json");
      await expect(LocationRegistry.fromFile(file)).rejects.toThrow("Location file not found");

      await fs.writeFile(file, "{ not json");
      await expect(LocationRegistry.fromFile(file)).rejects.toBeInstanceOf(ConfigError);

      await fs.writeJSON(file, { locations: [] });
      await expect(LocationRegistry.fromFile(file)).rejects.toThrow("must contain an array");
    });
  });
});
