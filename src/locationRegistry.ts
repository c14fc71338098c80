import fs from "fs-extra";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import type { LocationConfig } from "./types";

const pageStrategy = z.enum(["table", "script", "image"]);

export const LocationSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9_-]+$/, "id must be a lowercase slug"),
    name: z.string().min(1),
    url: z.string().url(),
    strategy: z.enum(["table", "script", "image", "address"]),
    fallbackStrategies: z.array(pageStrategy).optional(),
    groupCount: z.number().int().min(1).max(50).optional(),
    lookup: z.object({ baseUrl: z.string().url() }).optional(),
    note: z.string().optional(),
    emptyMarkers: z.array(z.string().min(1)).optional(),
    imageSelector: z.string().optional(),
  })
  .superRefine((entry, ctx) => {
    const groupBased = entry.strategy === "table" || entry.strategy === "script";
    if (groupBased && entry.groupCount === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `strategy "${entry.strategy}" requires groupCount`,
        path: ["groupCount"],
      });
    }
    if (entry.strategy === "address" && !entry.lookup) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'strategy "address" requires lookup.baseUrl',
        path: ["lookup"],
      });
    }
  });

const LocationListSchema = z.array(LocationSchema).min(1);

export class LocationRegistry {
  private readonly locations: ReadonlyMap<string, Readonly<LocationConfig>>;

  constructor(entries: readonly unknown[]) {
    const parsed = LocationListSchema.safeParse(entries);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid location configuration: ${issues}`);
    }

    const locations = new Map<string, Readonly<LocationConfig>>();
    for (const entry of parsed.data) {
      if (locations.has(entry.id)) {
        throw new ConfigError(`Duplicate location id "${entry.id}"`, { id: entry.id });
      }
      locations.set(entry.id, Object.freeze(entry));
    }
    this.locations = locations;
  }

  static async fromFile(filePath: string): Promise<LocationRegistry> {
    if (!(await fs.pathExists(filePath))) {
      throw new ConfigError(`Location file not found: ${filePath}`, { filePath });
    }

    let raw: unknown;
    try {
      raw = await fs.readJSON(filePath);
    } catch (error) {
      throw new ConfigError(`Location file ${filePath} is not valid JSON`, {
        filePath,
        cause: errorMessage(error),
      });
    }

    if (!Array.isArray(raw)) {
      throw new ConfigError(`Location file ${filePath} must contain an array`, { filePath });
    }
    return new LocationRegistry(raw);
  }

  list(): Readonly<LocationConfig>[] {
    return Array.from(this.locations.values());
  }

  get(id: string): Readonly<LocationConfig> | undefined {
    return this.locations.get(id);
  }

  require(id: string): Readonly<LocationConfig> {
    const location = this.locations.get(id);
    if (!location) {
      throw new ConfigError(`Unknown location "${id}"`, { id });
    }
    return location;
  }
}
