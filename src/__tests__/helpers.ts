import fs from "fs-extra";
import os from "os";
import path from "path";
import { HttpClient, type FetchImpl } from "../httpClient";
import { StorageService } from "../storageService";
import type { LocationConfig } from "../types";

export interface TempStorage {
  dir: string;
  storagePath: string;
  storage: StorageService;
  cleanup(): Promise<void>;
}

export async function createTempStorage(): Promise<TempStorage> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "outage-watch-"));
  const storagePath = path.join(dir, "state.json");
  return {
    dir,
    storagePath,
    storage: new StorageService(storagePath),
    cleanup: () => fs.remove(dir),
  };
}

export interface FakeRoute {
  status?: number;
  body: string | (() => string);
}

/** In-process stand-in for fetch; unknown URLs reject like a network failure. */
export function fakeFetch(routes: Record<string, FakeRoute>): FetchImpl & { calls: string[] } {
  const calls: string[] = [];
  const impl = async (input: string): Promise<Response> => {
    calls.push(input);
    const route = routes[input];
    if (!route) {
      throw new TypeError("fetch failed");
    }
    const body = typeof route.body === "function" ? route.body() : route.body;
    return new Response(body, { status: route.status ?? 200 });
  };
  return Object.assign(impl, { calls });
}

export function httpWith(routes: Record<string, FakeRoute>): HttpClient {
  return new HttpClient({ timeoutMs: 1000, userAgent: "test-agent", fetchImpl: fakeFetch(routes) });
}

export function tableLocation(overrides: Partial<LocationConfig> = {}): LocationConfig {
  return {
    id: "riverside",
    name: "Riverside",
    url: "https://power.example.test/shutdowns",
    strategy: "table",
    groupCount: 6,
    ...overrides,
  };
}
