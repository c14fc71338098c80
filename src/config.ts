import path from "path";
import dotenv from "dotenv";
import { ConfigError } from "./errors";

dotenv.config();

const MINUTES_PER_DAY = 24 * 60;

export interface AppConfig {
  locationsPath: string;
  storagePath: string;
  refreshCron: string;
  notifyCron: string;
  timezone: string;
  requestTimeoutMs: number;
  userAgent: string;
  slotMinutes: number;
  leadMinutes: number;
  toleranceMinutes: number;
  notificationRetentionDays: number;
  telegram?: {
    botToken: string;
  };
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Invalid numeric value for ${key}: "${raw}"`, { key });
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

export function loadConfig(env: Env, cwd: string = process.cwd()): AppConfig {
  const slotMinutes = readNumber(env, "SLOT_MINUTES", 30);
  if (slotMinutes <= 0 || MINUTES_PER_DAY % slotMinutes !== 0) {
    throw new ConfigError(
      `SLOT_MINUTES must divide a day evenly, got ${slotMinutes}`,
      { slotMinutes }
    );
  }

  const appConfig: AppConfig = {
    locationsPath: path.resolve(
      cwd,
      readString(env, "LOCATIONS_PATH", path.join("config", "locations.json"))
    ),
    storagePath: path.resolve(
      cwd,
      readString(env, "STORAGE_PATH", path.join("data", "state.json"))
    ),
    refreshCron: readString(env, "REFRESH_CRON", "*/30 * * * *"),
    notifyCron: readString(env, "NOTIFY_CRON", "*/15 * * * *"),
    timezone: readString(env, "TZ", "Europe/Kyiv"),
    requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT_MS", 30000),
    userAgent: readString(
      env,
      "USER_AGENT",
      "Mozilla/5.0 (compatible; OutageWatch/1.0)"
    ),
    slotMinutes,
    leadMinutes: readNumber(env, "LEAD_MINUTES", 30),
    toleranceMinutes: readNumber(env, "TOLERANCE_MINUTES", 15),
    notificationRetentionDays: readNumber(env, "NOTIFICATION_RETENTION_DAYS", 7),
  };

  const botToken = env.TELEGRAM_BOT_TOKEN?.trim();
  if (botToken) {
    appConfig.telegram = { botToken };
  }

  return appConfig;
}

export const config: AppConfig = loadConfig(process.env);
