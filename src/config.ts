// src/config.ts
import type { ThemeName } from "./types.ts";

// --- Environment Variables ---
export interface EnvConfig {
  botToken: string;
  adminChatId: number;
  supabaseUrl: string;
  supabaseKey: string;
  notifyOnStartup: boolean;
  notifyChanges: boolean;
  fontUrl: string;
}

type Env = Record<string, string | undefined>;

// Throws at startup if any required variable is missing.
function getRequiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`CRITICAL ERROR: Required environment variable "${key}" is missing.`);
  }
  return value;
}

function getFlag(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") return fallback;
  return value.toLowerCase() === "yes";
}

export function loadEnvConfig(env: Env = process.env): EnvConfig {
  const adminChatId = Number(getRequiredEnv(env, "ADMIN_CHAT_ID"));
  if (!Number.isSafeInteger(adminChatId)) {
    throw new Error(`CRITICAL ERROR: ADMIN_CHAT_ID must be a numeric chat id.`);
  }
  return {
    botToken: getRequiredEnv(env, "BOT_TOKEN"),
    adminChatId,
    supabaseUrl: getRequiredEnv(env, "SUPABASE_URL"),
    supabaseKey: getRequiredEnv(env, "SUPABASE_KEY"),
    notifyOnStartup: getFlag(env, "NOTIFY_ON_STARTUP", false),
    notifyChanges: getFlag(env, "NOTIFY_CHANGES", true),
    fontUrl: env.SCHEDULE_FONT_URL || DEFAULT_FONT_URL,
  };
}

// --- Telegram API ---
export const TELEGRAM_API_BASE = "https://api.telegram.org";
export const TELEGRAM_TIMEOUT_MS = 60 * 1000;

// --- Date & Time Configuration ---
export const COLLEGE_TIMEZONE = "Europe/Minsk";
export const SOURCE_DATE_FORMAT = "dd.MM.yyyy";
export const DAY_OFF_WEEKDAY = 7; // luxon: Sunday
export const NIGHT_HOURS: readonly number[] = [22, 23, 0, 1, 2, 3, 4, 5, 6, 7];
export const RU_WEEKDAYS = ["Понедельник", "Вторник", "Среда", "Четверг", "Пятница", "Суббота", "Воскресенье"];

// --- Checker cadence ---
export const SLEEP_DAY_MS = 3 * 60 * 1000;
export const SLEEP_NIGHT_MS = 60 * 60 * 1000;
export const LOOP_ERROR_PAUSE_MS = 3 * 1000;

// --- Delivery ---
export const RATE_LIMIT_PERMITS = 15;
export const RATE_LIMIT_WINDOW_MS = 7 * 1000;
export const SEND_CHUNK_SIZE = 10;
export const SEND_MAX_ATTEMPTS = 4;
export const RETRY_AFTER_MARGIN_MS = 1000;
export const RETRY_AFTER_JITTER_MS = 1000;

// --- Schedule source ---
export const SOURCE_URL = "https://mtec.by/wp-admin/admin-ajax.php";
export const SOURCE_REFERER = "https://mtec.by/ru/students/schedule";
export const SOURCE_TIMEOUT_MS = 30 * 1000;
export const SOURCE_MAX_ATTEMPTS = 3;
export const SOURCE_RETRY_DELAY_MS = 500;

// --- Rendering ---
export const DEFAULT_FONT_URL = "https://cdn.jsdelivr.net/gh/googlefonts/roboto@v2.138/src/hinted/Roboto-Regular.ttf";

export interface ThemePalette {
  pageFill: string;
  titleText: string;
  headerFill: string;
  headerText: string;
  bodyFill: string;
  bodyText: string;
  lineColor: string;
}

export const THEMES: Record<ThemeName, ThemePalette> = {
  Classic: { pageFill: "#ffffff", titleText: "#000000", headerFill: "#ffffff", headerText: "#000000", bodyFill: "#ffffff", bodyText: "#000000", lineColor: "#000000" },
  MidNight: { pageFill: "#131618", titleText: "#ffffff", headerFill: "#1d2124", headerText: "#ffffff", bodyFill: "#131618", bodyText: "#ffffff", lineColor: "#6d6d6b" },
  Night: { pageFill: "#131618", titleText: "#ffffff", headerFill: "#131618", headerText: "#ffffff", bodyFill: "#131618", bodyText: "#ffffff", lineColor: "#6d6d6b" },
  LightFog: { pageFill: "#F2F2F2", titleText: "#4F4F4F", headerFill: "#FFFFFF", headerText: "#4F4F4F", bodyFill: "#F2F2F2", bodyText: "#474747", lineColor: "#E0E0E0" },
  Fog: { pageFill: "#4A4A4A", titleText: "#FFFFFF", headerFill: "#333333", headerText: "#FFFFFF", bodyFill: "#4A4A4A", bodyText: "#EDEDED", lineColor: "#5A5A5A" },
  DarkFog: { pageFill: "#2E2E2E", titleText: "#E0E0E0", headerFill: "#1C1C1C", headerText: "#E0E0E0", bodyFill: "#2E2E2E", bodyText: "#E3E3E3", lineColor: "#333333" },
  MtecCore: { pageFill: "#ebebeb", titleText: "#508da3", headerFill: "#508da3", headerText: "#e3e3e3", bodyFill: "#ebebeb", bodyText: "#3d3d3d", lineColor: "#b3b3b3" },
};

export const THEME_NAMES: readonly ThemeName[] = ["Classic", "MidNight", "Night", "LightFog", "Fog", "DarkFog", "MtecCore"];
export const DEFAULT_THEME: ThemeName = "Classic";
export const CHAT_THEME: ThemeName = "Classic";
