import dotenv from "dotenv";

dotenv.config();

const DEFAULT_DISPLAY_WIDTH = 800;
const DEFAULT_DISPLAY_HEIGHT = 480;
const DEFAULT_FPS = 30;
const DEFAULT_DISPLAY_DURATION_SECONDS = 8;
const DEFAULT_TRANSITION_DURATION_SECONDS = 0.5;
const DEFAULT_QUEUE_TIMES_BASE_URL = "https://queue-times.com";
const DEFAULT_API_TIMEOUT_MS = 10_000;
const DEFAULT_API_MAX_RETRIES = 3;
const DEFAULT_API_RETRY_BASE_DELAY_MS = 500;
const DEFAULT_API_RETRY_MAX_DELAY_MS = 7_500;
const DEFAULT_REFRESH_INTERVAL_SECONDS = 300;
const DEFAULT_WEATHER_BASE_URL = "https://api.openweathermap.org/data/2.5/weather";
const DEFAULT_WEATHER_REFRESH_INTERVAL_SECONDS = 1800;
const DEFAULT_WEATHER_LATITUDE = 28.3772;
const DEFAULT_WEATHER_LONGITUDE = -81.5707;
const DEFAULT_DATABASE_PATH = "data/wait-times.db";
const DEFAULT_RETENTION_DAYS = 30;
const DEFAULT_SERVER_HOST = "0.0.0.0";
const DEFAULT_SERVER_PORT = 8080;
const DEFAULT_REDIS_KEY_PREFIX = "parkboard";
const DEFAULT_EVENTS_CONFIG_PATH = "config/events.json";
const DEFAULT_ASSETS_DIR = "assets";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type TransitionType = "crossfade" | "slide_left";

export interface AppConfig {
  displayWidth: number;
  displayHeight: number;
  fullscreen: boolean;
  fps: number;
  displayDurationSeconds: number;
  transitionDurationSeconds: number;
  transitionType: TransitionType;
  queueTimesBaseUrl: string;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryBaseDelayMs: number;
  apiRetryMaxDelayMs: number;
  refreshIntervalSeconds: number;
  weatherEnabled: boolean;
  weatherApiKey: string | undefined;
  weatherBaseUrl: string;
  weatherLatitude: number;
  weatherLongitude: number;
  weatherRefreshIntervalSeconds: number;
  databasePath: string | undefined;
  retentionDays: number;
  serverHost: string;
  serverPort: number;
  dashboardEnabled: boolean;
  redisUrl: string | undefined;
  redisKeyPrefix: string;
  logLevel: LogLevel;
  logFile: string | undefined;
  eventsConfigPath: string;
  assetsDir: string;
}

export type Env = Record<string, string | undefined>;

export const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  if (normalized === "warning") return "warn";
  return "info";
};

const normalizeTransitionType = (value?: string): TransitionType =>
  value === "slide_left" ? "slide_left" : "crossfade";

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (value !== undefined && value !== "" && Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

const parseNonNegativeInteger = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (value !== undefined && value.trim() !== "" && Number.isInteger(parsed) && parsed >= 0) return parsed;
  return fallback;
};

const parseCoordinate = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
};

const optionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  displayWidth: parsePositiveNumber(env.DISPLAY_WIDTH, DEFAULT_DISPLAY_WIDTH),
  displayHeight: parsePositiveNumber(env.DISPLAY_HEIGHT, DEFAULT_DISPLAY_HEIGHT),
  fullscreen: parseFlag(env.DISPLAY_FULLSCREEN, false),
  fps: parsePositiveNumber(env.DISPLAY_FPS, DEFAULT_FPS),
  displayDurationSeconds: parsePositiveNumber(env.ROTATION_DISPLAY_DURATION, DEFAULT_DISPLAY_DURATION_SECONDS),
  transitionDurationSeconds: parsePositiveNumber(
    env.ROTATION_TRANSITION_DURATION,
    DEFAULT_TRANSITION_DURATION_SECONDS,
  ),
  transitionType: normalizeTransitionType(env.ROTATION_TRANSITION_TYPE),
  queueTimesBaseUrl: env.QUEUE_TIMES_BASE_URL ?? DEFAULT_QUEUE_TIMES_BASE_URL,
  apiTimeoutMs: parsePositiveNumber(env.API_TIMEOUT_MS, DEFAULT_API_TIMEOUT_MS),
  apiMaxRetries: parseNonNegativeInteger(env.API_MAX_RETRIES, DEFAULT_API_MAX_RETRIES),
  apiRetryBaseDelayMs: parsePositiveNumber(env.API_RETRY_BASE_DELAY_MS, DEFAULT_API_RETRY_BASE_DELAY_MS),
  apiRetryMaxDelayMs: parsePositiveNumber(env.API_RETRY_MAX_DELAY_MS, DEFAULT_API_RETRY_MAX_DELAY_MS),
  refreshIntervalSeconds: parsePositiveNumber(env.REFRESH_INTERVAL_SECONDS, DEFAULT_REFRESH_INTERVAL_SECONDS),
  weatherEnabled: parseFlag(env.WEATHER_ENABLED, false),
  weatherApiKey: optionalString(env.WEATHER_API_KEY),
  weatherBaseUrl: env.WEATHER_BASE_URL ?? DEFAULT_WEATHER_BASE_URL,
  weatherLatitude: parseCoordinate(env.WEATHER_LATITUDE, DEFAULT_WEATHER_LATITUDE),
  weatherLongitude: parseCoordinate(env.WEATHER_LONGITUDE, DEFAULT_WEATHER_LONGITUDE),
  weatherRefreshIntervalSeconds: parsePositiveNumber(
    env.WEATHER_REFRESH_INTERVAL_SECONDS,
    DEFAULT_WEATHER_REFRESH_INTERVAL_SECONDS,
  ),
  // An explicitly empty DATABASE_PATH turns history off.
  databasePath: env.DATABASE_PATH === undefined ? DEFAULT_DATABASE_PATH : optionalString(env.DATABASE_PATH),
  retentionDays: parsePositiveNumber(env.DATABASE_RETENTION_DAYS, DEFAULT_RETENTION_DAYS),
  serverHost: env.SERVER_HOST ?? DEFAULT_SERVER_HOST,
  serverPort: parsePositiveNumber(env.SERVER_PORT, DEFAULT_SERVER_PORT),
  dashboardEnabled: parseFlag(env.DASHBOARD_ENABLED, false),
  redisUrl: optionalString(env.REDIS_URL),
  redisKeyPrefix: optionalString(env.REDIS_KEY_PREFIX) ?? DEFAULT_REDIS_KEY_PREFIX,
  logLevel: normalizeLogLevel(env.LOG_LEVEL),
  logFile: optionalString(env.LOG_FILE),
  eventsConfigPath: env.EVENTS_CONFIG_PATH ?? DEFAULT_EVENTS_CONFIG_PATH,
  assetsDir: env.ASSETS_DIR ?? DEFAULT_ASSETS_DIR,
});

export const config: AppConfig = loadConfig();
