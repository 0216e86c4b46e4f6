import type { FetchLike } from "@parkboard/core";
import { config } from "../config";
import { createTelemetry, fetchWithRetry, type FetchTelemetry, type RetryPolicy } from "../queueTimes/client";
import { toErrorMessage } from "../utils/errors";
import { isRecord, readNumber, readString, recordsOf } from "../utils/json";
import { logger } from "../utils/logger";

export interface WeatherSnapshot {
  /** Degrees Fahrenheit. */
  temperature: number;
  condition: string;
  iconCode: string;
  humidity: number | null;
  description: string;
  fetchedAt: Date;
}

const WEATHER_GLYPHS: Record<string, string> = {
  "01d": "☀️",
  "01n": "🌙",
  "02d": "⛅",
  "02n": "☁️",
  "03d": "☁️",
  "03n": "☁️",
  "04d": "☁️",
  "04n": "☁️",
  "09d": "🌧️",
  "09n": "🌧️",
  "10d": "🌦️",
  "10n": "🌧️",
  "11d": "⛈️",
  "11n": "⛈️",
  "13d": "❄️",
  "13n": "❄️",
  "50d": "🌫️",
  "50n": "🌫️",
};

const FALLBACK_GLYPH = "🌡️";

export const weatherGlyph = (iconCode: string) => WEATHER_GLYPHS[iconCode] ?? FALLBACK_GLYPH;

export const tempDisplay = (weather: Pick<WeatherSnapshot, "temperature">) =>
  `${Math.round(weather.temperature)}°F`;

export const parseWeather = (payload: unknown, fetchedAt: Date): WeatherSnapshot => {
  if (!isRecord(payload) || !isRecord(payload.main)) {
    throw new Error("Weather payload is missing 'main'");
  }
  const [condition] = recordsOf(payload.weather);
  const temperature = readNumber(payload.main, "temp");
  if (!condition || temperature === null) {
    throw new Error("Weather payload is missing temperature or condition");
  }
  return {
    temperature,
    condition: readString(condition, "main") ?? "Unknown",
    iconCode: readString(condition, "icon") ?? "",
    humidity: readNumber(payload.main, "humidity"),
    description: readString(condition, "description") ?? "",
    fetchedAt,
  };
};

export interface WeatherClientOptions {
  apiKey?: string | undefined;
  baseUrl?: string;
  latitude?: number;
  longitude?: number;
  retry?: Partial<RetryPolicy>;
  fetchImpl?: FetchLike;
  now?: () => Date;
  retained?: WeatherSnapshot | null;
}

export class WeatherClient {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly latitude: number;
  private readonly longitude: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly telemetryState: FetchTelemetry = createTelemetry();
  private cache: WeatherSnapshot | null;
  private lastFetchOk = false;

  constructor(options: WeatherClientOptions = {}) {
    this.apiKey = "apiKey" in options ? options.apiKey : config.weatherApiKey;
    this.baseUrl = options.baseUrl ?? config.weatherBaseUrl;
    this.latitude = options.latitude ?? config.weatherLatitude;
    this.longitude = options.longitude ?? config.weatherLongitude;
    // Weather is cosmetic; one attempt per refresh is enough.
    this.retry = {
      timeoutMs: options.retry?.timeoutMs ?? config.apiTimeoutMs,
      maxRetries: options.retry?.maxRetries ?? 0,
      baseDelayMs: options.retry?.baseDelayMs ?? config.apiRetryBaseDelayMs,
      maxDelayMs: options.retry?.maxDelayMs ?? config.apiRetryMaxDelayMs,
    };
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.cache = options.retained ?? null;
  }

  get cachedData(): WeatherSnapshot | null {
    return this.cache;
  }

  /** Whether the most recent fetch() produced a new reading. */
  get lastFetchSucceeded() {
    return this.lastFetchOk;
  }

  get telemetry(): Readonly<FetchTelemetry> {
    return this.telemetryState;
  }

  /** Minutes since the cached reading, or null when nothing has been fetched. */
  dataAgeMinutes(now: Date = this.now()): number | null {
    if (!this.cache) return null;
    return Math.floor((now.getTime() - this.cache.fetchedAt.getTime()) / 60_000);
  }

  async fetch(): Promise<WeatherSnapshot | null> {
    this.lastFetchOk = false;
    if (!this.apiKey) {
      logger.warn("Weather API key not configured");
      return this.cache;
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set("lat", String(this.latitude));
    url.searchParams.set("lon", String(this.longitude));
    url.searchParams.set("appid", this.apiKey);
    url.searchParams.set("units", "imperial");

    try {
      const response = await fetchWithRetry(
        url.toString(),
        url.pathname,
        this.retry,
        this.telemetryState,
        this.fetchImpl,
      );
      const weather = parseWeather(await response.json(), this.now());
      this.cache = weather;
      this.lastFetchOk = true;
      logger.info("Weather fetched", { temperature: tempDisplay(weather), condition: weather.condition });
      return weather;
    } catch (error) {
      logger.error("Failed to fetch weather", { message: toErrorMessage(error) });
      return this.cache;
    }
  }
}
