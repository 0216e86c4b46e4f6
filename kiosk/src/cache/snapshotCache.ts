import type { Park, Ride } from "@parkboard/core";
import { STALE_AFTER_SECONDS, type WaitTimesData } from "../models/waitTimes";
import type { WeatherSnapshot } from "../weather/client";
import { toErrorMessage } from "../utils/errors";
import { isRecord, readBoolean, readNumber, readString, recordsOf, type JsonRecord } from "../utils/json";
import { logger } from "../utils/logger";
import { NOOP_REDIS, type RedisManager } from "./redisClient";

export interface CacheEntry<T> {
  data: T;
  fetchedAt: number;
}

export interface CacheHealth {
  redisStatus: string;
  waitTimesAgeMs: number | null;
  waitTimesIsStale: boolean;
  weatherAgeMs: number | null;
}

const toDate = (value: string | null): Date | null => {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

const serializeWaitTimes = (data: WaitTimesData) => ({
  parks: Array.from(data.parks.entries()).map(([slug, park]) => [
    slug,
    {
      ...park,
      lastUpdated: park.lastUpdated?.toISOString() ?? null,
      rides: park.rides.map((ride) => ({ ...ride, lastUpdated: ride.lastUpdated.toISOString() })),
    },
  ]),
  lastFetch: data.lastFetch?.toISOString() ?? null,
  fetchSuccess: data.fetchSuccess,
  errorMessage: data.errorMessage,
});

const decodeRide = (raw: JsonRecord): Ride | null => {
  const id = readNumber(raw, "id");
  const name = readString(raw, "name");
  const parkId = readNumber(raw, "parkId");
  const parkName = readString(raw, "parkName");
  const parkSlug = readString(raw, "parkSlug");
  const lastUpdated = toDate(readString(raw, "lastUpdated"));
  if (id === null || name === null || parkId === null || parkName === null || parkSlug === null || !lastUpdated) {
    return null;
  }
  return {
    id,
    name,
    waitTime: readNumber(raw, "waitTime") ?? 0,
    isOpen: readBoolean(raw, "isOpen") ?? false,
    parkId,
    parkName,
    parkSlug,
    lastUpdated,
  };
};

const decodePark = (raw: unknown): Park | null => {
  if (!isRecord(raw)) return null;
  const id = readNumber(raw, "id");
  const name = readString(raw, "name");
  const slug = readString(raw, "slug");
  if (id === null || name === null || slug === null) return null;
  return {
    id,
    name,
    slug,
    rides: recordsOf(raw.rides)
      .map(decodeRide)
      .filter((ride): ride is Ride => ride !== null),
    lastUpdated: toDate(readString(raw, "lastUpdated")),
  };
};

export const decodeWaitTimes = (payload: unknown): WaitTimesData | null => {
  if (!isRecord(payload) || !Array.isArray(payload.parks)) return null;
  const parks = new Map<string, Park>();
  for (const pair of payload.parks) {
    if (!Array.isArray(pair)) continue;
    const [slug, rawPark] = pair;
    const park = decodePark(rawPark);
    if (typeof slug === "string" && park) parks.set(slug, park);
  }
  return {
    parks,
    lastFetch: toDate(readString(payload, "lastFetch")),
    fetchSuccess: readBoolean(payload, "fetchSuccess") ?? false,
    errorMessage: readString(payload, "errorMessage"),
  };
};

export const decodeWeather = (payload: unknown): WeatherSnapshot | null => {
  if (!isRecord(payload)) return null;
  const temperature = readNumber(payload, "temperature");
  const fetchedAt = toDate(readString(payload, "fetchedAt"));
  if (temperature === null || !fetchedAt) return null;
  return {
    temperature,
    condition: readString(payload, "condition") ?? "Unknown",
    iconCode: readString(payload, "iconCode") ?? "",
    humidity: readNumber(payload, "humidity"),
    description: readString(payload, "description") ?? "",
    fetchedAt,
  };
};

const decodeEntry = <T>(payload: unknown, decode: (data: unknown) => T | null): CacheEntry<T> | null => {
  if (!isRecord(payload)) return null;
  const fetchedAt = readNumber(payload, "fetchedAt");
  const data = decode(payload.data);
  return fetchedAt !== null && data ? { data, fetchedAt } : null;
};

/** Last-known wait times and weather, mirrored to Redis when it is configured. */
export class SnapshotCache {
  private waitTimes?: CacheEntry<WaitTimesData>;
  private weather?: CacheEntry<WeatherSnapshot>;
  private readonly redis: RedisManager;
  private readonly now: () => number;

  constructor(redis: RedisManager = NOOP_REDIS, now: () => number = Date.now) {
    this.redis = redis;
    this.now = now;
  }

  async hydrate() {
    if (this.redis.status !== "ready") return;
    try {
      const [waitTimes, weather] = await Promise.all([
        this.redis.readSnapshot("waitTimes"),
        this.redis.readSnapshot("weather"),
      ]);
      const waitTimesEntry = decodeEntry(waitTimes, decodeWaitTimes);
      if (waitTimesEntry) {
        this.waitTimes = waitTimesEntry;
        logger.info("Hydrated wait times from Redis", { parks: waitTimesEntry.data.parks.size });
      }
      const weatherEntry = decodeEntry(weather, decodeWeather);
      if (weatherEntry) {
        this.weather = weatherEntry;
        logger.info("Hydrated weather from Redis");
      }
    } catch (error) {
      logger.warn("Failed to hydrate snapshot cache", { message: toErrorMessage(error) });
    }
  }

  public setWaitTimes(data: WaitTimesData) {
    const entry = { data, fetchedAt: this.now() };
    this.waitTimes = entry;
    if (this.redis.status === "ready") {
      void this.redis.writeSnapshot("waitTimes", { data: serializeWaitTimes(data), fetchedAt: entry.fetchedAt });
    }
  }

  public getWaitTimes() {
    return this.waitTimes;
  }

  public setWeather(data: WeatherSnapshot) {
    const entry = { data, fetchedAt: this.now() };
    this.weather = entry;
    if (this.redis.status === "ready") {
      void this.redis.writeSnapshot("weather", {
        data: { ...data, fetchedAt: data.fetchedAt.toISOString() },
        fetchedAt: entry.fetchedAt,
      });
    }
  }

  public getWeather() {
    return this.weather;
  }

  public getHealth(): CacheHealth {
    const now = this.now();
    const waitTimesAgeMs = this.waitTimes ? now - this.waitTimes.fetchedAt : null;
    return {
      redisStatus: this.redis.status,
      waitTimesAgeMs,
      waitTimesIsStale: waitTimesAgeMs != null ? waitTimesAgeMs > STALE_AFTER_SECONDS * 1000 : true,
      weatherAgeMs: this.weather ? now - this.weather.fetchedAt : null,
    };
  }
}

export const createSnapshotCache = (redis?: RedisManager) => new SnapshotCache(redis);
