import type { FetchLike, Park, Ride } from "@parkboard/core";
import { config } from "../config";
import { PARKS, findParkBySlug, type ParkDefinition } from "../models/parks";
import { allOpenRides, emptyWaitTimes, type WaitTimesData } from "../models/waitTimes";
import { toErrorMessage } from "../utils/errors";
import { isRecord, readBoolean, readNumber, readString, recordsOf, type JsonRecord } from "../utils/json";
import { logger } from "../utils/logger";

const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

export interface FetchTelemetry {
  totalRequests: number;
  retryableResponses: number;
  failedRequests: number;
  lastSuccessAt: string | null;
  lastSuccessPath: string | null;
  lastFailureAt: string | null;
  lastFailureMessage: string | null;
  lastFailurePath: string | null;
}

export const createTelemetry = (): FetchTelemetry => ({
  totalRequests: 0,
  retryableResponses: 0,
  failedRequests: 0,
  lastSuccessAt: null,
  lastSuccessPath: null,
  lastFailureAt: null,
  lastFailureMessage: null,
  lastFailurePath: null,
});

export interface RetryPolicy {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Non-retryable HTTP status, or a retryable one on the last attempt. */
export class RequestFailedError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "RequestFailedError";
    this.status = status;
  }
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export const computeBackoff = (attempt: number, policy: RetryPolicy, random: () => number = Math.random) => {
  const cappedAttempt = Math.min(attempt, 10);
  const delayMs = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** cappedAttempt);
  const jitter = Math.floor(random() * 0.3 * delayMs);
  return delayMs + jitter;
};

/**
 * GET with timeout, retries on retryable statuses and network errors, and
 * telemetry bookkeeping. Shared by the wait-time and weather clients.
 */
export const fetchWithRetry = async (
  url: string,
  path: string,
  policy: RetryPolicy,
  telemetry: FetchTelemetry,
  fetchImpl: FetchLike,
  sleep: (ms: number) => Promise<unknown> = delay,
): Promise<Response> => {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= policy.maxRetries) {
    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(policy.timeoutMs) });
      if (response.ok) {
        telemetry.totalRequests += 1;
        telemetry.lastSuccessAt = new Date().toISOString();
        telemetry.lastSuccessPath = path;
        return response;
      }

      const body = await response.text().catch(() => "");
      if (!RETRYABLE_STATUSES.has(response.status) || attempt === policy.maxRetries) {
        const terminalError = new RequestFailedError(
          response.status,
          `Request failed (${response.status} ${response.statusText}) for ${path}${body ? ` - ${body.slice(0, 180)}` : ""}`,
        );
        recordFailure(telemetry, terminalError, path);
        throw terminalError;
      }

      telemetry.retryableResponses += 1;
      lastError = new Error(`Retryable status ${response.status} for ${path}`);
      const waitMs = computeBackoff(attempt, policy);
      logger.warn("Request hit retryable status, backing off", {
        path,
        status: response.status,
        attempt,
        waitMs,
      });
      await sleep(waitMs);
    } catch (error) {
      if (error instanceof RequestFailedError) {
        throw error;
      }
      telemetry.retryableResponses += 1;
      lastError = error;
      if (attempt === policy.maxRetries) {
        break;
      }
      const waitMs = computeBackoff(attempt, policy);
      logger.warn("Request failed, retrying", {
        path,
        attempt,
        waitMs,
        message: toErrorMessage(error),
      });
      await sleep(waitMs);
    }
    attempt += 1;
  }

  recordFailure(telemetry, lastError, path);
  throw new Error(`Request exhausted retries for ${path}: ${toErrorMessage(lastError)}`);
};

const recordFailure = (telemetry: FetchTelemetry, error: unknown, path: string) => {
  telemetry.failedRequests += 1;
  telemetry.lastFailureAt = new Date().toISOString();
  telemetry.lastFailureMessage = toErrorMessage(error);
  telemetry.lastFailurePath = path;
};

export const parseRides = (payload: unknown, park: ParkDefinition, fetchedAt: Date): Ride[] => {
  if (!isRecord(payload)) return [];

  const toRide = (raw: JsonRecord): Ride => ({
    id: readNumber(raw, "id") ?? 0,
    name: readString(raw, "name") ?? "Unknown",
    waitTime: Math.max(0, readNumber(raw, "wait_time") ?? 0),
    isOpen: readBoolean(raw, "is_open") ?? false,
    parkId: park.queueTimesId,
    parkName: park.name,
    parkSlug: park.slug,
    lastUpdated: fetchedAt,
  });

  const landRides = recordsOf(payload.lands).flatMap((land) => recordsOf(land.rides));
  // Some parks list rides outside any land.
  const looseRides = recordsOf(payload.rides);
  return [...landRides, ...looseRides].map(toRide);
};

export interface QueueTimesClientOptions {
  baseUrl?: string;
  parks?: readonly ParkDefinition[];
  retry?: Partial<RetryPolicy>;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
  /** Snapshot to fall back on before the first successful fetch, e.g. one hydrated from Redis. */
  retained?: WaitTimesData | null;
}

export class QueueTimesClient {
  private readonly baseUrl: string;
  private readonly parks: readonly ParkDefinition[];
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => Date;
  private readonly telemetryState = createTelemetry();
  private cache: WaitTimesData | null;
  private attempt: WaitTimesData | null = null;

  constructor(options: QueueTimesClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.queueTimesBaseUrl).replace(/\/+$/, "");
    this.parks = options.parks ?? PARKS;
    this.retry = {
      timeoutMs: options.retry?.timeoutMs ?? config.apiTimeoutMs,
      maxRetries: options.retry?.maxRetries ?? config.apiMaxRetries,
      baseDelayMs: options.retry?.baseDelayMs ?? config.apiRetryBaseDelayMs,
      maxDelayMs: options.retry?.maxDelayMs ?? config.apiRetryMaxDelayMs,
    };
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? (() => new Date());
    this.cache = options.retained ?? null;
  }

  get cachedData(): WaitTimesData | null {
    return this.cache;
  }

  /** Result object of the most recent fetchAll call, successful or not. */
  get lastAttempt(): WaitTimesData | null {
    return this.attempt;
  }

  get telemetry(): Readonly<FetchTelemetry> {
    return this.telemetryState;
  }

  async fetchPark(slug: string): Promise<Park | null> {
    const park = this.parks.find((entry) => entry.slug === slug) ?? findParkBySlug(slug);
    if (!park) {
      logger.error("Unknown park requested", { slug });
      return null;
    }

    const path = `/parks/${park.queueTimesId}/queue_times.json`;
    try {
      const response = await fetchWithRetry(
        `${this.baseUrl}${path}`,
        path,
        this.retry,
        this.telemetryState,
        this.fetchImpl,
        this.sleep,
      );
      const payload: unknown = await response.json();
      const fetchedAt = this.now();
      return {
        id: park.queueTimesId,
        name: park.name,
        slug: park.slug,
        rides: parseRides(payload, park, fetchedAt),
        lastUpdated: fetchedAt,
      };
    } catch (error) {
      logger.warn("Failed to fetch park wait times", { park: park.name, message: toErrorMessage(error) });
      return null;
    }
  }

  /**
   * Fetches every park. On total failure the previously retained snapshot is
   * returned as-is; only the attempt's own result (see lastAttempt) is marked
   * as failed.
   */
  async fetchAll(): Promise<WaitTimesData> {
    const result = emptyWaitTimes();
    let successCount = 0;

    for (const park of this.parks) {
      const fetched = await this.fetchPark(park.slug);
      if (!fetched) continue;
      result.parks.set(park.slug, fetched);
      successCount += 1;
      logger.info("Fetched park wait times", {
        park: fetched.name,
        openRides: fetched.rides.filter((ride) => ride.isOpen && ride.waitTime > 0).length,
      });
    }

    result.lastFetch = this.now();
    result.fetchSuccess = successCount > 0;
    this.attempt = result;

    if (!result.fetchSuccess) {
      result.errorMessage = "Failed to fetch data from all parks";
      logger.error(result.errorMessage);
      if (this.cache) {
        logger.info("Returning cached wait times after fetch failure");
        return this.cache;
      }
      return result;
    }

    this.cache = result;
    logger.info("Wait times fetched", { openRides: allOpenRides(result).length, parks: successCount });
    return result;
  }
}
