import type { AppConfig } from "./config";
import { createSnapshotCache, type SnapshotCache } from "./cache/snapshotCache";
import { createRedisManager, type RedisManager } from "./cache/redisClient";
import { createDatabase, type WaitTimesDatabase } from "./data/database";
import { CardRenderer } from "./display/cardRenderer";
import { FrameComposer } from "./display/frame";
import { RotationController } from "./display/rotation";
import { createEventAnimations, type EventAnimations } from "./events/drivers";
import type { RandomSource } from "./events/random";
import { EventScheduler, createTestEvent, type TestEventKind } from "./events/scheduler";
import { QueueTimesClient } from "./queueTimes/client";
import { ImageLibrary } from "./themes/images";
import { ThemeCatalog } from "./themes/themes";
import { WeatherClient } from "./weather/client";
import { logger } from "./utils/logger";

/** Everything the kiosk shares, built once at startup and passed explicitly. */
export interface AppContext {
  config: AppConfig;
  redis: RedisManager;
  cache: SnapshotCache;
  queueTimes: QueueTimesClient;
  weather: WeatherClient | null;
  database: WaitTimesDatabase | null;
  scheduler: EventScheduler;
  themes: ThemeCatalog;
  images: ImageLibrary;
  animations: EventAnimations;
  cards: CardRenderer;
  rotation: RotationController;
  composer: FrameComposer;
  clock: () => Date;
  /** Synthetic event armed by `armTestEvent` once the display starts. */
  testEvent: TestEventKind | null;
}

export interface ContextOptions {
  testEvent?: TestEventKind | undefined;
  redis?: RedisManager;
  queueTimes?: QueueTimesClient;
  weather?: WeatherClient | null;
  database?: WaitTimesDatabase | null;
  scheduler?: EventScheduler;
  random?: RandomSource;
  clock?: () => Date;
}

export const createScheduler = (config: AppConfig, testEvent?: TestEventKind) => {
  if (testEvent) {
    logger.info("Test mode: synthetic event starts with the display", { event: testEvent });
    return EventScheduler.withEvents([]);
  }
  return EventScheduler.fromFile(config.eventsConfigPath);
};

/**
 * Anchors the `--test-event` event at the current time. Called right before
 * the render loop starts so that slow startup fetches cannot use up its
 * window.
 */
export const armTestEvent = (context: AppContext) => {
  if (!context.testEvent) return;
  const event = createTestEvent(context.testEvent, context.clock());
  const scheduler = EventScheduler.withEvents([event]);
  context.scheduler = scheduler;
  context.rotation.setScheduler(scheduler);
  logger.info("Test mode: synthetic event active", { event: context.testEvent, park: event.parkName });
};

/**
 * Connects Redis and hydrates the snapshot cache before the clients are
 * built, so the fetcher starts out with the last-known snapshot.
 */
export const createAppContext = async (config: AppConfig, options: ContextOptions = {}): Promise<AppContext> => {
  const redis = options.redis ?? createRedisManager(config.redisUrl, config.redisKeyPrefix);
  await redis.connect();
  const cache = createSnapshotCache(redis);
  await cache.hydrate();

  const queueTimes =
    options.queueTimes ??
    new QueueTimesClient({
      baseUrl: config.queueTimesBaseUrl,
      retry: {
        timeoutMs: config.apiTimeoutMs,
        maxRetries: config.apiMaxRetries,
        baseDelayMs: config.apiRetryBaseDelayMs,
        maxDelayMs: config.apiRetryMaxDelayMs,
      },
      retained: cache.getWaitTimes()?.data ?? null,
    });

  const weather =
    options.weather !== undefined
      ? options.weather
      : config.weatherEnabled && config.weatherApiKey
        ? new WeatherClient({
            apiKey: config.weatherApiKey,
            baseUrl: config.weatherBaseUrl,
            latitude: config.weatherLatitude,
            longitude: config.weatherLongitude,
            retained: cache.getWeather()?.data ?? null,
          })
        : null;
  if (!weather) logger.info("Weather display disabled (no API key configured)");

  const database =
    options.database !== undefined ? options.database : createDatabase(config.databasePath, config.retentionDays);

  const clock = options.clock ?? (() => new Date());
  const scheduler = options.scheduler ?? createScheduler(config, options.testEvent);
  const themes = new ThemeCatalog(config.assetsDir);
  const images = new ImageLibrary(config.assetsDir);
  images.preloadAll();
  const animations = createEventAnimations({
    width: config.displayWidth,
    height: config.displayHeight,
    assetsDir: config.assetsDir,
    random: options.random,
  });
  const cards = new CardRenderer(config.displayWidth, config.displayHeight, themes, images);
  const rotation = new RotationController({
    scheduler,
    animations,
    cards,
    images,
    displayDurationSeconds: config.displayDurationSeconds,
    transitionDurationSeconds: config.transitionDurationSeconds,
    transitionType: config.transitionType,
    clock,
  });
  const composer = new FrameComposer(rotation, cards);

  return {
    config,
    redis,
    cache,
    queueTimes,
    weather,
    database,
    scheduler,
    themes,
    images,
    animations,
    cards,
    rotation,
    composer,
    clock,
    testEvent: options.testEvent ?? null,
  };
};
