#!/usr/bin/env node
import readline from "node:readline";
import { parseArgs, formatTextSummary, usage, type CliOptions } from "./cli";
import { config, type AppConfig } from "./config";
import { armTestEvent, createAppContext, type AppContext } from "./context";
import { createRenderLoop } from "./display/renderLoop";
import { allOpenRides, withFailedAttempt, type WaitTimesData } from "./models/waitTimes";
import { initializePolling, stopPolling } from "./polling/startPolling";
import { FrameHub, createApp, listen } from "./server/app";
import { StartupError, toErrorMessage } from "./utils/errors";
import { closeLogger, configureLogger, logger } from "./utils/logger";
import { tempDisplay } from "./weather/client";

const resolveConfig = (options: CliOptions): AppConfig => ({
  ...config,
  fullscreen: options.fullscreen || config.fullscreen,
  eventsConfigPath: options.eventsConfigPath ?? config.eventsConfigPath,
});

const loadInitialWaitTimes = async (context: AppContext): Promise<WaitTimesData> => {
  const { queueTimes, rotation, cache, database } = context;
  logger.info("Fetching wait times", { baseUrl: context.config.queueTimesBaseUrl });
  const data = await queueTimes.fetchAll();
  if (!data.fetchSuccess) {
    throw new StartupError("Could not fetch wait times. Check network connection.");
  }

  const attempt = queueTimes.lastAttempt;
  if (attempt && !attempt.fetchSuccess) {
    logger.warn("Starting from retained wait times", { lastFetch: data.lastFetch?.toISOString() ?? null });
    rotation.setDisplaySnapshot(withFailedAttempt(data, attempt));
    return data;
  }

  logger.info("Fetched initial wait times", { openRides: allOpenRides(data).length });
  rotation.setDisplaySnapshot(data);
  cache.setWaitTimes(data);
  database?.storeWaitTimes(allOpenRides(data));
  return data;
};

const loadInitialWeather = async (context: AppContext) => {
  const { weather, rotation, cache, database } = context;
  if (!weather) return;
  const reading = await weather.fetch();
  if (!reading) return;
  rotation.setWeather(reading);
  if (!weather.lastFetchSucceeded) return;
  cache.setWeather(reading);
  database?.storeWeather(reading);
  logger.info("Initial weather", { temperature: tempDisplay(reading), condition: reading.condition });
};

/** Resolves with the name of whatever asked the kiosk to stop. */
const waitForShutdown = (context: AppContext) =>
  new Promise<string>((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));

    if (!process.stdin.isTTY) return;
    readline.emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.on("keypress", (_text: string | undefined, key: readline.Key | undefined) => {
      if (!key) return;
      if (key.name === "q" || key.name === "escape" || (key.ctrl && key.name === "c")) {
        resolve(`key:${key.name ?? "unknown"}`);
        return;
      }
      if (key.name === "space") context.rotation.advance();
    });
  });

const releaseStdin = () => {
  if (!process.stdin.isTTY) return;
  process.stdin.setRawMode(false);
  process.stdin.pause();
};

const runKiosk = async (context: AppContext): Promise<number> => {
  const { config: appConfig, composer, rotation } = context;

  const hub = new FrameHub(appConfig.fps);
  const server = await listen(createApp(context, hub), appConfig.serverHost, appConfig.serverPort);
  const { jobs } = initializePolling(context);
  const loop = createRenderLoop({
    fps: appConfig.fps,
    rotation,
    composer,
    onFrame: (frame) => hub.publish(frame),
  });
  armTestEvent(context);
  loop.start();

  const reason = await waitForShutdown(context);
  logger.info("Shutting down", { reason });

  loop.stop();
  stopPolling(jobs);
  hub.closeAll();
  releaseStdin();
  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) logger.warn("Display server did not close cleanly", { message: error.message });
      resolve();
    });
  });
  await context.redis.disconnect();
  logger.info("Application shutdown complete");
  return 0;
};

const main = async (argv: readonly string[]): Promise<number> => {
  const options = parseArgs(argv);
  if (options.help) {
    console.log(usage());
    return 0;
  }

  configureLogger({
    level: options.logLevel ?? config.logLevel,
    console: options.consoleLog,
    filePath: config.logFile,
  });
  logger.info("Parkboard starting");

  const context = await createAppContext(resolveConfig(options), { testEvent: options.testEvent ?? undefined });
  const data = await loadInitialWaitTimes(context);

  if (options.textOnly) {
    console.log(formatTextSummary(data));
    await context.redis.disconnect();
    return 0;
  }

  await loadInitialWeather(context);
  return runKiosk(context);
};

main(process.argv.slice(2))
  .then((code) => {
    closeLogger();
    process.exit(code);
  })
  .catch((error: unknown) => {
    if (error instanceof StartupError) {
      logger.error("Startup failed", { message: error.message });
      console.error(`Error: ${error.message}`);
      closeLogger();
      process.exit(error.exitCode);
    }
    logger.error("Unexpected error", { message: toErrorMessage(error) });
    closeLogger();
    process.exit(1);
  });
