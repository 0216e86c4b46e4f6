import type { AppContext } from "../context";
import { allOpenRides, withFailedAttempt } from "../models/waitTimes";
import { toErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export const FAILURE_ESCALATION_THRESHOLD = 5;

export interface PollingJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  initialDelayMs?: number;
  timer?: NodeJS.Timeout;
  consecutiveFailures: number;
  stopped?: boolean;
}

export const createJob = (
  name: string,
  intervalMs: number,
  run: () => Promise<void>,
  initialDelayMs = intervalMs,
): PollingJob => ({
  name,
  intervalMs,
  initialDelayMs,
  run,
  consecutiveFailures: 0,
});

/** Runs a job once, keeping its consecutive-failure count. Never rejects. */
export const runJobOnce = async (job: PollingJob) => {
  const start = Date.now();
  try {
    await job.run();
    job.consecutiveFailures = 0;
    logger.info("Polling job completed", { job: job.name, durationMs: Date.now() - start });
  } catch (error) {
    job.consecutiveFailures += 1;
    const meta = { job: job.name, failures: job.consecutiveFailures, message: toErrorMessage(error) };
    if (job.consecutiveFailures >= FAILURE_ESCALATION_THRESHOLD) {
      logger.error("Polling job keeps failing", meta);
    } else {
      logger.warn("Polling job failed", meta);
    }
  }
};

export const startJob = (job: PollingJob) => {
  const scheduleNext = (delayMs: number) => {
    job.timer = setTimeout(() => {
      void runJobOnce(job).then(() => {
        if (!job.stopped) scheduleNext(job.intervalMs);
      });
    }, Math.max(0, delayMs));
  };

  job.stopped = false;
  scheduleNext(job.initialDelayMs ?? 0);
};

export const stopPolling = (jobs: readonly PollingJob[]) => {
  jobs.forEach((job) => {
    job.stopped = true;
    if (job.timer) clearTimeout(job.timer);
    job.timer = undefined;
  });
};

/**
 * Refresh jobs for wait times and, when configured, weather. Both sleep a full
 * interval first: the initial fetch happens during startup.
 */
export const createJobs = (context: AppContext): PollingJob[] => {
  const { config, queueTimes, weather, cache, database, rotation } = context;

  const jobs: PollingJob[] = [
    createJob("wait-times", config.refreshIntervalSeconds * 1000, async () => {
      const data = await queueTimes.fetchAll();
      const attempt = queueTimes.lastAttempt;
      if (attempt && !attempt.fetchSuccess) {
        rotation.setDisplaySnapshot(withFailedAttempt(data, attempt));
        throw new Error(attempt.errorMessage ?? "Wait time refresh failed");
      }
      rotation.setDisplaySnapshot(data);
      cache.setWaitTimes(data);
      if (database) {
        database.storeWaitTimes(allOpenRides(data));
        database.cleanupOlderThan();
      }
    }),
  ];

  if (weather) {
    jobs.push(
      createJob("weather", config.weatherRefreshIntervalSeconds * 1000, async () => {
        const reading = await weather.fetch();
        if (!weather.lastFetchSucceeded || !reading) {
          throw new Error("Weather refresh failed");
        }
        rotation.setWeather(reading);
        cache.setWeather(reading);
        database?.storeWeather(reading);
      }),
    );
  }

  return jobs;
};

export interface PollingBundle {
  jobs: PollingJob[];
}

export const initializePolling = (context: AppContext): PollingBundle => {
  const jobs = createJobs(context);
  jobs.forEach(startJob);
  logger.info("Polling started", {
    jobs: jobs.map((job) => ({ name: job.name, intervalMs: job.intervalMs })),
  });
  return { jobs };
};
