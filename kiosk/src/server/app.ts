import type { Server } from "node:http";
import cors from "cors";
import express, { type Request, type Response } from "express";
import type {
  CurrentWaitsResponse,
  DatabaseStats,
  ParkHistoryResponse,
  ParkboardErrorResponse,
  ParksResponse,
  RideHistoryResponse,
  RideStatsResponse,
  RidesResponse,
} from "@parkboard/core";
import type { AppContext } from "../context";
import type { WaitTimesDatabase } from "../data/database";
import type { Frame } from "../display/frame";
import { StartupError, toErrorMessage } from "../utils/errors";
import { logger, loggerStatus } from "../utils/logger";

const SSE_HEARTBEAT_MS = 15_000;

/** The part of an SSE response the hub writes to. */
export interface StreamClient {
  readonly writableNeedDrain: boolean;
  write: (chunk: string) => boolean;
  end: () => void;
}

const framePayload = (frame: Frame) => `event: frame\ndata: ${JSON.stringify(frame)}\n\n`;

/**
 * Fans composed frames out to every connected display stream. A client whose
 * socket buffer is full misses frames until it drains, and is dropped after
 * `maxSkippedFrames` misses in a row.
 */
export class FrameHub {
  private readonly clients = new Map<StreamClient, { skipped: number }>();
  private readonly maxSkippedFrames: number;
  private latest: Frame | null = null;

  constructor(maxSkippedFrames = 30) {
    this.maxSkippedFrames = Math.max(1, Math.ceil(maxSkippedFrames));
  }

  get clientCount() {
    return this.clients.size;
  }

  get latestFrame() {
    return this.latest;
  }

  publish(frame: Frame) {
    this.latest = frame;
    if (this.clients.size === 0) return;
    const payload = framePayload(frame);
    for (const [client, state] of this.clients) {
      if (!client.writableNeedDrain) {
        state.skipped = 0;
        client.write(payload);
        continue;
      }
      state.skipped += 1;
      if (state.skipped >= this.maxSkippedFrames) {
        this.clients.delete(client);
        client.end();
        logger.warn("Dropped stalled display stream", { skippedFrames: state.skipped, clients: this.clients.size });
      }
    }
  }

  /** Registers a stream; the returned function detaches it. */
  attach(client: StreamClient): () => void {
    if (this.latest) client.write(framePayload(this.latest));
    this.clients.set(client, { skipped: 0 });
    return () => {
      this.clients.delete(client);
    };
  }

  subscribe(req: Request, res: Response) {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const heartbeat = setInterval(() => res.write(": keep-alive\n\n"), SSE_HEARTBEAT_MS);
    const detach = this.attach(res);
    logger.info("Display stream connected", { clients: this.clients.size });

    req.on("close", () => {
      clearInterval(heartbeat);
      detach();
      logger.info("Display stream disconnected", { clients: this.clients.size });
    });
  }

  closeAll() {
    this.clients.forEach((_state, client) => client.end());
    this.clients.clear();
  }
}

const sendError = (res: Response, status: number, error: string, message: string) => {
  const body: ParkboardErrorResponse = { error, message };
  return res.status(status).json(body);
};

type QueryParse = { ok: true; value: number } | { ok: false; message: string };

export const parsePositiveIntParam = (value: unknown, fallback: number, name: string): QueryParse => {
  if (value === undefined) return { ok: true, value: fallback };
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return { ok: false, message: `${name} must be a positive integer` };
  }
  return { ok: true, value: parsed };
};

const withDatabase = (
  database: WaitTimesDatabase,
  label: string,
  handler: (db: WaitTimesDatabase, req: Request, res: Response) => void,
) => {
  return (req: Request, res: Response) => {
    try {
      handler(database, req, res);
    } catch (error) {
      logger.error("Dashboard query failed", { route: label, message: toErrorMessage(error) });
      sendError(res, 500, "internal_error", `Unable to load ${label}`);
    }
  };
};

const mountDashboard = (app: express.Express, database: WaitTimesDatabase) => {
  app.get(
    "/api/waits",
    withDatabase(database, "current waits", (db, _req, res) => {
      const body: CurrentWaitsResponse = { timestamp: new Date().toISOString(), waits: db.getCurrentWaits() };
      res.json(body);
    }),
  );

  app.get(
    "/api/history/:rideName",
    withDatabase(database, "ride history", (db, req, res) => {
      const hours = parsePositiveIntParam(req.query.hours, 24, "hours");
      if (!hours.ok) {
        sendError(res, 400, "bad_request", hours.message);
        return;
      }
      const rideName = req.params.rideName ?? "";
      const body: RideHistoryResponse = {
        rideName,
        hours: hours.value,
        history: db.getRideHistory(rideName, hours.value),
      };
      res.json(body);
    }),
  );

  app.get(
    "/api/park/:parkName",
    withDatabase(database, "park history", (db, req, res) => {
      const hours = parsePositiveIntParam(req.query.hours, 24, "hours");
      if (!hours.ok) {
        sendError(res, 400, "bad_request", hours.message);
        return;
      }
      const parkName = req.params.parkName ?? "";
      const body: ParkHistoryResponse = {
        parkName,
        hours: hours.value,
        history: db.getParkHistory(parkName, hours.value),
      };
      res.json(body);
    }),
  );

  app.get(
    "/api/stats/:rideName",
    withDatabase(database, "ride stats", (db, req, res) => {
      const days = parsePositiveIntParam(req.query.days, 7, "days");
      if (!days.ok) {
        sendError(res, 400, "bad_request", days.message);
        return;
      }
      const rideName = req.params.rideName ?? "";
      const body: RideStatsResponse = { rideName, days: days.value, stats: db.getRideStats(rideName, days.value) };
      res.json(body);
    }),
  );

  app.get(
    "/api/rides",
    withDatabase(database, "rides", (db, _req, res) => {
      const body: RidesResponse = { rides: db.getAllRides() };
      res.json(body);
    }),
  );

  app.get(
    "/api/parks",
    withDatabase(database, "parks", (db, _req, res) => {
      const body: ParksResponse = { parks: db.getAllParks() };
      res.json(body);
    }),
  );

  app.get(
    "/api/db-stats",
    withDatabase(database, "database stats", (db, _req, res) => {
      const body: DatabaseStats = db.getDatabaseStats();
      res.json(body);
    }),
  );
};

export const createApp = (context: AppContext, hub: FrameHub) => {
  const { config, rotation, composer, cache, redis, queueTimes, weather, database } = context;
  const app = express();

  app.use(cors());
  app.use("/assets", express.static(config.assetsDir));

  app.get("/api/display/frame", (_req, res) => {
    const frame = hub.latestFrame ?? composer.latestFrame;
    if (!frame) {
      return sendError(res, 503, "not_ready", "No frame has been rendered yet");
    }
    return res.json(frame);
  });

  app.get("/api/display/config", (_req, res) => {
    res.json({
      width: config.displayWidth,
      height: config.displayHeight,
      fps: config.fps,
      fullscreen: config.fullscreen,
    });
  });

  app.get("/api/display/stream", (req, res) => hub.subscribe(req, res));

  app.get("/api/display/state", (_req, res) => {
    res.json(rotation.describe());
  });

  app.get("/api/health", (_req, res) => {
    const redisError = redis.error ? redis.error.message : null;
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      queueTimesBaseUrl: config.queueTimesBaseUrl,
      display: { phase: rotation.phase, queueLength: rotation.queueLength, streamClients: hub.clientCount },
      cacheHealth: cache.getHealth(),
      telemetry: {
        queueTimes: queueTimes.telemetry,
        weather: weather?.telemetry ?? null,
      },
      database: database ? { path: database.dbPath } : null,
      logging: loggerStatus(),
      redis: {
        status: redis.status,
        error: redisError,
        healthy: redis.status === "ready" && !redisError,
      },
    });
  });

  if (config.dashboardEnabled && database) {
    mountDashboard(app, database);
    logger.info("Dashboard API enabled");
  }

  app.use((_req, res) => {
    sendError(res, 404, "not_found", "Route not found");
  });

  return app;
};

/** Resolves once listening; a bind failure is a StartupError. */
export const listen = (app: express.Express, host: string, port: number): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => {
      logger.info(`Display server listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once("error", (error) => {
      reject(new StartupError(`Cannot open the display surface on ${host}:${port}: ${toErrorMessage(error)}`));
    });
  });
