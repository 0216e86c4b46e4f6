import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type {
  CurrentWaitRecord,
  DatabaseStats,
  ParkHistoryPoint,
  Ride,
  RideHistoryPoint,
  RideStats,
} from "@parkboard/core";
import type { WeatherSnapshot } from "../weather/client";
import { logger } from "../utils/logger";

const HOUR_MS = 1000 * 60 * 60;
const DAY_MS = HOUR_MS * 24;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS wait_times (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    ride_id INTEGER NOT NULL,
    ride_name TEXT NOT NULL,
    park_name TEXT NOT NULL,
    wait_time INTEGER NOT NULL,
    is_open INTEGER NOT NULL DEFAULT 1
  );
  CREATE INDEX IF NOT EXISTS idx_wait_times_timestamp ON wait_times(timestamp);
  CREATE INDEX IF NOT EXISTS idx_wait_times_ride ON wait_times(ride_name);
  CREATE INDEX IF NOT EXISTS idx_wait_times_park ON wait_times(park_name);
  CREATE TABLE IF NOT EXISTS weather (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    temperature REAL NOT NULL,
    condition TEXT NOT NULL,
    humidity INTEGER,
    description TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_weather_timestamp ON weather(timestamp);
`;

interface CurrentWaitRow {
  ride_name: string;
  park_name: string;
  wait_time: number;
  is_open: number;
  timestamp: string;
}

interface CleanupResult {
  waitRecords: number;
  weatherRecords: number;
}

export interface WaitTimesDatabaseOptions {
  retentionDays?: number;
  now?: () => Date;
}

/**
 * Append-only history of wait times and weather readings. Every operation
 * opens and closes its own connection. Timestamps are stored as ISO strings,
 * which sort chronologically.
 */
export class WaitTimesDatabase {
  readonly dbPath: string;
  readonly retentionDays: number;
  private readonly now: () => Date;

  constructor(dbPath: string, options: WaitTimesDatabaseOptions = {}) {
    this.dbPath = dbPath;
    this.retentionDays = options.retentionDays ?? 30;
    this.now = options.now ?? (() => new Date());
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    this.withConnection((db) => db.exec(SCHEMA));
    logger.info("Database initialized", { dbPath });
  }

  private withConnection<T>(run: (db: Database.Database) => T): T {
    const db = new Database(this.dbPath);
    try {
      return run(db);
    } finally {
      db.close();
    }
  }

  private since(ms: number) {
    return new Date(this.now().getTime() - ms).toISOString();
  }

  storeWaitTimes(rides: readonly Ride[]) {
    if (rides.length === 0) return;
    const timestamp = this.now().toISOString();
    this.withConnection((db) => {
      const insert = db.prepare<[string, number, string, string, number, number]>(
        `INSERT INTO wait_times (timestamp, ride_id, ride_name, park_name, wait_time, is_open)
         VALUES (?, ?, ?, ?, ?, ?)`,
      );
      const insertAll = db.transaction((batch: readonly Ride[]) => {
        for (const ride of batch) {
          insert.run(timestamp, ride.id, ride.name, ride.parkName, ride.waitTime, ride.isOpen ? 1 : 0);
        }
      });
      insertAll(rides);
    });
    logger.debug("Stored wait time records", { count: rides.length });
  }

  storeWeather(weather: Pick<WeatherSnapshot, "temperature" | "condition" | "humidity" | "description">) {
    this.withConnection((db) => {
      db.prepare<[string, number, string, number | null, string | null]>(
        `INSERT INTO weather (timestamp, temperature, condition, humidity, description)
         VALUES (?, ?, ?, ?, ?)`,
      ).run(this.now().toISOString(), weather.temperature, weather.condition, weather.humidity, weather.description);
    });
  }

  cleanupOlderThan(retentionDays: number = this.retentionDays): CleanupResult {
    const cutoff = this.since(retentionDays * DAY_MS);
    const result = this.withConnection((db) => ({
      waitRecords: db.prepare<[string]>("DELETE FROM wait_times WHERE timestamp < ?").run(cutoff).changes,
      weatherRecords: db.prepare<[string]>("DELETE FROM weather WHERE timestamp < ?").run(cutoff).changes,
    }));
    if (result.waitRecords > 0 || result.weatherRecords > 0) {
      logger.info("Cleaned up old records", { ...result });
    }
    return result;
  }

  /** Rows from the most recent fetch, by park name then wait descending. */
  getCurrentWaits(): CurrentWaitRecord[] {
    return this.withConnection((db) => {
      const latest = db.prepare<[], { latest: string | null }>("SELECT MAX(timestamp) AS latest FROM wait_times").get();
      if (!latest?.latest) return [];
      return db
        .prepare<[string], CurrentWaitRow>(
          `SELECT ride_name, park_name, wait_time, is_open, timestamp
           FROM wait_times
           WHERE timestamp = ?
           ORDER BY park_name, wait_time DESC`,
        )
        .all(latest.latest)
        .map((row) => ({
          rideName: row.ride_name,
          parkName: row.park_name,
          waitTime: row.wait_time,
          isOpen: row.is_open === 1,
          timestamp: row.timestamp,
        }));
    });
  }

  getRideHistory(rideName: string, hours = 24): RideHistoryPoint[] {
    const since = this.since(hours * HOUR_MS);
    return this.withConnection((db) =>
      db
        .prepare<[string, string], { timestamp: string; wait_time: number }>(
          `SELECT timestamp, wait_time
           FROM wait_times
           WHERE ride_name = ? AND timestamp >= ?
           ORDER BY timestamp ASC`,
        )
        .all(rideName, since)
        .map((row) => ({ timestamp: row.timestamp, waitTime: row.wait_time })),
    );
  }

  getParkHistory(parkName: string, hours = 24): ParkHistoryPoint[] {
    const since = this.since(hours * HOUR_MS);
    return this.withConnection((db) =>
      db
        .prepare<[string, string], { timestamp: string; avg_wait: number; ride_count: number }>(
          `SELECT timestamp, AVG(wait_time) AS avg_wait, COUNT(*) AS ride_count
           FROM wait_times
           WHERE park_name = ? AND timestamp >= ? AND is_open = 1
           GROUP BY timestamp
           ORDER BY timestamp ASC`,
        )
        .all(parkName, since)
        .map((row) => ({ timestamp: row.timestamp, avgWait: row.avg_wait, rideCount: row.ride_count })),
    );
  }

  getRideStats(rideName: string, days = 7): RideStats {
    const since = this.since(days * DAY_MS);
    const row = this.withConnection((db) =>
      db
        .prepare<
          [string, string],
          { min_wait: number | null; max_wait: number | null; avg_wait: number | null; data_points: number }
        >(
          `SELECT MIN(wait_time) AS min_wait, MAX(wait_time) AS max_wait,
                  AVG(wait_time) AS avg_wait, COUNT(*) AS data_points
           FROM wait_times
           WHERE ride_name = ? AND timestamp >= ? AND is_open = 1`,
        )
        .get(rideName, since),
    );
    return {
      minWait: row?.min_wait ?? 0,
      maxWait: row?.max_wait ?? 0,
      avgWait: Math.round((row?.avg_wait ?? 0) * 10) / 10,
      dataPoints: row?.data_points ?? 0,
    };
  }

  getAllRides(): string[] {
    return this.withConnection((db) =>
      db
        .prepare<[], { ride_name: string }>("SELECT DISTINCT ride_name FROM wait_times ORDER BY ride_name")
        .all()
        .map((row) => row.ride_name),
    );
  }

  getAllParks(): string[] {
    return this.withConnection((db) =>
      db
        .prepare<[], { park_name: string }>("SELECT DISTINCT park_name FROM wait_times ORDER BY park_name")
        .all()
        .map((row) => row.park_name),
    );
  }

  getDatabaseStats(): DatabaseStats {
    return this.withConnection((db) => {
      const waits = db
        .prepare<[], { count: number; oldest: string | null; newest: string | null }>(
          "SELECT COUNT(*) AS count, MIN(timestamp) AS oldest, MAX(timestamp) AS newest FROM wait_times",
        )
        .get();
      const weather = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM weather").get();
      return {
        waitRecords: waits?.count ?? 0,
        weatherRecords: weather?.count ?? 0,
        oldestRecord: waits?.oldest ?? null,
        newestRecord: waits?.newest ?? null,
        dbPath: this.dbPath,
        retentionDays: this.retentionDays,
      };
    });
  }
}

export const createDatabase = (dbPath: string | undefined, retentionDays: number) =>
  dbPath ? new WaitTimesDatabase(dbPath, { retentionDays }) : null;
