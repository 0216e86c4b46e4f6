import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { WaitTimesDatabase, createDatabase } from "../data/database";
import { makeRide, makeTempDir, removeDir } from "./helpers";

const T0 = new Date("2026-06-10T12:00:00.000Z");
const T1 = new Date("2026-06-10T12:05:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;

const openDatabase = () => {
  const dir = makeTempDir("db");
  const clock = { now: T0 };
  const database = new WaitTimesDatabase(path.join(dir, "nested", "history.db"), {
    retentionDays: 30,
    now: () => clock.now,
  });
  return { dir, clock, database };
};

const seed = (database: WaitTimesDatabase, clock: { now: Date }) => {
  clock.now = T0;
  database.storeWaitTimes([
    makeRide({ id: 1, name: "Space Mountain", waitTime: 60 }),
    makeRide({ id: 2, name: "Haunted Mansion", waitTime: 30 }),
    makeRide({ id: 3, name: "Soarin", waitTime: 45, parkName: "EPCOT", parkSlug: "epcot" }),
  ]);
  clock.now = T1;
  database.storeWaitTimes([
    makeRide({ id: 1, name: "Space Mountain", waitTime: 50 }),
    makeRide({ id: 2, name: "Haunted Mansion", waitTime: 20 }),
    makeRide({ id: 4, name: "Railroad", waitTime: 0, isOpen: false }),
  ]);
};

test("current waits come from the latest snapshot only", () => {
  const { dir, clock, database } = openDatabase();
  assert.deepEqual(database.getCurrentWaits(), []);
  seed(database, clock);

  assert.deepEqual(database.getCurrentWaits(), [
    { rideName: "Space Mountain", parkName: "Magic Kingdom", waitTime: 50, isOpen: true, timestamp: T1.toISOString() },
    { rideName: "Haunted Mansion", parkName: "Magic Kingdom", waitTime: 20, isOpen: true, timestamp: T1.toISOString() },
    { rideName: "Railroad", parkName: "Magic Kingdom", waitTime: 0, isOpen: false, timestamp: T1.toISOString() },
  ]);
  removeDir(dir);
});

test("ride and park history are returned oldest first", () => {
  const { dir, clock, database } = openDatabase();
  seed(database, clock);

  assert.deepEqual(database.getRideHistory("Space Mountain"), [
    { timestamp: T0.toISOString(), waitTime: 60 },
    { timestamp: T1.toISOString(), waitTime: 50 },
  ]);
  assert.deepEqual(database.getParkHistory("Magic Kingdom"), [
    { timestamp: T0.toISOString(), avgWait: 45, rideCount: 2 },
    { timestamp: T1.toISOString(), avgWait: 35, rideCount: 2 },
  ]);

  clock.now = new Date(T1.getTime() + 2 * 60 * 60 * 1000);
  assert.deepEqual(database.getRideHistory("Space Mountain", 1), []);
  removeDir(dir);
});

test("ride stats summarise open readings and default to zero", () => {
  const { dir, clock, database } = openDatabase();
  seed(database, clock);

  assert.deepEqual(database.getRideStats("Space Mountain"), { minWait: 50, maxWait: 60, avgWait: 55, dataPoints: 2 });
  assert.deepEqual(database.getRideStats("Railroad"), { minWait: 0, maxWait: 0, avgWait: 0, dataPoints: 0 });
  removeDir(dir);
});

test("ride and park names are listed alphabetically", () => {
  const { dir, clock, database } = openDatabase();
  seed(database, clock);

  assert.deepEqual(database.getAllRides(), ["Haunted Mansion", "Railroad", "Soarin", "Space Mountain"]);
  assert.deepEqual(database.getAllParks(), ["EPCOT", "Magic Kingdom"]);
  removeDir(dir);
});

test("database stats count records and report the covered range", () => {
  const { dir, clock, database } = openDatabase();
  seed(database, clock);
  database.storeWaitTimes([]);
  database.storeWeather({ temperature: 88.6, condition: "Clouds", humidity: 70, description: "scattered clouds" });

  assert.deepEqual(database.getDatabaseStats(), {
    waitRecords: 6,
    weatherRecords: 1,
    oldestRecord: T0.toISOString(),
    newestRecord: T1.toISOString(),
    dbPath: path.join(dir, "nested", "history.db"),
    retentionDays: 30,
  });
  removeDir(dir);
});

test("cleanup removes records older than the retention window", () => {
  const { dir, clock, database } = openDatabase();
  seed(database, clock);
  database.storeWeather({ temperature: 88.6, condition: "Clouds", humidity: null, description: "" });

  clock.now = new Date(T0.getTime() + 30 * DAY_MS + 60_000);
  assert.deepEqual(database.cleanupOlderThan(), { waitRecords: 3, weatherRecords: 0 });

  clock.now = new Date(T1.getTime() + 31 * DAY_MS);
  assert.deepEqual(database.cleanupOlderThan(), { waitRecords: 3, weatherRecords: 1 });
  assert.equal(database.getDatabaseStats().waitRecords, 0);
  removeDir(dir);
});

test("history is disabled without a database path", () => {
  assert.equal(createDatabase(undefined, 30), null);
});
