import test from "node:test";
import assert from "node:assert/strict";
import { NOOP_REDIS, snapshotKey } from "../cache/redisClient";
import { SnapshotCache, decodeWaitTimes, decodeWeather } from "../cache/snapshotCache";
import { createMemoryRedis, magicKingdomData, makeRide } from "./helpers";

const FETCHED_AT = new Date("2026-06-10T16:00:00.000Z");

const weatherReading = {
  temperature: 88.6,
  condition: "Clouds",
  iconCode: "03d",
  humidity: 70,
  description: "scattered clouds",
  fetchedAt: FETCHED_AT,
};

test("cache health tracks snapshot age and staleness", () => {
  const clock = { now: 1_000 };
  const cache = new SnapshotCache(NOOP_REDIS, () => clock.now);
  assert.deepEqual(cache.getHealth(), {
    redisStatus: "disabled",
    waitTimesAgeMs: null,
    waitTimesIsStale: true,
    weatherAgeMs: null,
  });

  cache.setWaitTimes(magicKingdomData([makeRide({ name: "Space Mountain", waitTime: 45 })], FETCHED_AT));
  clock.now = 901_000;
  assert.deepEqual(cache.getHealth(), {
    redisStatus: "disabled",
    waitTimesAgeMs: 900_000,
    waitTimesIsStale: false,
    weatherAgeMs: null,
  });
  clock.now = 901_001;
  assert.equal(cache.getHealth().waitTimesIsStale, true);
});

test("a restarted cache hydrates the last snapshots from Redis", async () => {
  const { redis, store } = createMemoryRedis();
  const writer = new SnapshotCache(redis, () => 5_000);
  writer.setWaitTimes(
    magicKingdomData([makeRide({ id: 7, name: "Space Mountain", waitTime: 45, lastUpdated: FETCHED_AT })], FETCHED_AT),
  );
  writer.setWeather(weatherReading);
  assert.deepEqual([...store.keys()], ["parkboard:cache:wait-times", "parkboard:cache:weather"]);

  const reader = new SnapshotCache(redis, () => 6_000);
  await reader.hydrate();

  const waitTimes = reader.getWaitTimes();
  assert.equal(waitTimes?.fetchedAt, 5_000);
  assert.deepEqual(waitTimes?.data.lastFetch, FETCHED_AT);
  assert.equal(waitTimes?.data.fetchSuccess, true);
  const ride = waitTimes?.data.parks.get("magic-kingdom")?.rides[0];
  assert.equal(ride?.name, "Space Mountain");
  assert.equal(ride?.waitTime, 45);
  assert.deepEqual(ride?.lastUpdated, FETCHED_AT);

  assert.deepEqual(reader.getWeather(), { data: weatherReading, fetchedAt: 5_000 });
  assert.equal(reader.getHealth().weatherAgeMs, 1_000);
});

test("snapshots are written under the configured prefix with their own TTLs", () => {
  const { redis, ttls } = createMemoryRedis("lobby-screen");
  const cache = new SnapshotCache(redis, () => 5_000);
  cache.setWaitTimes(magicKingdomData([makeRide({ name: "Space Mountain", waitTime: 45 })], FETCHED_AT));
  cache.setWeather(weatherReading);

  assert.equal(snapshotKey("lobby-screen", "weather"), "lobby-screen:cache:weather");
  assert.deepEqual(
    [...ttls.entries()],
    [
      ["lobby-screen:cache:wait-times", 86_400_000],
      ["lobby-screen:cache:weather", 10_800_000],
    ],
  );
});

test("an unreadable cached snapshot is treated as missing", async () => {
  const { redis, store } = createMemoryRedis();
  store.set("parkboard:cache:weather", "{not json");
  assert.equal(await redis.readSnapshot("weather"), null);

  const cache = new SnapshotCache(redis);
  await cache.hydrate();
  assert.equal(cache.getWeather(), undefined);
});

test("hydrate does nothing while Redis is not connected", async () => {
  const cache = new SnapshotCache(NOOP_REDIS);
  await cache.hydrate();
  assert.equal(cache.getWaitTimes(), undefined);
  assert.equal(cache.getWeather(), undefined);
});

test("malformed cached payloads are rejected", () => {
  assert.equal(decodeWaitTimes("nope"), null);
  assert.equal(decodeWaitTimes({ parks: {} }), null);
  assert.equal(decodeWeather({ condition: "Clear", fetchedAt: FETCHED_AT.toISOString() }), null);
  assert.equal(decodeWeather({ temperature: 80, fetchedAt: "yesterday" }), null);
});
