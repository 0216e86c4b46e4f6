import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../config";
import { armTestEvent, createAppContext } from "../context";
import { QueueTimesClient } from "../queueTimes/client";

const testConfig = () => ({ ...loadConfig({}), assetsDir: "/nonexistent/parkboard-assets", databasePath: undefined });

const buildContext = async (clock: { now: Date }) =>
  createAppContext(testConfig(), {
    testEvent: "parade",
    queueTimes: new QueueTimesClient({
      baseUrl: "https://queue-times.test",
      fetchImpl: async () => new Response(JSON.stringify({ lands: [] })),
    }),
    weather: null,
    database: null,
    clock: () => clock.now,
  });

test("the test event is not scheduled until the display starts", async () => {
  const clock = { now: new Date(2026, 5, 10, 14, 0, 0) };
  const context = await buildContext(clock);
  assert.equal(context.testEvent, "parade");
  assert.equal(context.scheduler.activeEvent(clock.now), null);
});

test("a slow startup does not use up the test event's window", async () => {
  const clock = { now: new Date(2026, 5, 10, 14, 0, 0) };
  const context = await buildContext(clock);

  clock.now = new Date(2026, 5, 10, 14, 5, 0);
  armTestEvent(context);
  context.rotation.tick(0.1);

  assert.equal(context.rotation.phase, "event_active");
  assert.deepEqual(context.rotation.describe().activeEvent, {
    kind: "parade",
    parkName: "Magic Kingdom",
    elapsedSeconds: 0,
    secondsRemaining: 119,
  });
  assert.equal(context.scheduler.activeEvent(clock.now)?.startMs, (14 * 3600 + 5 * 60 - 1) * 1000);
});

test("arming does nothing without a test event", async () => {
  const clock = { now: new Date(2026, 5, 10, 14, 0, 0) };
  const context = await createAppContext(testConfig(), {
    weather: null,
    database: null,
    clock: () => clock.now,
  });
  const before = context.scheduler;
  armTestEvent(context);
  assert.equal(context.scheduler, before);
});
