import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  EventScheduler,
  createTestEvent,
  formatTimeOfDay,
  isActiveAt,
  parseEventSchedule,
  parseTimeOfDay,
  timeRemaining,
  type ScheduledEvent,
} from "../events/scheduler";

const at = (hours: number, minutes: number, seconds = 0, ms = 0) => new Date(2026, 5, 10, hours, minutes, seconds, ms);

const fireworks = (parkName: string, parkSlug: string, time: string): ScheduledEvent => {
  const startMs = parseTimeOfDay(time);
  assert.notEqual(startMs, null);
  return { kind: "fireworks", parkName, parkSlug, startMs: startMs ?? 0, durationSeconds: 240 };
};

test("parseTimeOfDay accepts 24-hour H:MM and rejects everything else", () => {
  assert.equal(parseTimeOfDay("21:00"), 75_600_000);
  assert.equal(parseTimeOfDay("9:05"), 32_700_000);
  assert.equal(parseTimeOfDay(" 7:30 "), 27_000_000);
  assert.equal(parseTimeOfDay("24:00"), null);
  assert.equal(parseTimeOfDay("12:60"), null);
  assert.equal(parseTimeOfDay("21:00:00"), null);
  assert.equal(parseTimeOfDay("9pm"), null);
  assert.equal(formatTimeOfDay(75_600_000), "21:00");
  assert.equal(formatTimeOfDay(32_700_000), "9:05");
});

test("parseEventSchedule keeps valid entries in document order and skips bad ones", () => {
  const events = parseEventSchedule({
    fireworks: {
      enabled: true,
      schedule: {
        magic_kingdom: ["21:00"],
        epcot: ["21:15", "late"],
        atlantis: ["20:00"],
        animal_kingdom: "19:00",
      },
    },
    parades: {
      enabled: true,
      duration: 90,
      schedule: { magic_kingdom: ["15:00"] },
    },
  });

  assert.deepEqual(
    events.map((event) => [event.kind, event.parkSlug, formatTimeOfDay(event.startMs), event.durationSeconds]),
    [
      ["fireworks", "magic-kingdom", "21:00", 240],
      ["fireworks", "epcot", "21:15", 240],
      ["parade", "magic-kingdom", "15:00", 90],
    ],
  );
});

test("parseEventSchedule ignores disabled sections and non-object configs", () => {
  assert.deepEqual(parseEventSchedule({ fireworks: { enabled: false, schedule: { epcot: ["21:00"] } } }), []);
  assert.deepEqual(parseEventSchedule({ fireworks: { enabled: "yes", schedule: { epcot: ["21:00"] } } }), []);
  assert.deepEqual(parseEventSchedule(["fireworks"]), []);
  assert.deepEqual(parseEventSchedule(null), []);
});

test("an event is active from its start up to, not including, its end", () => {
  const event = fireworks("Magic Kingdom", "magic-kingdom", "21:00");
  assert.equal(isActiveAt(event, at(20, 59, 59)), false);
  assert.equal(isActiveAt(event, at(21, 0)), true);
  assert.equal(isActiveAt(event, at(21, 3, 59)), true);
  assert.equal(isActiveAt(event, at(21, 4)), false);
});

test("remaining seconds are whole seconds inside the window", () => {
  const event = fireworks("Magic Kingdom", "magic-kingdom", "21:00");
  assert.equal(timeRemaining(event, at(21, 1, 30)), 150);
  assert.equal(timeRemaining(event, at(21, 1, 30, 500)), 149);
  assert.equal(timeRemaining(event, at(22, 0)), 0);
});

test("activeEvent returns the first scheduled event when windows overlap", () => {
  const scheduler = EventScheduler.withEvents([
    fireworks("Magic Kingdom", "magic-kingdom", "21:00"),
    fireworks("EPCOT", "epcot", "21:02"),
  ]);
  assert.equal(scheduler.activeEvent(at(21, 3))?.parkName, "Magic Kingdom");
  assert.equal(scheduler.activeEvent(at(21, 5))?.parkName, "EPCOT");
  assert.equal(scheduler.activeEvent(at(21, 7)), null);
});

test("nextEvent picks the nearest start and rolls past starts over to tomorrow", () => {
  const scheduler = EventScheduler.withEvents([
    fireworks("Magic Kingdom", "magic-kingdom", "21:00"),
    fireworks("EPCOT", "epcot", "21:00"),
    fireworks("Animal Kingdom", "animal-kingdom", "12:00"),
  ]);

  const evening = scheduler.nextEvent(at(20, 0));
  assert.equal(evening?.event.parkName, "Magic Kingdom");
  assert.equal(evening?.secondsUntilStart, 3600);

  const late = scheduler.nextEvent(at(22, 0));
  assert.equal(late?.event.parkName, "Animal Kingdom");
  assert.equal(late?.secondsUntilStart, 14 * 3600);

  assert.equal(EventScheduler.withEvents([]).nextEvent(at(20, 0)), null);
});

test("createTestEvent starts one second before now", () => {
  const now = at(10, 0);
  const event = createTestEvent("fireworks-epcot", now);
  assert.deepEqual(event, {
    kind: "fireworks",
    parkName: "EPCOT",
    parkSlug: "epcot",
    startMs: 35_999_000,
    durationSeconds: 240,
  });
  assert.equal(isActiveAt(event, now), true);

  const parade = createTestEvent("parade", now);
  assert.equal(parade.kind, "parade");
  assert.equal(parade.durationSeconds, 120);
});

test("a test event created just after midnight is still active", () => {
  const now = at(0, 0, 0, 500);
  const event = createTestEvent("fireworks", now);
  assert.equal(event.startMs, -500);
  assert.equal(EventScheduler.withEvents([event]).activeEvent(now), event);
});

test("fromFile reads the JSON schedule and tolerates a missing file", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "parkboard-events-"));
  const file = path.join(dir, "events.json");
  fs.writeFileSync(
    file,
    JSON.stringify({ fireworks: { enabled: true, duration_seconds: 300, schedule: { epcot: ["21:00"] } } }),
  );

  const scheduler = EventScheduler.fromFile(file);
  assert.equal(scheduler.events.length, 1);
  assert.equal(scheduler.events[0]?.durationSeconds, 300);
  assert.deepEqual(EventScheduler.fromFile(path.join(dir, "missing.json")).events, []);
  fs.rmSync(dir, { recursive: true, force: true });
});
