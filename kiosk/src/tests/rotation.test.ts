import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { CardRenderer } from "../display/cardRenderer";
import { RotationController } from "../display/rotation";
import { EventAnimations } from "../events/drivers";
import { EventScheduler, type ScheduledEvent } from "../events/scheduler";
import { emptyWaitTimes, withFailedAttempt } from "../models/waitTimes";
import { ImageLibrary } from "../themes/images";
import { ThemeCatalog } from "../themes/themes";
import { RecordingDriver, magicKingdomData, makeRide, makeTempDir, removeDir } from "./helpers";

const ASSETS_DIR = "/nonexistent/parkboard-assets";
const at = (hours: number, minutes: number, seconds = 0) => new Date(2026, 5, 10, hours, minutes, seconds);

const buildRotation = (events: ScheduledEvent[] = [], assetsDir = ASSETS_DIR) => {
  const clock = { now: at(11, 0) };
  const fireworks = new RecordingDriver();
  const parade = new RecordingDriver();
  const images = new ImageLibrary(assetsDir);
  const rotation = new RotationController({
    scheduler: EventScheduler.withEvents(events),
    animations: new EventAnimations({ fireworks, parade }),
    cards: new CardRenderer(800, 480, new ThemeCatalog(ASSETS_DIR), images),
    images,
    displayDurationSeconds: 8,
    transitionDurationSeconds: 0.5,
    transitionType: "crossfade",
    clock: () => clock.now,
  });
  return { rotation, clock, fireworks, parade, images };
};

/** One dwell plus one two-step transition. */
const playOneCard = (rotation: RotationController) => {
  rotation.tick(8);
  rotation.tick(0.25);
  rotation.tick(0.25);
};

const threeRides = (fetchedAt: Date) =>
  magicKingdomData(
    [
      makeRide({ id: 1, name: "Space Mountain", waitTime: 60 }),
      makeRide({ id: 2, name: "Haunted Mansion", waitTime: 40 }),
      makeRide({ id: 3, name: "Jungle Cruise", waitTime: 25 }),
    ],
    fetchedAt,
  );

const fireworksAtNoon: ScheduledEvent = {
  kind: "fireworks",
  parkName: "Magic Kingdom",
  parkSlug: "magic-kingdom",
  startMs: 12 * 3_600_000,
  durationSeconds: 240,
};

test("an empty queue shows the no-data screen and never advances", () => {
  const { rotation } = buildRotation();
  assert.equal(rotation.phase, "empty");
  rotation.tick(30);
  assert.equal(rotation.dwellSeconds, 0);
  assert.deepEqual(rotation.currentRenderItem(), { kind: "empty" });
});

test("each card dwells for the display duration, then cross-fades to the next", () => {
  const { rotation, clock } = buildRotation();
  rotation.setDisplaySnapshot(threeRides(clock.now));

  rotation.tick(4);
  assert.equal(rotation.phase, "normal_rotation");
  const first = rotation.currentRenderItem();
  assert.equal(first.kind, "card");
  if (first.kind === "card") {
    assert.equal(first.index, 0);
    assert.equal(first.total, 3);
  }

  rotation.tick(4);
  assert.equal(rotation.phase, "transitioning");
  assert.equal(rotation.index, 1);
  assert.equal(rotation.transitionProgress, 0);
  assert.equal(rotation.dwellSeconds, 0);

  rotation.tick(0.25);
  const fading = rotation.currentRenderItem();
  assert.equal(fading.kind, "transition");
  if (fading.kind === "transition") {
    assert.equal(fading.alpha, 0.5);
    assert.equal(fading.transition, "crossfade");
  }

  rotation.tick(0.25);
  assert.equal(rotation.phase, "normal_rotation");
  assert.equal(rotation.transitionProgress, null);
  assert.equal(rotation.index, 1);
});

test("the index wraps to the first card after the last one", () => {
  const { rotation, clock } = buildRotation();
  rotation.setDisplaySnapshot(threeRides(clock.now));
  rotation.advance();
  rotation.advance();
  assert.equal(rotation.index, 2);
  rotation.advance();
  assert.equal(rotation.index, 0);
});

test("a full lap of ticks returns to the first card and moves every image cycle once", () => {
  const assetsDir = makeTempDir("lap");
  const writeImages = (folder: string, files: string[]) => {
    const dir = path.join(assetsDir, "images", folder);
    fs.mkdirSync(dir, { recursive: true });
    files.forEach((file) => fs.writeFileSync(path.join(dir, file), ""));
  };
  writeImages("space_mountain", ["a.png", "b.png", "c.png"]);
  writeImages("haunted_mansion", ["a.png", "b.png"]);

  const { rotation, clock, images } = buildRotation([], assetsDir);
  rotation.setDisplaySnapshot(threeRides(clock.now));
  const positions = () => [images.cyclePosition("space_mountain"), images.cyclePosition("haunted_mansion")];

  playOneCard(rotation);
  playOneCard(rotation);
  assert.equal(rotation.index, 2);
  assert.deepEqual(positions(), [0, 0]);

  playOneCard(rotation);
  assert.equal(rotation.index, 0);
  assert.equal(rotation.phase, "normal_rotation");
  assert.deepEqual(positions(), [1, 1]);
  assert.equal(images.imageForRide("Space Mountain"), "/assets/images/space_mountain/b.png");

  for (let card = 0; card < 3; card += 1) playOneCard(rotation);
  assert.equal(rotation.index, 0);
  assert.deepEqual(positions(), [2, 0]);
  removeDir(assetsDir);
});

test("a single card never transitions", () => {
  const { rotation, clock } = buildRotation();
  rotation.setDisplaySnapshot(magicKingdomData([makeRide({ name: "Tron", waitTime: 90 })], clock.now));
  rotation.tick(20);
  rotation.advance();
  assert.equal(rotation.index, 0);
  assert.equal(rotation.phase, "normal_rotation");
});

test("non-positive or non-finite frame times are ignored", () => {
  const { rotation, clock } = buildRotation();
  rotation.setDisplaySnapshot(threeRides(clock.now));
  rotation.tick(2);
  rotation.tick(0);
  rotation.tick(-1);
  rotation.tick(Number.NaN);
  assert.equal(rotation.dwellSeconds, 2);
});

test("a shorter snapshot resets an out-of-range index", () => {
  const { rotation, clock } = buildRotation();
  rotation.setDisplaySnapshot(threeRides(clock.now));
  rotation.advance();
  rotation.advance();
  rotation.setDisplaySnapshot(magicKingdomData([makeRide({ name: "Tron", waitTime: 90 })], clock.now));
  assert.equal(rotation.index, 0);
  assert.equal(rotation.queueLength, 1);
});

test("a failed refresh keeps the cards and raises the error badge", () => {
  const { rotation, clock } = buildRotation();
  const retained = threeRides(at(10, 50));
  const attempt = emptyWaitTimes();
  attempt.errorMessage = "Failed to fetch data from all parks";
  rotation.setDisplaySnapshot(withFailedAttempt(retained, attempt));

  assert.equal(rotation.queueLength, 3);
  assert.equal(rotation.currentSnapshot.errorMessage, "Failed to fetch data from all parks");
  assert.deepEqual(rotation.overlay(clock.now).freshness.badge, { tone: "error", label: "10m" });
});

test("an active event takes over the screen and pauses the rotation", () => {
  const { rotation, clock, fireworks, parade } = buildRotation([fireworksAtNoon]);
  rotation.setDisplaySnapshot(threeRides(clock.now));
  rotation.tick(3);

  clock.now = at(12, 0, 10);
  rotation.tick(0.1);
  assert.equal(rotation.phase, "event_active");
  assert.equal(fireworks.resets, 1);
  assert.equal(parade.resets, 0);
  assert.deepEqual(fireworks.updates, [[0.1, 0]]);

  clock.now = at(12, 0, 12);
  rotation.tick(0.1);
  assert.deepEqual(fireworks.updates[1], [0.1, 2]);
  rotation.advance();
  assert.equal(rotation.index, 0);
  assert.equal(rotation.dwellSeconds, 3);

  const item = rotation.currentRenderItem();
  assert.equal(item.kind, "event");
  if (item.kind === "event") {
    assert.equal(item.driver, fireworks);
    assert.equal(item.elapsedSeconds, 2);
  }
  assert.deepEqual(rotation.describe().activeEvent, {
    kind: "fireworks",
    parkName: "Magic Kingdom",
    elapsedSeconds: 2,
    secondsRemaining: 228,
  });

  clock.now = at(12, 4, 0);
  rotation.tick(1);
  assert.equal(rotation.phase, "normal_rotation");
  assert.equal(rotation.dwellSeconds, 4);
  assert.equal(fireworks.resets, 1);
});

test("an event that starts mid-transition holds it and the rotation resumes afterwards", () => {
  const { rotation, clock } = buildRotation([fireworksAtNoon]);
  clock.now = at(11, 59, 59);
  rotation.setDisplaySnapshot(threeRides(clock.now));
  rotation.tick(8);
  rotation.tick(0.25);
  assert.equal(rotation.phase, "transitioning");
  assert.equal(rotation.transitionProgress, 0.5);

  clock.now = at(12, 0, 5);
  rotation.tick(0.25);
  rotation.tick(3);
  assert.equal(rotation.phase, "event_active");
  assert.equal(rotation.index, 1);
  assert.equal(rotation.transitionProgress, 0.5);
  assert.equal(rotation.dwellSeconds, 0);

  clock.now = at(12, 4, 0);
  rotation.tick(0.25);
  assert.equal(rotation.phase, "normal_rotation");
  assert.equal(rotation.transitionProgress, null);
  assert.equal(rotation.index, 1);

  rotation.tick(8);
  assert.equal(rotation.phase, "transitioning");
  assert.equal(rotation.index, 2);
});

test("describe reports the current card, the next event and the data age", () => {
  const { rotation, clock } = buildRotation([fireworksAtNoon]);
  rotation.setDisplaySnapshot(threeRides(at(10, 45)));

  assert.deepEqual(rotation.describe(clock.now), {
    phase: "normal_rotation",
    index: 0,
    queueLength: 3,
    currentTitle: "Space Mountain",
    activeEvent: null,
    nextEvent: { kind: "fireworks", parkName: "Magic Kingdom", secondsUntilStart: 3600 },
    dataAgeMinutes: 15,
    isStale: false,
    badge: { tone: "warning", label: "15m" },
    generatedAt: clock.now.toISOString(),
  });
});
