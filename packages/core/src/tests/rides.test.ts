import test from "node:test";
import assert from "node:assert/strict";
import { displayWait, openRides, waitCategory, type Park, type Ride } from "../models/rides";

const makeRide = (overrides: Partial<Ride>): Ride => ({
  id: 1,
  name: "Ride",
  waitTime: 10,
  isOpen: true,
  parkId: 6,
  parkName: "Magic Kingdom",
  parkSlug: "magic-kingdom",
  lastUpdated: new Date(0),
  ...overrides,
});

test("waitCategory partitions waits into four contiguous ranges", () => {
  const expected: Array<[number, string]> = [
    [0, "short"],
    [20, "short"],
    [21, "moderate"],
    [45, "moderate"],
    [46, "long"],
    [75, "long"],
    [76, "very_long"],
    [240, "very_long"],
  ];
  for (const [wait, category] of expected) {
    assert.equal(waitCategory(wait), category, `wait ${wait}`);
  }
});

test("waitCategory changes category only at the range boundaries", () => {
  const order = ["short", "moderate", "long", "very_long"];
  let previous = order.indexOf(waitCategory(0));
  const boundaries: number[] = [];
  for (let wait = 1; wait <= 300; wait += 1) {
    const current = order.indexOf(waitCategory(wait));
    assert.ok(current >= previous, "categories never step backwards");
    if (current !== previous) boundaries.push(wait);
    previous = current;
  }
  assert.deepEqual(boundaries, [21, 46, 76]);
});

test("displayWait formats closed, walk-on and posted waits", () => {
  assert.equal(displayWait({ isOpen: false, waitTime: 30 }), "Closed");
  assert.equal(displayWait({ isOpen: true, waitTime: 0 }), "Walk On");
  assert.equal(displayWait({ isOpen: true, waitTime: 35 }), "35 min");
});

test("openRides drops closed and walk-on rides", () => {
  const park: Park = {
    id: 6,
    name: "Magic Kingdom",
    slug: "magic-kingdom",
    lastUpdated: null,
    rides: [
      makeRide({ id: 1, name: "Space Mountain", waitTime: 45 }),
      makeRide({ id: 2, name: "Jungle Cruise", waitTime: 0 }),
      makeRide({ id: 3, name: "Tomorrowland Speedway", waitTime: 15, isOpen: false }),
    ],
  };
  assert.deepEqual(
    openRides(park).map((ride) => ride.name),
    ["Space Mountain"],
  );
});
