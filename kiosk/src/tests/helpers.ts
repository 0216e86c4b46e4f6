import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Park, Ride } from "@parkboard/core";
import { bindSnapshotStore, type RedisManager } from "../cache/redisClient";
import type { AnimationDriver } from "../events/drivers";
import type { DrawTarget } from "../display/scene";
import { emptyWaitTimes, type WaitTimesData } from "../models/waitTimes";

export const makeRide = (overrides: Partial<Ride>): Ride => ({
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

export const makePark = (name: string, slug: string, rides: Ride[], lastUpdated: Date | null = null): Park => ({
  id: 0,
  name,
  slug,
  rides,
  lastUpdated,
});

/** A successful snapshot holding one Magic Kingdom park with the given rides. */
export const magicKingdomData = (rides: Ride[], fetchedAt: Date): WaitTimesData => {
  const data = emptyWaitTimes();
  data.parks.set("magic-kingdom", makePark("Magic Kingdom", "magic-kingdom", rides, fetchedAt));
  data.lastFetch = fetchedAt;
  data.fetchSuccess = true;
  return data;
};

export const makeTempDir = (prefix: string) => fs.mkdtempSync(path.join(os.tmpdir(), `parkboard-${prefix}-`));

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

export class RecordingDriver implements AnimationDriver {
  resets = 0;
  updates: Array<[dt: number, elapsed: number]> = [];
  renders = 0;

  reset() {
    this.resets += 1;
  }

  update(dt: number, elapsed: number) {
    this.updates.push([dt, elapsed]);
  }

  render(target: DrawTarget) {
    this.renders += 1;
    target.rect({ x: 0, y: 0, width: 1, height: 1, color: [255, 255, 255] });
  }
}

/** In-process stand-in for a connected Redis: values round-trip through JSON like the real client. */
/** A connected Redis stand-in; `ttls` records the PX each key was last written with. */
export const createMemoryRedis = (keyPrefix = "parkboard") => {
  const store = new Map<string, string>();
  const ttls = new Map<string, number>();
  const redis: RedisManager = {
    status: "ready",
    error: undefined,
    connect: async () => undefined,
    disconnect: async () => undefined,
    ...bindSnapshotStore(
      {
        get: async (key) => store.get(key) ?? null,
        set: async (key, value, options) => {
          store.set(key, value);
          ttls.set(key, options.PX);
        },
      },
      keyPrefix,
    ),
  };
  return { redis, store, ttls };
};
