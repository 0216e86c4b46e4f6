import type { DrawTarget } from "../display/scene";
import { logger } from "../utils/logger";
import { FireworksDriver } from "./fireworks";
import { ParadeDriver } from "./parade";
import type { RandomSource } from "./random";
import type { EventKind, ScheduledEvent } from "./scheduler";
import { ImageSequenceSource, VideoDriver, type VideoSource } from "./video";

export interface AnimationDriver {
  reset(): void;
  /** `elapsed` is seconds since the event started. */
  update(dt: number, elapsed: number): void;
  render(target: DrawTarget): void;
}

/** Park slug and event kind a clip is played for. */
export const videoKey = (parkSlug: string, kind: EventKind) => `${parkSlug}:${kind}`;

export const DEFAULT_EVENT_VIDEOS: Readonly<Record<string, string>> = {
  [videoKey("magic-kingdom", "fireworks")]: "mk_fireworks",
  [videoKey("epcot", "fireworks")]: "epcot_fireworks",
  [videoKey("magic-kingdom", "parade")]: "mk_parade",
};

interface VideoEntry {
  kind: EventKind;
  driver: VideoDriver;
}

/**
 * One procedural driver per event kind plus optional clips per park and
 * kind. A clip that is currently available wins over the procedural driver.
 */
export class EventAnimations {
  private readonly procedural: Record<EventKind, AnimationDriver>;
  private readonly videos = new Map<string, VideoEntry>();

  constructor(procedural: Record<EventKind, AnimationDriver>) {
    this.procedural = procedural;
  }

  addVideo(parkSlug: string, kind: EventKind, source: VideoSource, width: number, height: number) {
    this.videos.set(videoKey(parkSlug, kind), { kind, driver: new VideoDriver(source, width, height) });
  }

  resolve(event: ScheduledEvent): AnimationDriver {
    const video = this.videos.get(videoKey(event.parkSlug, event.kind));
    if (video && video.driver.source.isAvailable()) return video.driver;
    return this.procedural[event.kind];
  }

  resetKind(kind: EventKind) {
    this.procedural[kind].reset();
    for (const entry of this.videos.values()) {
      if (entry.kind === kind) entry.driver.reset();
    }
  }
}

export interface EventAnimationOptions {
  width: number;
  height: number;
  assetsDir: string;
  random?: RandomSource;
  videos?: Readonly<Record<string, string>>;
}

export const createEventAnimations = (options: EventAnimationOptions): EventAnimations => {
  const random = options.random ?? Math.random;
  const animations = new EventAnimations({
    fireworks: new FireworksDriver(options.width, options.height, random),
    parade: new ParadeDriver(options.width, options.height, random),
  });

  for (const [key, name] of Object.entries(options.videos ?? DEFAULT_EVENT_VIDEOS)) {
    const [parkSlug, kind] = key.split(":");
    if (!parkSlug || (kind !== "fireworks" && kind !== "parade")) {
      logger.warn("Ignoring malformed event video key", { key });
      continue;
    }
    const source = new ImageSequenceSource(options.assetsDir, name);
    animations.addVideo(parkSlug, kind, source, options.width, options.height);
    if (source.isAvailable()) logger.info("Found event video", { key, video: name });
  }
  return animations;
};
