import fs from "node:fs";
import path from "node:path";
import type { DrawTarget } from "../display/scene";
import { toErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { AnimationDriver } from "./drivers";

const FRAME_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);
export const DEFAULT_VIDEO_FRAME_RATE = 30;

/** A frame-sequential clip. Frames are referenced by URL path. */
export interface VideoSource {
  readonly name: string;
  readonly frameRate: number;
  isAvailable(): boolean;
  frameCount(): number;
  frame(index: number): string | null;
}

interface FrameListing {
  mtimeMs: number;
  frames: string[];
}

const directoryMtime = (directory: string): number | null => {
  try {
    const stats = fs.statSync(directory);
    return stats.isDirectory() ? stats.mtimeMs : null;
  } catch {
    return null;
  }
};

/**
 * A directory of numbered still frames under the assets directory, e.g.
 * `assets/videos/mk_fireworks/0001.jpg`. The listing is kept until the
 * directory's mtime changes; an empty listing is never kept.
 */
export class ImageSequenceSource implements VideoSource {
  readonly name: string;
  readonly frameRate: number;
  private readonly directory: string;
  private readonly urlPrefix: string;
  private listing: FrameListing | null = null;

  constructor(assetsDir: string, name: string, frameRate = DEFAULT_VIDEO_FRAME_RATE) {
    this.name = name;
    this.frameRate = frameRate > 0 ? frameRate : DEFAULT_VIDEO_FRAME_RATE;
    this.directory = path.join(assetsDir, "videos", name);
    this.urlPrefix = `/assets/videos/${encodeURIComponent(name)}`;
  }

  private refresh(): string[] {
    const mtimeMs = directoryMtime(this.directory);
    if (mtimeMs === null) {
      this.listing = null;
      return [];
    }
    if (this.listing && this.listing.mtimeMs === mtimeMs) return this.listing.frames;

    let frames: string[];
    try {
      frames = fs
        .readdirSync(this.directory)
        .filter((file) => FRAME_EXTENSIONS.has(path.extname(file).toLowerCase()))
        .sort();
    } catch (error) {
      logger.warn("Failed to read event video frames", { video: this.name, message: toErrorMessage(error) });
      this.listing = null;
      return [];
    }

    const previous = this.listing?.frames.length ?? 0;
    this.listing = frames.length > 0 ? { mtimeMs, frames } : null;
    if (frames.length !== previous) {
      logger.info("Loaded event video", { video: this.name, frames: frames.length, fps: this.frameRate });
    }
    return frames;
  }

  isAvailable() {
    return this.refresh().length > 0;
  }

  frameCount() {
    return this.listing?.frames.length ?? 0;
  }

  frame(index: number) {
    const file = this.listing?.frames[index];
    return file ? `${this.urlPrefix}/${encodeURIComponent(file)}` : null;
  }
}

/** Plays a VideoSource full screen, looping at the end of the clip. */
export class VideoDriver implements AnimationDriver {
  readonly source: VideoSource;
  private readonly width: number;
  private readonly height: number;
  private frameIndex = 0;
  private lastFrameTime = 0;

  constructor(source: VideoSource, width: number, height: number) {
    this.source = source;
    this.width = width;
    this.height = height;
  }

  get currentFrame() {
    return this.frameIndex;
  }

  reset() {
    this.frameIndex = 0;
    this.lastFrameTime = 0;
  }

  update(_dt: number, elapsed: number) {
    const count = this.source.frameCount();
    if (count === 0) return;
    if (elapsed - this.lastFrameTime >= 1 / this.source.frameRate) {
      this.frameIndex = (this.frameIndex + 1) % count;
      this.lastFrameTime = elapsed;
    }
  }

  render(target: DrawTarget) {
    const src = this.source.frame(this.frameIndex);
    if (!src) return;
    target.image({ x: 0, y: 0, width: this.width, height: this.height, src });
  }
}
