import { performance } from "node:perf_hooks";
import { toErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { Frame, FrameComposer } from "./frame";
import type { RotationController } from "./rotation";

/** Seconds between successive tick() calls, measured with a monotonic clock. */
export class FrameClock {
  private last: number | null = null;
  private readonly now: () => number;

  constructor(now: () => number = () => performance.now()) {
    this.now = now;
  }

  tick(): number {
    const current = this.now();
    const dt = this.last === null ? 0 : (current - this.last) / 1000;
    this.last = current;
    return dt;
  }
}

export interface RenderLoopOptions {
  fps: number;
  rotation: RotationController;
  composer: FrameComposer;
  onFrame: (frame: Frame) => void;
  clock?: FrameClock;
}

export interface RenderLoop {
  start: () => void;
  stop: () => void;
  readonly running: boolean;
  /** Runs one iteration synchronously. */
  step: () => void;
}

export const createRenderLoop = (options: RenderLoopOptions): RenderLoop => {
  const clock = options.clock ?? new FrameClock();
  const frameMs = 1000 / options.fps;
  let timer: NodeJS.Timeout | undefined;
  let running = false;

  const step = () => {
    try {
      options.rotation.tick(clock.tick());
      options.onFrame(options.composer.compose());
    } catch (error) {
      logger.error("Error in display loop", { message: toErrorMessage(error) });
    }
  };

  const scheduleNext = (delayMs: number) => {
    timer = setTimeout(() => {
      const started = performance.now();
      step();
      if (running) scheduleNext(frameMs - (performance.now() - started));
    }, Math.max(0, delayMs));
  };

  return {
    start: () => {
      if (running) return;
      running = true;
      logger.info("Starting display loop", { fps: options.fps });
      clock.tick();
      scheduleNext(frameMs);
    },
    stop: () => {
      if (!running) return;
      running = false;
      if (timer) clearTimeout(timer);
      timer = undefined;
      logger.info("Display loop ended");
    },
    get running() {
      return running;
    },
    step,
  };
};
