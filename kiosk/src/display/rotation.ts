import type { DisplayPhase, DisplayStateResponse } from "@parkboard/core";
import type { TransitionType } from "../config";
import type { AnimationDriver, EventAnimations } from "../events/drivers";
import { timeRemaining, type EventScheduler, type ScheduledEvent } from "../events/scheduler";
import { buildDisplayQueue, displayItemTitle, type DisplayItem, type WaitTimesData } from "../models/waitTimes";
import type { ImageLibrary } from "../themes/images";
import type { WeatherSnapshot } from "../weather/client";
import { logger } from "../utils/logger";
import type { CardOverlay, CardRenderer } from "./cardRenderer";
import { evaluateFreshness } from "./freshness";
import type { Surface } from "./scene";

/** Everything the display needs from one fetch, swapped in as a single reference. */
export interface DisplaySnapshot {
  readonly queue: readonly DisplayItem[];
  readonly lastFetch: Date | null;
  readonly errorMessage: string | null;
}

export type RenderItem =
  | { kind: "card"; item: DisplayItem; index: number; total: number }
  | { kind: "transition"; previous: Surface; next: Surface; alpha: number; transition: TransitionType }
  | { kind: "empty" }
  | { kind: "event"; event: ScheduledEvent; elapsedSeconds: number; driver: AnimationDriver };

interface TransitionState {
  progress: number;
  previous: Surface;
  next: Surface;
}

interface ActiveEvent {
  event: ScheduledEvent;
  startedAt: number;
  elapsedSeconds: number;
}

export interface RotationOptions {
  scheduler: EventScheduler;
  animations: EventAnimations;
  cards: CardRenderer;
  images: ImageLibrary;
  displayDurationSeconds: number;
  transitionDurationSeconds: number;
  transitionType: TransitionType;
  clock?: () => Date;
}

const EMPTY_SNAPSHOT: DisplaySnapshot = Object.freeze({ queue: Object.freeze([]), lastFetch: null, errorMessage: null });

export const toDisplaySnapshot = (data: WaitTimesData): DisplaySnapshot =>
  Object.freeze({
    queue: Object.freeze(buildDisplayQueue(data)),
    lastFetch: data.lastFetch,
    errorMessage: data.fetchSuccess ? null : data.errorMessage,
  });

/**
 * Decides what is on screen. Owned by the render loop: refresh jobs only hand
 * it new snapshots and weather; everything else changes inside tick().
 */
export class RotationController {
  private scheduler: EventScheduler;
  private readonly animations: EventAnimations;
  private readonly cards: CardRenderer;
  private readonly images: ImageLibrary;
  private readonly displayDuration: number;
  private readonly transitionDuration: number;
  private readonly transitionType: TransitionType;
  private readonly clock: () => Date;

  private snapshot: DisplaySnapshot = EMPTY_SNAPSHOT;
  private weather: WeatherSnapshot | null = null;
  private currentIndex = 0;
  private dwell = 0;
  private transition: TransitionState | null = null;
  private active: ActiveEvent | null = null;

  constructor(options: RotationOptions) {
    this.scheduler = options.scheduler;
    this.animations = options.animations;
    this.cards = options.cards;
    this.images = options.images;
    this.displayDuration = options.displayDurationSeconds;
    this.transitionDuration = options.transitionDurationSeconds;
    this.transitionType = options.transitionType;
    this.clock = options.clock ?? (() => new Date());
  }

  get index() {
    return this.currentIndex;
  }

  get queueLength() {
    return this.snapshot.queue.length;
  }

  get dwellSeconds() {
    return this.dwell;
  }

  get transitionProgress() {
    return this.transition?.progress ?? null;
  }

  get phase(): DisplayPhase {
    if (this.active) return "event_active";
    if (this.snapshot.queue.length === 0) return "empty";
    if (this.transition) return "transitioning";
    return "normal_rotation";
  }

  get currentSnapshot() {
    return this.snapshot;
  }

  setDisplaySnapshot(data: WaitTimesData) {
    const next = toDisplaySnapshot(data);
    this.snapshot = next;
    if (this.currentIndex >= next.queue.length) this.currentIndex = 0;
    logger.info("Display updated", {
      rides: next.queue.filter((item) => item.kind === "ride").length,
      closedParks: next.queue.filter((item) => item.kind === "closed_park").length,
    });
  }

  setScheduler(scheduler: EventScheduler) {
    this.scheduler = scheduler;
  }

  setWeather(weather: WeatherSnapshot | null) {
    this.weather = weather;
  }

  overlay(now: Date = this.clock()): CardOverlay {
    return { freshness: evaluateFreshness(this.snapshot, now), weather: this.weather };
  }

  tick(dt: number) {
    if (!(dt > 0)) return;
    const now = this.clock();
    const event = this.scheduler.activeEvent(now);

    if (event) {
      if (!this.active || this.active.event !== event) {
        this.active = { event, startedAt: now.getTime(), elapsedSeconds: 0 };
        this.animations.resetKind(event.kind);
        logger.info("Event started", { kind: event.kind, park: event.parkName });
      }
      this.active.elapsedSeconds = (now.getTime() - this.active.startedAt) / 1000;
      this.animations.resolve(event).update(dt, this.active.elapsedSeconds);
      return;
    }

    if (this.active) {
      logger.info("Event ended", { kind: this.active.event.kind, park: this.active.event.parkName });
      this.active = null;
    }

    if (this.snapshot.queue.length === 0) return;

    if (this.transition) {
      this.transition.progress += dt / this.transitionDuration;
      if (this.transition.progress >= 1) this.transition = null;
      return;
    }

    this.dwell += dt;
    if (this.dwell >= this.displayDuration) {
      this.dwell = 0;
      this.startTransition();
    }
  }

  /** Manual skip to the next card. Ignored while an event is showing. */
  advance() {
    if (this.active) return;
    this.dwell = 0;
    this.startTransition();
  }

  private renderCard(index: number): Surface {
    const item = this.snapshot.queue[index];
    const overlay = this.overlay();
    if (!item) return this.cards.renderSafely(() => this.cards.renderNoData(overlay));
    return this.cards.renderSafely(() => this.cards.renderItem(item, overlay));
  }

  private startTransition() {
    const total = this.snapshot.queue.length;
    if (total <= 1) return;

    const previous = this.renderCard(this.currentIndex);
    this.currentIndex = (this.currentIndex + 1) % total;
    if (this.currentIndex === 0) this.images.advanceAllCycles();
    const next = this.renderCard(this.currentIndex);
    this.transition = { progress: 0, previous, next };
  }

  currentRenderItem(): RenderItem {
    if (this.active) {
      return {
        kind: "event",
        event: this.active.event,
        elapsedSeconds: this.active.elapsedSeconds,
        driver: this.animations.resolve(this.active.event),
      };
    }
    const total = this.snapshot.queue.length;
    const item = this.snapshot.queue[this.currentIndex];
    if (total === 0 || !item) return { kind: "empty" };
    if (this.transition) {
      return {
        kind: "transition",
        previous: this.transition.previous,
        next: this.transition.next,
        alpha: Math.min(1, this.transition.progress),
        transition: this.transitionType,
      };
    }
    return { kind: "card", item, index: this.currentIndex, total };
  }

  describe(now: Date = this.clock()): DisplayStateResponse {
    const freshness = evaluateFreshness(this.snapshot, now);
    const upcoming = this.scheduler.nextEvent(now);
    const item = this.snapshot.queue[this.currentIndex];
    return {
      phase: this.phase,
      index: this.currentIndex,
      queueLength: this.snapshot.queue.length,
      currentTitle: item ? displayItemTitle(item) : null,
      activeEvent: this.active
        ? {
            kind: this.active.event.kind,
            parkName: this.active.event.parkName,
            elapsedSeconds: Math.floor(this.active.elapsedSeconds),
            secondsRemaining: timeRemaining(this.active.event, now),
          }
        : null,
      nextEvent: upcoming
        ? {
            kind: upcoming.event.kind,
            parkName: upcoming.event.parkName,
            secondsUntilStart: upcoming.secondsUntilStart,
          }
        : null,
      dataAgeMinutes: freshness.ageMinutes,
      isStale: freshness.isStale,
      badge: freshness.badge,
      generatedAt: now.toISOString(),
    };
  }
}
