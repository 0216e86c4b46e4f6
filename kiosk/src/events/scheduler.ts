import fs from "node:fs";
import { findParkByKey, isParkKey } from "../models/parks";
import { toErrorMessage } from "../utils/errors";
import { isRecord, readBoolean, readNumber } from "../utils/json";
import { logger } from "../utils/logger";

export type EventKind = "fireworks" | "parade";

export interface ScheduledEvent {
  readonly kind: EventKind;
  readonly parkName: string;
  readonly parkSlug: string;
  /** Start as milliseconds after local midnight. */
  readonly startMs: number;
  readonly durationSeconds: number;
}

export interface UpcomingEvent {
  event: ScheduledEvent;
  secondsUntilStart: number;
}

export const TEST_EVENT_KINDS = ["fireworks", "fireworks-epcot", "parade"] as const;
export type TestEventKind = (typeof TEST_EVENT_KINDS)[number];

export const isTestEventKind = (value: string): value is TestEventKind =>
  TEST_EVENT_KINDS.some((kind) => kind === value);

const SECTIONS: ReadonlyArray<{ section: string; kind: EventKind; defaultDurationSeconds: number }> = [
  { section: "fireworks", kind: "fireworks", defaultDurationSeconds: 240 },
  { section: "parades", kind: "parade", defaultDurationSeconds: 120 },
];

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

const startOfDay = (date: Date) => {
  const midnight = new Date(date);
  midnight.setHours(0, 0, 0, 0);
  return midnight;
};

/** "21:00" -> ms after midnight, or null for anything but a valid 24-hour H:MM. */
export const parseTimeOfDay = (value: string): number | null => {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return (hour * 60 + minute) * 60_000;
};

export const formatTimeOfDay = (startMs: number) => {
  const totalMinutes = Math.floor(startMs / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}`;
};

/**
 * Turns the events JSON into a flat event list in document order. Disabled
 * sections, unknown parks and malformed times are skipped with a warning.
 */
export const parseEventSchedule = (eventsConfig: unknown): ScheduledEvent[] => {
  if (!isRecord(eventsConfig)) {
    logger.warn("Events config is not an object; no events scheduled");
    return [];
  }

  const events: ScheduledEvent[] = [];
  for (const { section, kind, defaultDurationSeconds } of SECTIONS) {
    const sectionConfig = eventsConfig[section];
    if (sectionConfig === undefined) continue;
    if (!isRecord(sectionConfig)) {
      logger.warn("Ignoring malformed events section", { section });
      continue;
    }
    if (!readBoolean(sectionConfig, "enabled")) continue;

    const rawDuration = readNumber(sectionConfig, "duration_seconds") ?? readNumber(sectionConfig, "duration");
    const durationSeconds = rawDuration !== null && rawDuration > 0 ? rawDuration : defaultDurationSeconds;
    const schedule = sectionConfig.schedule;
    if (!isRecord(schedule)) {
      logger.warn("Events section has no schedule", { section });
      continue;
    }

    for (const [parkKey, times] of Object.entries(schedule)) {
      const park = isParkKey(parkKey) ? findParkByKey(parkKey) : undefined;
      if (!park) {
        logger.warn("Unknown park in events schedule", { section, park: parkKey });
        continue;
      }
      if (!Array.isArray(times)) {
        logger.warn("Schedule times must be a list", { section, park: parkKey });
        continue;
      }
      for (const time of times) {
        const startMs = typeof time === "string" ? parseTimeOfDay(time) : null;
        if (startMs === null) {
          logger.warn("Invalid event time", { section, park: parkKey, time: String(time) });
          continue;
        }
        events.push({ kind, parkName: park.name, parkSlug: park.slug, startMs, durationSeconds });
        logger.info("Scheduled event", { kind, park: park.name, time: String(time), durationSeconds });
      }
    }
  }
  return events;
};

export const loadEventsConfig = (filePath: string): unknown => {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    logger.warn("Events config unavailable; no events scheduled", {
      path: filePath,
      message: toErrorMessage(error),
    });
    return {};
  }
};

/** Start of the event on `now`'s calendar date, in epoch ms. */
export const eventStartOn = (event: ScheduledEvent, now: Date) => startOfDay(now).getTime() + event.startMs;

export const isActiveAt = (event: ScheduledEvent, now: Date) => {
  const start = eventStartOn(event, now);
  const current = now.getTime();
  return start <= current && current < start + event.durationSeconds * 1000;
};

export const timeRemaining = (event: ScheduledEvent, now: Date) => {
  if (!isActiveAt(event, now)) return 0;
  const end = eventStartOn(event, now) + event.durationSeconds * 1000;
  return Math.floor((end - now.getTime()) / 1000);
};

export class EventScheduler {
  readonly events: readonly ScheduledEvent[];

  private constructor(events: readonly ScheduledEvent[]) {
    this.events = [...events];
  }

  static fromConfig(eventsConfig: unknown): EventScheduler {
    return new EventScheduler(parseEventSchedule(eventsConfig));
  }

  static fromFile(filePath: string): EventScheduler {
    return EventScheduler.fromConfig(loadEventsConfig(filePath));
  }

  /** Replaces the configured schedule, e.g. with a single test event. */
  static withEvents(events: readonly ScheduledEvent[]): EventScheduler {
    return new EventScheduler(events);
  }

  /** First event in schedule order whose window contains `now`. */
  activeEvent(now: Date = new Date()): ScheduledEvent | null {
    return this.events.find((event) => isActiveAt(event, now)) ?? null;
  }

  nextEvent(now: Date = new Date()): UpcomingEvent | null {
    let next: UpcomingEvent | null = null;
    let bestMs = Number.POSITIVE_INFINITY;
    const current = now.getTime();

    for (const event of this.events) {
      let start = eventStartOn(event, now);
      if (start <= current) {
        const tomorrow = startOfDay(now);
        tomorrow.setDate(tomorrow.getDate() + 1);
        start = tomorrow.getTime() + event.startMs;
      }
      const untilMs = start - current;
      if (untilMs < bestMs) {
        bestMs = untilMs;
        next = { event, secondsUntilStart: Math.floor(untilMs / 1000) };
      }
    }
    return next;
  }
}

/**
 * A single event that started one second before `now`. Just after midnight
 * the offset is negative, which keeps the window anchored to the right
 * instant for the rest of that day.
 */
export const createTestEvent = (kind: TestEventKind, now: Date = new Date()): ScheduledEvent => {
  const startMs = now.getTime() - startOfDay(now).getTime() - 1000;
  switch (kind) {
    case "fireworks":
      return { kind: "fireworks", parkName: "Magic Kingdom", parkSlug: "magic-kingdom", startMs, durationSeconds: 240 };
    case "fireworks-epcot":
      return { kind: "fireworks", parkName: "EPCOT", parkSlug: "epcot", startMs, durationSeconds: 240 };
    case "parade":
      return { kind: "parade", parkName: "Magic Kingdom", parkSlug: "magic-kingdom", startMs, durationSeconds: 120 };
  }
};
