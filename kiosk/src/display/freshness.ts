import type { FreshnessBadge } from "@parkboard/core";
import { STALE_AFTER_SECONDS } from "../models/waitTimes";

export const BADGE_AFTER_MINUTES = 10;
export const ERROR_GLYPH = "!";

export interface FreshnessInput {
  lastFetch: Date | null;
  errorMessage: string | null;
}

export interface Freshness {
  ageMinutes: number | null;
  isStale: boolean;
  badge: FreshnessBadge | null;
}

export const evaluateFreshness = (input: FreshnessInput, now: Date = new Date()): Freshness => {
  if (!input.lastFetch) {
    return {
      ageMinutes: null,
      isStale: true,
      badge: input.errorMessage ? { tone: "error", label: ERROR_GLYPH } : null,
    };
  }

  const ageSeconds = (now.getTime() - input.lastFetch.getTime()) / 1000;
  const ageMinutes = Math.floor(ageSeconds / 60);
  const showBadge = ageMinutes > BADGE_AFTER_MINUTES || input.errorMessage !== null;

  return {
    ageMinutes,
    isStale: ageSeconds > STALE_AFTER_SECONDS,
    badge: showBadge
      ? {
          tone: input.errorMessage ? "error" : "warning",
          label: ageMinutes > 0 ? `${ageMinutes}m` : ERROR_GLYPH,
        }
      : null,
  };
};
