import { openRides, type ClosedPark, type Park, type Ride } from "@parkboard/core";
import { DEFAULT_OPENS_AT, findParkBySlug } from "./parks";

export const STALE_AFTER_SECONDS = 900;

export interface WaitTimesData {
  /** Keyed by park slug, in registry order. */
  parks: Map<string, Park>;
  lastFetch: Date | null;
  fetchSuccess: boolean;
  errorMessage: string | null;
}

export type DisplayItem = { kind: "ride"; ride: Ride } | { kind: "closed_park"; park: ClosedPark };

export const emptyWaitTimes = (): WaitTimesData => ({
  parks: new Map(),
  lastFetch: null,
  fetchSuccess: false,
  errorMessage: null,
});

export const allOpenRides = (data: WaitTimesData): Ride[] => {
  const rides = Array.from(data.parks.values()).flatMap((park) => openRides(park));
  return rides.sort((a, b) => {
    if (a.parkName !== b.parkName) return a.parkName < b.parkName ? -1 : 1;
    return b.waitTime - a.waitTime;
  });
};

export const closedParks = (data: WaitTimesData): ClosedPark[] =>
  Array.from(data.parks.values())
    .filter((park) => openRides(park).length === 0)
    .map((park) => ({
      name: park.name,
      slug: park.slug,
      opensAt: findParkBySlug(park.slug)?.opensAt ?? DEFAULT_OPENS_AT,
    }));

export const buildDisplayQueue = (data: WaitTimesData): DisplayItem[] => [
  ...allOpenRides(data).map((ride): DisplayItem => ({ kind: "ride", ride })),
  ...closedParks(data).map((park): DisplayItem => ({ kind: "closed_park", park })),
];

export const isStale = (data: WaitTimesData, now: Date = new Date()): boolean => {
  if (!data.lastFetch) return true;
  return (now.getTime() - data.lastFetch.getTime()) / 1000 > STALE_AFTER_SECONDS;
};

/**
 * The retained snapshot as the display should see it after a failed refresh:
 * same parks and fetch time, flagged with the attempt's error. The retained
 * object itself is left untouched.
 */
export const withFailedAttempt = (retained: WaitTimesData, attempt: WaitTimesData): WaitTimesData => ({
  ...retained,
  fetchSuccess: false,
  errorMessage: attempt.errorMessage ?? "Failed to fetch wait times",
});

export const displayItemTitle = (item: DisplayItem): string => {
  switch (item.kind) {
    case "ride":
      return item.ride.name;
    case "closed_park":
      return item.park.name;
  }
};
