import type { ParkSlug } from "./common";

export type WaitCategory = "short" | "moderate" | "long" | "very_long";

export interface Ride {
  id: number;
  name: string;
  /** Posted wait in minutes, never negative. */
  waitTime: number;
  isOpen: boolean;
  parkId: number;
  parkName: string;
  parkSlug: ParkSlug;
  lastUpdated: Date;
}

export interface Park {
  id: number;
  name: string;
  slug: ParkSlug;
  rides: Ride[];
  lastUpdated: Date | null;
}

/** Placeholder card for a park that reports no open rides. Never persisted. */
export interface ClosedPark {
  name: string;
  slug: ParkSlug;
  opensAt: string;
}

export const WAIT_CATEGORY_LIMITS = {
  short: 20,
  moderate: 45,
  long: 75,
} as const;

export const waitCategory = (waitTime: number): WaitCategory => {
  if (waitTime <= WAIT_CATEGORY_LIMITS.short) return "short";
  if (waitTime <= WAIT_CATEGORY_LIMITS.moderate) return "moderate";
  if (waitTime <= WAIT_CATEGORY_LIMITS.long) return "long";
  return "very_long";
};

export const displayWait = (ride: Pick<Ride, "isOpen" | "waitTime">): string => {
  if (!ride.isOpen) return "Closed";
  if (ride.waitTime === 0) return "Walk On";
  return `${ride.waitTime} min`;
};

// Walk-on rides still count as open but are not worth a card.
export const openRides = (park: Park): Ride[] => park.rides.filter((ride) => ride.isOpen && ride.waitTime > 0);
