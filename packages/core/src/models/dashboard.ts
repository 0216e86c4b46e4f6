import type { IsoTimestamp } from "./common";

export interface CurrentWaitRecord {
  rideName: string;
  parkName: string;
  waitTime: number;
  isOpen: boolean;
  timestamp: IsoTimestamp;
}

export interface CurrentWaitsResponse {
  timestamp: IsoTimestamp;
  waits: CurrentWaitRecord[];
}

export interface RideHistoryPoint {
  timestamp: IsoTimestamp;
  waitTime: number;
}

export interface RideHistoryResponse {
  rideName: string;
  hours: number;
  history: RideHistoryPoint[];
}

export interface ParkHistoryPoint {
  timestamp: IsoTimestamp;
  avgWait: number;
  rideCount: number;
}

export interface ParkHistoryResponse {
  parkName: string;
  hours: number;
  history: ParkHistoryPoint[];
}

export interface RideStats {
  minWait: number;
  maxWait: number;
  avgWait: number;
  dataPoints: number;
}

export interface RideStatsResponse {
  rideName: string;
  days: number;
  stats: RideStats;
}

export interface RidesResponse {
  rides: string[];
}

export interface ParksResponse {
  parks: string[];
}

export interface DatabaseStats {
  waitRecords: number;
  weatherRecords: number;
  oldestRecord: IsoTimestamp | null;
  newestRecord: IsoTimestamp | null;
  dbPath: string;
  retentionDays: number;
}

export type DisplayPhase = "normal_rotation" | "transitioning" | "event_active" | "empty";

export type BadgeTone = "warning" | "error";

export interface FreshnessBadge {
  tone: BadgeTone;
  label: string;
}

export interface DisplayStateResponse {
  phase: DisplayPhase;
  index: number;
  queueLength: number;
  currentTitle: string | null;
  activeEvent: { kind: string; parkName: string; elapsedSeconds: number; secondsRemaining: number } | null;
  nextEvent: { kind: string; parkName: string; secondsUntilStart: number } | null;
  dataAgeMinutes: number | null;
  isStale: boolean;
  badge: FreshnessBadge | null;
  generatedAt: IsoTimestamp;
}
