import type { FetchLike, RequestInitWithSignal } from "./types";
import type {
  CurrentWaitsResponse,
  DatabaseStats,
  DisplayStateResponse,
  ParkHistoryResponse,
  ParksResponse,
  RideHistoryResponse,
  RidesResponse,
  RideStatsResponse,
} from "../models/dashboard";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, string | number | undefined>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined || value === null) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new Error(`Parkboard API request failed (${response.status})`);
  }
  return (await response.json()) as T;
};

export interface DashboardClientOptions {
  baseUrl: string;
  fetchImpl?: FetchLike;
}

export interface DashboardClient {
  fetchCurrentWaits: (init?: RequestInitWithSignal) => Promise<CurrentWaitsResponse>;
  fetchRideHistory: (rideName: string, hours?: number, init?: RequestInitWithSignal) => Promise<RideHistoryResponse>;
  fetchParkHistory: (parkName: string, hours?: number, init?: RequestInitWithSignal) => Promise<ParkHistoryResponse>;
  fetchRideStats: (rideName: string, days?: number, init?: RequestInitWithSignal) => Promise<RideStatsResponse>;
  fetchRides: (init?: RequestInitWithSignal) => Promise<RidesResponse>;
  fetchParks: (init?: RequestInitWithSignal) => Promise<ParksResponse>;
  fetchDatabaseStats: (init?: RequestInitWithSignal) => Promise<DatabaseStats>;
  fetchDisplayState: (init?: RequestInitWithSignal) => Promise<DisplayStateResponse>;
}

export const createDashboardClient = ({ baseUrl, fetchImpl }: DashboardClientOptions): DashboardClient => {
  const doFetch: FetchLike = fetchImpl ?? ((input, init) => fetch(input, init));

  const getJson = async <T>(
    path: string,
    query?: Record<string, string | number | undefined>,
    init?: RequestInitWithSignal,
  ): Promise<T> => {
    const response = await doFetch(buildUrl(baseUrl, path, query), { ...init });
    return handleJson<T>(response);
  };

  return {
    fetchCurrentWaits: (init) => getJson<CurrentWaitsResponse>("/api/waits", undefined, init),
    fetchRideHistory: (rideName, hours, init) =>
      getJson<RideHistoryResponse>(`/api/history/${encodeURIComponent(rideName)}`, { hours }, init),
    fetchParkHistory: (parkName, hours, init) =>
      getJson<ParkHistoryResponse>(`/api/park/${encodeURIComponent(parkName)}`, { hours }, init),
    fetchRideStats: (rideName, days, init) =>
      getJson<RideStatsResponse>(`/api/stats/${encodeURIComponent(rideName)}`, { days }, init),
    fetchRides: (init) => getJson<RidesResponse>("/api/rides", undefined, init),
    fetchParks: (init) => getJson<ParksResponse>("/api/parks", undefined, init),
    fetchDatabaseStats: (init) => getJson<DatabaseStats>("/api/db-stats", undefined, init),
    fetchDisplayState: (init) => getJson<DisplayStateResponse>("/api/display/state", undefined, init),
  };
};
