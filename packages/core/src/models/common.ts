export type IsoTimestamp = string;

export type ParkSlug = string;

export interface ParkboardErrorResponse {
  error: string;
  message?: string;
}
