export type IsoTimestamp = string;

export type DirectionId = 0 | 1;

export type TimeSource = "realtime" | "trip_update" | "scheduled" | "unknown";

export interface RouteTimelineErrorResponse {
  error: string;
  message?: string;
}
