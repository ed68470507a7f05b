import type { DirectionId, IsoTimestamp, TimeSource } from "./common";

export interface TimelineStop {
  stopId: string;
  stopName: string;
  sequence: number;
  etaSeconds: number | null;
  etaDisplay: string;
  timeSource: TimeSource;
  isDeparture: boolean;
  isDestination: boolean;
  isHub: boolean;
  /** Resolved instant behind `etaSeconds`, null when the time is unknown. */
  expectedTime: IsoTimestamp | null;
  /** Raw GTFS clock time from the stop pattern, e.g. "25:10:00". */
  scheduledTime: string | null;
  tripId: string | null;
}

export type TimelineIssueStage = "routes" | "predictions" | "trip_updates" | "normalize";

export interface TimelineIssue {
  stage: TimelineIssueStage;
  stopId?: string;
  message: string;
}

export interface RouteTimeline {
  routeId: string;
  directionId: DirectionId;
  routeShortName: string | null;
  serviceDate: string;
  generatedAt: IsoTimestamp;
  stops: TimelineStop[];
  departureStop: TimelineStop | null;
  destinationStop: TimelineStop | null;
  hubStops: TimelineStop[];
  realtimeStopCount: number;
  summary: string;
  preview: string;
  enrichmentIssues: TimelineIssue[];
}

export interface RouteSensorState {
  routeId: string;
  directionId: DirectionId;
  available: boolean;
  timeline: RouteTimeline | null;
  nextEtaSeconds: number | null;
  nextEtaDisplay: string | null;
  nextDepartureTime: string | null;
  nextDepartureDisplay: string | null;
  timeSource: TimeSource | null;
  destinationStopName: string | null;
  hubStopNames: string[];
  summary: string | null;
  preview: string | null;
  lastUpdated: IsoTimestamp | null;
  lastError: string | null;
}
