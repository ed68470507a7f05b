import type { DirectionId } from "@route-timeline/core";

export type StopId = string;
export type RouteId = string;
export type TripId = string;

export interface CatalogRoute {
  routeId: RouteId;
  shortName: string | null;
  longName: string | null;
  description: string | null;
  routeType: number | null;
}

export interface CatalogStop {
  stopId: StopId;
  name: string;
  lat: number | null;
  lon: number | null;
}

export interface CatalogTrip {
  tripId: TripId;
  routeId: RouteId;
  directionId: DirectionId;
  headsign: string | null;
}

export interface StopTime {
  tripId: TripId;
  stopId: StopId;
  sequence: number;
  arrivalTime: string | null;
  departureTime: string | null;
}

export interface StopPatternEntry {
  stopId: StopId;
  sequence: number;
  stopName: string;
  scheduledTime: string | null;
}

/** Raw time values stay unparsed until the time normalizer sees them. */
export type RawTime = string | number;

export interface Prediction {
  stopId: StopId;
  routeId: RouteId | null;
  routeShortName: string | null;
  directionId: DirectionId;
  expectedTime: RawTime;
  tripId: TripId | null;
}

export interface TripUpdateRecord {
  stopId: StopId;
  routeId: RouteId | null;
  routeShortName: string | null;
  directionId: DirectionId | null;
  expectedTime: RawTime;
  tripId: TripId | null;
  delaySeconds: number | null;
}

export interface RouteTarget {
  routeId: RouteId;
  routeShortName: string | null;
  directionId: DirectionId;
}
