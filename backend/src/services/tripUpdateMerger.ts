import type {
  CatalogTrip,
  Prediction,
  RouteTarget,
  StopId,
  StopPatternEntry,
  TripId,
  TripUpdateRecord,
} from "../models/domain";
import { logger } from "../utils/logger";
import { matchRoute, type RouteMatchKind, type RouteTaggedRecord } from "./routeMatcher";

export type MergedStopTimes =
  | { source: "realtime"; records: Prediction[]; tripUpdates: TripUpdateRecord[] }
  | { source: "trip_update"; records: TripUpdateRecord[] };

export const buildTripIndex = (trips: CatalogTrip[]): Map<TripId, CatalogTrip> =>
  new Map(trips.map((trip) => [trip.tripId, trip]));

/**
 * Groups trip-update records by stop. Feeds often omit the route and direction
 * on the trip descriptor; those are filled in from the trips catalog.
 */
export const indexTripUpdates = (
  records: TripUpdateRecord[],
  tripIndex: Map<TripId, CatalogTrip> = new Map(),
): Map<StopId, TripUpdateRecord[]> => {
  const byStop = new Map<StopId, TripUpdateRecord[]>();
  records.forEach((record) => {
    const trip = record.tripId ? tripIndex.get(record.tripId) : undefined;
    const enriched: TripUpdateRecord = trip
      ? {
          ...record,
          routeId: record.routeId ?? trip.routeId,
          directionId: record.directionId ?? trip.directionId,
        }
      : record;
    const list = byStop.get(enriched.stopId) ?? [];
    list.push(enriched);
    byStop.set(enriched.stopId, list);
  });
  return byStop;
};

const filterMatching = <T extends RouteTaggedRecord>(
  records: T[] | undefined,
  target: RouteTarget,
  partialMatches: Map<RouteMatchKind, number>,
): T[] => {
  if (!records) return [];
  return records.filter((record) => {
    const kind = matchRoute(record, target);
    if (kind === "route_id" || kind === "short_name") {
      partialMatches.set(kind, (partialMatches.get(kind) ?? 0) + 1);
    }
    return kind !== null;
  });
};

/**
 * Assigns each pattern stop its best real-time source. Stops with a matching
 * prediction are tagged realtime and carry their matching trip updates along,
 * for when none of the predictions turns out usable. Stops with neither are
 * left out so the caller falls back to the schedule.
 */
export const fillGaps = (
  predictionsByStop: Map<StopId, Prediction[]>,
  tripUpdatesByStop: Map<StopId, TripUpdateRecord[]>,
  stopPattern: StopPatternEntry[],
  target: RouteTarget,
): Map<StopId, MergedStopTimes> => {
  const merged = new Map<StopId, MergedStopTimes>();
  const partialMatches = new Map<RouteMatchKind, number>();

  stopPattern.forEach((entry) => {
    if (merged.has(entry.stopId)) return;
    const predictions = filterMatching(predictionsByStop.get(entry.stopId), target, partialMatches);
    const tripUpdates = filterMatching(tripUpdatesByStop.get(entry.stopId), target, partialMatches);
    if (predictions.length > 0) {
      merged.set(entry.stopId, { source: "realtime", records: predictions, tripUpdates });
    } else if (tripUpdates.length > 0) {
      merged.set(entry.stopId, { source: "trip_update", records: tripUpdates });
    }
  });

  if (partialMatches.size > 0) {
    logger.debug("Records matched on a single route identifier", {
      routeId: target.routeId,
      routeShortName: target.routeShortName,
      routeIdOnly: partialMatches.get("route_id") ?? 0,
      shortNameOnly: partialMatches.get("short_name") ?? 0,
    });
  }

  return merged;
};
