import type { DirectionId } from "@route-timeline/core";
import type { MetlinkSource } from "../metlink/client";
import { parseStopTimes } from "../metlink/parsers";
import type { CatalogStop, CatalogTrip, StopPatternEntry, StopTime } from "../models/domain";
import { toIdString } from "../utils/fields";
import { logger } from "../utils/logger";

export interface CatalogReader {
  getTrips(): Promise<CatalogTrip[]>;
  getStops(): Promise<CatalogStop[]>;
}

export class UnknownRouteDirectionError extends Error {
  constructor(routeId: string, directionId: DirectionId) {
    super(`No trips found for route ${routeId} direction ${directionId}`);
    this.name = "UnknownRouteDirectionError";
  }
}

export const selectRouteTrips = (trips: CatalogTrip[], routeId: string, directionId: DirectionId) => {
  const target = toIdString(routeId);
  return trips.filter((trip) => trip.routeId === target && trip.directionId === directionId);
};

const dedupeBySequence = (stopTimes: StopTime[]): StopTime[] => {
  const seen = new Set<number>();
  return [...stopTimes]
    .sort((a, b) => a.sequence - b.sequence)
    .filter((stopTime) => {
      if (seen.has(stopTime.sequence)) return false;
      seen.add(stopTime.sequence);
      return true;
    });
};

/**
 * Derives the ordered stops of a route direction from a sample trip: the
 * first trip of that route/direction, its stop times sorted by
 * `stop_sequence`, joined against the stops catalog. Stops missing from the
 * catalog are left out.
 */
export const loadStopPattern = async (
  catalog: CatalogReader,
  source: MetlinkSource,
  routeId: string,
  directionId: DirectionId,
): Promise<StopPatternEntry[]> => {
  const trips = await catalog.getTrips();
  const directionTrips = selectRouteTrips(trips, routeId, directionId);
  const sampleTrip = directionTrips[0];
  if (!sampleTrip) {
    throw new UnknownRouteDirectionError(routeId, directionId);
  }

  const [stopTimesPayload, stops] = await Promise.all([
    source.getStopTimes(sampleTrip.tripId),
    catalog.getStops(),
  ]);
  const parsed = parseStopTimes(stopTimesPayload, sampleTrip.tripId);
  if (parsed.dropped.length > 0) {
    logger.debug("Dropped invalid stop times", {
      tripId: sampleTrip.tripId,
      dropped: parsed.dropped.length,
    });
  }

  const stopsById = new Map(stops.map((stop) => [stop.stopId, stop]));
  const pattern: StopPatternEntry[] = [];
  dedupeBySequence(parsed.records).forEach((stopTime) => {
    const stop = stopsById.get(stopTime.stopId);
    if (!stop) {
      logger.warn("Stop missing from stops catalog; leaving it out of the pattern", {
        stopId: stopTime.stopId,
        tripId: sampleTrip.tripId,
      });
      return;
    }
    pattern.push({
      stopId: stop.stopId,
      sequence: stopTime.sequence,
      stopName: stop.name,
      scheduledTime: stopTime.departureTime ?? stopTime.arrivalTime,
    });
  });

  logger.debug("Built stop pattern", {
    routeId,
    directionId,
    tripId: sampleTrip.tripId,
    candidateTrips: directionTrips.length,
    stops: pattern.length,
  });
  return pattern;
};
