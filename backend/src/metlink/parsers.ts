import type {
  CatalogRoute,
  CatalogStop,
  CatalogTrip,
  Prediction,
  RawTime,
  StopTime,
  TripUpdateRecord,
} from "../models/domain";
import type { UpstreamRecord } from "../models/metlink";
import {
  ensureArray,
  isRecord,
  readDirection,
  readId,
  readNumber,
  readRecord,
  readString,
} from "../utils/fields";
import type { DirectionId } from "@route-timeline/core";

export interface DroppedRecord {
  index: number;
  reason: string;
}

export interface ParseResult<T> {
  records: T[];
  dropped: DroppedRecord[];
}

export class PayloadShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadShapeError";
  }
}

type RecordParser<T> = (record: UpstreamRecord) => T | string;

/**
 * Accepts a bare list, or an object wrapping the list under one of
 * `envelopeKeys`. Anything else is a shape error.
 */
export const listFrom = (payload: unknown, envelopeKeys: string[] = []): unknown[] => {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    for (const key of envelopeKeys) {
      const candidate = payload[key];
      if (Array.isArray(candidate)) return candidate;
    }
  }
  const received = payload === null ? "null" : typeof payload;
  throw new PayloadShapeError(
    `Expected a list${envelopeKeys.length > 0 ? ` or { ${envelopeKeys.join(" | ")}: [...] }` : ""}, received ${received}`,
  );
};

const parseList = <T>(items: unknown[], parse: RecordParser<T>): ParseResult<T> => {
  const records: T[] = [];
  const dropped: DroppedRecord[] = [];
  items.forEach((item, index) => {
    if (!isRecord(item)) {
      dropped.push({ index, reason: "not an object" });
      return;
    }
    const result = parse(item);
    if (typeof result === "string") {
      dropped.push({ index, reason: result });
      return;
    }
    records.push(result);
  });
  return { records, dropped };
};

const readRawTime = (record: UpstreamRecord | null, key: string): RawTime | null => {
  if (!record) return null;
  const value = record[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  return readString(record, key);
};

const fromDirectionLabel = (label: string | null): DirectionId | null => {
  switch (label?.toLowerCase()) {
    case "outbound":
      return 0;
    case "inbound":
      return 1;
    default:
      return null;
  }
};

const toRoute: RecordParser<CatalogRoute> = (record) => {
  const routeId = readId(record, "route_id");
  if (!routeId) return "missing route_id";
  return {
    routeId,
    shortName: readString(record, "route_short_name"),
    longName: readString(record, "route_long_name"),
    description: readString(record, "route_desc"),
    routeType: readNumber(record, "route_type"),
  };
};

const toStop: RecordParser<CatalogStop> = (record) => {
  const stopId = readId(record, "stop_id");
  if (!stopId) return "missing stop_id";
  return {
    stopId,
    name: readString(record, "stop_name") ?? stopId,
    lat: readNumber(record, "stop_lat"),
    lon: readNumber(record, "stop_lon"),
  };
};

const toTrip: RecordParser<CatalogTrip> = (record) => {
  const tripId = readId(record, "trip_id");
  if (!tripId) return "missing trip_id";
  const routeId = readId(record, "route_id");
  if (!routeId) return "missing route_id";
  const directionId = readDirection(record, "direction_id");
  if (directionId === null) return "missing direction_id";
  return {
    tripId,
    routeId,
    directionId,
    headsign: readString(record, "trip_headsign"),
  };
};

export const parseRoutes = (payload: unknown): ParseResult<CatalogRoute> =>
  parseList(listFrom(payload), toRoute);

export const parseStops = (payload: unknown): ParseResult<CatalogStop> =>
  parseList(listFrom(payload), toStop);

export const parseTrips = (payload: unknown): ParseResult<CatalogTrip> =>
  parseList(listFrom(payload), toTrip);

export const parseStopTimes = (payload: unknown, tripId: string): ParseResult<StopTime> =>
  parseList(listFrom(payload), (record) => {
    const stopId = readId(record, "stop_id");
    if (!stopId) return "missing stop_id";
    const sequence = readNumber(record, "stop_sequence");
    if (sequence === null) return "missing stop_sequence";
    return {
      tripId: readId(record, "trip_id") ?? tripId,
      stopId,
      sequence,
      arrivalTime: readString(record, "arrival_time"),
      departureTime: readString(record, "departure_time"),
    };
  });

/**
 * Stop predictions arrive either as a bare list or wrapped in
 * `{ departures: [...] }`, with the route given as `route_id`,
 * `route_short_name` or `service_id` and the direction as `direction_id` or an
 * `inbound`/`outbound` label.
 */
export const parseStopPredictions = (payload: unknown, requestedStopId: string): ParseResult<Prediction> =>
  parseList(listFrom(payload, ["departures"]), (record) => {
    const routeId = readId(record, "route_id");
    const routeShortName = readString(record, "route_short_name") ?? readString(record, "service_id");
    if (!routeId && !routeShortName) return "missing route identifiers";

    const directionId =
      readDirection(record, "direction_id") ?? fromDirectionLabel(readString(record, "direction"));
    if (directionId === null) return "missing direction";

    const expectedTime =
      readRawTime(record, "departure_time") ??
      readRawTime(readRecord(record, "departure"), "expected") ??
      readRawTime(readRecord(record, "arrival"), "expected");
    if (expectedTime === null) return "missing expected time";

    return {
      stopId: readId(record, "stop_id") ?? requestedStopId,
      routeId,
      routeShortName,
      directionId,
      expectedTime,
      tripId: readId(record, "trip_id"),
    };
  });

const pick = (record: UpstreamRecord, snakeKey: string, camelKey: string): unknown =>
  record[snakeKey] ?? record[camelKey];

/**
 * Flattens a GTFS-realtime trip-updates feed (JSON encoding) into one record
 * per stop time update. The departure event is preferred over arrival.
 */
export const parseTripUpdates = (payload: unknown): ParseResult<TripUpdateRecord> => {
  const entities = listFrom(payload, ["entity"]);
  const records: TripUpdateRecord[] = [];
  const dropped: DroppedRecord[] = [];

  entities.forEach((entity, index) => {
    if (!isRecord(entity)) {
      dropped.push({ index, reason: "not an object" });
      return;
    }
    const tripUpdate = pick(entity, "trip_update", "tripUpdate");
    if (!isRecord(tripUpdate)) {
      dropped.push({ index, reason: "missing trip_update" });
      return;
    }
    const trip = readRecord(tripUpdate, "trip");
    const tripId = trip ? readId(trip, "trip_id") ?? readId(trip, "tripId") : null;
    const routeId = trip ? readId(trip, "route_id") ?? readId(trip, "routeId") : null;
    const directionId = trip
      ? readDirection(trip, "direction_id") ?? readDirection(trip, "directionId")
      : null;

    const updates = ensureArray(pick(tripUpdate, "stop_time_update", "stopTimeUpdate"));
    updates.forEach((update) => {
      if (!isRecord(update)) {
        dropped.push({ index, reason: "stop_time_update is not an object" });
        return;
      }
      const stopId = readId(update, "stop_id") ?? readId(update, "stopId");
      if (!stopId) {
        dropped.push({ index, reason: "stop_time_update without stop_id" });
        return;
      }
      const departure = readRecord(update, "departure");
      const arrival = readRecord(update, "arrival");
      const departureTime = readRawTime(departure, "time");
      const event = departureTime !== null ? departure : arrival;
      const expectedTime = departureTime ?? readRawTime(arrival, "time");
      if (expectedTime === null) {
        dropped.push({ index, reason: `no event time for stop ${stopId}` });
        return;
      }
      records.push({
        stopId,
        routeId,
        routeShortName: null,
        directionId,
        expectedTime,
        tripId,
        delaySeconds: event ? readNumber(event, "delay") : null,
      });
    });
  });

  return { records, dropped };
};
