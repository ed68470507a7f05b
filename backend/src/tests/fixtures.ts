import type { MetlinkSource, RequestOptions } from "../metlink/client";
import { describeRedisHealth, type RedisManager, type RedisStatus } from "../cache/redisClient";

export const TEST_TIME_ZONE = "UTC";
export const NOW = new Date("2026-10-19T08:00:00Z");
export const NOW_SECONDS = NOW.getTime() / 1000;

const pad = (value: number) => String(value).padStart(2, "0");

export const isoAfter = (seconds: number) => new Date(NOW.getTime() + seconds * 1000).toISOString();

export interface SourceCalls {
  routes: number;
  stops: number;
  trips: number;
  stopTimes: string[];
  stopPredictions: string[];
  tripUpdates: number;
}

type Canned = unknown | Error;

const respond = async (value: Canned, options?: RequestOptions): Promise<unknown> => {
  await new Promise((resolve) => setImmediate(resolve));
  if (options?.signal?.aborted) throw options.signal.reason;
  if (value instanceof Error) throw value;
  return value;
};

/** In-process stand-in for the upstream API, serving canned payloads. */
export class FakeMetlinkSource implements MetlinkSource {
  routes: Canned = [];
  stops: Canned = [];
  trips: Canned = [];
  stopTimes = new Map<string, Canned>();
  stopPredictions = new Map<string, Canned>();
  tripUpdates: Canned = { entity: [] };
  readonly calls: SourceCalls = {
    routes: 0,
    stops: 0,
    trips: 0,
    stopTimes: [],
    stopPredictions: [],
    tripUpdates: 0,
  };

  getRoutes(options?: RequestOptions) {
    this.calls.routes += 1;
    return respond(this.routes, options);
  }

  getStops(options?: RequestOptions) {
    this.calls.stops += 1;
    return respond(this.stops, options);
  }

  getTrips(options?: RequestOptions) {
    this.calls.trips += 1;
    return respond(this.trips, options);
  }

  getStopTimes(tripId: string, options?: RequestOptions) {
    this.calls.stopTimes.push(tripId);
    return respond(this.stopTimes.get(tripId) ?? [], options);
  }

  getStopPredictions(stopId: string, options?: RequestOptions) {
    this.calls.stopPredictions.push(stopId);
    return respond(this.stopPredictions.get(stopId) ?? { departures: [] }, options);
  }

  getTripUpdates(options?: RequestOptions) {
    this.calls.tripUpdates += 1;
    return respond(this.tripUpdates, options);
  }
}

export const ROUTE_83_TRIP = "83__0__100";
export const ROUTE_83_STOP_COUNT = 12;
export const stopIdAt = (position: number) => String(1000 + position);
export const stopNameAt = (position: number) => (position === 1 ? "Wellington Station" : `Stop ${position}`);

/**
 * Route 83 direction 0: twelve stops scheduled two minutes apart from 08:02,
 * predictions for stops 1-8 (one minute apart), a trip update for stop 9 and
 * for stop 1, nothing else. Stop times are served out of sequence order.
 */
export const createRoute83Source = (source: FakeMetlinkSource = new FakeMetlinkSource()) => {
  const positions = Array.from({ length: ROUTE_83_STOP_COUNT }, (_, index) => index + 1);

  source.routes = [
    { route_id: 83, route_short_name: "83", route_long_name: "Wellington - Eastbourne" },
    { route_id: 2, route_short_name: "2", route_long_name: "Karori - Miramar" },
  ];
  source.trips = [
    { trip_id: ROUTE_83_TRIP, route_id: 83, direction_id: 0, trip_headsign: "Eastbourne" },
    { trip_id: "83__1__200", route_id: 83, direction_id: 1, trip_headsign: "Wellington" },
    { trip_id: "2__0__300", route_id: 2, direction_id: 0 },
  ];
  source.stops = positions.map((position) => ({
    stop_id: stopIdAt(position),
    stop_name: stopNameAt(position),
    stop_lat: -41.28,
    stop_lon: 174.77,
  }));
  source.stopTimes.set(
    ROUTE_83_TRIP,
    [...positions].reverse().map((position) => ({
      trip_id: ROUTE_83_TRIP,
      stop_id: stopIdAt(position),
      stop_sequence: position,
      arrival_time: `08:${pad(position * 2)}:00`,
      departure_time: `08:${pad(position * 2)}:00`,
    })),
  );
  positions
    .filter((position) => position <= 8)
    .forEach((position) => {
      source.stopPredictions.set(stopIdAt(position), {
        departures: [
          {
            stop_id: stopIdAt(position),
            service_id: "83",
            direction: "outbound",
            trip_id: ROUTE_83_TRIP,
            departure: { aimed: isoAfter(position * 120), expected: isoAfter(position * 60) },
          },
          {
            stop_id: stopIdAt(position),
            service_id: "2",
            direction: "outbound",
            departure: { expected: isoAfter(5) },
          },
        ],
      });
    });
  source.tripUpdates = {
    entity: [
      {
        id: "tu-1",
        trip_update: {
          trip: { trip_id: ROUTE_83_TRIP },
          stop_time_update: [
            { stop_sequence: 1, stop_id: stopIdAt(1), departure: { time: NOW_SECONDS + 999, delay: 0 } },
            { stop_sequence: 9, stop_id: stopIdAt(9), departure: { time: NOW_SECONDS + 600, delay: 120 } },
          ],
        },
      },
    ],
  };
  return source;
};

/** Map-backed stand-in for the Redis manager. */
export const createMemoryRedis = (status: RedisStatus = "ready") => {
  const store = new Map<string, string>();
  const manager: RedisManager = {
    status,
    error: undefined,
    connect: async () => undefined,
    disconnect: async () => undefined,
    getJson: async <T>(key: string): Promise<T | null> => {
      const payload = store.get(key);
      return payload === undefined ? null : (JSON.parse(payload) as T);
    },
    setJson: async <T>(key: string, value: T) => {
      store.set(key, JSON.stringify(value));
    },
    health: () => describeRedisHealth(status, undefined),
  };
  return { manager, store };
};
