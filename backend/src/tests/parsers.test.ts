import test from "node:test";
import assert from "node:assert/strict";
import {
  listFrom,
  parseRoutes,
  parseStopPredictions,
  parseStopTimes,
  parseStops,
  parseTrips,
  parseTripUpdates,
  PayloadShapeError,
} from "../metlink/parsers";

test("listFrom accepts a bare list or a named envelope", () => {
  assert.deepEqual(listFrom([1, 2]), [1, 2]);
  assert.deepEqual(listFrom({ departures: [3] }, ["departures"]), [3]);
});

test("listFrom rejects other shapes", () => {
  assert.throws(() => listFrom({ data: [] }, ["departures"]), PayloadShapeError);
  assert.throws(() => listFrom(null), {
    name: "PayloadShapeError",
    message: "Expected a list, received null",
  });
});

test("parseRoutes normalizes numeric ids and drops records without one", () => {
  const result = parseRoutes([
    { route_id: 83, route_short_name: "83", route_long_name: "Wellington - Eastbourne", route_type: 3 },
    { route_short_name: "orphan" },
    "not a route",
  ]);
  assert.deepEqual(result.records, [
    {
      routeId: "83",
      shortName: "83",
      longName: "Wellington - Eastbourne",
      description: null,
      routeType: 3,
    },
  ]);
  assert.deepEqual(result.dropped, [
    { index: 1, reason: "missing route_id" },
    { index: 2, reason: "not an object" },
  ]);
});

test("parseStops falls back to the stop id for a missing name", () => {
  const result = parseStops([{ stop_id: 5000, stop_lat: "-41.2", stop_lon: 174.7 }]);
  assert.deepEqual(result.records, [{ stopId: "5000", name: "5000", lat: -41.2, lon: 174.7 }]);
});

test("parseTrips requires route and direction", () => {
  const result = parseTrips([
    { trip_id: "t1", route_id: 83, direction_id: "1", trip_headsign: "Wellington" },
    { trip_id: "t2", route_id: 83 },
    { trip_id: "t3", direction_id: 0 },
  ]);
  assert.deepEqual(result.records, [{ tripId: "t1", routeId: "83", directionId: 1, headsign: "Wellington" }]);
  assert.deepEqual(
    result.dropped.map((entry) => entry.reason),
    ["missing direction_id", "missing route_id"],
  );
});

test("parseStopTimes defaults the trip id and requires a sequence", () => {
  const result = parseStopTimes(
    [
      { stop_id: "5000", stop_sequence: "2", arrival_time: "08:04:00", departure_time: "08:05:00" },
      { stop_id: "5001" },
    ],
    "t1",
  );
  assert.deepEqual(result.records, [
    { tripId: "t1", stopId: "5000", sequence: 2, arrivalTime: "08:04:00", departureTime: "08:05:00" },
  ]);
  assert.deepEqual(result.dropped, [{ index: 1, reason: "missing stop_sequence" }]);
});

test("parseStopPredictions applies route, direction and time fallbacks", () => {
  const result = parseStopPredictions(
    {
      farezone: "1",
      departures: [
        { route_id: 83, direction_id: 0, departure_time: "08:05:00", trip_id: "t1" },
        { service_id: "83", direction: "inbound", departure: { expected: "2026-10-19T08:07:00Z" } },
        { route_short_name: "83", direction: "outbound", arrival: { expected: "2026-10-19T08:09:00Z" } },
        { service_id: "83", direction: "outbound", departure: { aimed: "2026-10-19T08:10:00Z", expected: null } },
        { direction: "outbound", departure_time: "08:05:00" },
        { service_id: "83", departure_time: "08:05:00" },
      ],
    },
    "5000",
  );
  assert.deepEqual(result.records, [
    { stopId: "5000", routeId: "83", routeShortName: null, directionId: 0, expectedTime: "08:05:00", tripId: "t1" },
    {
      stopId: "5000",
      routeId: null,
      routeShortName: "83",
      directionId: 1,
      expectedTime: "2026-10-19T08:07:00Z",
      tripId: null,
    },
    {
      stopId: "5000",
      routeId: null,
      routeShortName: "83",
      directionId: 0,
      expectedTime: "2026-10-19T08:09:00Z",
      tripId: null,
    },
  ]);
  assert.deepEqual(result.dropped, [
    { index: 3, reason: "missing expected time" },
    { index: 4, reason: "missing route identifiers" },
    { index: 5, reason: "missing direction" },
  ]);
});

test("parseTripUpdates flattens stop time updates and prefers departures", () => {
  const result = parseTripUpdates({
    header: { gtfs_realtime_version: "2.0" },
    entity: [
      {
        id: "e1",
        trip_update: {
          trip: { trip_id: "t1", route_id: 83, direction_id: 0 },
          stop_time_update: [
            { stop_id: "5000", arrival: { time: 1_800_000_000, delay: 30 }, departure: { time: 1_800_000_060, delay: 60 } },
            { stop_id: "5001", arrival: { time: "1800000120", delay: 90 } },
            { stop_id: "5002" },
            { arrival: { time: 1_800_000_180 } },
          ],
        },
      },
      {
        id: "e2",
        tripUpdate: {
          trip: { tripId: "t2" },
          stopTimeUpdate: { stopId: 5003, departure: { time: 1_800_000_240 } },
        },
      },
      { id: "e3", vehicle: {} },
    ],
  });
  assert.deepEqual(result.records, [
    {
      stopId: "5000",
      routeId: "83",
      routeShortName: null,
      directionId: 0,
      expectedTime: 1_800_000_060,
      tripId: "t1",
      delaySeconds: 60,
    },
    {
      stopId: "5001",
      routeId: "83",
      routeShortName: null,
      directionId: 0,
      expectedTime: "1800000120",
      tripId: "t1",
      delaySeconds: 90,
    },
    {
      stopId: "5003",
      routeId: null,
      routeShortName: null,
      directionId: null,
      expectedTime: 1_800_000_240,
      tripId: "t2",
      delaySeconds: null,
    },
  ]);
  assert.deepEqual(result.dropped, [
    { index: 0, reason: "no event time for stop 5002" },
    { index: 0, reason: "stop_time_update without stop_id" },
    { index: 2, reason: "missing trip_update" },
  ]);
});

test("parseTripUpdates accepts a bare entity list", () => {
  const result = parseTripUpdates([
    { trip_update: { trip: { trip_id: "t1" }, stop_time_update: [{ stop_id: "5000", departure: { time: 10 } }] } },
  ]);
  assert.equal(result.records.length, 1);
  assert.equal(result.records[0]?.stopId, "5000");
});
