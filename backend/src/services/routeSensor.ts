import type { DirectionId, RouteSensorState, RouteTimeline, TimelineStop } from "@route-timeline/core";
import type { RequestOptions } from "../metlink/client";
import { errorMessage, logger } from "../utils/logger";
import { formatClockTime } from "./timeNormalizer";
import type { TimelineBuilder } from "./timelineBuilder";

export interface SensorTarget {
  routeId: string;
  directionId: DirectionId;
}

export interface RouteSensorOptions {
  timeZone: string;
  now?: () => Date;
}

export interface RouteSensor {
  readonly target: SensorTarget;
  refresh(options?: RequestOptions): Promise<RouteSensorState>;
  getState(): RouteSensorState;
}

export const sensorKey = (routeId: string, directionId: DirectionId) => `${routeId}:${directionId}`;

const emptyState = (target: SensorTarget): RouteSensorState => ({
  routeId: target.routeId,
  directionId: target.directionId,
  available: false,
  timeline: null,
  nextEtaSeconds: null,
  nextEtaDisplay: null,
  nextDepartureTime: null,
  nextDepartureDisplay: null,
  timeSource: null,
  destinationStopName: null,
  hubStopNames: [],
  summary: null,
  preview: null,
  lastUpdated: null,
  lastError: null,
});

const findNextStop = (timeline: RouteTimeline): TimelineStop | null =>
  timeline.stops.find((stop) => stop.etaSeconds !== null) ?? null;

/**
 * Polled accessor for one (route, direction). A failed refresh keeps the
 * previous values and only records `lastError`.
 */
export const createRouteSensor = (
  builder: Pick<TimelineBuilder, "build">,
  target: SensorTarget,
  options: RouteSensorOptions,
): RouteSensor => {
  const now = options.now ?? (() => new Date());
  const log = logger.child({ component: "sensor", routeId: target.routeId, directionId: target.directionId });
  let state = emptyState(target);

  const applyTimeline = (timeline: RouteTimeline, refreshedAt: Date) => {
    const next = findNextStop(timeline);
    const nextEpochSeconds = next?.expectedTime ? Date.parse(next.expectedTime) / 1000 : null;
    state = {
      ...state,
      available: true,
      timeline,
      nextEtaSeconds: next?.etaSeconds ?? null,
      nextEtaDisplay: next?.etaDisplay ?? null,
      nextDepartureTime: next?.expectedTime ?? null,
      nextDepartureDisplay:
        nextEpochSeconds !== null && Number.isFinite(nextEpochSeconds)
          ? formatClockTime(nextEpochSeconds, options.timeZone)
          : null,
      timeSource: next?.timeSource ?? null,
      destinationStopName: timeline.destinationStop?.stopName ?? null,
      hubStopNames: timeline.hubStops.map((stop) => stop.stopName),
      summary: timeline.summary,
      preview: timeline.preview,
      lastUpdated: refreshedAt.toISOString(),
      lastError: null,
    };
  };

  const refresh = async (requestOptions: RequestOptions = {}) => {
    const { signal } = requestOptions;
    const refreshedAt = now();
    try {
      const timeline = await builder.build(target.routeId, target.directionId, refreshedAt, { signal });
      if (signal?.aborted) return state;
      applyTimeline(timeline, refreshedAt);
    } catch (error) {
      if (signal?.aborted) return state;
      log.warn("Refresh failed; keeping last known values", { message: errorMessage(error) });
      state = { ...state, lastError: errorMessage(error) };
    }
    return state;
  };

  return {
    target,
    refresh,
    getState: () => state,
  };
};
