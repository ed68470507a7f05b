import type {
  DirectionId,
  RouteTimeline,
  TimelineIssue,
  TimelineStop,
  TimeSource,
} from "@route-timeline/core";
import hubKeywordList from "../data/hubKeywords.json";
import type { CatalogCache } from "../cache/catalogCache";
import { StructuralFailure } from "../errors";
import type { MetlinkSource, RequestOptions } from "../metlink/client";
import { parseTripUpdates } from "../metlink/parsers";
import type { CatalogTrip, RawTime, RouteTarget, StopId, StopPatternEntry, TripUpdateRecord } from "../models/domain";
import { toIdString } from "../utils/fields";
import { errorMessage, logger } from "../utils/logger";
import type { PredictionFetcher } from "./predictionFetcher";
import {
  formatEtaDisplay,
  normalizeTime,
  resolveServiceDay,
  type ServiceDay,
} from "./timeNormalizer";
import { buildTripIndex, fillGaps, indexTripUpdates, type MergedStopTimes } from "./tripUpdateMerger";

const CLOCK_SKEW_TOLERANCE_SECONDS = 60;
const SECONDS_PER_DAY = 86_400;
const PREVIEW_STOP_LIMIT = 5;

export const DEFAULT_HUB_KEYWORDS: readonly string[] = hubKeywordList;

export interface TimelineBuilderDeps {
  catalog: Pick<CatalogCache, "getRoutes" | "getTrips" | "getStopPattern">;
  source: Pick<MetlinkSource, "getTripUpdates">;
  predictions: PredictionFetcher;
  timeZone: string;
  serviceDayRolloverHour?: number;
  hubKeywords?: readonly string[];
}

export interface TimelineBuilder {
  build(routeId: string, directionId: DirectionId, now?: Date, options?: RequestOptions): Promise<RouteTimeline>;
  inFlightCount(): number;
}

interface TimedRecord {
  expectedTime: RawTime;
  tripId: string | null;
}

interface ResolvedTime {
  time: number;
  tripId: string | null;
}

export const isHubStop = (stopName: string, keywords: readonly string[] = DEFAULT_HUB_KEYWORDS): boolean => {
  const normalized = stopName.toLowerCase();
  return keywords.some((keyword) => keyword && normalized.includes(keyword.toLowerCase()));
};

interface SharedBuild {
  promise: Promise<RouteTimeline>;
  controller: AbortController;
  waiting: number;
}

const abortReason = (signal: AbortSignal): unknown =>
  signal.reason ?? Object.assign(new Error("Timeline build aborted"), { name: "AbortError" });

const throwIfAborted = (signal: AbortSignal | undefined) => {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
};

const stopLabel = (stop: TimelineStop) => `${stop.stopName} (${stop.etaDisplay})`;

export const buildSummary = (routeLabel: string, stops: TimelineStop[]): string => {
  const first = stops[0];
  const last = stops[stops.length - 1];
  if (!first || !last) return `${routeLabel}: no stops`;
  const live = stops.filter((stop) => stop.timeSource === "realtime").length;
  return `${routeLabel} ${first.stopName} -> ${last.stopName}, ${stops.length} stops, ${live} live`;
};

export const buildPreview = (stops: TimelineStop[], limit = PREVIEW_STOP_LIMIT): string => {
  const shown = stops.slice(0, limit).map(stopLabel);
  const remaining = stops.length - shown.length;
  if (remaining > 0) shown.push(`+${remaining} more`);
  return shown.join(" | ");
};

/**
 * Builds route timelines. At most one build runs per (route, direction); an
 * overlapping request for the same key receives the in-flight result. A
 * caller's signal only detaches that caller from the shared build.
 */
export const createTimelineBuilder = (deps: TimelineBuilderDeps): TimelineBuilder => {
  const hubKeywords = deps.hubKeywords ?? DEFAULT_HUB_KEYWORDS;
  const rolloverHour = deps.serviceDayRolloverHour ?? 3;
  const inFlight = new Map<string, SharedBuild>();

  const resolveRouteShortName = async (routeId: string, issues: TimelineIssue[]) => {
    try {
      const routes = await deps.catalog.getRoutes();
      const target = toIdString(routeId);
      return routes.find((route) => route.routeId === target)?.shortName ?? null;
    } catch (error) {
      issues.push({ stage: "routes", message: `Route catalog unavailable: ${errorMessage(error)}` });
      return null;
    }
  };

  const loadTripIndex = async (issues: TimelineIssue[]): Promise<Map<string, CatalogTrip>> => {
    try {
      return buildTripIndex(await deps.catalog.getTrips());
    } catch (error) {
      issues.push({ stage: "trip_updates", message: `Trip catalog unavailable: ${errorMessage(error)}` });
      return new Map();
    }
  };

  const loadTripUpdates = async (
    issues: TimelineIssue[],
    signal: AbortSignal | undefined,
  ): Promise<Map<StopId, TripUpdateRecord[]>> => {
    try {
      const parsed = parseTripUpdates(await deps.source.getTripUpdates({ signal }));
      if (parsed.dropped.length > 0) {
        logger.debug("Dropped invalid trip-update records", { dropped: parsed.dropped.length });
      }
      return indexTripUpdates(parsed.records, await loadTripIndex(issues));
    } catch (error) {
      throwIfAborted(signal);
      issues.push({ stage: "trip_updates", message: errorMessage(error) });
      return new Map();
    }
  };

  const pickRealtime = (
    entry: StopPatternEntry,
    records: TimedRecord[],
    serviceDay: ServiceDay,
    nowSeconds: number,
    issues: TimelineIssue[],
  ): ResolvedTime | null => {
    let best: ResolvedTime | null = null;
    let unparsable = 0;
    for (const record of records) {
      const time = normalizeTime(record.expectedTime, serviceDay, { now: nowSeconds });
      if (time === null) {
        unparsable += 1;
        continue;
      }
      if (time < nowSeconds - CLOCK_SKEW_TOLERANCE_SECONDS) continue;
      if (!best || time < best.time) {
        best = { time, tripId: record.tripId };
      }
    }
    if (unparsable > 0) {
      issues.push({
        stage: "normalize",
        stopId: entry.stopId,
        message: `${unparsable} of ${records.length} real-time values could not be parsed`,
      });
    }
    return best;
  };

  const pickScheduled = (
    entry: StopPatternEntry,
    serviceDay: ServiceDay,
    nowSeconds: number,
    issues: TimelineIssue[],
  ): number | null => {
    if (entry.scheduledTime === null) return null;
    const time = normalizeTime(entry.scheduledTime, serviceDay, { now: nowSeconds });
    if (time === null) {
      issues.push({
        stage: "normalize",
        stopId: entry.stopId,
        message: `Unparsable scheduled time "${entry.scheduledTime}"`,
      });
      return null;
    }
    // The pattern comes from one sample trip; once it has passed, show its next occurrence.
    let next = time;
    while (next < nowSeconds - CLOCK_SKEW_TOLERANCE_SECONDS) {
      next += SECONDS_PER_DAY;
    }
    return next;
  };

  const toTimelineStop = (
    entry: StopPatternEntry,
    index: number,
    total: number,
    merged: MergedStopTimes | undefined,
    serviceDay: ServiceDay,
    nowSeconds: number,
    issues: TimelineIssue[],
  ): TimelineStop => {
    let timeSource: TimeSource = "unknown";
    let resolved: ResolvedTime | null = null;

    if (merged) {
      resolved = pickRealtime(entry, merged.records, serviceDay, nowSeconds, issues);
      if (resolved) timeSource = merged.source;
    }
    if (!resolved && merged?.source === "realtime" && merged.tripUpdates.length > 0) {
      resolved = pickRealtime(entry, merged.tripUpdates, serviceDay, nowSeconds, issues);
      if (resolved) timeSource = "trip_update";
    }
    if (!resolved) {
      const scheduled = pickScheduled(entry, serviceDay, nowSeconds, issues);
      if (scheduled !== null) {
        resolved = { time: scheduled, tripId: null };
        timeSource = "scheduled";
      }
    }

    const etaSeconds = resolved ? Math.max(0, Math.round(resolved.time - nowSeconds)) : null;
    return {
      stopId: entry.stopId,
      stopName: entry.stopName,
      sequence: entry.sequence,
      etaSeconds,
      etaDisplay: formatEtaDisplay(etaSeconds),
      timeSource,
      isDeparture: index === 0,
      isDestination: index === total - 1,
      isHub: isHubStop(entry.stopName, hubKeywords),
      expectedTime: resolved ? new Date(resolved.time * 1000).toISOString() : null,
      scheduledTime: entry.scheduledTime,
      tripId: resolved?.tripId ?? null,
    };
  };

  const assemble = (
    target: RouteTarget,
    serviceDay: ServiceDay,
    now: Date,
    stops: TimelineStop[],
    issues: TimelineIssue[],
  ): RouteTimeline => {
    const routeLabel = target.routeShortName ?? target.routeId;
    return {
      routeId: target.routeId,
      directionId: target.directionId,
      routeShortName: target.routeShortName,
      serviceDate: serviceDay.serviceDate,
      generatedAt: now.toISOString(),
      stops,
      departureStop: stops[0] ?? null,
      destinationStop: stops[stops.length - 1] ?? null,
      hubStops: stops.filter((stop) => stop.isHub),
      realtimeStopCount: stops.filter((stop) => stop.timeSource === "realtime").length,
      summary: buildSummary(routeLabel, stops),
      preview: buildPreview(stops),
      enrichmentIssues: issues,
    };
  };

  const runBuild = async (
    routeId: string,
    directionId: DirectionId,
    now: Date,
    signal: AbortSignal | undefined,
  ): Promise<RouteTimeline> => {
    let pattern: StopPatternEntry[];
    try {
      pattern = await deps.catalog.getStopPattern(routeId, directionId);
    } catch (error) {
      throw new StructuralFailure(
        routeId,
        directionId,
        `Stop pattern unavailable for route ${routeId} direction ${directionId}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    throwIfAborted(signal);

    const issues: TimelineIssue[] = [];
    const serviceDay = resolveServiceDay(now, deps.timeZone, rolloverHour);
    const nowSeconds = now.getTime() / 1000;
    const routeShortName = pattern.length > 0 ? await resolveRouteShortName(routeId, issues) : null;
    const target: RouteTarget = { routeId, routeShortName, directionId };

    if (pattern.length === 0) {
      logger.info("Stop pattern is empty; returning an empty timeline", { routeId, directionId });
      return assemble(target, serviceDay, now, [], issues);
    }

    const [predictionBatch, tripUpdatesByStop] = await Promise.all([
      deps.predictions.fetchAll(
        pattern.map((entry) => entry.stopId),
        { signal },
      ),
      loadTripUpdates(issues, signal),
    ]);
    throwIfAborted(signal);

    predictionBatch.failures.forEach((failure) => {
      issues.push({ stage: "predictions", stopId: failure.stopId, message: failure.message });
    });

    const merged = fillGaps(predictionBatch.byStop, tripUpdatesByStop, pattern, target);
    const stops = pattern.map((entry, index) =>
      toTimelineStop(entry, index, pattern.length, merged.get(entry.stopId), serviceDay, nowSeconds, issues),
    );

    const timeline = assemble(target, serviceDay, now, stops, issues);
    if (issues.length > 0) {
      logger.warn("Timeline built with degraded enrichment", {
        routeId,
        directionId,
        issues: issues.length,
        stages: Array.from(new Set(issues.map((issue) => issue.stage))),
      });
    }
    logger.debug("Timeline built", {
      routeId,
      directionId,
      stops: stops.length,
      realtime: timeline.realtimeStopCount,
    });
    return timeline;
  };

  const build = (
    routeId: string,
    directionId: DirectionId,
    now: Date = new Date(),
    options: RequestOptions = {},
  ): Promise<RouteTimeline> => {
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      return Promise.reject(abortReason(callerSignal));
    }
    const key = `${routeId}:${directionId}`;
    let shared = inFlight.get(key);
    if (!shared) {
      const controller = new AbortController();
      const created: SharedBuild = {
        controller,
        waiting: 0,
        promise: runBuild(routeId, directionId, now, controller.signal).finally(() => {
          if (inFlight.get(key) === created) inFlight.delete(key);
        }),
      };
      inFlight.set(key, created);
      shared = created;
    }
    const entry = shared;
    entry.waiting += 1;

    return new Promise<RouteTimeline>((resolve, reject) => {
      let done = false;
      const leave = () => {
        done = true;
        entry.waiting -= 1;
        callerSignal?.removeEventListener("abort", onAbort);
      };
      // The shared build is cancelled only once every caller waiting on it has gone.
      const onAbort = () => {
        if (done || !callerSignal) return;
        leave();
        if (entry.waiting === 0) {
          if (inFlight.get(key) === entry) inFlight.delete(key);
          entry.controller.abort(abortReason(callerSignal));
        }
        reject(abortReason(callerSignal));
      };
      callerSignal?.addEventListener("abort", onAbort, { once: true });
      entry.promise.then(
        (timeline) => {
          if (done) return;
          leave();
          resolve(timeline);
        },
        (error: unknown) => {
          if (done) return;
          leave();
          reject(error);
        },
      );
    });
  };

  return {
    build,
    inFlightCount: () => inFlight.size,
  };
};
