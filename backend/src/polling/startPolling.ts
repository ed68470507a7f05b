import { config } from "../config";
import { createCatalogCache, type CatalogCache } from "../cache/catalogCache";
import { createRedisManager, type RedisManager } from "../cache/redisClient";
import { createMetlinkClient, type MetlinkClient } from "../metlink/client";
import { createPredictionFetcher } from "../services/predictionFetcher";
import { createRouteSensor, sensorKey, type RouteSensor } from "../services/routeSensor";
import { createTimelineBuilder, type TimelineBuilder } from "../services/timelineBuilder";
import { errorMessage, logger } from "../utils/logger";

const SENSOR_STAGGER_MS = 250;
const log = logger.child({ component: "polling" });

export interface PollingJob {
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<void>;
  initialDelayMs?: number;
  timer?: NodeJS.Timeout;
}

export interface PollingHandle {
  stop: () => void;
}

const createSensorJobs = (sensors: RouteSensor[], intervalMs: number): PollingJob[] =>
  sensors.map((sensor, index) => ({
    name: `sensor:${sensorKey(sensor.target.routeId, sensor.target.directionId)}`,
    intervalMs,
    initialDelayMs: index * SENSOR_STAGGER_MS,
    run: async (signal) => {
      const state = await sensor.refresh({ signal });
      if (state.lastError) {
        throw new Error(state.lastError);
      }
    },
  }));

/**
 * Runs each job as a `setTimeout` chain, so a slow refresh never overlaps the
 * next one. `stop()` clears pending timers and aborts in-flight refreshes
 * without waiting for them to settle.
 */
export const startJobs = (jobs: PollingJob[]): PollingHandle => {
  const controller = new AbortController();

  const startJob = (job: PollingJob) => {
    const scheduleNext = (delayMs: number) => {
      if (controller.signal.aborted) return;
      job.timer = setTimeout(async () => {
        const start = Date.now();
        try {
          await job.run(controller.signal);
          log.debug("Polling job completed", { job: job.name, durationMs: Date.now() - start });
        } catch (error) {
          if (!controller.signal.aborted) {
            log.error("Polling job failed", { job: job.name, message: errorMessage(error) });
          }
        } finally {
          scheduleNext(job.intervalMs);
        }
      }, Math.max(0, delayMs));
    };

    scheduleNext(job.initialDelayMs ?? 0);
  };

  jobs.forEach(startJob);

  return {
    stop: () => {
      controller.abort();
      jobs.forEach((job) => {
        if (job.timer) clearTimeout(job.timer);
      });
    },
  };
};

export const startSensorPolling = (sensors: RouteSensor[], intervalMs: number): PollingHandle =>
  startJobs(createSensorJobs(sensors, intervalMs));

export interface PollingBundle {
  client: MetlinkClient;
  cache: CatalogCache;
  builder: TimelineBuilder;
  sensors: Map<string, RouteSensor>;
  redis: RedisManager;
  stop: () => void;
}

export const initializePolling = (): PollingBundle => {
  const client = createMetlinkClient();
  const redis = createRedisManager();
  const cache = createCatalogCache(client, {
    catalogTtlMs: config.catalogTtlMs,
    stopPatternTtlMs: config.stopPatternTtlMs,
    redis,
  });
  const builder = createTimelineBuilder({
    catalog: cache,
    source: client,
    predictions: createPredictionFetcher(client, { concurrency: config.predictionConcurrency }),
    timeZone: config.agencyTimeZone,
    serviceDayRolloverHour: config.serviceDayRolloverHour,
  });

  const sensors = new Map<string, RouteSensor>();
  config.watchedRoutes.forEach((target) => {
    sensors.set(
      sensorKey(target.routeId, target.directionId),
      createRouteSensor(builder, target, { timeZone: config.agencyTimeZone }),
    );
  });

  if (sensors.size === 0) {
    log.info("WATCH_ROUTES is empty; timelines are built on demand only");
  }

  const handle = startSensorPolling(Array.from(sensors.values()), config.pollIntervalMs);
  log.info("Route sensor polling started", {
    sensors: Array.from(sensors.keys()),
    intervalMs: config.pollIntervalMs,
  });

  return { client, cache, builder, sensors, redis, stop: handle.stop };
};
