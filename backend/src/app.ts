import cors from "cors";
import express from "express";
import type { DirectionId, RouteTimelineErrorResponse } from "@route-timeline/core";
import type { CatalogCache } from "./cache/catalogCache";
import type { RedisManager } from "./cache/redisClient";
import { StructuralFailure } from "./errors";
import type { MetlinkClient } from "./metlink/client";
import { sensorKey, type RouteSensor } from "./services/routeSensor";
import type { TimelineBuilder } from "./services/timelineBuilder";
import { toDirectionId, toIdString } from "./utils/fields";
import { errorMessage, logger } from "./utils/logger";

export interface AppDeps {
  cache: Pick<CatalogCache, "getHealth">;
  client: Pick<MetlinkClient, "getTelemetry">;
  builder: Pick<TimelineBuilder, "build">;
  sensors: ReadonlyMap<string, RouteSensor>;
  redis: Pick<RedisManager, "health">;
  metlinkApiBaseUrl: string;
}

const errorBody = (error: string, message: string): RouteTimelineErrorResponse => ({ error, message });

const parseDirectionParam = (value: string | undefined): DirectionId | null =>
  value === "0" || value === "1" ? toDirectionId(value) : null;

export const createApp = (deps: AppDeps) => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      metlinkApiBaseUrl: deps.metlinkApiBaseUrl,
      watchedRoutes: Array.from(deps.sensors.keys()),
      cacheHealth: deps.cache.getHealth(),
      metlinkTelemetry: deps.client.getTelemetry(),
      redis: deps.redis.health(),
    });
  });

  app.get("/api/routes/:routeId/directions/:directionId/timeline", async (req, res) => {
    const routeId = toIdString(req.params.routeId);
    const directionId = parseDirectionParam(req.params.directionId);
    if (routeId === null || directionId === null) {
      return res.status(400).json(errorBody("bad_request", "routeId is required and directionId must be 0 or 1"));
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const timeline = await deps.builder.build(routeId, directionId, new Date(), { signal: controller.signal });
      return res.json(timeline);
    } catch (error) {
      if (error instanceof StructuralFailure) {
        logger.warn("Route timeline unavailable", { routeId, directionId, message: error.message });
        return res.status(502).json(errorBody("structural_failure", error.message));
      }
      logger.error("Failed to build route timeline", { routeId, directionId, message: errorMessage(error) });
      return res.status(500).json(errorBody("internal_error", "Unable to build route timeline"));
    }
  });

  app.get("/api/sensors", (_req, res) => {
    const sensors = Array.from(deps.sensors.values()).map((sensor) => sensor.getState());
    res.json({ sensors });
  });

  app.get("/api/sensors/:routeId/:directionId", (req, res) => {
    const directionId = parseDirectionParam(req.params.directionId);
    if (directionId === null) {
      return res.status(400).json(errorBody("bad_request", "directionId must be 0 or 1"));
    }
    const sensor = deps.sensors.get(sensorKey(req.params.routeId, directionId));
    if (!sensor) {
      return res.status(404).json(errorBody("not_found", "Route direction is not being watched"));
    }
    return res.json(sensor.getState());
  });

  return app;
};
