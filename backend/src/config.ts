import dotenv from "dotenv";
import type { DirectionId } from "@route-timeline/core";

dotenv.config();

const DEFAULT_PORT = 4000;
const DEFAULT_METLINK_BASE_URL = "https://api.opendata.metlink.org.nz/v1";
const DEFAULT_METLINK_RATE_LIMIT_WINDOW_MS = 10_000;
const DEFAULT_METLINK_RATE_LIMIT_MAX_REQUESTS = 20;
const DEFAULT_METLINK_MAX_RETRIES = 2;
const DEFAULT_METLINK_RETRY_BASE_DELAY_MS = 500;
const DEFAULT_METLINK_RETRY_MAX_DELAY_MS = 5_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_PREDICTION_CONCURRENCY = 6;
const DEFAULT_CATALOG_TTL_MINUTES = 5;
const DEFAULT_STOP_PATTERN_TTL_MINUTES = 5;
const DEFAULT_POLL_INTERVAL_SECONDS = 30;
const DEFAULT_AGENCY_TIMEZONE = "Pacific/Auckland";
const DEFAULT_SERVICE_DAY_ROLLOVER_HOUR = 3;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface WatchedRoute {
  routeId: string;
  directionId: DirectionId;
}

export interface AppConfig {
  port: number;
  metlinkApiBaseUrl: string;
  metlinkApiKey: string | undefined;
  redisUrl: string | undefined;
  logLevel: LogLevel;
  metlinkRateLimitWindowMs: number;
  metlinkRateLimitMaxRequests: number;
  metlinkMaxRetries: number;
  metlinkRetryBaseDelayMs: number;
  metlinkRetryMaxDelayMs: number;
  requestTimeoutMs: number;
  predictionConcurrency: number;
  catalogTtlMs: number;
  stopPatternTtlMs: number;
  pollIntervalMs: number;
  watchedRoutes: WatchedRoute[];
  agencyTimeZone: string;
  serviceDayRolloverHour: number;
}

type EnvInput = Partial<Record<string, string | undefined>>;

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

const parseHour = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (Number.isInteger(parsed) && parsed >= 0 && parsed < 24) return parsed;
  return fallback;
};

const parseOptionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Parses `WATCH_ROUTES`, a comma separated list of `routeId:direction` pairs.
 * A bare route id watches both directions. Malformed entries are skipped.
 */
export const parseWatchedRoutes = (value: string | undefined): WatchedRoute[] => {
  if (!value) return [];
  const seen = new Set<string>();
  const routes: WatchedRoute[] = [];
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .forEach((entry) => {
      const [routePart, directionPart] = entry.split(":").map((part) => part.trim());
      if (!routePart) return;
      const directions: DirectionId[] =
        directionPart === undefined ? [0, 1] : directionPart === "0" ? [0] : directionPart === "1" ? [1] : [];
      directions.forEach((directionId) => {
        const key = `${routePart}:${directionId}`;
        if (seen.has(key)) return;
        seen.add(key);
        routes.push({ routeId: routePart, directionId });
      });
    });
  return routes;
};

export const parseConfig = (env: EnvInput): AppConfig => ({
  port: parsePositiveNumber(env.PORT, DEFAULT_PORT),
  metlinkApiBaseUrl: parseOptionalString(env.METLINK_API_BASE_URL) ?? DEFAULT_METLINK_BASE_URL,
  metlinkApiKey: parseOptionalString(env.METLINK_API_KEY),
  redisUrl: parseOptionalString(env.REDIS_URL),
  logLevel: normalizeLogLevel(env.LOG_LEVEL),
  metlinkRateLimitWindowMs: parsePositiveNumber(
    env.METLINK_RATE_LIMIT_WINDOW_MS,
    DEFAULT_METLINK_RATE_LIMIT_WINDOW_MS,
  ),
  metlinkRateLimitMaxRequests: parsePositiveNumber(
    env.METLINK_RATE_LIMIT_MAX_REQUESTS,
    DEFAULT_METLINK_RATE_LIMIT_MAX_REQUESTS,
  ),
  metlinkMaxRetries: parsePositiveNumber(env.METLINK_MAX_RETRIES, DEFAULT_METLINK_MAX_RETRIES),
  metlinkRetryBaseDelayMs: parsePositiveNumber(
    env.METLINK_RETRY_BASE_DELAY_MS,
    DEFAULT_METLINK_RETRY_BASE_DELAY_MS,
  ),
  metlinkRetryMaxDelayMs: parsePositiveNumber(
    env.METLINK_RETRY_MAX_DELAY_MS,
    DEFAULT_METLINK_RETRY_MAX_DELAY_MS,
  ),
  requestTimeoutMs: parsePositiveNumber(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
  predictionConcurrency: Math.floor(
    parsePositiveNumber(env.PREDICTION_CONCURRENCY, DEFAULT_PREDICTION_CONCURRENCY),
  ),
  catalogTtlMs: parsePositiveNumber(env.CATALOG_TTL_MINUTES, DEFAULT_CATALOG_TTL_MINUTES) * 60_000,
  stopPatternTtlMs:
    parsePositiveNumber(env.STOP_PATTERN_TTL_MINUTES, DEFAULT_STOP_PATTERN_TTL_MINUTES) * 60_000,
  pollIntervalMs: parsePositiveNumber(env.POLL_INTERVAL_SECONDS, DEFAULT_POLL_INTERVAL_SECONDS) * 1000,
  watchedRoutes: parseWatchedRoutes(env.WATCH_ROUTES),
  agencyTimeZone: parseOptionalString(env.AGENCY_TIMEZONE) ?? DEFAULT_AGENCY_TIMEZONE,
  serviceDayRolloverHour: parseHour(env.SERVICE_DAY_ROLLOVER_HOUR, DEFAULT_SERVICE_DAY_ROLLOVER_HOUR),
});

export const config: AppConfig = parseConfig(process.env);
