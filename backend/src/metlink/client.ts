import { config } from "../config";
import { MetlinkApiError } from "../errors";
import { errorMessage, logger } from "../utils/logger";

const log = logger.child({ component: "metlink" });

type QueryValue = string | number | boolean;
type QueryParams = Record<string, QueryValue | QueryValue[]>;

export interface RequestOptions {
  signal?: AbortSignal | undefined;
}

/** The slice of the upstream API the timeline pipeline depends on. */
export interface MetlinkSource {
  getRoutes(options?: RequestOptions): Promise<unknown>;
  getStops(options?: RequestOptions): Promise<unknown>;
  getTrips(options?: RequestOptions): Promise<unknown>;
  getStopTimes(tripId: string, options?: RequestOptions): Promise<unknown>;
  getStopPredictions(stopId: string, options?: RequestOptions): Promise<unknown>;
  getTripUpdates(options?: RequestOptions): Promise<unknown>;
}

export const METLINK_ENDPOINTS = {
  agency: "/gtfs/agency",
  routes: "/gtfs/routes",
  stops: "/gtfs/stops",
  trips: "/gtfs/trips",
  stopTimes: "/gtfs/stop_times",
  tripUpdates: "/gtfs-rt/tripupdates",
  stopPredictions: "/stop-predictions",
} as const;

interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

export interface MetlinkTelemetry {
  totalRequests: number;
  retryableResponses: number;
  failedRequests: number;
  timeouts: number;
  totalRateLimitDelayMs: number;
  rateLimitDelayCount: number;
  last429At: string | null;
  lastFailureAt: string | null;
  lastFailureMessage: string | null;
  lastFailurePath: string | null;
  lastSuccessAt: string | null;
  lastSuccessPath: string | null;
}

const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const abortReason = (signal: AbortSignal): unknown =>
  signal.reason ?? Object.assign(new Error("The operation was aborted"), { name: "AbortError" });

const delay = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Settles with `promise`, or rejects with the signal's reason once it aborts. */
const untilAborted = <T>(promise: Promise<T>, signal: AbortSignal) =>
  new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });

interface UpstreamReply {
  status: number;
  statusText: string;
  ok: boolean;
  body: string;
}

export interface MetlinkClientOptions {
  baseUrl?: string;
  apiKey?: string | undefined;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  rateLimit?: RateLimitConfig;
}

export class MetlinkClient implements MetlinkSource {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly rateLimit: RateLimitConfig;
  private readonly requestTimestamps: number[] = [];
  private readonly telemetry: MetlinkTelemetry = {
    totalRequests: 0,
    retryableResponses: 0,
    failedRequests: 0,
    timeouts: 0,
    totalRateLimitDelayMs: 0,
    rateLimitDelayCount: 0,
    last429At: null,
    lastFailureAt: null,
    lastFailureMessage: null,
    lastFailurePath: null,
    lastSuccessAt: null,
    lastSuccessPath: null,
  };

  constructor(options: MetlinkClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.metlinkApiBaseUrl).replace(/\/+$/, "");
    this.apiKey = options.apiKey ?? config.metlinkApiKey;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.metlinkMaxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? config.metlinkRetryBaseDelayMs;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? config.metlinkRetryMaxDelayMs;
    this.rateLimit = options.rateLimit ?? {
      windowMs: config.metlinkRateLimitWindowMs,
      maxRequests: config.metlinkRateLimitMaxRequests,
    };
  }

  getTelemetry() {
    const averageDelay =
      this.telemetry.rateLimitDelayCount === 0
        ? 0
        : this.telemetry.totalRateLimitDelayMs / this.telemetry.rateLimitDelayCount;
    return {
      ...this.telemetry,
      averageRateLimitDelayMs: Math.round(averageDelay),
    };
  }

  async validateApiKey(options?: RequestOptions): Promise<boolean> {
    try {
      await this.getAgencies(options);
      return true;
    } catch (error) {
      if (error instanceof MetlinkApiError) {
        log.warn("Metlink API key validation failed", { message: error.message, status: error.status });
        return false;
      }
      throw error;
    }
  }

  async getAgencies(options?: RequestOptions) {
    return this.get(METLINK_ENDPOINTS.agency, undefined, options);
  }

  async getRoutes(options?: RequestOptions) {
    return this.get(METLINK_ENDPOINTS.routes, undefined, options);
  }

  async getStops(options?: RequestOptions) {
    return this.get(METLINK_ENDPOINTS.stops, undefined, options);
  }

  async getTrips(options?: RequestOptions) {
    return this.get(METLINK_ENDPOINTS.trips, undefined, options);
  }

  async getStopTimes(tripId: string, options?: RequestOptions) {
    const trimmed = tripId.trim();
    if (!trimmed) {
      throw new MetlinkApiError("stop_times requires a trip_id", METLINK_ENDPOINTS.stopTimes, 400);
    }
    return this.get(METLINK_ENDPOINTS.stopTimes, { trip_id: trimmed }, options);
  }

  async getStopPredictions(stopId: string, options?: RequestOptions) {
    return this.get(METLINK_ENDPOINTS.stopPredictions, { stop_id: stopId }, options);
  }

  async getTripUpdates(options?: RequestOptions) {
    return this.get(METLINK_ENDPOINTS.tripUpdates, undefined, options);
  }

  private async get(path: string, params?: QueryParams, options: RequestOptions = {}): Promise<unknown> {
    await this.acquireRateLimitSlot(path, options.signal);

    const searchParams = this.buildSearchParams(params);
    const url = `${this.baseUrl}${path}${searchParams ? `?${searchParams}` : ""}`;

    const headers = new Headers({ accept: "application/json" });
    if (this.apiKey) {
      headers.set("x-api-key", this.apiKey);
    }

    const reply = await this.fetchWithRetry(url, path, { headers }, options.signal);
    try {
      const payload: unknown = JSON.parse(reply.body);
      return payload;
    } catch (error) {
      const invalid = new MetlinkApiError(`Invalid JSON from ${path}: ${errorMessage(error)}`, path, reply.status, {
        cause: error,
      });
      this.recordFailure(invalid, path);
      throw invalid;
    }
  }

  /** One attempt, body included; the timeout and caller abort cover the whole exchange. */
  private async fetchOnce(url: string, path: string, init: RequestInit, signal?: AbortSignal): Promise<UpstreamReply> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new MetlinkApiError(`Request timed out after ${this.timeoutMs}ms`, path));
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort(signal ? abortReason(signal) : undefined);
    signal?.addEventListener("abort", forwardAbort, { once: true });
    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const body = await untilAborted(
        response.ok ? response.text() : response.text().catch(() => ""),
        controller.signal,
      );
      return { status: response.status, statusText: response.statusText, ok: response.ok, body };
    } catch (error) {
      if (controller.signal.aborted && controller.signal.reason instanceof MetlinkApiError) {
        this.telemetry.timeouts += 1;
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async fetchWithRetry(
    url: string,
    path: string,
    init: RequestInit,
    signal?: AbortSignal,
  ): Promise<UpstreamReply> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt <= this.maxRetries) {
      try {
        const reply = await this.fetchOnce(url, path, init, signal);
        this.telemetry.totalRequests += 1;
        if (reply.ok) {
          this.telemetry.lastSuccessAt = new Date().toISOString();
          this.telemetry.lastSuccessPath = path;
          return reply;
        }

        const statusError = new MetlinkApiError(
          `Metlink request failed (${reply.status} ${reply.statusText}) for ${path}${reply.body ? ` - ${reply.body.slice(0, 180)}` : ""}`,
          path,
          reply.status,
        );
        if (!RETRYABLE_STATUSES.has(reply.status) || attempt === this.maxRetries) {
          this.recordFailure(statusError, path);
          throw statusError;
        }

        this.recordRetryableResponse(reply.status);
        lastError = statusError;
        const waitMs = this.computeBackoff(attempt);
        log.warn("Metlink request hit retryable status, backing off", {
          path,
          status: reply.status,
          attempt,
          waitMs,
        });
        await delay(waitMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        if (error instanceof MetlinkApiError && error.status !== null) {
          throw error;
        }
        lastError = error;
        if (attempt === this.maxRetries) {
          break;
        }
        this.recordRetryableResponse(undefined);
        const waitMs = this.computeBackoff(attempt);
        log.warn("Metlink request failed, retrying", {
          path,
          attempt,
          waitMs,
          message: errorMessage(error),
        });
        await delay(waitMs, signal);
      }
      attempt += 1;
    }

    const exhausted = new MetlinkApiError(
      `Metlink request exhausted retries for ${path}: ${errorMessage(lastError)}`,
      path,
      null,
      { cause: lastError },
    );
    this.recordFailure(exhausted, path);
    throw exhausted;
  }

  private async acquireRateLimitSlot(path: string, signal?: AbortSignal) {
    while (true) {
      const now = Date.now();
      while (this.requestTimestamps.length > 0) {
        const oldest = this.requestTimestamps[0];
        if (oldest !== undefined && now - oldest >= this.rateLimit.windowMs) {
          this.requestTimestamps.shift();
          continue;
        }
        break;
      }

      const oldest = this.requestTimestamps[0];
      const waitMs =
        this.requestTimestamps.length >= this.rateLimit.maxRequests && oldest !== undefined
          ? Math.max(0, this.rateLimit.windowMs - (now - oldest))
          : 0;

      if (waitMs <= 0) {
        this.requestTimestamps.push(now);
        return;
      }

      log.debug("Metlink rate limit in effect, delaying request", {
        path,
        waitMs,
        pending: this.requestTimestamps.length,
      });
      this.telemetry.totalRateLimitDelayMs += waitMs;
      this.telemetry.rateLimitDelayCount += 1;
      await delay(waitMs, signal);
    }
  }

  private computeBackoff(attempt: number) {
    const cappedAttempt = Math.min(attempt, 10);
    const delayMs = Math.min(this.retryMaxDelayMs, this.retryBaseDelayMs * 2 ** cappedAttempt);
    const jitter = Math.floor(Math.random() * 0.3 * delayMs);
    return delayMs + jitter;
  }

  private recordRetryableResponse(status: number | undefined) {
    this.telemetry.retryableResponses += 1;
    if (status === 429) {
      this.telemetry.last429At = new Date().toISOString();
    }
  }

  private recordFailure(error: unknown, path: string) {
    this.telemetry.failedRequests += 1;
    this.telemetry.lastFailureAt = new Date().toISOString();
    this.telemetry.lastFailureMessage = errorMessage(error);
    this.telemetry.lastFailurePath = path;
  }

  private buildSearchParams(params?: QueryParams) {
    if (!params) return "";
    const searchParams = new URLSearchParams();
    Object.entries(params).forEach(([key, value]) => {
      if (Array.isArray(value)) {
        value.forEach((entry) => searchParams.append(key, String(entry)));
        return;
      }
      searchParams.set(key, String(value));
    });
    return searchParams.toString();
  }
}

export const createMetlinkClient = () => {
  const options: MetlinkClientOptions = {
    baseUrl: config.metlinkApiBaseUrl,
  };

  if (config.metlinkApiKey) {
    options.apiKey = config.metlinkApiKey;
  } else {
    log.warn("METLINK_API_KEY is not set; upstream requests will be rejected");
  }

  return new MetlinkClient(options);
};
