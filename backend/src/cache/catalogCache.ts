import type { DirectionId } from "@route-timeline/core";
import type { MetlinkSource } from "../metlink/client";
import { parseRoutes, parseStops, parseTrips, type ParseResult } from "../metlink/parsers";
import type { CatalogRoute, CatalogStop, CatalogTrip, StopPatternEntry } from "../models/domain";
import { loadStopPattern } from "../services/stopPattern";
import { logger } from "../utils/logger";
import { createNoopRedisManager, type RedisManager, type RedisStatus } from "./redisClient";

export interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
  ttlMs: number;
}

export type CatalogResourceKind = "routes" | "stops" | "trips" | "stopPattern";

export interface CatalogCacheHealth {
  redisStatus: RedisStatus;
  entries: Record<CatalogResourceKind, { total: number; fresh: number }>;
}

export interface CatalogCacheOptions {
  catalogTtlMs?: number;
  stopPatternTtlMs?: number;
  redis?: RedisManager;
  now?: () => number;
}

const DEFAULT_TTL_MS = 5 * 60_000;
const SINGLETON_KEY = "all";

const isFresh = (entry: CacheEntry<unknown>, now: number) => now - entry.fetchedAt < entry.ttlMs;

const isPersistedEntry = <T>(entry: CacheEntry<T> | null): entry is CacheEntry<T> =>
  entry !== null &&
  typeof entry === "object" &&
  typeof entry.fetchedAt === "number" &&
  typeof entry.ttlMs === "number" &&
  entry.value !== undefined;

/**
 * One TTL-bound store per resource kind. Expired entries count as absent and
 * are replaced wholesale on the next successful load; concurrent misses for a
 * key share the first caller's load; a failed load caches nothing.
 */
class TtlStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    private readonly kind: CatalogResourceKind,
    private readonly ttlMs: number,
    private readonly redis: RedisManager,
    private readonly now: () => number,
  ) {}

  resolve(key: string, loader: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && isFresh(entry, this.now())) {
      return Promise.resolve(entry.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const load = this.load(key, loader).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, load);
    return load;
  }

  stats(): { total: number; fresh: number } {
    const now = this.now();
    let fresh = 0;
    this.entries.forEach((entry) => {
      if (isFresh(entry, now)) fresh += 1;
    });
    return { total: this.entries.size, fresh };
  }

  private redisKey(key: string) {
    return `catalog:${this.kind}:${key}`;
  }

  private async load(key: string, loader: () => Promise<T>): Promise<T> {
    const persisted = await this.redis.getJson<CacheEntry<T>>(this.redisKey(key));
    if (isPersistedEntry(persisted) && isFresh(persisted, this.now())) {
      logger.debug("Catalog entry hydrated from Redis", { kind: this.kind, key });
      this.entries.set(key, persisted);
      return persisted.value;
    }

    const startedAt = this.now();
    const value = await loader();
    const entry: CacheEntry<T> = { value, fetchedAt: this.now(), ttlMs: this.ttlMs };
    this.entries.set(key, entry);
    await this.redis.setJson(this.redisKey(key), entry, this.ttlMs);
    logger.debug("Catalog entry refreshed", {
      kind: this.kind,
      key,
      durationMs: entry.fetchedAt - startedAt,
    });
    return value;
  }
}

const logDropped = <T>(kind: CatalogResourceKind, result: ParseResult<T>) => {
  if (result.dropped.length === 0) return result.records;
  logger.debug("Dropped invalid catalog records", {
    kind,
    dropped: result.dropped.length,
    kept: result.records.length,
    sample: result.dropped.slice(0, 3),
  });
  return result.records;
};

export class CatalogCache {
  private readonly routes: TtlStore<CatalogRoute[]>;
  private readonly stops: TtlStore<CatalogStop[]>;
  private readonly trips: TtlStore<CatalogTrip[]>;
  private readonly stopPatterns: TtlStore<StopPatternEntry[]>;
  private readonly redis: RedisManager;

  constructor(
    private readonly source: MetlinkSource,
    options: CatalogCacheOptions = {},
  ) {
    const now = options.now ?? Date.now;
    const catalogTtlMs = options.catalogTtlMs ?? DEFAULT_TTL_MS;
    const stopPatternTtlMs = options.stopPatternTtlMs ?? DEFAULT_TTL_MS;
    this.redis = options.redis ?? createNoopRedisManager();
    this.routes = new TtlStore("routes", catalogTtlMs, this.redis, now);
    this.stops = new TtlStore("stops", catalogTtlMs, this.redis, now);
    this.trips = new TtlStore("trips", catalogTtlMs, this.redis, now);
    this.stopPatterns = new TtlStore("stopPattern", stopPatternTtlMs, this.redis, now);
  }

  getRoutes(): Promise<CatalogRoute[]> {
    return this.routes.resolve(SINGLETON_KEY, async () =>
      logDropped("routes", parseRoutes(await this.source.getRoutes())),
    );
  }

  getStops(): Promise<CatalogStop[]> {
    return this.stops.resolve(SINGLETON_KEY, async () =>
      logDropped("stops", parseStops(await this.source.getStops())),
    );
  }

  getTrips(): Promise<CatalogTrip[]> {
    return this.trips.resolve(SINGLETON_KEY, async () =>
      logDropped("trips", parseTrips(await this.source.getTrips())),
    );
  }

  getStopPattern(routeId: string, directionId: DirectionId): Promise<StopPatternEntry[]> {
    return this.stopPatterns.resolve(`${routeId}:${directionId}`, () =>
      loadStopPattern(this, this.source, routeId, directionId),
    );
  }

  getHealth(): CatalogCacheHealth {
    return {
      redisStatus: this.redis.status,
      entries: {
        routes: this.routes.stats(),
        stops: this.stops.stats(),
        trips: this.trips.stats(),
        stopPattern: this.stopPatterns.stats(),
      },
    };
  }
}

export const createCatalogCache = (source: MetlinkSource, options: CatalogCacheOptions = {}) =>
  new CatalogCache(source, options);
