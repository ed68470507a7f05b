import test from "node:test";
import assert from "node:assert/strict";
import { CatalogCache, type CacheEntry } from "../cache/catalogCache";
import type { CatalogRoute } from "../models/domain";
import { createMemoryRedis, createRoute83Source, FakeMetlinkSource, ROUTE_83_TRIP } from "./fixtures";

const createClock = (start = 1_000_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

test("catalog entries are reused within the TTL and reloaded after it", async () => {
  const source = createRoute83Source();
  const clock = createClock();
  const cache = new CatalogCache(source, { catalogTtlMs: 60_000, now: clock.now });

  const first = await cache.getRoutes();
  clock.advance(59_999);
  await cache.getRoutes();
  assert.equal(source.calls.routes, 1);
  assert.deepEqual(
    first.map((route) => route.routeId),
    ["83", "2"],
  );

  clock.advance(1);
  await cache.getRoutes();
  assert.equal(source.calls.routes, 2);
});

test("concurrent misses share one upstream load", async () => {
  const source = createRoute83Source();
  const cache = new CatalogCache(source);

  const [a, b] = await Promise.all([cache.getTrips(), cache.getTrips()]);
  assert.equal(source.calls.trips, 1);
  assert.equal(a, b);
});

test("concurrent stop pattern requests fetch stop times once", async () => {
  const source = createRoute83Source();
  const cache = new CatalogCache(source);

  const [first, second] = await Promise.all([cache.getStopPattern("83", 0), cache.getStopPattern("83", 0)]);
  await cache.getStopPattern("83", 0);

  assert.deepEqual(source.calls.stopTimes, [ROUTE_83_TRIP]);
  assert.equal(first, second);
  assert.equal(first.length, 12);
});

test("a failed load is not cached", async () => {
  const source = new FakeMetlinkSource();
  source.routes = new Error("upstream down");
  const cache = new CatalogCache(source);

  await assert.rejects(cache.getRoutes(), { message: "upstream down" });
  source.routes = [{ route_id: "83", route_short_name: "83" }];
  const routes = await cache.getRoutes();

  assert.equal(source.calls.routes, 2);
  assert.equal(routes[0]?.shortName, "83");
});

test("entries persist to Redis and hydrate a fresh cache", async () => {
  const source = createRoute83Source();
  const clock = createClock();
  const { manager, store } = createMemoryRedis();

  const writer = new CatalogCache(source, { catalogTtlMs: 60_000, redis: manager, now: clock.now });
  await writer.getRoutes();
  assert.ok(store.has("catalog:routes:all"));

  const reader = new CatalogCache(source, { catalogTtlMs: 60_000, redis: manager, now: clock.now });
  clock.advance(1_000);
  const routes = await reader.getRoutes();
  assert.equal(source.calls.routes, 1);
  assert.equal(routes.length, 2);
});

test("an expired Redis entry is ignored", async () => {
  const source = createRoute83Source();
  const clock = createClock();
  const { manager } = createMemoryRedis();
  const stale: CacheEntry<CatalogRoute[]> = { value: [], fetchedAt: clock.now() - 120_000, ttlMs: 60_000 };
  await manager.setJson("catalog:routes:all", stale);

  const cache = new CatalogCache(source, { catalogTtlMs: 60_000, redis: manager, now: clock.now });
  const routes = await cache.getRoutes();

  assert.equal(source.calls.routes, 1);
  assert.equal(routes.length, 2);
});

test("getHealth reports totals and freshness per kind", async () => {
  const source = createRoute83Source();
  const clock = createClock();
  const cache = new CatalogCache(source, { catalogTtlMs: 10_000, stopPatternTtlMs: 60_000, now: clock.now });

  await cache.getStopPattern("83", 0);
  clock.advance(10_000);

  assert.deepEqual(cache.getHealth(), {
    redisStatus: "disabled",
    entries: {
      routes: { total: 0, fresh: 0 },
      stops: { total: 1, fresh: 0 },
      trips: { total: 1, fresh: 0 },
      stopPattern: { total: 1, fresh: 1 },
    },
  });
});
