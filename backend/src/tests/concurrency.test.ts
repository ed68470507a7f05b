import test from "node:test";
import assert from "node:assert/strict";
import { settleWithConcurrency } from "../utils/concurrency";

const tick = () => new Promise((resolve) => setImmediate(resolve));

test("settleWithConcurrency keeps input order and never exceeds the limit", async () => {
  let active = 0;
  let peak = 0;
  const results = await settleWithConcurrency([5, 1, 4, 2, 3], 2, async (value) => {
    active += 1;
    peak = Math.max(peak, active);
    for (let i = 0; i < value; i += 1) await tick();
    active -= 1;
    return value * 10;
  });

  assert.equal(peak, 2);
  assert.deepEqual(
    results.map((result) => (result.status === "fulfilled" ? result.value : null)),
    [50, 10, 40, 20, 30],
  );
});

test("settleWithConcurrency records failures without stopping other items", async () => {
  const results = await settleWithConcurrency(["a", "b", "c"], 3, async (value) => {
    await tick();
    if (value === "b") throw new Error("boom");
    return value.toUpperCase();
  });

  assert.deepEqual(results[0], { status: "fulfilled", value: "A" });
  assert.equal(results[1]?.status, "rejected");
  assert.deepEqual(results[2], { status: "fulfilled", value: "C" });
});

test("settleWithConcurrency rejects items not yet started once aborted", async () => {
  const controller = new AbortController();
  const started: number[] = [];
  const results = await settleWithConcurrency(
    [1, 2, 3],
    1,
    async (value) => {
      started.push(value);
      controller.abort(new Error("stopped"));
      return value;
    },
    controller.signal,
  );

  assert.deepEqual(started, [1]);
  assert.equal(results[0]?.status, "fulfilled");
  const rejected = results[1];
  assert.ok(rejected?.status === "rejected" && rejected.reason instanceof Error);
  assert.equal(rejected.reason.message, "stopped");
});

test("settleWithConcurrency handles an empty list", async () => {
  assert.deepEqual(await settleWithConcurrency([], 4, async () => 1), []);
});
