export type Settled<T> = { status: "fulfilled"; value: T } | { status: "rejected"; reason: unknown };

/**
 * Runs `task` over `items` with at most `limit` tasks in flight, collecting a
 * settled result per item in input order. A rejected task never stops the
 * others; an aborted `signal` stops workers from picking up new items.
 */
export const settleWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<R>[]> => {
  const results: Settled<R>[] = new Array(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));

  const worker = async () => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      if (signal?.aborted) {
        results[next.index] = { status: "rejected", reason: signal.reason };
        continue;
      }
      try {
        results[next.index] = { status: "fulfilled", value: await task(next.item, next.index) };
      } catch (reason) {
        results[next.index] = { status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
};
