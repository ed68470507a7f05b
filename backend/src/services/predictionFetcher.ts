import type { MetlinkSource, RequestOptions } from "../metlink/client";
import { parseStopPredictions } from "../metlink/parsers";
import type { Prediction, StopId } from "../models/domain";
import { settleWithConcurrency } from "../utils/concurrency";
import { errorMessage, logger } from "../utils/logger";
import { isAbortError } from "../errors";

export interface StopFetchFailure {
  stopId: StopId;
  message: string;
  timedOut: boolean;
}

export interface PredictionBatch {
  byStop: Map<StopId, Prediction[]>;
  failures: StopFetchFailure[];
  droppedRecords: number;
}

export interface PredictionFetcher {
  fetchAll(stopIds: Iterable<StopId>, options?: RequestOptions): Promise<PredictionBatch>;
}

export interface PredictionFetcherOptions {
  concurrency: number;
}

const DEFAULT_CONCURRENCY = 6;

/**
 * Fetches stop predictions through a bounded worker pool. Every requested stop
 * gets an entry; a stop whose request fails or times out gets an empty list
 * and a recorded failure instead of failing the batch.
 */
export const createPredictionFetcher = (
  source: Pick<MetlinkSource, "getStopPredictions">,
  options: Partial<PredictionFetcherOptions> = {},
): PredictionFetcher => {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));

  const fetchAll = async (stopIds: Iterable<StopId>, requestOptions: RequestOptions = {}) => {
    const uniqueStopIds = Array.from(new Set(stopIds));
    const { signal } = requestOptions;

    const results = await settleWithConcurrency(
      uniqueStopIds,
      concurrency,
      async (stopId) => parseStopPredictions(await source.getStopPredictions(stopId, { signal }), stopId),
      signal,
    );

    const byStop = new Map<StopId, Prediction[]>();
    const failures: StopFetchFailure[] = [];
    let droppedRecords = 0;

    results.forEach((result, index) => {
      const stopId = uniqueStopIds[index];
      if (stopId === undefined) return;
      if (result.status === "fulfilled") {
        byStop.set(stopId, result.value.records);
        droppedRecords += result.value.dropped.length;
        if (result.value.dropped.length > 0) {
          logger.debug("Dropped invalid prediction records", {
            stopId,
            dropped: result.value.dropped.length,
            reasons: Array.from(new Set(result.value.dropped.map((entry) => entry.reason))),
          });
        }
        return;
      }
      byStop.set(stopId, []);
      failures.push({
        stopId,
        message: errorMessage(result.reason),
        timedOut: isAbortError(result.reason) || /timed out/i.test(errorMessage(result.reason)),
      });
    });

    if (failures.length > 0 && !signal?.aborted) {
      logger.warn("Stop prediction requests failed; falling back for those stops", {
        failed: failures.length,
        total: uniqueStopIds.length,
        stopIds: failures.map((failure) => failure.stopId),
      });
    }

    return { byStop, failures, droppedRecords };
  };

  return { fetchAll };
};
