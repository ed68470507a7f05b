import type { DirectionId, RouteTimeline } from "@route-timeline/core";
import { createCatalogCache } from "../cache/catalogCache";
import { config } from "../config";
import { createMetlinkClient } from "../metlink/client";
import { createPredictionFetcher } from "../services/predictionFetcher";
import { createTimelineBuilder } from "../services/timelineBuilder";
import { toDirectionId } from "../utils/fields";
import { errorMessage } from "../utils/logger";

interface PrintTimelineArgs {
  routeId: string | null;
  directionIds: DirectionId[];
  json: boolean;
}

const parseArgs = (argv: string[]): PrintTimelineArgs => {
  const args: PrintTimelineArgs = {
    routeId: null,
    directionIds: [],
    json: false,
  };

  argv.forEach((arg) => {
    if (!arg.startsWith("--")) {
      args.routeId = args.routeId ?? arg.trim();
      return;
    }

    const [key, rawValue] = arg.slice(2).split("=");
    const value = rawValue ?? "";
    switch (key) {
      case "direction": {
        const directionId = toDirectionId(value.trim());
        if (directionId !== null) args.directionIds.push(directionId);
        break;
      }
      case "json":
        args.json = true;
        break;
      default:
        break;
    }
  });

  if (args.directionIds.length === 0) args.directionIds = [0, 1];
  return args;
};

const SOURCE_MARKERS: Record<string, string> = {
  realtime: "live",
  trip_update: "feed",
  scheduled: "sched",
  unknown: "?",
};

const formatTimeline = (timeline: RouteTimeline): string => {
  const lines = timeline.stops.map((stop) => {
    const flags = [stop.isDeparture ? "start" : "", stop.isDestination ? "end" : "", stop.isHub ? "hub" : ""]
      .filter(Boolean)
      .join(",");
    return [
      String(stop.sequence).padStart(3),
      stop.stopId.padEnd(8),
      stop.stopName.padEnd(40),
      stop.etaDisplay.padStart(9),
      (SOURCE_MARKERS[stop.timeSource] ?? stop.timeSource).padEnd(6),
      flags,
    ].join("  ");
  });

  const issues = timeline.enrichmentIssues.map(
    (issue) => `  ! [${issue.stage}]${issue.stopId ? ` ${issue.stopId}` : ""} ${issue.message}`,
  );

  return [
    `# ${timeline.summary}`,
    `Service date ${timeline.serviceDate}, generated ${timeline.generatedAt}`,
    ...lines,
    ...(issues.length > 0 ? ["Enrichment issues:", ...issues] : []),
    "",
  ].join("\n");
};

const main = async () => {
  const args = parseArgs(process.argv.slice(2));
  if (!args.routeId) {
    console.error("Usage: npm run timeline -- <routeId> [--direction=0|1] [--json]");
    process.exitCode = 1;
    return;
  }

  const client = createMetlinkClient();
  if (!(await client.validateApiKey())) {
    console.error("Metlink API key was rejected; set METLINK_API_KEY in .env");
    process.exitCode = 1;
    return;
  }

  const cache = createCatalogCache(client, {
    catalogTtlMs: config.catalogTtlMs,
    stopPatternTtlMs: config.stopPatternTtlMs,
  });
  const builder = createTimelineBuilder({
    catalog: cache,
    source: client,
    predictions: createPredictionFetcher(client, { concurrency: config.predictionConcurrency }),
    timeZone: config.agencyTimeZone,
    serviceDayRolloverHour: config.serviceDayRolloverHour,
  });

  for (const directionId of args.directionIds) {
    const timeline = await builder.build(args.routeId, directionId);
    console.log(args.json ? JSON.stringify(timeline, null, 2) : formatTimeline(timeline));
  }
};

main().catch((error) => {
  console.error("Failed to print route timeline:", errorMessage(error));
  process.exitCode = 1;
});
