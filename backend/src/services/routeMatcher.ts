import type { DirectionId } from "@route-timeline/core";
import type { RouteTarget } from "../models/domain";
import { toIdString } from "../utils/fields";

export type RouteMatchKind = "both" | "route_id" | "short_name";

/** Anything carrying the identifying fields of a prediction or trip update. */
export interface RouteTaggedRecord {
  routeId: unknown;
  routeShortName: unknown;
  directionId: DirectionId | null;
}

const normalizeShortName = (value: unknown): string | null => toIdString(value)?.toLowerCase() ?? null;

/**
 * Upstream alternates between populating the route id and the short name, and
 * sends ids as numbers or strings. Either identifier matching is enough; the
 * direction must match exactly.
 */
export const matchRoute = (record: RouteTaggedRecord, target: RouteTarget): RouteMatchKind | null => {
  if (record.directionId !== target.directionId) return null;

  const recordRouteId = toIdString(record.routeId);
  const targetRouteId = toIdString(target.routeId);
  const idMatches = recordRouteId !== null && recordRouteId === targetRouteId;

  const recordShortName = normalizeShortName(record.routeShortName);
  const targetShortName = normalizeShortName(target.routeShortName);
  const shortNameMatches = recordShortName !== null && recordShortName === targetShortName;

  if (idMatches && shortNameMatches) return "both";
  if (idMatches) return "route_id";
  if (shortNameMatches) return "short_name";
  return null;
};

export const matches = (record: RouteTaggedRecord, target: RouteTarget): boolean =>
  matchRoute(record, target) !== null;
