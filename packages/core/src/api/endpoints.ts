import type { RequestInitWithSignal } from "./types";
import type { DirectionId } from "../models/common";
import type { RouteSensorState, RouteTimeline } from "../models/timeline";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

const buildUrl = (baseUrl: string, path: string) =>
  new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`).toString();

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new Error(`Route timeline API request failed (${response.status})`);
  }
  return (await response.json()) as T;
};

const toInit = (init?: RequestInitWithSignal): RequestInit => ({ ...init });

export const fetchRouteTimeline = async (
  baseUrl: string,
  routeId: string,
  directionId: DirectionId,
  init?: RequestInitWithSignal,
): Promise<RouteTimeline> => {
  const url = buildUrl(
    baseUrl,
    `/api/routes/${encodeURIComponent(routeId)}/directions/${directionId}/timeline`,
  );
  const response = await fetch(url, toInit(init));
  return handleJson<RouteTimeline>(response);
};

export const fetchSensorStates = async (
  baseUrl: string,
  init?: RequestInitWithSignal,
): Promise<RouteSensorState[]> => {
  const url = buildUrl(baseUrl, "/api/sensors");
  const response = await fetch(url, toInit(init));
  const payload = await handleJson<{ sensors: RouteSensorState[] }>(response);
  return payload.sensors;
};

export const fetchSensorState = async (
  baseUrl: string,
  routeId: string,
  directionId: DirectionId,
  init?: RequestInitWithSignal,
): Promise<RouteSensorState> => {
  const url = buildUrl(baseUrl, `/api/sensors/${encodeURIComponent(routeId)}/${directionId}`);
  const response = await fetch(url, toInit(init));
  return handleJson<RouteSensorState>(response);
};
