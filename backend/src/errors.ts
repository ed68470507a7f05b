import type { DirectionId } from "@route-timeline/core";

export class MetlinkApiError extends Error {
  readonly path: string;
  readonly status: number | null;

  constructor(message: string, path: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MetlinkApiError";
    this.path = path;
    this.status = status;
  }
}

/**
 * Raised when a route timeline cannot be built at all because its stop
 * pattern is unavailable. Everything else degrades into lower-fidelity output.
 */
export class StructuralFailure extends Error {
  readonly routeId: string;
  readonly directionId: DirectionId;

  constructor(routeId: string, directionId: DirectionId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StructuralFailure";
    this.routeId = routeId;
    this.directionId = directionId;
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
