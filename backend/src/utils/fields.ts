import type { DirectionId } from "@route-timeline/core";
import type { UpstreamRecord } from "../models/metlink";

export const isRecord = (value: unknown): value is UpstreamRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const ensureArray = <T>(value: T | T[] | null | undefined): T[] => {
  if (value == null) return [];
  return Array.isArray(value) ? value : [value];
};

/**
 * Normalizes an identifier that upstream may send as a number or a string.
 * `83`, `"83"` and `" 83 "` all become `"83"`; anything else becomes null.
 */
export const toIdString = (value: unknown): string | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
};

export const readId = (record: UpstreamRecord, key: string): string | null => toIdString(record[key]);

export const readString = (record: UpstreamRecord, key: string): string | null => {
  const value = record[key];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
};

export const readNumber = (record: UpstreamRecord, key: string): number | null => {
  const value = record[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const readRecord = (record: UpstreamRecord, key: string): UpstreamRecord | null => {
  const value = record[key];
  return isRecord(value) ? value : null;
};

export const toDirectionId = (value: unknown): DirectionId | null => {
  if (value === 0 || value === "0") return 0;
  if (value === 1 || value === "1") return 1;
  return null;
};

export const readDirection = (record: UpstreamRecord, key: string): DirectionId | null =>
  toDirectionId(typeof record[key] === "string" ? String(record[key]).trim() : record[key]);
