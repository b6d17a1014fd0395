import type { AnimalMapping, AnimalRecord, AnimalValue } from "./types.js";

export type FieldPath = string | readonly string[];

function toSegments(path: FieldPath): string[] {
  const segments = typeof path === "string" ? path.split(".") : [...path];
  return segments.filter((segment) => segment.length > 0);
}

export function isMapping(value: AnimalValue | undefined): value is AnimalMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walks `path` through nested mappings. Any missing key, or an intermediate
 * value that is not a mapping, yields `fallback`.
 */
export function readPath(record: AnimalRecord, path: FieldPath, fallback: AnimalValue = ""): AnimalValue {
  const segments = toSegments(path);
  if (segments.length === 0) {
    return fallback;
  }
  let current: AnimalValue = record;
  for (const segment of segments) {
    if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return fallback;
    }
    current = current[segment];
  }
  return current;
}

export function readString(record: AnimalRecord, path: FieldPath): string {
  const value = readPath(record, path);
  return typeof value === "string" ? value : "";
}

export function readMapping(record: AnimalRecord, path: FieldPath): AnimalMapping {
  const value = readPath(record, path, {});
  return isMapping(value) ? value : {};
}

export function readFirst(record: AnimalRecord, path: FieldPath): string {
  const value = readPath(record, path, []);
  if (!Array.isArray(value)) {
    return "";
  }
  return value[0] ?? "";
}
