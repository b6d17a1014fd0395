import { group } from "d3-array";

import { readPath } from "./record.js";
import { type AnimalRecord, UNKNOWN_GROUP } from "./types.js";

export type AnimalGroups = Map<string, AnimalRecord[]>;

export function groupKeyOf(record: AnimalRecord, attribute: string, subAttribute?: string): string {
  const path = subAttribute ? [attribute, subAttribute] : [attribute];
  const value = readPath(record, path);
  return typeof value === "string" && value.length > 0 ? value : UNKNOWN_GROUP;
}

/**
 * Buckets records by `attribute` (narrowed by `subAttribute` when given).
 * Bucket order and the order of records inside each bucket follow the input.
 */
export function groupAnimals(records: readonly AnimalRecord[], attribute: string, subAttribute?: string): AnimalGroups {
  return group(records, (record) => groupKeyOf(record, attribute, subAttribute));
}

export function describeGroupPath(attribute: string, subAttribute?: string): string {
  const leaf = subAttribute || attribute;
  return leaf.replace(/_+/g, " ").trim();
}
