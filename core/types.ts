// Filename: core/types.ts

import type { EndpointName } from "../constants/EndpointNames.js";
import type { Provenance } from "../constants/Provenance.js";

/** One table row as a list of cell texts. */
export type TableRow = string[];

/** A top-level item row and the sub-item rows grouped under it. */
export interface TableBodyGroup {
  item_data: TableRow;
  sub_items: TableRow[];
}

/** Structured statistics table, as scraped or loaded from a static file. */
export interface TableRecord {
  header: TableRow[];
  body: TableBodyGroup[];
  footer: TableRow[];
}

/**
 * Resolved payload plus where it came from.
 * Created by the coordinator and never mutated afterwards.
 */
export interface CacheEntry {
  readonly payload: TableRecord;
  readonly provenance: Provenance;
  /** Epoch ms when the payload was produced or first stored */
  readonly storedAt: number;
}

/** Envelope written to the volatile store. */
export interface CachedData<T = TableRecord> {
  data: T;
  timestamp: number;
}

/** Request parameters as handed to the coordinator. */
export type RequestParams = Record<string, string | number | null | undefined>;

export interface StatisticsQuery {
  endpoint: EndpointName;
  year?: number;
  subOption?: string;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === "string");
}

function isRowList(value: unknown): value is TableRow[] {
  return Array.isArray(value) && value.every(isStringArray);
}

function isBodyGroup(value: unknown): value is TableBodyGroup {
  if (typeof value !== "object" || value === null) return false;
  if (!("item_data" in value) || !("sub_items" in value)) return false;
  return isStringArray(value.item_data) && isRowList(value.sub_items);
}

export function isTableRecord(value: unknown): value is TableRecord {
  if (typeof value !== "object" || value === null) return false;
  if (!("header" in value) || !("body" in value) || !("footer" in value)) return false;
  return (
    isRowList(value.header) &&
    Array.isArray(value.body) &&
    value.body.every(isBodyGroup) &&
    isRowList(value.footer)
  );
}

export function isCachedData(value: unknown): value is CachedData {
  if (typeof value !== "object" || value === null) return false;
  if (!("data" in value) || !("timestamp" in value)) return false;
  return typeof value.timestamp === "number" && isTableRecord(value.data);
}
