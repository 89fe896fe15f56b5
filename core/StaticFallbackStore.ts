// Filename: core/StaticFallbackStore.ts

import { readFile, stat } from "fs/promises";
import { join } from "path";
import type { EndpointMapping } from "../config/configEndpointSources.js";
import { mapEndpoints, type EndpointName } from "../constants/EndpointNames.js";
import { parseCsvBuffer } from "../features/fallback/csvTable.js";
import { log, INFO, TMI, WARN } from "../utils/log.js";
import { BoundedResultCache, type BoundedResultCacheStats } from "./BoundedResultCache.js";
import type { CacheStatistics } from "./CacheStatistics.js";
import type { TableRecord } from "./types.js";

// Static Fallback specific emoji
const LOG_EMOJI = "🗄️";

const DEFAULT_SUB_OPTION = "default";

/**
 * Read-only source of last-resort records.
 */
export interface StaticFallbackSource {
  lookup(endpoint: EndpointName, subOption?: string): Promise<TableRecord | null>;
}

export interface StaticFallbackStoreOptions {
  directory: string;
  mapping: EndpointMapping;
  maxSize?: number;
  ttlSeconds?: number;
  statistics?: CacheStatistics;
  now?: () => number;
}

export type InventoryStatus = "valid" | "partial" | "invalid";

export interface SourceCheck {
  subOption: string;
  file: string;
  present: boolean;
  parseable: boolean;
  rows: number;
  error?: string;
}

export interface EndpointInventory {
  status: InventoryStatus;
  sources: SourceCheck[];
}

export interface InventoryReport {
  overallStatus: InventoryStatus;
  directory: string;
  endpoints: Record<EndpointName, EndpointInventory>;
  missingSources: string[];
  validatedAt: string;
}

interface CachedSource {
  record: TableRecord;
  mtimeMs: number;
}

function summarize(total: number, good: number): InventoryStatus {
  if (good === total) return "valid";
  return good === 0 ? "invalid" : "partial";
}

function countRows(record: TableRecord): number {
  return record.body.length + record.footer.length;
}

/**
 * Serves pre-baked records from CSV files, keyed by (endpoint, sub-option),
 * through a bounded LRU+TTL result cache. Failures read as absent and are logged.
 */
export class StaticFallbackStore implements StaticFallbackSource {
  private readonly cache: BoundedResultCache<CachedSource>;
  private readonly inFlight = new Map<string, Promise<TableRecord | null>>();
  private readonly directory: string;
  private readonly mapping: EndpointMapping;
  private readonly statistics?: CacheStatistics;

  constructor(options: StaticFallbackStoreOptions) {
    this.directory = options.directory;
    this.mapping = options.mapping;
    this.statistics = options.statistics;
    this.cache = new BoundedResultCache<CachedSource>({
      maxSize: options.maxSize ?? 100,
      ttlMs: Math.max(60, options.ttlSeconds ?? 3600) * 1000,
      now: options.now,
      onEvict: (key, reason) => {
        log(`${LOG_EMOJI} Static cache: evicted ${key} (${reason})`, TMI);
        this.statistics?.recordEviction(reason);
      },
    });
  }

  /**
   * Resolves a sub-option to its mapping key: exact match, then case-insensitive,
   * else the endpoint default.
   */
  public resolveSubOption(endpoint: EndpointName, subOption?: string): { key: string; file: string } {
    const sources = this.mapping[endpoint];
    if (subOption) {
      const exact = sources.subOptions[subOption];
      if (exact !== undefined) return { key: subOption, file: exact };
      const wanted = subOption.toLowerCase();
      for (const [name, file] of Object.entries(sources.subOptions)) {
        if (name.toLowerCase() === wanted) return { key: name, file };
      }
    }
    return { key: DEFAULT_SUB_OPTION, file: sources.default };
  }

  /**
   * Looks up the record for an endpoint and optional sub-option.
   * @returns the parsed record, or null when the source is missing, empty or malformed
   */
  public async lookup(endpoint: EndpointName, subOption?: string): Promise<TableRecord | null> {
    const { key: resolved, file } = this.resolveSubOption(endpoint, subOption);
    const cacheKey = `${endpoint}:${resolved}`;
    const path = join(this.directory, file);

    const cached = this.cache.get(cacheKey);
    if (cached) {
      const mtimeMs = await this.readMtime(path);
      if (mtimeMs !== null && mtimeMs === cached.mtimeMs) {
        log(`${LOG_EMOJI} Static cache: hit for ${cacheKey}`, TMI);
        return cached.record;
      }
      log(`${LOG_EMOJI} Static cache: ${file} changed or vanished, reloading ${cacheKey}`, INFO);
      this.cache.delete(cacheKey);
    }

    const pending = this.inFlight.get(cacheKey);
    if (pending) return pending;

    const load = this.load(cacheKey, path).finally(() => {
      this.inFlight.delete(cacheKey);
    });
    this.inFlight.set(cacheKey, load);
    return load;
  }

  /**
   * Checks every mapped source for presence and parseability without touching the cache.
   */
  public async validateInventory(): Promise<InventoryReport> {
    const parsedByFile = new Map<string, Promise<SourceCheck>>();
    const check = (subOption: string, file: string): Promise<SourceCheck> => {
      let result = parsedByFile.get(file);
      if (!result) {
        result = this.checkSource(file);
        parsedByFile.set(file, result);
      }
      return result.then((source) => ({ ...source, subOption }));
    };

    const endpoints = await mapEndpoints(async (endpoint): Promise<EndpointInventory> => {
      const sources = this.mapping[endpoint];
      const checks = await Promise.all([
        check(DEFAULT_SUB_OPTION, sources.default),
        ...Object.entries(sources.subOptions).map(([name, file]) => check(name, file)),
      ]);
      const good = checks.filter((source) => source.parseable).length;
      return { status: summarize(checks.length, good), sources: checks };
    });

    const checked = await Promise.all(parsedByFile.values());
    const missingSources = checked.filter((source) => !source.present).map((source) => source.file).sort();
    const parseableFiles = checked.filter((source) => source.parseable).length;

    return {
      overallStatus: summarize(checked.length, parseableFiles),
      directory: this.directory,
      endpoints,
      missingSources,
      validatedAt: new Date().toISOString(),
    };
  }

  /**
   * True when at least one mapped source file exists. Uses `stat` only; whether the
   * files parse is left to `validateInventory`.
   */
  public async isAvailable(): Promise<boolean> {
    const files = new Set<string>();
    for (const sources of Object.values(this.mapping)) {
      files.add(sources.default);
      for (const file of Object.values(sources.subOptions)) files.add(file);
    }
    const mtimes = await Promise.all([...files].map((file) => this.readMtime(join(this.directory, file))));
    return mtimes.some((mtimeMs) => mtimeMs !== null);
  }

  public clearCache(): number {
    const removed = this.cache.clear();
    log(`${LOG_EMOJI} Static cache: cleared ${removed} entries`, INFO);
    return removed;
  }

  public cacheStats(): BoundedResultCacheStats & { keys: string[] } {
    return { ...this.cache.stats(), keys: this.cache.keys() };
  }

  private async load(cacheKey: string, path: string): Promise<TableRecord | null> {
    try {
      const mtimeMs = await this.readMtime(path);
      if (mtimeMs === null) {
        log(`${LOG_EMOJI} Static source missing: ${path}`, WARN);
        return null;
      }
      const record = parseCsvBuffer(await readFile(path));
      if (!record) {
        log(`${LOG_EMOJI} Static source has no data rows: ${path}`, WARN);
        return null;
      }
      this.cache.set(cacheKey, { record, mtimeMs });
      log(`${LOG_EMOJI} Static source loaded: ${path} (${countRows(record)} rows)`, INFO);
      return record;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log(`${LOG_EMOJI} Static source unreadable: ${path}: ${message}`, WARN);
      return null;
    }
  }

  private async checkSource(file: string): Promise<SourceCheck> {
    const path = join(this.directory, file);
    const mtimeMs = await this.readMtime(path);
    if (mtimeMs === null) {
      return { subOption: DEFAULT_SUB_OPTION, file, present: false, parseable: false, rows: 0, error: "file not found" };
    }
    try {
      const record = parseCsvBuffer(await readFile(path));
      if (!record) {
        return { subOption: DEFAULT_SUB_OPTION, file, present: true, parseable: false, rows: 0, error: "no data rows" };
      }
      return { subOption: DEFAULT_SUB_OPTION, file, present: true, parseable: true, rows: countRows(record) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { subOption: DEFAULT_SUB_OPTION, file, present: true, parseable: false, rows: 0, error: message };
    }
  }

  private async readMtime(path: string): Promise<number | null> {
    try {
      const info = await stat(path);
      return info.isFile() ? info.mtimeMs : null;
    } catch (error) {
      log(`${LOG_EMOJI} stat failed for ${path}: ${error instanceof Error ? error.message : String(error)}`, TMI);
      return null;
    }
  }
}
