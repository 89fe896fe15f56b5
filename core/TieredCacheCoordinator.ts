// Filename: core/TieredCacheCoordinator.ts

import type { EndpointName } from "../constants/EndpointNames.js";
import type { Provenance } from "../constants/Provenance.js";
import { buildCacheKey, getTierKey, getTierPattern, type VolatileTier } from "../services/CacheKeyService.js";
import { log, ERR, INFO, LOG, TMI, WARN } from "../utils/log.js";
import type { CacheStatistics, TierName } from "./CacheStatistics.js";
import type { StaticFallbackSource } from "./StaticFallbackStore.js";
import { isCachedData, type CacheEntry, type CachedData, type RequestParams, type TableRecord } from "./types.js";
import type { StoreCountResult, VolatileStoreClient } from "./VolatileStoreClient.js";

// Coordinator specific emoji
const LOG_EMOJI = "🧭";

// --- Live fetch contract ---

export type FetchErrorKind = "network" | "http" | "parse" | "timeout" | "aborted";

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  /** Upstream HTTP status, for `http` errors */
  status?: number;
}

export type FetchResult = { ok: true; record: TableRecord } | { ok: false; error: FetchError };

/**
 * Produces a freshly scraped record for the request being resolved.
 * Should honour `signal`; expected failures are returned, not thrown.
 */
export type LiveFetch = (signal: AbortSignal) => Promise<FetchResult>;

// --- Resolution steps ---

/** Fixed resolution order. */
export const RESOLUTION_STEPS = ["SHORT_TERM", "LIVE_FETCH", "LONG_TERM", "STATIC_FALLBACK"] as const;
export type ResolutionStep = (typeof RESOLUTION_STEPS)[number];

export type AttemptOutcome = "hit" | "miss" | "unavailable" | "corrupt" | "failed";

export interface TierAttempt {
  step: ResolutionStep;
  outcome: AttemptOutcome;
  detail?: string;
}

export interface Unavailable {
  endpoint: EndpointName;
  key: string;
  attempts: TierAttempt[];
}

export type ResolveResult =
  | { ok: true; entry: CacheEntry; attempts: TierAttempt[] }
  | { ok: false; unavailable: Unavailable };

export interface ResolveOptions {
  /** Caller cancellation; aborts the live fetch */
  signal?: AbortSignal;
}

export interface TieredCacheCoordinatorOptions {
  store: VolatileStoreClient;
  staticStore: StaticFallbackSource;
  statistics: CacheStatistics;
  shortTtlSeconds?: number;
  longTtlSeconds?: number;
  fetchTimeoutMs?: number;
  now?: () => number;
}

export interface ClearTierReport {
  tier: VolatileTier;
  pattern: string;
  result: StoreCountResult;
}

type StepResult = { hit: CacheEntry } | { hit: null; outcome: AttemptOutcome; detail?: string };

function assertNever(step: never): never {
  throw new Error(`Unhandled resolution step: ${String(step)}`);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves a request through short-term tier → live fetch → long-term tier → static files,
 * returning the first success tagged with its provenance. Missing or failing tiers are
 * never fatal; only exhausting every step yields `Unavailable`.
 */
export class TieredCacheCoordinator {
  private readonly store: VolatileStoreClient;
  private readonly staticStore: StaticFallbackSource;
  private readonly statistics: CacheStatistics;
  private readonly shortTtlSeconds: number;
  private readonly longTtlSeconds: number;
  private readonly fetchTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: TieredCacheCoordinatorOptions) {
    this.store = options.store;
    this.staticStore = options.staticStore;
    this.statistics = options.statistics;
    this.shortTtlSeconds = options.shortTtlSeconds ?? 300;
    this.longTtlSeconds = options.longTtlSeconds ?? 2592000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
    this.now = options.now ?? Date.now;
  }

  public get ttls(): { shortTermSeconds: number; longTermSeconds: number } {
    return { shortTermSeconds: this.shortTtlSeconds, longTermSeconds: this.longTtlSeconds };
  }

  /**
   * Resolves one request.
   * @param fetch - Live fetch for this request, invoked at most once
   */
  public async resolve(
    endpoint: EndpointName,
    params: RequestParams,
    fetch: LiveFetch,
    options: ResolveOptions = {}
  ): Promise<ResolveResult> {
    const key = buildCacheKey(endpoint, params);
    const attempts: TierAttempt[] = [];

    for (const step of RESOLUTION_STEPS) {
      const result = await this.runStep(step, endpoint, params, key, fetch, options.signal);
      if (result.hit !== null) {
        attempts.push({ step, outcome: "hit" });
        this.statistics.recordResolution(result.hit.provenance);
        log(`${LOG_EMOJI} Resolved ${key} from ${step} (${attempts.length} step(s))`, INFO);
        return { ok: true, entry: result.hit, attempts };
      }
      attempts.push({ step, outcome: result.outcome, detail: result.detail });
    }

    this.statistics.recordExhausted();
    log(`${LOG_EMOJI} ❌ Every tier exhausted for ${key}: ${attempts.map((a) => `${a.step}=${a.outcome}`).join(", ")}`, ERR);
    return { ok: false, unavailable: { endpoint, key, attempts } };
  }

  /**
   * Deletes volatile entries of one tier, optionally for a single endpoint.
   */
  public async clearTier(tier: VolatileTier, endpoint?: EndpointName): Promise<ClearTierReport> {
    const pattern = getTierPattern(tier, endpoint);
    const result = await this.store.deleteKeys(pattern);
    log(`${LOG_EMOJI} Clear ${pattern}: ${result.status === "ok" ? `${result.count} removed` : result.reason}`, LOG);
    return { tier, pattern, result };
  }

  private async runStep(
    step: ResolutionStep,
    endpoint: EndpointName,
    params: RequestParams,
    key: string,
    fetch: LiveFetch,
    signal: AbortSignal | undefined
  ): Promise<StepResult> {
    switch (step) {
      case "SHORT_TERM":
        return this.readVolatile("SHORT_TERM", key);
      case "LIVE_FETCH":
        return this.fetchLive(key, fetch, signal);
      case "LONG_TERM":
        return this.readVolatile("LONG_TERM", key);
      case "STATIC_FALLBACK":
        return this.readStatic(endpoint, params);
      default:
        return assertNever(step);
    }
  }

  private async readVolatile(tier: VolatileTier, key: string): Promise<StepResult> {
    const tierKey = getTierKey(tier, key);
    const read = await this.store.get(tierKey);

    if (read.status === "unavailable") {
      this.statistics.recordRead(tier, "unavailable");
      log(`${LOG_EMOJI} ⚠️ ${tier} tier unavailable for ${tierKey}: ${read.reason}`, WARN);
      return { hit: null, outcome: "unavailable", detail: read.reason };
    }
    if (read.status === "miss") {
      this.statistics.recordRead(tier, "miss");
      return { hit: null, outcome: "miss" };
    }

    const envelope = this.decode(read.value);
    if (!envelope) {
      this.statistics.recordRead(tier, "corrupt");
      log(`${LOG_EMOJI} ⚠️ ${tier} entry ${tierKey} does not decode, treating as miss`, WARN);
      return { hit: null, outcome: "corrupt", detail: "stored value is not a valid envelope" };
    }

    this.statistics.recordRead(tier, "hit");
    const provenance: Provenance = tier;
    return { hit: { payload: envelope.data, provenance, storedAt: envelope.timestamp } };
  }

  private async fetchLive(key: string, fetch: LiveFetch, signal: AbortSignal | undefined): Promise<StepResult> {
    const result = await this.fetchWithTimeout(fetch, signal);
    if (!result.ok) {
      this.statistics.recordFetch("failure");
      const { kind, message } = result.error;
      log(`${LOG_EMOJI} Live fetch failed for ${key} (${kind}): ${message}`, kind === "aborted" ? LOG : WARN);
      return { hit: null, outcome: "failed", detail: `${kind}: ${message}` };
    }

    this.statistics.recordFetch("success");
    const storedAt = this.now();
    await this.writeThrough(key, { data: result.record, timestamp: storedAt });
    return { hit: { payload: result.record, provenance: "FRESH", storedAt } };
  }

  private async readStatic(endpoint: EndpointName, params: RequestParams): Promise<StepResult> {
    const subOption = params.sub_option;
    const record = await this.staticStore.lookup(
      endpoint,
      subOption === null || subOption === undefined ? undefined : String(subOption)
    );
    const tier: TierName = "STATIC_FALLBACK";
    if (!record) {
      this.statistics.recordRead(tier, "miss");
      return { hit: null, outcome: "miss", detail: "no static source for request" };
    }
    this.statistics.recordRead(tier, "hit");
    return { hit: { payload: record, provenance: "STATIC_FALLBACK", storedAt: this.now() } };
  }

  /**
   * Runs the live fetch with a timeout and the caller's signal linked in.
   * Thrown errors become network failures; timeout and abort become their own kinds.
   */
  private async fetchWithTimeout(fetch: LiveFetch, callerSignal: AbortSignal | undefined): Promise<FetchResult> {
    if (callerSignal?.aborted) {
      return { ok: false, error: { kind: "aborted", message: "request cancelled before fetch" } };
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<FetchResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, error: { kind: "timeout", message: `no response within ${this.fetchTimeoutMs}ms` } });
      }, this.fetchTimeoutMs);
    });
    const cancelled = new Promise<FetchResult>((resolve) => {
      controller.signal.addEventListener(
        "abort",
        () => {
          if (callerSignal?.aborted) {
            resolve({ ok: false, error: { kind: "aborted", message: "request cancelled" } });
          }
        },
        { once: true }
      );
    });
    const attempt = Promise.resolve()
      .then(() => fetch(controller.signal))
      .catch((error: unknown): FetchResult => ({ ok: false, error: { kind: "network", message: describeError(error) } }));

    try {
      return await Promise.race([attempt, timeout, cancelled]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /**
   * Writes a fresh record to both volatile tiers. Failures are counted and logged only.
   */
  private async writeThrough(key: string, envelope: CachedData): Promise<void> {
    const serialized = JSON.stringify(envelope);
    const [shortOk, longOk] = await Promise.all([
      this.store.set(getTierKey("SHORT_TERM", key), serialized, this.shortTtlSeconds),
      this.store.set(getTierKey("LONG_TERM", key), serialized, this.longTtlSeconds),
    ]);
    this.statistics.recordWrite(shortOk);
    this.statistics.recordWrite(longOk);
    if (!shortOk || !longOk) {
      log(`${LOG_EMOJI} ⚠️ Write-through incomplete for ${key} (short=${shortOk}, long=${longOk})`, WARN);
    } else {
      log(`${LOG_EMOJI} Write-through stored ${key} in both tiers`, TMI);
    }
  }

  private decode(raw: string): CachedData | null {
    try {
      const parsed: unknown = JSON.parse(raw);
      return isCachedData(parsed) ? parsed : null;
    } catch (error) {
      log(`${LOG_EMOJI} Stored value is not JSON: ${describeError(error)}`, TMI);
      return null;
    }
  }
}
