// Filename: core/CacheStatistics.ts

import type { Provenance } from "../constants/Provenance.js";
import type { EvictionReason } from "./BoundedResultCache.js";

export type TierName = "SHORT_TERM" | "LONG_TERM" | "STATIC_FALLBACK";
export type ReadOutcome = "hit" | "miss" | "unavailable" | "corrupt";
export type FetchOutcome = "success" | "failure";

export interface TierCounters {
  hit: number;
  miss: number;
  unavailable: number;
  corrupt: number;
}

export interface CacheStatisticsSnapshot {
  tiers: Record<TierName, TierCounters>;
  fetches: Record<FetchOutcome, number>;
  writes: { succeeded: number; failed: number };
  resolutions: Record<Provenance, number>;
  exhausted: number;
  evictions: Record<EvictionReason, number>;
  since: string;
}

function emptyCounters(): TierCounters {
  return { hit: 0, miss: 0, unavailable: 0, corrupt: 0 };
}

/**
 * Process-wide counters shared by the coordinator and the static store.
 * Advisory only. Counters start at zero with the process and are never reset.
 */
export class CacheStatistics {
  private readonly tiers: Record<TierName, TierCounters> = {
    SHORT_TERM: emptyCounters(),
    LONG_TERM: emptyCounters(),
    STATIC_FALLBACK: emptyCounters(),
  };
  private readonly fetches: Record<FetchOutcome, number> = { success: 0, failure: 0 };
  private readonly writes = { succeeded: 0, failed: 0 };
  private readonly resolutions: Record<Provenance, number> = { FRESH: 0, SHORT_TERM: 0, LONG_TERM: 0, STATIC_FALLBACK: 0 };
  private exhausted = 0;
  private readonly evictions: Record<EvictionReason, number> = { capacity: 0, expired: 0 };
  private readonly since: number;

  constructor(now: () => number = Date.now) {
    this.since = now();
  }

  public recordRead(tier: TierName, outcome: ReadOutcome): void {
    this.tiers[tier][outcome]++;
  }

  public recordFetch(outcome: FetchOutcome): void {
    this.fetches[outcome]++;
  }

  public recordWrite(succeeded: boolean): void {
    if (succeeded) {
      this.writes.succeeded++;
    } else {
      this.writes.failed++;
    }
  }

  public recordResolution(provenance: Provenance): void {
    this.resolutions[provenance]++;
  }

  public recordExhausted(): void {
    this.exhausted++;
  }

  public recordEviction(reason: EvictionReason): void {
    this.evictions[reason]++;
  }

  /** Copy of the current counters. */
  public snapshot(): CacheStatisticsSnapshot {
    return {
      tiers: {
        SHORT_TERM: { ...this.tiers.SHORT_TERM },
        LONG_TERM: { ...this.tiers.LONG_TERM },
        STATIC_FALLBACK: { ...this.tiers.STATIC_FALLBACK },
      },
      fetches: { ...this.fetches },
      writes: { ...this.writes },
      resolutions: { ...this.resolutions },
      exhausted: this.exhausted,
      evictions: { ...this.evictions },
      since: new Date(this.since).toISOString(),
    };
  }
}
