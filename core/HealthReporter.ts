// Filename: core/HealthReporter.ts

import { getTierPattern } from "../services/CacheKeyService.js";
import { log, WARN } from "../utils/log.js";
import type { BoundedResultCacheStats } from "./BoundedResultCache.js";
import type { CacheStatistics, CacheStatisticsSnapshot } from "./CacheStatistics.js";
import type { InventoryReport, StaticFallbackStore } from "./StaticFallbackStore.js";
import type { TieredCacheCoordinator } from "./TieredCacheCoordinator.js";
import type { StoreCountResult, VolatileStoreClient, VolatileStoreStatus } from "./VolatileStoreClient.js";

const LOG_EMOJI = "🩺";

export interface Heartbeat {
  status: "healthy";
  timestamp: string;
  redis: "connected" | "disconnected";
  csv_fallback: "available" | "unavailable";
}

type Probe<T> = { ok: true; value: T } | { ok: false; error: string };

export interface OperationalReport {
  generatedAt: string;
  volatileStore: VolatileStoreStatus & {
    reachable: Probe<boolean>;
    keys: Probe<{ shortTerm: StoreCountResult; longTerm: StoreCountResult }>;
  };
  ttls: { shortTermSeconds: number; longTermSeconds: number };
  statistics: CacheStatisticsSnapshot;
  staticCache: BoundedResultCacheStats & { keys: string[] };
  inventory: Probe<InventoryReport>;
}

export interface HealthReporterOptions {
  store: VolatileStoreClient;
  staticStore: StaticFallbackStore;
  coordinator: TieredCacheCoordinator;
  statistics: CacheStatistics;
  timeoutMs?: number;
}

/**
 * Settles `work` within `timeoutMs`, turning rejection and timeout into an error value.
 */
export async function probe<T>(label: string, work: () => Promise<T>, timeoutMs: number): Promise<Probe<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Probe<T>>((resolve) => {
    timer = setTimeout(() => resolve({ ok: false, error: `${label} timed out after ${timeoutMs}ms` }), timeoutMs);
  });
  const attempt = work().then(
    (value): Probe<T> => ({ ok: true, value }),
    (error: unknown): Probe<T> => ({ ok: false, error: error instanceof Error ? error.message : String(error) })
  );
  try {
    const result = await Promise.race([attempt, timeout]);
    if (!result.ok) log(`${LOG_EMOJI} Health: ${label} failed: ${result.error}`, WARN);
    return result;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Liveness and operational reporting. Neither method throws; every probe is time-bounded.
 */
export class HealthReporter {
  private readonly timeoutMs: number;

  constructor(private readonly options: HealthReporterOptions) {
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  public async heartbeat(): Promise<Heartbeat> {
    const [reachable, inventory] = await Promise.all([
      probe("store ping", () => this.options.store.ping(), this.timeoutMs),
      probe("static sources", () => this.options.staticStore.isAvailable(), this.timeoutMs),
    ]);
    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      redis: reachable.ok && reachable.value ? "connected" : "disconnected",
      csv_fallback: inventory.ok && inventory.value ? "available" : "unavailable",
    };
  }

  public async report(): Promise<OperationalReport> {
    const { store, staticStore, coordinator, statistics } = this.options;
    const [reachable, keys, inventory] = await Promise.all([
      probe("store ping", () => store.ping(), this.timeoutMs),
      probe(
        "key counts",
        async () => {
          const [shortTerm, longTerm] = await Promise.all([
            store.countKeys(getTierPattern("SHORT_TERM")),
            store.countKeys(getTierPattern("LONG_TERM")),
          ]);
          return { shortTerm, longTerm };
        },
        this.timeoutMs
      ),
      probe("static inventory", () => staticStore.validateInventory(), this.timeoutMs),
    ]);

    return {
      generatedAt: new Date().toISOString(),
      volatileStore: { ...store.status(), reachable, keys },
      ttls: coordinator.ttls,
      statistics: statistics.snapshot(),
      staticCache: staticStore.cacheStats(),
      inventory,
    };
  }
}
