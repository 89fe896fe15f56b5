// Filename: core/VolatileStoreClient.ts

import { log, LOG, TMI, WARN } from "../utils/log.js";

// Volatile Store specific emoji
const LOG_EMOJI = "📦";

/**
 * Minimal string key-value transport (implemented over Upstash Redis in utils/redis.ts).
 * Implementations may throw; the client turns every failure into a typed result.
 */
export interface KeyValueTransport {
  get(key: string): Promise<string | null>;
  setex(key: string, ttlSeconds: number, value: string): Promise<void>;
  ping(): Promise<void>;
  keys(pattern: string): Promise<string[]>;
  del(keys: string[]): Promise<number>;
}

export type StoreReadResult =
  | { status: "hit"; value: string }
  | { status: "miss" }
  | { status: "unavailable"; reason: string };

export type StoreCountResult =
  | { status: "ok"; count: number }
  | { status: "unavailable"; reason: string };

export interface VolatileStoreStatus {
  configured: boolean;
  /** True while calls are short-circuited after a recent failure */
  backingOff: boolean;
  lastError: string | null;
  /** Epoch ms of the last failure, if any */
  lastFailureAt: number | null;
}

export interface VolatileStoreOptions {
  /** How long to skip the network after a failure before trying again */
  reprobeIntervalMs?: number;
  /** Upper bound on a single store call; a call that runs longer counts as a failure */
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Fault-tolerant handle to the volatile key-value store.
 * No method throws, and no call waits on the store longer than `timeoutMs`.
 * After a transport failure or timeout calls report `unavailable` without
 * touching the network until the re-probe interval has passed; the next call after
 * that goes to the network again.
 */
export class VolatileStoreClient {
  private readonly reprobeIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private retryAfter = 0;
  private lastError: string | null = null;
  private lastFailureAt: number | null = null;

  constructor(
    private readonly transport: KeyValueTransport | null,
    options: VolatileStoreOptions = {}
  ) {
    this.reprobeIntervalMs = options.reprobeIntervalMs ?? 5000;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  public get configured(): boolean {
    return this.transport !== null;
  }

  /**
   * Reads a raw value.
   * @returns hit with the stored string, miss, or unavailable with a reason
   */
  public async get(key: string): Promise<StoreReadResult> {
    const outcome = await this.run("Read", key, (transport) => transport.get(key));
    if (!outcome.ok) return { status: "unavailable", reason: outcome.reason };
    if (outcome.value === null) {
      log(`${LOG_EMOJI} KV Read: Key ${key} not found/expired.`, TMI);
      return { status: "miss" };
    }
    log(`${LOG_EMOJI} KV Read: Key ${key} found.`, TMI);
    return { status: "hit", value: outcome.value };
  }

  /**
   * Stores a value with an expiry.
   * @returns true when the store acknowledged the write
   */
  public async set(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const outcome = await this.run("Write", key, (transport) => transport.setex(key, ttlSeconds, value));
    if (outcome.ok) {
      log(`${LOG_EMOJI} KV Write: Key ${key} set with TTL ${ttlSeconds}s.`, TMI);
    }
    return outcome.ok;
  }

  /**
   * Round-trips to the store, ignoring any back-off window.
   */
  public async ping(): Promise<boolean> {
    const outcome = await this.run("Ping", "-", (transport) => transport.ping(), true);
    return outcome.ok;
  }

  public async countKeys(pattern: string): Promise<StoreCountResult> {
    const outcome = await this.run("Keys", pattern, (transport) => transport.keys(pattern));
    if (!outcome.ok) return { status: "unavailable", reason: outcome.reason };
    return { status: "ok", count: outcome.value.length };
  }

  /**
   * Deletes every key matching a pattern.
   */
  public async deleteKeys(pattern: string): Promise<StoreCountResult> {
    const found = await this.run("Keys", pattern, (transport) => transport.keys(pattern));
    if (!found.ok) return { status: "unavailable", reason: found.reason };
    const removed = await this.run("Delete", pattern, (transport) => transport.del(found.value));
    if (!removed.ok) return { status: "unavailable", reason: removed.reason };
    log(`${LOG_EMOJI} KV Delete: ${removed.value} keys matching ${pattern} removed.`, LOG);
    return { status: "ok", count: removed.value };
  }

  public status(): VolatileStoreStatus {
    return {
      configured: this.configured,
      backingOff: this.configured && this.now() < this.retryAfter,
      lastError: this.lastError,
      lastFailureAt: this.lastFailureAt,
    };
  }

  private async run<T>(
    operation: string,
    subject: string,
    call: (transport: KeyValueTransport) => Promise<T>,
    ignoreBackoff = false
  ): Promise<{ ok: true; value: T } | { ok: false; reason: string }> {
    if (!this.transport) {
      return { ok: false, reason: "volatile store not configured" };
    }
    if (!ignoreBackoff && this.now() < this.retryAfter) {
      return { ok: false, reason: `backing off after failure: ${this.lastError ?? "unknown error"}` };
    }

    try {
      const value = await this.withTimeout(call, this.transport);
      if (this.lastError !== null) {
        log(`${LOG_EMOJI} KV ${operation}: store reachable again.`, LOG);
      }
      this.lastError = null;
      this.retryAfter = 0;
      return { ok: true, value };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.lastError = reason;
      this.lastFailureAt = this.now();
      this.retryAfter = this.lastFailureAt + this.reprobeIntervalMs;
      log(`${LOG_EMOJI} KV ${operation}: ⚠️ Error on ${subject}: ${reason}`, WARN);
      return { ok: false, reason };
    }
  }

  private async withTimeout<T>(
    call: (transport: KeyValueTransport) => Promise<T>,
    transport: KeyValueTransport
  ): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`store call timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs
      );
    });
    try {
      return await Promise.race([Promise.resolve().then(() => call(transport)), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
