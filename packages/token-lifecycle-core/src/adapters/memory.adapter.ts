import { ITokenStore, TokenRecord } from "../core/interfaces";

// ===================== IN-MEMORY STORE =====================

export interface InMemoryStoreOptions {
  /**
   * Minimum delay between two sweeps of expired entries, in milliseconds
   */
  sweepIntervalMs?: number;
}

interface StoredEntry {
  record: TokenRecord;
  deadline: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/**
 * In-Memory store for tokens.
 *
 * Scoped to one process: two instances never see each other's tokens, so
 * managers that must share revocations and rotations need one shared instance
 * or a remote store.
 *
 * Every method works on the map synchronously and never awaits mid-way, so
 * put/get/delete on the same key are linearizable within the event loop.
 * Expiry is enforced on read; expired entries are also swept from `put` at
 * most once per `sweepIntervalMs`. No timers are kept.
 */
export class InMemoryTokenStore implements ITokenStore {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly sweepIntervalMs: number;
  private lastSweepAt = Date.now();

  constructor(options: InMemoryStoreOptions = {}) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  }

  async put(key: string, record: TokenRecord, ttl: number): Promise<void> {
    const now = Date.now();

    this.entries.set(key, {
      record: structuredClone(record),
      deadline: now + ttl * 1000,
    });

    if (now - this.lastSweepAt >= this.sweepIntervalMs) {
      this.sweep(now);
    }
  }

  async get(key: string): Promise<TokenRecord | null> {
    const entry = this.liveEntry(key, Date.now());
    return entry ? structuredClone(entry.record) : null;
  }

  async delete(key: string): Promise<boolean> {
    const live = this.liveEntry(key, Date.now()) !== undefined;
    this.entries.delete(key);
    return live;
  }

  async health(): Promise<boolean> {
    // In-memory store is always healthy
    return true;
  }

  // ===================== UTILITY METHODS =====================

  /**
   * Number of entries held, expired ones included until reclaimed
   */
  size(): number {
    return this.entries.size;
  }

  /**
   * Clears all tokens (for testing)
   */
  clear(): void {
    this.entries.clear();
  }

  // ===================== PRIVATE METHODS =====================

  private liveEntry(key: string, now: number): StoredEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.deadline <= now) {
      this.entries.delete(key);
      return undefined;
    }

    return entry;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.deadline <= now) {
        this.entries.delete(key);
      }
    }

    this.lastSweepAt = now;
  }
}

// ===================== FACTORY FUNCTIONS =====================

/**
 * Creates in-memory store for development and single-process deployments
 */
export function createMemoryStore(
  options?: InMemoryStoreOptions
): InMemoryTokenStore {
  return new InMemoryTokenStore(options);
}
