/**
 * Submission Store Interfaces
 *
 * The pipeline talks to its two external collaborators only through these:
 * - ReplayStore: shared low-latency cache (Redis in production)
 * - MinerKeyStore / LedgerStore: durable store (PostgreSQL in production)
 *
 * Implementations throw on infrastructure failure. The stage components turn
 * those throws into rejection outcomes.
 */

import { LedgerRecord, MinerRecord, Clock, systemClock } from './types.js';

// =============================================================================
// STORE INTERFACES
// =============================================================================

export interface ReplayStore {
  /**
   * Set `key` only if it is absent.
   * Returns true if this call created it.
   */
  setIfAbsent(key: string): Promise<boolean>;

  /**
   * Set the expiry of an existing key.
   */
  expire(key: string, ttlSeconds: number): Promise<void>;
}

export interface MinerKeyStore {
  /**
   * Returns the stored public key hex, or null when the miner is unknown.
   */
  findPublicKey(minerId: number): Promise<string | null>;
}

export interface LedgerStore {
  /**
   * Insert one immutable ledger row.
   * Throws on duplicate id or store failure.
   */
  insert(record: LedgerRecord): Promise<void>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATIONS (tests, local runs)
// =============================================================================

interface ReplayEntry {
  expiresAt: number | null;   // Unix seconds; null = no expiry set
}

/**
 * In-process stand-in for the Redis replay cache.
 *
 * Single-threaded event loop makes setIfAbsent atomic here.
 */
export class InMemoryReplayStore implements ReplayStore {
  private entries: Map<string, ReplayEntry> = new Map();
  private clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  async setIfAbsent(key: string): Promise<boolean> {
    const existing = this.entries.get(key);
    if (existing && !this.isExpired(existing)) {
      return false;
    }
    this.entries.set(key, { expiresAt: null });
    return true;
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    const entry = this.entries.get(key);
    if (!entry) return;
    entry.expiresAt = this.clock() + ttlSeconds;
  }

  // For testing: remaining ttl in seconds, -1 = no expiry, -2 = missing
  ttl(key: string): number {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry)) return -2;
    if (entry.expiresAt === null) return -1;
    return entry.expiresAt - this.clock();
  }

  // For testing: clear all data
  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: ReplayEntry): boolean {
    return entry.expiresAt !== null && entry.expiresAt <= this.clock();
  }
}

export class InMemoryMinerKeyStore implements MinerKeyStore {
  private miners: Map<number, string> = new Map();

  constructor(records: MinerRecord[] = []) {
    for (const record of records) {
      this.register(record);
    }
  }

  register(record: MinerRecord): void {
    this.miners.set(record.miner_id, record.public_key);
  }

  async findPublicKey(minerId: number): Promise<string | null> {
    return this.miners.get(minerId) ?? null;
  }
}

export class InMemoryLedgerStore implements LedgerStore {
  private records: Map<string, LedgerRecord> = new Map();

  async insert(record: LedgerRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new Error(`Ledger record ${record.id} already exists`);
    }
    // Clone so callers cannot mutate a committed row
    this.records.set(record.id, structuredClone(record));
  }

  // For testing: load a row by id
  get(id: string): LedgerRecord | null {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  // For testing: all rows, insertion order
  all(): LedgerRecord[] {
    return [...this.records.values()].map((r) => structuredClone(r));
  }

  // For testing: get count
  count(): number {
    return this.records.size;
  }
}
