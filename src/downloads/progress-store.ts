import type { ProgressSnapshot } from "./types.js";

export interface ProgressStoreOptions {
  staleAfterMs: number;
  now?: () => number;
}

/**
 * Latest progress per chat. Snapshots are frozen on write, so a reader always
 * gets a complete snapshot even while the owning job keeps replacing it.
 */
export class ProgressStore {
  private readonly snapshots = new Map<number, ProgressSnapshot>();
  private readonly staleAfterMs: number;
  private readonly now: () => number;

  constructor(options: ProgressStoreOptions) {
    this.staleAfterMs = options.staleAfterMs;
    this.now = options.now ?? Date.now;
  }

  set(chatId: number, snapshot: Omit<ProgressSnapshot, "updatedAt"> & { updatedAt?: number }): ProgressSnapshot {
    const stored: ProgressSnapshot = Object.freeze({
      ...snapshot,
      updatedAt: snapshot.updatedAt ?? this.now(),
    });
    this.snapshots.set(chatId, stored);
    return stored;
  }

  get(chatId: number): ProgressSnapshot | undefined {
    return this.snapshots.get(chatId);
  }

  delete(chatId: number): boolean {
    return this.snapshots.delete(chatId);
  }

  has(chatId: number): boolean {
    return this.snapshots.has(chatId);
  }

  get size(): number {
    return this.snapshots.size;
  }

  isStale(snapshot: ProgressSnapshot, now: number = this.now()): boolean {
    return now - snapshot.updatedAt > this.staleAfterMs;
  }

  /**
   * Removes every snapshot older than the staleness window and returns the
   * chat ids that were dropped.
   */
  evictStale(now: number = this.now()): number[] {
    const evicted: number[] = [];
    for (const [chatId, snapshot] of this.snapshots) {
      if (this.isStale(snapshot, now)) {
        this.snapshots.delete(chatId);
        evicted.push(chatId);
      }
    }
    return evicted;
  }

  listActive(now: number = this.now()): Array<[number, ProgressSnapshot]> {
    this.evictStale(now);
    return [...this.snapshots.entries()];
  }
}
