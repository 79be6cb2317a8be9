import { Ledger, LedgerStanding } from './ledger';

interface Entry {
  name?: string;
  total: number;
  reachedSeq: number;
}

export class MemoryLedger implements Ledger {
  private entries = new Map<string, Entry>();
  private seq = 0;

  async applyDelta(playerId: string, delta: number, displayName?: string): Promise<number> {
    const entry = this.entries.get(playerId) ?? { total: 0, reachedSeq: 0 };
    entry.total += delta;
    entry.reachedSeq = ++this.seq;
    if (displayName) entry.name = displayName;
    this.entries.set(playerId, entry);
    return entry.total;
  }

  async topN(n: number): Promise<LedgerStanding[]> {
    return [...this.entries.entries()]
      .sort(([, a], [, b]) => b.total - a.total || a.reachedSeq - b.reachedSeq)
      .slice(0, Math.max(0, n))
      .map(([playerId, e]) => ({ playerId, name: e.name ?? playerId, total: e.total }));
  }

  async totalFor(playerId: string): Promise<number> {
    return this.entries.get(playerId)?.total ?? 0;
  }

  async reset(): Promise<void> {
    this.entries.clear();
  }

  get size(): number { return this.entries.size; }
}
