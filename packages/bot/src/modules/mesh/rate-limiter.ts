export interface RateLimitRule {
  windowMs: number;
  max: number;
}

interface Bucket {
  count: number;
  windowStart: number;
}

/** Fenêtre fixe par expéditeur : au plus `max` paquets par `windowMs` */
export class RateLimiter {
  private buckets = new Map<string, Bucket>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly rule: RateLimitRule,
    private readonly now: () => number = Date.now,
    cleanupIntervalMs = 60000,
  ) {
    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => this.cleanup(), cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  allow(key: string): boolean {
    const now = this.now();
    const b = this.buckets.get(key);
    if (!b || now - b.windowStart >= this.rule.windowMs) {
      this.buckets.set(key, { count: 1, windowStart: now });
      return true;
    }
    if (b.count < this.rule.max) {
      b.count += 1;
      return true;
    }
    return false;
  }

  /** Supprime les buckets expirés */
  cleanup(): number {
    const now = this.now();
    let cleaned = 0;
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.windowStart >= this.rule.windowMs) {
        this.buckets.delete(key);
        cleaned++;
      }
    }
    return cleaned;
  }

  destroy() {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.buckets.clear();
  }

  get size(): number { return this.buckets.size; }
}
