import { Injectable } from '@nestjs/common';

interface Histogram {
  buckets: number[];
  counts: number[];
  sum: number;
  count: number;
}

@Injectable()
export class MetricsService {
  private counters = new Map<string, number>();
  private histograms = new Map<string, Histogram>();
  private gauges = new Set<string>();

  registerGauge(name: string) {
    this.gauges.add(name);
    if (!this.counters.has(name)) this.counters.set(name, 0);
  }

  inc(name: string, value = 1) {
    this.counters.set(name, (this.counters.get(name) || 0) + value);
  }
  set(name: string, value: number) {
    this.counters.set(name, value);
  }
  get(name: string): number {
    return this.counters.get(name) || 0;
  }
  observe(name: string, value: number, buckets: number[]) {
    let h = this.histograms.get(name);
    if (!h) {
      const sorted = [...buckets].sort((a, b) => a - b);
      h = { buckets: sorted, counts: new Array<number>(sorted.length + 1).fill(0), sum: 0, count: 0 }; // dernier bucket = +Inf
      this.histograms.set(name, h);
    }
    const idx = h.buckets.findIndex((b) => value <= b);
    h.counts[idx === -1 ? h.counts.length - 1 : idx]++;
    h.sum += value;
    h.count += 1;
  }

  snapshot() {
    return Object.fromEntries(this.counters.entries());
  }

  resetAll() {
    this.counters.clear();
    this.histograms.clear();
    // Ré-initialiser les gauges à 0 pour conserver l'exposition
    for (const g of this.gauges) this.counters.set(g, 0);
  }

  toPrometheus(prefix = 'mesh_jeopardy') {
    const lines: string[] = [];
    for (const [k, v] of this.counters.entries()) {
      const metricBase = k.replace(/[^a-zA-Z0-9_]/g, '_');
      if (this.gauges.has(k)) {
        const metricName = `${prefix}_${metricBase}`;
        lines.push(`# HELP ${metricName} Gauge for ${k}`);
        lines.push(`# TYPE ${metricName} gauge`);
        lines.push(`${metricName} ${v}`);
      } else {
        const metricName = `${prefix}_${metricBase}_total`;
        lines.push(`# HELP ${metricName} Counter for ${k}`);
        lines.push(`# TYPE ${metricName} counter`);
        lines.push(`${metricName} ${v}`);
      }
    }
    for (const [k, h] of this.histograms.entries()) {
      const metricName = `${prefix}_${k.replace(/[^a-zA-Z0-9_]/g, '_')}`;
      lines.push(`# HELP ${metricName} Histogram for ${k}`);
      lines.push(`# TYPE ${metricName} histogram`);
      let cumulative = 0;
      for (let i = 0; i < h.buckets.length; i++) {
        cumulative += h.counts[i];
        lines.push(`${metricName}_bucket{le="${h.buckets[i]}"} ${cumulative}`);
      }
      cumulative += h.counts[h.counts.length - 1];
      lines.push(`${metricName}_bucket{le="+Inf"} ${cumulative}`);
      lines.push(`${metricName}_sum ${h.sum}`);
      lines.push(`${metricName}_count ${h.count}`);
    }
    return lines.join('\n') + '\n';
  }
}
