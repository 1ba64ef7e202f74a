/**
 * Lightweight in-memory metrics collector for dispatcher and request activity.
 */

export interface TimingSummary {
  count: number;
  totalMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  timings: Record<string, TimingSummary>;
  timestamp: number;
}

export interface MetricsCollector {
  increment(name: string, delta?: number): void;
  gauge(name: string, value: number): void;
  /** Record one duration sample under `name`. */
  timing(name: string, durationMs: number): void;
  getSnapshot(): MetricsSnapshot;
  reset(): void;
}

export function createMetricsCollector(): MetricsCollector {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();
  const timings = new Map<string, TimingSummary>();

  return {
    increment(name: string, delta = 1): void {
      counters.set(name, (counters.get(name) ?? 0) + delta);
    },

    gauge(name: string, value: number): void {
      gauges.set(name, value);
    },

    timing(name: string, durationMs: number): void {
      const current = timings.get(name) ?? { count: 0, totalMs: 0, maxMs: 0 };
      timings.set(name, {
        count: current.count + 1,
        totalMs: current.totalMs + durationMs,
        maxMs: Math.max(current.maxMs, durationMs),
      });
    },

    getSnapshot(): MetricsSnapshot {
      return {
        counters: Object.fromEntries(counters),
        gauges: Object.fromEntries(gauges),
        timings: Object.fromEntries(timings),
        timestamp: Date.now(),
      };
    },

    reset(): void {
      counters.clear();
      gauges.clear();
      timings.clear();
    },
  };
}
