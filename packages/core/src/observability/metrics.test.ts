import { describe, it, expect } from "vitest";
import { createMetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  it("increment() defaults to 1 and accumulates", () => {
    const metrics = createMetricsCollector();
    metrics.increment("requests.completed");
    metrics.increment("requests.completed", 4);
    expect(metrics.getSnapshot().counters["requests.completed"]).toBe(5);
  });

  it("gauge() keeps the latest value", () => {
    const metrics = createMetricsCollector();
    metrics.gauge("dispatcher.in_flight", 3);
    metrics.gauge("dispatcher.in_flight", 1);
    expect(metrics.getSnapshot().gauges["dispatcher.in_flight"]).toBe(1);
  });

  it("timing() summarises samples", () => {
    const metrics = createMetricsCollector();
    metrics.timing("request.duration", 120);
    metrics.timing("request.duration", 80);
    expect(metrics.getSnapshot().timings["request.duration"]).toEqual({
      count: 2,
      totalMs: 200,
      maxMs: 120,
    });
  });

  it("reset() clears everything", () => {
    const metrics = createMetricsCollector();
    metrics.increment("a");
    metrics.gauge("b", 1);
    metrics.timing("c", 1);
    metrics.reset();
    const snapshot = metrics.getSnapshot();
    expect(snapshot.counters).toEqual({});
    expect(snapshot.gauges).toEqual({});
    expect(snapshot.timings).toEqual({});
  });
});
