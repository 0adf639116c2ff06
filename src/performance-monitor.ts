// Seat Posture Server - Prediction throughput and latency tracking

import type { PerformanceMetrics } from "./types.js";

export const LATENCY_WINDOW = 100;

export class PerformanceMonitor {
  private readonly latencies: number[] = [];
  private predictions = 0;
  private readonly startedAt: number;
  private readonly now: () => number;
  private readonly window: number;

  constructor(options: { now?: () => number; window?: number } = {}) {
    this.now = options.now ?? Date.now;
    this.window = options.window ?? LATENCY_WINDOW;
    this.startedAt = this.now();
  }

  recordPrediction(latencyMs: number): void {
    this.predictions++;
    this.latencies.push(latencyMs);
    if (this.latencies.length > this.window) {
      this.latencies.shift();
    }
  }

  get totalPredictions(): number {
    return this.predictions;
  }

  /** Frozen copy of the current counters. */
  snapshot(totalClients: number): Readonly<PerformanceMetrics> {
    const uptimeSeconds = Math.max(0, (this.now() - this.startedAt) / 1000);
    const avgResponseTimeMs =
      this.latencies.length === 0 ? 0 : this.latencies.reduce((a, b) => a + b, 0) / this.latencies.length;
    return Object.freeze({
      totalClients,
      totalPredictions: this.predictions,
      predictionsPerSecond: uptimeSeconds > 0 ? this.predictions / uptimeSeconds : 0,
      avgResponseTimeMs,
      uptimeSeconds,
    });
  }
}

export function formatMetrics(metrics: PerformanceMetrics): string {
  return (
    `clients=${metrics.totalClients} predictions=${metrics.totalPredictions} ` +
    `rate=${metrics.predictionsPerSecond.toFixed(2)}/s avg_latency=${metrics.avgResponseTimeMs.toFixed(2)}ms ` +
    `uptime=${Math.round(metrics.uptimeSeconds)}s`
  );
}
