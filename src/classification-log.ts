// Seat Posture Server - Durable classification log
//
// Append-only record of every prediction plus connection bookkeeping. The
// statistics side reads it back through `queryPredictions`.

import { dayBounds } from "./dates.js";
import type { ConnectionRecord, PredictionFilter, PredictionRecord, PredictionRecordInput } from "./types.js";

export interface ResetCounts {
  predictions: number;
  connections: number;
}

export interface ClassificationLog {
  appendPrediction(record: PredictionRecordInput): Promise<number>;
  recordConnection(clientId: string, connectedAt: number): Promise<void>;
  recordDisconnection(clientId: string, disconnectedAt: number): Promise<void>;
  /** Ascending by timestamp, then by insertion order. */
  queryPredictions(filter?: PredictionFilter): Promise<PredictionRecord[]>;
  countPredictions(): Promise<number>;
  listConnections(): Promise<ConnectionRecord[]>;
  /** Deletes every stored row. */
  resetAll(): Promise<ResetCounts>;
  close(): Promise<void>;
}

/** Epoch-ms bounds for a filter: start inclusive, end exclusive. Throws on a malformed date. */
export function filterBounds(filter: PredictionFilter = {}): { from: number | null; until: number | null } {
  let from: number | null = null;
  let until: number | null = null;
  if (filter.startDate !== undefined) {
    const bounds = dayBounds(filter.startDate);
    if (!bounds) throw new Error(`Invalid start date: ${filter.startDate}`);
    from = bounds[0];
  }
  if (filter.endDate !== undefined) {
    const bounds = dayBounds(filter.endDate);
    if (!bounds) throw new Error(`Invalid end date: ${filter.endDate}`);
    until = bounds[1];
  }
  return { from, until };
}

// ─── In-memory implementation ───────────────────────────────────────────────────

export class InMemoryClassificationLog implements ClassificationLog {
  private predictions: PredictionRecord[] = [];
  private connections: ConnectionRecord[] = [];
  private nextId = 1;
  private closed = false;

  async appendPrediction(record: PredictionRecordInput): Promise<number> {
    this.assertOpen();
    const id = this.nextId++;
    this.predictions.push({ ...record, id });
    return id;
  }

  async recordConnection(clientId: string, connectedAt: number): Promise<void> {
    this.assertOpen();
    this.connections.push({ clientId, connectedAt, disconnectedAt: null });
  }

  async recordDisconnection(clientId: string, disconnectedAt: number): Promise<void> {
    this.assertOpen();
    for (let i = this.connections.length - 1; i >= 0; i--) {
      const conn = this.connections[i];
      if (conn.clientId === clientId && conn.disconnectedAt === null) {
        this.connections[i] = { ...conn, disconnectedAt };
        return;
      }
    }
  }

  async queryPredictions(filter: PredictionFilter = {}): Promise<PredictionRecord[]> {
    this.assertOpen();
    const { from, until } = filterBounds(filter);
    return this.predictions
      .filter(
        (r) =>
          (from === null || r.timestamp >= from) &&
          (until === null || r.timestamp < until) &&
          (filter.deviceId === undefined || r.deviceId === filter.deviceId),
      )
      .sort((a, b) => a.timestamp - b.timestamp || a.id - b.id);
  }

  async countPredictions(): Promise<number> {
    this.assertOpen();
    return this.predictions.length;
  }

  async listConnections(): Promise<ConnectionRecord[]> {
    this.assertOpen();
    return this.connections.map((c) => ({ ...c }));
  }

  async resetAll(): Promise<ResetCounts> {
    this.assertOpen();
    const counts = { predictions: this.predictions.length, connections: this.connections.length };
    this.predictions = [];
    this.connections = [];
    return counts;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("Classification log is closed");
  }
}
