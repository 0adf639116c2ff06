// Seat Posture Server - SQLite classification log (better-sqlite3)

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { filterBounds, type ClassificationLog, type ResetCounts } from "./classification-log.js";
import type {
  ClassificationMethod,
  ConnectionRecord,
  InertialReading,
  ModelVote,
  PredictionFilter,
  PredictionRecord,
  PredictionRecordInput,
} from "./types.js";

export type SqliteLogConfig = {
  /** Database file, or ":memory:" */
  filePath: string;
};

interface PredictionRow {
  id: number;
  client_id: string;
  device_id: string;
  timestamp_ms: number;
  predicted_posture: number;
  confidence: number;
  method: string;
  voting_scores: string;
  breakdown: string;
  processing_time_ms: number;
  fsr_data: string | null;
  imu_data: string | null;
}

interface ConnectionRow {
  client_id: string;
  connect_time_ms: number;
  disconnect_time_ms: number | null;
}

const METHODS: readonly ClassificationMethod[] = [
  "rule_based",
  "ensemble_stage1",
  "ensemble_stage1_plus_stage2",
  "degraded_random",
];

// ─── Column decoding ────────────────────────────────────────────────────────────

function decodeNumbers(text: string | null): number[] | null {
  if (text === null) return null;
  const value: unknown = JSON.parse(text);
  if (!Array.isArray(value)) return null;
  const items: unknown[] = value;
  return items.filter((v): v is number => typeof v === "number");
}

function decodeTriple(value: unknown): [number, number, number] | null {
  if (!Array.isArray(value) || value.length !== 3) return null;
  const [a, b, c]: unknown[] = value;
  return typeof a === "number" && typeof b === "number" && typeof c === "number" ? [a, b, c] : null;
}

function decodeInertial(text: string | null): InertialReading | null {
  if (text === null) return null;
  const value: unknown = JSON.parse(text);
  if (typeof value !== "object" || value === null) return null;
  const accel = decodeTriple("accel" in value ? value.accel : undefined);
  const gyro = decodeTriple("gyro" in value ? value.gyro : undefined);
  return accel && gyro ? { accel, gyro } : null;
}

function decodeBreakdown(text: string): ModelVote[] {
  const value: unknown = JSON.parse(text);
  if (!Array.isArray(value)) return [];
  const items: unknown[] = value;
  const votes: ModelVote[] = [];
  for (const item of items) {
    if (typeof item !== "object" || item === null) continue;
    const fields: Record<string, unknown> = Object.fromEntries(Object.entries(item));
    const { model, stage, prediction, confidence } = fields;
    if (
      typeof model === "string" &&
      (stage === 1 || stage === 2) &&
      typeof prediction === "number" &&
      typeof confidence === "number"
    ) {
      votes.push({ model, stage, prediction, confidence });
    }
  }
  return votes;
}

function decodeMethod(text: string): ClassificationMethod {
  const method = METHODS.find((m) => m === text);
  if (!method) throw new Error(`Unknown classification method in log: ${text}`);
  return method;
}

function toRecord(row: PredictionRow): PredictionRecord {
  return {
    id: row.id,
    clientId: row.client_id,
    deviceId: row.device_id,
    timestamp: row.timestamp_ms,
    label: row.predicted_posture,
    confidence: row.confidence,
    method: decodeMethod(row.method),
    votingScores: decodeNumbers(row.voting_scores) ?? [],
    breakdown: decodeBreakdown(row.breakdown),
    processingTimeMs: row.processing_time_ms,
    pressure: decodeNumbers(row.fsr_data),
    inertial: decodeInertial(row.imu_data),
  };
}

// ─── Store ──────────────────────────────────────────────────────────────────────

export class SqliteClassificationLog implements ClassificationLog {
  private db: Database.Database;

  constructor(cfg: SqliteLogConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(cfg.filePath)), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      create table if not exists posture_predictions (
        id integer primary key autoincrement,
        client_id text not null,
        device_id text not null,
        timestamp_ms integer not null,
        predicted_posture integer not null,
        confidence real not null,
        method text not null,
        voting_scores text not null,
        breakdown text not null,
        processing_time_ms real not null,
        fsr_data text,
        imu_data text
      );

      create table if not exists client_connections (
        id integer primary key autoincrement,
        client_id text not null,
        connect_time_ms integer not null,
        disconnect_time_ms integer
      );

      create index if not exists idx_predictions_timestamp on posture_predictions(timestamp_ms);
      create index if not exists idx_predictions_device on posture_predictions(device_id);
      create index if not exists idx_connections_client on client_connections(client_id);
    `);
  }

  async appendPrediction(record: PredictionRecordInput): Promise<number> {
    const stmt = this.db.prepare(
      `insert into posture_predictions
         (client_id, device_id, timestamp_ms, predicted_posture, confidence, method,
          voting_scores, breakdown, processing_time_ms, fsr_data, imu_data)
       values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const info = stmt.run(
      record.clientId,
      record.deviceId,
      record.timestamp,
      record.label,
      record.confidence,
      record.method,
      JSON.stringify(record.votingScores),
      JSON.stringify(record.breakdown),
      record.processingTimeMs,
      record.pressure === null ? null : JSON.stringify(record.pressure),
      record.inertial === null ? null : JSON.stringify(record.inertial),
    );
    return Number(info.lastInsertRowid);
  }

  async recordConnection(clientId: string, connectedAt: number): Promise<void> {
    this.db
      .prepare(`insert into client_connections (client_id, connect_time_ms) values (?, ?)`)
      .run(clientId, connectedAt);
  }

  async recordDisconnection(clientId: string, disconnectedAt: number): Promise<void> {
    this.db
      .prepare(
        `update client_connections set disconnect_time_ms = ?
         where client_id = ? and disconnect_time_ms is null`,
      )
      .run(disconnectedAt, clientId);
  }

  async queryPredictions(filter: PredictionFilter = {}): Promise<PredictionRecord[]> {
    const { from, until } = filterBounds(filter);
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    if (from !== null) {
      clauses.push("timestamp_ms >= ?");
      params.push(from);
    }
    if (until !== null) {
      clauses.push("timestamp_ms < ?");
      params.push(until);
    }
    if (filter.deviceId !== undefined) {
      clauses.push("device_id = ?");
      params.push(filter.deviceId);
    }
    const where = clauses.length > 0 ? `where ${clauses.join(" and ")}` : "";
    const stmt = this.db.prepare<(string | number)[], PredictionRow>(
      `select * from posture_predictions ${where} order by timestamp_ms asc, id asc`,
    );
    return stmt.all(...params).map(toRecord);
  }

  async countPredictions(): Promise<number> {
    const row = this.db.prepare<[], { n: number }>(`select count(*) as n from posture_predictions`).get();
    return row?.n ?? 0;
  }

  async listConnections(): Promise<ConnectionRecord[]> {
    const stmt = this.db.prepare<[], ConnectionRow>(
      `select client_id, connect_time_ms, disconnect_time_ms from client_connections order by id asc`,
    );
    return stmt.all().map((row) => ({
      clientId: row.client_id,
      connectedAt: row.connect_time_ms,
      disconnectedAt: row.disconnect_time_ms,
    }));
  }

  async resetAll(): Promise<ResetCounts> {
    const reset = this.db.transaction((): ResetCounts => {
      const predictions = this.db.prepare(`delete from posture_predictions`).run().changes;
      const connections = this.db.prepare(`delete from client_connections`).run().changes;
      return { predictions, connections };
    });
    return reset();
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
