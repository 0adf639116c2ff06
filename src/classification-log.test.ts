/**
 * Shared behaviour of the classification log implementations.
 * SQLite runs against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InMemoryClassificationLog, filterBounds, type ClassificationLog } from "./classification-log.js";
import { SqliteClassificationLog } from "./sqlite-classification-log.js";
import type { PredictionRecordInput } from "./types.js";

const DAY1 = Date.UTC(2024, 2, 1, 9, 0, 0);
const DAY2 = Date.UTC(2024, 2, 2, 9, 0, 0);

function makeRecord(overrides: Partial<PredictionRecordInput> = {}): PredictionRecordInput {
  return {
    clientId: "client-a",
    deviceId: "chair-1",
    timestamp: DAY1,
    label: 0,
    confidence: 0.8,
    method: "ensemble_stage1",
    votingScores: [0.5, 0, 0, 0.1, 0, 0, 0, 0],
    breakdown: [{ model: "xgboost", stage: 1, prediction: 0, confidence: 0.8 }],
    processingTimeMs: 1.5,
    pressure: [1, 2, 3],
    inertial: { accel: [0, 0, 1], gyro: [0.1, 0.2, 0.3] },
    ...overrides,
  };
}

describe("filterBounds", () => {
  it("spans whole UTC days with an exclusive end", () => {
    expect(filterBounds({ startDate: "2024-03-01", endDate: "2024-03-01" })).toEqual({
      from: Date.UTC(2024, 2, 1),
      until: Date.UTC(2024, 2, 2),
    });
  });

  it("leaves missing ends open", () => {
    expect(filterBounds({})).toEqual({ from: null, until: null });
  });

  it("throws on a malformed date", () => {
    expect(() => filterBounds({ startDate: "2024-02-30" })).toThrow("Invalid start date: 2024-02-30");
  });
});

describe.each([
  ["InMemoryClassificationLog", (): ClassificationLog => new InMemoryClassificationLog()],
  ["SqliteClassificationLog", (): ClassificationLog => new SqliteClassificationLog({ filePath: ":memory:" })],
])("%s", (_name, create) => {
  let log: ClassificationLog;

  beforeEach(() => {
    log = create();
  });

  afterEach(async () => {
    await log.close();
  });

  it("round-trips a prediction record", async () => {
    const id = await log.appendPrediction(makeRecord());
    const [stored] = await log.queryPredictions();
    expect(stored).toEqual({ ...makeRecord(), id });
  });

  it("stores records without raw sensor data", async () => {
    await log.appendPrediction(makeRecord({ pressure: null, inertial: null }));
    const [stored] = await log.queryPredictions();
    expect(stored.pressure).toBeNull();
    expect(stored.inertial).toBeNull();
  });

  it("returns records ordered by timestamp, then insertion", async () => {
    await log.appendPrediction(makeRecord({ timestamp: DAY1 + 2000, label: 2 }));
    await log.appendPrediction(makeRecord({ timestamp: DAY1, label: 0 }));
    await log.appendPrediction(makeRecord({ timestamp: DAY1 + 2000, label: 3 }));

    const labels = (await log.queryPredictions()).map((r) => r.label);
    expect(labels).toEqual([0, 2, 3]);
  });

  it("filters by date range and device", async () => {
    await log.appendPrediction(makeRecord({ timestamp: DAY1, deviceId: "chair-1" }));
    await log.appendPrediction(makeRecord({ timestamp: DAY2, deviceId: "chair-1" }));
    await log.appendPrediction(makeRecord({ timestamp: DAY2, deviceId: "chair-2" }));

    expect(await log.queryPredictions({ startDate: "2024-03-02" })).toHaveLength(2);
    expect(await log.queryPredictions({ endDate: "2024-03-01" })).toHaveLength(1);
    expect(await log.queryPredictions({ startDate: "2024-03-02", deviceId: "chair-2" })).toHaveLength(1);
    expect(await log.queryPredictions({ deviceId: "chair-3" })).toEqual([]);
  });

  it("counts predictions", async () => {
    await log.appendPrediction(makeRecord());
    await log.appendPrediction(makeRecord());
    expect(await log.countPredictions()).toBe(2);
  });

  it("tracks connection lifetimes", async () => {
    await log.recordConnection("client-a", 1000);
    await log.recordConnection("client-b", 2000);
    await log.recordDisconnection("client-a", 5000);

    expect(await log.listConnections()).toEqual([
      { clientId: "client-a", connectedAt: 1000, disconnectedAt: 5000 },
      { clientId: "client-b", connectedAt: 2000, disconnectedAt: null },
    ]);
  });

  it("resets every table and reports what it deleted", async () => {
    await log.appendPrediction(makeRecord());
    await log.appendPrediction(makeRecord());
    await log.recordConnection("client-a", 1000);

    expect(await log.resetAll()).toEqual({ predictions: 2, connections: 1 });
    expect(await log.countPredictions()).toBe(0);
    expect(await log.listConnections()).toEqual([]);
  });
});
