// Unit tests for posture session segmentation and per-posture totals

import { describe, it, expect } from "vitest";
import { round2, segmentSessions, summarizePostures, type SessionSource } from "./posture-sessions.js";

const T0 = Date.UTC(2024, 4, 1, 9, 0, 0);
const MIN = 60_000;

function rec(minute: number, label: number, confidence = 0.8, deviceId = "chair-1"): SessionSource {
  return { timestamp: T0 + minute * MIN, label, confidence, deviceId };
}

describe("segmentSessions", () => {
  it("ends each session where the next posture starts", () => {
    const sessions = segmentSessions([rec(0, 0), rec(10, 0), rec(20, 1), rec(30, 1), rec(40, 0)]);

    expect(sessions).toEqual([
      {
        postureId: 0,
        postureName: "Normal Posture",
        startTime: T0,
        endTime: T0 + 20 * MIN,
        durationMinutes: 20,
        avgConfidence: 0.8,
        sampleCount: 2,
      },
      {
        postureId: 1,
        postureName: "Turtle Neck",
        startTime: T0 + 20 * MIN,
        endTime: T0 + 40 * MIN,
        durationMinutes: 20,
        avgConfidence: 0.8,
        sampleCount: 2,
      },
    ]);
  });

  it("drops zero-length runs and merges the neighbours they separated", () => {
    const sessions = segmentSessions([rec(0, 0, 0.9), rec(10, 2, 0.5), rec(10, 0, 0.6), rec(20, 0, 0.9)]);

    expect(sessions).toHaveLength(1);
    expect(sessions[0].postureId).toBe(0);
    expect(sessions[0].durationMinutes).toBe(20);
    expect(sessions[0].sampleCount).toBe(3);
    expect(sessions[0].avgConfidence).toBeCloseTo(0.8, 10);
  });

  it("returns nothing for no records or a single instant", () => {
    expect(segmentSessions([])).toEqual([]);
    expect(segmentSessions([rec(5, 3)])).toEqual([]);
    expect(segmentSessions([rec(5, 3), rec(5, 4)])).toEqual([]);
  });

  it("orders records by time before segmenting", () => {
    const sessions = segmentSessions([rec(30, 1), rec(0, 0), rec(15, 1)]);
    expect(sessions.map((s) => [s.postureId, s.durationMinutes])).toEqual([
      [0, 15],
      [1, 15],
    ]);
  });

  it("keeps only the requested device and dates", () => {
    const records = [
      rec(0, 0, 0.8, "chair-1"),
      rec(0, 5, 0.8, "chair-2"),
      rec(10, 4, 0.8, "chair-2"),
      rec(20, 0, 0.8, "chair-1"),
      rec(24 * 60, 1, 0.8, "chair-2"),
    ];

    const sessions = segmentSessions(records, { deviceId: "chair-2", startDate: "2024-05-01", endDate: "2024-05-01" });
    expect(sessions.map((s) => [s.postureId, s.durationMinutes])).toEqual([[5, 10]]);
  });

  it("rejects a malformed date in the filter", () => {
    expect(() => segmentSessions([rec(0, 0)], { startDate: "2024-02-30" })).toThrow(
      "Invalid start date: 2024-02-30",
    );
  });
});

describe("summarizePostures", () => {
  it("totals sessions per posture, largest first", () => {
    const sessions = segmentSessions([rec(0, 0), rec(20, 1), rec(40, 0), rec(70, 0)]);
    expect(summarizePostures(sessions)).toEqual([
      {
        postureId: 0,
        postureName: "Normal Posture",
        totalDurationMinutes: 50,
        sessionCount: 2,
        averageSessionDuration: 25,
        percentage: 71.43,
        firstDetected: "2024-05-01T09:00:00.000Z",
        lastDetected: "2024-05-01T10:10:00.000Z",
      },
      {
        postureId: 1,
        postureName: "Turtle Neck",
        totalDurationMinutes: 20,
        sessionCount: 1,
        averageSessionDuration: 20,
        percentage: 28.57,
        firstDetected: "2024-05-01T09:20:00.000Z",
        lastDetected: "2024-05-01T09:40:00.000Z",
      },
    ]);
  });

  it("breaks ties on total duration by posture id", () => {
    const sessions = segmentSessions([rec(0, 6), rec(10, 2), rec(20, 2)]);
    expect(summarizePostures(sessions).map((s) => s.postureId)).toEqual([2, 6]);
  });

  it("is empty for no sessions", () => {
    expect(summarizePostures([])).toEqual([]);
  });
});

describe("round2", () => {
  it("rounds to two decimals", () => {
    expect(round2(71.428571)).toBe(71.43);
    expect(round2(10)).toBe(10);
  });
});
