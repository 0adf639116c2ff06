/**
 * Property-based tests for the daily posture score
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { scoreDay } from "./posture-score.js";
import { postureName } from "./posture-labels.js";
import type { PostureSession } from "./types.js";

const arbSessions: fc.Arbitrary<PostureSession[]> = fc
  .array(fc.tuple(fc.integer({ min: 0, max: 7 }), fc.double({ min: 0.01, max: 240, noNaN: true })), {
    maxLength: 20,
  })
  .map((spans) => {
    let start = Date.UTC(2024, 4, 1);
    return spans.map(([label, minutes]) => {
      const startTime = start;
      start += minutes * 60_000;
      return {
        postureId: label,
        postureName: postureName(label),
        startTime,
        endTime: start,
        durationMinutes: minutes,
        avgConfidence: 0.8,
        sampleCount: 1,
      };
    });
  });

describe("scoreDay properties", () => {
  it("keeps every component inside its range", () => {
    fc.assert(
      fc.property(arbSessions, (sessions) => {
        const score = scoreDay("2024-05-01", sessions);
        expect(Number.isInteger(score.totalScore)).toBe(true);
        expect(score.totalScore).toBeGreaterThanOrEqual(0);
        expect(score.totalScore).toBeLessThanOrEqual(100);
        expect(score.goodPostureScore).toBeGreaterThanOrEqual(0);
        expect(score.goodPostureScore).toBeLessThanOrEqual(60);
        expect(score.badPosturePenalty).toBeGreaterThanOrEqual(0);
        expect(score.badPosturePenalty).toBeLessThanOrEqual(40);
        expect(score.sessionStabilityScore).toBeLessThanOrEqual(20);
      }),
    );
  });

  it("a day with no bad posture has no penalty", () => {
    fc.assert(
      fc.property(arbSessions, (sessions) => {
        const upright = sessions.map((s) => ({ ...s, postureId: 0, postureName: postureName(0) }));
        const score = scoreDay("2024-05-01", upright);
        expect(score.badPosturePenalty).toBe(0);
        expect(score.worstPosture).toBe("None");
      }),
    );
  });
});
