import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { MAX_CONFIDENCE, MIN_CONFIDENCE, classifyByRules } from "./rule-based-classifier.js";
import { CLASS_COUNT } from "./posture-labels.js";

const arbPressure = fc.array(fc.double({ noNaN: true, noDefaultInfinity: true }), { minLength: 11, maxLength: 11 });

describe("classifyByRules (property)", () => {
  it("returns a known label with a finite, bounded confidence for any finite load", () => {
    fc.assert(
      fc.property(arbPressure, (pressure) => {
        const { label, confidence } = classifyByRules(pressure);
        expect(Number.isInteger(label)).toBe(true);
        expect(label).toBeGreaterThanOrEqual(0);
        expect(label).toBeLessThan(CLASS_COUNT);
        expect(Number.isFinite(confidence)).toBe(true);
        expect(confidence).toBeGreaterThanOrEqual(MIN_CONFIDENCE);
        expect(confidence).toBeLessThanOrEqual(MAX_CONFIDENCE);
      }),
      { numRuns: 500 },
    );
  });
});
