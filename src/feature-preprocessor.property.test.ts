// Property-Based Test: feature vectors always reach the models at the expected length

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { normalizeFeatures } from "./feature-preprocessor.js";

const arbitraryReading = (): fc.Arbitrary<number> => fc.double({ min: -1e6, max: 1e6, noNaN: true });

describe("Property: normalizeFeatures yields exactly the expected length", () => {
  it("output length equals the requested length and keeps the common prefix", () => {
    fc.assert(
      fc.property(fc.array(arbitraryReading(), { maxLength: 40 }), fc.integer({ min: 0, max: 20 }), (raw, n) => {
        const out = normalizeFeatures(raw, n);
        expect(out).toHaveLength(n);
        const shared = Math.min(raw.length, n);
        expect(out.slice(0, shared)).toEqual(raw.slice(0, shared));
        expect(out.slice(shared).every((v) => v === 0)).toBe(true);
      }),
    );
  });

  it("is idempotent", () => {
    fc.assert(
      fc.property(fc.array(arbitraryReading(), { maxLength: 40 }), fc.integer({ min: 0, max: 20 }), (raw, n) => {
        const once = normalizeFeatures(raw, n);
        expect(normalizeFeatures(once, n)).toEqual(once);
      }),
    );
  });
});
