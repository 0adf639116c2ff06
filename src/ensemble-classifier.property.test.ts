/**
 * Property-based tests for the cascaded ensemble classifier
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { EnsembleClassifier } from "./ensemble-classifier.js";
import { CLASS_COUNT } from "./posture-labels.js";
import { argmax } from "./tree-ensemble.js";
import type { InertialReading, ModelBundle, ScoredModel } from "./types.js";

function probabilisticModel(probabilities: number[]): ScoredModel {
  return {
    kind: "probabilistic",
    predict: () => argmax(probabilities),
    predictProbabilities: () => probabilities,
  };
}

function bundle(stage1: ScoredModel | null, stage2: ScoredModel | null): ModelBundle {
  return {
    stage1: { models: new Map(stage1 ? [["xgboost", stage1]] : []), transform: null },
    stage2: { models: new Map(stage2 ? [["xgboost", stage2]] : []), transform: null },
  };
}

const arbProbabilities = fc.array(fc.double({ min: 0, max: 1, noNaN: true }), {
  minLength: CLASS_COUNT,
  maxLength: CLASS_COUNT,
});
const arbPressure = fc.array(fc.double({ min: 0, max: 1023, noNaN: true }), { minLength: 0, maxLength: 16 });
const arbTriple = fc.tuple(
  fc.double({ min: -20, max: 20, noNaN: true }),
  fc.double({ min: -20, max: 20, noNaN: true }),
  fc.double({ min: -20, max: 20, noNaN: true }),
);
const arbInertial: fc.Arbitrary<InertialReading> = fc.record({ accel: arbTriple, gyro: arbTriple });

describe("EnsembleClassifier properties", () => {
  it("always yields a valid label and a confidence in [0, 1]", () => {
    fc.assert(
      fc.property(arbPressure, fc.option(arbInertial), arbProbabilities, arbProbabilities, (pressure, imu, p1, p2) => {
        const result = new EnsembleClassifier(bundle(probabilisticModel(p1), probabilisticModel(p2))).classify(
          pressure,
          imu,
        );
        expect(Number.isInteger(result.label)).toBe(true);
        expect(result.label).toBeGreaterThanOrEqual(0);
        expect(result.label).toBeLessThan(CLASS_COUNT);
        expect(result.confidence).toBeGreaterThanOrEqual(0);
        expect(result.confidence).toBeLessThanOrEqual(1);
        expect(result.votingScores).toHaveLength(CLASS_COUNT);
      }),
    );
  });

  it("stage 2 only ever replaces the answer with a confident non-normal label", () => {
    fc.assert(
      fc.property(fc.constantFrom(0, 3), arbInertial, arbProbabilities, (stage1Label, imu, p2) => {
        const stage1: ScoredModel = { kind: "point", predict: () => stage1Label };
        const result = new EnsembleClassifier(bundle(stage1, probabilisticModel(p2))).classify([], imu);

        if (result.stage2Applied) {
          expect(result.label).not.toBe(0);
          expect(result.confidence).toBeGreaterThan(0.6);
          expect(result.method).toBe("ensemble_stage1_plus_stage2");
        } else {
          expect(result.label).toBe(stage1Label);
          expect(result.method).toBe("ensemble_stage1");
        }
      }),
    );
  });

  it("without an inertial reading the result never depends on stage 2", () => {
    fc.assert(
      fc.property(arbPressure, arbProbabilities, arbProbabilities, (pressure, p1, p2) => {
        const withStage2 = new EnsembleClassifier(bundle(probabilisticModel(p1), probabilisticModel(p2)));
        const withoutStage2 = new EnsembleClassifier(bundle(probabilisticModel(p1), null));
        const a = withStage2.classify(pressure, null);
        const b = withoutStage2.classify(pressure, null);
        expect(a.stage2Applied).toBe(false);
        expect({ ...a, processingTimeMs: 0 }).toEqual({ ...b, processingTimeMs: 0 });
      }),
    );
  });
});
