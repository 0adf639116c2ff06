// Seat Posture Server - Rule-based posture classifier
//
// Deterministic fallback used whenever no learned model is loaded or the
// ensemble cannot produce a vote. Works purely on pressure-vector geometry.

import {
  FORWARD_LEAN,
  LEFT_LEAN,
  LEFT_LEG_CROSS,
  NORMAL_POSTURE,
  RIGHT_LEAN,
  RIGHT_LEG_CROSS,
  TURTLE_NECK,
} from "./posture-labels.js";
import type { FeatureVector } from "./types.js";

// ─── Geometry ───────────────────────────────────────────────────────────────────

/** Sensors 0-4 sit under the left half of the seat; the rest under the right. */
const LEFT_SENSOR_COUNT = 5;
const FRONT_SENSORS = [0, 1, 5, 6] as const;
const BACK_SENSORS = [3, 4, 8, 9] as const;
/** The first three sensors carry the upper-body load when leaning towards a screen. */
const NECK_SENSOR_COUNT = 3;

// ─── Decision thresholds ────────────────────────────────────────────────────────

export const SIDE_DOMINANCE_RATIO = 1.5;
export const FRONT_DOMINANCE_RATIO = 1.3;
export const NECK_PEAK_RATIO = 1.5;
/** Loads above this magnitude are rescaled before summing so totals stay finite. */
const RESCALE_THRESHOLD = 1e150;

export const MIN_CONFIDENCE = 0.3;
export const MAX_CONFIDENCE = 0.95;
/** Confidence returned when the seat carries no load at all. */
export const EMPTY_SEAT_CONFIDENCE = 0.5;

export interface RuleBasedPrediction {
  label: number;
  confidence: number;
}

/** NaN clamps to `min`. */
export function clamp(min: number, max: number, value: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.max(min, Math.min(max, value));
}

function sumAt(features: FeatureVector, indices: readonly number[]): number {
  let total = 0;
  for (const i of indices) total += features[i] ?? 0;
  return total;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** 0.6 at parity, plus 0.5 per unit of ratio above 1. */
function dominanceConfidence(dominant: number, weaker: number): number {
  return clamp(MIN_CONFIDENCE, MAX_CONFIDENCE, 0.6 + 0.5 * (dominant / weaker - 1));
}

/** Non-finite readings count as zero; oversized loads are divided by their peak. */
function sanitize(raw: FeatureVector): FeatureVector {
  const finite = raw.map((v) => (Number.isFinite(v) ? v : 0));
  let peak = 0;
  for (const v of finite) peak = Math.max(peak, Math.abs(v));
  return peak > RESCALE_THRESHOLD ? finite.map((v) => v / peak) : finite;
}

/**
 * Classify a posture from an 11-value pressure vector.
 *
 * Branches are evaluated in a fixed order: left-heavy, right-heavy,
 * front-heavy, then normal. The first matching branch wins.
 */
export function classifyByRules(raw: FeatureVector): RuleBasedPrediction {
  const features = sanitize(raw);
  const total = sum(features);
  if (total === 0) {
    return { label: NORMAL_POSTURE, confidence: EMPTY_SEAT_CONFIDENCE };
  }

  const left = sum(features.slice(0, LEFT_SENSOR_COUNT));
  const right = sum(features.slice(LEFT_SENSOR_COUNT));
  const front = sumAt(features, FRONT_SENSORS);
  const back = sumAt(features, BACK_SENSORS);

  if (left >= right * SIDE_DOMINANCE_RATIO) {
    return {
      label: front > back ? LEFT_LEG_CROSS : LEFT_LEAN,
      confidence: dominanceConfidence(left, right),
    };
  }

  if (right >= left * SIDE_DOMINANCE_RATIO) {
    return {
      label: front > back ? RIGHT_LEG_CROSS : RIGHT_LEAN,
      confidence: dominanceConfidence(right, left),
    };
  }

  if (front > 0 && front >= back * FRONT_DOMINANCE_RATIO) {
    const mean = total / features.length;
    const neckPeak = Math.max(...features.slice(0, NECK_SENSOR_COUNT));
    return {
      label: neckPeak > mean * NECK_PEAK_RATIO ? TURTLE_NECK : FORWARD_LEAN,
      confidence: dominanceConfidence(front, back),
    };
  }

  const balanceScore = 1 - Math.abs(left - right) / total;
  return {
    label: NORMAL_POSTURE,
    confidence: clamp(MIN_CONFIDENCE, MAX_CONFIDENCE, 0.3 + balanceScore),
  };
}
