// Seat Posture Server - Scored model implementations
//
// Each exported model definition becomes either a point predictor (label only)
// or a probabilistic predictor (label + per-class probabilities). The variant is
// fixed when the model is built, so the ensemble vote branches on `kind`
// instead of probing objects at prediction time.

import { argmax, predictTreeProbabilities, softmax, type BoostedTreeModel } from "./tree-ensemble.js";
import type { FeatureVector, PointPredictor, ProbabilisticPredictor, ScoredModel } from "./types.js";

// ─── Model Definitions (exported JSON) ──────────────────────────────────────────

interface LabelledDefinition {
  /** Posture label for each output column. Defaults to 0..n-1. */
  classes?: number[];
}

export interface LogisticDefinition extends LabelledDefinition {
  type: "logistic";
  coefficients: number[][];
  intercepts: number[];
}

export interface LinearSvmDefinition extends LabelledDefinition {
  type: "linear_svm";
  coefficients: number[][];
  intercepts: number[];
}

export interface NearestCentroidDefinition extends LabelledDefinition {
  type: "nearest_centroid";
  centroids: number[][];
}

export interface BoostedTreeDefinition extends LabelledDefinition {
  type: "xgboost";
  nClasses: number;
  booster: BoostedTreeModel;
}

export type ModelDefinition =
  | LogisticDefinition
  | LinearSvmDefinition
  | NearestCentroidDefinition
  | BoostedTreeDefinition;

// ─── Helpers ────────────────────────────────────────────────────────────────────

function dot(weights: readonly number[], features: FeatureVector): number {
  let total = 0;
  for (let i = 0; i < weights.length; i++) {
    total += weights[i] * (features[i] ?? 0);
  }
  return total;
}

function linearScores(
  coefficients: readonly (readonly number[])[],
  intercepts: readonly number[],
  features: FeatureVector,
): number[] {
  return coefficients.map((row, i) => dot(row, features) + (intercepts[i] ?? 0));
}

function resolveClasses(classes: number[] | undefined, columns: number): number[] {
  if (classes && classes.length === columns) return classes.slice();
  return Array.from({ length: columns }, (_, i) => i);
}

/**
 * Spread per-column probabilities onto a label-indexed vector of
 * `classCount` entries. Columns whose label falls outside the range are dropped.
 */
function toLabelProbabilities(columnProbs: readonly number[], classes: readonly number[], classCount: number): number[] {
  const out = new Array<number>(classCount).fill(0);
  for (let i = 0; i < columnProbs.length; i++) {
    const label = classes[i];
    if (label >= 0 && label < classCount) out[label] += columnProbs[i];
  }
  return out;
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

// ─── Builders ───────────────────────────────────────────────────────────────────

/**
 * Multinomial logistic regression. A single coefficient row is the binary
 * form: the sigmoid of its margin is the probability of the second class.
 */
export function createLogisticModel(def: LogisticDefinition, classCount: number): ProbabilisticPredictor {
  const binary = def.coefficients.length === 1;
  const columns = binary ? 2 : def.coefficients.length;
  const classes = resolveClasses(def.classes, columns);

  const columnProbabilities = (features: FeatureVector): number[] => {
    const margins = linearScores(def.coefficients, def.intercepts, features);
    if (binary) {
      const p = sigmoid(margins[0]);
      return [1 - p, p];
    }
    return softmax(margins);
  };

  return {
    kind: "probabilistic",
    predict: (features) => classes[argmax(columnProbabilities(features))],
    predictProbabilities: (features) => toLabelProbabilities(columnProbabilities(features), classes, classCount),
  };
}

/** One-vs-rest linear SVM. Decision values are not probabilities, so this votes by label only. */
export function createLinearSvmModel(def: LinearSvmDefinition): PointPredictor {
  const classes = resolveClasses(def.classes, def.coefficients.length);
  return {
    kind: "point",
    predict: (features) => classes[argmax(linearScores(def.coefficients, def.intercepts, features))],
  };
}

export function createNearestCentroidModel(def: NearestCentroidDefinition): PointPredictor {
  const classes = resolveClasses(def.classes, def.centroids.length);
  return {
    kind: "point",
    predict: (features) => {
      let best = 0;
      let bestDistance = Infinity;
      def.centroids.forEach((centroid, i) => {
        let distance = 0;
        for (let j = 0; j < centroid.length; j++) {
          const d = (features[j] ?? 0) - centroid[j];
          distance += d * d;
        }
        if (distance < bestDistance) {
          bestDistance = distance;
          best = i;
        }
      });
      return classes[best];
    },
  };
}

export function createBoostedTreeModel(def: BoostedTreeDefinition, classCount: number): ProbabilisticPredictor {
  const classes = resolveClasses(def.classes, def.nClasses);
  const columnProbabilities = (features: FeatureVector) => predictTreeProbabilities(def.booster, features, def.nClasses);
  return {
    kind: "probabilistic",
    predict: (features) => classes[argmax(columnProbabilities(features))],
    predictProbabilities: (features) => toLabelProbabilities(columnProbabilities(features), classes, classCount),
  };
}

export function buildScoredModel(def: ModelDefinition, classCount: number): ScoredModel {
  switch (def.type) {
    case "logistic":
      return createLogisticModel(def, classCount);
    case "linear_svm":
      return createLinearSvmModel(def);
    case "nearest_centroid":
      return createNearestCentroidModel(def);
    case "xgboost":
      return createBoostedTreeModel(def, classCount);
    default: {
      const exhaustiveCheck: never = def;
      throw new Error(`Unknown model type: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}
