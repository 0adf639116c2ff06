// Seat Posture Server - Two-stage cascaded ensemble classifier
//
// Stage 1 votes over the pressure models. When its answer is one of the
// ambiguous labels and an inertial reading came with the frame, stage 2 votes
// over the inertial models and may replace it. The chain never throws:
//
//   ensemble stage 1 ─(Err)→ rule-based ─→ stage-2 cascade ─(throw)→ degraded_random

import {
  INERTIAL_FEATURE_COUNT,
  PRESSURE_FEATURE_COUNT,
  inertialToFeatures,
  normalizeFeatures,
} from "./feature-preprocessor.js";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import { CLASS_COUNT, FORWARD_LEAN, NORMAL_POSTURE } from "./posture-labels.js";
import { MAX_CONFIDENCE, MIN_CONFIDENCE, clamp, classifyByRules } from "./rule-based-classifier.js";
import { argmax } from "./tree-ensemble.js";
import { err, ok } from "./types.js";
import type {
  CascadeStage,
  ClassificationError,
  ClassificationResult,
  FeatureVector,
  InertialReading,
  ModelBundle,
  ModelVote,
  Result,
  StageModels,
} from "./types.js";

// ─── Policy ─────────────────────────────────────────────────────────────────────

export const DEFAULT_MODEL_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  random_forest: 0.3,
  xgboost: 0.3,
  logistic_regression: 0.2,
  svm: 0.2,
});

export interface EnsemblePolicy {
  modelWeights: Readonly<Record<string, number>>;
  /** Weight for models whose name is not in `modelWeights` */
  defaultModelWeight: number;
  /** Confidence reported by a model that only returns a label */
  pointPredictionConfidence: number;
  /** Confidence of a majority vote taken because every voting score was zero */
  majorityVoteConfidence: number;
  /** Confidence when no vote produced a usable label at all */
  emptyVoteConfidence: number;
  /** Stage-1 labels that send the frame on to stage 2 */
  ambiguousLabels: readonly number[];
  /** Stage 2 must be strictly more confident than this to take over */
  stage2OverrideConfidence: number;
  randomConfidenceRange: readonly [number, number];
  classCount: number;
}

export const DEFAULT_ENSEMBLE_POLICY: EnsemblePolicy = Object.freeze({
  modelWeights: DEFAULT_MODEL_WEIGHTS,
  defaultModelWeight: 0.2,
  pointPredictionConfidence: 0.7,
  majorityVoteConfidence: 0.6,
  emptyVoteConfidence: 0.5,
  ambiguousLabels: Object.freeze([NORMAL_POSTURE, FORWARD_LEAN]),
  stage2OverrideConfidence: 0.6,
  randomConfidenceRange: Object.freeze([0.4, 0.8] as const),
  classCount: CLASS_COUNT,
});

// ─── Types ──────────────────────────────────────────────────────────────────────

/** The outcome of one stage's weighted vote. */
export interface StageOutcome {
  label: number;
  confidence: number;
  votingScores: number[];
  votes: ModelVote[];
  failedModels: string[];
}

export interface PostureClassifier {
  classify(pressure: readonly number[], inertial: InertialReading | null): ClassificationResult;
}

export interface EnsembleClassifierOptions {
  policy?: Partial<EnsemblePolicy>;
  logger?: Logger;
  /** Uniform source in [0, 1). Only the degraded fallback draws from it. */
  random?: () => number;
  /** Monotonic milliseconds, used for `processingTimeMs` */
  now?: () => number;
}

type PartialResult = Omit<ClassificationResult, "processingTimeMs">;

// ─── Classifier ─────────────────────────────────────────────────────────────────

export class EnsembleClassifier implements PostureClassifier {
  private readonly bundle: ModelBundle;
  private readonly policy: EnsemblePolicy;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(bundle: ModelBundle, options: EnsembleClassifierOptions = {}) {
    this.bundle = bundle;
    this.policy = { ...DEFAULT_ENSEMBLE_POLICY, ...options.policy };
    this.logger = options.logger ?? silentLogger;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => performance.now());

    for (const [stage, models] of [
      [1, bundle.stage1],
      [2, bundle.stage2],
    ] as const) {
      if (models.models.size > 0 && models.transform === null) {
        this.logger.warn(`Stage ${stage} has no scaler; models will see raw features`);
      }
    }
  }

  get stage2ModelCount(): number {
    return this.bundle.stage2.models.size;
  }

  modelWeight(name: string): number {
    return this.policy.modelWeights[name] ?? this.policy.defaultModelWeight;
  }

  predictStage1(features: FeatureVector): Result<StageOutcome, ClassificationError> {
    return this.vote(1, this.bundle.stage1, normalizeFeatures(features, PRESSURE_FEATURE_COUNT));
  }

  predictStage2(features: FeatureVector): Result<StageOutcome, ClassificationError> {
    return this.vote(2, this.bundle.stage2, normalizeFeatures(features, INERTIAL_FEATURE_COUNT));
  }

  /** Whether a stage-1 label with the given inertial reading would run stage 2. */
  shouldCascade(label: number, inertial: InertialReading | null): boolean {
    return inertial !== null && this.stage2ModelCount > 0 && this.policy.ambiguousLabels.includes(label);
  }

  classify(pressure: readonly number[], inertial: InertialReading | null): ClassificationResult {
    const started = this.now();
    let result: PartialResult;
    try {
      result = this.applyCascade(this.classifyPressure(pressure), inertial);
    } catch (e) {
      this.logger.error(`Classification failed; answering with a random posture: ${errorMessage(e)}`);
      result = this.degradedResult();
    }
    return { ...result, processingTimeMs: Math.max(0, this.now() - started) };
  }

  // ─── Chain steps ────────────────────────────────────────────────────────────

  private classifyPressure(pressure: readonly number[]): PartialResult {
    const features = normalizeFeatures(pressure, PRESSURE_FEATURE_COUNT);
    const stage1 = this.predictStage1(features);

    if (stage1.ok) {
      const { label, confidence, votingScores, votes, failedModels } = stage1.value;
      return {
        label,
        confidence,
        method: "ensemble_stage1",
        breakdown: votes,
        votingScores,
        stage2Applied: false,
        failedModels,
      };
    }

    if (stage1.error.kind !== "no_models") {
      this.logger.warn(`Stage 1 unavailable, using rules: ${stage1.error.message}`);
    }
    const rules = classifyByRules(features);
    const votingScores = new Array<number>(this.policy.classCount).fill(0);
    votingScores[rules.label] = rules.confidence;
    return {
      label: rules.label,
      confidence: rules.confidence,
      method: "rule_based",
      breakdown: [{ model: "rule_based", stage: 1, prediction: rules.label, confidence: rules.confidence }],
      votingScores,
      stage2Applied: false,
      failedModels: stage1.error.failedModels,
    };
  }

  private applyCascade(base: PartialResult, inertial: InertialReading | null): PartialResult {
    if (inertial === null || !this.shouldCascade(base.label, inertial)) {
      return base;
    }

    const stage2 = this.predictStage2(inertialToFeatures(inertial));
    if (!stage2.ok) {
      this.logger.warn(`Stage 2 unavailable: ${stage2.error.message}`);
      return { ...base, failedModels: [...base.failedModels, ...stage2.error.failedModels] };
    }

    const outcome = stage2.value;
    const breakdown = [...base.breakdown, ...outcome.votes];
    const failedModels = [...base.failedModels, ...outcome.failedModels];

    if (outcome.label !== NORMAL_POSTURE && outcome.confidence > this.policy.stage2OverrideConfidence) {
      this.logger.debug(
        `Stage 2 overrides label ${base.label} with ${outcome.label} (confidence ${outcome.confidence.toFixed(3)})`,
      );
      return {
        label: outcome.label,
        confidence: outcome.confidence,
        method: "ensemble_stage1_plus_stage2",
        breakdown,
        votingScores: outcome.votingScores,
        stage2Applied: true,
        failedModels,
      };
    }

    return { ...base, breakdown, failedModels };
  }

  private degradedResult(): PartialResult {
    const { classCount, randomConfidenceRange } = this.policy;
    const [low, high] = randomConfidenceRange;
    const label = Math.min(classCount - 1, Math.floor(this.random() * classCount));
    return {
      label,
      confidence: low + this.random() * (high - low),
      method: "degraded_random",
      breakdown: [],
      votingScores: new Array<number>(classCount).fill(0),
      stage2Applied: false,
      failedModels: [],
    };
  }

  // ─── Weighted vote ──────────────────────────────────────────────────────────

  private vote(
    stage: CascadeStage,
    stageModels: StageModels,
    features: FeatureVector,
  ): Result<StageOutcome, ClassificationError> {
    const { classCount } = this.policy;

    if (stageModels.models.size === 0) {
      return err({ kind: "no_models", stage, message: `No stage ${stage} models loaded`, failedModels: [] });
    }

    let input: FeatureVector;
    try {
      input = stageModels.transform ? stageModels.transform.transform(features) : features;
    } catch (e) {
      return err({
        kind: "transform_failed",
        stage,
        message: `Stage ${stage} scaler failed: ${errorMessage(e)}`,
        failedModels: [],
      });
    }

    const scores = new Array<number>(classCount).fill(0);
    const votes: ModelVote[] = [];
    const failedModels: string[] = [];

    for (const [name, model] of stageModels.models) {
      const weight = this.modelWeight(name);
      try {
        const prediction = model.predict(input);
        let confidence: number;
        if (model.kind === "probabilistic") {
          // Non-finite entries count as zero
          const probabilities = model.predictProbabilities(input).map((p) => (Number.isFinite(p) ? p : 0));
          for (let i = 0; i < classCount; i++) {
            scores[i] += weight * (probabilities[i] ?? 0);
          }
          confidence = Math.max(0, ...probabilities);
        } else {
          if (Number.isInteger(prediction) && prediction >= 0 && prediction < classCount) {
            scores[prediction] += weight;
          }
          confidence = this.policy.pointPredictionConfidence;
        }
        votes.push({ model: name, stage, prediction, confidence });
      } catch (e) {
        this.logger.warn(`Stage ${stage} model "${name}" failed: ${errorMessage(e)}`);
        failedModels.push(name);
      }
    }

    if (votes.length === 0) {
      return err({
        kind: "all_models_failed",
        stage,
        message: `All ${failedModels.length} stage ${stage} models failed`,
        failedModels,
      });
    }

    const total = scores.reduce((a, b) => a + b, 0);
    if (total <= 0) {
      return ok({ ...this.majorityVote(votes), votingScores: scores, votes, failedModels });
    }

    const label = argmax(scores);
    return ok({
      label,
      confidence: clamp(MIN_CONFIDENCE, MAX_CONFIDENCE, scores[label] / total),
      votingScores: scores,
      votes,
      failedModels,
    });
  }

  /** Fallback when the weighted scores carry no signal. Ties go to the first label seen. */
  private majorityVote(votes: readonly ModelVote[]): { label: number; confidence: number } {
    const counts = new Map<number, number>();
    for (const { prediction } of votes) {
      if (Number.isInteger(prediction) && prediction >= 0 && prediction < this.policy.classCount) {
        counts.set(prediction, (counts.get(prediction) ?? 0) + 1);
      }
    }
    if (counts.size === 0) {
      return { label: NORMAL_POSTURE, confidence: this.policy.emptyVoteConfidence };
    }
    let label = NORMAL_POSTURE;
    let best = 0;
    for (const [candidate, count] of counts) {
      if (count > best) {
        label = candidate;
        best = count;
      }
    }
    return { label, confidence: this.policy.majorityVoteConfidence };
  }
}
