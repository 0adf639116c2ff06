// Seat Posture Server - Model bundle loader
//
// Layout:
//   {modelDir}/stage1/*.json   pressure models (11 features)
//   {modelDir}/stage2/*.json   inertial models (6 features)
//   {modelDir}/stageN/scaler.json  optional StandardScaler for that stage
//
// Each model file loads independently: a broken file is logged and skipped,
// and a missing stage directory yields an empty stage.

import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { CLASS_COUNT } from "./posture-labels.js";
import { StandardScaler } from "./scaler.js";
import { buildScoredModel, type ModelDefinition } from "./scored-model.js";
import type { BoostedTree, BoostedTreeModel } from "./tree-ensemble.js";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import type { ModelBundle, NormalizationTransform, ScoredModel, StageModels } from "./types.js";

export const SCALER_FILENAME = "scaler.json";
export const STAGE_DIRECTORIES = { stage1: "stage1", stage2: "stage2" } as const;

// ─── Shape checks ───────────────────────────────────────────────────────────────

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fields(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));
}

function isNumberMatrix(value: unknown): value is number[][] {
  return Array.isArray(value) && value.length > 0 && value.every(isNumberArray);
}

function isIntegerArray(value: unknown): value is number[] {
  return isNumberArray(value) && value.every((v) => Number.isInteger(v));
}

function isBoostedTree(value: unknown): value is BoostedTree {
  if (!isObject(value)) return false;
  const t = fields(value);
  return (
    isIntegerArray(t.left_children) &&
    isIntegerArray(t.right_children) &&
    isNumberArray(t.split_conditions) &&
    isIntegerArray(t.split_indices) &&
    isNumberArray(t.base_weights) &&
    isIntegerArray(t.default_left)
  );
}

function isBaseScore(value: unknown): value is string | string[] {
  return typeof value === "string" || (Array.isArray(value) && value.every((s) => typeof s === "string"));
}

function readBooster(value: unknown): BoostedTreeModel {
  const learner = isObject(value) ? fields(value).learner : undefined;
  const booster = isObject(learner) ? fields(learner).gradient_booster : undefined;
  const model = isObject(booster) ? fields(booster).model : undefined;
  const trees = isObject(model) ? fields(model).trees : undefined;
  const params = isObject(learner) ? fields(learner).learner_model_param : undefined;
  const baseScore = isObject(params) ? fields(params).base_score : undefined;

  if (!Array.isArray(trees) || !trees.every(isBoostedTree)) {
    throw new Error("booster.learner.gradient_booster.model.trees is missing or malformed");
  }
  if (!isBaseScore(baseScore)) {
    throw new Error("booster.learner.learner_model_param.base_score is missing");
  }

  return {
    learner: {
      gradient_booster: { model: { trees } },
      learner_model_param: { base_score: baseScore },
    },
  };
}

function readLinear(raw: Record<string, unknown>): { coefficients: number[][]; intercepts: number[] } {
  const { coefficients, intercepts } = raw;
  if (!isNumberMatrix(coefficients)) throw new Error("coefficients must be a non-empty number matrix");
  if (!isNumberArray(intercepts) || intercepts.length !== coefficients.length) {
    throw new Error("intercepts must hold one number per coefficient row");
  }
  return { coefficients, intercepts };
}

/** Validate a decoded model file. Throws with a description of the first problem found. */
export function parseModelDefinition(value: unknown): ModelDefinition {
  if (!isObject(value)) throw new Error("Model file must contain a JSON object");
  const raw = fields(value);

  let classes: number[] | undefined;
  if (raw.classes !== undefined) {
    if (!isIntegerArray(raw.classes)) throw new Error("classes must be an array of integer labels");
    classes = raw.classes;
  }

  switch (raw.type) {
    case "logistic":
      return { type: "logistic", classes, ...readLinear(raw) };
    case "linear_svm":
      return { type: "linear_svm", classes, ...readLinear(raw) };
    case "nearest_centroid": {
      if (!isNumberMatrix(raw.centroids)) throw new Error("centroids must be a non-empty number matrix");
      return { type: "nearest_centroid", classes, centroids: raw.centroids };
    }
    case "xgboost": {
      const nClasses = raw.nClasses;
      if (typeof nClasses !== "number" || !Number.isInteger(nClasses) || nClasses < 2) {
        throw new Error("nClasses must be an integer >= 2");
      }
      return { type: "xgboost", classes, nClasses, booster: readBooster(raw.booster) };
    }
    default:
      throw new Error(`Unsupported model type: ${String(raw.type)}`);
  }
}

export function parseScaler(value: unknown): StandardScaler {
  if (!isObject(value)) throw new Error("Scaler file must contain a JSON object");
  const { mean, scale } = fields(value);
  if (!isNumberArray(mean) || !isNumberArray(scale)) {
    throw new Error("Scaler requires numeric mean and scale arrays");
  }
  return new StandardScaler(mean, scale);
}

// ─── Loading ────────────────────────────────────────────────────────────────────

export interface ModelLoaderOptions {
  classCount?: number;
  logger?: Logger;
}

async function readJson(path: string): Promise<unknown> {
  const text = await readFile(path, "utf-8");
  return JSON.parse(text);
}

async function listJsonFiles(dir: string): Promise<string[] | null> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && extname(e.name) === ".json")
      .map((e) => e.name)
      .sort();
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

/** Load one stage directory. Never throws for per-file problems. */
export async function loadStage(dir: string, options: ModelLoaderOptions = {}): Promise<StageModels> {
  const logger = options.logger ?? silentLogger;
  const classCount = options.classCount ?? CLASS_COUNT;
  const models = new Map<string, ScoredModel>();
  let transform: NormalizationTransform | null = null;

  let files: string[] | null;
  try {
    files = await listJsonFiles(dir);
  } catch (e) {
    logger.error(`Cannot read model directory ${dir}: ${errorMessage(e)}`);
    files = null;
  }

  if (files === null) {
    logger.info(`No model directory at ${dir}; stage is empty`);
    return { models, transform };
  }

  for (const file of files) {
    const path = join(dir, file);
    try {
      const json = await readJson(path);
      if (file === SCALER_FILENAME) {
        transform = parseScaler(json);
        logger.info(`Loaded scaler ${path}`);
        continue;
      }
      const name = basename(file, ".json");
      const model = buildScoredModel(parseModelDefinition(json), classCount);
      models.set(name, model);
      logger.info(`Loaded ${model.kind} model "${name}" from ${path}`);
    } catch (e) {
      logger.warn(`Skipping ${path}: ${errorMessage(e)}`);
    }
  }

  return { models, transform };
}

/** Load both cascade stages from `modelDir`. */
export async function loadModelBundle(modelDir: string, options: ModelLoaderOptions = {}): Promise<ModelBundle> {
  const stage1 = await loadStage(join(modelDir, STAGE_DIRECTORIES.stage1), options);
  const stage2 = await loadStage(join(modelDir, STAGE_DIRECTORIES.stage2), options);
  return freezeBundle({ stage1, stage2 });
}

export function freezeBundle(bundle: ModelBundle): ModelBundle {
  return Object.freeze({
    stage1: Object.freeze({ models: bundle.stage1.models, transform: bundle.stage1.transform }),
    stage2: Object.freeze({ models: bundle.stage2.models, transform: bundle.stage2.transform }),
  });
}

export function emptyModelBundle(): ModelBundle {
  return freezeBundle({
    stage1: { models: new Map(), transform: null },
    stage2: { models: new Map(), transform: null },
  });
}
