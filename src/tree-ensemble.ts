/**
 * Pure TypeScript inference for exported gradient-boosted tree classifiers.
 *
 * Walks XGBoost decision trees in the flat array JSON format and turns the
 * per-class margins into probabilities. No native dependencies.
 */

// ============================================================================
// MODEL STRUCTURE (flat array format from XGBoost v2+ JSON export)
// ============================================================================

/** A single decision tree in flat array format. */
export interface BoostedTree {
  /** Left child node IDs (-1 = leaf) */
  left_children: number[];
  /** Right child node IDs (-1 = leaf) */
  right_children: number[];
  /** Split thresholds (for internal nodes) */
  split_conditions: number[];
  /** Feature index to split on (for internal nodes) */
  split_indices: number[];
  /** Leaf values for leaf nodes */
  base_weights: number[];
  /** 1 if missing values go left, 0 for right */
  default_left: number[];
}

export interface BoostedTreeModel {
  learner: {
    gradient_booster: {
      model: {
        trees: BoostedTree[];
      };
    };
    learner_model_param: {
      base_score: string | string[];
      num_class?: string;
    };
  };
}

// ============================================================================
// TREE TRAVERSAL
// ============================================================================

function traverseTree(tree: BoostedTree, features: readonly number[]): number {
  let nodeId = 0;
  // Bounded by node count so a malformed export cannot loop forever
  for (let steps = 0; steps <= tree.left_children.length; steps++) {
    if (tree.left_children[nodeId] === -1) {
      return tree.base_weights[nodeId];
    }

    const value = features[tree.split_indices[nodeId]];

    if (value === undefined || Number.isNaN(value)) {
      nodeId = tree.default_left[nodeId] === 1
        ? tree.left_children[nodeId]
        : tree.right_children[nodeId];
      continue;
    }

    // < threshold goes left, >= goes right
    nodeId = value < tree.split_conditions[nodeId]
      ? tree.left_children[nodeId]
      : tree.right_children[nodeId];
  }
  throw new Error("Tree traversal did not reach a leaf");
}

// ============================================================================
// MULTI-CLASS CLASSIFICATION
// ============================================================================

export function softmax(values: readonly number[]): number[] {
  const max = Math.max(...values);
  const exps = values.map((v) => Math.exp(v - max));
  const total = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / total);
}

export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

/** Parses base_score in either array form or the string-encoded '[5E-1,5E-1]' form. */
export function parseBaseScores(raw: string | string[], nClasses: number): number[] {
  if (Array.isArray(raw)) {
    return raw.map((s) => parseFloat(s));
  }
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    return trimmed.slice(1, -1).split(",").map((s) => parseFloat(s.trim()));
  }
  return new Array<number>(nClasses).fill(parseFloat(trimmed));
}

/**
 * Trees are interleaved by class: tree 0 → class 0, tree 1 → class 1, etc.
 */
export function predictTreeProbabilities(
  model: BoostedTreeModel,
  features: readonly number[],
  nClasses: number,
): number[] {
  const trees = model.learner.gradient_booster.model.trees;
  const baseScores = parseBaseScores(model.learner.learner_model_param.base_score, nClasses);

  const margins = new Array<number>(nClasses).fill(0);
  for (let c = 0; c < nClasses; c++) {
    margins[c] = baseScores[c] ?? baseScores[0] ?? 0;
  }

  for (let i = 0; i < trees.length; i++) {
    margins[i % nClasses] += traverseTree(trees[i], features);
  }

  return softmax(margins);
}
