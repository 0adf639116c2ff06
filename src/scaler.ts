// Seat Posture Server - Standard scaling of feature vectors
//
// (x - mean) / scale per feature. A zero scale leaves the centred value as is.

import type { FeatureVector, NormalizationTransform } from "./types.js";

export function standardScale(
  features: FeatureVector,
  mean: readonly number[],
  scale: readonly number[],
): FeatureVector {
  const result = new Array<number>(features.length);
  for (let i = 0; i < features.length; i++) {
    const m = mean[i] ?? 0;
    const s = scale[i] !== undefined && scale[i] !== 0 ? scale[i] : 1;
    result[i] = (features[i] - m) / s;
  }
  return result;
}

export class StandardScaler implements NormalizationTransform {
  private readonly mean: readonly number[];
  private readonly scale: readonly number[];

  constructor(mean: readonly number[], scale: readonly number[]) {
    if (mean.length !== scale.length) {
      throw new Error(`Scaler mean (${mean.length}) and scale (${scale.length}) lengths differ`);
    }
    this.mean = Object.freeze(mean.slice());
    this.scale = Object.freeze(scale.slice());
  }

  get featureCount(): number {
    return this.mean.length;
  }

  transform(features: FeatureVector): FeatureVector {
    return standardScale(features, this.mean, this.scale);
  }
}
