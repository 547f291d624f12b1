import { DISEASE_CLASSES, type DiseaseName } from "../domain/disease";
import { EmptyEnsembleError } from "../domain/errors";
import type { ClassProbability, LeafFeatures } from "../domain/prediction";

export const STABILITY_BONUS_WEIGHT = 0.1;
export const STABILITY_MIN_MEMBERS = 3;

export interface EnsembleDecision {
  diseaseName: DiseaseName;
  confidence: number;
  members: number;
  meanConfidence: number;
  stabilityBonus: number;
}

/** Maps a softmaxed output row onto the fixed class order, highest first. */
export function toClassProbabilities(probabilities: readonly number[]): ClassProbability[] {
  const count = Math.min(DISEASE_CLASSES.length, probabilities.length);
  const result: ClassProbability[] = [];
  for (let i = 0; i < count; i++) {
    result.push({ diseaseName: DISEASE_CLASSES[i], confidence: probabilities[i] });
  }
  return result.sort((a, b) => b.confidence - a.confidence);
}

/**
 * Combines the top prediction of each surviving augmentation branch.
 * The label group with the highest mean wins; agreement across at least
 * three branches earns a bonus that shrinks with the group's spread.
 */
export function combineEnsemble(
  predictions: readonly ClassProbability[],
  leaf: Pick<LeafFeatures, "greenRatio" | "avgTexture">,
): EnsembleDecision {
  if (predictions.length === 0) {
    throw new EmptyEnsembleError();
  }

  const groups = new Map<DiseaseName, number[]>();
  for (const prediction of predictions) {
    const group = groups.get(prediction.diseaseName);
    if (group) {
      group.push(prediction.confidence);
    } else {
      groups.set(prediction.diseaseName, [prediction.confidence]);
    }
  }

  let winner: { name: DiseaseName; values: number[]; mean: number } | null = null;
  for (const [name, values] of groups) {
    const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
    if (!winner || mean > winner.mean) {
      winner = { name, values, mean };
    }
  }
  if (!winner) {
    throw new EmptyEnsembleError();
  }

  let stabilityBonus = 0;
  if (winner.values.length >= STABILITY_MIN_MEMBERS) {
    const spread = Math.max(...winner.values) - Math.min(...winner.values);
    stabilityBonus = (1 - spread) * STABILITY_BONUS_WEIGHT;
  }

  let confidence = winner.mean + stabilityBonus;

  if (winner.name === "Healthy" && leaf.greenRatio < 0.3) {
    confidence *= 0.8;
  }
  if (winner.name === "Miner" && leaf.avgTexture < 10) {
    confidence *= 0.7;
  }

  return {
    diseaseName: winner.name,
    confidence: Math.max(0.01, Math.min(0.99, confidence)),
    members: winner.values.length,
    meanConfidence: winner.mean,
    stabilityBonus,
  };
}
