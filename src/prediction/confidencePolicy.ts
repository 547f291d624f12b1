import type { LeafFeatures, QualityAnalysis } from "../domain/prediction";

export const IMAGE_WEIGHT = 0.7;
export const SYMPTOM_WEIGHT = 0.3;

// Nudges the ensemble confidence by image quality and leaf plausibility
export function adjustConfidence(
  confidence: number,
  quality: Pick<QualityAnalysis, "qualityScore">,
  leaf: Pick<LeafFeatures, "coffeeLeafScore">,
): number {
  let adjustment = 0;

  if (quality.qualityScore > 0.8) adjustment += 0.05;
  else if (quality.qualityScore < 0.5) adjustment -= 0.1;

  if (leaf.coffeeLeafScore > 0.8) adjustment += 0.03;
  else if (leaf.coffeeLeafScore < 0.4) adjustment -= 0.05;

  return Math.max(0.1, Math.min(0.98, confidence + adjustment));
}

export function fuseConfidences(imageConfidence: number, symptomConfidence: number): number {
  return IMAGE_WEIGHT * imageConfidence + SYMPTOM_WEIGHT * symptomConfidence;
}
