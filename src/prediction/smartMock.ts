import type { DiseaseName } from "../domain/disease";
import type { ImageAnalysis } from "../processing/featureExtractor";

export interface MockDecision {
  diseaseName: DiseaseName;
  confidence: number;
}

export const FALLBACK_DECISION: MockDecision = { diseaseName: "Healthy", confidence: 0.5 };

/**
 * Feature-informed placeholder used while no image model is loaded or the
 * real pipeline failed. Deterministic: the same analysis always yields the
 * same label and confidence.
 */
export function smartMockDecision({ quality, leaf }: ImageAnalysis): MockDecision {
  let diseaseName: DiseaseName;
  if (leaf.brownRatio > 0.3) {
    diseaseName = leaf.avgTexture > 50 ? "Phoma" : "Cercospora";
  } else if (leaf.greenRatio > 0.6 && quality.qualityScore > 0.6) {
    diseaseName = "Healthy";
  } else if (leaf.avgTexture > 50) {
    diseaseName = "Miner";
  } else {
    diseaseName = "Rust";
  }

  const confidence = 0.7 + 0.2 * quality.qualityScore + 0.15 * leaf.coffeeLeafScore;
  return { diseaseName, confidence: Math.max(0.5, Math.min(0.95, confidence)) };
}
