import type { Logger } from "pino";
import { fuseConfidences } from "./confidencePolicy";
import type { SymptomClassifier, SymptomPrediction } from "./symptomClassifier";

export interface FusionOutcome {
  finalConfidence: number;
  fused: boolean;
  symptom?: SymptomPrediction;
}

/**
 * Blends image and symptom confidences. Never throws: a failing symptom
 * classifier leaves the image confidence as the final value.
 */
export class FusionPolicy {
  constructor(
    private readonly symptoms: SymptomClassifier,
    private readonly logger: Logger,
  ) {}

  async fuse(imageConfidence: number, symptomIds: readonly number[] = []): Promise<FusionOutcome> {
    if (symptomIds.length === 0 || !this.symptoms.isAvailable()) {
      return { finalConfidence: imageConfidence, fused: false };
    }

    try {
      const symptom = await this.symptoms.classify(symptomIds);
      return {
        finalConfidence: fuseConfidences(imageConfidence, symptom.confidence),
        fused: true,
        symptom,
      };
    } catch (error) {
      this.logger.warn({ err: error, symptomIds }, "Symptom classification failed, using image confidence only");
      return { finalConfidence: imageConfidence, fused: false };
    }
  }
}
