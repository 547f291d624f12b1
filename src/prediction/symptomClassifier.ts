import type { Logger } from "pino";
import { DISEASE_CLASSES, type DiseaseName } from "../domain/disease";
import type { HealthStatus } from "../domain/prediction";
import type { InferenceEngine } from "../inference/inferenceEngine";
import type { ModelTensor } from "../inference/modelHandle";

export const SYMPTOM_FEATURE_SIZE = 20;
export const SYMPTOM_MODEL_VERSION = "MLP_v1.0";
export const SYMPTOM_FALLBACK_VERSION = "MLP_v1.0_FALLBACK";
export const RELIABLE_SYMPTOM_COUNT = 3;

export interface SymptomPrediction {
  diseaseName: DiseaseName;
  confidence: number;
  allClassProbabilities: Record<DiseaseName, number>;
  modelVersion: string;
  totalSymptoms: number;
  features: string[];
  isReliable: boolean;
}

export interface SymptomClassifier {
  isAvailable(): boolean;
  classify(symptomIds: readonly number[]): Promise<SymptomPrediction>;
  healthCheck(): Promise<HealthStatus>;
}

/** Symptom ids are 1-based; ids outside 1..size are ignored. */
export function encodeSymptoms(symptomIds: readonly number[], size = SYMPTOM_FEATURE_SIZE): Float32Array {
  const vector = new Float32Array(size);
  for (const id of symptomIds) {
    if (Number.isInteger(id) && id >= 1 && id <= size) {
      vector[id - 1] = 1;
    }
  }
  return vector;
}

function uniformDistribution(): Record<DiseaseName, number> {
  const share = 1 / DISEASE_CLASSES.length;
  return {
    Cercospora: share,
    Healthy: share,
    Miner: share,
    Phoma: share,
    Rust: share,
  };
}

function topClass(distribution: Record<DiseaseName, number>): { diseaseName: DiseaseName; confidence: number } {
  let best: { diseaseName: DiseaseName; confidence: number } = { diseaseName: DISEASE_CLASSES[0], confidence: -1 };
  for (const name of DISEASE_CLASSES) {
    if (distribution[name] > best.confidence) {
      best = { diseaseName: name, confidence: distribution[name] };
    }
  }
  return best;
}

export class ModelSymptomClassifier implements SymptomClassifier {
  constructor(
    private readonly engine: InferenceEngine,
    private readonly logger: Logger,
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async classify(symptomIds: readonly number[]): Promise<SymptomPrediction> {
    const features = symptomIds.map((id) => `Symptom_${id}`);
    await this.engine.ensureLoaded();
    const lease = await this.engine.acquire();

    if (!lease) {
      const distribution = uniformDistribution();
      this.logger.debug({ totalSymptoms: symptomIds.length }, "Symptom model not loaded, using uniform fallback");
      return {
        ...topClass(distribution),
        allClassProbabilities: distribution,
        modelVersion: SYMPTOM_FALLBACK_VERSION,
        totalSymptoms: symptomIds.length,
        features,
        isReliable: false,
      };
    }

    try {
      const tensor: ModelTensor = { data: encodeSymptoms(symptomIds), dims: [1, SYMPTOM_FEATURE_SIZE] };
      const scores = await lease.run(tensor);
      const distribution = uniformDistribution();
      DISEASE_CLASSES.forEach((name, index) => {
        distribution[name] = index < scores.length ? Math.max(0, Math.min(1, scores[index])) : 0;
      });

      return {
        ...topClass(distribution),
        allClassProbabilities: distribution,
        modelVersion: SYMPTOM_MODEL_VERSION,
        totalSymptoms: symptomIds.length,
        features,
        isReliable: symptomIds.length >= RELIABLE_SYMPTOM_COUNT,
      };
    } finally {
      lease.release();
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    const handle = this.engine.currentHandle();
    return {
      component: "symptom-classifier",
      healthy: true,
      detail: handle ? `model ${handle.version}` : "uniform fallback (no model loaded)",
    };
  }
}

export class NullSymptomClassifier implements SymptomClassifier {
  isAvailable(): boolean {
    return false;
  }

  async classify(): Promise<SymptomPrediction> {
    throw new Error("Symptom classifier is disabled");
  }

  async healthCheck(): Promise<HealthStatus> {
    return { component: "symptom-classifier", healthy: true, detail: "disabled" };
  }
}
