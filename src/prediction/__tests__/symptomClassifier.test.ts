import { describe, it, expect } from "vitest";
import { InferenceEngine } from "../../inference/inferenceEngine";
import { encodeSymptoms, ModelSymptomClassifier, SYMPTOM_FEATURE_SIZE } from "../symptomClassifier";
import { FakeModelCatalog, FakeModelLoader, silentLogger } from "../../test/mocks/fakes";

function symptomEngine(catalog: FakeModelCatalog, loader: FakeModelLoader): InferenceEngine {
  return new InferenceEngine(catalog, loader, silentLogger(), {
    modelType: "symptom",
    loadOptions: { defaultShape: [1, SYMPTOM_FEATURE_SIZE], readSidecar: false },
  });
}

describe("encodeSymptoms", () => {
  it("sets one slot per 1-based symptom id and ignores out-of-range ids", () => {
    const vector = encodeSymptoms([1, 4, 20, 0, 21, 2.5, 4]);

    expect(vector).toHaveLength(20);
    expect(Array.from(vector.entries()).filter(([, v]) => v === 1).map(([i]) => i)).toEqual([0, 3, 19]);
  });
});

describe("ModelSymptomClassifier", () => {
  it("returns a uniform distribution when no symptom model exists", async () => {
    const classifier = new ModelSymptomClassifier(
      symptomEngine(new FakeModelCatalog({}), new FakeModelLoader({})),
      silentLogger(),
    );

    const prediction = await classifier.classify([2, 5]);

    expect(prediction.confidence).toBeCloseTo(0.2, 10);
    expect(prediction.allClassProbabilities.Rust).toBeCloseTo(0.2, 10);
    expect(prediction.diseaseName).toBe("Cercospora");
    expect(prediction.modelVersion).toBe("MLP_v1.0_FALLBACK");
    expect(prediction.isReliable).toBe(false);
    expect(prediction.features).toEqual(["Symptom_2", "Symptom_5"]);
    expect((await classifier.healthCheck()).detail).toBe("uniform fallback (no model loaded)");
  });

  it("feeds the encoded vector to the model and reads its probabilities", async () => {
    const loader = new FakeModelLoader({ symptoms: { scores: [0.1, 0.05, 0.7, 0.1, 0.05] } });
    const engine = symptomEngine(new FakeModelCatalog({ symptom: "/models/symptoms.onnx" }), loader);
    const classifier = new ModelSymptomClassifier(engine, silentLogger());

    const prediction = await classifier.classify([1, 2, 3]);

    expect(prediction.diseaseName).toBe("Miner");
    expect(prediction.confidence).toBeCloseTo(0.7, 6);
    expect(prediction.modelVersion).toBe("MLP_v1.0");
    expect(prediction.totalSymptoms).toBe(3);
    expect(prediction.isReliable).toBe(true);

    expect(engine.currentHandle()?.expectedShape).toEqual([1, 20]);
    expect(loader.tensors[0].dims).toEqual([1, 20]);
    expect(Array.from(loader.tensors[0].data.slice(0, 4))).toEqual([1, 1, 1, 0]);
  });

  it("clamps out-of-range scores and marks short symptom lists unreliable", async () => {
    const loader = new FakeModelLoader({ symptoms: { scores: [-0.5, 0.2, 0.1, 0.1, 1.4] } });
    const classifier = new ModelSymptomClassifier(
      symptomEngine(new FakeModelCatalog({ symptom: "/models/symptoms.onnx" }), loader),
      silentLogger(),
    );

    const prediction = await classifier.classify([7]);

    expect(prediction.diseaseName).toBe("Rust");
    expect(prediction.confidence).toBe(1);
    expect(prediction.allClassProbabilities.Cercospora).toBe(0);
    expect(prediction.isReliable).toBe(false);
  });
});
