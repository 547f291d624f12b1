import { describe, it, expect } from "vitest";
import { inferLayout, softmax, spatialSize } from "../modelHandle";

describe("inferLayout", () => {
  it("recognises channel-first inputs", () => {
    expect(inferLayout([1, 3, 224, 224])).toEqual({ layout: "channelFirst", shape: [1, 3, 224, 224] });
  });

  it("recognises channel-last inputs", () => {
    expect(inferLayout([1, 299, 299, 3])).toEqual({ layout: "channelLast", shape: [1, 299, 299, 3] });
  });

  it("resolves symbolic dimensions to 224", () => {
    expect(inferLayout([-1, 3, -1, -1])).toEqual({ layout: "channelFirst", shape: [1, 3, 224, 224] });
    expect(inferLayout([-1, 0, 0, 3])).toEqual({ layout: "channelLast", shape: [1, 224, 224, 3] });
  });

  it("keeps non-image shapes as declared", () => {
    expect(inferLayout([1, 20])).toEqual({ layout: "channelLast", shape: [1, 20] });
    expect(inferLayout([-1, 20])).toEqual({ layout: "channelLast", shape: [1, 20] });
  });
});

describe("spatialSize", () => {
  it("reads height and width from either layout", () => {
    expect(spatialSize({ tensorLayout: "channelFirst", expectedShape: [1, 3, 240, 320] })).toEqual({
      height: 240,
      width: 320,
    });
    expect(spatialSize({ tensorLayout: "channelLast", expectedShape: [1, 240, 320, 3] })).toEqual({
      height: 240,
      width: 320,
    });
  });
});

describe("softmax", () => {
  it("normalises scores into probabilities", () => {
    const probs = softmax([0, 3, 0, 0, 0]);
    const denominator = Math.exp(3) + 4;

    expect(probs[1]).toBeCloseTo(Math.exp(3) / denominator, 10);
    expect(probs[0]).toBeCloseTo(1 / denominator, 10);
    expect(probs.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 10);
  });

  it("is stable for large logits", () => {
    const probs = softmax([1000, 1000]);
    expect(probs).toEqual([0.5, 0.5]);
  });

  it("returns an empty list for empty input", () => {
    expect(softmax([])).toEqual([]);
  });
});
