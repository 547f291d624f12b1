import { describe, it, expect } from "vitest";
import type { ModelHandle } from "../../inference/modelHandle";
import { SharpImageIO } from "../../platform/imageio/sharp";
import { AUGMENTATIONS, applyAugmentation } from "../augmentation";
import { encodeTensor, IMAGENET_MEAN, IMAGENET_STD, toTensorData } from "../tensorCodec";
import { imageFromPixels, stripedLeafImage } from "../../test/mocks/images";

// One red pixel, one green pixel
const twoPixels = imageFromPixels(2, 1, (x) => (x === 0 ? [255, 0, 0] : [0, 255, 0]));

function handle(tensorLayout: ModelHandle["tensorLayout"], expectedShape: number[]): ModelHandle {
  return { version: "v1", modelPath: "/models/v1.onnx", inputName: "in", outputName: "out", tensorLayout, expectedShape };
}

describe("toTensorData", () => {
  it("writes planar ImageNet-normalised channels for channel-first models", () => {
    const tensor = toTensorData(twoPixels, "channelFirst");

    expect(tensor.dims).toEqual([1, 3, 1, 2]);
    expect(tensor.data[0]).toBeCloseTo((1 - IMAGENET_MEAN[0]) / IMAGENET_STD[0], 5);
    expect(tensor.data[1]).toBeCloseTo((0 - IMAGENET_MEAN[0]) / IMAGENET_STD[0], 5);
    expect(tensor.data[2]).toBeCloseTo((0 - IMAGENET_MEAN[1]) / IMAGENET_STD[1], 5);
    expect(tensor.data[3]).toBeCloseTo((1 - IMAGENET_MEAN[1]) / IMAGENET_STD[1], 5);
  });

  it("writes interleaved [0, 1] values for channel-last models", () => {
    const tensor = toTensorData(twoPixels, "channelLast");

    expect(tensor.dims).toEqual([1, 1, 2, 3]);
    expect(Array.from(tensor.data)).toEqual([1, 0, 0, 0, 1, 0]);
  });
});

describe("encodeTensor", () => {
  it("resizes to the model's declared input size", async () => {
    const tensor = await encodeTensor(new SharpImageIO(), stripedLeafImage(32), handle("channelFirst", [1, 3, 8, 8]));

    expect(tensor.dims).toEqual([1, 3, 8, 8]);
    expect(tensor.data).toHaveLength(192);
  });

  it("honours channel-last shapes with different height and width", async () => {
    const tensor = await encodeTensor(new SharpImageIO(), stripedLeafImage(32), handle("channelLast", [1, 6, 10, 3]));

    expect(tensor.dims).toEqual([1, 6, 10, 3]);
    expect(tensor.data).toHaveLength(180);
  });
});

describe("applyAugmentation", () => {
  it("derives eight same-sized variants from one base image", async () => {
    const base = stripedLeafImage(32);
    const io = new SharpImageIO();
    const variants = await Promise.all(AUGMENTATIONS.map((spec) => applyAugmentation(io, base, spec)));

    expect(variants.map((v) => v.name)).toEqual([
      "identity",
      "rotate+2",
      "rotate-2",
      "brighten",
      "darken",
      "contrast+",
      "contrast-",
      "saturate",
    ]);
    expect(variants[0].image).toBe(base);
    for (const variant of variants) {
      expect([variant.image.width, variant.image.height]).toEqual([32, 32]);
    }
    expect(variants[3].image.data).not.toBe(base.data);
  });
});
