import type { Image, ImageIO } from "../platform/imageio/sharp";
import { spatialSize, type ModelHandle, type ModelTensor, type TensorLayout } from "../inference/modelHandle";

export const IMAGENET_MEAN = [0.485, 0.456, 0.406] as const;
export const IMAGENET_STD = [0.229, 0.224, 0.225] as const;

/**
 * Lays out an already-resized bitmap. Channel-first applies ImageNet
 * normalisation; channel-last scales to [0, 1].
 */
export function toTensorData(image: Image, layout: TensorLayout): ModelTensor {
  const { data, width, height } = image;
  const plane = width * height;
  const out = new Float32Array(plane * 3);

  if (layout === "channelFirst") {
    for (let i = 0, p = 0; i < plane; i++, p += 3) {
      for (let c = 0; c < 3; c++) {
        out[c * plane + i] = (data[p + c] / 255 - IMAGENET_MEAN[c]) / IMAGENET_STD[c];
      }
    }
    return { data: out, dims: [1, 3, height, width] };
  }

  for (let i = 0; i < plane * 3; i++) {
    out[i] = data[i] / 255;
  }
  return { data: out, dims: [1, height, width, 3] };
}

export async function encodeTensor(io: ImageIO, image: Image, handle: ModelHandle): Promise<ModelTensor> {
  const { width, height } = spatialSize(handle);
  const resized = await io.resize(image, width, height);
  return toTensorData(resized, handle.tensorLayout);
}
