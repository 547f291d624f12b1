import type { Image, ImageIO } from "../platform/imageio/sharp";

export interface AugmentationSpec {
  name: string;
  apply(io: ImageIO, base: Image): Promise<Image>;
}

export interface Augmentation {
  name: string;
  image: Image;
}

export const AUGMENTATIONS: readonly AugmentationSpec[] = [
  { name: "identity", apply: async (_io, base) => base },
  { name: "rotate+2", apply: (io, base) => io.rotate(base, 2) },
  { name: "rotate-2", apply: (io, base) => io.rotate(base, -2) },
  { name: "brighten", apply: (io, base) => io.modulate(base, { brightness: 1.1 }) },
  { name: "darken", apply: (io, base) => io.modulate(base, { brightness: 0.9 }) },
  { name: "contrast+", apply: (io, base) => io.adjustContrast(base, 1.1) },
  { name: "contrast-", apply: (io, base) => io.adjustContrast(base, 0.9) },
  { name: "saturate", apply: (io, base) => io.modulate(base, { saturation: 1.1 }) },
];

/**
 * Derives one variant from the base. Transforms allocate fresh buffers, so
 * variants never share pixel storage except the identity; each one can be
 * built, used and dropped on its own.
 */
export async function applyAugmentation(io: ImageIO, base: Image, spec: AugmentationSpec): Promise<Augmentation> {
  return { name: spec.name, image: await spec.apply(io, base) };
}
