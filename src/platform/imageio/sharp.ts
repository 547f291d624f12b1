/**
 * Sharp-based ImageIO adapter
 *
 * Decodes uploads into raw 8-bit RGB bitmaps and performs the geometric and
 * tonal transforms used by enhancement, augmentation and tensor encoding.
 * Every operation returns a new Image; inputs are never written to.
 */

import sharp, { type Sharp } from "sharp";
import { DecodeFailedError } from "../../domain/errors";

// Raw RGB bitmap, row-major, 3 bytes per pixel
export interface Image {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
  readonly format: string;
}

export interface Modulation {
  brightness?: number;
  saturation?: number;
}

export interface ImageIO {
  decode(bytes: Buffer): Promise<Image>;
  resize(image: Image, width: number, height: number): Promise<Image>;
  rotate(image: Image, degrees: number): Promise<Image>;
  modulate(image: Image, modulation: Modulation): Promise<Image>;
  adjustContrast(image: Image, factor: number): Promise<Image>;
  sharpen(image: Image): Promise<Image>;
}

export class SharpImageIO implements ImageIO {
  private readonly maxDimension = 4096; // Safety limit for memory usage

  async decode(bytes: Buffer): Promise<Image> {
    if (bytes.length === 0) {
      throw new DecodeFailedError("Image payload is empty");
    }

    try {
      const sharpInstance = sharp(bytes);
      const metadata = await sharpInstance.metadata();

      if (!metadata.width || !metadata.height) {
        throw new DecodeFailedError("Invalid image dimensions");
      }

      if (metadata.width > this.maxDimension || metadata.height > this.maxDimension) {
        throw new DecodeFailedError(
          `Image too large: ${metadata.width}x${metadata.height} exceeds ${this.maxDimension}px limit`,
        );
      }

      const { data, info } = await sharpInstance
        .rotate() // honour EXIF orientation
        .removeAlpha()
        .toColorspace("srgb")
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.channels !== 3) {
        throw new DecodeFailedError(`Unsupported channel count after decode: ${info.channels}`);
      }

      return {
        data,
        width: info.width,
        height: info.height,
        channels: 3,
        format: metadata.format ?? "unknown",
      };
    } catch (error) {
      if (error instanceof DecodeFailedError) throw error;
      throw new DecodeFailedError(`Failed to decode image: ${error}`, { cause: error });
    }
  }

  async resize(image: Image, width: number, height: number): Promise<Image> {
    if (image.width === width && image.height === height) {
      return image;
    }
    try {
      return await this.toImage(
        this.pipeline(image).resize(width, height, {
          fit: "fill",
          kernel: sharp.kernel.lanczos3,
          fastShrinkOnLoad: false,
        }),
        image.format,
      );
    } catch (error) {
      throw new Error(`Failed to resize image: ${error}`);
    }
  }

  /**
   * Rotates about the centre and crops back to the original frame, so every
   * augmentation keeps the input's dimensions.
   */
  async rotate(image: Image, degrees: number): Promise<Image> {
    try {
      const rotated = await this.toImage(
        this.pipeline(image).rotate(degrees, { background: { r: 0, g: 0, b: 0 } }),
        image.format,
      );
      const left = Math.max(0, Math.floor((rotated.width - image.width) / 2));
      const top = Math.max(0, Math.floor((rotated.height - image.height) / 2));
      return await this.toImage(
        this.pipeline(rotated).extract({
          left,
          top,
          width: Math.min(image.width, rotated.width - left),
          height: Math.min(image.height, rotated.height - top),
        }),
        image.format,
      );
    } catch (error) {
      throw new Error(`Failed to rotate image: ${error}`);
    }
  }

  async modulate(image: Image, modulation: Modulation): Promise<Image> {
    try {
      return await this.toImage(this.pipeline(image).modulate(modulation), image.format);
    } catch (error) {
      throw new Error(`Failed to modulate image: ${error}`);
    }
  }

  // Linear stretch about mid-grey: out = factor * (in - 128) + 128
  async adjustContrast(image: Image, factor: number): Promise<Image> {
    try {
      return await this.toImage(this.pipeline(image).linear(factor, 128 * (1 - factor)), image.format);
    } catch (error) {
      throw new Error(`Failed to adjust contrast: ${error}`);
    }
  }

  async sharpen(image: Image): Promise<Image> {
    try {
      return await this.toImage(this.pipeline(image).sharpen({ sigma: 0.5 }), image.format);
    } catch (error) {
      throw new Error(`Failed to sharpen image: ${error}`);
    }
  }

  private pipeline(image: Image): Sharp {
    return sharp(image.data, {
      raw: {
        width: image.width,
        height: image.height,
        channels: image.channels,
      },
    });
  }

  private async toImage(pipeline: Sharp, format: string): Promise<Image> {
    const { data, info } = await pipeline.removeAlpha().raw().toBuffer({ resolveWithObject: true });
    if (info.channels !== 3) {
      throw new Error(`Unexpected channel count ${info.channels}`);
    }
    return { data, width: info.width, height: info.height, channels: 3, format };
  }
}
