import type { Logger } from "pino";
import type { EnvironmentalFactors, QualityAnalysis } from "../domain/prediction";
import type { Image, ImageIO } from "../platform/imageio/sharp";

export const ENHANCEMENT_QUALITY_THRESHOLD = 0.7;

export type EnhancementStep =
  | { kind: "contrast"; factor: number }
  | { kind: "brightness"; factor: number }
  | { kind: "sharpen" };

export interface EnhancementResult {
  image: Image;
  steps: EnhancementStep[];
}

/**
 * Decides which corrections to apply. Order matters: contrast, brightness,
 * sharpen, then the mild contrast lift for shadowed or blown-out frames.
 */
export function planEnhancement(quality: QualityAnalysis, environment: EnvironmentalFactors): EnhancementStep[] {
  if (quality.qualityScore >= ENHANCEMENT_QUALITY_THRESHOLD) {
    return [];
  }

  const steps: EnhancementStep[] = [];

  if (quality.contrast < 0.1) {
    steps.push({ kind: "contrast", factor: 1.2 });
  }

  const brightness = quality.averageBrightness;
  if (brightness < 0.3) {
    steps.push({ kind: "brightness", factor: Math.min(1.6, 0.5 / Math.max(brightness, 0.01)) });
  } else if (brightness > 0.7) {
    steps.push({ kind: "brightness", factor: Math.max(0.7, 0.5 / brightness) });
  }

  if (quality.isBlurry) {
    steps.push({ kind: "sharpen" });
  }

  if (environment.hasShadow || environment.hasHighlight) {
    steps.push({ kind: "contrast", factor: 1.05 });
  }

  return steps;
}

export class ImageEnhancer {
  constructor(
    private readonly io: ImageIO,
    private readonly logger: Logger,
  ) {}

  async enhance(
    image: Image,
    quality: QualityAnalysis,
    environment: EnvironmentalFactors,
  ): Promise<EnhancementResult> {
    const steps = planEnhancement(quality, environment);
    if (steps.length === 0) {
      return { image, steps };
    }

    let current = image;
    for (const step of steps) {
      current = await this.apply(current, step);
    }

    this.logger.debug(
      { qualityScore: quality.qualityScore, steps: steps.map((s) => s.kind) },
      "Applied image enhancement",
    );
    return { image: current, steps };
  }

  private apply(image: Image, step: EnhancementStep): Promise<Image> {
    switch (step.kind) {
      case "contrast":
        return this.io.adjustContrast(image, step.factor);
      case "brightness":
        return this.io.modulate(image, { brightness: step.factor });
      case "sharpen":
        return this.io.sharpen(image);
    }
  }
}
