/**
 * Image quality, leaf colour/texture and environment metrics.
 *
 * Pure functions over a decoded RGB bitmap. Luminance is Rec. 601
 * (0.299R + 0.587G + 0.114B); hue is HSV hue in degrees.
 */

import type { Image } from "../platform/imageio/sharp";
import type { EnvironmentalFactors, LeafFeatures, QualityAnalysis } from "../domain/prediction";

export const QUALITY_THRESHOLDS = {
  blurrySharpness: 0.02,
  darkBrightness: 0.2,
  brightBrightness: 0.8,
  lowContrast: 0.1,
} as const;

const SHADOW_LUMINANCE = 50;
const HIGHLIGHT_LUMINANCE = 230;
const EDGE_DELTA = 30;

export interface ImageAnalysis {
  quality: QualityAnalysis;
  leaf: LeafFeatures;
  environment: EnvironmentalFactors;
}

export interface Hsv {
  h: number;
  s: number;
  v: number;
}

export function luminance(r: number, g: number, b: number): number {
  return 0.299 * r + 0.587 * g + 0.114 * b;
}

export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  let h = 0;
  if (delta > 0) {
    if (max === r) {
      h = 60 * (((g - b) / delta) % 6);
    } else if (max === g) {
      h = 60 * ((b - r) / delta + 2);
    } else {
      h = 60 * ((r - g) / delta + 4);
    }
  }
  if (h < 0) h += 360;

  return {
    h,
    s: max === 0 ? 0 : delta / max,
    v: max / 255,
  };
}

export function luminanceMap(image: Image): Float64Array {
  const { data, width, height } = image;
  const map = new Float64Array(width * height);
  for (let i = 0, p = 0; i < map.length; i++, p += 3) {
    map[i] = luminance(data[p], data[p + 1], data[p + 2]);
  }
  return map;
}

export function scoreQuality(brightness: number, contrast: number, sharpness: number): number {
  let score = 0.5;

  if (brightness >= 0.3 && brightness <= 0.7) {
    score += 0.2;
  } else {
    score -= Math.abs(brightness - 0.5) * 0.4;
  }

  score += Math.min(contrast * 2, 0.3);
  score += Math.min(sharpness * 10, 0.2);

  return clamp(score, 0, 1);
}

export function analyzeQuality(image: Image, lum: Float64Array = luminanceMap(image)): QualityAnalysis {
  const { width, height } = image;
  const count = width * height;

  let sum = 0;
  for (let i = 0; i < count; i++) sum += lum[i];
  const mean = sum / count;

  let variance = 0;
  for (let i = 0; i < count; i++) {
    const d = lum[i] - mean;
    variance += d * d;
  }
  variance /= count;

  // RMS of the 4-neighbour Laplacian over interior pixels
  let laplacianSq = 0;
  let interior = 0;
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const response = lum[i - 1] + lum[i + 1] + lum[i - width] + lum[i + width] - 4 * lum[i];
      laplacianSq += response * response;
      interior++;
    }
  }

  const averageBrightness = mean / 255;
  const contrast = Math.sqrt(variance) / 255;
  const sharpness = interior > 0 ? Math.sqrt(laplacianSq / interior) / 255 : 0;

  return {
    averageBrightness,
    contrast,
    sharpness,
    qualityScore: scoreQuality(averageBrightness, contrast, sharpness),
    isBlurry: sharpness < QUALITY_THRESHOLDS.blurrySharpness,
    brightnessIssue:
      averageBrightness < QUALITY_THRESHOLDS.darkBrightness ||
      averageBrightness > QUALITY_THRESHOLDS.brightBrightness,
  };
}

export function analyzeEnvironment(image: Image, lum: Float64Array = luminanceMap(image)): EnvironmentalFactors {
  const { width, height } = image;
  const count = width * height;

  let shadow = 0;
  let highlight = 0;
  let edges = 0;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const l = lum[i];
      if (l < SHADOW_LUMINANCE) shadow++;
      if (l > HIGHLIGHT_LUMINANCE) highlight++;
      if (x < width - 1 && y < height - 1 && Math.abs(l - lum[i + width + 1]) > EDGE_DELTA) {
        edges++;
      }
    }
  }

  const shadowRatio = shadow / count;
  const highlightRatio = highlight / count;
  const edgeDensity = edges / count;

  return {
    hasShadow: shadowRatio > 0.2,
    hasHighlight: highlightRatio > 0.1,
    complexBackground: edgeDensity > 0.3,
    shadowRatio,
    highlightRatio,
    edgeDensity,
  };
}

type PixelBucket = "yellow" | "green" | "brown" | "other";

// Buckets are exclusive; yellow is tested first because its band sits inside green's
export function classifyPixel(hsv: Hsv): PixelBucket {
  if (hsv.h >= 45 && hsv.h <= 65 && hsv.s > 0.6) return "yellow";
  if (hsv.h >= 35 && hsv.h <= 85 && hsv.s > 0.3) return "green";
  if (hsv.s > 0 && hsv.h >= 15 && hsv.h <= 35) return "brown";
  return "other";
}

export function computeCoffeeLeafScore(
  features: Omit<LeafFeatures, "coffeeLeafScore">,
  environment: EnvironmentalFactors,
): number {
  let score = 0.5;

  if (features.greenRatio > 0.3 || features.brownRatio > 0.2) score += 0.15;
  if (features.avgSaturation > 0.3) score += 0.15;
  if (features.avgTexture > 10 && features.avgTexture < 100) score += 0.2;
  if (features.shapeComplexity > 5 && features.shapeComplexity < 50) score += 0.2;
  if (features.edgeDensity > 0.1 && features.edgeDensity < 0.4) score += 0.15;
  if (!environment.complexBackground) score += 0.1;
  if (!environment.hasShadow && !environment.hasHighlight) score += 0.05;

  // No foliage colour at all, or a near-greyscale frame
  if (features.greenRatio + features.brownRatio + features.yellowRatio < 0.1) score -= 0.35;
  if (features.avgSaturation < 0.1) score -= 0.1;

  return clamp(score, 0, 1);
}

export function extractLeafFeatures(
  image: Image,
  environment: EnvironmentalFactors = analyzeEnvironment(image),
  lum: Float64Array = luminanceMap(image),
): LeafFeatures {
  const { data, width, height } = image;
  const count = width * height;

  let green = 0;
  let brown = 0;
  let yellow = 0;
  let hueSum = 0;
  let saturationSum = 0;
  let valueSum = 0;

  for (let i = 0, p = 0; i < count; i++, p += 3) {
    const hsv = rgbToHsv(data[p], data[p + 1], data[p + 2]);
    hueSum += hsv.h;
    saturationSum += hsv.s;
    valueSum += hsv.v;

    const bucket = classifyPixel(hsv);
    if (bucket === "green") green++;
    else if (bucket === "brown") brown++;
    else if (bucket === "yellow") yellow++;
  }

  // Mean absolute RGB gradient between horizontal neighbours
  let textureSum = 0;
  let pairs = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 1; x < width; x++) {
      const p = (y * width + x) * 3;
      const q = p - 3;
      textureSum +=
        Math.abs(data[p] - data[q]) + Math.abs(data[p + 1] - data[q + 1]) + Math.abs(data[p + 2] - data[q + 2]);
      pairs++;
    }
  }

  let shapeSum = 0;
  let interior = 0;
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const centre = lum[i];
      let deviation = 0;
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          if (dx === 0 && dy === 0) continue;
          deviation += Math.abs(lum[i + dy * width + dx] - centre);
        }
      }
      shapeSum += deviation;
      interior++;
    }
  }

  let edgePixels = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const right = x < width - 1 && Math.abs(lum[i] - lum[i + 1]) > EDGE_DELTA;
      const below = y < height - 1 && Math.abs(lum[i] - lum[i + width]) > EDGE_DELTA;
      if (right || below) edgePixels++;
    }
  }

  const features: Omit<LeafFeatures, "coffeeLeafScore"> = {
    greenRatio: green / count,
    brownRatio: brown / count,
    yellowRatio: yellow / count,
    avgHue: hueSum / count,
    avgSaturation: saturationSum / count,
    avgValue: valueSum / count,
    avgTexture: pairs > 0 ? textureSum / pairs : 0,
    shapeComplexity: interior > 0 ? shapeSum / interior : 0,
    edgeDensity: edgePixels / count,
  };

  return { ...features, coffeeLeafScore: computeCoffeeLeafScore(features, environment) };
}

/** Runs all three analyses over a shared luminance map. */
export function analyzeImage(image: Image): ImageAnalysis {
  const lum = luminanceMap(image);
  const environment = analyzeEnvironment(image, lum);
  return {
    quality: analyzeQuality(image, lum),
    leaf: extractLeafFeatures(image, environment, lum),
    environment,
  };
}

export function qualityWarnings(quality: QualityAnalysis): string[] {
  const warnings: string[] = [];
  if (quality.averageBrightness < QUALITY_THRESHOLDS.darkBrightness) {
    warnings.push("Image is too dark, photograph the leaf in brighter light");
  } else if (quality.averageBrightness > QUALITY_THRESHOLDS.brightBrightness) {
    warnings.push("Image is too bright and may be overexposed");
  }
  if (quality.contrast < QUALITY_THRESHOLDS.lowContrast) {
    warnings.push("Image lacks contrast");
  }
  if (quality.sharpness < QUALITY_THRESHOLDS.blurrySharpness) {
    warnings.push("Image is not sharp enough, retake the photo");
  }
  return warnings;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
