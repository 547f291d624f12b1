import { determineSeverityLevel, type DiseaseCatalog, type PredictedLabel } from "../domain/disease";
import type { PredictionResult, QualityAnalysis } from "../domain/prediction";
import { qualityWarnings } from "../processing/featureExtractor";

export const GOOD_QUALITY_NOTE = "Good image quality, the prediction is reliable.";
export const POOR_QUALITY_NOTE = "Low image quality, retake a sharper photo for a more accurate result.";

export interface ResultInput {
  label: PredictedLabel;
  confidence: number;
  finalConfidence?: number;
  quality?: QualityAnalysis;
  modelVersion: string;
  startedAt: number;
}

export function qualityNote(quality: QualityAnalysis): string | null {
  if (quality.qualityScore > 0.8) return GOOD_QUALITY_NOTE;
  if (quality.qualityScore < 0.5) return POOR_QUALITY_NOTE;
  return null;
}

/**
 * Assembles the caller-facing result. Severity follows the confidence the
 * caller sees last: the fused value when symptoms contributed.
 */
export function buildResult(catalog: DiseaseCatalog, input: ResultInput, now: number = performance.now()): PredictionResult {
  const guidance = catalog.guidanceFor(input.label);
  const warnings = input.quality ? qualityWarnings(input.quality) : [];

  const sections = [guidance.description];
  const note = input.quality ? qualityNote(input.quality) : null;
  if (note) sections.push(note);
  if (warnings.length > 0) sections.push(`Warnings: ${warnings.join("; ")}`);

  return {
    diseaseName: input.label,
    confidence: input.confidence,
    ...(input.finalConfidence !== undefined && { finalConfidence: input.finalConfidence }),
    severityLevel: determineSeverityLevel(input.finalConfidence ?? input.confidence),
    description: sections.join("\n\n"),
    treatmentSuggestion: guidance.treatment,
    warnings,
    modelVersion: input.modelVersion,
    processingTimeMs: Math.max(0, Math.round(now - input.startedAt)),
    createdAt: new Date().toISOString(),
  };
}
