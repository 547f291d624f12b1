import type { DiseaseName, PredictedLabel, SeverityLevel } from "./disease";

export interface QualityAnalysis {
  averageBrightness: number;
  contrast: number;
  sharpness: number;
  qualityScore: number;
  isBlurry: boolean;
  brightnessIssue: boolean;
}

export interface LeafFeatures {
  greenRatio: number;
  brownRatio: number;
  yellowRatio: number;
  avgHue: number;
  avgSaturation: number;
  avgValue: number;
  avgTexture: number;
  shapeComplexity: number;
  edgeDensity: number;
  coffeeLeafScore: number;
}

export interface EnvironmentalFactors {
  hasShadow: boolean;
  hasHighlight: boolean;
  complexBackground: boolean;
  shadowRatio: number;
  highlightRatio: number;
  edgeDensity: number;
}

export interface ClassProbability {
  diseaseName: DiseaseName;
  confidence: number;
}

/** Tags identifying which pipeline variant produced a result. */
export const MODEL_VERSION = {
  real: "coffee_resnet50_v1.1_enhanced_REAL",
  smartMock: "coffee_resnet50_v1.1_enhanced_SMART",
  fallback: "coffee_resnet50_v1.1_enhanced_FALLBACK",
  leafGate: "leaf_gate_v1",
} as const;

export interface PredictionResult {
  id?: number;
  diseaseName: PredictedLabel;
  confidence: number;
  finalConfidence?: number;
  severityLevel: SeverityLevel;
  description: string;
  treatmentSuggestion: string;
  warnings: string[];
  modelVersion: string;
  processingTimeMs: number;
  createdAt: string;
}

export interface ProcessingRequest {
  requestId: string;
  imageRef: string;
  symptomIds: number[];
  requestedAt: string;
}

export type RequestState = "Processing" | "Success" | "Failed";

export interface RequestStatus {
  requestId: string;
  imageRef: string;
  status: RequestState;
  predictionId?: number;
  result?: PredictionResult;
  errorMessage?: string;
  updatedAt: string;
}

export type SubmissionStatus = "Processing" | "Completed";

export interface SubmissionResponse {
  imageRef: string;
  requestId: string;
  status: SubmissionStatus;
  result?: PredictionResult;
  message: string;
}

export interface BatchPredictionResponse {
  results: PredictionResult[];
  totalProcessed: number;
  successCount: number;
  failureCount: number;
  totalProcessingTimeMs: number;
  errors: string[];
}

export interface HealthStatus {
  component: string;
  healthy: boolean;
  detail: string;
}
