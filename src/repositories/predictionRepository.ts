import type Database from "better-sqlite3";
import { isDiseaseName, NOT_COFFEE_LEAF, type PredictedLabel, type SeverityLevel } from "../domain/disease";
import type { PredictionResult, ProcessingRequest, RequestState, RequestStatus } from "../domain/prediction";

export const MAX_ERROR_MESSAGE_LENGTH = 500;

export interface StatusDetails {
  predictionId?: number;
  errorMessage?: string;
}

export interface PredictionRepository {
  /** Idempotent per requestId: a replayed request returns the existing row id. */
  savePrediction(result: PredictionResult, imageRef: string, requestId?: string): number;
  recordSubmission(request: ProcessingRequest): void;
  updateRequestStatus(requestId: string, status: RequestState, details?: StatusDetails): void;
  getRequestStatus(requestId: string): RequestStatus | null;
  /** Status of whichever request touched this image most recently. */
  getLatestStatusForImage(imageRef: string): RequestStatus | null;
  getPrediction(id: number): PredictionResult | null;
}

interface PredictionRow {
  id: number;
  request_id: string | null;
  image_ref: string;
  disease_name: string;
  confidence: number;
  final_confidence: number | null;
  severity_level: SeverityLevel;
  description: string;
  treatment_suggestion: string;
  warnings_json: string;
  model_version: string;
  processing_time_ms: number;
  created_at: string;
}

interface RequestRow {
  request_id: string;
  image_ref: string;
  status: RequestState;
  prediction_id: number | null;
  error_message: string | null;
  updated_at: string;
}

const now = () => new Date().toISOString();

export function truncateError(message: string): string {
  return message.length > MAX_ERROR_MESSAGE_LENGTH ? message.slice(0, MAX_ERROR_MESSAGE_LENGTH) : message;
}

function toLabel(value: string): PredictedLabel {
  if (value === NOT_COFFEE_LEAF || isDiseaseName(value)) return value;
  throw new Error(`Unknown disease label in store: ${value}`);
}

function parseWarnings(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

function rowToResult(row: PredictionRow): PredictionResult {
  return {
    id: row.id,
    diseaseName: toLabel(row.disease_name),
    confidence: row.confidence,
    ...(row.final_confidence !== null && { finalConfidence: row.final_confidence }),
    severityLevel: row.severity_level,
    description: row.description,
    treatmentSuggestion: row.treatment_suggestion,
    warnings: parseWarnings(row.warnings_json),
    modelVersion: row.model_version,
    processingTimeMs: row.processing_time_ms,
    createdAt: row.created_at,
  };
}

export class SqlitePredictionRepository implements PredictionRepository {
  constructor(private readonly db: Database.Database) {}

  savePrediction(result: PredictionResult, imageRef: string, requestId?: string): number {
    const insert = this.db.prepare<unknown[]>(
      `INSERT OR IGNORE INTO predictions (
        request_id, image_ref, disease_name, confidence, final_confidence, severity_level,
        description, treatment_suggestion, warnings_json, model_version, processing_time_ms, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    const info = insert.run(
      requestId ?? null,
      imageRef,
      result.diseaseName,
      result.confidence,
      result.finalConfidence ?? null,
      result.severityLevel,
      result.description,
      result.treatmentSuggestion,
      JSON.stringify(result.warnings),
      result.modelVersion,
      Math.round(result.processingTimeMs),
      result.createdAt,
    );

    if (info.changes > 0) {
      return Number(info.lastInsertRowid);
    }

    // Row already written by an earlier delivery of the same request
    const existing = this.db
      .prepare<[string], { id: number }>(`SELECT id FROM predictions WHERE request_id = ?`)
      .get(requestId ?? "");
    if (!existing) {
      throw new Error(`Prediction insert ignored but no row found for request ${requestId}`);
    }
    return existing.id;
  }

  recordSubmission(request: ProcessingRequest): void {
    const timestamp = now();
    const write = this.db.transaction(() => {
      const info = this.db
        .prepare<unknown[]>(
          `INSERT OR IGNORE INTO processing_requests (
            request_id, image_ref, symptom_ids_json, status, requested_at, updated_at
          ) VALUES (?, ?, ?, 'Processing', ?, ?)`,
        )
        .run(request.requestId, request.imageRef, JSON.stringify(request.symptomIds), request.requestedAt, timestamp);
      if (info.changes > 0) {
        this.appendLog(request.requestId, request.imageRef, "Processing", "Submitted", timestamp);
      }
    });
    write();
  }

  updateRequestStatus(requestId: string, status: RequestState, details: StatusDetails = {}): void {
    const timestamp = now();
    const errorMessage = details.errorMessage !== undefined ? truncateError(details.errorMessage) : null;

    const write = this.db.transaction(() => {
      const row = this.db
        .prepare<[string], { image_ref: string }>(`SELECT image_ref FROM processing_requests WHERE request_id = ?`)
        .get(requestId);
      if (!row) {
        throw new Error(`Unknown request ${requestId}`);
      }

      this.db
        .prepare<unknown[]>(
          `UPDATE processing_requests
           SET status = ?, prediction_id = COALESCE(?, prediction_id), error_message = ?, updated_at = ?
           WHERE request_id = ?`,
        )
        .run(status, details.predictionId ?? null, errorMessage, timestamp, requestId);

      this.appendLog(requestId, row.image_ref, status, errorMessage, timestamp);
    });
    write();
  }

  getRequestStatus(requestId: string): RequestStatus | null {
    const row = this.db
      .prepare<[string], RequestRow>(
        `SELECT request_id, image_ref, status, prediction_id, error_message, updated_at
         FROM processing_requests WHERE request_id = ?`,
      )
      .get(requestId);
    if (!row) return null;

    const result = row.prediction_id !== null ? this.getPrediction(row.prediction_id) : null;
    return {
      requestId: row.request_id,
      imageRef: row.image_ref,
      status: row.status,
      ...(row.prediction_id !== null && { predictionId: row.prediction_id }),
      ...(result && { result }),
      ...(row.error_message !== null && { errorMessage: row.error_message }),
      updatedAt: row.updated_at,
    };
  }

  getLatestStatusForImage(imageRef: string): RequestStatus | null {
    // The log id is strictly increasing, unlike updated_at which can tie within a millisecond
    const latest = this.db
      .prepare<[string], { request_id: string }>(
        `SELECT request_id FROM prediction_logs WHERE image_ref = ? ORDER BY id DESC LIMIT 1`,
      )
      .get(imageRef);
    return latest ? this.getRequestStatus(latest.request_id) : null;
  }

  getPrediction(id: number): PredictionResult | null {
    const row = this.db.prepare<[number], PredictionRow>(`SELECT * FROM predictions WHERE id = ?`).get(id);
    return row ? rowToResult(row) : null;
  }

  countPredictions(): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM predictions`).get();
    return row?.count ?? 0;
  }

  private appendLog(
    requestId: string,
    imageRef: string,
    status: RequestState,
    message: string | null,
    timestamp: string,
  ): void {
    this.db
      .prepare<unknown[]>(
        `INSERT INTO prediction_logs (request_id, image_ref, status, message, created_at) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(requestId, imageRef, status, message, timestamp);
  }
}
