import { createHash } from "node:crypto";

/** Content digest of the raw upload bytes; identical bytes always map to the same key. */
export function computeImageHash(bytes: Buffer): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Keyed by the model file that answered, so entries written under another
 * model are never served. Symptoms change the fused confidence and join
 * the key when present.
 */
export function predictionCacheKey(
  modelVersion: string,
  imageHash: string,
  symptomIds: readonly number[] = [],
): string {
  const base = `pred:${modelVersion}:${imageHash}`;
  if (symptomIds.length === 0) return base;
  const symptoms = [...new Set(symptomIds)].sort((a, b) => a - b).join(",");
  return `${base}:s=${symptoms}`;
}
