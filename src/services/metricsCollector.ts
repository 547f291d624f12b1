/**
 * MetricsCollector - in-process counters and latency histograms for /api/metrics
 */

interface Histogram {
  count: number;
  sum: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
}

export class MetricsCollector {
  private readonly predictionsByModel = new Map<string, number>();
  private readonly predictionsByModelFile = new Map<string, number>();
  private cacheHits = 0;
  private cacheMisses = 0;
  private branchFailures = 0;
  private notCoffeeLeaf = 0;
  private fallbacks = 0;
  private inferenceLatencies: number[] = [];
  private predictionLatencies: number[] = [];
  private readonly maxHistogramSamples = 1000;

  /** `modelFile` is the loaded file that answered, when a model did. */
  recordPrediction(modelVersion: string, latencyMs: number, modelFile?: string): void {
    this.predictionsByModel.set(modelVersion, (this.predictionsByModel.get(modelVersion) ?? 0) + 1);
    if (modelFile) {
      this.predictionsByModelFile.set(modelFile, (this.predictionsByModelFile.get(modelFile) ?? 0) + 1);
    }
    this.pushSample(this.predictionLatencies, latencyMs);
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordCacheMiss(): void {
    this.cacheMisses++;
  }

  recordBranchFailure(): void {
    this.branchFailures++;
  }

  recordNotCoffeeLeaf(): void {
    this.notCoffeeLeaf++;
  }

  recordFallback(): void {
    this.fallbacks++;
  }

  recordInferenceLatency(ms: number): void {
    this.pushSample(this.inferenceLatencies, ms);
  }

  getMetrics() {
    return {
      counters: {
        predictions_total: [...this.predictionsByModel.values()].reduce((acc, n) => acc + n, 0),
        predictions_by_model: Object.fromEntries(this.predictionsByModel),
        predictions_by_model_file: Object.fromEntries(this.predictionsByModelFile),
        cache_hits_total: this.cacheHits,
        cache_misses_total: this.cacheMisses,
        ensemble_branch_failures_total: this.branchFailures,
        not_coffee_leaf_total: this.notCoffeeLeaf,
        mock_fallbacks_total: this.fallbacks,
      },
      histograms: {
        inference_latency_ms: this.computeHistogram(this.inferenceLatencies),
        prediction_latency_ms: this.computeHistogram(this.predictionLatencies),
      },
    };
  }

  private pushSample(samples: number[], value: number): void {
    samples.push(value);
    // Keep only recent samples
    if (samples.length > this.maxHistogramSamples) {
      samples.shift();
    }
  }

  private computeHistogram(samples: number[]): Histogram {
    if (samples.length === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, p50: 0, p95: 0 };
    }

    const sorted = [...samples].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, val) => acc + val, 0);

    return {
      count: sorted.length,
      sum,
      min: sorted[0],
      max: sorted[sorted.length - 1],
      p50: this.percentile(sorted, 0.5),
      p95: this.percentile(sorted, 0.95),
    };
  }

  private percentile(sorted: number[], p: number): number {
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)];
  }
}
