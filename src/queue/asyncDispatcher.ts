import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { QueueUnavailableError, errorMessage } from "../domain/errors";
import type { PredictionResult, ProcessingRequest, RequestStatus, SubmissionResponse } from "../domain/prediction";
import type { PredictionRepository } from "../repositories/predictionRepository";
import type { ImageStore } from "../storage/imageStore";
import { withTimeout } from "../utils/timeout";
import type { QueueBroker, QueueDelivery } from "./queueBroker";

/** The synchronous prediction path, as seen by the dispatcher and its worker. */
export interface Predictor {
  predict(bytes: Buffer, symptomIds?: readonly number[]): Promise<PredictionResult>;
}

export interface SubmitOptions {
  requestId?: string;
  symptomIds?: number[];
}

export interface AsyncDispatcherDeps {
  broker: QueueBroker;
  images: ImageStore;
  repository: PredictionRepository;
  predictor: Predictor;
  logger: Logger;
  publishTimeoutMs: number;
}

export class AsyncDispatcher {
  private readonly logger: Logger;

  constructor(private readonly deps: AsyncDispatcherDeps) {
    this.logger = deps.logger.child({ component: "dispatcher" });
  }

  /**
   * Stores the upload and queues it. If the broker cannot take the message
   * in time, the prediction runs inline and the response says "Completed".
   */
  async submit(bytes: Buffer, options: SubmitOptions = {}): Promise<SubmissionResponse> {
    const imageRef = await this.deps.images.save(bytes);
    const request: ProcessingRequest = {
      requestId: options.requestId ?? uuidv4(),
      imageRef,
      symptomIds: options.symptomIds ?? [],
      requestedAt: new Date().toISOString(),
    };
    this.deps.repository.recordSubmission(request);

    try {
      await withTimeout(
        this.deps.broker.publish(request),
        this.deps.publishTimeoutMs,
        () => new QueueUnavailableError(`Publish timed out after ${this.deps.publishTimeoutMs}ms`),
      );
      this.logger.info({ requestId: request.requestId, imageRef }, "Prediction request queued");
      return {
        imageRef,
        requestId: request.requestId,
        status: "Processing",
        message: "Image queued for analysis",
      };
    } catch (error) {
      this.logger.warn(
        { err: error, requestId: request.requestId },
        "Queue unavailable, processing synchronously",
      );
    }

    const result = await this.process(request, bytes);
    return {
      imageRef,
      requestId: request.requestId,
      status: "Completed",
      result,
      message: "Image analysed synchronously",
    };
  }

  /**
   * Runs one request end to end and records the outcome. Replays of the
   * same requestId reuse the existing prediction row.
   */
  async process(request: ProcessingRequest, preloaded?: Buffer): Promise<PredictionResult> {
    const { repository } = this.deps;
    try {
      const bytes = preloaded ?? (await this.deps.images.read(request.imageRef));
      const result = await this.deps.predictor.predict(bytes, request.symptomIds);
      const predictionId = repository.savePrediction(result, request.imageRef, request.requestId);
      repository.updateRequestStatus(request.requestId, "Success", { predictionId });
      return { ...result, id: predictionId };
    } catch (error) {
      this.recordFailure(request, error);
      throw error;
    }
  }

  getStatus(requestId: string): RequestStatus | null {
    return this.deps.repository.getRequestStatus(requestId);
  }

  getStatusByImage(imageRef: string): RequestStatus | null {
    return this.deps.repository.getLatestStatusForImage(imageRef);
  }

  private recordFailure(request: ProcessingRequest, error: unknown): void {
    try {
      this.deps.repository.updateRequestStatus(request.requestId, "Failed", { errorMessage: errorMessage(error) });
    } catch (statusError) {
      this.logger.error(
        { err: statusError, requestId: request.requestId },
        "Could not record failed status for request",
      );
    }
  }
}

/**
 * Queue consumer: replays the synchronous path for each delivery, acks only
 * after the result is persisted and rejects (without requeue) on failure.
 */
export class PredictionWorker {
  private readonly logger: Logger;
  private running = false;

  constructor(
    private readonly broker: QueueBroker,
    private readonly dispatcher: AsyncDispatcher,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "prediction-worker" });
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.broker.consume((delivery) => this.handle(delivery));
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.broker.stop();
  }

  async handle(delivery: QueueDelivery): Promise<void> {
    const { payload } = delivery;
    try {
      const result = await this.dispatcher.process(payload);
      delivery.ack();
      this.logger.info(
        { requestId: payload.requestId, attempt: delivery.attempt, diseaseName: result.diseaseName },
        "Prediction request completed",
      );
    } catch (error) {
      this.logger.error({ err: error, requestId: payload.requestId }, "Prediction request failed");
      delivery.reject(error instanceof Error ? error : new Error(errorMessage(error)));
    }
  }
}
