import { Queue, UnrecoverableError, Worker, type ConnectionOptions, type Job } from "bullmq";
import type { Logger } from "pino";
import { z } from "zod";
import { QueueUnavailableError, errorMessage } from "../domain/errors";
import type { HealthStatus, ProcessingRequest } from "../domain/prediction";

export const processingRequestSchema = z.object({
  requestId: z.string().min(1),
  imageRef: z.string().min(1),
  symptomIds: z.array(z.number().int()),
  requestedAt: z.string(),
});

/**
 * One delivered message. The handler settles it exactly once: ack after
 * the outcome is persisted, reject to drop it for good (no requeue).
 */
export interface QueueDelivery {
  readonly payload: ProcessingRequest;
  readonly attempt: number;
  ack(): void;
  reject(reason: Error): void;
}

export type DeliveryHandler = (delivery: QueueDelivery) => Promise<void>;

export interface QueueBroker {
  publish(payload: ProcessingRequest): Promise<void>;
  consume(handler: DeliveryHandler): void;
  /** Stops taking new messages; resolves once the in-progress one has settled. */
  stop(): Promise<void>;
  close(): Promise<void>;
  healthCheck(): Promise<HealthStatus>;
}

type Settlement = { kind: "ack" } | { kind: "reject"; reason: Error };

export class BullMqBroker implements QueueBroker {
  private readonly queue: Queue<ProcessingRequest>;
  private worker: Worker<ProcessingRequest> | null = null;

  constructor(
    private readonly name: string,
    private readonly connection: ConnectionOptions,
    private readonly logger: Logger,
  ) {
    this.queue = new Queue<ProcessingRequest>(name, {
      connection,
      defaultJobOptions: {
        // Failed jobs are terminal; callers resubmit explicitly
        attempts: 1,
        removeOnComplete: 1000,
        removeOnFail: 5000,
      },
    });
    this.queue.on("error", (error: Error) => {
      this.logger.error({ err: error, queue: name }, "Queue connection error");
    });
  }

  async publish(payload: ProcessingRequest): Promise<void> {
    try {
      const job = await this.queue.add("predict", payload);
      this.logger.debug({ jobId: job.id, requestId: payload.requestId }, "Prediction request published");
    } catch (error) {
      throw new QueueUnavailableError(`Publish to ${this.name} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  consume(handler: DeliveryHandler): void {
    if (this.worker) {
      throw new Error(`Queue ${this.name} already has a consumer`);
    }

    this.worker = new Worker<ProcessingRequest>(this.name, (job) => this.process(job, handler), {
      connection: this.connection,
      concurrency: 1,
    });

    this.worker.on("failed", (job: Job<ProcessingRequest> | undefined, error: Error) => {
      this.logger.warn({ jobId: job?.id, err: error }, "Prediction job rejected");
    });
    this.worker.on("error", (error: Error) => {
      this.logger.error({ err: error, queue: this.name }, "Worker error");
    });
    this.logger.info({ queue: this.name }, "Queue consumer started");
  }

  async stop(): Promise<void> {
    if (this.worker) {
      // close() waits for the active job before resolving
      await this.worker.close();
      this.worker = null;
      this.logger.info({ queue: this.name }, "Queue consumer stopped");
    }
  }

  async close(): Promise<void> {
    await this.stop();
    await this.queue.close();
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      const counts = await this.queue.getJobCounts("waiting", "active", "failed");
      return {
        component: "queue",
        healthy: true,
        detail: `${this.name}: ${counts.waiting ?? 0} waiting, ${counts.active ?? 0} active, ${counts.failed ?? 0} failed`,
      };
    } catch (error) {
      return { component: "queue", healthy: false, detail: `${this.name} unreachable: ${errorMessage(error)}` };
    }
  }

  private async process(job: Job<ProcessingRequest>, handler: DeliveryHandler): Promise<void> {
    const parsed = processingRequestSchema.safeParse(job.data);
    if (!parsed.success) {
      throw new UnrecoverableError(`Malformed processing request in job ${job.id}`);
    }

    const state: { settlement: Settlement | null } = { settlement: null };
    await handler({
      payload: parsed.data,
      attempt: job.attemptsMade + 1,
      ack: () => {
        state.settlement ??= { kind: "ack" };
      },
      reject: (reason) => {
        state.settlement ??= { kind: "reject", reason };
      },
    });

    const outcome: Settlement = state.settlement ?? {
      kind: "reject",
      reason: new Error("Handler returned without settling the delivery"),
    };
    if (outcome.kind === "reject") {
      throw new UnrecoverableError(outcome.reason.message);
    }
  }
}

/** Stands in when no broker is configured: every publish fails so submission runs synchronously. */
export class NullQueueBroker implements QueueBroker {
  constructor(private readonly logger: Logger) {}

  async publish(): Promise<void> {
    throw new QueueUnavailableError("No queue broker configured");
  }

  consume(): void {
    this.logger.info("Queue disabled, no consumer started");
  }

  async stop(): Promise<void> {}

  async close(): Promise<void> {}

  async healthCheck(): Promise<HealthStatus> {
    return { component: "queue", healthy: true, detail: "disabled (synchronous processing)" };
  }
}
