import { Queue } from "bullmq";
import IORedis from "ioredis";
import type { HighlightQueuePort } from "../../interfaces/ports";
import type { HighlightJobPayload } from "../../interfaces/schemas";

const QUEUE_NAME = "highlights";
export const SELECT_HIGHLIGHTS_JOB = "selectHighlights";

export class RedisQueue implements HighlightQueuePort {
  private connection: IORedis;
  private queue: Queue;

  constructor(redisUrl: string) {
    this.connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
    this.queue = new Queue(QUEUE_NAME, { connection: this.connection });
  }

  async enqueue(payload: HighlightJobPayload) {
    const job = await this.queue.add(SELECT_HIGHLIGHTS_JOB, payload, {
      jobId: payload.runId,
      removeOnComplete: 50,
      removeOnFail: 50
    });
    return job.id ?? payload.runId ?? "";
  }

  async close() {
    await this.queue.close();
    await this.connection.quit();
  }
}

export function getQueueName() {
  return QUEUE_NAME;
}
