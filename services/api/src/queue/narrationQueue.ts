import { Queue } from 'bullmq';
import type { RunQueue } from '../types/narration.js';
import { createRedisConnectionOptions } from './connection.js';
import { NARRATION_QUEUE_NAME, type NarrationQueuePayload } from './constants.js';

export class NarrationQueue implements RunQueue {
  private readonly queue: Queue<NarrationQueuePayload, void, string>;

  constructor() {
    this.queue = new Queue<NarrationQueuePayload, void, string>(NARRATION_QUEUE_NAME, {
      connection: createRedisConnectionOptions('api'),
      defaultJobOptions: {
        // provider retries happen inside the pipeline
        attempts: 1,
        removeOnComplete: { age: 3600, count: 2000 },
        removeOnFail: { age: 24 * 3600, count: 5000 },
      },
    });
  }

  async enqueue(runId: string): Promise<void> {
    await this.queue.add(runId, { runId }, { jobId: runId });
  }

  async ping(): Promise<string> {
    const client = await this.queue.client;
    return client.ping();
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
