export const NARRATION_QUEUE_NAME = 'narration-runs';

export interface NarrationQueuePayload {
  runId: string;
}
