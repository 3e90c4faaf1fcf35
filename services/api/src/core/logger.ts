import type { PipelineLogger } from '@papercast/pipeline';

/* eslint-disable no-console */
export function createConsoleLogger(prefix: string, context = ''): PipelineLogger {
  const head = context ? `[${prefix}] ${context}` : `[${prefix}]`;
  return {
    info: (message) => console.log(`${head} ${message}`),
    warn: (message) => console.warn(`${head} ${message}`),
    error: (message) => console.error(`${head} ${message}`),
  };
}
