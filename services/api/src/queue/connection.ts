import type { ConnectionOptions } from 'bullmq';
import { config } from '../config.js';

export interface RedisEndpoint {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls?: Record<string, never>;
}

export function parseRedisUrl(redisUrl: string): RedisEndpoint {
  const url = new URL(redisUrl);
  const db = Number.parseInt(url.pathname.replace(/^\//, ''), 10);

  return {
    host: url.hostname,
    port: url.port ? Number.parseInt(url.port, 10) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isFinite(db) ? db : undefined,
    tls: url.protocol === 'rediss:' ? {} : undefined,
  };
}

export function createRedisConnectionOptions(kind: 'api' | 'worker'): ConnectionOptions {
  return {
    ...parseRedisUrl(config.redisUrl),
    // BullMQ workers must block indefinitely; the API should fail fast instead.
    maxRetriesPerRequest: kind === 'worker' ? null : 1,
    enableReadyCheck: true,
  };
}
