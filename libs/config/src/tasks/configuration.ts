import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('tasks', () => ({
  maxConcurrent: env.TASKS_MAX_CONCURRENT || '1',
  dataDir: env.TASKS_DATA_DIR || 'data',
  streamKeepaliveMs: env.TASKS_STREAM_KEEPALIVE_MS || '30000',
  channelCapacity: env.TASKS_CHANNEL_CAPACITY || '100',
}));
