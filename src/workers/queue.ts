import IORedis from 'ioredis';
import { config } from '../config';

export const DIGEST_QUEUE = 'digest';
export const DIGEST_JOB = 'digest:run';

export interface DigestJobData {
  owner?: string;
  recipient?: string;
  dryRun?: boolean;
}

export function createConnection(): IORedis {
  // bullmq requires maxRetriesPerRequest: null on blocking connections
  return new IORedis(config.redisUrl, { maxRetriesPerRequest: null });
}
