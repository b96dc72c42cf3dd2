import { Job, Worker } from 'bullmq';
import mongoose from 'mongoose';
import { config } from '../config';
import { logger } from '../lib/logger';
import { runDigest } from '../services/digest';
import { createConnection, DIGEST_QUEUE, DigestJobData } from './queue';

export async function processDigestJob(job: Pick<Job<DigestJobData>, 'id' | 'data'>) {
  const owner = job.data.owner || config.digestOwner;
  if (!owner) throw new Error('no owner to scan: set DIGEST_OWNER or pass owner in the job');
  const log = logger.child({ jobId: job.id, owner });
  log.info('starting digest');

  const { report, delivery } = await runDigest({ owner, recipient: job.data.recipient, dryRun: job.data.dryRun });
  log.info({ analyzed: report.analyzed.length, channel: delivery?.channel }, 'digest finished');
  return { analyzed: report.analyzed.length, delivered: delivery?.delivered ?? false };
}

async function main() {
  await mongoose.connect(config.mongoUri);
  const connection = createConnection();
  const worker = new Worker<DigestJobData>(DIGEST_QUEUE, processDigestJob, { connection, concurrency: 1 });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'job failed');
  });
  worker.on('completed', (job) => {
    logger.info({ jobId: job.id }, 'job completed');
  });

  const shutdown = async () => {
    await worker.close();
    await mongoose.disconnect();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
  logger.info({ queue: DIGEST_QUEUE }, 'digest worker ready');
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, 'digest worker failed to start');
    process.exit(1);
  });
}
