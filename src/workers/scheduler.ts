import { Queue } from 'bullmq';
import mongoose from 'mongoose';
import { config } from '../config';
import { logger } from '../lib/logger';
import { lastDigestRun } from '../services/digest';
import { formatUsd } from '../services/report';
import { createConnection, DIGEST_JOB, DIGEST_QUEUE, DigestJobData } from './queue';

async function printStatus(owner: string) {
  await mongoose.connect(config.mongoUri);
  try {
    const run = await lastDigestRun(owner);
    if (!run) {
      console.log(`Last run for ${owner}: never`);
      return;
    }
    console.log(`Last run for ${owner}: ${run.finishedAt.toISOString()}`);
    console.log(`Repositories analyzed: ${run.repositoriesAnalyzed.length}`);
    console.log(`Total estimated value: ${formatUsd(run.totalEstimatedValue)}`);
    console.log(`Delivered via: ${run.deliveryChannel}${run.delivered ? '' : ' (not emailed)'}`);
    run.priorityQueue.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
  } finally {
    await mongoose.disconnect();
  }
}

async function main(argv: string[]) {
  const owner = config.digestOwner;
  if (!owner) throw new Error('DIGEST_OWNER is not set');
  if (argv.includes('--status')) return printStatus(owner);

  const connection = createConnection();
  const queue = new Queue<DigestJobData>(DIGEST_QUEUE, { connection });
  try {
    if (argv.includes('--run-now')) {
      const job = await queue.add(DIGEST_JOB, { owner, dryRun: argv.includes('--dry-run') });
      logger.info({ jobId: job.id, owner }, 'digest enqueued');
    } else {
      await queue.add(DIGEST_JOB, { owner }, { repeat: { pattern: config.digestCron }, jobId: `digest:${owner}` });
      logger.info({ cron: config.digestCron, owner }, 'daily digest scheduled');
    }
  } finally {
    await queue.close();
    await connection.quit();
  }
}

main(process.argv.slice(2)).catch((err) => {
  logger.error({ err }, 'scheduler failed');
  process.exit(1);
});
