import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// Load .env whether the process is started from the package root or from dist/
// 1) Prefer CWD/.env
// 2) Fallback to the package root resolved relative to this file
(() => {
  const cwdEnv = path.resolve(process.cwd(), '.env');
  const packageEnv = path.resolve(__dirname, '../../.env');
  if (fs.existsSync(cwdEnv)) {
    dotenv.config({ path: cwdEnv });
  } else if (fs.existsSync(packageEnv)) {
    dotenv.config({ path: packageEnv });
  } else {
    dotenv.config();
  }
})();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export type EmailProvider = 'sendgrid' | 'mailgun' | 'file';

function emailProviderFromEnv(): EmailProvider {
  const raw = (process.env.EMAIL_PROVIDER || 'sendgrid').toLowerCase();
  return raw === 'mailgun' || raw === 'file' ? raw : 'sendgrid';
}

export const config = {
  port: process.env.PORT ? Number(process.env.PORT) : 4000,
  mongoUri: process.env.MONGO_URI || 'mongodb://localhost:27017/revenue-analyzer',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  githubToken: process.env.GITHUB_TOKEN || undefined,
  publicBaseUrl: process.env.PUBLIC_BASE_URL || 'http://localhost:4000',
  logLevel: process.env.LOG_LEVEL || 'info',

  stripeSecretKey: process.env.STRIPE_SECRET_KEY || undefined,
  stripeWebhookSecret: process.env.STRIPE_WEBHOOK_SECRET || undefined,
  stripePriceIds: {
    starter: process.env.STRIPE_STARTER_PRICE_ID || '',
    professional: process.env.STRIPE_PRO_PRICE_ID || '',
    agency: process.env.STRIPE_AGENCY_PRICE_ID || ''
  },

  emailProvider: emailProviderFromEnv(),
  senderEmail: process.env.SENDER_EMAIL || 'reports@localhost',
  digestRecipient: process.env.DIGEST_RECIPIENT || undefined,
  sendgridApiKey: process.env.SENDGRID_API_KEY || undefined,
  mailgunApiKey: process.env.MAILGUN_API_KEY || undefined,
  mailgunDomain: process.env.MAILGUN_DOMAIN || undefined,
  reportDir: process.env.REPORT_DIR || path.resolve(process.cwd(), 'reports'),

  digestOwner: process.env.DIGEST_OWNER || undefined,
  digestCron: process.env.DIGEST_CRON || '0 9 * * *',
  digestRepoLimit: intFromEnv('DIGEST_REPO_LIMIT', 10),
  digestConcurrency: intFromEnv('DIGEST_CONCURRENCY', 4)
};
