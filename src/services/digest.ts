import { AnalysisResult, RepoRef, RepositorySnapshot } from '../types/analysis';
import { config } from '../config';
import { logger } from '../lib/logger';
import { DigestRun, DigestRunRecord } from '../models/digestRun';
import { OwnerRepository, GitHubMetadataSource } from './github';
import { analyzeSnapshot } from './analyzer';
import { buildDigestReport, DigestReport, digestSubject, renderDigestHtml, renderDigestText } from './report';
import { DeliveryResult, MailMessage, sendMail } from './mailer';

export interface DigestOptions {
  owner: string;
  recipient?: string;
  limit?: number;
  concurrency?: number;
  dryRun?: boolean; // analyze and render, but neither send nor record
}

export interface RepositoryLister {
  listOwnerRepositories(owner: string, limit: number): Promise<OwnerRepository[]>;
  fetchSnapshot(ref: RepoRef): Promise<RepositorySnapshot>;
}

export interface DigestDeps {
  github: RepositoryLister;
  send: (msg: MailMessage) => Promise<DeliveryResult>;
  saveRun: (run: DigestRunRecord) => Promise<void>;
  now: () => Date;
}

export interface DigestOutcome {
  report: DigestReport;
  delivery: DeliveryResult | null;
}

export function defaultDigestDeps(): DigestDeps {
  return {
    github: new GitHubMetadataSource({ token: config.githubToken }),
    send: (msg) => sendMail(msg),
    saveRun: async (run) => {
      await DigestRun.create(run);
    },
    now: () => new Date()
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Analyzes repositories in batches of `concurrency`; failures become issue strings. */
export async function analyzeFleet(
  repos: readonly OwnerRepository[],
  github: RepositoryLister,
  concurrency: number
): Promise<{ results: AnalysisResult[]; issues: string[] }> {
  const results: AnalysisResult[] = [];
  const issues: string[] = [];
  const size = Math.max(1, concurrency);
  for (let i = 0; i < repos.length; i += size) {
    const batch = repos.slice(i, i + size);
    const settled = await Promise.allSettled(
      batch.map(async (r) => analyzeSnapshot(await github.fetchSnapshot({ owner: r.owner, name: r.name })))
    );
    settled.forEach((s, j) => {
      if (s.status === 'fulfilled') results.push(s.value);
      else issues.push(`${batch[j].owner}/${batch[j].name}: ${errorMessage(s.reason)}`);
    });
  }
  return { results, issues };
}

export async function runDigest(opts: DigestOptions, deps: DigestDeps = defaultDigestDeps()): Promise<DigestOutcome> {
  const log = logger.child({ owner: opts.owner, dryRun: Boolean(opts.dryRun) });
  const startedAt = deps.now();
  const limit = opts.limit ?? config.digestRepoLimit;

  const repos = await deps.github.listOwnerRepositories(opts.owner, limit);
  log.info({ repositories: repos.length }, 'repositories discovered');

  const { results, issues } = await analyzeFleet(repos, deps.github, opts.concurrency ?? config.digestConcurrency);
  if (issues.length) log.warn({ issues }, 'some repositories could not be analyzed');

  const report = buildDigestReport(opts.owner, results, issues, deps.now());
  log.info({ analyzed: report.analyzed.length, totalEstimatedValue: report.totalEstimatedValue }, 'digest built');

  if (opts.dryRun) return { report, delivery: null };

  const recipient = opts.recipient || config.digestRecipient || config.senderEmail;
  const delivery = await deps.send({
    to: recipient,
    subject: digestSubject(report),
    html: renderDigestHtml(report),
    text: renderDigestText(report)
  });

  await deps.saveRun({
    owner: opts.owner,
    startedAt,
    finishedAt: deps.now(),
    repositoriesAnalyzed: report.analyzed.map((r) => r.repository),
    priorityQueue: report.analyzed.slice(0, 5).map((r) => r.repository),
    totalEstimatedValue: report.totalEstimatedValue,
    deliveryChannel: delivery.channel,
    delivered: delivery.delivered,
    issues
  });

  return { report, delivery };
}

export async function lastDigestRun(owner: string): Promise<DigestRunRecord | null> {
  return DigestRun.findOne({ owner }).sort({ finishedAt: -1 }).lean<DigestRunRecord>().exec();
}
