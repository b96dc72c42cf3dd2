import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { logger } from '../lib/logger';
import { analyzeRepository, analyzeSnapshot } from '../services/analyzer';
import { GitHubMetadataSource } from '../services/github';
import { LocalMetadataSource } from '../services/localSource';
import { AnalysisResult } from '../types/analysis';

async function analyzeTarget(target: string): Promise<AnalysisResult> {
  const resolved = path.resolve(target);
  if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
    const source = new LocalMetadataSource(resolved);
    return analyzeSnapshot(await source.fetchSnapshot({ owner: 'local', name: path.basename(resolved) }));
  }
  return analyzeRepository(target, new GitHubMetadataSource({ token: config.githubToken }));
}

const USAGE = 'analyze <owner/name | github url | local path>';

/** Runs one analysis and prints it as JSON; resolves to the exit status. */
export async function runCli(argv: string[]): Promise<number> {
  const target = argv[0];
  if (!target) {
    logger.error({ usage: USAGE }, 'no analysis target given');
    return 2;
  }
  const result = await analyzeTarget(target);
  console.log(JSON.stringify(result, null, 2));
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.error({ err }, 'analysis failed');
      process.exit(1);
    });
}
