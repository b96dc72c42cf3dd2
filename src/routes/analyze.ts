import express from 'express';
import { analyzeSchema } from '../validators/analyzeSchema';
import { authenticate } from '../lib/auth';
import { checkQuota, releaseAnalysis, reserveAnalysis } from '../services/accounts';
import { saveAnalysis } from '../services/analysisStore';
import { analyzeRepository } from '../services/analyzer';
import { GitHubMetadataSource } from '../services/github';
import { parseRepoRef } from '../services/repoRef';
import { InvalidRepoIdentifierError, QuotaExceededError, RepoFetchError } from '../lib/errors';
import { config } from '../config';
import { logger } from '../lib/logger';

const router = express.Router();

router.post('/', async (req, res, next) => {
  try {
    const account = await authenticate(req);
    if (!account) return res.status(401).json({ error: 'unauthorized', message: 'Invalid or missing API key' });

    const now = new Date();
    checkQuota(account, now);

    const parsed = analyzeSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: 'invalid_request', details: parsed.error.flatten() });

    // malformed identifiers are rejected before any quota is claimed
    parseRepoRef(parsed.data.repo);
    const usage = await reserveAnalysis(account, now);
    try {
      // a fresh client per request; a caller's token never outlives the call
      const source = new GitHubMetadataSource({ token: parsed.data.githubToken || config.githubToken });
      const result = await analyzeRepository(parsed.data.repo, source);
      const analysisId = await saveAnalysis(account.id, result);
      logger.info({ accountId: account.id, repository: result.repository, total: result.total_score }, 'analysis completed');
      return res.json({ analysisId, result, usage });
    } catch (err) {
      await releaseAnalysis(account, usage.period);
      throw err;
    }
  } catch (err) {
    if (err instanceof QuotaExceededError) {
      return res.status(429).json({ error: 'quota_exceeded', message: err.message, used: err.used, limit: err.limit });
    }
    if (err instanceof InvalidRepoIdentifierError) {
      return res.status(400).json({ error: 'invalid_repository', message: err.message });
    }
    if (err instanceof RepoFetchError) {
      return res.status(err.httpStatus).json({ error: err.kind, message: err.message });
    }
    return next(err);
  }
});

export default router;
