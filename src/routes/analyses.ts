import express from 'express';
import { authenticate } from '../lib/auth';
import { listAnalyses } from '../services/analysisStore';
import { listAnalysesQuerySchema } from '../validators/analyzeSchema';

const router = express.Router();

router.get('/', async (req, res, next) => {
  try {
    const account = await authenticate(req);
    if (!account) return res.status(401).json({ error: 'unauthorized', message: 'Invalid or missing API key' });

    const query = listAnalysesQuerySchema.safeParse(req.query);
    if (!query.success) return res.status(400).json({ error: 'invalid_request', details: query.error.flatten() });

    const analyses = await listAnalyses(account.id, query.data.limit);
    return res.json({ count: analyses.length, analyses });
  } catch (err) {
    return next(err);
  }
});

export default router;
