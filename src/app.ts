import express, { ErrorRequestHandler } from 'express';
import bodyParser from 'body-parser';
import mongoose from 'mongoose';
import analyzeRoute from './routes/analyze';
import analysesRoute from './routes/analyses';
import plansRoute from './routes/plans';
import billingRoute, { webhookRouter } from './routes/billing';
import { logger } from './lib/logger';

export function createApp() {
  const app = express();

  // raw body for signature checks, so it goes before the JSON parser
  app.use('/api/billing/webhook', webhookRouter);
  app.use(bodyParser.json({ limit: '1mb' }));

  app.use('/api/analyze', analyzeRoute);
  app.use('/api/analyses', analysesRoute);
  app.use('/api/plans', plansRoute);
  app.use('/api/billing', billingRoute);

  app.get('/health', (req, res) => {
    const state = mongoose.connection.readyState; // 0=disconnected,1=connected,2=connecting,3=disconnecting
    res.json({ ok: true, dbConnected: state === 1, dbState: state });
  });

  const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    logger.error({ err, path: req.path }, 'unhandled error');
    res.status(500).json({ error: 'internal_error' });
  };
  app.use(errorHandler);

  return app;
}

export default createApp;
