import express from 'express';
import { checkoutSchema } from '../validators/billingSchema';
import {
  BillingEvent,
  BillingNotConfiguredError,
  constructWebhookEvent,
  createCheckoutSession,
  handleWebhookEvent
} from '../services/billing';
import { findAccountByCheckoutSession } from '../services/accounts';
import { logger } from '../lib/logger';

const router = express.Router();

router.post('/checkout', async (req, res, next) => {
  try {
    const parsed = checkoutSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: 'invalid_request', details: parsed.error.flatten() });
    const session = await createCheckoutSession(parsed.data.plan, parsed.data.email);
    return res.status(201).json({ sessionId: session.id, url: session.url });
  } catch (err) {
    if (err instanceof BillingNotConfiguredError) return res.status(503).json({ error: 'billing_unavailable', message: err.message });
    return next(err);
  }
});

router.get('/session/:sessionId', async (req, res, next) => {
  try {
    const account = await findAccountByCheckoutSession(req.params.sessionId);
    // the webhook may not have arrived yet
    if (!account) return res.status(404).json({ error: 'not_found', message: 'Subscription not provisioned yet' });
    return res.json({ apiKey: account.apiKey, plan: account.plan, email: account.email });
  } catch (err) {
    return next(err);
  }
});

/** Mounted ahead of the JSON body parser: Stripe signs the raw bytes. */
export const webhookRouter = express.Router();

webhookRouter.post('/', express.raw({ type: 'application/json' }), async (req, res, next) => {
  const signature = req.header('stripe-signature');
  if (!signature || !Buffer.isBuffer(req.body)) {
    return res.status(400).json({ error: 'invalid_webhook', message: 'missing signature or body' });
  }

  let event: BillingEvent;
  try {
    event = constructWebhookEvent(req.body, signature);
  } catch (err) {
    if (err instanceof BillingNotConfiguredError) return res.status(503).json({ error: 'billing_unavailable', message: err.message });
    logger.warn({ err }, 'webhook signature verification failed');
    return res.status(400).json({ error: 'invalid_signature' });
  }

  try {
    const outcome = await handleWebhookEvent(event);
    return res.json({ received: true, ...outcome });
  } catch (err) {
    return next(err);
  }
});

export default router;
