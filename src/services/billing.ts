import Stripe from 'stripe';
import { config } from '../config';
import { PLANS, PlanId, isPlanId } from '../config/plans';
import { logger } from '../lib/logger';
import { checkoutSessionSchema, subscriptionSchema } from '../validators/billingSchema';
import { deactivateBySubscription, provisionAccount } from './accounts';

export class BillingNotConfiguredError extends Error {
  constructor(what: string) {
    super(`billing is not configured: ${what}`);
    this.name = 'BillingNotConfiguredError';
  }
}

/** Minimal event shape; Stripe.Event satisfies it. */
export interface BillingEvent {
  id?: string;
  type: string;
  data: { object: unknown };
}

export interface WebhookOutcome {
  handled: boolean;
  action?: 'provisioned' | 'deactivated';
  accountId?: string;
}

let stripeClient: Stripe | null = null;

function getStripe(): Stripe {
  if (!config.stripeSecretKey) throw new BillingNotConfiguredError('STRIPE_SECRET_KEY');
  if (!stripeClient) stripeClient = new Stripe(config.stripeSecretKey);
  return stripeClient;
}

function idOf(v: string | { id: string } | null | undefined): string | null {
  if (!v) return null;
  return typeof v === 'string' ? v : v.id;
}

export async function createCheckoutSession(plan: PlanId, email: string): Promise<{ id: string; url: string | null }> {
  const price = PLANS[plan].priceId;
  if (!price) throw new BillingNotConfiguredError(`price id for plan ${plan}`);
  const session = await getStripe().checkout.sessions.create({
    mode: 'subscription',
    line_items: [{ price, quantity: 1 }],
    customer_email: email,
    metadata: { plan },
    subscription_data: { metadata: { plan } },
    success_url: `${config.publicBaseUrl}/api/billing/session/{CHECKOUT_SESSION_ID}`,
    cancel_url: `${config.publicBaseUrl}/api/plans`
  });
  return { id: session.id, url: session.url };
}

export function constructWebhookEvent(payload: Buffer, signature: string): BillingEvent {
  if (!config.stripeWebhookSecret) throw new BillingNotConfiguredError('STRIPE_WEBHOOK_SECRET');
  return getStripe().webhooks.constructEvent(payload, signature, config.stripeWebhookSecret);
}

export async function handleWebhookEvent(event: BillingEvent): Promise<WebhookOutcome> {
  const log = logger.child({ eventId: event.id, type: event.type });

  switch (event.type) {
    case 'checkout.session.completed': {
      const session = checkoutSessionSchema.parse(event.data.object);
      const email = session.customer_details?.email || session.customer_email;
      const plan = session.metadata?.plan;
      if (!email || !isPlanId(plan)) {
        log.warn({ sessionId: session.id, plan }, 'checkout session without email or known plan');
        return { handled: false };
      }
      const account = await provisionAccount({
        email,
        plan,
        stripeCustomerId: idOf(session.customer),
        stripeSubscriptionId: idOf(session.subscription),
        checkoutSessionId: session.id
      });
      log.info({ accountId: account.id, plan }, 'account provisioned');
      return { handled: true, action: 'provisioned', accountId: account.id };
    }
    case 'customer.subscription.deleted': {
      const subscription = subscriptionSchema.parse(event.data.object);
      const changed = await deactivateBySubscription(subscription.id);
      log.info({ subscriptionId: subscription.id, changed }, 'subscription cancelled');
      return { handled: true, action: 'deactivated' };
    }
    default:
      return { handled: false };
  }
}
