import crypto from 'crypto';
import { Account, AccountRecord } from '../models/account';
import { PLANS, PlanId } from '../config/plans';
import { QuotaExceededError } from '../lib/errors';

export interface AccountView {
  id: string;
  email: string;
  apiKey: string;
  plan: PlanId;
  active: boolean;
  usagePeriod: string;
  analysesThisPeriod: number;
}

export interface Usage {
  period: string;
  used: number;
  limit: number | null;
}

export interface ProvisionInput {
  email: string;
  plan: PlanId;
  stripeCustomerId?: string | null;
  stripeSubscriptionId?: string | null;
  checkoutSessionId?: string | null;
}

type StoredAccount = AccountRecord & { _id: unknown };

function toView(doc: StoredAccount): AccountView {
  return {
    id: String(doc._id),
    email: doc.email,
    apiKey: doc.apiKey,
    plan: doc.plan,
    active: doc.active,
    usagePeriod: doc.usagePeriod,
    analysesThisPeriod: doc.analysesThisPeriod
  };
}

export function generateApiKey(): string {
  return `rra_${crypto.randomBytes(24).toString('hex')}`;
}

/** Calendar month in UTC, e.g. 2026-10. Usage counters reset when it changes. */
export function usagePeriod(now: Date): string {
  return `${now.getUTCFullYear()}-${String(now.getUTCMonth() + 1).padStart(2, '0')}`;
}

export function currentUsage(account: AccountView, now: Date): Usage {
  const period = usagePeriod(now);
  return {
    period,
    used: account.usagePeriod === period ? account.analysesThisPeriod : 0,
    limit: PLANS[account.plan].reposPerMonth
  };
}

/** Pre-check against a possibly stale read; reserveAnalysis is the authoritative gate. */
export function checkQuota(account: AccountView, now: Date): Usage {
  const usage = currentUsage(account, now);
  if (usage.limit !== null && usage.used >= usage.limit) throw new QuotaExceededError(usage.used, usage.limit);
  return usage;
}

export async function findAccountByApiKey(apiKey: string): Promise<AccountView | null> {
  const doc = await Account.findOne({ apiKey, active: true }).lean<StoredAccount>().exec();
  return doc ? toView(doc) : null;
}

export async function findAccountByCheckoutSession(sessionId: string): Promise<AccountView | null> {
  const doc = await Account.findOne({ checkoutSessionId: sessionId }).lean<StoredAccount>().exec();
  return doc ? toView(doc) : null;
}

function incrementUsage(apiKey: string, period: string, limit: number | null) {
  const underLimit = limit === null ? {} : { analysesThisPeriod: { $lt: limit } };
  return Account.findOneAndUpdate(
    { apiKey, active: true, usagePeriod: period, ...underLimit },
    { $inc: { analysesThisPeriod: 1 } },
    { new: true }
  )
    .lean<StoredAccount>()
    .exec();
}

// Only one caller can move the account into a new period; the others fall through to the increment.
function startPeriod(apiKey: string, period: string) {
  return Account.findOneAndUpdate(
    { apiKey, active: true, usagePeriod: { $ne: period } },
    { $set: { usagePeriod: period, analysesThisPeriod: 1 } },
    { new: true }
  )
    .lean<StoredAccount>()
    .exec();
}

/**
 * Atomically claims one analysis for the current period. Throws
 * QuotaExceededError when the plan limit is already used up.
 */
export async function reserveAnalysis(account: AccountView, now: Date): Promise<Usage> {
  const period = usagePeriod(now);
  const limit = PLANS[account.plan].reposPerMonth;

  const doc =
    (await incrementUsage(account.apiKey, period, limit)) ||
    (await startPeriod(account.apiKey, period)) ||
    (await incrementUsage(account.apiKey, period, limit));

  if (!doc) {
    if (limit === null) throw new Error(`account ${account.id} is no longer active`);
    throw new QuotaExceededError(limit, limit);
  }
  return { period, used: doc.analysesThisPeriod, limit };
}

/** Gives back a reservation whose analysis did not complete. */
export async function releaseAnalysis(account: AccountView, period: string): Promise<void> {
  await Account.updateOne(
    { apiKey: account.apiKey, usagePeriod: period, analysesThisPeriod: { $gt: 0 } },
    { $inc: { analysesThisPeriod: -1 } }
  ).exec();
}

/** Creates the account for a new subscriber, or moves an existing one to the paid plan. */
export async function provisionAccount(input: ProvisionInput): Promise<AccountView> {
  const doc = await Account.findOneAndUpdate(
    { email: input.email.toLowerCase() },
    {
      $set: {
        plan: input.plan,
        active: true,
        stripeCustomerId: input.stripeCustomerId ?? null,
        stripeSubscriptionId: input.stripeSubscriptionId ?? null,
        checkoutSessionId: input.checkoutSessionId ?? null
      },
      $setOnInsert: { apiKey: generateApiKey(), usagePeriod: '', analysesThisPeriod: 0 }
    },
    { upsert: true, new: true, setDefaultsOnInsert: true }
  )
    .lean<StoredAccount>()
    .exec();
  if (!doc) throw new Error(`failed to provision account for ${input.email}`);
  return toView(doc);
}

export async function deactivateBySubscription(subscriptionId: string): Promise<boolean> {
  const res = await Account.updateOne({ stripeSubscriptionId: subscriptionId }, { $set: { active: false } }).exec();
  return res.modifiedCount > 0;
}
