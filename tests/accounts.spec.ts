import {
  AccountView,
  checkQuota,
  currentUsage,
  deactivateBySubscription,
  generateApiKey,
  provisionAccount,
  releaseAnalysis,
  reserveAnalysis,
  usagePeriod
} from '../src/services/accounts';
import { QuotaExceededError } from '../src/lib/errors';
import { resetAccounts, seedAccount, storedAccount } from './fakeAccountModel';

jest.mock('../src/models/account', () => jest.requireActual('./fakeAccountModel'));

const NOW = new Date('2026-10-19T12:00:00.000Z');

function account(overrides: Partial<AccountView> = {}): AccountView {
  return {
    id: 'acc_1',
    email: 'dev@example.com',
    apiKey: 'test-key',
    plan: 'starter',
    active: true,
    usagePeriod: '2026-10',
    analysesThisPeriod: 0,
    ...overrides
  };
}

describe('usagePeriod', () => {
  it('uses the UTC calendar month', () => {
    expect(usagePeriod(new Date('2026-01-05T00:00:00Z'))).toBe('2026-01');
    expect(usagePeriod(new Date('2026-12-31T23:59:59Z'))).toBe('2026-12');
  });
});

describe('checkQuota', () => {
  it('allows analyses below the plan limit', () => {
    expect(checkQuota(account({ analysesThisPeriod: 9 }), NOW)).toEqual({ period: '2026-10', used: 9, limit: 10 });
  });

  it('rejects once the monthly limit is used up', () => {
    expect(() => checkQuota(account({ analysesThisPeriod: 10 }), NOW)).toThrow(QuotaExceededError);
    expect(() => checkQuota(account({ analysesThisPeriod: 10 }), NOW)).toThrow(
      'Monthly quota exceeded (10/10). Upgrade your plan.'
    );
  });

  it('resets usage when the month changes', () => {
    const usage = checkQuota(account({ usagePeriod: '2026-09', analysesThisPeriod: 10 }), NOW);
    expect(usage).toEqual({ period: '2026-10', used: 0, limit: 10 });
  });

  it('never limits the agency plan', () => {
    expect(checkQuota(account({ plan: 'agency', analysesThisPeriod: 5000 }), NOW)).toEqual({
      period: '2026-10',
      used: 5000,
      limit: null
    });
  });

  it('reports the professional limit', () => {
    expect(currentUsage(account({ plan: 'professional', analysesThisPeriod: 3 }), NOW).limit).toBe(50);
  });
});

describe('generateApiKey', () => {
  it('issues distinct prefixed keys', () => {
    const a = generateApiKey();
    expect(a).toMatch(/^rra_[0-9a-f]{48}$/);
    expect(generateApiKey()).not.toBe(a);
  });
});

describe('reserveAnalysis', () => {
  beforeEach(() => resetAccounts());

  it('increments usage within the current period', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'starter', usagePeriod: '2026-10', analysesThisPeriod: 3 });
    await expect(reserveAnalysis(account(), NOW)).resolves.toEqual({ period: '2026-10', used: 4, limit: 10 });
    expect(storedAccount({ apiKey: 'test-key' })?.analysesThisPeriod).toBe(4);
  });

  it('rejects at the limit and leaves the counter alone', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'starter', usagePeriod: '2026-10', analysesThisPeriod: 10 });
    await expect(reserveAnalysis(account(), NOW)).rejects.toThrow(QuotaExceededError);
    expect(storedAccount({ apiKey: 'test-key' })?.analysesThisPeriod).toBe(10);
  });

  it('lets only one of two concurrent requests take the last slot', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'starter', usagePeriod: '2026-10', analysesThisPeriod: 9 });
    const stale = account({ analysesThisPeriod: 9 });

    const outcomes = await Promise.allSettled([reserveAnalysis(stale, NOW), reserveAnalysis(stale, NOW)]);

    expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
    const rejected = outcomes.filter((o): o is PromiseRejectedResult => o.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(QuotaExceededError);
    expect(storedAccount({ apiKey: 'test-key' })?.analysesThisPeriod).toBe(10);
  });

  it('starts a new period once, even under concurrent requests', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'starter', usagePeriod: '2026-09', analysesThisPeriod: 10 });
    const stale = account({ usagePeriod: '2026-09', analysesThisPeriod: 10 });

    const results = await Promise.all([reserveAnalysis(stale, NOW), reserveAnalysis(stale, NOW)]);

    expect(results.map((r) => r.used).sort()).toEqual([1, 2]);
    expect(storedAccount({ apiKey: 'test-key' })).toMatchObject({ usagePeriod: '2026-10', analysesThisPeriod: 2 });
  });

  it('never limits the agency plan', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'agency', usagePeriod: '2026-10', analysesThisPeriod: 5000 });
    await expect(reserveAnalysis(account({ plan: 'agency' }), NOW)).resolves.toEqual({
      period: '2026-10',
      used: 5001,
      limit: null
    });
  });

  it('gives a reservation back', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'starter', usagePeriod: '2026-10', analysesThisPeriod: 3 });
    const usage = await reserveAnalysis(account(), NOW);
    await releaseAnalysis(account(), usage.period);
    expect(storedAccount({ apiKey: 'test-key' })?.analysesThisPeriod).toBe(3);
  });

  it('does not release below zero or into another period', async () => {
    seedAccount({ apiKey: 'test-key', plan: 'starter', usagePeriod: '2026-10', analysesThisPeriod: 0 });
    await releaseAnalysis(account(), '2026-10');
    await releaseAnalysis(account(), '2026-09');
    expect(storedAccount({ apiKey: 'test-key' })?.analysesThisPeriod).toBe(0);
  });
});

describe('provisionAccount', () => {
  beforeEach(() => resetAccounts());

  it('creates an account under the lowercased email with a fresh key', async () => {
    const view = await provisionAccount({
      email: 'Dev@Example.com',
      plan: 'professional',
      stripeCustomerId: 'cus_test_1',
      stripeSubscriptionId: 'sub_test_1',
      checkoutSessionId: 'cs_test_1'
    });

    expect(view).toMatchObject({
      email: 'dev@example.com',
      plan: 'professional',
      active: true,
      usagePeriod: '',
      analysesThisPeriod: 0
    });
    expect(view.apiKey).toMatch(/^rra_[0-9a-f]{48}$/);
    expect(storedAccount({ email: 'dev@example.com' })).toMatchObject({ stripeSubscriptionId: 'sub_test_1' });
  });

  it('keeps the key and usage when an existing subscriber changes plan', async () => {
    const first = await provisionAccount({ email: 'dev@example.com', plan: 'starter' });
    await reserveAnalysis(first, NOW);

    const second = await provisionAccount({ email: 'DEV@example.com', plan: 'agency', stripeSubscriptionId: 'sub_test_2' });

    expect(second.id).toBe(first.id);
    expect(second.apiKey).toBe(first.apiKey);
    expect(second.plan).toBe('agency');
    expect(second.analysesThisPeriod).toBe(1);
  });

  it('stops reservations after the subscription is cancelled', async () => {
    const view = await provisionAccount({ email: 'dev@example.com', plan: 'agency', stripeSubscriptionId: 'sub_test_3' });
    await expect(deactivateBySubscription('sub_test_3')).resolves.toBe(true);
    await expect(reserveAnalysis(view, NOW)).rejects.toThrow('is no longer active');
  });
});
