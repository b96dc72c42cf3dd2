import { handleWebhookEvent } from '../src/services/billing';
import { deactivateBySubscription, provisionAccount } from '../src/services/accounts';

jest.mock('../src/services/accounts', () => ({
  provisionAccount: jest.fn(),
  deactivateBySubscription: jest.fn()
}));

const mockedProvision = jest.mocked(provisionAccount);
const mockedDeactivate = jest.mocked(deactivateBySubscription);

describe('handleWebhookEvent', () => {
  beforeEach(() => {
    mockedProvision.mockReset();
    mockedDeactivate.mockReset();
  });

  it('provisions an account for a completed checkout', async () => {
    mockedProvision.mockResolvedValue({
      id: 'acc_1',
      email: 'dev@example.com',
      apiKey: 'test-key',
      plan: 'professional',
      active: true,
      usagePeriod: '',
      analysesThisPeriod: 0
    });
    const outcome = await handleWebhookEvent({
      id: 'evt_1',
      type: 'checkout.session.completed',
      data: {
        object: {
          id: 'cs_test_1',
          customer: 'cus_1',
          subscription: { id: 'sub_1' },
          customer_details: { email: 'dev@example.com' },
          metadata: { plan: 'professional' }
        }
      }
    });
    expect(outcome).toEqual({ handled: true, action: 'provisioned', accountId: 'acc_1' });
    expect(mockedProvision).toHaveBeenCalledWith({
      email: 'dev@example.com',
      plan: 'professional',
      stripeCustomerId: 'cus_1',
      stripeSubscriptionId: 'sub_1',
      checkoutSessionId: 'cs_test_1'
    });
  });

  it('falls back to customer_email', async () => {
    mockedProvision.mockResolvedValue({
      id: 'acc_2',
      email: 'ops@example.com',
      apiKey: 'test-key',
      plan: 'starter',
      active: true,
      usagePeriod: '',
      analysesThisPeriod: 0
    });
    await handleWebhookEvent({
      type: 'checkout.session.completed',
      data: { object: { id: 'cs_test_2', customer_email: 'ops@example.com', metadata: { plan: 'starter' } } }
    });
    expect(mockedProvision).toHaveBeenCalledWith(
      expect.objectContaining({ email: 'ops@example.com', plan: 'starter', stripeCustomerId: null })
    );
  });

  it('ignores a checkout without a known plan', async () => {
    const outcome = await handleWebhookEvent({
      type: 'checkout.session.completed',
      data: { object: { id: 'cs_test_3', customer_email: 'dev@example.com', metadata: { plan: 'gold' } } }
    });
    expect(outcome).toEqual({ handled: false });
    expect(mockedProvision).not.toHaveBeenCalled();
  });

  it('deactivates the account when a subscription is deleted', async () => {
    mockedDeactivate.mockResolvedValue(true);
    const outcome = await handleWebhookEvent({ type: 'customer.subscription.deleted', data: { object: { id: 'sub_1' } } });
    expect(outcome).toEqual({ handled: true, action: 'deactivated' });
    expect(mockedDeactivate).toHaveBeenCalledWith('sub_1');
  });

  it('acknowledges other events without acting', async () => {
    const outcome = await handleWebhookEvent({ type: 'invoice.paid', data: { object: {} } });
    expect(outcome).toEqual({ handled: false });
  });
});
