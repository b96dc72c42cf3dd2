import { config } from './index';

export const PLAN_IDS = ['starter', 'professional', 'agency'] as const;
export type PlanId = (typeof PLAN_IDS)[number];

export interface Plan {
  id: PlanId;
  name: string;
  price: number; // USD per month
  priceId: string; // Stripe price
  reposPerMonth: number | null; // null = unlimited
  features: string[];
}

export const PLANS: Readonly<Record<PlanId, Plan>> = {
  starter: {
    id: 'starter',
    name: 'Starter',
    price: 49,
    priceId: config.stripePriceIds.starter,
    reposPerMonth: 10,
    features: ['10 repo analyses/month', 'Revenue scoring', 'Email reports', 'Email support']
  },
  professional: {
    id: 'professional',
    name: 'Professional',
    price: 99,
    priceId: config.stripePriceIds.professional,
    reposPerMonth: 50,
    features: ['50 repo analyses/month', 'Daily digest', 'Priority queue', 'API access']
  },
  agency: {
    id: 'agency',
    name: 'Agency',
    price: 299,
    priceId: config.stripePriceIds.agency,
    reposPerMonth: null,
    features: ['Unlimited analyses', 'White-label reports', 'Team seats (5)', 'Dedicated support']
  }
};

const PLAN_ID_LIST: readonly string[] = PLAN_IDS;

export function isPlanId(v: unknown): v is PlanId {
  return typeof v === 'string' && PLAN_ID_LIST.includes(v);
}
