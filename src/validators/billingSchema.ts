import { z } from 'zod';
import { PLAN_IDS } from '../config/plans';

export const checkoutSchema = z.object({
  plan: z.enum(PLAN_IDS),
  email: z.string().email()
});

export type CheckoutInput = z.infer<typeof checkoutSchema>;

const idOrObject = z.union([z.string(), z.object({ id: z.string() })]).nullable().optional();

// The parts of a Stripe Checkout Session the provisioning step reads
export const checkoutSessionSchema = z.object({
  id: z.string(),
  customer: idOrObject,
  subscription: idOrObject,
  customer_email: z.string().nullable().optional(),
  customer_details: z.object({ email: z.string().nullable().optional() }).nullable().optional(),
  metadata: z.record(z.string()).nullable().optional()
});

export const subscriptionSchema = z.object({
  id: z.string()
});
