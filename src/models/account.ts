import mongoose, { Schema, Model } from 'mongoose';
import { PLAN_IDS, PlanId } from '../config/plans';

export interface AccountRecord {
  email: string;
  apiKey: string;
  plan: PlanId;
  active: boolean;
  usagePeriod: string; // YYYY-MM
  analysesThisPeriod: number;
  stripeCustomerId?: string | null;
  stripeSubscriptionId?: string | null;
  checkoutSessionId?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
}

const AccountSchema = new Schema<AccountRecord>({
  email: { type: String, required: true, index: true, unique: true },
  apiKey: { type: String, required: true, index: true, unique: true },
  plan: { type: String, enum: [...PLAN_IDS], required: true, default: 'starter' },
  active: { type: Boolean, default: true },
  usagePeriod: { type: String, default: '' },
  analysesThisPeriod: { type: Number, default: 0 },
  stripeCustomerId: { type: String, default: null },
  stripeSubscriptionId: { type: String, default: null, index: true },
  checkoutSessionId: { type: String, default: null, index: true }
}, { timestamps: true });

export const Account: Model<AccountRecord> =
  (mongoose.models.Account as Model<AccountRecord>) || mongoose.model<AccountRecord>('Account', AccountSchema);

export default Account;
