import mongoose, { Schema, Model } from 'mongoose';

export interface DigestRunRecord {
  owner: string;
  startedAt: Date;
  finishedAt: Date;
  repositoriesAnalyzed: string[];
  priorityQueue: string[];
  totalEstimatedValue: number;
  deliveryChannel: string;
  delivered: boolean;
  issues: string[];
}

const DigestRunSchema = new Schema<DigestRunRecord>({
  owner: { type: String, required: true, index: true },
  startedAt: { type: Date, required: true },
  finishedAt: { type: Date, required: true },
  repositoriesAnalyzed: { type: [String], default: [] },
  priorityQueue: { type: [String], default: [] },
  totalEstimatedValue: { type: Number, default: 0 },
  deliveryChannel: { type: String, required: true },
  delivered: { type: Boolean, default: false },
  issues: { type: [String], default: [] }
}, { timestamps: true, collection: 'digest-runs' });

export const DigestRun: Model<DigestRunRecord> =
  (mongoose.models.DigestRun as Model<DigestRunRecord>) || mongoose.model<DigestRunRecord>('DigestRun', DigestRunSchema);

export default DigestRun;
