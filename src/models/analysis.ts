import mongoose, { Schema, Model } from 'mongoose';
import { AnalysisResult, RevenuePotential } from '../types/analysis';

export interface AnalysisRecord {
  accountId: string;
  repository: string;
  totalScore: number;
  revenuePotential: RevenuePotential;
  // Stored whole so clients read back exactly what the API returned
  result: AnalysisResult;
  createdAt?: Date;
  updatedAt?: Date;
}

const AnalysisSchema = new Schema<AnalysisRecord>({
  accountId: { type: String, required: true, index: true },
  repository: { type: String, required: true },
  totalScore: { type: Number, required: true },
  revenuePotential: { type: String, required: true },
  result: { type: Schema.Types.Mixed, required: true }
}, { timestamps: true });

export const Analysis: Model<AnalysisRecord> =
  (mongoose.models.Analysis as Model<AnalysisRecord>) || mongoose.model<AnalysisRecord>('Analysis', AnalysisSchema);

export default Analysis;
