import { Analysis, AnalysisRecord } from '../models/analysis';
import { AnalysisResult } from '../types/analysis';

export interface StoredAnalysis {
  id: string;
  repository: string;
  createdAt: string | null;
  result: AnalysisResult;
}

export async function saveAnalysis(accountId: string, result: AnalysisResult): Promise<string> {
  const doc = await Analysis.create({
    accountId,
    repository: result.repository,
    totalScore: result.total_score,
    revenuePotential: result.revenue_potential,
    result
  });
  return String(doc._id);
}

export async function listAnalyses(accountId: string, limit: number): Promise<StoredAnalysis[]> {
  const docs = await Analysis.find({ accountId })
    .sort({ createdAt: -1 })
    .limit(limit)
    .lean<Array<AnalysisRecord & { _id: unknown }>>()
    .exec();
  return docs.map((d) => ({
    id: String(d._id),
    repository: d.repository,
    createdAt: d.createdAt ? d.createdAt.toISOString() : null,
    result: d.result
  }));
}
