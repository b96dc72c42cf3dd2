import { AnalysisResult, RepositorySnapshot } from '../types/analysis';
import { ScoringConfig, scoringConfig } from '../config/scoring';
import { MetadataSource } from './metadataSource';
import { parseRepoRef } from './repoRef';
import { detectSignals } from './signals';
import { aggregate } from './scoring';

export function analyzeSnapshot(snapshot: RepositorySnapshot, cfg: ScoringConfig = scoringConfig): AnalysisResult {
  return aggregate(snapshot.repository, detectSignals(snapshot), cfg);
}

/**
 * Parses the identifier, fetches a snapshot and scores it. Parsing errors are
 * raised before the source is touched; fetch errors propagate and nothing is scored.
 */
export async function analyzeRepository(
  identifier: string,
  source: MetadataSource,
  cfg: ScoringConfig = scoringConfig
): Promise<AnalysisResult> {
  const ref = parseRepoRef(identifier);
  const snapshot = await source.fetchSnapshot(ref);
  return analyzeSnapshot(snapshot, cfg);
}
