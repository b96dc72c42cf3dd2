import { AnalysisResult } from '../types/analysis';
import { TrendCondition, TrendRule, TrendTable, trendTable } from '../config/trends';

export type TrendRecommendation = Omit<TrendRule, 'when'>;

function repoName(repository: string): string {
  return repository.slice(repository.indexOf('/') + 1).toLowerCase();
}

function applies(when: TrendCondition, result: AnalysisResult): boolean {
  if ('below' in when) return result.scores[when.dimension] < when.below;
  if ('above' in when) return result.scores[when.dimension] > when.above;
  if ('nameIncludes' in when) {
    const name = repoName(result.repository);
    return when.nameIncludes.some((k) => name.includes(k.toLowerCase()));
  }
  return when.always;
}

/** Trend-driven improvements for one analyzed repository, in table order. */
export function trendRecommendations(result: AnalysisResult, table: TrendTable = trendTable): TrendRecommendation[] {
  return table.recommendations
    .filter((rule) => applies(rule.when, result))
    .map(({ category, priority, action, impact, effort }) => ({ category, priority, action, impact, effort }));
}
