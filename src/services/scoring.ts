import { AnalysisResult, DIMENSIONS, DimensionName, DimensionScores, RevenuePotential } from '../types/analysis';
import { RecommendationList, ScoringConfig, scoringConfig } from '../config/scoring';
import { SignalSet, signalAmount } from './signals';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  return Math.min(max, Math.max(min, n));
}

export function scoreDimension(dimension: DimensionName, signals: SignalSet, cfg: ScoringConfig = scoringConfig): number {
  let score = 0;
  for (const term of cfg.formulas[dimension]) {
    const raw = signalAmount(signals[term.signal]) * term.points;
    score += term.cap === undefined ? raw : Math.min(raw, term.cap);
  }
  return round2(clamp(score, 0, 100));
}

export function scoreDimensions(signals: SignalSet, cfg: ScoringConfig = scoringConfig): DimensionScores {
  return Object.freeze({
    market_demand: scoreDimension('market_demand', signals, cfg),
    monetization_ready: scoreDimension('monetization_ready', signals, cfg),
    tech_stack_modern: scoreDimension('tech_stack_modern', signals, cfg),
    deployment_ready: scoreDimension('deployment_ready', signals, cfg),
    user_traction: scoreDimension('user_traction', signals, cfg),
    code_quality: scoreDimension('code_quality', signals, cfg),
    strategic_value: scoreDimension('strategic_value', signals, cfg)
  });
}

export function totalScore(scores: DimensionScores, cfg: ScoringConfig = scoringConfig): number {
  let total = 0;
  for (const dim of DIMENSIONS) total += scores[dim] * cfg.weights[dim];
  return round2(clamp(total, 0, 100));
}

export function revenuePotential(total: number, cfg: ScoringConfig = scoringConfig): RevenuePotential {
  for (const t of cfg.labelThresholds) {
    if (total < t.below) return t.label;
  }
  return cfg.topLabel;
}

/** Piecewise-linear between the configured anchors, rounded to whole dollars. */
export function estimateValue(total: number, cfg: ScoringConfig = scoringConfig): number {
  const anchors = cfg.valueAnchors;
  const score = clamp(total, anchors[0].score, anchors[anchors.length - 1].score);
  for (let i = 1; i < anchors.length; i++) {
    const lo = anchors[i - 1];
    const hi = anchors[i];
    if (score <= hi.score) {
      const t = (score - lo.score) / (hi.score - lo.score);
      return Math.round(lo.value + t * (hi.value - lo.value));
    }
  }
  return anchors[anchors.length - 1].value;
}

/** Gap-filling recommendations for one list, in the table's priority order. */
export function recommend(list: RecommendationList, signals: SignalSet, cfg: ScoringConfig = scoringConfig): string[] {
  return cfg.recommendations
    .filter((r) => r.list === list)
    .filter((r) => signalAmount(signals[r.signal]) === 0)
    .filter((r) => !r.requires || r.requires.some((req) => signalAmount(signals[req]) > 0))
    .map((r) => r.text);
}

export function aggregate(repository: string, signals: SignalSet, cfg: ScoringConfig = scoringConfig): AnalysisResult {
  const scores = scoreDimensions(signals, cfg);
  const total = totalScore(scores, cfg);
  return Object.freeze({
    repository,
    total_score: total,
    revenue_potential: revenuePotential(total, cfg),
    estimated_value: estimateValue(total, cfg),
    scores,
    monetization_strategies: Object.freeze(recommend('monetization_strategies', signals, cfg)),
    next_steps: Object.freeze(recommend('next_steps', signals, cfg))
  });
}

export default { scoreDimension, scoreDimensions, totalScore, revenuePotential, estimateValue, recommend, aggregate };
