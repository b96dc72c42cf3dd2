import { DEFAULT_SCORING_CONFIG, ScoringConfig, scoringConfig, validateScoringConfig } from '../src/config/scoring';
import { ScoringConfigError } from '../src/lib/errors';

function problemsOf(cfg: ScoringConfig): string[] {
  try {
    validateScoringConfig(cfg);
  } catch (err) {
    if (err instanceof ScoringConfigError) return err.problems;
    throw err;
  }
  return [];
}

describe('validateScoringConfig', () => {
  it('accepts the default configuration', () => {
    expect(scoringConfig).toBe(DEFAULT_SCORING_CONFIG);
    expect(problemsOf(DEFAULT_SCORING_CONFIG)).toEqual([]);
  });

  it('rejects weights that do not sum to 1', () => {
    const cfg: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      weights: { ...DEFAULT_SCORING_CONFIG.weights, strategic_value: 0.1 }
    };
    expect(() => validateScoringConfig(cfg)).toThrow(ScoringConfigError);
    expect(problemsOf(cfg)).toHaveLength(1);
    expect(problemsOf(cfg)[0]).toMatch(/^weights sum to 1\.05/);
  });

  it('rejects an empty formula and a non-positive cap', () => {
    const cfg: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      formulas: {
        ...DEFAULT_SCORING_CONFIG.formulas,
        code_quality: [],
        tech_stack_modern: [{ signal: 'highValueTechCount', points: 10, cap: 0 }]
      }
    };
    expect(problemsOf(cfg)).toEqual([
      'tech_stack_modern.highValueTechCount cap must be positive',
      'dimension code_quality has no formula terms'
    ]);
  });

  it('rejects out-of-order thresholds and anchors', () => {
    const cfg: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      labelThresholds: [
        { below: 50, label: 'Low' },
        { below: 25, label: 'Medium' }
      ],
      valueAnchors: [
        { score: 0, value: 500 },
        { score: 50, value: 100 },
        { score: 90, value: 200 }
      ]
    };
    expect(problemsOf(cfg)).toEqual([
      'label threshold 25 (Medium) out of order',
      'value anchors must start at score 0 and end at score 100',
      'value anchor values must not decrease at index 1'
    ]);
  });

  it('rejects duplicate recommendations', () => {
    const first = DEFAULT_SCORING_CONFIG.recommendations[0];
    const cfg: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      recommendations: [...DEFAULT_SCORING_CONFIG.recommendations, first]
    };
    expect(problemsOf(cfg)).toEqual(['duplicate recommendation "Add Stripe integration for premium features"']);
  });
});
