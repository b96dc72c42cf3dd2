import { DIMENSIONS, DimensionName, RevenuePotential } from '../types/analysis';
import { SignalName, isSignalName } from '../services/signals';
import { ScoringConfigError } from '../lib/errors';

/** `value × points`, capped at `cap` when set. Flags count as 1 or 0. */
export interface FormulaTerm {
  signal: SignalName;
  points: number;
  cap?: number;
}

export type RecommendationList = 'monetization_strategies' | 'next_steps';

export interface Recommendation {
  signal: SignalName; // fires when this signal is absent
  list: RecommendationList;
  text: string;
  requires?: readonly SignalName[]; // any one of these must be present
}

export interface LabelThreshold {
  below: number;
  label: RevenuePotential;
}

export interface ValueAnchor {
  score: number;
  value: number;
}

export interface ScoringConfig {
  weights: Readonly<Record<DimensionName, number>>;
  formulas: Readonly<Record<DimensionName, readonly FormulaTerm[]>>;
  labelThresholds: readonly LabelThreshold[];
  topLabel: RevenuePotential;
  valueAnchors: readonly ValueAnchor[];
  recommendations: readonly Recommendation[];
}

const BACKEND_STACKS: readonly SignalName[] = ['usesPython', 'usesGo', 'usesRust', 'usesRuby', 'usesPhp', 'usesJvm'];

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: {
    market_demand: 0.25,
    monetization_ready: 0.2,
    tech_stack_modern: 0.15,
    deployment_ready: 0.15,
    user_traction: 0.1,
    code_quality: 0.1,
    strategic_value: 0.05
  },
  formulas: {
    market_demand: [
      { signal: 'hasStars', points: 10 },
      { signal: 'starsOver10', points: 10 },
      { signal: 'starsOver50', points: 10 },
      { signal: 'starsOver100', points: 10 },
      { signal: 'trendingKeywordCount', points: 10, cap: 40 },
      { signal: 'readmeOver200', points: 10 },
      { signal: 'readmeOver1000', points: 10 }
    ],
    monetization_ready: [
      { signal: 'paymentLibrary', points: 30 },
      { signal: 'monetizationFileCount', points: 10, cap: 40 },
      { signal: 'paymentConfigFileCount', points: 15, cap: 15 },
      { signal: 'hasPricingPage', points: 15 }
    ],
    tech_stack_modern: [
      { signal: 'highValueTechCount', points: 10, cap: 60 },
      { signal: 'modernConfigCount', points: 15, cap: 45 }
    ],
    deployment_ready: [
      { signal: 'hasDockerfile', points: 30 },
      { signal: 'hasCiConfig', points: 20 },
      { signal: 'hasHostingConfig', points: 10 },
      { signal: 'hasEnvExample', points: 15 },
      { signal: 'hasBuildScript', points: 20 },
      { signal: 'deployDocsCount', points: 5, cap: 15 }
    ],
    user_traction: [
      { signal: 'starsOver10', points: 15 },
      { signal: 'starsOver100', points: 15 },
      { signal: 'starsOver1000', points: 20 },
      { signal: 'updatedWithin90Days', points: 10 },
      { signal: 'updatedWithin30Days', points: 10 },
      { signal: 'updatedWithin7Days', points: 10 },
      { signal: 'forks', points: 1, cap: 20 }
    ],
    code_quality: [
      { signal: 'hasTests', points: 35 },
      { signal: 'hasLintConfig', points: 20 },
      { signal: 'hasTypeScript', points: 20 },
      { signal: 'hasCiConfig', points: 15 },
      { signal: 'hasLicense', points: 10 }
    ],
    strategic_value: [
      { signal: 'strategicKeywordCount', points: 10, cap: 40 },
      { signal: 'hasLicense', points: 20 },
      { signal: 'forks', points: 2, cap: 20 },
      { signal: 'openIssues', points: 1, cap: 10 },
      { signal: 'readmeOver1000', points: 10 }
    ]
  },
  labelThresholds: [
    { below: 25, label: 'Low' },
    { below: 50, label: 'Medium' },
    { below: 75, label: 'High' }
  ],
  topLabel: 'Very High',
  valueAnchors: [
    { score: 0, value: 500 },
    { score: 25, value: 2000 },
    { score: 50, value: 10000 },
    { score: 75, value: 25000 },
    { score: 100, value: 50000 }
  ],
  // Priority order; output keeps this order.
  recommendations: [
    { signal: 'paymentLibrary', list: 'monetization_strategies', text: 'Add Stripe integration for premium features' },
    { signal: 'monetizationFileCount', list: 'monetization_strategies', text: 'Implement subscription tiers (Basic/Pro/Enterprise)' },
    { signal: 'hasPricingPage', list: 'monetization_strategies', text: 'Add freemium model with generous free tier' },
    {
      signal: 'hasRateLimiting',
      list: 'monetization_strategies',
      text: 'Create API tier with rate limiting for paid plans',
      requires: BACKEND_STACKS
    },
    {
      signal: 'hasHostingConfig',
      list: 'monetization_strategies',
      text: 'Deploy to Vercel with usage-based pricing',
      requires: ['usesNode']
    },
    {
      signal: 'hasAnalytics',
      list: 'monetization_strategies',
      text: 'Add analytics to track user behavior and conversion',
      requires: ['usesNode']
    },
    { signal: 'starsOver100', list: 'monetization_strategies', text: 'Launch on Product Hunt for visibility' },

    { signal: 'hasCiConfig', list: 'next_steps', text: 'Set up CI/CD pipeline with GitHub Actions' },
    { signal: 'hasDockerfile', list: 'next_steps', text: 'Create Dockerfile for containerization' },
    { signal: 'hasTests', list: 'next_steps', text: 'Add unit tests to improve reliability' },
    { signal: 'hasLintConfig', list: 'next_steps', text: 'Set up linting and code formatting' },
    {
      signal: 'hasTypeScript',
      list: 'next_steps',
      text: 'Consider migrating to TypeScript for better DX',
      requires: ['usesNode']
    },
    { signal: 'paymentLibrary', list: 'next_steps', text: 'Integrate payment processing (Stripe recommended)' },
    { signal: 'hasEnvExample', list: 'next_steps', text: 'Document required environment variables in .env.example' },
    { signal: 'readmeOver1000', list: 'next_steps', text: 'Create comprehensive documentation' },
    { signal: 'hasErrorTracking', list: 'next_steps', text: 'Set up error tracking (Sentry/LogRocket)' }
  ]
};

const WEIGHT_TOLERANCE = 1e-9;
const DIMENSION_KEYS: readonly string[] = DIMENSIONS;

function isPositive(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

/** Throws ScoringConfigError listing every problem found; returns the config untouched otherwise. */
export function validateScoringConfig(cfg: ScoringConfig): ScoringConfig {
  const problems: string[] = [];

  const weightKeys = Object.keys(cfg.weights);
  const formulaKeys = Object.keys(cfg.formulas);
  for (const key of [...weightKeys, ...formulaKeys]) {
    if (!DIMENSION_KEYS.includes(key)) problems.push(`unknown dimension "${key}"`);
  }

  let weightSum = 0;
  for (const dim of DIMENSIONS) {
    const w = cfg.weights[dim];
    if (typeof w !== 'number' || !Number.isFinite(w) || w < 0 || w > 1) {
      problems.push(`weight for ${dim} must be within [0, 1]`);
    } else {
      weightSum += w;
    }

    const terms = cfg.formulas[dim];
    if (!terms || terms.length === 0) {
      problems.push(`dimension ${dim} has no formula terms`);
      continue;
    }
    for (const term of terms) {
      if (!isSignalName(term.signal)) problems.push(`${dim} reads unknown signal "${term.signal}"`);
      if (!isPositive(term.points)) problems.push(`${dim}.${term.signal} points must be positive`);
      if (term.cap !== undefined && !isPositive(term.cap)) problems.push(`${dim}.${term.signal} cap must be positive`);
    }
  }
  if (Math.abs(weightSum - 1) > WEIGHT_TOLERANCE) {
    problems.push(`weights sum to ${weightSum}, expected 1`);
  }

  let previous = 0;
  for (const t of cfg.labelThresholds) {
    if (!(t.below > previous && t.below <= 100)) problems.push(`label threshold ${t.below} (${t.label}) out of order`);
    previous = t.below;
  }

  const anchors = cfg.valueAnchors;
  if (anchors.length < 2 || anchors[0].score !== 0 || anchors[anchors.length - 1].score !== 100) {
    problems.push('value anchors must start at score 0 and end at score 100');
  }
  for (let i = 1; i < anchors.length; i++) {
    if (!(anchors[i].score > anchors[i - 1].score)) problems.push(`value anchor scores must ascend at index ${i}`);
    if (!(anchors[i].value >= anchors[i - 1].value)) problems.push(`value anchor values must not decrease at index ${i}`);
  }
  if (anchors.some((a) => !Number.isFinite(a.value) || a.value < 0)) problems.push('value anchors must be non-negative');

  const seen = new Set<string>();
  for (const rec of cfg.recommendations) {
    if (!isSignalName(rec.signal)) problems.push(`recommendation "${rec.text}" reads unknown signal "${rec.signal}"`);
    for (const req of rec.requires || []) {
      if (!isSignalName(req)) problems.push(`recommendation "${rec.text}" requires unknown signal "${req}"`);
    }
    if (!rec.text.trim()) problems.push(`recommendation for ${rec.signal} has empty text`);
    const key = `${rec.list}:${rec.text}`;
    if (seen.has(key)) problems.push(`duplicate recommendation "${rec.text}"`);
    seen.add(key);
  }

  if (problems.length) throw new ScoringConfigError(problems);
  return cfg;
}

// Evaluated on import: a broken table stops the process at startup.
export const scoringConfig: ScoringConfig = validateScoringConfig(DEFAULT_SCORING_CONFIG);
