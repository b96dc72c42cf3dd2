export interface RepoRef {
  owner: string;
  name: string;
}

/**
 * Read-only facts about one repository at analysis time.
 * Fields the metadata source could not determine are null, never missing.
 */
export interface RepositorySnapshot {
  readonly repository: string; // owner/name
  readonly owner: string;
  readonly name: string;
  readonly description: string | null;
  readonly primaryLanguage: string | null;
  readonly files: readonly string[]; // repo-relative, '/'-separated, sorted
  readonly manifests: Readonly<Record<string, string>>; // root manifest path -> raw content
  readonly readmeLength: number | null;
  readonly stars: number | null;
  readonly forks: number | null;
  readonly openIssues: number | null;
  readonly updatedAt: string | null; // ISO
  readonly fetchedAt: string; // ISO, reference point for recency signals
}

export type SignalValue = boolean | number;

export const DIMENSIONS = [
  'market_demand',
  'monetization_ready',
  'tech_stack_modern',
  'deployment_ready',
  'user_traction',
  'code_quality',
  'strategic_value'
] as const;

export type DimensionName = (typeof DIMENSIONS)[number];

export type DimensionScores = Readonly<Record<DimensionName, number>>;

export type RevenuePotential = 'Low' | 'Medium' | 'High' | 'Very High';

export interface AnalysisResult {
  readonly repository: string;
  readonly total_score: number;
  readonly revenue_potential: RevenuePotential;
  readonly estimated_value: number;
  readonly scores: DimensionScores;
  readonly monetization_strategies: readonly string[];
  readonly next_steps: readonly string[];
}
