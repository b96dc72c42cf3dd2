import { z } from 'zod';
import rawCatalog from './catalog.json';

const keywordList = z.array(z.string().min(1)).min(1);

export const ECOSYSTEMS = ['node', 'python', 'go', 'rust', 'ruby', 'php', 'jvm'] as const;
export type Ecosystem = (typeof ECOSYSTEMS)[number];

const catalogSchema = z.object({
  ecosystems: z.object({
    node: keywordList,
    python: keywordList,
    go: keywordList,
    rust: keywordList,
    ruby: keywordList,
    php: keywordList,
    jvm: keywordList
  }),
  highValueTech: z.record(keywordList),
  paymentLibraries: keywordList,
  analyticsLibraries: keywordList,
  errorTrackingLibraries: keywordList,
  rateLimitLibraries: keywordList,
  monetizationPathKeywords: keywordList,
  trendingKeywords: keywordList,
  strategicKeywords: keywordList,
  ciPaths: keywordList,
  hostingFiles: keywordList,
  envExampleFiles: keywordList,
  deployDocs: keywordList,
  lintConfigPrefixes: keywordList,
  testDirectories: keywordList,
  modernConfigGroups: z.array(keywordList).min(1),
  paymentConfigPrefixes: keywordList
});

export type SignalCatalog = z.infer<typeof catalogSchema>;

// Marker files and keyword tables the signal detectors read.
export const catalog: SignalCatalog = catalogSchema.parse(rawCatalog);

/** Root-level dependency manifests worth reading, across every ecosystem. */
export const MANIFEST_FILES: readonly string[] = ECOSYSTEMS.flatMap((e) => catalog.ecosystems[e]);
