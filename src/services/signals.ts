import { z } from 'zod';
import { RepositorySnapshot, SignalValue } from '../types/analysis';
import { catalog, Ecosystem } from '../config/catalog';

export type SignalDetector =
  | { kind: 'flag'; detect: (s: RepositorySnapshot) => boolean }
  | { kind: 'count'; detect: (s: RepositorySnapshot) => number };

const DAY_MS = 24 * 60 * 60 * 1000;

function lower(list: readonly string[]): string[] {
  return list.map((v) => v.toLowerCase());
}

function basename(p: string): string {
  const i = p.lastIndexOf('/');
  return i === -1 ? p : p.slice(i + 1);
}

function escapeRe(v: string): string {
  return v.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function hasToken(text: string, token: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRe(token.toLowerCase())}([^a-z0-9]|$)`).test(text);
}

function rootFiles(s: RepositorySnapshot): string[] {
  return s.files.filter((f) => !f.includes('/')).map((f) => f.toLowerCase());
}

// '/x/' style marker means a directory; anything else is a root-level file name.
function hasMarker(s: RepositorySnapshot, marker: string): boolean {
  const m = marker.toLowerCase();
  if (m.endsWith('/')) return s.files.some((f) => f.toLowerCase().startsWith(m));
  return rootFiles(s).includes(m);
}

function countMarkers(s: RepositorySnapshot, markers: readonly string[]): number {
  return markers.filter((m) => hasMarker(s, m)).length;
}

function anyBasename(s: RepositorySnapshot, test: (name: string) => boolean): boolean {
  return s.files.some((f) => test(basename(f).toLowerCase()));
}

function manifestText(s: RepositorySnapshot): string {
  return Object.keys(s.manifests)
    .map((k) => s.manifests[k])
    .join('\n')
    .toLowerCase();
}

function manifestMentions(s: RepositorySnapshot, tokens: readonly string[]): boolean {
  const text = manifestText(s);
  return text.length > 0 && tokens.some((t) => hasToken(text, t));
}

function descriptionKeywordCount(s: RepositorySnapshot, keywords: readonly string[]): number {
  const text = (s.description || '').toLowerCase();
  if (!text) return 0;
  return lower(keywords).filter((k) => hasToken(text, k)).length;
}

function starsAbove(threshold: number): SignalDetector {
  return { kind: 'flag', detect: (s) => (s.stars ?? 0) > threshold };
}

function readmeAbove(chars: number): SignalDetector {
  return { kind: 'flag', detect: (s) => (s.readmeLength ?? 0) > chars };
}

// Measured against fetchedAt so a snapshot always scores the same.
function updatedWithin(days: number): SignalDetector {
  return {
    kind: 'flag',
    detect: (s) => {
      if (!s.updatedAt) return false;
      const updated = Date.parse(s.updatedAt);
      const reference = Date.parse(s.fetchedAt);
      if (Number.isNaN(updated) || Number.isNaN(reference)) return false;
      return Math.max(0, reference - updated) < days * DAY_MS;
    }
  };
}

function usesEcosystem(ecosystem: Ecosystem): SignalDetector {
  const markers = lower(catalog.ecosystems[ecosystem]);
  return { kind: 'flag', detect: (s) => rootFiles(s).some((f) => markers.includes(f)) };
}

const packageJsonSchema = z.object({
  scripts: z.record(z.unknown()).optional()
});

function hasBuildScript(s: RepositorySnapshot): boolean {
  const key = Object.keys(s.manifests).find((k) => k.toLowerCase() === 'package.json');
  if (!key) return false;
  let parsed: unknown;
  try {
    parsed = JSON.parse(s.manifests[key]);
  } catch {
    return false;
  }
  const pkg = packageJsonSchema.safeParse(parsed);
  return pkg.success && typeof pkg.data.scripts?.build === 'string';
}

function isTestPath(path: string): boolean {
  const lowerPath = path.toLowerCase();
  const dirs = lowerPath.split('/').slice(0, -1);
  if (dirs.some((d) => lower(catalog.testDirectories).includes(d))) return true;
  const name = basename(lowerPath);
  return /\.(test|spec)\.[a-z0-9]+$/.test(name) || /^test_.+\.py$/.test(name) || /_test\.go$/.test(name);
}

/**
 * Every signal the scorer knows about. Detectors only read the snapshot,
 * never each other, so evaluation order does not matter.
 */
export const SIGNAL_DETECTORS = {
  // counts
  stars: { kind: 'count', detect: (s) => s.stars ?? 0 },
  forks: { kind: 'count', detect: (s) => s.forks ?? 0 },
  openIssues: { kind: 'count', detect: (s) => s.openIssues ?? 0 },

  // star tiers
  hasStars: starsAbove(0),
  starsOver10: starsAbove(10),
  starsOver50: starsAbove(50),
  starsOver100: starsAbove(100),
  starsOver1000: starsAbove(1000),

  // description / readme
  trendingKeywordCount: { kind: 'count', detect: (s) => descriptionKeywordCount(s, catalog.trendingKeywords) },
  strategicKeywordCount: { kind: 'count', detect: (s) => descriptionKeywordCount(s, catalog.strategicKeywords) },
  readmeOver200: readmeAbove(200),
  readmeOver1000: readmeAbove(1000),

  // monetization
  paymentLibrary: { kind: 'flag', detect: (s) => manifestMentions(s, catalog.paymentLibraries) },
  monetizationFileCount: {
    kind: 'count',
    detect: (s) => {
      const keywords = lower(catalog.monetizationPathKeywords);
      return s.files.filter((f) => keywords.some((k) => f.toLowerCase().includes(k))).length;
    }
  },
  paymentConfigFileCount: {
    kind: 'count',
    detect: (s) => {
      const prefixes = lower(catalog.paymentConfigPrefixes);
      return s.files.filter((f) => prefixes.some((p) => basename(f).toLowerCase().startsWith(p))).length;
    }
  },
  hasPricingPage: { kind: 'flag', detect: (s) => s.files.some((f) => f.toLowerCase().includes('pricing')) },

  // tech stack
  highValueTechCount: {
    kind: 'count',
    detect: (s) => {
      const text = manifestText(s);
      if (!text) return 0;
      return Object.keys(catalog.highValueTech).filter((category) =>
        catalog.highValueTech[category].some((t) => hasToken(text, t))
      ).length;
    }
  },
  modernConfigCount: {
    kind: 'count',
    detect: (s) =>
      catalog.modernConfigGroups.filter((group) =>
        anyBasename(s, (name) => lower(group).some((prefix) => name.startsWith(prefix)))
      ).length
  },

  // deployment
  hasDockerfile: { kind: 'flag', detect: (s) => anyBasename(s, (name) => name === 'dockerfile' || name.startsWith('dockerfile.')) },
  hasCiConfig: { kind: 'flag', detect: (s) => countMarkers(s, catalog.ciPaths) > 0 },
  hasHostingConfig: { kind: 'flag', detect: (s) => countMarkers(s, catalog.hostingFiles) > 0 },
  hasEnvExample: { kind: 'flag', detect: (s) => anyBasename(s, (name) => lower(catalog.envExampleFiles).includes(name)) },
  hasBuildScript: { kind: 'flag', detect: hasBuildScript },
  deployDocsCount: { kind: 'count', detect: (s) => countMarkers(s, catalog.deployDocs) },

  // activity
  updatedWithin7Days: updatedWithin(7),
  updatedWithin30Days: updatedWithin(30),
  updatedWithin90Days: updatedWithin(90),

  // quality
  hasTests: { kind: 'flag', detect: (s) => s.files.some(isTestPath) },
  hasLintConfig: {
    kind: 'flag',
    detect: (s) => anyBasename(s, (name) => lower(catalog.lintConfigPrefixes).some((p) => name.startsWith(p)))
  },
  hasTypeScript: { kind: 'flag', detect: (s) => anyBasename(s, (name) => name === 'tsconfig.json') },
  hasLicense: { kind: 'flag', detect: (s) => rootFiles(s).some((f) => /^(licen[sc]e|copying)(\.|$)/.test(f)) },

  // services
  hasAnalytics: { kind: 'flag', detect: (s) => manifestMentions(s, catalog.analyticsLibraries) },
  hasErrorTracking: { kind: 'flag', detect: (s) => manifestMentions(s, catalog.errorTrackingLibraries) },
  hasRateLimiting: { kind: 'flag', detect: (s) => manifestMentions(s, catalog.rateLimitLibraries) },

  // ecosystems
  usesNode: usesEcosystem('node'),
  usesPython: usesEcosystem('python'),
  usesGo: usesEcosystem('go'),
  usesRust: usesEcosystem('rust'),
  usesRuby: usesEcosystem('ruby'),
  usesPhp: usesEcosystem('php'),
  usesJvm: usesEcosystem('jvm')
} satisfies Record<string, SignalDetector>;

export type SignalName = keyof typeof SIGNAL_DETECTORS;

export type SignalSet = Readonly<Record<SignalName, SignalValue>>;

export function isSignalName(name: string): name is SignalName {
  return Object.prototype.hasOwnProperty.call(SIGNAL_DETECTORS, name);
}

export const SIGNAL_NAMES: readonly SignalName[] = Object.keys(SIGNAL_DETECTORS).filter(isSignalName);

/** Numeric view of a signal: flags count as 1 or 0. */
export function signalAmount(value: SignalValue): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function detectSignals(snapshot: RepositorySnapshot): SignalSet {
  const out: Partial<Record<SignalName, SignalValue>> = {};
  for (const name of SIGNAL_NAMES) {
    const detector: SignalDetector = SIGNAL_DETECTORS[name];
    if (detector.kind === 'flag') {
      out[name] = detector.detect(snapshot) === true;
    } else {
      const n = detector.detect(snapshot);
      out[name] = Number.isFinite(n) && n > 0 ? n : 0;
    }
  }
  return Object.freeze(completeSignalSet(out));
}

function isComplete(p: Partial<Record<SignalName, SignalValue>>): p is Record<SignalName, SignalValue> {
  return SIGNAL_NAMES.every((name) => p[name] !== undefined);
}

// Absent signals take their "not detected" value: false for flags, 0 for counts.
function completeSignalSet(partial: Partial<Record<SignalName, SignalValue>>): Record<SignalName, SignalValue> {
  const full: Partial<Record<SignalName, SignalValue>> = {};
  for (const name of SIGNAL_NAMES) {
    const detector: SignalDetector = SIGNAL_DETECTORS[name];
    full[name] = partial[name] ?? (detector.kind === 'flag' ? false : 0);
  }
  if (!isComplete(full)) throw new Error('signal set is missing registered signals');
  return full;
}

/** Builds a complete SignalSet from a few overrides; everything else is absent. */
export function signalSetOf(overrides: Partial<Record<SignalName, SignalValue>> = {}): SignalSet {
  return Object.freeze(completeSignalSet(overrides));
}
