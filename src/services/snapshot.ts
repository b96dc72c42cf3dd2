import { RepoRef, RepositorySnapshot } from '../types/analysis';
import { formatRepoRef } from './repoRef';

export type SnapshotInput = RepoRef & {
  description?: string | null;
  primaryLanguage?: string | null;
  files?: readonly string[];
  manifests?: Readonly<Record<string, string>>;
  readmeLength?: number | null;
  stars?: number | null;
  forks?: number | null;
  openIssues?: number | null;
  updatedAt?: string | null;
  fetchedAt?: string;
};

function countOrNull(v: number | null | undefined): number | null {
  return typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : null;
}

function normalizePath(p: string): string {
  return p.replace(/\\/g, '/').replace(/^\.\//, '').replace(/^\/+/, '');
}

/** Normalizes partial metadata into a frozen snapshot; absent fields become null. */
export function createSnapshot(input: SnapshotInput): RepositorySnapshot {
  const files = Array.from(new Set((input.files || []).map(normalizePath).filter(Boolean))).sort();
  const manifests: Record<string, string> = {};
  for (const key of Object.keys(input.manifests || {}).sort()) {
    const content = input.manifests?.[key];
    if (typeof content === 'string') manifests[normalizePath(key)] = content;
  }
  const updatedAt = input.updatedAt && !Number.isNaN(Date.parse(input.updatedAt)) ? input.updatedAt : null;

  return Object.freeze({
    repository: formatRepoRef(input),
    owner: input.owner,
    name: input.name,
    description: input.description?.trim() || null,
    primaryLanguage: input.primaryLanguage || null,
    files: Object.freeze(files),
    manifests: Object.freeze(manifests),
    readmeLength: countOrNull(input.readmeLength),
    stars: countOrNull(input.stars),
    forks: countOrNull(input.forks),
    openIssues: countOrNull(input.openIssues),
    updatedAt,
    fetchedAt: input.fetchedAt || new Date().toISOString()
  });
}
