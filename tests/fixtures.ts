import { createSnapshot, SnapshotInput } from '../src/services/snapshot';
import { RepositorySnapshot } from '../src/types/analysis';

export const FETCHED_AT = '2026-10-19T00:00:00.000Z';

export function snapshot(overrides: Partial<SnapshotInput> = {}): RepositorySnapshot {
  return createSnapshot({ owner: 'acme', name: 'widget', fetchedAt: FETCHED_AT, ...overrides });
}

// payment library manifest + CI config, 500 stars / 20 forks / 5 open issues
export function paymentCiSnapshot(): RepositorySnapshot {
  return snapshot({
    name: 'shop',
    files: ['package.json', '.github/workflows/ci.yml'],
    manifests: { 'package.json': '{"name":"shop","dependencies":{"stripe":"^16.0.0"}}' },
    stars: 500,
    forks: 20,
    openIssues: 5
  });
}
