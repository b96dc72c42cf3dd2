import { RepoRef, RepositorySnapshot } from '../types/analysis';

/**
 * Where repository facts come from. Implementations throw RepoFetchError when
 * the repository itself cannot be reached; missing optional facts are null.
 */
export interface MetadataSource {
  fetchSnapshot(ref: RepoRef): Promise<RepositorySnapshot>;
}
