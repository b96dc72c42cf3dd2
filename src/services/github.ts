import axios from 'axios';
import { RepoRef, RepositorySnapshot } from '../types/analysis';
import { RepoFetchError, RepoFetchErrorKind } from '../lib/errors';
import { logger } from '../lib/logger';
import { MANIFEST_FILES } from '../config/catalog';
import { githubContentSchema, githubRepoSchema, githubTreeSchema, GitHubRepo } from '../validators/githubSchema';
import { MetadataSource } from './metadataSource';
import { createSnapshot } from './snapshot';
import { formatRepoRef } from './repoRef';

const GITHUB_API = 'https://api.github.com';
const MAX_MANIFEST_CHARS = 100_000;

export interface GitHubSourceOptions {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
  now?: () => Date;
}

export interface OwnerRepository {
  owner: string;
  name: string;
  description: string | null;
  stars: number;
  pushedAt: string | null;
}

function responseStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('response' in err)) return undefined;
  const res = err.response;
  if (typeof res !== 'object' || res === null || !('status' in res)) return undefined;
  return typeof res.status === 'number' ? res.status : undefined;
}

function rateLimitExhausted(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('response' in err)) return false;
  const res = err.response;
  if (typeof res !== 'object' || res === null || !('headers' in res)) return false;
  const headers = res.headers;
  if (typeof headers !== 'object' || headers === null || !('x-ratelimit-remaining' in headers)) return false;
  return String(headers['x-ratelimit-remaining']) === '0';
}

export function classifyFetchError(err: unknown): RepoFetchErrorKind {
  const status = responseStatus(err);
  if (status === 404) return 'not_found';
  if (status === 429) return 'rate_limited';
  if (status === 403) return rateLimitExhausted(err) ? 'rate_limited' : 'forbidden';
  if (status === 401) return 'forbidden';
  return 'unavailable';
}

function decodeContent(data: unknown): string | null {
  const parsed = githubContentSchema.safeParse(data);
  if (!parsed.success) return null;
  if (parsed.data.encoding && parsed.data.encoding !== 'base64') return parsed.data.content;
  return Buffer.from(parsed.data.content, 'base64').toString('utf8');
}

/**
 * Reads repository facts from the GitHub REST API. Only the repository
 * details call is required; tree, README and manifests degrade to unknown.
 * One instance per request: the token is never shared across callers.
 */
export class GitHubMetadataSource implements MetadataSource {
  private readonly base: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly now: () => Date;

  constructor(opts: GitHubSourceOptions = {}) {
    this.base = opts.baseUrl || GITHUB_API;
    this.timeout = opts.timeoutMs ?? 15000;
    this.now = opts.now || (() => new Date());
    this.headers = { Accept: 'application/vnd.github.v3+json', 'User-Agent': 'repo-revenue-analyzer' };
    if (opts.token) this.headers.Authorization = `token ${opts.token}`;
  }

  private async get(path: string, params?: Record<string, string | number>): Promise<unknown> {
    const r = await axios.get(`${this.base}${path}`, { headers: this.headers, params, timeout: this.timeout });
    return r.data;
  }

  async fetchSnapshot(ref: RepoRef): Promise<RepositorySnapshot> {
    const repository = formatRepoRef(ref);
    const log = logger.child({ repository });
    const repoPath = `/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}`;

    let details: GitHubRepo = {};
    try {
      const parsed = githubRepoSchema.safeParse(await this.get(repoPath));
      if (parsed.success) details = parsed.data;
      else log.warn({ issues: parsed.error.issues.length }, 'unexpected repository payload');
    } catch (err) {
      const kind = classifyFetchError(err);
      log.warn({ kind, status: responseStatus(err) }, 'repository fetch failed');
      throw new RepoFetchError(repository, kind);
    }
    const fetchedAt = this.now().toISOString();

    let files: string[] | null = null;
    try {
      const branch = details.default_branch || 'HEAD';
      const tree = githubTreeSchema.safeParse(
        await this.get(`${repoPath}/git/trees/${encodeURIComponent(branch)}`, { recursive: 1 })
      );
      if (tree.success) {
        files = tree.data.tree.filter((e) => e.type === 'blob').map((e) => e.path);
        if (tree.data.truncated) log.info({ files: files.length }, 'file tree truncated by GitHub');
      }
    } catch (err) {
      // empty repositories answer 409 here
      log.info({ status: responseStatus(err) }, 'file tree unavailable');
    }

    let readmeLength: number | null = null;
    try {
      const readme = decodeContent(await this.get(`${repoPath}/readme`));
      readmeLength = readme === null ? null : readme.length;
    } catch (err) {
      log.debug({ status: responseStatus(err) }, 'no readme');
    }

    // without a tree, request every known manifest name directly
    const candidates = files
      ? files.filter((f) => !f.includes('/') && MANIFEST_FILES.some((m) => m.toLowerCase() === f.toLowerCase()))
      : [...MANIFEST_FILES];
    const manifests: Record<string, string> = {};
    for (const manifest of candidates) {
      try {
        const content = decodeContent(await this.get(`${repoPath}/contents/${encodeURIComponent(manifest)}`));
        if (content !== null) manifests[manifest] = content.slice(0, MAX_MANIFEST_CHARS);
      } catch (err) {
        log.debug({ manifest, status: responseStatus(err) }, 'manifest unavailable');
      }
    }

    return createSnapshot({
      owner: ref.owner,
      name: ref.name,
      description: details.description ?? null,
      primaryLanguage: details.language ?? null,
      files: files ?? Object.keys(manifests),
      manifests,
      readmeLength,
      stars: details.stargazers_count ?? null,
      forks: details.forks_count ?? null,
      openIssues: details.open_issues_count ?? null,
      updatedAt: details.pushed_at ?? details.updated_at ?? null,
      fetchedAt
    });
  }

  /** The owner's non-archived repositories, most recently pushed first. */
  async listOwnerRepositories(owner: string, limit: number): Promise<OwnerRepository[]> {
    const out: OwnerRepository[] = [];
    const perPage = Math.min(100, Math.max(1, limit));
    for (let page = 1; out.length < limit; page++) {
      let data: unknown;
      try {
        data = await this.get(`/users/${encodeURIComponent(owner)}/repos`, {
          per_page: perPage,
          page,
          sort: 'pushed',
          type: 'owner'
        });
      } catch (err) {
        throw new RepoFetchError(owner, classifyFetchError(err), `failed to list repositories for ${owner}`);
      }
      const items = Array.isArray(data) ? data : [];
      for (const item of items) {
        const parsed = githubRepoSchema.safeParse(item);
        if (!parsed.success || !parsed.data.name || parsed.data.archived) continue;
        out.push({
          owner: parsed.data.owner?.login || owner,
          name: parsed.data.name,
          description: parsed.data.description ?? null,
          stars: parsed.data.stargazers_count ?? 0,
          pushedAt: parsed.data.pushed_at ?? null
        });
        if (out.length >= limit) break;
      }
      if (items.length < perPage) break;
    }
    return out;
  }
}

export default GitHubMetadataSource;
