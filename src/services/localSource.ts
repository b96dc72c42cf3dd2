import { Dirent, promises as fs } from 'fs';
import path from 'path';
import { RepoRef, RepositorySnapshot } from '../types/analysis';
import { RepoFetchError } from '../lib/errors';
import { MANIFEST_FILES } from '../config/catalog';
import { MetadataSource } from './metadataSource';
import { createSnapshot } from './snapshot';
import { formatRepoRef } from './repoRef';
import { logger } from '../lib/logger';

const SKIP_DIRS = new Set(['.git', 'node_modules', 'vendor', 'dist', 'build', '.venv', 'venv', '__pycache__', 'target', '.next']);
const MAX_FILES = 20000;
const MAX_MANIFEST_CHARS = 100_000;

/** Facts a local clone cannot tell us; usually copied from the hosting API listing. */
export interface LocalRepoInfo {
  description?: string | null;
  primaryLanguage?: string | null;
  stars?: number | null;
  forks?: number | null;
  openIssues?: number | null;
  updatedAt?: string | null;
}

async function readText(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (err) {
    logger.debug({ err, file }, 'skipping unreadable file');
    return null;
  }
}

async function walk(root: string): Promise<string[]> {
  const out: string[] = [];
  const pending: string[] = [''];
  while (pending.length && out.length < MAX_FILES) {
    const rel = pending.pop() ?? '';
    let entries: Dirent[];
    try {
      entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
    } catch (err) {
      // contents of an unreadable directory stay unknown
      logger.debug({ err, dir: rel }, 'skipping unreadable directory');
      continue;
    }
    for (const entry of entries) {
      const child = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) pending.push(child);
      } else if (entry.isFile()) {
        out.push(child);
        if (out.length >= MAX_FILES) break;
      }
    }
  }
  return out;
}

export class LocalMetadataSource implements MetadataSource {
  constructor(
    private readonly rootDir: string,
    private readonly info: LocalRepoInfo = {},
    private readonly now: () => Date = () => new Date()
  ) {}

  async fetchSnapshot(ref: RepoRef): Promise<RepositorySnapshot> {
    const repository = formatRepoRef(ref);
    try {
      const stat = await fs.stat(this.rootDir);
      if (!stat.isDirectory()) throw new RepoFetchError(repository, 'not_found', `${this.rootDir} is not a directory`);
    } catch (err) {
      if (err instanceof RepoFetchError) throw err;
      throw new RepoFetchError(repository, 'not_found', `${this.rootDir} is not readable`);
    }

    const files = await walk(this.rootDir);
    const rootFiles = files.filter((f) => !f.includes('/'));

    let readmeLength: number | null = null;
    const readme = rootFiles.find((f) => /^readme(\.|$)/i.test(f));
    if (readme) readmeLength = (await readText(path.join(this.rootDir, readme)))?.length ?? null;

    const manifests: Record<string, string> = {};
    for (const f of rootFiles) {
      if (!MANIFEST_FILES.some((m) => m.toLowerCase() === f.toLowerCase())) continue;
      const text = await readText(path.join(this.rootDir, f));
      if (text !== null) manifests[f] = text.slice(0, MAX_MANIFEST_CHARS);
    }

    return createSnapshot({
      owner: ref.owner,
      name: ref.name,
      files,
      manifests,
      readmeLength,
      ...this.info,
      fetchedAt: this.now().toISOString()
    });
  }
}

export default LocalMetadataSource;
