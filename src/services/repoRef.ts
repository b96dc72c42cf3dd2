import { RepoRef } from '../types/analysis';
import { InvalidRepoIdentifierError } from '../lib/errors';

const OWNER_RE = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,38})$/;
const NAME_RE = /^[A-Za-z0-9._-]{1,100}$/;

/**
 * Accepts `owner/name`, `https://github.com/owner/name[.git][/...]`
 * or `git@github.com:owner/name.git`. Nothing is fetched here.
 */
export function parseRepoRef(input: string): RepoRef {
  const raw = (input || '').trim();
  if (!raw) throw new InvalidRepoIdentifierError(input, 'empty');

  let pathPart: string;
  const ssh = raw.match(/^git@github\.com:(.+)$/i);
  if (ssh) {
    pathPart = ssh[1];
  } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(raw)) {
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      throw new InvalidRepoIdentifierError(input, 'not a valid URL');
    }
    const host = url.hostname.toLowerCase();
    if (host !== 'github.com' && host !== 'www.github.com') {
      throw new InvalidRepoIdentifierError(input, 'only github.com repositories are supported');
    }
    pathPart = url.pathname;
  } else {
    pathPart = raw;
  }

  const parts = pathPart.replace(/^\/+/, '').replace(/\/+$/, '').split('/');
  if (!ssh && !raw.includes('://') && parts.length !== 2) {
    throw new InvalidRepoIdentifierError(input, 'expected owner/name');
  }
  if (parts.length < 2) throw new InvalidRepoIdentifierError(input, 'expected owner/name');

  const owner = parts[0];
  const name = parts[1].replace(/\.git$/i, '');
  if (!OWNER_RE.test(owner)) throw new InvalidRepoIdentifierError(input, `bad owner "${owner}"`);
  if (!NAME_RE.test(name) || name === '.' || name === '..') {
    throw new InvalidRepoIdentifierError(input, `bad repository name "${name}"`);
  }
  return { owner, name };
}

export function formatRepoRef(ref: RepoRef): string {
  return `${ref.owner}/${ref.name}`;
}
