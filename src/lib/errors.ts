export class InvalidRepoIdentifierError extends Error {
  constructor(public readonly input: string, reason: string) {
    super(`invalid repository identifier "${input}": ${reason}`);
    this.name = 'InvalidRepoIdentifierError';
  }
}

export type RepoFetchErrorKind = 'not_found' | 'forbidden' | 'rate_limited' | 'unavailable';

export class RepoFetchError extends Error {
  constructor(
    public readonly repository: string,
    public readonly kind: RepoFetchErrorKind,
    message?: string
  ) {
    super(message || `failed to fetch ${repository}: ${kind}`);
    this.name = 'RepoFetchError';
  }

  get httpStatus(): number {
    switch (this.kind) {
      case 'not_found':
        return 404;
      case 'forbidden':
        return 403;
      case 'rate_limited':
        return 429;
      default:
        return 502;
    }
  }
}

export class ScoringConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`invalid scoring configuration: ${problems.join('; ')}`);
    this.name = 'ScoringConfigError';
  }
}

export class QuotaExceededError extends Error {
  constructor(public readonly used: number, public readonly limit: number) {
    super(`Monthly quota exceeded (${used}/${limit}). Upgrade your plan.`);
    this.name = 'QuotaExceededError';
  }
}
