import type { DiscoveredSubject } from './subject.js';

export type FetchErrorKind = 'not-configured' | 'timeout' | 'network' | 'http' | 'malformed';

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  status?: number;
}

/**
 * Outcome of one provider call. Providers resolve to a failure value instead
 * of rejecting, so callers see every failure in the signature.
 */
export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FetchError };

export interface DiscoveredResource {
  resourceId: string;
  displaySymbol: string;
  volume?: number;
}

export interface ConsensusProvider {
  discoverTopSubjects(limit: number): Promise<FetchResult<DiscoveredSubject[]>>;
  discoverTrendingResources(limit: number): Promise<FetchResult<DiscoveredResource[]>>;
  discoverResourceTopSubjects(
    resourceId: string,
    limit: number
  ): Promise<FetchResult<DiscoveredSubject[]>>;
  fetchResourceHolders(
    resourceId: string,
    limit: number
  ): Promise<FetchResult<DiscoveredSubject[]>>;
  fetchSubjectBalances(subjectId: string): Promise<FetchResult<unknown>>;
  fetchSubjectPnl(subjectId: string): Promise<FetchResult<unknown>>;
}

export function ok<T>(value: T): FetchResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: FetchErrorKind, message: string, status?: number): FetchResult<T> {
  return { ok: false, error: { kind, message, status } };
}

