import type { SourceMode } from './position.js';

/**
 * `top-traders` ranks wallets directly. The `trending-*` modes rank tokens
 * first and collect the top traders (or largest holders) of each.
 */
export type DiscoveryMode = 'top-traders' | 'trending-traders' | 'trending-holders';

export const DISCOVERY_MODES: readonly DiscoveryMode[] = [
  'top-traders',
  'trending-traders',
  'trending-holders',
];

export interface ScanParams {
  discoveryMode: DiscoveryMode;
  sourceMode: SourceMode;
  subjectLimit: number;         // Wallets requested from a direct ranking
  resourceLimit: number;        // Trending tokens seeded from
  subjectsPerResource: number;  // Wallets taken per trending token
  maxSubjects: number;          // Batch cap across all discovery
  minHolders: number;
  concurrency: number;          // Wallets fetched in parallel
}

export const DEFAULT_SCAN_PARAMS: ScanParams = {
  discoveryMode: 'top-traders',
  sourceMode: 'balances',
  subjectLimit: 50,
  resourceLimit: 5,
  subjectsPerResource: 10,
  maxSubjects: 100,
  minHolders: 2,
  concurrency: 1,
};

export interface ScanSummary {
  scanId: number;
  discoveryMode: DiscoveryMode;
  sourceMode: SourceMode;
  startedAt: Date;
  finishedAt: Date;
  discovered: number;
  processed: number;
  failed: number;
  active: number;
  flagged: number;
}

export function isDiscoveryMode(value: unknown): value is DiscoveryMode {
  return typeof value === 'string' && (DISCOVERY_MODES as readonly string[]).includes(value);
}
