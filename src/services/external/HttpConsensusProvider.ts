import type {
  ConsensusProvider,
  DiscoveredResource,
  DiscoveredSubject,
  FetchResult,
} from '../../types/index.js';
import type { ResponseCache } from './ProviderClient.js';
import { HeliusClient } from './HeliusClient.js';
import { SolanaTrackerClient } from './SolanaTrackerClient.js';

export interface HttpConsensusProviderOptions {
  solanaTracker?: SolanaTrackerClient;
  helius?: HeliusClient;
  cache?: ResponseCache;
}

/**
 * ConsensusProvider over the public REST APIs: Solana Tracker for discovery
 * and PnL, Helius for raw balances.
 */
export class HttpConsensusProvider implements ConsensusProvider {
  readonly solanaTracker: SolanaTrackerClient;
  readonly helius: HeliusClient;

  constructor(options: HttpConsensusProviderOptions = {}) {
    this.solanaTracker = options.solanaTracker ?? new SolanaTrackerClient({ cache: options.cache });
    this.helius = options.helius ?? new HeliusClient({ cache: options.cache });
  }

  discoverTopSubjects(limit: number): Promise<FetchResult<DiscoveredSubject[]>> {
    return this.solanaTracker.getTopTraders(limit);
  }

  discoverTrendingResources(limit: number): Promise<FetchResult<DiscoveredResource[]>> {
    return this.solanaTracker.getTrendingTokens(limit);
  }

  discoverResourceTopSubjects(
    resourceId: string,
    limit: number
  ): Promise<FetchResult<DiscoveredSubject[]>> {
    return this.solanaTracker.getTokenTopTraders(resourceId, limit);
  }

  fetchResourceHolders(resourceId: string, limit: number): Promise<FetchResult<DiscoveredSubject[]>> {
    return this.solanaTracker.getTokenHolders(resourceId, limit);
  }

  fetchSubjectBalances(subjectId: string): Promise<FetchResult<unknown>> {
    return this.helius.getBalances(subjectId);
  }

  fetchSubjectPnl(subjectId: string): Promise<FetchResult<unknown>> {
    return this.solanaTracker.getWalletPnl(subjectId);
  }

  getStatus(): { solanaTracker: boolean; helius: boolean } {
    return {
      solanaTracker: this.solanaTracker.isConfigured(),
      helius: this.helius.isConfigured(),
    };
  }
}

export default HttpConsensusProvider;
