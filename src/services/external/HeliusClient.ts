import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { CACHE_TTL, FetchResult } from '../../types/index.js';
import { ProviderClient, ProviderClientOptions } from './ProviderClient.js';

export class HeliusClient extends ProviderClient {
  protected readonly name = 'Helius';

  constructor(options?: Partial<ProviderClientOptions>) {
    super({
      apiKey: options?.apiKey ?? config.helius.apiKey,
      baseUrl: options?.baseUrl ?? config.helius.baseUrl,
      timeoutMs: options?.timeoutMs ?? config.provider.timeoutMs,
      maxRetries: options?.maxRetries ?? config.provider.maxRetries,
      retryDelayMs: options?.retryDelayMs ?? config.provider.retryDelayMs,
      cache: options?.cache,
    });

    if (!this.apiKey) {
      logger.warn('Helius API key is not configured');
    }
  }

  /**
   * Token balances of one wallet. The body is returned as-is
   * (`{ tokens: [...], nativeBalance }`); the normalizer reads it.
   */
  async getBalances(wallet: string): Promise<FetchResult<unknown>> {
    return this.getJson(`/addresses/${wallet}/balances`, {
      query: { 'api-key': this.apiKey },
      cacheKey: `helius:balances:${wallet}`,
      cacheTtlSec: CACHE_TTL.WALLET,
    });
  }
}

export default HeliusClient;
