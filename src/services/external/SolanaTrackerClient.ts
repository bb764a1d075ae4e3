import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import {
  CACHE_TTL,
  DiscoveredResource,
  DiscoveredSubject,
  FetchResult,
  UNKNOWN_SYMBOL,
  ok,
} from '../../types/index.js';
import {
  PayloadRecord,
  extractList,
  isRecord,
  recordsOf,
  resolveNumber,
  resolveOptionalNumber,
  resolveString,
  toNumber,
} from '../../utils/payload.js';
import {
  LISTING_RESOURCE_ID_ALIASES,
  LIST_CONTAINERS,
  SUBJECT_ID_ALIASES,
  SUBJECT_PNL_ALIASES,
  VOLUME_ALIASES,
} from '../positions/fieldAliases.js';
import { ProviderClient, ProviderClientOptions } from './ProviderClient.js';

// Trending search always asks for at least this many tokens before ranking
const SEARCH_PAGE_SIZE = 20;

function toDiscoveredSubject(record: PayloadRecord): DiscoveredSubject | null {
  const subjectId = resolveString(record, SUBJECT_ID_ALIASES);
  if (!subjectId) {
    return null;
  }

  // Top-trader endpoints report PnL at the top level or under `summary`
  const summary = isRecord(record.summary) ? record.summary : record;
  const pnl = resolveOptionalNumber(summary, SUBJECT_PNL_ALIASES);

  return pnl === undefined ? { subjectId } : { subjectId, pnl };
}

export function toDiscoveredSubjects(payload: unknown): DiscoveredSubject[] {
  return recordsOf(extractList(payload, LIST_CONTAINERS))
    .map(toDiscoveredSubject)
    .filter((subject): subject is DiscoveredSubject => subject !== null);
}

function toDiscoveredResource(record: PayloadRecord): DiscoveredResource {
  const nested = isRecord(record.token) ? record.token : {};
  const resourceId = resolveString(record, LISTING_RESOURCE_ID_ALIASES)
    ?? resolveString(nested, LISTING_RESOURCE_ID_ALIASES)
    ?? '';
  const displaySymbol = resolveString(record, ['symbol'])
    ?? resolveString(nested, ['symbol'])
    ?? UNKNOWN_SYMBOL;
  const volume = resolveOptionalNumber(record, VOLUME_ALIASES);

  return volume === undefined
    ? { resourceId, displaySymbol }
    : { resourceId, displaySymbol, volume };
}

/**
 * Rank search results by liquidity, deepest first
 */
export function rankTrendingTokens(payload: unknown, limit: number): DiscoveredResource[] {
  const records = recordsOf(extractList(payload, ['data', 'tokens']));
  const liquidity = (record: PayloadRecord) => resolveNumber(record, ['liquidityUsd']);

  return [...records]
    .sort((a, b) => liquidity(b) - liquidity(a))
    .slice(0, limit)
    .map(toDiscoveredResource);
}

/**
 * Reshape a `/pnl/{wallet}` body into open and closed position lists.
 *
 * The endpoint keys tokens by mint (`tokens: { [mint]: {...} }`); a token with
 * a remaining `holding` is open, anything else is closed. Bodies that already
 * carry `open`/`closed` lists pass through unchanged.
 */
export function splitPnlPositions(payload: unknown): unknown {
  if (!isRecord(payload)) {
    return payload;
  }

  // `data` may only hold wallet metadata, with the positions at the top level
  const nested = isRecord(payload.data) ? payload.data : undefined;
  const root = nested && (isRecord(nested.tokens) || 'open' in nested || 'closed' in nested)
    ? nested
    : payload;
  const tokens = root.tokens;
  if ('open' in root || 'closed' in root || !isRecord(tokens)) {
    return payload;
  }

  const open: PayloadRecord[] = [];
  const closed: PayloadRecord[] = [];

  for (const [mint, entry] of Object.entries(tokens)) {
    if (!isRecord(entry)) {
      continue;
    }
    const position = { mint, ...entry };
    if (toNumber(entry.holding) > 0) {
      open.push(position);
    } else {
      closed.push(position);
    }
  }

  return { open, closed };
}

export class SolanaTrackerClient extends ProviderClient {
  protected readonly name = 'SolanaTracker';

  constructor(options?: Partial<ProviderClientOptions>) {
    super({
      apiKey: options?.apiKey ?? config.solanaTracker.apiKey,
      baseUrl: options?.baseUrl ?? config.solanaTracker.baseUrl,
      timeoutMs: options?.timeoutMs ?? config.provider.timeoutMs,
      maxRetries: options?.maxRetries ?? config.provider.maxRetries,
      retryDelayMs: options?.retryDelayMs ?? config.provider.retryDelayMs,
      cache: options?.cache,
    });

    if (!this.apiKey) {
      logger.warn('Solana Tracker API key is not configured');
    }
  }

  private get headers(): Record<string, string> {
    return { 'x-api-key': this.apiKey };
  }

  /**
   * Trending tokens, ranked by liquidity
   */
  async getTrendingTokens(limit: number): Promise<FetchResult<DiscoveredResource[]>> {
    const result = await this.getJson('/search', {
      query: { query: 'SOL', limit: Math.max(limit, SEARCH_PAGE_SIZE) },
      headers: this.headers,
      cacheKey: `solana-tracker:trending:${limit}`,
      cacheTtlSec: CACHE_TTL.TRENDING,
    });
    return result.ok ? ok(rankTrendingTokens(result.value, limit)) : result;
  }

  /**
   * Top traders across all tokens
   */
  async getTopTraders(limit: number): Promise<FetchResult<DiscoveredSubject[]>> {
    const result = await this.getJson('/top-traders/all', {
      headers: this.headers,
      cacheKey: 'solana-tracker:top-traders',
      cacheTtlSec: CACHE_TTL.TOP_TRADERS,
    });
    return result.ok ? ok(toDiscoveredSubjects(result.value).slice(0, limit)) : result;
  }

  /**
   * Top traders of one token
   */
  async getTokenTopTraders(mint: string, limit: number): Promise<FetchResult<DiscoveredSubject[]>> {
    const result = await this.getJson(`/tokens/${mint}/top-traders`, {
      headers: this.headers,
      cacheKey: `solana-tracker:token-traders:${mint}`,
      cacheTtlSec: CACHE_TTL.TOP_TRADERS,
    });
    return result.ok ? ok(toDiscoveredSubjects(result.value).slice(0, limit)) : result;
  }

  /**
   * Largest holders of one token
   */
  async getTokenHolders(mint: string, limit: number): Promise<FetchResult<DiscoveredSubject[]>> {
    const result = await this.getJson(`/holders/${mint}`, {
      headers: this.headers,
      cacheKey: `solana-tracker:holders:${mint}`,
      cacheTtlSec: CACHE_TTL.HOLDERS,
    });
    return result.ok ? ok(toDiscoveredSubjects(result.value).slice(0, limit)) : result;
  }

  /**
   * Open and closed positions of one wallet, with PnL
   */
  async getWalletPnl(wallet: string): Promise<FetchResult<unknown>> {
    const result = await this.getJson(`/pnl/${wallet}`, {
      headers: this.headers,
      cacheKey: `solana-tracker:pnl:${wallet}`,
      cacheTtlSec: CACHE_TTL.WALLET,
    });
    return result.ok ? ok(splitPnlPositions(result.value)) : result;
  }
}

export default SolanaTrackerClient;
