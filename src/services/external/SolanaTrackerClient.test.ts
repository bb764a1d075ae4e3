import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  SolanaTrackerClient,
  rankTrendingTokens,
  splitPnlPositions,
  toDiscoveredSubjects,
} from './SolanaTrackerClient.js';
import { normalizePositions } from '../positions/PositionNormalizer.js';

const BASE_URL = 'https://tracker.test';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('SolanaTrackerClient', () => {
  describe('toDiscoveredSubjects', () => {
    it('should read wallets and PnL from either shape', () => {
      const payload = {
        wallets: [
          { wallet: 'W1', summary: { total: 100 } },
          { owner: 'W2', pnl: '5' },
          { address: 'W3' },
          { foo: 1 },
          'not-an-object',
        ],
      };

      expect(toDiscoveredSubjects(payload)).toEqual([
        { subjectId: 'W1', pnl: 100 },
        { subjectId: 'W2', pnl: 5 },
        { subjectId: 'W3' },
      ]);
    });

    it('should accept a bare array body', () => {
      expect(toDiscoveredSubjects([{ wallet: 'W1' }])).toEqual([{ subjectId: 'W1' }]);
    });
  });

  describe('rankTrendingTokens', () => {
    it('should order by liquidity and keep the top entries', () => {
      const payload = {
        data: [
          { address: 'SHALLOW', symbol: 'LOW', liquidityUsd: 10 },
          { token: { mint: 'DEEP', symbol: 'HIGH' }, liquidityUsd: '5000', volume_24h: 42 },
          { mint: 'MID', liquidityUsd: 300 },
        ],
      };

      expect(rankTrendingTokens(payload, 2)).toEqual([
        { resourceId: 'DEEP', displaySymbol: 'HIGH', volume: 42 },
        { resourceId: 'MID', displaySymbol: 'UNKNOWN' },
      ]);
    });

    it('should return an empty resource id for entries without an address', () => {
      expect(rankTrendingTokens({ tokens: [{ symbol: 'NOADDR' }] }, 5)).toEqual([
        { resourceId: '', displaySymbol: 'NOADDR' },
      ]);
    });
  });

  describe('splitPnlPositions', () => {
    it('should split a mint-keyed body into open and closed lists', () => {
      const payload = {
        tokens: {
          MINT_A: { holding: 5, unrealized: 2 },
          MINT_B: { holding: 0, realized: 3 },
        },
      };

      expect(splitPnlPositions(payload)).toEqual({
        open: [{ mint: 'MINT_A', holding: 5, unrealized: 2 }],
        closed: [{ mint: 'MINT_B', holding: 0, realized: 3 }],
      });
    });

    it('should produce positions the normalizer understands', () => {
      const positions = normalizePositions(
        splitPnlPositions({ data: { tokens: { MINT_A: { holding: 5, unrealized: 2 } } } }),
        'pnl-positions'
      );

      expect(positions).toEqual([
        {
          resourceId: 'MINT_A',
          quantity: 5,
          rawQuantity: 5,
          displaySymbol: 'UNKNOWN',
          displayName: 'Unknown',
          lifecycleStatus: 'holding',
          pnl: 2,
          pnlPercent: undefined,
        },
      ]);
    });

    it('should read top-level tokens when data holds only metadata', () => {
      const payload = {
        data: { wallet: 'W1', totalInvested: 120 },
        tokens: { MINT_A: { holding: 2 }, MINT_B: { holding: 0 } },
      };

      expect(splitPnlPositions(payload)).toEqual({
        open: [{ mint: 'MINT_A', holding: 2 }],
        closed: [{ mint: 'MINT_B', holding: 0 }],
      });
    });

    it('should pass through bodies that already carry open and closed lists', () => {
      const payload = { open: [], closed: [{ mint: 'MINT_B' }] };
      expect(splitPnlPositions(payload)).toBe(payload);
      expect(splitPnlPositions(null)).toBeNull();
    });
  });

  describe('endpoints', () => {
    const fetchMock = vi.fn<(input: URL, init?: RequestInit) => Promise<Response>>();

    const client = () => new SolanaTrackerClient({
      apiKey: 'test-key',
      baseUrl: BASE_URL,
      maxRetries: 0,
      retryDelayMs: 1,
    });

    beforeEach(() => {
      fetchMock.mockReset();
      vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('should send the api key header and trim top traders to the limit', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({
        wallets: [{ wallet: 'W1' }, { wallet: 'W2' }, { wallet: 'W3' }],
      }));

      const result = await client().getTopTraders(2);

      expect(result).toEqual({ ok: true, value: [{ subjectId: 'W1' }, { subjectId: 'W2' }] });
      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe(`${BASE_URL}/top-traders/all`);
      expect(init?.headers).toEqual({ accept: 'application/json', 'x-api-key': 'test-key' });
    });

    it('should search at least one page of trending tokens', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: [] }));

      await client().getTrendingTokens(3);

      expect(String(fetchMock.mock.calls[0][0])).toBe(`${BASE_URL}/search?query=SOL&limit=20`);
    });

    it('should query per-token traders and holders', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse([{ wallet: 'T1' }]))
        .mockResolvedValueOnce(jsonResponse({ accounts: [{ wallet: 'H1', amount: 3 }, { wallet: 'H2' }] }));

      const traders = await client().getTokenTopTraders('MINT', 5);
      const holders = await client().getTokenHolders('MINT', 1);

      expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([
        `${BASE_URL}/tokens/MINT/top-traders`,
        `${BASE_URL}/holders/MINT`,
      ]);
      expect(traders).toEqual({ ok: true, value: [{ subjectId: 'T1' }] });
      expect(holders).toEqual({ ok: true, value: [{ subjectId: 'H1' }] });
    });

    it('should reshape wallet PnL and pass failures through', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ tokens: { MINT_A: { holding: 1 } } }))
        .mockResolvedValueOnce(jsonResponse({}, 404));

      const found = await client().getWalletPnl('W1');
      const missing = await client().getWalletPnl('W2');

      expect(found).toEqual({ ok: true, value: { open: [{ mint: 'MINT_A', holding: 1 }], closed: [] } });
      expect(missing).toMatchObject({ ok: false, error: { kind: 'http', status: 404 } });
      expect(String(fetchMock.mock.calls[0][0])).toBe(`${BASE_URL}/pnl/W1`);
    });
  });
});
