import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HeliusClient } from './HeliusClient.js';
import type { ResponseCache } from './ProviderClient.js';

const BASE_URL = 'https://helius.test/v0';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function errorNamed(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

class MemoryCache implements ResponseCache {
  readonly entries = new Map<string, { value: string; ttl?: number }>();

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    return entry ? JSON.parse(entry.value) : null;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, { value: JSON.stringify(value), ttl: ttlSeconds });
  }
}

describe('HeliusClient', () => {
  const fetchMock = vi.fn<(input: URL, init?: RequestInit) => Promise<Response>>();

  const client = (options: { apiKey?: string; cache?: ResponseCache } = {}) =>
    new HeliusClient({
      apiKey: options.apiKey ?? 'test-key',
      baseUrl: `${BASE_URL}/`,
      timeoutMs: 1_000,
      maxRetries: 2,
      retryDelayMs: 1,
      cache: options.cache,
    });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request wallet balances with the api key', async () => {
    const body = { tokens: [{ mint: 'TOKEN_A', amount: 5, decimals: 0 }], nativeBalance: 0 };
    fetchMock.mockResolvedValueOnce(jsonResponse(body));

    const result = await client().getBalances('W1');

    expect(result).toEqual({ ok: true, value: body });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0][0])).toBe(`${BASE_URL}/addresses/W1/balances?api-key=test-key`);
  });

  it('should fail without calling out when no key is configured', async () => {
    const heliusClient = client({ apiKey: '' });

    const result = await heliusClient.getBalances('W1');

    expect(heliusClient.isConfigured()).toBe(false);
    expect(result).toMatchObject({ ok: false, error: { kind: 'not-configured' } });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should retry server errors and succeed', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({}, 502))
      .mockResolvedValueOnce(jsonResponse({ tokens: [] }));

    const result = await client().getBalances('W1');

    expect(result).toEqual({ ok: true, value: { tokens: [] } });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should give up after the last retry', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 500));

    const result = await client().getBalances('W1');

    expect(result).toMatchObject({ ok: false, error: { kind: 'http', status: 500 } });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should retry rate limiting', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse({ tokens: [] }));

    const result = await client().getBalances('W1');

    expect(result.ok).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should not retry client errors', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'bad address' }, 400));

    const result = await client().getBalances('W1');

    expect(result).toMatchObject({ ok: false, error: { kind: 'http', status: 400 } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should classify timeouts and network errors', async () => {
    fetchMock.mockRejectedValue(errorNamed('TimeoutError', 'The operation was aborted due to timeout'));
    const timedOut = await client().getBalances('W1');
    expect(timedOut).toMatchObject({ ok: false, error: { kind: 'timeout' } });
    expect(fetchMock).toHaveBeenCalledTimes(3);

    fetchMock.mockReset();
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const unreachable = await client().getBalances('W1');
    expect(unreachable).toEqual({ ok: false, error: { kind: 'network', message: 'fetch failed' } });
  });

  it('should report a body that is not JSON as malformed', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

    const result = await client().getBalances('W1');

    expect(result).toMatchObject({ ok: false, error: { kind: 'malformed' } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should serve repeated calls from the cache', async () => {
    const cache = new MemoryCache();
    fetchMock.mockResolvedValueOnce(jsonResponse({ tokens: [{ mint: 'TOKEN_A' }] }));
    const heliusClient = client({ cache });

    await heliusClient.getBalances('W1');
    const second = await heliusClient.getBalances('W1');

    expect(second).toEqual({ ok: true, value: { tokens: [{ mint: 'TOKEN_A' }] } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(cache.entries.get('helius:balances:W1')?.ttl).toBe(30);
  });

  it('should not cache failures', async () => {
    const cache = new MemoryCache();
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 404));

    await client({ cache }).getBalances('W1');

    expect(cache.entries.size).toBe(0);
  });

  it('should fetch anyway when the cache is unreachable', async () => {
    const brokenCache: ResponseCache = {
      get: async () => {
        throw new Error('connection refused');
      },
      set: async () => {
        throw new Error('connection refused');
      },
    };
    fetchMock.mockResolvedValueOnce(jsonResponse({ tokens: [] }));

    const result = await client({ cache: brokenCache }).getBalances('W1');

    expect(result).toEqual({ ok: true, value: { tokens: [] } });
  });
});
