import { describe, it, expect } from 'vitest';
import { normalizePositions, scaleAmount } from './PositionNormalizer.js';

describe('PositionNormalizer', () => {
  describe('scaleAmount', () => {
    it('should divide raw amounts by 10^decimals', () => {
      expect(scaleAmount(1_500_000, 6)).toBe(1.5);
    });

    it('should leave amounts of 1 or less untouched', () => {
      expect(scaleAmount(0.75, 9)).toBe(0.75);
      expect(scaleAmount(1, 9)).toBe(1);
    });

    it('should leave amounts untouched without decimals', () => {
      expect(scaleAmount(2500, 0)).toBe(2500);
    });
  });

  describe('balances mode', () => {
    it('should normalize a Helius balances body', () => {
      const payload = {
        tokens: [
          { mint: 'MintA', amount: 1_500_000, decimals: 6, symbol: 'AAA', name: 'Alpha' },
          { mint: 'MintB', amount: 0, decimals: 6 },
          { address: 'MintC', balance: '2500', decimals: 2 },
        ],
        nativeBalance: 1_000_000_000,
      };

      expect(normalizePositions(payload, 'balances')).toEqual([
        {
          resourceId: 'MintA',
          quantity: 1.5,
          rawQuantity: 1_500_000,
          displaySymbol: 'AAA',
          displayName: 'Alpha',
        },
        {
          resourceId: 'MintC',
          quantity: 25,
          rawQuantity: 2500,
          displaySymbol: 'UNKNOWN',
          displayName: 'Unknown',
        },
      ]);
    });

    it('should keep already human-readable amounts', () => {
      const positions = normalizePositions(
        [{ mint: 'MintA', uiAmount: 0.75, decimals: 9 }],
        'balances'
      );
      expect(positions.map(p => p.quantity)).toEqual([0.75]);
    });

    it('should fall through to the next amount alias when one is zero', () => {
      const positions = normalizePositions(
        [{ mint: 'MintA', amount: 0, uiAmount: 3, decimals: 0 }],
        'balances'
      );
      expect(positions.map(p => p.quantity)).toEqual([3]);
    });

    it('should prefer mint over address and tokenAddress', () => {
      const positions = normalizePositions(
        [{ tokenAddress: 'Third', address: 'Second', mint: 'First', amount: 2 }],
        'balances'
      );
      expect(positions.map(p => p.resourceId)).toEqual(['First']);
    });

    it('should coerce malformed numbers to zero', () => {
      const positions = normalizePositions(
        [
          { mint: 'Broken', amount: 'abc', balance: 'NaN' },
          { mint: 'Recovered', amount: 'abc', balance: '12' },
        ],
        'balances'
      );
      expect(positions.map(p => [p.resourceId, p.quantity])).toEqual([['Recovered', 12]]);
    });

    it('should skip records without a resource id', () => {
      const positions = normalizePositions(
        [{ amount: 10 }, { mint: '', amount: 10 }, { mint: 'MintA', amount: 10 }],
        'balances'
      );
      expect(positions.map(p => p.resourceId)).toEqual(['MintA']);
    });

    it('should collapse duplicates to the last values in the first slot', () => {
      const positions = normalizePositions(
        {
          tokens: [
            { mint: 'X', amount: 5 },
            { mint: 'Y', amount: 1 },
            { mint: 'X', amount: 9 },
          ],
        },
        'balances'
      );
      expect(positions.map(p => [p.resourceId, p.quantity])).toEqual([
        ['X', 9],
        ['Y', 1],
      ]);
    });

    it('should find the list in every supported container', () => {
      const entry = { mint: 'MintA', amount: 4 };
      for (const payload of [[entry], { tokens: [entry] }, { data: [entry] }, { data: { tokens: [entry] } }]) {
        expect(normalizePositions(payload, 'balances').map(p => p.resourceId)).toEqual(['MintA']);
      }
    });

    it('should read display metadata from a nested token object', () => {
      const [position] = normalizePositions(
        [{ mint: 'MintA', amount: 2, token: { symbol: 'NEST', name: 'Nested' } }],
        'balances'
      );
      expect(position.displaySymbol).toBe('NEST');
      expect(position.displayName).toBe('Nested');
    });

    it('should skip entries that are not objects', () => {
      const positions = normalizePositions(
        { tokens: [null, 'x', 5, { mint: 'MintA', amount: 2 }] },
        'balances'
      );
      expect(positions).toHaveLength(1);
    });
  });

  describe('pnl-positions mode', () => {
    it('should map open and closed positions', () => {
      const payload = {
        open: [
          { mint: 'MintA', balance: 100, unrealizedPnl: 12.5, unrealizedPnlPercent: 4, symbol: 'AAA' },
        ],
        closed: [
          { address: 'MintB', realizedPnl: -3, realizedPnlPercent: -10 },
        ],
      };

      expect(normalizePositions(payload, 'pnl-positions')).toEqual([
        {
          resourceId: 'MintA',
          quantity: 100,
          rawQuantity: 100,
          displaySymbol: 'AAA',
          displayName: 'Unknown',
          lifecycleStatus: 'holding',
          pnl: 12.5,
          pnlPercent: 4,
        },
        {
          resourceId: 'MintB',
          quantity: 0,
          rawQuantity: 0,
          displaySymbol: 'UNKNOWN',
          displayName: 'Unknown',
          lifecycleStatus: 'sold',
          pnl: -3,
          pnlPercent: -10,
        },
      ]);
    });

    it('should read each list from the top level or under data', () => {
      const payload = {
        open: [{ mint: 'MintA', holding: 5, unrealized: 2 }],
        data: { closed: [{ mint: 'MintB', realized: 7 }] },
      };

      const positions = normalizePositions(payload, 'pnl-positions');
      expect(positions.map(p => [p.resourceId, p.lifecycleStatus, p.quantity, p.pnl])).toEqual([
        ['MintA', 'holding', 5, 2],
        ['MintB', 'sold', 0, 7],
      ]);
    });

    it('should default missing lists to empty', () => {
      expect(normalizePositions({ data: { open: [{ mint: 'MintA', balance: 1 }] } }, 'pnl-positions'))
        .toHaveLength(1);
      expect(normalizePositions({ summary: {} }, 'pnl-positions')).toEqual([]);
    });

    it('should let an open position win over a closed one for the same token', () => {
      const payload = {
        closed: [{ mint: 'MintA', realizedPnl: 50 }],
        open: [{ mint: 'MintA', balance: 3, unrealizedPnl: 1 }],
      };

      const positions = normalizePositions(payload, 'pnl-positions');
      expect(positions).toHaveLength(1);
      expect(positions[0].lifecycleStatus).toBe('holding');
      expect(positions[0].pnl).toBe(1);
    });

    it('should reject list payloads', () => {
      expect(normalizePositions([{ mint: 'MintA', balance: 1 }], 'pnl-positions')).toEqual([]);
    });
  });

  describe('unrecognized payloads', () => {
    it('should return an empty list instead of throwing', () => {
      for (const payload of [null, undefined, 42, 'tokens', true, { foo: 1 }]) {
        expect(normalizePositions(payload, 'balances')).toEqual([]);
        expect(normalizePositions(payload, 'pnl-positions')).toEqual([]);
      }
    });
  });

  it('should be idempotent', () => {
    const payload = {
      tokens: [
        { mint: 'MintA', amount: 1_000_000, decimals: 6 },
        { mint: 'MintB', amount: 42, decimals: 0, symbol: 'BBB' },
      ],
    };
    expect(normalizePositions(payload, 'balances')).toEqual(normalizePositions(payload, 'balances'));
  });
});
