import { describe, it, expect } from 'vitest';
import { isValidSolanaAddress, shortenAddress } from './solana.js';

const WRAPPED_SOL = 'So11111111111111111111111111111111111111112';

describe('solana utilities', () => {
  describe('isValidSolanaAddress', () => {
    it('should validate correct Solana addresses', () => {
      expect(isValidSolanaAddress(WRAPPED_SOL)).toBe(true);
      expect(isValidSolanaAddress('11111111111111111111111111111111')).toBe(true);
    });

    it('should reject invalid addresses', () => {
      expect(isValidSolanaAddress('')).toBe(false);
      expect(isValidSolanaAddress('invalid')).toBe(false);
      expect(isValidSolanaAddress('0x1234567890abcdef')).toBe(false);
      // 0, O, I and l are not in the base58 alphabet
      expect(isValidSolanaAddress('0000000000000000000000000000000000000000000')).toBe(false);
    });
  });

  describe('shortenAddress', () => {
    it('should shorten addresses correctly', () => {
      expect(shortenAddress(WRAPPED_SOL)).toBe('So11...1112');
      expect(shortenAddress(WRAPPED_SOL, 6)).toBe('So1111...111112');
    });

    it('should leave short ids untouched', () => {
      expect(shortenAddress('W1')).toBe('W1');
      expect(shortenAddress('12345678')).toBe('12345678');
    });
  });
});
