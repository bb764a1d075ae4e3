// Position types
export * from './position.js';

// Subject types
export * from './subject.js';

// Consensus types
export * from './consensus.js';

// Scan types
export * from './scan.js';

// Provider types
export * from './provider.js';

// Cache TTL configuration (seconds)
export const CACHE_TTL = {
  TRENDING: 120,
  TOP_TRADERS: 300,
  HOLDERS: 60,
  WALLET: 30,
} as const;
