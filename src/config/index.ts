import dotenv from 'dotenv';

dotenv.config();

export const config = {
  // Application
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '5000', 10),
  logLevel: process.env.LOG_LEVEL || 'info',

  // Redis (response cache + scan queue)
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  cacheEnabled: process.env.CACHE_ENABLED !== 'false',

  // Solana Tracker API (discovery + wallet PnL)
  solanaTracker: {
    apiKey: process.env.SOLANA_TRACKER_API_KEY || '',
    baseUrl: process.env.SOLANA_TRACKER_URL || 'https://data.solanatracker.io',
  },

  // Helius API (wallet balances)
  helius: {
    apiKey: process.env.HELIUS_API_KEY || '',
    baseUrl: process.env.HELIUS_URL || 'https://api.helius.xyz/v0',
  },

  // Shared provider behaviour
  provider: {
    timeoutMs: parseInt(process.env.PROVIDER_TIMEOUT_MS || '10000', 10),
    maxRetries: parseInt(process.env.PROVIDER_MAX_RETRIES || '2', 10),
    retryDelayMs: parseInt(process.env.PROVIDER_RETRY_DELAY_MS || '500', 10),
  },

  // Periodic scan
  scan: {
    schedulerEnabled: process.env.SCHEDULER_ENABLED !== 'false',
    intervalMinutes: parseInt(process.env.SCAN_INTERVAL_MINUTES || '15', 10),
    numTraders: parseInt(process.env.SCAN_NUM_TRADERS || '50', 10),
    minHolders: parseInt(process.env.SCAN_MIN_HOLDERS || '2', 10),
    discoveryMode: process.env.SCAN_DISCOVERY_MODE || 'top-traders',
    sourceMode: process.env.SCAN_SOURCE_MODE || 'balances',
  },
} as const;

/**
 * Check if the periodic scan trigger should run
 */
export function isSchedulerEnabled(): boolean {
  return config.scan.schedulerEnabled;
}

// Validate provider credentials
export function validateConfig(): boolean {
  const requiredEnvVars = [
    'SOLANA_TRACKER_API_KEY',
    'HELIUS_API_KEY',
  ];

  const missing = requiredEnvVars.filter(key => !process.env[key]);

  if (missing.length > 0 && config.nodeEnv === 'production') {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (missing.length > 0) {
    console.warn(`Warning: Missing environment variables: ${missing.join(', ')}`);
    console.warn('Hint: scans return no data for providers without an API key');
    return false;
  }

  return true;
}

export default config;
