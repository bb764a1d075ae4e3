export { ProviderClient, type ResponseCache, type ProviderClientOptions } from './ProviderClient.js';
export { SolanaTrackerClient } from './SolanaTrackerClient.js';
export { HeliusClient } from './HeliusClient.js';
export { HttpConsensusProvider } from './HttpConsensusProvider.js';
