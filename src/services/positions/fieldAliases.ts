/**
 * Field aliases per logical field, in priority order.
 *
 * - RESOURCE_ID: Helius reports `mint`, Solana Tracker `address` or
 *   `tokenAddress` depending on the endpoint.
 * - BALANCE_AMOUNT: raw integer `amount` (Helius), `balance`, or the already
 *   scaled `uiAmount`.
 * - OPEN_BALANCE: current balance of an open PnL position.
 * - UNREALIZED_PNL / REALIZED_PNL and their percentages: open and closed PnL.
 */
export const FIELD_ALIASES = {
  RESOURCE_ID: ['mint', 'address', 'tokenAddress'],
  BALANCE_AMOUNT: ['amount', 'balance', 'uiAmount'],
  DECIMALS: ['decimals'],
  SYMBOL: ['symbol'],
  NAME: ['name'],
  OPEN_BALANCE: ['balance', 'holding', 'amount', 'uiAmount'],
  UNREALIZED_PNL: ['unrealizedPnl', 'unrealized', 'pnl'],
  UNREALIZED_PNL_PERCENT: ['unrealizedPnlPercent', 'pnlPercent', 'pnl_percent'],
  REALIZED_PNL: ['realizedPnl', 'realized', 'pnl'],
  REALIZED_PNL_PERCENT: ['realizedPnlPercent', 'pnlPercent', 'pnl_percent'],
} as const;

// Where the token list sits inside a balances response
export const BALANCE_CONTAINERS = ['tokens', 'data', 'data.tokens', 'items'] as const;

// Open/closed PnL lists, at the top level or nested under `data`
export const OPEN_CONTAINERS = ['open', 'data.open'] as const;
export const CLOSED_CONTAINERS = ['closed', 'data.closed'] as const;

// Discovery responses
export const SUBJECT_ID_ALIASES = ['wallet', 'owner', 'address'] as const;
export const SUBJECT_PNL_ALIASES = ['pnl', 'total', 'realized'] as const;
export const LISTING_RESOURCE_ID_ALIASES = ['address', 'mint', 'poolAddress', 'tokenAddress'] as const;
export const VOLUME_ALIASES = ['volume_24h', 'volume'] as const;
export const LIST_CONTAINERS = ['data', 'tokens', 'traders', 'wallets', 'holders', 'accounts'] as const;
