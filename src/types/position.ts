/**
 * Where a subject's positions came from. `balances` payloads only report what
 * the wallet holds right now; `pnl-positions` payloads split open and closed
 * positions and carry PnL.
 */
export type SourceMode = 'balances' | 'pnl-positions';

export const SOURCE_MODES: readonly SourceMode[] = ['balances', 'pnl-positions'];

export type LifecycleStatus = 'holding' | 'sold';

export interface Position {
  resourceId: string;
  quantity: number;        // Human-readable amount (adjusted for decimals)
  rawQuantity: number;     // Amount as reported upstream
  displaySymbol: string;
  displayName: string;
  lifecycleStatus?: LifecycleStatus;
  pnl?: number;
  pnlPercent?: number;
}

export const UNKNOWN_SYMBOL = 'UNKNOWN';
export const UNKNOWN_NAME = 'Unknown';

export function isSourceMode(value: unknown): value is SourceMode {
  return typeof value === 'string' && (SOURCE_MODES as readonly string[]).includes(value);
}
