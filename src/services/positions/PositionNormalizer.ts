import {
  Position,
  SourceMode,
  UNKNOWN_NAME,
  UNKNOWN_SYMBOL,
} from '../../types/index.js';
import {
  PayloadRecord,
  extractList,
  isRecord,
  recordsOf,
  resolveNumber,
  resolveOptionalNumber,
  resolveString,
} from '../../utils/payload.js';
import {
  BALANCE_CONTAINERS,
  CLOSED_CONTAINERS,
  FIELD_ALIASES,
  OPEN_CONTAINERS,
} from './fieldAliases.js';

/**
 * Scale a raw amount by the token's decimals.
 *
 * Only amounts above 1 are scaled: some providers already report a
 * human-readable amount next to `decimals`, and those are almost always
 * fractional for the wallets we scan. Pinned by tests; revisit against live
 * provider samples before relying on it for dust balances.
 */
export function scaleAmount(rawAmount: number, decimals: number): number {
  if (decimals > 0 && rawAmount > 1) {
    return rawAmount / Math.pow(10, decimals);
  }
  return rawAmount;
}

function displayField(
  record: PayloadRecord,
  aliases: readonly string[],
  fallback: string
): string {
  const direct = resolveString(record, aliases);
  if (direct) {
    return direct;
  }
  // Solana Tracker nests metadata under `token` on some endpoints
  const nested = record.token;
  if (isRecord(nested)) {
    return resolveString(nested, aliases) ?? fallback;
  }
  return fallback;
}

function resourceIdOf(record: PayloadRecord): string | undefined {
  return resolveString(record, FIELD_ALIASES.RESOURCE_ID);
}

function normalizeBalances(payload: unknown): Position[] {
  const byResource = new Map<string, Position>();

  for (const record of recordsOf(extractList(payload, BALANCE_CONTAINERS))) {
    const resourceId = resourceIdOf(record);
    const rawAmount = resolveNumber(record, FIELD_ALIASES.BALANCE_AMOUNT);

    if (!resourceId || rawAmount <= 0) {
      continue;
    }

    const decimals = Math.trunc(resolveNumber(record, FIELD_ALIASES.DECIMALS));

    // Map.set keeps the first slot, so duplicates resolve to the last values
    byResource.set(resourceId, {
      resourceId,
      quantity: scaleAmount(rawAmount, decimals),
      rawQuantity: rawAmount,
      displaySymbol: displayField(record, FIELD_ALIASES.SYMBOL, UNKNOWN_SYMBOL),
      displayName: displayField(record, FIELD_ALIASES.NAME, UNKNOWN_NAME),
    });
  }

  return [...byResource.values()];
}

function openPosition(record: PayloadRecord, resourceId: string): Position {
  const quantity = Math.max(0, resolveNumber(record, FIELD_ALIASES.OPEN_BALANCE));
  return {
    resourceId,
    quantity,
    rawQuantity: quantity,
    displaySymbol: displayField(record, FIELD_ALIASES.SYMBOL, UNKNOWN_SYMBOL),
    displayName: displayField(record, FIELD_ALIASES.NAME, UNKNOWN_NAME),
    lifecycleStatus: 'holding',
    pnl: resolveNumber(record, FIELD_ALIASES.UNREALIZED_PNL),
    pnlPercent: resolveOptionalNumber(record, FIELD_ALIASES.UNREALIZED_PNL_PERCENT),
  };
}

function closedPosition(record: PayloadRecord, resourceId: string): Position {
  return {
    resourceId,
    quantity: 0,
    rawQuantity: 0,
    displaySymbol: displayField(record, FIELD_ALIASES.SYMBOL, UNKNOWN_SYMBOL),
    displayName: displayField(record, FIELD_ALIASES.NAME, UNKNOWN_NAME),
    lifecycleStatus: 'sold',
    pnl: resolveNumber(record, FIELD_ALIASES.REALIZED_PNL),
    pnlPercent: resolveOptionalNumber(record, FIELD_ALIASES.REALIZED_PNL_PERCENT),
  };
}

function normalizePnlPositions(payload: unknown): Position[] {
  if (!isRecord(payload)) {
    return [];
  }

  const byResource = new Map<string, Position>();

  for (const record of recordsOf(extractList(payload, OPEN_CONTAINERS))) {
    const resourceId = resourceIdOf(record);
    if (resourceId) {
      byResource.set(resourceId, openPosition(record, resourceId));
    }
  }

  for (const record of recordsOf(extractList(payload, CLOSED_CONTAINERS))) {
    const resourceId = resourceIdOf(record);
    if (!resourceId) {
      continue;
    }
    // A token still held is open, whatever its closed history says
    if (byResource.get(resourceId)?.lifecycleStatus === 'holding') {
      continue;
    }
    byResource.set(resourceId, closedPosition(record, resourceId));
  }

  return [...byResource.values()];
}

/**
 * Convert one provider payload for one wallet into canonical positions.
 * Never throws: unrecognized payloads and entries yield nothing.
 */
export function normalizePositions(payload: unknown, mode: SourceMode): Position[] {
  if (payload === null || payload === undefined) {
    return [];
  }

  return mode === 'balances'
    ? normalizeBalances(payload)
    : normalizePnlPositions(payload);
}

export default normalizePositions;
