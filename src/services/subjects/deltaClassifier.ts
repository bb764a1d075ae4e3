import type { DeltaStatus, SubjectSnapshot } from '../../types/index.js';

export interface DeltaBreakdown {
  status: DeltaStatus;
  soldCount: number;
  reducedCount: number;
  previousCount: number;
}

function quantitiesByResource(snapshot: SubjectSnapshot): Map<string, number> {
  return new Map(snapshot.positions.map(p => [p.resourceId, p.quantity]));
}

/**
 * Compare two snapshots of the same wallet.
 *
 * A previously held token counts as sold when it is gone or at exactly 0,
 * and as reduced when its quantity dropped. Closed PnL positions carry a
 * quantity of 0, so they count as sold.
 */
export function compareSnapshots(
  previous: SubjectSnapshot,
  current: SubjectSnapshot
): DeltaBreakdown {
  const before = quantitiesByResource(previous);
  const after = quantitiesByResource(current);

  let soldCount = 0;
  let reducedCount = 0;

  for (const [resourceId, previousQuantity] of before) {
    const currentQuantity = after.get(resourceId);

    if (currentQuantity === undefined || currentQuantity === 0) {
      soldCount++;
    } else if (currentQuantity < previousQuantity) {
      reducedCount++;
    }
  }

  let status: DeltaStatus;
  if (after.size === 0 || soldCount === before.size) {
    status = 'sold_all';
  } else if (soldCount > 0 || reducedCount > 0) {
    status = 'sold_partially';
  } else {
    status = 'holding';
  }

  return { status, soldCount, reducedCount, previousCount: before.size };
}

export function classifyDelta(previous: SubjectSnapshot, current: SubjectSnapshot): DeltaStatus {
  return compareSnapshots(previous, current).status;
}
