import {
  AggregateMetric,
  ConsensusEntry,
  HolderRecord,
  Position,
  SubjectSnapshot,
  UNKNOWN_NAME,
  UNKNOWN_SYMBOL,
} from '../../types/index.js';

export interface RecordContext {
  scanId?: number;
}

interface ResourceAccumulator {
  resourceId: string;
  displaySymbol: string;
  displayName: string;
  holders: HolderRecord[];
  subjectIds: Set<string>;
}

/**
 * Tokens without a lifecycle status come from balance payloads and are held
 * by definition.
 */
function isHeld(position: Position): boolean {
  return position.lifecycleStatus === undefined || position.lifecycleStatus === 'holding';
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Collects, for one scan, which wallets hold which token and flags the
 * tokens held by enough distinct wallets.
 */
export class ConsensusAggregator {
  private resources = new Map<string, ResourceAccumulator>();
  private metric: AggregateMetric = 'avgQuantity';
  private scanId?: number;

  record(subjectId: string, snapshot: SubjectSnapshot, context?: RecordContext): number {
    if (context?.scanId !== undefined) {
      if (this.scanId !== undefined && this.scanId !== context.scanId) {
        throw new Error(
          `Aggregator holds scan ${this.scanId}; reset before recording scan ${context.scanId}`
        );
      }
      this.scanId = context.scanId;
    }
    if (snapshot.sourceMode === 'pnl-positions') {
      this.metric = 'avgPnl';
    }

    let appended = 0;

    for (const position of snapshot.positions) {
      if (!isHeld(position)) {
        continue;
      }

      let accumulator = this.resources.get(position.resourceId);
      if (!accumulator) {
        accumulator = {
          resourceId: position.resourceId,
          displaySymbol: position.displaySymbol,
          displayName: position.displayName,
          holders: [],
          subjectIds: new Set(),
        };
        this.resources.set(position.resourceId, accumulator);
      }

      // One record per wallet per token
      if (accumulator.subjectIds.has(subjectId)) {
        continue;
      }

      if (accumulator.displaySymbol === UNKNOWN_SYMBOL) {
        accumulator.displaySymbol = position.displaySymbol;
      }
      if (accumulator.displayName === UNKNOWN_NAME) {
        accumulator.displayName = position.displayName;
      }

      accumulator.subjectIds.add(subjectId);
      accumulator.holders.push({
        subjectId,
        quantity: position.quantity,
        status: position.lifecycleStatus ?? 'holding',
        ...(position.pnl !== undefined && { pnl: position.pnl }),
      });
      appended++;
    }

    return appended;
  }

  /**
   * Tokens with at least `minHolders` holders, most held first. Ties keep
   * the order in which tokens were first seen.
   */
  finalize(minHolders: number): ConsensusEntry[] {
    if (!Number.isInteger(minHolders) || minHolders < 1) {
      throw new RangeError(`minHolders must be a positive integer, got ${minHolders}`);
    }

    const entries: ConsensusEntry[] = [];

    for (const accumulator of this.resources.values()) {
      if (accumulator.holders.length < minHolders) {
        continue;
      }

      const values = this.metric === 'avgPnl'
        ? accumulator.holders.map(h => h.pnl ?? 0)
        : accumulator.holders.map(h => h.quantity);

      entries.push({
        resourceId: accumulator.resourceId,
        displaySymbol: accumulator.displaySymbol,
        displayName: accumulator.displayName,
        holderRecords: [...accumulator.holders],
        holderCount: accumulator.holders.length,
        aggregate: { metric: this.metric, value: average(values) },
      });
    }

    // Array.prototype.sort is stable
    return entries.sort((a, b) => b.holderCount - a.holderCount);
  }

  get trackedResourceCount(): number {
    return this.resources.size;
  }

  get currentScanId(): number | undefined {
    return this.scanId;
  }

  reset(): void {
    this.resources.clear();
    this.metric = 'avgQuantity';
    this.scanId = undefined;
  }
}

export default ConsensusAggregator;
