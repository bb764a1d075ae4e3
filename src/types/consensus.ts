import type { LifecycleStatus } from './position.js';

export interface HolderRecord {
  subjectId: string;
  quantity: number;
  status: LifecycleStatus;
  pnl?: number;
}

export type AggregateMetric = 'avgQuantity' | 'avgPnl';

export interface ConsensusEntry {
  resourceId: string;
  displaySymbol: string;
  displayName: string;
  holderRecords: HolderRecord[];
  holderCount: number;
  aggregate: {
    metric: AggregateMetric;
    value: number;
  };
}
