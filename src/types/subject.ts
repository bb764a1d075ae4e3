import type { Position, SourceMode } from './position.js';

export type DeltaStatus = 'holding' | 'sold_partially' | 'sold_all';

export interface SubjectSnapshot {
  subjectId: string;
  positions: Position[];
  sourceMode: SourceMode;
  observedAt: Date;
  isActive: boolean;
}

/**
 * How a subject entered the scan: the upstream ranking data, and for
 * resource-mediated discovery the token it was found through.
 */
export interface DiscoveredSubject {
  subjectId: string;
  pnl?: number;
  seedResourceId?: string;
  seedSymbol?: string;
}

export interface SubjectRecord {
  subjectId: string;
  latest: SubjectSnapshot;
  previous: SubjectSnapshot | null;
  deltaStatus: DeltaStatus;
  positionCount: number;
  discovery?: DiscoveredSubject;
}

export function createSnapshot(
  subjectId: string,
  positions: Position[],
  sourceMode: SourceMode,
  observedAt: Date = new Date()
): SubjectSnapshot {
  return {
    subjectId,
    positions,
    sourceMode,
    observedAt,
    isActive: positions.length > 0,
  };
}
