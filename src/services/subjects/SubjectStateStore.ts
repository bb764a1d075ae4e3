import type {
  DiscoveredSubject,
  SubjectRecord,
  SubjectSnapshot,
} from '../../types/index.js';
import { classifyDelta } from './deltaClassifier.js';

/**
 * In-memory map of wallet -> latest snapshot, keeping one snapshot of
 * history for delta classification. Iteration follows first insertion.
 */
export class SubjectStateStore {
  private records = new Map<string, SubjectRecord>();

  getPrevious(subjectId: string): SubjectSnapshot | null {
    return this.records.get(subjectId)?.latest ?? null;
  }

  get(subjectId: string): SubjectRecord | undefined {
    return this.records.get(subjectId);
  }

  has(subjectId: string): boolean {
    return this.records.has(subjectId);
  }

  /**
   * Store a new snapshot. The old latest becomes `previous`, and the delta
   * status is derived from the pair (`holding` on first observation).
   */
  put(
    subjectId: string,
    snapshot: SubjectSnapshot,
    discovery?: DiscoveredSubject
  ): SubjectRecord {
    const existing = this.records.get(subjectId);
    const previous = existing?.latest ?? null;

    const record: SubjectRecord = {
      subjectId,
      latest: snapshot,
      previous,
      deltaStatus: previous ? classifyDelta(previous, snapshot) : 'holding',
      positionCount: snapshot.positions.length,
      discovery: discovery ?? existing?.discovery,
    };

    this.records.set(subjectId, record);
    return record;
  }

  all(): SubjectRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}

export default SubjectStateStore;
