import { logger } from '../../utils/logger.js';
import { shortenAddress } from '../../utils/solana.js';
import { Mutex, withTimeout } from '../../utils/async.js';
import {
  ConsensusEntry,
  ConsensusProvider,
  DiscoveredResource,
  DiscoveredSubject,
  FetchResult,
  Position,
  ScanParams,
  ScanSummary,
  SourceMode,
  SubjectRecord,
  SubjectSnapshot,
  createSnapshot,
  ok,
} from '../../types/index.js';
import { normalizePositions } from '../positions/PositionNormalizer.js';
import { SubjectStateStore } from '../subjects/SubjectStateStore.js';
import { ConsensusAggregator } from '../consensus/ConsensusAggregator.js';
import { resolveScanParams } from './scanParams.js';

export interface ConsensusEngineOptions {
  provider: ConsensusProvider;
  store?: SubjectStateStore;
  aggregator?: ConsensusAggregator;
  callTimeoutMs?: number;    // Upper bound for any single provider call
  clock?: () => Date;
}

type SubjectOutcome =
  | { subject: DiscoveredSubject; snapshot: SubjectSnapshot }
  | { subject: DiscoveredSubject; error: string };

/**
 * Drives scans: discovers wallets, snapshots their positions, and flags
 * tokens held by enough of them. Scans and single-wallet tracking are
 * serialized; only one of them mutates the store at a time.
 */
export class ConsensusEngine {
  private provider: ConsensusProvider;
  private store: SubjectStateStore;
  private aggregator: ConsensusAggregator;
  private callTimeoutMs: number;
  private clock: () => Date;
  private mutex = new Mutex();
  private flagged: ConsensusEntry[] = [];
  private lastSummary: ScanSummary | null = null;
  private scanCounter = 0;

  constructor(options: ConsensusEngineOptions) {
    this.provider = options.provider;
    this.store = options.store ?? new SubjectStateStore();
    this.aggregator = options.aggregator ?? new ConsensusAggregator();
    this.callTimeoutMs = options.callTimeoutMs ?? 60_000;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Run one full scan and return the flagged tokens, most held first.
   * Throws RangeError for invalid params; upstream failures never throw.
   */
  async runScan(overrides: Partial<ScanParams> = {}): Promise<ConsensusEntry[]> {
    const params = resolveScanParams(overrides);
    return this.mutex.runExclusive(() => this.executeScan(params));
  }

  /**
   * Observe one wallet outside a batch scan. The store is not reset, so
   * calling this between scans yields a real delta against the last
   * observation. Null when the wallet shows no positions and is not tracked.
   */
  async trackSubject(
    subjectId: string,
    sourceMode: SourceMode = 'balances'
  ): Promise<SubjectRecord | null> {
    return this.mutex.runExclusive(async () => {
      const result = await this.fetchPositions(subjectId, sourceMode);

      if (!result.ok) {
        logger.warn('Wallet fetch failed', {
          wallet: shortenAddress(subjectId),
          kind: result.error.kind,
          error: result.error.message,
        });
      }

      const positions = result.ok ? result.value : [];
      const snapshot = createSnapshot(subjectId, positions, sourceMode, this.clock());

      if (!snapshot.isActive && !this.store.has(subjectId)) {
        return null;
      }

      const record = this.store.put(subjectId, snapshot);
      logger.info('Wallet tracked', {
        wallet: shortenAddress(subjectId),
        positions: record.positionCount,
        status: record.deltaStatus,
      });
      return record;
    });
  }

  listTrackedSubjects(): SubjectRecord[] {
    return this.store.all();
  }

  listFlaggedResources(): ConsensusEntry[] {
    return [...this.flagged];
  }

  getLastScanSummary(): ScanSummary | null {
    return this.lastSummary;
  }

  isScanning(): boolean {
    return this.mutex.isLocked;
  }

  private async executeScan(params: ScanParams): Promise<ConsensusEntry[]> {
    const scanId = ++this.scanCounter;
    const startedAt = this.clock();

    // Full reset: no flags or snapshots leak from the previous scan
    this.store.clear();
    this.aggregator.reset();
    this.flagged = [];

    logger.info('Starting consensus scan', {
      scanId,
      discoveryMode: params.discoveryMode,
      sourceMode: params.sourceMode,
      minHolders: params.minHolders,
    });

    const discovered = await this.discoverSubjects(params);
    const subjects = discovered.slice(0, params.maxSubjects);

    const summary: ScanSummary = {
      scanId,
      discoveryMode: params.discoveryMode,
      sourceMode: params.sourceMode,
      startedAt,
      finishedAt: startedAt,
      discovered: discovered.length,
      processed: 0,
      failed: 0,
      active: 0,
      flagged: 0,
    };

    if (subjects.length === 0) {
      logger.warn('Discovery returned no wallets, nothing to scan', { scanId });
      this.lastSummary = { ...summary, finishedAt: this.clock() };
      return [];
    }

    logger.info(`Analyzing ${subjects.length} wallets`, {
      scanId,
      discovered: discovered.length,
      concurrency: params.concurrency,
    });

    for (let i = 0; i < subjects.length; i += params.concurrency) {
      const batch = subjects.slice(i, i + params.concurrency);
      const outcomes = await Promise.all(
        batch.map(subject => this.observeSubject(subject, params.sourceMode))
      );

      // Single writer, discovery order
      for (const outcome of outcomes) {
        if ('error' in outcome) {
          summary.failed++;
          logger.warn('Skipping wallet', {
            scanId,
            wallet: shortenAddress(outcome.subject.subjectId),
            error: outcome.error,
          });
          continue;
        }

        summary.processed++;
        const { subject, snapshot } = outcome;

        if (!snapshot.isActive && !this.store.has(subject.subjectId)) {
          continue;
        }

        summary.active++;
        this.store.put(subject.subjectId, snapshot, subject);
        this.aggregator.record(subject.subjectId, snapshot, { scanId });
      }
    }

    this.flagged = this.aggregator.finalize(params.minHolders);
    summary.flagged = this.flagged.length;
    this.lastSummary = { ...summary, finishedAt: this.clock() };

    logger.info('Consensus scan complete', {
      scanId,
      processed: summary.processed,
      failed: summary.failed,
      tracked: this.store.size,
      tokensSeen: this.aggregator.trackedResourceCount,
      flagged: summary.flagged,
    });

    return this.listFlaggedResources();
  }

  private async observeSubject(
    subject: DiscoveredSubject,
    sourceMode: SourceMode
  ): Promise<SubjectOutcome> {
    try {
      const result = await this.fetchPositions(subject.subjectId, sourceMode);
      if (!result.ok) {
        return { subject, error: `${result.error.kind}: ${result.error.message}` };
      }
      return {
        subject,
        snapshot: createSnapshot(subject.subjectId, result.value, sourceMode, this.clock()),
      };
    } catch (error) {
      return { subject, error: (error as Error).message };
    }
  }

  private async fetchPositions(
    subjectId: string,
    sourceMode: SourceMode
  ): Promise<FetchResult<Position[]>> {
    const call = sourceMode === 'balances'
      ? this.provider.fetchSubjectBalances(subjectId)
      : this.provider.fetchSubjectPnl(subjectId);

    const result = await withTimeout(call, this.callTimeoutMs, `fetch ${shortenAddress(subjectId)}`);
    if (!result.ok) {
      return result;
    }
    return ok(normalizePositions(result.value, sourceMode));
  }

  /**
   * Seed wallets for the scan, deduplicated. The first occurrence of a
   * wallet wins and keeps the seed token it was found through.
   */
  private async discoverSubjects(params: ScanParams): Promise<DiscoveredSubject[]> {
    const seen = new Set<string>();
    const subjects: DiscoveredSubject[] = [];

    const admit = (candidate: DiscoveredSubject, seed?: DiscoveredResource) => {
      if (!candidate.subjectId || seen.has(candidate.subjectId)) {
        return;
      }
      seen.add(candidate.subjectId);
      subjects.push(
        seed
          ? { ...candidate, seedResourceId: seed.resourceId, seedSymbol: seed.displaySymbol }
          : candidate
      );
    };

    if (params.discoveryMode === 'top-traders') {
      const result = await this.callProvider(
        () => this.provider.discoverTopSubjects(params.subjectLimit),
        'discoverTopSubjects'
      );
      for (const candidate of result.slice(0, params.subjectLimit)) {
        admit(candidate);
      }
      return subjects;
    }

    const resources = await this.callProvider(
      () => this.provider.discoverTrendingResources(params.resourceLimit),
      'discoverTrendingResources'
    );

    const seeds = resources.slice(0, params.resourceLimit);
    logger.info(`Got ${seeds.length} trending tokens to scan`);

    for (const [index, resource] of seeds.entries()) {
      if (!resource.resourceId) {
        logger.debug('Skipping trending token without address', { index });
        continue;
      }

      const candidates = await this.callProvider(
        () => params.discoveryMode === 'trending-traders'
          ? this.provider.discoverResourceTopSubjects(resource.resourceId, params.subjectsPerResource)
          : this.provider.fetchResourceHolders(resource.resourceId, params.subjectsPerResource),
        `${params.discoveryMode}(${shortenAddress(resource.resourceId)})`
      );

      logger.debug(`[${index + 1}/${seeds.length}] ${resource.displaySymbol}`, {
        token: shortenAddress(resource.resourceId),
        wallets: candidates.length,
      });

      for (const candidate of candidates.slice(0, params.subjectsPerResource)) {
        admit(candidate, resource);
      }
    }

    return subjects;
  }

  /**
   * Discovery calls: any failure, thrown or returned, means no data
   */
  private async callProvider<T>(
    call: () => Promise<FetchResult<T[]>>,
    label: string
  ): Promise<T[]> {
    try {
      const result = await withTimeout(call(), this.callTimeoutMs, label);
      if (!result.ok) {
        logger.warn(`${label} returned no data`, {
          kind: result.error.kind,
          error: result.error.message,
        });
        return [];
      }
      return result.value;
    } catch (error) {
      logger.warn(`${label} failed`, { error: (error as Error).message });
      return [];
    }
  }
}

export default ConsensusEngine;
