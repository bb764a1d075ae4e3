import { Router, Request, Response } from 'express';
import { logger } from '../utils/logger.js';
import { isValidSolanaAddress } from '../utils/solana.js';
import { PayloadRecord, isRecord } from '../utils/payload.js';
import {
  ScanParams,
  SourceMode,
  isDiscoveryMode,
  isSourceMode,
} from '../types/index.js';
import type { ConsensusEngine } from '../services/scan/ConsensusEngine.js';
import type { QueueStats } from '../services/queue/QueueManager.js';

export interface ProviderStatus {
  solanaTracker: boolean;
  helius: boolean;
}

export interface RouterDeps {
  engine: ConsensusEngine;
  providerStatus?: () => ProviderStatus;
  queueStats?: () => Promise<QueueStats>;   // Set when scheduled scans run through the queue
  defaults?: Partial<ScanParams>;
}

function optionalInt(body: PayloadRecord, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const parsed = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed)) {
    throw new RangeError(`${key} must be an integer`);
  }
  return parsed;
}

/**
 * Translate a POST /scan body (snake_case, as the dashboard sends it) into
 * scan params. Unset fields fall back to the configured defaults.
 */
export function parseScanRequest(
  body: unknown,
  defaults: Partial<ScanParams> = {}
): Partial<ScanParams> {
  const input: PayloadRecord = isRecord(body) ? body : {};
  const params: Partial<ScanParams> = { ...defaults };

  if (input.discovery_mode !== undefined) {
    if (!isDiscoveryMode(input.discovery_mode)) {
      throw new RangeError(`Unknown discovery_mode: ${String(input.discovery_mode)}`);
    }
    params.discoveryMode = input.discovery_mode;
  }

  if (input.source_mode !== undefined) {
    if (!isSourceMode(input.source_mode)) {
      throw new RangeError(`Unknown source_mode: ${String(input.source_mode)}`);
    }
    params.sourceMode = input.source_mode;
  }

  const numeric: Array<[string, keyof ScanParams]> = [
    ['num_traders', 'subjectLimit'],
    ['num_tokens', 'resourceLimit'],
    ['traders_per_token', 'subjectsPerResource'],
    ['max_wallets', 'maxSubjects'],
    ['min_holders', 'minHolders'],
    ['concurrency', 'concurrency'],
  ];

  for (const [key, field] of numeric) {
    const value = optionalInt(input, key);
    if (value !== undefined) {
      Object.assign(params, { [field]: value });
    }
  }

  return params;
}

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof RangeError) {
    res.status(400).json({ error: error.message });
    return;
  }
  logger.error(context, { error: (error as Error).message });
  res.status(500).json({ error: (error as Error).message });
}

export function createConsensusRouter(deps: RouterDeps): Router {
  const { engine } = deps;
  const router = Router();

  /**
   * GET /api/wallets
   * Wallets tracked by the latest scan (and single-wallet tracking)
   */
  router.get('/wallets', (_req: Request, res: Response) => {
    const wallets = engine.listTrackedSubjects();
    res.json({ wallets, count: wallets.length });
  });

  /**
   * POST /api/wallets/:address/track
   * Observe one wallet now; repeated calls report how its position changed
   */
  router.post('/wallets/:address/track', async (req: Request, res: Response) => {
    const { address } = req.params;

    if (!isValidSolanaAddress(address)) {
      res.status(400).json({ error: 'Invalid wallet address' });
      return;
    }

    try {
      const requested: unknown = req.body?.source_mode;
      const sourceMode: SourceMode = isSourceMode(requested) ? requested : 'balances';
      const wallet = await engine.trackSubject(address, sourceMode);

      if (!wallet) {
        res.status(404).json({ error: 'No positions found for wallet' });
        return;
      }

      res.json({ wallet });
    } catch (error) {
      sendError(res, error, 'Failed to track wallet');
    }
  });

  /**
   * POST /api/scan
   * Run a full scan and return the flagged tokens
   */
  router.post('/scan', async (req: Request, res: Response) => {
    try {
      const params = parseScanRequest(req.body, deps.defaults);
      const flagged = await engine.runScan(params);

      res.json({
        flagged_tokens: flagged,
        count: flagged.length,
        summary: engine.getLastScanSummary(),
      });
    } catch (error) {
      sendError(res, error, 'Scan failed');
    }
  });

  /**
   * GET /api/tokens/flagged
   * Result of the most recent scan
   */
  router.get('/tokens/flagged', (_req: Request, res: Response) => {
    const tokens = engine.listFlaggedResources();
    res.json({ tokens, count: tokens.length });
  });

  /**
   * GET /api/health
   */
  router.get('/health', async (_req: Request, res: Response) => {
    let queue: QueueStats | null = null;
    if (deps.queueStats) {
      try {
        queue = await deps.queueStats();
      } catch (error) {
        logger.warn('Queue stats unavailable', { error: (error as Error).message });
      }
    }

    res.json({
      status: 'healthy',
      tracked_wallets: engine.listTrackedSubjects().length,
      flagged_tokens: engine.listFlaggedResources().length,
      scanning: engine.isScanning(),
      last_scan: engine.getLastScanSummary(),
      providers: deps.providerStatus?.() ?? null,
      queue,
    });
  });

  return router;
}
