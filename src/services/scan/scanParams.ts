import {
  DEFAULT_SCAN_PARAMS,
  ScanParams,
  isDiscoveryMode,
  isSourceMode,
} from '../../types/index.js';

const POSITIVE_INT_FIELDS = [
  'subjectLimit',
  'resourceLimit',
  'subjectsPerResource',
  'maxSubjects',
  'minHolders',
  'concurrency',
] as const;

/**
 * Merge caller overrides onto the defaults and reject values the scan
 * cannot run with. Throws RangeError: bad params are a caller bug.
 */
export function resolveScanParams(overrides: Partial<ScanParams> = {}): ScanParams {
  const params: ScanParams = { ...DEFAULT_SCAN_PARAMS };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(params, { [key]: value });
    }
  }

  if (!isDiscoveryMode(params.discoveryMode)) {
    throw new RangeError(`Unknown discovery mode: ${String(params.discoveryMode)}`);
  }
  if (!isSourceMode(params.sourceMode)) {
    throw new RangeError(`Unknown source mode: ${String(params.sourceMode)}`);
  }

  for (const field of POSITIVE_INT_FIELDS) {
    const value = params[field];
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`${field} must be a positive integer, got ${value}`);
    }
  }

  return params;
}
