// CHANGE: Select snapshot packages whose latest scan is missing or older than the freshness threshold.
// WHY: Approved packages drift as new CVEs are published and must be rescanned periodically.

import pLimit from "p-limit";
import { describeError, ensureNotAborted, InvalidArgumentError, SnapshotNotFoundError, StoreFailureError } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import { formatAge, isStale, latestRecord } from "./scan-record.js";
import { ScanRecordStore } from "./scan-store.js";
import { SnapshotStore } from "./snapshot-store.js";
import { FreshnessPolicy, PackageKey, RescanCandidate, ScanRecord } from "./types.js";
import { formatPackageKey, uniqueSortedKeys } from "./utils/package-key.js";

export interface SelectorDependencies {
  readonly snapshots: SnapshotStore;
  readonly scans: ScanRecordStore;
}

export interface RescanRequest extends FreshnessPolicy {
  readonly snapshotId: string;
  readonly concurrency?: number;
  readonly signal?: AbortSignal;
}

/**
 * @throws InvalidArgumentError unless the threshold is a positive whole number of hours.
 */
export function assertThreshold(maxScanAgeHours: number): void {
  if (!Number.isInteger(maxScanAgeHours) || maxScanAgeHours <= 0) {
    throw new InvalidArgumentError(`Freshness threshold must be a positive whole number of hours (got ${maxScanAgeHours})`);
  }
}

async function evaluate(
  key: PackageKey,
  scans: ScanRecordStore,
  policy: FreshnessPolicy
): Promise<RescanCandidate | null> {
  const label = formatPackageKey(key);
  let latest: ScanRecord | undefined;
  try {
    latest = latestRecord(await scans.recordsFor(key.name), key, policy.keying);
  } catch (cause) {
    if (cause instanceof StoreFailureError) {
      throw cause;
    }
    logError(`Scan history lookup failed for ${label}: ${describeError(cause)}; will rescan`);
    return { key, reason: "lookup-failed" };
  }
  if (!latest) {
    info(`No scan found for ${label}, will scan`);
    return { key, reason: "never-scanned" };
  }
  const ageMs = policy.now - latest.scannedAt;
  if (isStale(latest, policy.maxScanAgeHours, policy.now)) {
    info(`Scan for ${label} is ${formatAge(ageMs)} old, will rescan`);
    return { key, reason: "stale", ageMs, lastScannedAt: latest.scannedAt };
  }
  debug(`Scan for ${label} is fresh (${formatAge(ageMs)} old)`);
  return null;
}

/**
 * Determine which packages of a snapshot need a (re)scan.
 *
 * Output is ordered by name, version and architecture and depends only on the
 * snapshot contents, the scan history, the threshold and `now`.
 *
 * @throws SnapshotNotFoundError if the snapshot does not resolve.
 * @throws CancelledError if the signal aborts before the result is complete.
 */
export async function selectRescans(
  deps: SelectorDependencies,
  request: RescanRequest
): Promise<RescanCandidate[]> {
  const { snapshotId, signal } = request;
  assertThreshold(request.maxScanAgeHours);
  info(`Selecting rescan candidates in ${snapshotId} (max scan age ${request.maxScanAgeHours}h)`);
  if (!(await deps.snapshots.exists(snapshotId))) {
    throw new SnapshotNotFoundError(snapshotId);
  }
  const keys = uniqueSortedKeys(await deps.snapshots.listPackages(snapshotId));
  ensureNotAborted(signal, "Rescan selection");
  info(`Found ${keys.length} packages to potentially rescan`);

  const total = keys.length;
  const progressInterval = Math.max(1, Math.floor(total / 10));
  let processed = 0;
  const limit = pLimit(Math.max(1, request.concurrency ?? 8));
  const results = await Promise.all(
    keys.map(key =>
      limit(async () => {
        ensureNotAborted(signal, "Rescan selection");
        const outcome = await evaluate(key, deps.scans, request);
        processed += 1;
        if (processed % progressInterval === 0 || processed === total) {
          debug(`selectRescans progress: ${processed}/${total}`);
        }
        return outcome;
      })
    )
  );
  ensureNotAborted(signal, "Rescan selection");

  const candidates = results.filter((item): item is RescanCandidate => item !== null);
  info(`Rescan selection complete: ${candidates.length} of ${total} packages require rescanning`);
  return candidates;
}
