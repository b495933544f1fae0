// CHANGE: Build the approved package list from scan history.
// WHY: Only packages with a fresh, passing scan may be published.

import fs from "fs-extra";
import path from "path";
import { ensureNotAborted } from "./errors.js";
import { debug, info } from "./logger.js";
import { isStale, latestRecord } from "./scan-record.js";
import { ScanRecordStore } from "./scan-store.js";
import { assertThreshold } from "./selector.js";
import { FreshnessPolicy, PackageKey, ScanRecord } from "./types.js";
import { formatPackageKey, uniqueSortedKeys } from "./utils/package-key.js";

/**
 * @property approved - Keys with a fresh approved scan, as `name_version_arch`.
 * @property blocked - Keys whose fresh scan blocked or errored.
 * @property missing - Keys with no matching scan or only stale ones.
 */
export interface ApprovalResult {
  readonly approved: readonly string[];
  readonly blocked: readonly PackageKey[];
  readonly missing: readonly PackageKey[];
}

export interface ApprovalStats {
  readonly totalScans: number;
  readonly approved: number;
  readonly blocked: number;
  readonly errors: number;
  readonly freshScans: number;
}

/**
 * Partition package keys into approved, blocked and missing.
 */
export async function buildApprovedList(
  packageKeys: readonly PackageKey[],
  scans: ScanRecordStore,
  policy: FreshnessPolicy,
  signal?: AbortSignal
): Promise<ApprovalResult> {
  assertThreshold(policy.maxScanAgeHours);
  const keys = uniqueSortedKeys(packageKeys);
  info(`Building approved list for ${keys.length} packages`);

  const approved: string[] = [];
  const blocked: PackageKey[] = [];
  const missing: PackageKey[] = [];
  for (const key of keys) {
    ensureNotAborted(signal, "Approved list build");
    const label = formatPackageKey(key);
    const latest = latestRecord(await scans.recordsFor(key.name), key, policy.keying);
    if (!latest) {
      debug(`No scan found for package: ${label}`);
      missing.push(key);
      continue;
    }
    if (isStale(latest, policy.maxScanAgeHours, policy.now)) {
      debug(`Scan too old for package: ${label}`);
      missing.push(key);
      continue;
    }
    if (latest.outcome === "approved") {
      approved.push(label);
    } else {
      blocked.push(key);
      info(`Package blocked: ${label} (status: ${latest.outcome}, CVEs: ${latest.cveCount})`);
    }
  }

  info(`Approved: ${approved.length}, Blocked: ${blocked.length}, Missing scans: ${missing.length}`);
  return { approved, blocked, missing };
}

/**
 * Write approved keys one per line, replacing the previous list atomically.
 */
export async function writeApprovedList(outputPath: string, approved: readonly string[]): Promise<void> {
  const tempPath = `${outputPath}.tmp`;
  await fs.ensureDir(path.dirname(outputPath));
  await fs.writeFile(tempPath, approved.map(key => `${key}\n`).join(""), "utf8");
  await fs.move(tempPath, outputPath, { overwrite: true });
  info(`Approved list written to ${outputPath}`);
}

/**
 * Summarise scan outcomes and how many scans are still fresh.
 */
export function approvalStats(
  records: readonly ScanRecord[],
  policy: Pick<FreshnessPolicy, "maxScanAgeHours" | "now">
): ApprovalStats {
  let approved = 0;
  let blocked = 0;
  let errors = 0;
  let freshScans = 0;
  for (const record of records) {
    if (record.outcome === "approved") {
      approved += 1;
    } else if (record.outcome === "blocked") {
      blocked += 1;
    } else {
      errors += 1;
    }
    if (!isStale(record, policy.maxScanAgeHours, policy.now)) {
      freshScans += 1;
    }
  }
  return { totalScans: records.length, approved, blocked, errors, freshScans };
}
