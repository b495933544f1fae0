// CHANGE: Define typed domain models for the vulnerability gate.
// WHY: Differ, selector and approval builder share one vocabulary for packages and scans.

/**
 * JSON-like value type used when reading scan documents without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Identity of one package build inside a snapshot.
 *
 * Invariant: two keys are the same package iff all three fields match exactly.
 */
export interface PackageKey {
  readonly name: string;
  readonly version: string;
  readonly architecture: string;
}

/**
 * Outcome reported by the external scanner. Anything it does not call
 * approved or blocked is treated as an error.
 */
export type ScanOutcome = "approved" | "blocked" | "error";

/**
 * One scan event for one package.
 *
 * @property packageName - Name the scan was filed under.
 * @property packageVersion - Version scanned, when the scanner recorded it.
 * @property architecture - Architecture scanned, when recorded.
 * @property scannedAt - Epoch milliseconds of the scan; authoritative for ordering.
 * @property outcome - Policy verdict.
 * @property scannerType - Scanner identity such as trivy or grype.
 * @property cveCount - Number of vulnerabilities found.
 * @property cvssMax - Highest CVSS score found.
 * @property source - File or log location the record was read from.
 */
export interface ScanRecord {
  readonly packageName: string;
  readonly packageVersion?: string;
  readonly architecture?: string;
  readonly scannedAt: number;
  readonly outcome: ScanOutcome;
  readonly scannerType?: string;
  readonly cveCount: number;
  readonly cvssMax: number;
  readonly source?: string;
}

/**
 * On-disk shape of a scan record, shared by the scan directory and the scan log.
 */
export type ScanDocument = {
  readonly package_name: string;
  readonly package_version?: string;
  readonly architecture?: string;
  readonly status: ScanOutcome;
  readonly scan_date: string;
  readonly scanner_type?: string;
  readonly cve_count: number;
  readonly cvss_max: number;
};

export type ChangeKind = "added" | "changed";

/**
 * A package that needs scanning because a snapshot introduced it.
 *
 * @property previous - For `changed` entries, the key the old snapshot carried.
 */
export interface ChangeEntry {
  readonly key: PackageKey;
  readonly kind: ChangeKind;
  readonly previous?: PackageKey;
}

export interface ChangeSet {
  readonly oldSnapshot: string;
  readonly newSnapshot: string;
  readonly entries: readonly ChangeEntry[];
}

/**
 * How scan history is matched to a snapshot package.
 *
 * `name` accepts any scan filed under the package name; `version` only accepts
 * scans of the exact version in the snapshot.
 */
export type FreshnessKeying = "name" | "version";

export type RescanReason = "never-scanned" | "stale" | "lookup-failed";

/**
 * @property ageMs - Age of the latest matching scan at the reference time, if any.
 * @property lastScannedAt - Epoch milliseconds of that scan, if any.
 */
export interface RescanCandidate {
  readonly key: PackageKey;
  readonly reason: RescanReason;
  readonly ageMs?: number;
  readonly lastScannedAt?: number;
}

export interface FreshnessPolicy {
  readonly maxScanAgeHours: number;
  readonly now: number;
  readonly keying: FreshnessKeying;
}

export type RebuildDecision =
  | { readonly rebuild: true; readonly rescanCount: number; readonly reason: string }
  | { readonly rebuild: false; readonly rescanCount: number; readonly reason: string };
