// CHANGE: Parse and serialise scan documents and pick the latest matching scan.
// WHY: The scan directory and the scan log read the same document format.

import { MalformedScanRecordError } from "./errors.js";
import { FreshnessKeying, JsonValue, PackageKey, ScanDocument, ScanOutcome, ScanRecord } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: JsonValue): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function toOutcome(value: JsonValue): ScanOutcome {
  return value === "approved" || value === "blocked" ? value : "error";
}

/**
 * Convert a parsed scan document into a record.
 *
 * @param value - Parsed JSON.
 * @param source - Location used in error messages.
 * @throws MalformedScanRecordError when the name or date is missing or invalid.
 */
export function toScanRecord(value: JsonValue, source: string): ScanRecord {
  if (!isRecord(value)) {
    throw new MalformedScanRecordError(source, "document is not an object");
  }
  const packageName = optionalText(value.package_name);
  if (!packageName) {
    throw new MalformedScanRecordError(source, "missing package_name");
  }
  const scanDate = optionalText(value.scan_date);
  if (!scanDate) {
    throw new MalformedScanRecordError(source, "missing scan_date");
  }
  const scannedAt = Date.parse(scanDate);
  if (Number.isNaN(scannedAt)) {
    throw new MalformedScanRecordError(source, `invalid scan_date "${scanDate}"`);
  }
  return {
    packageName,
    packageVersion: optionalText(value.package_version),
    architecture: optionalText(value.architecture),
    scannedAt,
    outcome: toOutcome(value.status),
    scannerType: optionalText(value.scanner_type),
    cveCount: typeof value.cve_count === "number" ? value.cve_count : 0,
    cvssMax: typeof value.cvss_max === "number" ? value.cvss_max : 0,
    source
  };
}

export function toScanDocument(record: ScanRecord): ScanDocument {
  return {
    package_name: record.packageName,
    package_version: record.packageVersion,
    architecture: record.architecture,
    status: record.outcome,
    scan_date: new Date(record.scannedAt).toISOString(),
    scanner_type: record.scannerType,
    cve_count: record.cveCount,
    cvss_max: record.cvssMax
  };
}

/**
 * Whether a record counts as a scan of the given package under the keying rule.
 */
export function recordMatches(record: ScanRecord, key: PackageKey, keying: FreshnessKeying): boolean {
  if (record.packageName !== key.name) {
    return false;
  }
  return keying === "name" || record.packageVersion === key.version;
}

/**
 * Most recent matching record by `scannedAt`, or undefined when none match.
 */
export function latestRecord(
  records: readonly ScanRecord[],
  key: PackageKey,
  keying: FreshnessKeying
): ScanRecord | undefined {
  let latest: ScanRecord | undefined;
  for (const record of records) {
    if (!recordMatches(record, key, keying)) {
      continue;
    }
    if (!latest || record.scannedAt > latest.scannedAt) {
      latest = record;
    }
  }
  return latest;
}

export function hoursToMs(hours: number): number {
  return hours * HOUR_MS;
}

/**
 * A scan is stale once its age strictly exceeds the threshold.
 */
export function isStale(record: ScanRecord, maxScanAgeHours: number, now: number): boolean {
  return now - record.scannedAt > hoursToMs(maxScanAgeHours);
}

export function formatAge(ageMs: number): string {
  return `${Math.floor(ageMs / HOUR_MS)}h`;
}
