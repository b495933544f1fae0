// CHANGE: Extract CLI orchestration functions for reuse in the program entrypoint and tests.
// WHY: Each subcommand is one batch run that either completes or fails with a non-zero exit code.

import { Command, Option } from "commander";
import fs from "fs-extra";
import path from "path";
import sanitize from "sanitize-filename";
import { approvalStats, ApprovalResult, buildApprovedList, writeApprovedList } from "./approved-list.js";
import { GateConfig, loadConfig, parsePositiveInteger } from "./config.js";
import { diffSnapshots, formatDiffReport } from "./diff.js";
import { describeError, GateError, InvalidArgumentError } from "./errors.js";
import { debug, error as logError, info, setLogLevel, warn } from "./logger.js";
import { maybeTriggerRebuild } from "./rebuild.js";
import { sendRebuildSignal } from "./rebuild-signal.js";
import { ScanRecordLog } from "./scan-log.js";
import { ScanDirectoryStore, ScanRecordStore } from "./scan-store.js";
import { selectRescans } from "./selector.js";
import { AptlySnapshotStore, DirectorySnapshotStore, SnapshotStore } from "./snapshot-store.js";
import { ChangeSet, FreshnessKeying, PackageKey, RebuildDecision, RescanCandidate, ScanOutcome } from "./types.js";
import { formatPackageKey, parsePackageKey } from "./utils/package-key.js";

export type ConfigFactory = () => GateConfig;

export function createSnapshotStore(config: GateConfig): SnapshotStore {
  return config.snapshots.source === "aptly"
    ? new AptlySnapshotStore(config.snapshots.aptlyBinary)
    : new DirectorySnapshotStore(config.snapshots.directory);
}

export function createScanStore(config: GateConfig): ScanRecordStore {
  return config.scans.source === "log"
    ? new ScanRecordLog(config.scans.logPath)
    : new ScanDirectoryStore(config.scans.directory, config.concurrency);
}

/**
 * Abort controller wired to SIGINT/SIGTERM for the duration of one run.
 */
async function withCancellation<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const abort = () => {
    warn("Cancellation requested; discarding partial results.");
    controller.abort();
  };
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  try {
    return await run(controller.signal);
  } finally {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
  }
}

export function changesFileName(oldSnapshot: string, newSnapshot: string): string {
  return sanitize(`changes-${oldSnapshot}-to-${newSnapshot}.txt`);
}

/**
 * Diff two snapshots, save the changed keys beside the snapshots and print them.
 *
 * @returns The change set and the file it was written to.
 */
export async function detectAction(
  oldSnapshot: string,
  newSnapshot: string,
  config: GateConfig,
  snapshots: SnapshotStore = createSnapshotStore(config)
): Promise<{ readonly changeSet: ChangeSet; readonly changesFile: string }> {
  const changeSet = await withCancellation(signal => diffSnapshots(snapshots, oldSnapshot, newSnapshot, { signal }));
  for (const line of formatDiffReport(changeSet)) {
    debug(line);
  }
  const keys = changeSet.entries.map(entry => formatPackageKey(entry.key));
  const changesFile = path.join(config.snapshots.directory, changesFileName(oldSnapshot, newSnapshot));
  await fs.outputFile(changesFile, keys.map(key => `${key}\n`).join(""), "utf8");
  if (keys.length > 0) {
    info(`Changes saved to ${changesFile}`);
  }
  for (const key of keys) {
    console.log(key);
  }
  return { changeSet, changesFile };
}

export interface RescanOptions {
  readonly maxAge?: string;
  readonly now?: string;
  readonly key?: FreshnessKeying;
  readonly notify?: boolean;
}

export function parseReferenceTime(raw: string | undefined): number {
  if (raw === undefined) {
    return Date.now();
  }
  const parsed = Date.parse(raw);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`--now must be an ISO-8601 timestamp (got "${raw}")`);
  }
  return parsed;
}

/**
 * Select stale packages of a snapshot, print them and signal a rebuild when any were found.
 */
export async function rescanAction(
  snapshot: string,
  options: RescanOptions,
  config: GateConfig,
  deps: { readonly snapshots: SnapshotStore; readonly scans: ScanRecordStore } = {
    snapshots: createSnapshotStore(config),
    scans: createScanStore(config)
  }
): Promise<{ readonly candidates: readonly RescanCandidate[]; readonly decision: RebuildDecision }> {
  const maxScanAgeHours =
    options.maxAge === undefined ? config.maxScanAgeHours : parsePositiveInteger("--max-age", options.maxAge);
  const now = parseReferenceTime(options.now);
  const keying = options.key ?? config.freshnessKeying;
  const candidates = await withCancellation(signal =>
    selectRescans(deps, {
      snapshotId: snapshot,
      maxScanAgeHours,
      now,
      keying,
      concurrency: config.concurrency,
      signal
    })
  );
  for (const candidate of candidates) {
    console.log(formatPackageKey(candidate.key));
  }
  const decision = maybeTriggerRebuild(candidates.length);
  info(`Rescan complete: ${candidates.length} packages require rescanning`);
  if (options.notify === false) {
    info(`Rebuild signal disabled (${decision.reason}).`);
  } else {
    await sendRebuildSignal(decision, snapshot, config.rebuild);
  }
  return { candidates, decision };
}

async function readPackageList(file: string): Promise<PackageKey[]> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (cause) {
    throw new InvalidArgumentError(`Cannot read package list ${file}: ${describeError(cause)}`);
  }
  const keys: PackageKey[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) {
      continue;
    }
    const key = parsePackageKey(line);
    if (key) {
      keys.push(key);
    } else {
      warn(`Ignoring invalid package key in ${file}: ${line.trim()}`);
    }
  }
  return keys;
}

/**
 * Build and write the approved list for the packages named in a file.
 */
export async function approveAction(
  options: { readonly packageList: string; readonly output?: string },
  config: GateConfig,
  scans: ScanRecordStore = createScanStore(config)
): Promise<ApprovalResult & { readonly outputPath: string }> {
  const keys = await readPackageList(options.packageList);
  info(`Processing ${keys.length} packages`);
  const policy = { maxScanAgeHours: config.maxScanAgeHours, now: Date.now(), keying: config.freshnessKeying };
  const result = await withCancellation(signal => buildApprovedList(keys, scans, policy, signal));
  const outputPath = path.join(config.approvalsDir, path.basename(options.output ?? "approved.txt"));
  await writeApprovedList(outputPath, result.approved);
  if (result.blocked.length > 0) {
    const shown = result.blocked.slice(0, 10).map(formatPackageKey);
    info(`Blocked packages: ${shown.join(", ")}`);
    if (result.blocked.length > 10) {
      info(`... and ${result.blocked.length - 10} more`);
    }
  }
  return { ...result, outputPath };
}

export async function statsAction(config: GateConfig, scans: ScanRecordStore = createScanStore(config)): Promise<void> {
  const records = await scans.all();
  console.log(approvalStats(records, { maxScanAgeHours: config.maxScanAgeHours, now: Date.now() }));
}

export interface RecordOptions {
  readonly outcome: ScanOutcome;
  readonly scannedAt?: string;
  readonly cves?: string;
  readonly cvss?: string;
}

function parseCount(name: string, raw: string | undefined): number {
  if (raw === undefined) {
    return 0;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError(`${name} must be a whole number (got "${raw}")`);
  }
  return Number.parseInt(raw, 10);
}

function parseScore(raw: string | undefined): number {
  if (raw === undefined) {
    return 0;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 10) {
    throw new InvalidArgumentError(`--cvss must be a score between 0 and 10 (got "${raw}")`);
  }
  return value;
}

/**
 * Append one scan result; this is the write path the external scanner uses.
 */
export async function recordAction(
  packageKey: string,
  options: RecordOptions,
  config: GateConfig,
  scans: ScanRecordStore = createScanStore(config)
): Promise<void> {
  const key = parsePackageKey(packageKey);
  if (!key) {
    throw new InvalidArgumentError(`Invalid package key "${packageKey}" (expected name_version_arch)`);
  }
  await scans.append({
    packageName: key.name,
    packageVersion: key.version,
    architecture: key.architecture,
    scannedAt: parseReferenceTime(options.scannedAt),
    outcome: options.outcome,
    scannerType: config.scannerType,
    cveCount: parseCount("--cves", options.cves),
    cvssMax: parseScore(options.cvss)
  });
  info(`Recorded ${options.outcome} scan for ${packageKey}.`);
}

/**
 * Copy every record from the scan directory into the scan log.
 *
 * @returns Number of records added to the log.
 */
export async function importAction(config: GateConfig): Promise<number> {
  const source = new ScanDirectoryStore(config.scans.directory, config.concurrency);
  const log = new ScanRecordLog(config.scans.logPath);
  const records = await source.all();
  const added = await log.merge(records);
  info(`Imported ${added} of ${records.length} scan records into ${config.scans.logPath}.`);
  return added;
}

/**
 * Construct commander program with configured commands.
 *
 * @param configFactory - Supplies configuration when a command runs.
 */
export function buildProgram(configFactory: ConfigFactory = () => loadConfig()): Command {
  const program = new Command();
  program
    .name("mirror-gate")
    .description("Vulnerability gate for the package mirror")
    .version("1.0.0")
    .option("-v, --verbose", "Enable debug logging")
    .hook("preAction", thisCommand => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogLevel("debug");
      }
    });

  const gate = program.command("gate").description("Snapshot diff and rescan operations");

  gate
    .command("detect")
    .description("List packages added or changed between two snapshots")
    .argument("<old-snapshot>")
    .argument("<new-snapshot>")
    .action(async (oldSnapshot: string, newSnapshot: string) => {
      await detectAction(oldSnapshot, newSnapshot, configFactory());
    });

  gate
    .command("rescan")
    .description("List packages whose latest scan is missing or stale")
    .argument("<snapshot>")
    .option("--max-age <hours>", "Maximum scan age in whole hours")
    .option("--now <timestamp>", "Reference time (ISO-8601) instead of the current time")
    .addOption(new Option("--key <mode>", "Match scans by package name or exact version").choices(["name", "version"]))
    .option("--no-notify", "Do not send the rebuild signal")
    .action(async (snapshot: string, options: RescanOptions) => {
      await rescanAction(snapshot, options, configFactory());
    });

  gate
    .command("approve")
    .description("Build the approved package list")
    .requiredOption("--package-list <file>", "File containing package keys to check")
    .option("--output <name>", "Output file name inside the approvals directory", "approved.txt")
    .action(async (options: { packageList: string; output?: string }) => {
      await approveAction(options, configFactory());
    });

  gate
    .command("stats")
    .description("Display scan statistics")
    .action(async () => {
      await statsAction(configFactory());
    });

  gate
    .command("record")
    .description("Append a scan result for a package")
    .argument("<package-key>")
    .addOption(
      new Option("--outcome <outcome>", "Scan verdict").choices(["approved", "blocked", "error"]).makeOptionMandatory()
    )
    .option("--scanned-at <timestamp>", "Scan time (ISO-8601), defaults to now")
    .option("--cves <count>", "Number of vulnerabilities found")
    .option("--cvss <score>", "Highest CVSS score found")
    .action(async (packageKey: string, options: RecordOptions) => {
      await recordAction(packageKey, options, configFactory());
    });

  gate
    .command("import")
    .description("Copy scan documents from the scans directory into the scan log")
    .action(async () => {
      await importAction(configFactory());
    });

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[], configFactory?: ConfigFactory): Promise<void> {
  const program = buildProgram(configFactory);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    const prefix = error instanceof GateError ? `[${error.code}] ` : "";
    logError(`${prefix}${describeError(error)}`);
    process.exitCode = 1;
  }
}
