// CHANGE: Compute the packages a new snapshot introduces relative to an old one.
// WHY: Only added and version-changed packages are handed to the scanner.

import { ensureNotAborted, SnapshotNotFoundError } from "./errors.js";
import { debug, info } from "./logger.js";
import { SnapshotStore } from "./snapshot-store.js";
import { ChangeEntry, ChangeSet, PackageKey } from "./types.js";
import { formatPackageKey, uniqueSortedKeys } from "./utils/package-key.js";

export interface DiffOptions {
  readonly signal?: AbortSignal;
}

async function requireSnapshot(store: SnapshotStore, snapshotId: string): Promise<void> {
  if (!(await store.exists(snapshotId))) {
    throw new SnapshotNotFoundError(snapshotId);
  }
}

function groupByName(keys: readonly PackageKey[]): Map<string, PackageKey[]> {
  const byName = new Map<string, PackageKey[]>();
  for (const key of keys) {
    const group = byName.get(key.name) ?? [];
    group.push(key);
    byName.set(key.name, group);
  }
  return byName;
}

/**
 * Classify one new key that has no exact match in the old snapshot.
 * A same-name entry at another version makes it `changed`; the old key with the
 * same architecture is preferred as `previous`.
 */
function classify(key: PackageKey, oldByName: Map<string, PackageKey[]>): ChangeEntry {
  const sameName = (oldByName.get(key.name) ?? []).filter(old => old.version !== key.version);
  if (sameName.length === 0) {
    return { key, kind: "added" };
  }
  const previous = sameName.find(old => old.architecture === key.architecture) ?? sameName[0];
  return { key, kind: "changed", previous };
}

/**
 * Determine which packages of `newSnapshotId` need scanning compared to `oldSnapshotId`.
 *
 * Removed packages never appear in the result. Comparing a snapshot with itself
 * yields an empty change set.
 *
 * @throws SnapshotNotFoundError if either snapshot does not resolve.
 * @throws CancelledError if the signal aborts before the result is complete.
 */
export async function diffSnapshots(
  store: SnapshotStore,
  oldSnapshotId: string,
  newSnapshotId: string,
  options: DiffOptions = {}
): Promise<ChangeSet> {
  const { signal } = options;
  info(`Detecting changes between ${oldSnapshotId} and ${newSnapshotId}`);
  await requireSnapshot(store, oldSnapshotId);
  await requireSnapshot(store, newSnapshotId);
  ensureNotAborted(signal, "Snapshot diff");

  if (oldSnapshotId === newSnapshotId) {
    info("No package changes detected");
    return { oldSnapshot: oldSnapshotId, newSnapshot: newSnapshotId, entries: [] };
  }

  const [oldKeys, newKeys] = await Promise.all([
    store.listPackages(oldSnapshotId),
    store.listPackages(newSnapshotId)
  ]);
  ensureNotAborted(signal, "Snapshot diff");

  const oldExact = new Set(oldKeys.map(formatPackageKey));
  const oldByName = groupByName(oldKeys);
  const entries: ChangeEntry[] = [];
  for (const key of uniqueSortedKeys(newKeys)) {
    ensureNotAborted(signal, "Snapshot diff");
    if (oldExact.has(formatPackageKey(key))) {
      continue;
    }
    const entry = classify(key, oldByName);
    debug(`${entry.kind}: ${formatPackageKey(key)}`);
    entries.push(entry);
  }

  if (entries.length === 0) {
    info("No package changes detected");
  } else {
    const changed = entries.filter(entry => entry.kind === "changed").length;
    info(`Detected ${entries.length} changed packages (added ${entries.length - changed}, changed ${changed})`);
  }
  return { oldSnapshot: oldSnapshotId, newSnapshot: newSnapshotId, entries };
}

/**
 * Render a change set in aptly's diff notation: `+key` for added packages and
 * `!old -> !new` for version changes.
 */
export function formatDiffReport(changeSet: ChangeSet): string[] {
  return changeSet.entries.map(entry =>
    entry.kind === "changed" && entry.previous
      ? `!${formatPackageKey(entry.previous)} -> !${formatPackageKey(entry.key)}`
      : `+${formatPackageKey(entry.key)}`
  );
}
