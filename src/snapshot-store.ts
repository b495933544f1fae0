// CHANGE: Snapshot store interface with aptly and plain-directory adapters.
// WHY: aptly only exposes text output, so its parsing stays inside one adapter.

import fs from "fs-extra";
import path from "path";
import { describeError, SnapshotNotFoundError, StoreFailureError } from "./errors.js";
import { debug } from "./logger.js";
import { PackageKey } from "./types.js";
import { CommandResult, CommandRunner, runCommand } from "./utils/aptly.js";
import { parsePackageKey } from "./utils/package-key.js";

/**
 * Read-only view of immutable, named package sets.
 */
export interface SnapshotStore {
  exists(snapshotId: string): Promise<boolean>;
  /**
   * @throws SnapshotNotFoundError when the snapshot does not resolve.
   */
  listPackages(snapshotId: string): Promise<readonly PackageKey[]>;
}

/**
 * Collect package keys from listing text, ignoring headers, comments and blank lines.
 */
export function parsePackageListing(text: string, origin: string): PackageKey[] {
  const keys: PackageKey[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#") || !line.includes("_")) {
      continue;
    }
    const key = parsePackageKey(line);
    if (!key) {
      debug(`Skipping unparseable package line in ${origin}: ${line}`);
      continue;
    }
    keys.push(key);
  }
  return keys;
}

/**
 * Snapshots exported as `<directory>/<snapshotId>.list`, one package key per line.
 */
export class DirectorySnapshotStore implements SnapshotStore {
  constructor(private readonly directory: string) {}

  async exists(snapshotId: string): Promise<boolean> {
    const file = this.fileFor(snapshotId);
    return file ? fs.pathExists(file) : false;
  }

  async listPackages(snapshotId: string): Promise<readonly PackageKey[]> {
    const file = this.fileFor(snapshotId);
    if (!file || !(await fs.pathExists(file))) {
      throw new SnapshotNotFoundError(snapshotId);
    }
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (cause) {
      throw new StoreFailureError(`Cannot read snapshot ${snapshotId}: ${describeError(cause)}`, { cause });
    }
    return parsePackageListing(text, file);
  }

  private fileFor(snapshotId: string): string | null {
    if (!snapshotId || snapshotId !== path.basename(snapshotId)) {
      return null;
    }
    return path.join(this.directory, `${snapshotId}.list`);
  }
}

// aptly: "ERROR: unable to show: snapshot with name <id> not found"
const NOT_FOUND_PATTERN = /\bnot found\b/i;

/**
 * Snapshots managed by aptly, read through `aptly snapshot show`.
 */
export class AptlySnapshotStore implements SnapshotStore {
  constructor(
    private readonly binary = "aptly",
    private readonly run: CommandRunner = runCommand
  ) {}

  /**
   * @throws StoreFailureError when aptly fails for any reason other than an unknown snapshot.
   */
  async exists(snapshotId: string): Promise<boolean> {
    const result = await this.invoke(["snapshot", "show", snapshotId]);
    if (result.code === 0) {
      return true;
    }
    if (NOT_FOUND_PATTERN.test(result.stderr) || NOT_FOUND_PATTERN.test(result.stdout)) {
      return false;
    }
    throw new StoreFailureError(
      `Cannot inspect snapshot ${snapshotId}: ${result.stderr.trim() || `exit code ${result.code}`}`
    );
  }

  async listPackages(snapshotId: string): Promise<readonly PackageKey[]> {
    if (!(await this.exists(snapshotId))) {
      throw new SnapshotNotFoundError(snapshotId);
    }
    const result = await this.invoke(["snapshot", "show", "-with-packages", snapshotId]);
    if (result.code !== 0) {
      throw new StoreFailureError(
        `Failed to get package list from ${snapshotId}: ${result.stderr.trim() || `exit code ${result.code}`}`
      );
    }
    const keys = parsePackageListing(result.stdout, `aptly snapshot ${snapshotId}`);
    debug(`aptly snapshot ${snapshotId} lists ${keys.length} packages`);
    return keys;
  }

  private async invoke(args: readonly string[]): Promise<CommandResult> {
    try {
      return await this.run(this.binary, args);
    } catch (cause) {
      throw new StoreFailureError(`Cannot run ${this.binary}: ${describeError(cause)}`, { cause });
    }
  }
}
