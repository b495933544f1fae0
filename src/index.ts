#!/usr/bin/env node
// CHANGE: Delegate execution to the modular CLI runner and expose the engine API.
// WHY: Importing the package must not trigger command parsing.

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { diffSnapshots, formatDiffReport } from "./diff.js";
export { selectRescans } from "./selector.js";
export { maybeTriggerRebuild } from "./rebuild.js";
export { approvalStats, buildApprovedList, writeApprovedList } from "./approved-list.js";
export { loadConfig } from "./config.js";
export { formatPackageKey, parsePackageKey, samePackageKey } from "./utils/package-key.js";
export * from "./errors.js";
export { AptlySnapshotStore, DirectorySnapshotStore } from "./snapshot-store.js";
export { ScanDirectoryStore, ScanHistoryIndex } from "./scan-store.js";
export { ScanRecordLog } from "./scan-log.js";
export type { SnapshotStore } from "./snapshot-store.js";
export type { ScanRecordStore } from "./scan-store.js";
export type { GateConfig } from "./config.js";
export type * from "./types.js";
