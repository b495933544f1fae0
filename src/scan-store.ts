// CHANGE: Scan record store interface, name-keyed history index and the scan directory adapter.
// WHY: Scan history grows without bound, so lookups go through an index keyed by package name.

import fs from "fs-extra";
import path from "path";
import pLimit from "p-limit";
import sanitize from "sanitize-filename";
import { describeError, MalformedScanRecordError, StoreFailureError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { toScanDocument, toScanRecord } from "./scan-record.js";
import { JsonValue, ScanRecord } from "./types.js";

/**
 * Read side used by the gate, plus the append path the external scanner writes through.
 */
export interface ScanRecordStore {
  recordsFor(packageName: string): Promise<readonly ScanRecord[]>;
  all(): Promise<readonly ScanRecord[]>;
  append(record: ScanRecord): Promise<void>;
}

/**
 * In-memory history keyed by package name, each list ordered by `scannedAt`.
 */
export class ScanHistoryIndex {
  private readonly byName = new Map<string, ScanRecord[]>();

  add(record: ScanRecord): void {
    const history = this.byName.get(record.packageName) ?? [];
    let position = history.length;
    while (position > 0 && history[position - 1].scannedAt > record.scannedAt) {
      position -= 1;
    }
    history.splice(position, 0, record);
    this.byName.set(record.packageName, history);
  }

  recordsFor(packageName: string): readonly ScanRecord[] {
    return this.byName.get(packageName) ?? [];
  }

  all(): ScanRecord[] {
    return Array.from(this.byName.values()).flat();
  }

  get size(): number {
    let total = 0;
    for (const history of this.byName.values()) {
      total += history.length;
    }
    return total;
  }
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * File name for a new scan document: `<name>_<version>_<YYYYMMDD>_<HHMMSS>.json`.
 */
export function scanFileName(record: ScanRecord, suffix = ""): string {
  const at = new Date(record.scannedAt);
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}_` +
    `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return sanitize(`${record.packageName}_${record.packageVersion ?? "unknown"}_${stamp}${suffix}.json`);
}

/**
 * Scan records kept as one JSON document per package per scan event.
 *
 * The directory is read once, on first use; malformed documents are logged and
 * left out of the index so the affected packages fall back to rescanning.
 */
export class ScanDirectoryStore implements ScanRecordStore {
  private loading: Promise<ScanHistoryIndex> | null = null;

  constructor(
    private readonly directory: string,
    private readonly concurrency = 8
  ) {}

  async recordsFor(packageName: string): Promise<readonly ScanRecord[]> {
    const index = await this.index();
    return index.recordsFor(packageName);
  }

  async all(): Promise<readonly ScanRecord[]> {
    const index = await this.index();
    return index.all();
  }

  async append(record: ScanRecord): Promise<void> {
    const index = await this.index();
    let fileName = scanFileName(record);
    let attempt = 1;
    while (await fs.pathExists(path.join(this.directory, fileName))) {
      attempt += 1;
      fileName = scanFileName(record, `_${attempt}`);
    }
    const target = path.join(this.directory, fileName);
    await fs.outputJson(target, toScanDocument(record), { spaces: 2 });
    index.add({ ...record, source: target });
    debug(`Scan record written to ${target}`);
  }

  private index(): Promise<ScanHistoryIndex> {
    if (!this.loading) {
      const loading: Promise<ScanHistoryIndex> = this.load().catch((cause: unknown) => {
        if (this.loading === loading) {
          this.loading = null;
        }
        throw cause;
      });
      this.loading = loading;
    }
    return this.loading;
  }

  private async load(): Promise<ScanHistoryIndex> {
    const index = new ScanHistoryIndex();
    if (!(await fs.pathExists(this.directory))) {
      debug(`Scan directory ${this.directory} absent, starting with empty history.`);
      return index;
    }
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (cause) {
      throw new StoreFailureError(`Cannot list scan directory ${this.directory}: ${describeError(cause)}`, { cause });
    }
    const files = entries.filter(entry => entry.endsWith(".json")).sort();
    const limit = pLimit(Math.max(1, this.concurrency));
    const records = await Promise.all(
      files.map(file =>
        limit(async () => {
          const source = path.join(this.directory, file);
          try {
            const parsed: JsonValue = await fs.readJson(source);
            return toScanRecord(parsed, source);
          } catch (cause) {
            const failure =
              cause instanceof MalformedScanRecordError
                ? cause
                : new MalformedScanRecordError(source, describeError(cause), { cause });
            warn(`${failure.message}; excluded from history.`);
            return null;
          }
        })
      )
    );
    for (const record of records) {
      if (record) {
        index.add(record);
      }
    }
    info(`Loaded ${index.size} scan records from ${this.directory} (${files.length - index.size} excluded).`);
    return index;
  }
}
