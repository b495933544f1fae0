// CHANGE: Persist scan history as an explicit append-only log keyed by package name.
// WHY: Each entry carries its own scan timestamp, independent of file copy or mtime changes.

import fs from "fs-extra";
import path from "path";
import { describeError, MalformedScanRecordError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { toScanDocument, toScanRecord } from "./scan-record.js";
import { ScanHistoryIndex, ScanRecordStore } from "./scan-store.js";
import { JsonValue, ScanRecord } from "./types.js";

export const SCAN_LOG_VERSION = 1;

/**
 * Shape of the log file.
 *
 * @property records - Scan documents grouped by package name, oldest first. Entries that
 *   could not be parsed are carried along unchanged.
 * @property version - Schema version for migrations.
 * @property updatedAt - Timestamp of the latest persistence.
 */
export interface ScanLogFile {
  readonly records: { readonly [packageName: string]: readonly JsonValue[] };
  readonly version: number;
  readonly updatedAt: string;
}

interface LoadedLog {
  readonly index: ScanHistoryIndex;
  readonly unparsed: Map<string, JsonValue[]>;
  readonly updatedAt: string;
  readonly setAside: boolean;
}

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sameScan(left: ScanRecord, right: ScanRecord): boolean {
  return (
    left.packageName === right.packageName &&
    left.packageVersion === right.packageVersion &&
    left.architecture === right.architecture &&
    left.scannedAt === right.scannedAt
  );
}

/**
 * Append-only scan log with atomic writes.
 *
 * A file that cannot be read, or that carries another schema version, is moved aside
 * to `<file>.corrupt-<stamp>` on the first write instead of being overwritten.
 */
export class ScanRecordLog implements ScanRecordStore {
  private index = new ScanHistoryIndex();
  private unparsed = new Map<string, JsonValue[]>();
  private updatedAt = "";
  private setAside = false;
  private loading: Promise<void> | null = null;

  constructor(private readonly filePath: string) {}

  /**
   * (Re)load the log from disk. Concurrent callers share one read.
   */
  load(): Promise<void> {
    const loading: Promise<void> = this.readLog().then(
      loaded => {
        this.index = loaded.index;
        this.unparsed = loaded.unparsed;
        this.updatedAt = loaded.updatedAt;
        this.setAside = loaded.setAside;
      },
      (cause: unknown) => {
        if (this.loading === loading) {
          this.loading = null;
        }
        throw cause;
      }
    );
    this.loading = loading;
    return loading;
  }

  async recordsFor(packageName: string): Promise<readonly ScanRecord[]> {
    await this.ensureLoaded();
    return this.index.recordsFor(packageName);
  }

  async all(): Promise<readonly ScanRecord[]> {
    await this.ensureLoaded();
    return this.index.all();
  }

  /**
   * Record a scan and persist immediately.
   */
  async append(record: ScanRecord): Promise<void> {
    await this.ensureLoaded();
    this.index.add({ ...record, source: this.filePath });
    await this.save();
  }

  /**
   * Add records that are not already present; persists once at the end.
   *
   * @returns Number of records added.
   */
  async merge(records: readonly ScanRecord[]): Promise<number> {
    await this.ensureLoaded();
    let added = 0;
    for (const record of records) {
      const known = this.index.recordsFor(record.packageName).some(existing => sameScan(existing, record));
      if (known) {
        continue;
      }
      this.index.add({ ...record, source: this.filePath });
      added += 1;
    }
    if (added > 0) {
      await this.save();
    }
    return added;
  }

  /**
   * Persist atomically by writing to a temporary file before rename.
   */
  async save(): Promise<void> {
    await this.ensureLoaded();
    const grouped: { [packageName: string]: JsonValue[] } = {};
    for (const [packageName, documents] of this.unparsed) {
      grouped[packageName] = [...documents];
    }
    for (const record of this.index.all()) {
      const bucket = grouped[record.packageName] ?? [];
      bucket.push(toScanDocument(record));
      grouped[record.packageName] = bucket;
    }
    const payload: ScanLogFile = {
      records: grouped,
      version: SCAN_LOG_VERSION,
      updatedAt: new Date().toISOString()
    };
    if (this.setAside && (await fs.pathExists(this.filePath))) {
      const aside = `${this.filePath}.corrupt-${payload.updatedAt.replace(/[:.]/g, "-")}`;
      await fs.move(this.filePath, aside);
      warn(`Unreadable scan log moved to ${aside}.`);
    }
    this.setAside = false;
    const tempPath = `${this.filePath}.tmp`;
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJson(tempPath, payload, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
    this.updatedAt = payload.updatedAt;
    debug(`Scan log saved with ${this.index.size} records.`);
  }

  stats(): { readonly count: number; readonly updatedAt: string } {
    return {
      count: this.index.size,
      updatedAt: this.updatedAt
    };
  }

  private ensureLoaded(): Promise<void> {
    return this.loading ?? this.load();
  }

  private async readLog(): Promise<LoadedLog> {
    const index = new ScanHistoryIndex();
    const unparsed = new Map<string, JsonValue[]>();
    if (!(await fs.pathExists(this.filePath))) {
      debug(`Scan log ${this.filePath} absent, starting with empty history.`);
      return { index, unparsed, updatedAt: "", setAside: false };
    }
    let parsed: JsonValue;
    try {
      parsed = await fs.readJson(this.filePath);
    } catch (error) {
      warn(`Scan log read failed (${describeError(error)}), starting with empty history.`);
      return { index, unparsed, updatedAt: "", setAside: true };
    }
    if (!isRecord(parsed) || parsed.version !== SCAN_LOG_VERSION || !isRecord(parsed.records)) {
      warn("Scan log version mismatch, starting with empty history.");
      return { index, unparsed, updatedAt: "", setAside: true };
    }
    let excluded = 0;
    for (const [packageName, entry] of Object.entries(parsed.records)) {
      const documents: readonly JsonValue[] = Array.isArray(entry) ? entry : [entry];
      for (let position = 0; position < documents.length; position += 1) {
        const document = documents[position];
        const source = `${this.filePath}#${packageName}[${position}]`;
        try {
          index.add(toScanRecord(document, source));
        } catch (error) {
          if (!(error instanceof MalformedScanRecordError)) {
            throw error;
          }
          excluded += 1;
          unparsed.set(packageName, [...(unparsed.get(packageName) ?? []), document]);
          warn(`${error.message}; excluded from history.`);
        }
      }
    }
    info(`Loaded ${index.size} scan records from ${this.filePath} (${excluded} excluded).`);
    return {
      index,
      unparsed,
      updatedAt: typeof parsed.updatedAt === "string" ? parsed.updatedAt : "",
      setAside: false
    };
  }
}
