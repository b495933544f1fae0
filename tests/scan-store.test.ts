// CHANGE: Cover the name-keyed history index and the scan directory adapter.
// WHY: Malformed documents must be excluded without hiding the rest of the history.

import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StoreFailureError } from "../src/errors.js";
import { ScanDirectoryStore, ScanHistoryIndex, scanFileName } from "../src/scan-store.js";
import { scan } from "./fakes.js";

describe("ScanHistoryIndex", () => {
  it("keeps each package history ordered by scan time", () => {
    const index = new ScanHistoryIndex();
    index.add(scan("curl", "7.1", 300));
    index.add(scan("curl", "7.0", 100));
    index.add(scan("zlib", "1.3", 50));
    index.add(scan("curl", "7.1", 200));
    expect(index.recordsFor("curl").map(record => record.scannedAt)).toEqual([100, 200, 300]);
    expect(index.recordsFor("wget")).toEqual([]);
    expect(index.size).toBe(4);
  });
});

describe("ScanDirectoryStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "gate-scans-"));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(directory);
  });

  it("indexes valid documents and excludes malformed ones", async () => {
    await fs.writeJson(path.join(directory, "curl_7.1_20251120_100000.json"), {
      package_name: "curl",
      package_version: "7.1",
      status: "approved",
      scan_date: "2025-11-20T10:00:00Z"
    });
    await fs.writeJson(path.join(directory, "curl_7.1_20251119_100000.json"), {
      package_name: "curl",
      package_version: "7.1",
      status: "blocked",
      scan_date: "2025-11-19T10:00:00Z"
    });
    await fs.writeFile(path.join(directory, "zlib_1.3_20251120_100000.json"), "{not json", "utf8");
    await fs.writeJson(path.join(directory, "vim_9.0_20251120_100000.json"), { package_name: "vim" });
    await fs.writeFile(path.join(directory, "notes.txt"), "ignored", "utf8");

    const store = new ScanDirectoryStore(directory);
    const curl = await store.recordsFor("curl");
    expect(curl.map(record => record.outcome)).toEqual(["blocked", "approved"]);
    expect(await store.recordsFor("zlib")).toEqual([]);
    expect(await store.recordsFor("vim")).toEqual([]);
    expect(await store.all()).toHaveLength(2);
  });

  it("treats a missing directory as empty history", async () => {
    const store = new ScanDirectoryStore(path.join(directory, "absent"));
    expect(await store.all()).toEqual([]);
  });

  it("retries loading after a failed directory read", async () => {
    const target = path.join(directory, "scans");
    await fs.writeFile(target, "not a directory", "utf8");
    const store = new ScanDirectoryStore(target);
    await expect(store.all()).rejects.toBeInstanceOf(StoreFailureError);

    await fs.remove(target);
    await fs.ensureDir(target);
    await fs.writeJson(path.join(target, "curl_7.1_20251120_100000.json"), {
      package_name: "curl",
      package_version: "7.1",
      status: "approved",
      scan_date: "2025-11-20T10:00:00Z"
    });
    expect(await store.recordsFor("curl")).toHaveLength(1);
  });

  it("appends new documents without touching existing ones", async () => {
    const store = new ScanDirectoryStore(directory);
    const record = scan("zlib", "1.3", Date.parse("2025-11-20T12:00:00Z"));
    await store.append(record);
    await store.append(record);

    expect(await fs.pathExists(path.join(directory, "zlib_1.3_20251120_120000.json"))).toBe(true);
    expect(await fs.pathExists(path.join(directory, "zlib_1.3_20251120_120000_2.json"))).toBe(true);
    expect(await fs.readJson(path.join(directory, "zlib_1.3_20251120_120000.json"))).toEqual({
      package_name: "zlib",
      package_version: "1.3",
      status: "approved",
      scan_date: "2025-11-20T12:00:00.000Z",
      cve_count: 0,
      cvss_max: 0
    });
    expect(await store.recordsFor("zlib")).toHaveLength(2);

    const reopened = new ScanDirectoryStore(directory);
    expect(await reopened.recordsFor("zlib")).toHaveLength(2);
  });
});

describe("scanFileName", () => {
  it("names files after package, version and UTC time", () => {
    expect(scanFileName(scan("curl", "7.81.0-1ubuntu1.16", Date.parse("2025-11-19T08:05:09Z")))).toBe(
      "curl_7.81.0-1ubuntu1.16_20251119_080509.json"
    );
  });
});
