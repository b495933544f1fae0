// CHANGE: Cover snapshot listing parsing and both snapshot store adapters.
// WHY: Only a genuinely unknown snapshot may be reported as not found.

import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SnapshotNotFoundError, StoreFailureError } from "../src/errors.js";
import { AptlySnapshotStore, DirectorySnapshotStore, parsePackageListing } from "../src/snapshot-store.js";
import { CommandRunner } from "../src/utils/aptly.js";
import { key } from "./fakes.js";

const APTLY_LISTING = [
  "Name: mirror_2025_11_20",
  "Created At: 2025-11-20 12:00:00 UTC",
  "Description: Snapshot from mirror [jammy]",
  "Number of packages: 2",
  "Packages:",
  "  curl_7.81.0-1ubuntu1.16_amd64",
  "  libc6_1:2.35-0ubuntu3_amd64",
  ""
].join("\n");

describe("parsePackageListing", () => {
  it("skips headers, comments and blank lines", () => {
    expect(parsePackageListing(APTLY_LISTING, "test")).toEqual([
      key("curl_7.81.0-1ubuntu1.16_amd64"),
      key("libc6_1:2.35-0ubuntu3_amd64")
    ]);
    expect(parsePackageListing("# exported\r\n\r\nzlib_1.3_amd64\r\nbroken_key\r\n", "test")).toEqual([
      key("zlib_1.3_amd64")
    ]);
  });
});

describe("DirectorySnapshotStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "gate-snapshots-"));
  });

  afterEach(async () => {
    await fs.remove(directory);
  });

  it("reads package keys from <id>.list", async () => {
    await fs.writeFile(path.join(directory, "mirror-2025-11-20.list"), "vim_9.0_amd64\ncurl_7.1_amd64\n", "utf8");
    const store = new DirectorySnapshotStore(directory);
    expect(await store.exists("mirror-2025-11-20")).toBe(true);
    expect(await store.listPackages("mirror-2025-11-20")).toEqual([key("vim_9.0_amd64"), key("curl_7.1_amd64")]);
  });

  it("does not resolve missing or path-like identifiers", async () => {
    const store = new DirectorySnapshotStore(directory);
    expect(await store.exists("absent")).toBe(false);
    expect(await store.exists("../etc/passwd")).toBe(false);
    expect(await store.exists("")).toBe(false);
    await expect(store.listPackages("absent")).rejects.toBeInstanceOf(SnapshotNotFoundError);
    await expect(store.listPackages("../absent")).rejects.toBeInstanceOf(SnapshotNotFoundError);
  });
});

describe("AptlySnapshotStore", () => {
  it("lists packages through aptly snapshot show", async () => {
    const run = vi.fn<CommandRunner>(async (_command, args) => ({
      code: 0,
      stdout: args.includes("-with-packages") ? APTLY_LISTING : "Name: mirror_2025_11_20\n",
      stderr: ""
    }));
    const store = new AptlySnapshotStore("/usr/bin/aptly", run);
    const keys = await store.listPackages("mirror_2025_11_20");
    expect(keys.map(entry => entry.version)).toEqual(["7.81.0-1ubuntu1.16", "1:2.35-0ubuntu3"]);
    expect(run).toHaveBeenNthCalledWith(1, "/usr/bin/aptly", ["snapshot", "show", "mirror_2025_11_20"]);
    expect(run).toHaveBeenNthCalledWith(2, "/usr/bin/aptly", [
      "snapshot",
      "show",
      "-with-packages",
      "mirror_2025_11_20"
    ]);
  });

  it("reports unknown snapshots as not found", async () => {
    const run = vi.fn<CommandRunner>(async () => ({
      code: 1,
      stdout: "",
      stderr: "ERROR: unable to show: snapshot with name ghost not found\n"
    }));
    const store = new AptlySnapshotStore("aptly", run);
    expect(await store.exists("ghost")).toBe(false);
    await expect(store.listPackages("ghost")).rejects.toBeInstanceOf(SnapshotNotFoundError);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("raises a store failure when aptly fails for another reason", async () => {
    const run = vi.fn<CommandRunner>(async () => ({
      code: 1,
      stdout: "",
      stderr: "ERROR: can't open database: resource temporarily unavailable\n"
    }));
    const store = new AptlySnapshotStore("aptly", run);
    const failure = store.listPackages("mirror");
    await expect(failure).rejects.toBeInstanceOf(StoreFailureError);
    await expect(failure).rejects.toThrow(
      "Cannot inspect snapshot mirror: ERROR: can't open database: resource temporarily unavailable"
    );
  });

  it("raises a store failure when listing fails", async () => {
    const run = vi.fn<CommandRunner>(async (_command, args) =>
      args.includes("-with-packages")
        ? { code: 2, stdout: "", stderr: "database locked\n" }
        : { code: 0, stdout: "", stderr: "" }
    );
    const store = new AptlySnapshotStore("aptly", run);
    await expect(store.listPackages("mirror")).rejects.toThrow(
      "Failed to get package list from mirror: database locked"
    );
  });

  it("raises a store failure when aptly cannot be started", async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error("spawn aptly ENOENT");
    });
    const store = new AptlySnapshotStore("aptly", run);
    const failure = store.exists("mirror");
    await expect(failure).rejects.toBeInstanceOf(StoreFailureError);
    await expect(failure).rejects.toThrow("Cannot run aptly: spawn aptly ENOENT");
  });
});
