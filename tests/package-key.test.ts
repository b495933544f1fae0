// CHANGE: Check package key parsing, identity and ordering.
// WHY: Every component relies on the same key identity and output order.

import { describe, expect, it } from "vitest";
import {
  comparePackageKeys,
  formatPackageKey,
  parsePackageKey,
  samePackageKey,
  uniqueSortedKeys
} from "../src/utils/package-key.js";
import { key } from "./fakes.js";

describe("parsePackageKey", () => {
  it("splits aptly keys into name, version and architecture", () => {
    expect(parsePackageKey("curl_7.81.0-1ubuntu1.16_amd64")).toEqual({
      name: "curl",
      version: "7.81.0-1ubuntu1.16",
      architecture: "amd64"
    });
  });

  it("keeps epochs in versions", () => {
    expect(parsePackageKey("  zlib1g_1:1.2.11.dfsg-2ubuntu9_amd64 ")?.version).toBe("1:1.2.11.dfsg-2ubuntu9");
  });

  it("rejects text that is not a package key", () => {
    expect(parsePackageKey("simple-package")).toBeNull();
    expect(parsePackageKey("curl_7.0")).toBeNull();
    expect(parsePackageKey("curl__amd64")).toBeNull();
    expect(parsePackageKey("a_b_c_d")).toBeNull();
    expect(parsePackageKey("Name: mirror_2024_01")).toBeNull();
  });
});

describe("package key helpers", () => {
  it("formats keys back to aptly notation", () => {
    expect(formatPackageKey({ name: "vim", version: "9.0", architecture: "arm64" })).toBe("vim_9.0_arm64");
  });

  it("compares all three fields exactly", () => {
    expect(samePackageKey(key("vim_9.0_amd64"), key("vim_9.0_amd64"))).toBe(true);
    expect(samePackageKey(key("vim_9.0_amd64"), key("vim_9.0_arm64"))).toBe(false);
    expect(samePackageKey(key("vim_9.0_amd64"), key("Vim_9.0_amd64"))).toBe(false);
  });

  it("orders by name, then version, then architecture", () => {
    expect(comparePackageKeys(key("apt_2.4_amd64"), key("bash_1.0_amd64"))).toBe(-1);
    expect(comparePackageKeys(key("apt_2.4_amd64"), key("apt_2.3_amd64"))).toBe(1);
    expect(comparePackageKeys(key("apt_2.4_amd64"), key("apt_2.4_arm64"))).toBe(-1);
    expect(comparePackageKeys(key("apt_2.4_amd64"), key("apt_2.4_amd64"))).toBe(0);
  });

  it("removes duplicates while sorting", () => {
    const sorted = uniqueSortedKeys([key("zlib_1.3_amd64"), key("apt_2.4_amd64"), key("zlib_1.3_amd64")]);
    expect(sorted.map(formatPackageKey)).toEqual(["apt_2.4_amd64", "zlib_1.3_amd64"]);
  });
});
