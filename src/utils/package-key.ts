// CHANGE: Provide canonical package key parsing and ordering shared across modules.
// WHY: Differ, selector and approval builder must agree on identity and output order.

import { PackageKey } from "../types.js";

/**
 * Parse an aptly package key of the form `name_version_arch`.
 *
 * @returns The key, or null unless the text is exactly three non-empty, space-free parts.
 */
export function parsePackageKey(text: string): PackageKey | null {
  const trimmed = text.trim();
  if (/\s/.test(trimmed)) {
    return null;
  }
  const parts = trimmed.split("_");
  if (parts.length !== 3) {
    return null;
  }
  const [name, version, architecture] = parts;
  if (!name || !version || !architecture) {
    return null;
  }
  return { name, version, architecture };
}

export function formatPackageKey(key: PackageKey): string {
  return `${key.name}_${key.version}_${key.architecture}`;
}

export function samePackageKey(left: PackageKey, right: PackageKey): boolean {
  return left.name === right.name && left.version === right.version && left.architecture === right.architecture;
}

function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Ordinal ordering by name, then version, then architecture.
 */
export function comparePackageKeys(left: PackageKey, right: PackageKey): number {
  return (
    compareText(left.name, right.name) ||
    compareText(left.version, right.version) ||
    compareText(left.architecture, right.architecture)
  );
}

/**
 * Drop exact duplicates and return the keys in stable order.
 */
export function uniqueSortedKeys(keys: readonly PackageKey[]): PackageKey[] {
  const seen = new Map<string, PackageKey>();
  for (const key of keys) {
    seen.set(formatPackageKey(key), key);
  }
  return Array.from(seen.values()).sort(comparePackageKeys);
}
