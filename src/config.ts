// CHANGE: Turn environment configuration into an explicit, validated struct.
// WHY: Every component receives its settings at construction instead of reading globals.

import * as dotenv from "dotenv";
import path from "path";
import { InvalidArgumentError } from "./errors.js";
import { FreshnessKeying } from "./types.js";

dotenv.config();

const BASE_DIR = "/opt/apt-mirror-system";

export type SnapshotSource = "aptly" | "directory";
export type ScanRecordSource = "directory" | "log";

/**
 * Complete runtime configuration for one gate invocation.
 *
 * Invariant: `maxScanAgeHours` and `concurrency` are positive whole numbers.
 */
export interface GateConfig {
  readonly snapshots: {
    readonly source: SnapshotSource;
    readonly aptlyBinary: string;
    readonly directory: string;
  };
  readonly scans: {
    readonly source: ScanRecordSource;
    readonly directory: string;
    readonly logPath: string;
  };
  readonly approvalsDir: string;
  readonly maxScanAgeHours: number;
  readonly freshnessKeying: FreshnessKeying;
  readonly scannerType: string;
  readonly concurrency: number;
  readonly rebuild: {
    readonly webhookUrl: string;
    readonly timeoutMs: number;
  };
}

type Env = Readonly<Record<string, string | undefined>>;

function readText(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const value = readText(env, name, fallback);
  const match = choices.find(choice => choice === value);
  if (!match) {
    throw new InvalidArgumentError(`${name} must be one of ${choices.join(", ")} (got "${value}")`);
  }
  return match;
}

/**
 * Parse a positive whole number, rejecting fractions and trailing garbage.
 */
export function parsePositiveInteger(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError(`${name} must be a positive whole number (got "${raw}")`);
  }
  const value = Number.parseInt(raw, 10);
  if (value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive whole number (got "${raw}")`);
  }
  return value;
}

/**
 * Build configuration from environment variables.
 *
 * @param env - Variable source; defaults to the process environment.
 * @throws InvalidArgumentError naming the offending variable.
 */
export function loadConfig(env: Env = process.env): GateConfig {
  const scansDir = readText(env, "SCANS_DIR", path.join(BASE_DIR, "scans"));
  return {
    snapshots: {
      source: readChoice<SnapshotSource>(env, "SNAPSHOT_SOURCE", ["aptly", "directory"], "aptly"),
      aptlyBinary: readText(env, "APTLY_BIN", "aptly"),
      directory: readText(env, "SNAPSHOTS_DIR", path.join(BASE_DIR, "snapshots"))
    },
    scans: {
      source: readChoice<ScanRecordSource>(env, "SCAN_RECORD_SOURCE", ["directory", "log"], "directory"),
      directory: scansDir,
      logPath: readText(env, "SCAN_LOG_PATH", path.join(BASE_DIR, "state", "scan-log.json"))
    },
    approvalsDir: readText(env, "APPROVALS_DIR", path.join(BASE_DIR, "approvals")),
    maxScanAgeHours: parsePositiveInteger("MAX_SCAN_AGE_HOURS", readText(env, "MAX_SCAN_AGE_HOURS", "24")),
    freshnessKeying: readChoice<FreshnessKeying>(env, "FRESHNESS_KEY", ["version", "name"], "version"),
    scannerType: readText(env, "SCANNER_TYPE", "trivy"),
    concurrency: parsePositiveInteger("GATE_CONCURRENCY", readText(env, "GATE_CONCURRENCY", "8")),
    rebuild: {
      webhookUrl: readText(env, "REBUILD_WEBHOOK_URL", ""),
      timeoutMs: parsePositiveInteger("HTTP_TIMEOUT", readText(env, "HTTP_TIMEOUT", "30000"))
    }
  };
}
