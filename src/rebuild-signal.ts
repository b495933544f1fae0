// CHANGE: Deliver the rebuild decision to the approval-set builder's hook.
// WHY: The decision is computed in the engine; the caller is responsible for acting on it.

import { describeError } from "./errors.js";
import { error as logError, info } from "./logger.js";
import { RebuildDecision } from "./types.js";
import { postJson } from "./utils/http.js";

export interface RebuildTarget {
  readonly webhookUrl: string;
  readonly timeoutMs: number;
}

export interface RebuildSignal {
  readonly event: "approved-list.rebuild";
  readonly snapshot: string;
  readonly rescanCount: number;
  readonly reason: string;
  readonly decidedAt: string;
}

/**
 * Notify the approval-set builder when a rebuild is required.
 *
 * @returns true when a signal was delivered.
 * @throws The underlying HTTP error once retries are exhausted.
 */
export async function sendRebuildSignal(
  decision: RebuildDecision,
  snapshot: string,
  target: RebuildTarget
): Promise<boolean> {
  if (!decision.rebuild) {
    info("Approved list is current: no rebuild needed.");
    return false;
  }
  if (!target.webhookUrl) {
    info(`Rebuild required (${decision.reason}) but REBUILD_WEBHOOK_URL is not configured; skipping signal.`);
    return false;
  }
  const signal: RebuildSignal = {
    event: "approved-list.rebuild",
    snapshot,
    rescanCount: decision.rescanCount,
    reason: decision.reason,
    decidedAt: new Date().toISOString()
  };
  try {
    const status = await postJson(target.webhookUrl, signal, target.timeoutMs);
    info(`Rebuild signal delivered (status ${status}).`);
    return true;
  } catch (cause) {
    logError(`Rebuild signal failed: ${describeError(cause)}`);
    throw cause;
  }
}
