// CHANGE: Decide whether the approved list needs rebuilding after a rescan run.
// WHY: Any rescan invalidates the current approved set.

import { InvalidArgumentError } from "./errors.js";
import { RebuildDecision } from "./types.js";

/**
 * Decide whether the approved set must be recomputed after a run.
 * Any rescan invalidates the current approved set.
 *
 * @throws InvalidArgumentError for a negative or fractional count.
 */
export function maybeTriggerRebuild(rescanCount: number): RebuildDecision {
  if (!Number.isInteger(rescanCount) || rescanCount < 0) {
    throw new InvalidArgumentError(`Rescan count must be a non-negative whole number (got ${rescanCount})`);
  }
  if (rescanCount > 0) {
    return {
      rebuild: true,
      rescanCount,
      reason: `${rescanCount} package${rescanCount === 1 ? "" : "s"} rescanned; approved list must be rebuilt`
    };
  }
  return { rebuild: false, rescanCount, reason: "no rebuild needed" };
}
