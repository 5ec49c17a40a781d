import { SystemTimeProvider, type TimeProvider } from "../domain/utils/index.js";
import { createTimer, log, logFailure } from "../logger.js";
import type { Repository } from "../repository/types.js";
import { statsFromCounts } from "./broadcast-runner.js";

// =============================================================================
// Broadcast Reconciliation
// =============================================================================
// A broadcast still marked "running" at startup lost its process mid-run.
// Deliveries are at-most-once, so nothing is resent: the broadcast is closed
// as "interrupted" with stats counted from its delivery rows. Queued rows stay
// queued as a record of who never got the message.
// =============================================================================

export interface ReconciliationResult {
  interrupted: number[];
  failed: number[];
}

export async function reconcileInterruptedBroadcasts(
  repository: Repository,
  time: TimeProvider = new SystemTimeProvider()
): Promise<ReconciliationResult> {
  const elapsed = createTimer();
  const result: ReconciliationResult = { interrupted: [], failed: [] };

  const running = await repository.listBroadcastsByStatus("running");
  if (running.length === 0) {
    return result;
  }

  for (const broadcast of running) {
    try {
      const counts = await repository.countDeliveriesByStatus(broadcast.id);
      const stats = statsFromCounts(counts);
      await repository.completeBroadcast(broadcast.id, "interrupted", stats, new Date(time.now()));
      result.interrupted.push(broadcast.id);
      log.broadcast.warn(
        { broadcastId: broadcast.id, ...stats, unsent: counts.queued },
        "broadcast interrupted by restart"
      );
    } catch (error) {
      result.failed.push(broadcast.id);
      logFailure("broadcast", "reconciliation failed", error, { broadcastId: broadcast.id });
    }
  }

  log.broadcast.info(
    { interrupted: result.interrupted.length, failed: result.failed.length, duration: elapsed() },
    "reconciliation complete"
  );
  return result;
}
