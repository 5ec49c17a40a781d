import type { BroadcastStats } from "@nestfinder/db";
import {
  buildReport,
  type BroadcastContent,
  type DeliveryReport,
  type DeliveryTally,
  type Recipient,
} from "../domain/broadcast/index.js";
import { isoDay, SystemTimeProvider, type TimeProvider } from "../domain/utils/index.js";
import { log, logFailure, logSuccess } from "../logger.js";
import { broadcastDuration, broadcastsInProgress } from "../metrics.js";
import type { DeliveryCounts, Repository } from "../repository/types.js";
import { safeEdit } from "../transport/safe-edit.js";
import type { Transport } from "../transport/types.js";
import type { BroadcastEngine } from "./broadcast-engine.js";

/**
 * Status message texts shown to the admin while a run is in flight.
 */
export interface BroadcastStatusView {
  started(recipients: number, content: BroadcastContent): string;
  progress(tally: DeliveryTally): string;
  finished(report: DeliveryReport, content: BroadcastContent): string;
}

export interface StartBroadcastInput {
  adminTgId: number;
  /** Chat the status message goes to */
  chatId: number;
  content: BroadcastContent;
  title?: string | null;
}

export type StartBroadcastResult =
  | { status: "started"; broadcastId: number; recipients: number }
  | { status: "busy" }
  | { status: "no_recipients" };

interface ActiveRun {
  broadcastId: number;
  done: Promise<void>;
}

/** Stats of a broadcast as its delivery rows stand */
export function statsFromCounts(counts: DeliveryCounts): BroadcastStats {
  const tally: DeliveryTally = {
    total: counts.queued + counts.sent + counts.blocked + counts.failed,
    sent: counts.sent,
    blocked: counts.blocked,
    failed: counts.failed,
  };
  return buildReport(tally);
}

/**
 * Owns the broadcast lifecycle: draft, delivery snapshot, detached run,
 * completion. At most one run is active per process.
 */
export class BroadcastRunner {
  private active: ActiveRun | null = null;
  private reserved = false;

  constructor(
    private readonly repository: Repository,
    private readonly transport: Transport,
    private readonly engine: BroadcastEngine,
    private readonly view: BroadcastStatusView,
    private readonly time: TimeProvider = new SystemTimeProvider()
  ) {}

  get isRunning(): boolean {
    return this.reserved || this.active !== null;
  }

  get activeBroadcastId(): number | null {
    return this.active?.broadcastId ?? null;
  }

  /**
   * Resolves once the run has been handed off; delivery continues in the
   * background and can be awaited through drain().
   */
  async start(input: StartBroadcastInput): Promise<StartBroadcastResult> {
    if (this.isRunning) {
      log.broadcast.warn({ activeBroadcastId: this.activeBroadcastId }, "broadcast already running");
      return { status: "busy" };
    }
    this.reserved = true;

    try {
      if ((await this.repository.countUsers(true)) === 0) {
        return { status: "no_recipients" };
      }

      const broadcastId = await this.repository.createBroadcast({
        title: input.title ?? null,
        content: input.content,
        createdByTgId: input.adminTgId,
      });
      await this.repository.createDeliveriesForBroadcast(broadcastId);
      const recipients = await this.repository.getQueuedDeliveries(broadcastId);
      await this.repository.markBroadcastRunning(broadcastId, new Date(this.time.now()));

      const statusMessageId = await this.sendStatus(input.chatId, this.view.started(recipients.length, input.content));

      logSuccess("broadcast", "started", {
        broadcastId,
        recipients: recipients.length,
        kind: input.content.kind,
      });

      const done = this.execute(broadcastId, input, recipients, statusMessageId).finally(() => {
        this.active = null;
      });
      this.active = { broadcastId, done };

      return { status: "started", broadcastId, recipients: recipients.length };
    } finally {
      this.reserved = false;
    }
  }

  /**
   * Wait for the active run. Returns false if it did not finish within timeoutMs.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    const run = this.active;
    if (!run) return true;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([run.done.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async execute(
    broadcastId: number,
    input: StartBroadcastInput,
    recipients: Recipient[],
    statusMessageId: number | null
  ): Promise<void> {
    const stopTimer = broadcastDuration.startTimer();
    broadcastsInProgress.inc();

    try {
      const report = await this.engine.run(
        { broadcastId, content: input.content },
        recipients,
        statusMessageId === null
          ? undefined
          : (tally) => this.transport.editText(input.chatId, statusMessageId, this.view.progress(tally))
      );

      await this.repository.completeBroadcast(broadcastId, "completed", report, new Date(this.time.now()));
      await this.repository.recordDailyMetrics(isoDay(this.time.now()), {
        sentMessages: report.sent,
        errorsCount: report.failed,
      });

      await this.publishSummary(input.chatId, statusMessageId, this.view.finished(report, input.content));
      logSuccess("broadcast", "completed", { broadcastId, ...report });
    } catch (error) {
      logFailure("broadcast", "run aborted", error, { broadcastId });
      await this.markInterrupted(broadcastId);
    } finally {
      broadcastsInProgress.dec();
      stopTimer();
    }
  }

  private async sendStatus(chatId: number, text: string): Promise<number | null> {
    try {
      const { messageId } = await this.transport.sendText(chatId, text);
      return messageId;
    } catch (error) {
      logFailure("broadcast", "status message failed", error, { chatId });
      return null;
    }
  }

  private async publishSummary(chatId: number, statusMessageId: number | null, text: string): Promise<void> {
    if (statusMessageId !== null) {
      await safeEdit(this.transport, { chatId, messageId: statusMessageId }, text);
      return;
    }
    try {
      await this.transport.sendText(chatId, text);
    } catch (error) {
      logFailure("broadcast", "summary message failed", error, { chatId });
    }
  }

  private async markInterrupted(broadcastId: number): Promise<void> {
    try {
      const counts = await this.repository.countDeliveriesByStatus(broadcastId);
      await this.repository.completeBroadcast(
        broadcastId,
        "interrupted",
        statsFromCounts(counts),
        new Date(this.time.now())
      );
    } catch (error) {
      logFailure("broadcast", "could not mark broadcast interrupted", error, { broadcastId });
    }
  }
}
