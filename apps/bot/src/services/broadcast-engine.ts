import {
  buildReport,
  createTally,
  outcomeForErrorKind,
  processedCount,
  recordOutcome,
  shouldReportProgress,
  type BroadcastContent,
  type DeliveryOutcome,
  type DeliveryReport,
  type DeliveryTally,
  type Recipient,
} from "../domain/broadcast/index.js";
import { sleep as defaultSleep, type Sleep } from "../domain/utils/index.js";
import { createTimer, log, logFailure } from "../logger.js";
import { broadcastDeliveriesTotal } from "../metrics.js";
import type { Repository } from "../repository/types.js";
import { toTransportError } from "../transport/errors.js";
import type { Transport } from "../transport/types.js";

export interface BroadcastEngineOptions {
  /** Pause after every attempt */
  delayMs: number;
  /** Progress is reported after every N processed recipients */
  progressEvery: number;
  sleep: Sleep;
}

export interface BroadcastJob {
  broadcastId: number;
  content: BroadcastContent;
}

export type ProgressListener = (tally: DeliveryTally) => Promise<void>;

const DEFAULT_OPTIONS: BroadcastEngineOptions = {
  delayMs: 50,
  progressEvery: 10,
  sleep: defaultSleep,
};

/**
 * Sequential at-most-once delivery over a recipient snapshot.
 *
 * A recipient failure never stops the run and nothing is retried.
 */
export class BroadcastEngine {
  private readonly options: BroadcastEngineOptions;

  constructor(
    private readonly transport: Transport,
    private readonly repository: Repository,
    options: Partial<BroadcastEngineOptions> = {}
  ) {
    this.options = {
      delayMs: options.delayMs ?? DEFAULT_OPTIONS.delayMs,
      progressEvery: options.progressEvery ?? DEFAULT_OPTIONS.progressEvery,
      sleep: options.sleep ?? DEFAULT_OPTIONS.sleep,
    };
  }

  async run(
    job: BroadcastJob,
    recipients: readonly Recipient[],
    onProgress?: ProgressListener
  ): Promise<DeliveryReport> {
    const elapsed = createTimer();
    let tally = createTally(recipients.length);

    for (const recipient of recipients) {
      const outcome = await this.deliver(job, recipient);
      tally = recordOutcome(tally, outcome);
      broadcastDeliveriesTotal.inc({ outcome });

      await this.options.sleep(this.options.delayMs);

      if (onProgress && shouldReportProgress(processedCount(tally), this.options.progressEvery)) {
        await this.reportProgress(job.broadcastId, tally, onProgress);
      }
    }

    const report = buildReport(tally);
    log.broadcast.info(
      { broadcastId: job.broadcastId, ...report, duration: elapsed() },
      "run finished"
    );
    return report;
  }

  private async deliver(job: BroadcastJob, recipient: Recipient): Promise<DeliveryOutcome> {
    try {
      await this.send(recipient.tgId, job.content);
    } catch (error) {
      const failure = toTransportError(error);
      const outcome = outcomeForErrorKind(failure.kind);

      if (outcome === "blocked") {
        await this.record(recipient, "blocked", "forbidden");
        await this.bookkeeping(recipient, "block user", () =>
          this.repository.setUserBlocked(recipient.tgId, true, "blocked")
        );
      } else {
        log.broadcast.warn(
          { broadcastId: job.broadcastId, tgId: recipient.tgId, code: failure.code, error: failure.message },
          "delivery failed"
        );
        await this.record(recipient, "failed", failure.code);
      }
      return outcome;
    }

    await this.record(recipient, "sent", null);
    return "sent";
  }

  private async send(chatId: number, content: BroadcastContent): Promise<void> {
    if (content.kind === "photo") {
      await this.transport.sendPhoto(chatId, content.fileId, content.caption);
    } else {
      await this.transport.sendText(chatId, content.text);
    }
  }

  private async record(recipient: Recipient, status: DeliveryOutcome, errorCode: string | null): Promise<void> {
    await this.bookkeeping(recipient, "record delivery", () =>
      this.repository.updateDeliveryStatus(recipient.deliveryId, status, errorCode)
    );
  }

  /** Repository errors are logged; the run goes on */
  private async bookkeeping(recipient: Recipient, step: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      logFailure("broadcast", `bookkeeping failed: ${step}`, error, {
        deliveryId: recipient.deliveryId,
        tgId: recipient.tgId,
      });
    }
  }

  private async reportProgress(
    broadcastId: number,
    tally: DeliveryTally,
    onProgress: ProgressListener
  ): Promise<void> {
    try {
      await onProgress(tally);
    } catch (error) {
      log.broadcast.debug(
        { broadcastId, error: error instanceof Error ? error.message : String(error) },
        "progress update failed"
      );
    }
  }
}
