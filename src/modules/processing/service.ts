import { open } from "fs/promises";
import type { Logger } from "pino";
import { AppError, InvalidPointsError, ProcessingIoError } from "../../common/errors";
import { Account } from "../accounts/repository";
import { AccountLedger } from "../accounts/ledger";
import { CheckpointStore } from "../checkpoints/repository";
import { parseTransactionLine } from "../transactions/parser";

export type SkipKind = "malformed" | "nonTarget" | "unknownAccount";

export type ProcessorOptions = {
  targetMerchantId: string;
  checkpointInterval: number;
  logger: Logger;
  onSkip?: (kind: SkipKind, lineNumber: number) => void;
};

export type RunSummary = {
  startOffset: number;
  linesRead: number;
  eligible: number;
  pointsAwarded: number;
  malformed: number;
  nonTarget: number;
  unknownAccount: number;
  accounts: Account[];
};

type Counters = Omit<RunSummary, "startOffset" | "linesRead" | "accounts">;

export class TransactionProcessor {
  constructor(
    private readonly ledger: AccountLedger,
    private readonly checkpoints: CheckpointStore,
    private readonly options: ProcessorOptions
  ) {
    if (!Number.isSafeInteger(options.checkpointInterval) || options.checkpointInterval <= 0) {
      throw new RangeError("Checkpoint interval must be a positive integer");
    }
  }

  /**
   * Streams a transaction log, resuming after the last checkpointed line.
   *
   * Lines at or before the checkpoint are read but never applied. The
   * checkpoint is saved every `checkpointInterval` lines (counted from the
   * top of the file) and removed once the whole file has been consumed.
   * On any failure the last saved checkpoint is left in place.
   */
  async processFile(filePath: string): Promise<RunSummary> {
    const { logger } = this.options;

    try {
      await this.checkpoints.acquire();
    } catch (error) {
      throw this.wrap(error, `Failed to lock checkpoint for ${filePath}`);
    }

    try {
      return await this.run(filePath);
    } catch (error) {
      const wrapped = this.wrap(error, `Failed to process ${filePath}`);
      logger.error({ err: wrapped, filePath }, "Processing aborted; checkpoint left at last saved offset");
      throw wrapped;
    } finally {
      await this.releaseLock(filePath);
    }
  }

  private async releaseLock(filePath: string): Promise<void> {
    try {
      await this.checkpoints.release();
    } catch (error) {
      this.options.logger.warn({ err: error, filePath }, "Failed to release checkpoint lock");
    }
  }

  private async run(filePath: string): Promise<RunSummary> {
    const { logger, checkpointInterval } = this.options;
    const startOffset = await this.checkpoints.load();
    const counters: Counters = {
      eligible: 0,
      pointsAwarded: 0,
      malformed: 0,
      nonTarget: 0,
      unknownAccount: 0
    };

    logger.info({ filePath, startOffset }, "Starting processing");

    let lineNumber = 0;
    const handle = await open(filePath, "r");
    try {
      for await (const line of handle.readLines()) {
        lineNumber++;
        if (lineNumber <= startOffset) {
          continue;
        }

        await this.applyLine(line, lineNumber, counters);

        if (lineNumber % checkpointInterval === 0) {
          await this.checkpoints.save(lineNumber);
          logger.info({ lineNumber }, "Checkpoint saved");
        }
      }
    } finally {
      await handle.close();
    }

    if (lineNumber < startOffset) {
      // Input is shorter than the checkpoint: nothing left to apply, and
      // saving the smaller count would move the offset backwards.
      logger.warn({ filePath, startOffset, linesRead: lineNumber }, "Checkpoint is past the end of the input");
    } else {
      await this.checkpoints.save(lineNumber);
    }
    await this.checkpoints.clear();

    const summary: RunSummary = {
      startOffset,
      linesRead: lineNumber,
      ...counters,
      accounts: await this.ledger.summary()
    };
    logger.info(
      {
        linesRead: summary.linesRead,
        eligible: summary.eligible,
        pointsAwarded: summary.pointsAwarded,
        malformed: summary.malformed,
        nonTarget: summary.nonTarget,
        unknownAccount: summary.unknownAccount
      },
      "Processing completed"
    );
    return summary;
  }

  private async applyLine(line: string, lineNumber: number, counters: Counters): Promise<void> {
    const parsed = parseTransactionLine(line);
    if (!parsed.ok) {
      this.skip("malformed", lineNumber, counters, { reason: parsed.reason });
      return;
    }

    const { record } = parsed;
    if (record.merchantIdentifier !== this.options.targetMerchantId) {
      this.skip("nonTarget", lineNumber, counters);
      return;
    }

    const points = this.ledger.pointsFor(record.amount);
    let balance: number | null;
    try {
      balance = await this.ledger.accrue(record.accountIdentifier, points);
    } catch (error) {
      if (error instanceof InvalidPointsError) {
        this.skip("malformed", lineNumber, counters, { reason: "POINTS_OUT_OF_RANGE" });
        return;
      }
      throw error;
    }
    if (balance === null) {
      this.skip("unknownAccount", lineNumber, counters);
      return;
    }

    counters.eligible++;
    counters.pointsAwarded += points;
    this.options.logger.info(
      { lineNumber, accountIdentifier: record.accountIdentifier, points, balance, date: record.date },
      "Points awarded"
    );
  }

  private skip(
    kind: SkipKind,
    lineNumber: number,
    counters: Counters,
    context: Record<string, unknown> = {}
  ): void {
    counters[kind]++;
    this.options.logger.debug({ lineNumber, kind, ...context }, "Line skipped");
    this.options.onSkip?.(kind, lineNumber);
  }

  private wrap(error: unknown, message: string): AppError {
    if (error instanceof AppError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new ProcessingIoError(`${message}: ${detail}`, error);
  }
}
