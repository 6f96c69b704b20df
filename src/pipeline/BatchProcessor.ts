import { BatchError, ValidationError, toError } from "../utils/errors";
import { type Logger, logger as defaultLogger } from "../utils/logger";
import { Semaphore } from "../utils/Semaphore";
import type { BatchOptions } from "./types";

/**
 * Runs an async processor over a list of items with bounded concurrency.
 *
 * Results keep the input order whatever the completion order. In continue
 * mode (the default) a thrown error is turned into a result by `onFailure`.
 * In fail-fast mode the first failure rejects the batch with a
 * {@link BatchError}; items still waiting for a permit are skipped, items
 * already running are left to finish and their results are dropped.
 */
export class BatchProcessor {
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  async process<TItem, TResult>(
    items: readonly TItem[],
    processor: (item: TItem, index: number) => Promise<TResult>,
    options: BatchOptions<TItem, TResult>,
  ): Promise<TResult[]> {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ValidationError(
        `Concurrency must be an integer >= 1, got ${options.concurrency}`,
      );
    }
    const continueOnError = options.continueOnError ?? true;
    const total = items.length;
    const semaphore = new Semaphore(options.concurrency);
    const results = new Array<TResult>(total);
    let completed = 0;
    let failed = 0;
    let stopped: BatchError | undefined;

    const stop = (index: number, cause: Error): BatchError => {
      stopped ??= new BatchError(
        `Batch stopped at item ${index + 1} of ${total}: ${cause.message}`,
        completed - failed,
        total,
        index,
        cause,
      );
      return stopped;
    };

    const runItem = async (item: TItem, index: number): Promise<void> => {
      await semaphore.acquire();
      try {
        if (stopped) {
          return;
        }

        let result: TResult;
        try {
          result = await processor(item, index);
        } catch (caught) {
          const error = toError(caught);
          if (!continueOnError || !options.onFailure) {
            throw stop(index, error);
          }
          this.logger.warn(`⚠️ Batch item ${index + 1} of ${total} failed: ${error.message}`);
          result = options.onFailure(error, item, index);
          failed++;
          results[index] = result;
          return;
        }

        const failure = options.toFailure?.(result);
        if (failure) {
          if (!continueOnError) {
            throw stop(index, failure);
          }
          failed++;
        }
        results[index] = result;
      } finally {
        semaphore.release();
        if (!stopped) {
          completed++;
          options.onProgress?.({ completed, total });
        }
      }
    };

    await Promise.all(items.map((item, index) => runItem(item, index)));
    this.logger.info(`📦 Batch finished: ${completed - failed} of ${total} items succeeded`);
    return results;
  }
}
