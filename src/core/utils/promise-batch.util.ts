export interface BatchProcessingOptions {
  /**
   * Maximum number of concurrent promises
   * @default 5
   */
  concurrencyLimit?: number;

  /**
   * Stops scheduling new chunks once aborted; the chunk in flight always
   * runs to completion
   */
  signal?: AbortSignal;
}

export type BatchResult<R> =
  | {
      success: true;
      value: R;
      index: number;
    }
  | {
      success: false;
      error: Error;
      index: number;
    };

export interface BatchSummary<T, R> {
  successful: R[];
  failed: Array<{ item: T; error: Error; index: number }>;
  skipped: number;
}

function isSuccessResult<R>(
  result: BatchResult<R>,
): result is { success: true; value: R; index: number } {
  return result.success === true;
}

/**
 * Process an array of items in chunks with controlled concurrency
 *
 * @returns Results in the same order as input, for the items that were processed
 *
 * @example
 * const results = await batchProcessWithLimit(
 *   candidates,
 *   (subscription) => sweeper.processCandidate(subscription),
 *   { concurrencyLimit: 5, signal: abortController.signal }
 * );
 */
export async function batchProcessWithLimit<T, R>(
  items: T[],
  processor: (item: T, index: number) => Promise<R>,
  options: BatchProcessingOptions = {},
): Promise<BatchResult<R>[]> {
  const { concurrencyLimit = 5, signal } = options;

  const results: BatchResult<R>[] = [];

  for (let i = 0; i < items.length; i += concurrencyLimit) {
    if (signal?.aborted) break;

    const chunk = items.slice(i, i + concurrencyLimit);
    const chunkResults = await Promise.all(
      chunk.map((item, chunkIndex) => {
        const globalIndex = i + chunkIndex;
        return processor(item, globalIndex)
          .then(
            (value): BatchResult<R> => ({
              success: true,
              value,
              index: globalIndex,
            }),
          )
          .catch(
            (error: unknown): BatchResult<R> => ({
              success: false,
              error: error instanceof Error ? error : new Error(String(error)),
              index: globalIndex,
            }),
          );
      }),
    );
    results.push(...chunkResults);
  }

  return results;
}

/**
 * Process items in chunks and collect errors separately
 */
export async function batchProcessWithErrors<T, R>(
  items: T[],
  processor: (item: T, index: number) => Promise<R>,
  options: BatchProcessingOptions = {},
): Promise<BatchSummary<T, R>> {
  const results = await batchProcessWithLimit(items, processor, options);

  const successful: R[] = [];
  const failed: BatchSummary<T, R>['failed'] = [];

  results.forEach((result) => {
    if (isSuccessResult(result)) {
      successful.push(result.value);
    } else {
      failed.push({
        item: items[result.index],
        error: result.error,
        index: result.index,
      });
    }
  });

  return { successful, failed, skipped: items.length - results.length };
}
