import { setTimeout as sleep } from 'timers/promises';
import { TransportAdapter } from './adapter.js';
import { NetworkLogger } from './logging.js';
import { NetworkResult } from './result.js';
import { Sink, SinkContent } from './sink.js';
import { RetryConfig, RetryPolicy } from './types.js';

/** `maxRetries` counts the first attempt; anything below 1 still makes one. */
export function attemptBudget(policy: RetryPolicy): number {
  return Math.max(1, Math.floor(policy.maxRetries));
}

/**
 * Call `attempt` until `accept` passes or the budget runs out, sleeping the
 * same fixed delay between attempts. The last result is returned as is.
 */
export async function retryUntil<R>(
  attempt: (attemptNumber: number) => Promise<R>,
  accept: (result: R) => boolean,
  policy: RetryPolicy,
  onRetry?: (result: R, attemptNumber: number) => void
): Promise<R> {
  const attempts = attemptBudget(policy);
  let result = await attempt(1);

  for (let attemptNumber = 2; attemptNumber <= attempts && !accept(result); attemptNumber++) {
    onRetry?.(result, attemptNumber - 1);
    await sleep(Math.max(0, policy.retryDelay));
    result = await attempt(attemptNumber);
  }

  return result;
}

export class RetryOrchestrator {
  constructor(
    private readonly adapter: TransportAdapter,
    private readonly logger: NetworkLogger
  ) {}

  /**
   * Repeat `retry.config` until a status in `retry.successCodes` arrives
   * without error. An exhausted budget is not flagged separately: the caller
   * gets the final attempt's result.
   */
  async executeWithRetry<T extends SinkContent>(retry: RetryConfig, sink: Sink<T>): Promise<NetworkResult<T>> {
    const { config, successCodes } = retry;

    if (successCodes.length === 0) {
      this.logger.error('Retry config has no success codes', { url: config.url });
      return new NetworkResult(sink.content(), successCodes).setError(
        'Retry config has no success codes',
        '',
        'validation'
      );
    }

    const attempts = attemptBudget(retry);
    return retryUntil(
      async (attemptNumber) => {
        if (attemptNumber > 1) {
          try {
            await sink.reset();
          } catch (error) {
            const message = `Failed to reset sink: ${error instanceof Error ? error.message : String(error)}`;
            this.logger.error(message, { url: config.url });
            return new NetworkResult(sink.content(), successCodes).setError(message, '', 'transport');
          }
        }
        return this.adapter.execute(config, sink, successCodes);
      },
      // Nothing is sent for an invalid URL, so another attempt cannot change it
      (result) => result.isSuccess() || result.errorKind === 'validation',
      retry,
      (result, attemptNumber) => {
        this.logger.warn(`Attempt ${attemptNumber}/${attempts} failed, retrying in ${retry.retryDelay}ms`, {
          url: config.url,
          statusCode: result.statusCode,
          error: result.errorMessage,
        });
      }
    );
  }
}
