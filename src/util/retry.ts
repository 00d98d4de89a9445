import type { Logger } from '../logging/logger.js';
import { sleep } from './pacer.js';

export interface RetryOptions<T> {
  /** The operation to retry. */
  fn: (attempt: number) => Promise<T>;
  /** Maximum number of attempts. */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff. */
  baseDelayMs?: number;
  /** Maximum delay in ms. */
  maxDelayMs?: number;
  /** Only errors this predicate accepts are retried; others propagate at once. */
  isRetryable?: (error: unknown) => boolean;
  /** Description for logging. */
  description?: string;
}

/**
 * Retry executor with exponential backoff and jitter.
 * Throws the last error once attempts are exhausted.
 */
export class RetryExecutor {
  constructor(
    private readonly logger: Pick<Logger, 'warn' | 'error'>,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async execute<T>(opts: RetryOptions<T>): Promise<T> {
    const {
      fn,
      maxAttempts,
      baseDelayMs = 1000,
      maxDelayMs = 30_000,
      isRetryable = () => true,
      description = 'operation',
    } = opts;

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        lastError = err;
        if (!isRetryable(err)) throw err;

        if (attempt < maxAttempts) {
          // Calculate delay with exponential backoff + jitter
          const delay = Math.min(
            baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * baseDelayMs,
            maxDelayMs,
          );

          this.logger.warn(
            `${description}: attempt ${attempt}/${maxAttempts} failed, retrying in ${Math.round(delay)}ms`,
            { data: { error: String(err) } },
          );
          await this.wait(delay);
        }
      }
    }

    this.logger.error(`${description}: all ${maxAttempts} attempts exhausted`);
    throw lastError;
  }
}
