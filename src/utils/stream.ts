import type { StreamChunk, TokenUsage } from '../providers/base.js';
import { ChatmarkError } from './errors.js';
import { logger } from './logger.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function calcDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  // Exponential backoff with jitter
  const exp = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return exp * (0.5 + 0.5 * Math.random());
}

/**
 * Re-run a stream factory on retryable failures. Only failures before the
 * first chunk are retried; once text has been yielded a retry would repeat it.
 */
export async function* withRetry(
  factory: () => AsyncIterable<StreamChunk>,
  options: Partial<RetryOptions> = {}
): AsyncIterable<StreamChunk> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    if (attempt > 0) {
      const delay = calcDelay(attempt - 1, opts.baseDelayMs, opts.maxDelayMs);
      logger.debug(`retrying generation in ${Math.round(delay)}ms (attempt ${attempt + 1})`);
      await sleep(delay);
    }

    let yielded = false;
    try {
      for await (const chunk of factory()) {
        yielded = true;
        yield chunk;
      }
      return;
    } catch (err) {
      lastError = err;
      const retryable = err instanceof ChatmarkError && err.retryable;
      if (!retryable || yielded) {
        throw err;
      }
    }
  }

  throw lastError;
}

export async function collectStream(stream: AsyncIterable<StreamChunk>): Promise<{
  text: string;
  doneReason?: string;
  usage?: TokenUsage;
}> {
  let text = '';
  let doneReason: string | undefined;
  let usage: TokenUsage | undefined;

  for await (const chunk of stream) {
    text += chunk.delta;
    if (chunk.done) {
      doneReason = chunk.doneReason;
      usage = chunk.usage;
    }
  }

  return { text, doneReason, usage };
}
