import { z } from 'zod';
import type { EngineInfo, GenerationEngine, GenerationRequest, StreamChunk } from './base.js';
import { ChatmarkError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_BASE_URL = 'http://127.0.0.1:8023';

// Runner-private wire format, one JSON object per line
const RunnerLineSchema = z.object({
  content: z.string().default(''),
  done: z.boolean().default(false),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
  error: z.string().optional(),
});
type RunnerLine = z.infer<typeof RunnerLineSchema>;

export function parseNDJSONLine(line: string): RunnerLine | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    logger.debug('skipping malformed runner line', trimmed);
    return null;
  }
  const parsed = RunnerLineSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function toChunk(line: RunnerLine): StreamChunk {
  if (line.error !== undefined) {
    throw new ChatmarkError(`Runner error: ${line.error}`, 'ENGINE_STREAM_ERROR');
  }
  if (!line.done) {
    return { delta: line.content, done: false };
  }
  const promptTokens = line.prompt_eval_count ?? 0;
  const completionTokens = line.eval_count ?? 0;
  return {
    delta: line.content,
    done: true,
    ...(line.done_reason !== undefined ? { doneReason: line.done_reason } : {}),
    usage: {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
    },
  };
}

/**
 * Client for a local MLX-style runner process. The runner owns tokenization
 * and inference; it takes a literal prompt and streams NDJSON back.
 */
export class RunnerEngine implements GenerationEngine {
  readonly info: EngineInfo;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: { baseUrl?: string; model: string; timeoutMs?: number }) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.info = { name: 'runner', model: options.model };
  }

  async health(): Promise<void> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(5000),
      });
    } catch (err) {
      throw new ChatmarkError(
        `Cannot reach the runner at ${this.baseUrl}. Is it running?`,
        'ENGINE_UNAVAILABLE',
        { cause: err }
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new ChatmarkError(
        `Runner health check failed (HTTP ${response.status})${body ? `: ${body}` : ''}`,
        'ENGINE_UNAVAILABLE',
        { statusCode: response.status }
      );
    }
  }

  async *generate(request: GenerationRequest): AsyncIterable<StreamChunk> {
    const body = {
      model: this.info.model,
      prompt: request.prompt,
      images: request.images ?? [],
      stream: true,
      options: {
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.maxTokens !== undefined ? { num_predict: request.maxTokens } : {}),
        ...(request.stop && request.stop.length > 0 ? { stop: request.stop } : {}),
      },
    };

    logger.debug(`POST ${this.baseUrl}/completion`, { promptChars: request.prompt.length });

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/completion`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ChatmarkError(`Failed to connect to the runner at ${this.baseUrl}`, 'ENGINE_UNAVAILABLE', {
        retryable: true,
        cause: err,
      });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      if (response.status === 404) {
        throw new ChatmarkError(
          `Model not found by the runner: ${this.info.model}`,
          'ENGINE_MODEL_NOT_FOUND',
          { statusCode: response.status }
        );
      }
      throw new ChatmarkError(
        `Runner error ${response.status}: ${errorText}`,
        'ENGINE_STREAM_ERROR',
        { retryable: response.status === 503, statusCode: response.status }
      );
    }

    if (!response.body) {
      throw new ChatmarkError('Runner returned an empty response body', 'ENGINE_STREAM_ERROR', {
        retryable: true,
      });
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          const parsed = parseNDJSONLine(line);
          if (parsed) yield toChunk(parsed);
        }
      }
    } finally {
      reader.releaseLock();
    }

    buffer += decoder.decode();
    const last = parseNDJSONLine(buffer);
    if (last) yield toChunk(last);
  }
}
