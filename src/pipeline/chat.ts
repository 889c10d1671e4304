import { detectFamily } from '../adapters/family.js';
import { renderForFamily } from '../adapters/templates.js';
import { extractToolCalls } from '../adapters/tool-calls.js';
import { toAssistantMessage, newCallId } from '../adapters/response.js';
import type { AssistantMessage } from '../adapters/response.js';
import type { ChatMessage, ChatRequest, ModelFamily } from '../adapters/types.js';
import type { GenerationEngine, TokenUsage } from '../providers/base.js';
import { collectStream, withRetry } from '../utils/stream.js';
import type { RetryOptions } from '../utils/stream.js';
import { logger } from '../utils/logger.js';

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  /** Used only when the request carries no system message of its own. */
  systemPrompt?: string;
  retry?: Partial<RetryOptions>;
  newId?: () => string;
}

export interface ChatResult {
  model: string;
  family: ModelFamily;
  prompt: string;
  message: AssistantMessage;
  doneReason?: string;
  usage?: TokenUsage;
}

function withSystemPrompt(messages: ChatMessage[], systemPrompt: string | undefined): ChatMessage[] {
  if (!systemPrompt || messages.some((m) => m.role === 'system')) return messages;
  return [{ role: 'system', content: systemPrompt }, ...messages];
}

/**
 * One chat turn end to end: render the conversation for the model's family,
 * generate, then pull tool calls out of the raw text.
 */
export async function runChatRequest(
  request: ChatRequest,
  engine: GenerationEngine,
  options: ChatOptions = {}
): Promise<ChatResult> {
  const model = request.model ?? engine.info.model;
  const family = detectFamily(model);
  const messages = withSystemPrompt(request.messages, options.systemPrompt);
  const prompt = renderForFamily(family, messages, request.tools, model);
  // System text folds into the preamble without placeholders, so its images
  // have nowhere to go.
  const images = messages.flatMap((m) => (m.role === 'system' ? [] : m.images ?? []));

  logger.debug(`rendered ${family} prompt for ${model}`, {
    messages: messages.length,
    tools: request.tools.length,
    images: images.length,
  });

  const result = await collectStream(
    withRetry(
      () =>
        engine.generate({
          prompt,
          ...(images.length > 0 ? { images } : {}),
          ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
          ...(options.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
        }),
      options.retry
    )
  );

  const extraction = extractToolCalls(result.text);
  if (extraction.toolCalls) {
    logger.info(`model requested ${extraction.toolCalls.length} tool call(s)`);
  }

  return {
    model,
    family,
    prompt,
    message: toAssistantMessage(extraction, options.newId ?? newCallId),
    ...(result.doneReason !== undefined ? { doneReason: result.doneReason } : {}),
    ...(result.usage !== undefined ? { usage: result.usage } : {}),
  };
}
