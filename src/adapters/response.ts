import { randomBytes } from 'node:crypto';
import type { ExtractionResult, JsonObject } from './types.js';

/** Tool call as it appears in a chat-completion response. */
export interface ResponseToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: JsonObject;
  };
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  tool_calls?: ResponseToolCall[];
}

export function newCallId(): string {
  return `call_${randomBytes(12).toString('hex')}`;
}

/**
 * Assemble the assistant message for a response. The content is kept in full
 * even when tool calls were found; calls the model did not name get a fresh id.
 */
export function toAssistantMessage(
  result: ExtractionResult,
  newId: () => string = newCallId
): AssistantMessage {
  const message: AssistantMessage = { role: 'assistant', content: result.content };
  if (result.toolCalls && result.toolCalls.length > 0) {
    message.tool_calls = result.toolCalls.map((call) => ({
      id: call.id ?? newId(),
      type: 'function',
      function: { name: call.function.name, arguments: call.function.arguments },
    }));
  }
  return message;
}
