/**
 * Chat prompt rendering
 *
 * Turns a family-agnostic message list into the literal markup a model family
 * was trained on. The output is consumed verbatim by the generation engine and
 * always ends so that generation continues an assistant turn.
 *
 * Markup per family:
 * - chatml / qwen: <|im_start|>{role}\n ... <|im_end|>\n
 * - llama3:        <|begin_of_text|><|start_header_id|>{role}<|end_header_id|>\n\n ... <|eot_id|>
 * - llama2:        [INST] <<SYS>>\n ... \n<</SYS>>\n\n ... [/INST]
 * - mistral:       <s>[INST] ... [/INST] ...</s>
 * - gemma:         <start_of_turn>user\n ... <end_of_turn>\n (no system turn;
 *                  tools close every user turn)
 */

import { detectFamily } from './family.js';
import { imagePlaceholders } from './image-token.js';
import { formatToolCallHistory, toolPromptBlock } from './tool-prompt.js';
import type { ChatMessage, ModelFamily, ToolDefinition } from './types.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

interface Turn {
  role: 'user' | 'assistant' | 'tool';
  /** Image placeholders followed by the message text. */
  body: string;
}

interface PromptParts {
  /** Joined system messages, or the default preamble when there are none. */
  preamble: string;
  hasSystemMessage: boolean;
  tools: string;
  turns: Turn[];
}

function joinBlocks(...blocks: string[]): string {
  return blocks.filter(Boolean).join('\n\n');
}

function messageText(message: ChatMessage): string {
  const calls = message.tool_calls ?? [];
  if (message.role !== 'assistant' || calls.length === 0) {
    return message.content;
  }
  const history = formatToolCallHistory(calls);
  return message.content ? `${message.content}\n${history}` : history;
}

function splitMessages(
  messages: readonly ChatMessage[],
  tools: readonly ToolDefinition[],
  modelId: string
): PromptParts {
  const systemTexts: string[] = [];
  const turns: Turn[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemTexts.push(message.content);
      continue;
    }
    const images = imagePlaceholders(modelId, message.images?.length ?? 0);
    turns.push({ role: message.role, body: images + messageText(message) });
  }

  return {
    preamble: systemTexts.length > 0 ? systemTexts.join('\n\n') : DEFAULT_SYSTEM_PROMPT,
    hasSystemMessage: systemTexts.length > 0,
    tools: toolPromptBlock(tools),
    turns,
  };
}

/** Families without a tool role see tool results as user turns. */
function asUserTurn(turn: Turn): Turn {
  return turn.role === 'tool' ? { role: 'user', body: `Tool result: ${turn.body}` } : turn;
}

// ── Families ─────────────────────────────────────────────────────────────────

function renderChatML(parts: PromptParts): string {
  let out = `<|im_start|>system\n${joinBlocks(parts.preamble, parts.tools)}<|im_end|>\n`;
  for (const turn of parts.turns) {
    out += `<|im_start|>${turn.role}\n${turn.body}<|im_end|>\n`;
  }
  return out + '<|im_start|>assistant\n';
}

function renderLlama3(parts: PromptParts): string {
  let out = '<|begin_of_text|>';
  out += `<|start_header_id|>system<|end_header_id|>\n\n${joinBlocks(parts.preamble, parts.tools)}<|eot_id|>`;
  for (const turn of parts.turns) {
    out += `<|start_header_id|>${turn.role}<|end_header_id|>\n\n${turn.body}<|eot_id|>`;
  }
  return out + '<|start_header_id|>assistant<|end_header_id|>\n\n';
}

function renderLlama2(parts: PromptParts): string {
  // The opening [INST] stays open until the first user turn closes it.
  let out = `[INST] <<SYS>>\n${joinBlocks(parts.preamble, parts.tools)}\n<</SYS>>\n\n`;
  let awaitingFirstUser = true;

  for (const turn of parts.turns.map(asUserTurn)) {
    if (turn.role === 'user') {
      out += awaitingFirstUser ? `${turn.body} [/INST]` : `[INST] ${turn.body} [/INST]`;
      awaitingFirstUser = false;
    } else {
      if (awaitingFirstUser) {
        out += ' [/INST]';
        awaitingFirstUser = false;
      }
      out += ` ${turn.body} </s><s>`;
    }
  }

  return awaitingFirstUser ? out + ' [/INST]' : out;
}

function renderMistral(parts: PromptParts): string {
  const system = joinBlocks(parts.preamble, parts.tools);
  let out = '<s>';
  let awaitingFirstUser = true;

  for (const turn of parts.turns.map(asUserTurn)) {
    if (turn.role === 'user') {
      const prefix = awaitingFirstUser ? `${system}\n\n` : '';
      out += `[INST] ${prefix}${turn.body} [/INST]`;
      awaitingFirstUser = false;
    } else {
      out += `${turn.body}</s>`;
    }
  }

  return awaitingFirstUser ? out + `[INST] ${system} [/INST]` : out;
}

function renderGemma(parts: PromptParts): string {
  const lead = parts.hasSystemMessage ? `${parts.preamble}\n\n` : '';
  const tail = parts.tools ? `\n\n${parts.tools}` : '';
  let out = '';
  let awaitingFirstUser = true;

  for (const turn of parts.turns.map(asUserTurn)) {
    if (turn.role === 'user') {
      // The system text leads the first user turn; tools follow every one.
      const head = awaitingFirstUser ? lead : '';
      out += `<start_of_turn>user\n${head}${turn.body}${tail}<end_of_turn>\n`;
      awaitingFirstUser = false;
    } else {
      out += `<start_of_turn>model\n${turn.body}<end_of_turn>\n`;
    }
  }

  if (awaitingFirstUser && (lead || tail)) {
    out += `<start_of_turn>user\n${joinBlocks(lead.trimEnd(), parts.tools)}<end_of_turn>\n`;
  }
  return out + '<start_of_turn>model\n';
}

// ── Public API ───────────────────────────────────────────────────────────────

export function renderForFamily(
  family: ModelFamily,
  messages: readonly ChatMessage[],
  tools: readonly ToolDefinition[],
  modelId = ''
): string {
  const parts = splitMessages(messages, tools, modelId);

  switch (family) {
    case 'qwen':
    case 'chatml':
      return renderChatML(parts);
    case 'llama3':
      return renderLlama3(parts);
    case 'llama2':
      return renderLlama2(parts);
    case 'mistral':
      return renderMistral(parts);
    case 'gemma':
      return renderGemma(parts);
    default: {
      // Adding a family without a branch fails to compile here.
      const unhandled: never = family;
      void unhandled;
      return renderChatML(parts);
    }
  }
}

/**
 * Render a conversation for the model named by `modelId`. Never throws;
 * unknown models get the chatml template.
 */
export function renderPrompt(
  messages: readonly ChatMessage[],
  tools: readonly ToolDefinition[],
  modelId: string
): string {
  return renderForFamily(detectFamily(modelId), messages, tools, modelId);
}
