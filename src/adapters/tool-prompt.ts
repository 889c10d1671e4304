import type { ToolCall, ToolDefinition } from './types.js';

const TOOL_INSTRUCTIONS =
  'To call functions, reply with only a JSON object in this format:\n' +
  '{"tool_calls": [{"name": "<function_name>", "arguments": {<arguments>}}]}\n' +
  'If no function is needed, answer normally.';

/**
 * Text block describing the available tools, inserted into the system turn
 * (or the first user turn for families without one). Tools are listed in
 * caller order; the same list always yields the same text.
 */
export function toolPromptBlock(tools: readonly ToolDefinition[]): string {
  if (tools.length === 0) return '';

  const entries = tools.map((t) => {
    const { name, description, parameters } = t.function;
    const head = description ? `- ${name}: ${description}` : `- ${name}`;
    return `${head}\n  Parameters: ${JSON.stringify(parameters)}`;
  });

  return [
    '# Tools',
    'You may call one or more functions to assist with the user query. The available functions are:',
    entries.join('\n'),
    TOOL_INSTRUCTIONS,
  ].join('\n\n');
}

/**
 * Replays calls an assistant already made in the same JSON shape the model
 * is asked to emit, so the history reads consistently.
 */
export function formatToolCallHistory(calls: readonly ToolCall[]): string {
  return JSON.stringify({
    tool_calls: calls.map((c) => ({ name: c.function.name, arguments: c.function.arguments })),
  });
}
