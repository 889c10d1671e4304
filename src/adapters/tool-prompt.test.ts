import { describe, it, expect } from 'vitest';
import { toolPromptBlock, formatToolCallHistory } from './index.js';

describe('toolPromptBlock', () => {
  it('is empty without tools', () => {
    expect(toolPromptBlock([])).toBe('');
  });

  it('lists each tool with its parameters and the call format', () => {
    const block = toolPromptBlock([
      { type: 'function', function: { name: 'ping', description: '', parameters: { type: 'object' } } },
      { type: 'function', function: { name: 'add', description: 'Add numbers', parameters: {} } },
    ]);

    expect(block).toBe(
      '# Tools\n\n' +
        'You may call one or more functions to assist with the user query. The available functions are:\n\n' +
        '- ping\n  Parameters: {"type":"object"}\n' +
        '- add: Add numbers\n  Parameters: {}\n\n' +
        'To call functions, reply with only a JSON object in this format:\n' +
        '{"tool_calls": [{"name": "<function_name>", "arguments": {<arguments>}}]}\n' +
        'If no function is needed, answer normally.'
    );
  });

  it('mentions the tool_calls wrapper', () => {
    expect(
      toolPromptBlock([{ type: 'function', function: { name: 'f', description: 'd', parameters: {} } }])
    ).toContain('tool_calls');
  });
});

describe('formatToolCallHistory', () => {
  it('uses the same JSON shape the model is asked for', () => {
    expect(formatToolCallHistory([{ id: 'call_1', function: { name: 'f', arguments: { a: 1 } } }])).toBe(
      '{"tool_calls":[{"name":"f","arguments":{"a":1}}]}'
    );
  });
});
