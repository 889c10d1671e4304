import { describe, it, expect } from 'vitest';
import { toAssistantMessage, newCallId } from './response.js';
import { extractToolCalls } from './tool-calls.js';

describe('toAssistantMessage', () => {
  it('returns plain content when there are no calls', () => {
    expect(toAssistantMessage({ content: 'Hello' })).toEqual({ role: 'assistant', content: 'Hello' });
  });

  it('assigns ids to unnamed calls and keeps existing ones', () => {
    let n = 0;
    const message = toAssistantMessage(
      {
        content: 'raw',
        toolCalls: [
          { id: 'call_a', function: { name: 'one', arguments: {} } },
          { function: { name: 'two', arguments: { x: 1 } } },
        ],
      },
      () => `gen_${++n}`
    );
    expect(message).toEqual({
      role: 'assistant',
      content: 'raw',
      tool_calls: [
        { id: 'call_a', type: 'function', function: { name: 'one', arguments: {} } },
        { id: 'gen_1', type: 'function', function: { name: 'two', arguments: { x: 1 } } },
      ],
    });
  });

  it('keeps the full model text alongside extracted calls', () => {
    const text = 'Let me check. {"name":"get_weather","arguments":{"location":"SF"}}';
    const message = toAssistantMessage(extractToolCalls(text), () => 'id');
    expect(message.content).toBe(text);
    expect(message.tool_calls).toHaveLength(1);
  });
});

describe('newCallId', () => {
  it('produces distinct prefixed ids', () => {
    const a = newCallId();
    expect(a).toMatch(/^call_[0-9a-f]{24}$/);
    expect(newCallId()).not.toBe(a);
  });
});
