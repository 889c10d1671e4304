import { describe, it, expect } from 'vitest';
import { runChatRequest } from './chat.js';
import type { EngineInfo, GenerationEngine, GenerationRequest, StreamChunk } from '../providers/base.js';
import type { ChatRequest } from '../adapters/types.js';
import { ChatmarkError } from '../utils/errors.js';

class FakeEngine implements GenerationEngine {
  readonly info: EngineInfo;
  readonly requests: GenerationRequest[] = [];
  failuresLeft = 0;

  constructor(
    model: string,
    private readonly deltas: string[]
  ) {
    this.info = { name: 'fake', model };
  }

  async health(): Promise<void> {}

  async *generate(request: GenerationRequest): AsyncIterable<StreamChunk> {
    this.requests.push(request);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new ChatmarkError('runner busy', 'ENGINE_UNAVAILABLE', { retryable: true });
    }
    for (const delta of this.deltas) {
      yield await Promise.resolve({ delta, done: false });
    }
    yield {
      delta: '',
      done: true,
      doneReason: 'stop',
      usage: { promptTokens: 7, completionTokens: 3, totalTokens: 10 },
    };
  }
}

const QWEN = 'mlx-community/Qwen2.5-3B';

function request(overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    model: QWEN,
    messages: [{ role: 'user', content: 'Weather in SF?' }],
    tools: [],
    ...overrides,
  };
}

describe('runChatRequest', () => {
  it('renders, generates and extracts a tool call', async () => {
    const engine = new FakeEngine(QWEN, ['{"name":"get_weather",', '"arguments":{"location":"SF"}}']);
    const result = await runChatRequest(request(), engine, { newId: () => 'call_test' });

    expect(engine.requests[0]?.prompt).toBe(
      '<|im_start|>system\nYou are a helpful assistant.<|im_end|>\n' +
        '<|im_start|>user\nWeather in SF?<|im_end|>\n' +
        '<|im_start|>assistant\n'
    );
    expect(result.family).toBe('qwen');
    expect(result.message).toEqual({
      role: 'assistant',
      content: '{"name":"get_weather","arguments":{"location":"SF"}}',
      tool_calls: [
        { id: 'call_test', type: 'function', function: { name: 'get_weather', arguments: { location: 'SF' } } },
      ],
    });
  });

  it('returns plain text without tool calls and passes usage through', async () => {
    const engine = new FakeEngine(QWEN, ['It is ', 'sunny.']);
    const result = await runChatRequest(request(), engine);

    expect(result.message).toEqual({ role: 'assistant', content: 'It is sunny.' });
    expect(result.doneReason).toBe('stop');
    expect(result.usage).toEqual({ promptTokens: 7, completionTokens: 3, totalTokens: 10 });
  });

  it('uses the profile system prompt only when the request has none', async () => {
    const engine = new FakeEngine(QWEN, ['ok']);
    await runChatRequest(request(), engine, { systemPrompt: 'Be terse.' });
    await runChatRequest(
      request({
        messages: [
          { role: 'system', content: 'Own prompt.' },
          { role: 'user', content: 'Hi' },
        ],
      }),
      engine,
      { systemPrompt: 'Be terse.' }
    );

    expect(engine.requests[0]?.prompt.startsWith('<|im_start|>system\nBe terse.<|im_end|>\n')).toBe(true);
    expect(engine.requests[1]?.prompt.startsWith('<|im_start|>system\nOwn prompt.<|im_end|>\n')).toBe(true);
  });

  it('forwards images in message order and sampling options', async () => {
    const engine = new FakeEngine(QWEN, ['ok']);
    await runChatRequest(
      request({
        messages: [
          { role: 'user', content: 'First', images: ['img-1'] },
          { role: 'assistant', content: 'Seen.' },
          { role: 'user', content: 'Second', images: ['img-2', 'img-3'] },
        ],
      }),
      engine,
      { temperature: 0.1, maxTokens: 32 }
    );

    expect(engine.requests[0]).toMatchObject({
      images: ['img-1', 'img-2', 'img-3'],
      temperature: 0.1,
      maxTokens: 32,
    });
  });

  it('sends only the images that have a placeholder in the prompt', async () => {
    const LLAVA = 'llava-hf/llava-1.5-7b-hf';
    const engine = new FakeEngine(LLAVA, ['ok']);
    await runChatRequest(
      request({
        model: LLAVA,
        messages: [
          { role: 'system', content: 'Describe images.', images: ['sys-img'] },
          { role: 'user', content: 'What is this?', images: ['u-img'] },
        ],
      }),
      engine
    );

    expect(engine.requests[0]?.images).toEqual(['u-img']);
    expect(engine.requests[0]?.prompt.split('<image>')).toHaveLength(2);
    expect(engine.requests[0]?.prompt).toContain('<|im_start|>user\n<image>\nWhat is this?<|im_end|>\n');
  });

  it('falls back to the engine model when the request names none', async () => {
    const engine = new FakeEngine('meta-llama/Llama-3.2-1B', ['ok']);
    const result = await runChatRequest(request({ model: undefined }), engine);

    expect(result.model).toBe('meta-llama/Llama-3.2-1B');
    expect(result.family).toBe('llama3');
    expect(engine.requests[0]?.prompt.startsWith('<|begin_of_text|>')).toBe(true);
  });

  it('retries a retryable engine failure', async () => {
    const engine = new FakeEngine(QWEN, ['ok']);
    engine.failuresLeft = 1;
    const result = await runChatRequest(request(), engine, { retry: { baseDelayMs: 1, maxDelayMs: 1 } });

    expect(result.message.content).toBe('ok');
    expect(engine.requests).toHaveLength(2);
  });
});
