import { describe, it, expect } from 'vitest';
import { detectFamily, detectModelLine } from './family.js';

describe('detectFamily', () => {
  it.each([
    ['mlx-community/Qwen2.5-3B-Instruct', 'qwen'],
    ['Qwen/Qwen2-VL-7B-Instruct', 'qwen'],
    ['mlx-community/Llama-3.2-1B-Instruct-4bit', 'llama3'],
    ['mlx-community/Meta-Llama3-8B-Instruct', 'llama3'],
    ['meta-llama/Llama-2-7b-chat', 'llama2'],
    ['mlx-community/Mistral-7B-Instruct-v0.3-4bit', 'mistral'],
    ['mistralai/Mixtral-8x7B-Instruct', 'mistral'],
    ['google/gemma-2-9b-it', 'gemma'],
    ['mlx-community/gemma-7b-instruct', 'gemma'],
    ['some-random-model', 'chatml'],
    ['custom/unknown-model', 'chatml'],
    ['', 'chatml'],
  ])('%s → %s', (modelId, expected) => {
    expect(detectFamily(modelId)).toBe(expected);
  });

  it('renders phi and smollm models with the chatml family', () => {
    expect(detectFamily('microsoft/Phi-3.5-mini-instruct')).toBe('chatml');
    expect(detectFamily('mlx-community/SmolLM2-135M-Instruct-4bit')).toBe('chatml');
  });

  it('is case-insensitive', () => {
    const ids = [
      'mlx-community/Qwen2.5-3B-Instruct',
      'meta-llama/Llama-3.2-1B',
      'meta-llama/Llama-2-7b-chat',
      'mistralai/Mixtral-8x7B',
      'google/gemma-2-9b',
      'some-random-model',
    ];
    for (const id of ids) {
      const expected = detectFamily(id);
      expect(detectFamily(id.toUpperCase())).toBe(expected);
      expect(detectFamily(id.toLowerCase())).toBe(expected);
    }
  });

  it('checks qwen before llama', () => {
    expect(detectFamily('someone/qwen-llama-merge')).toBe('qwen');
  });
});

describe('detectModelLine', () => {
  it.each([
    ['mlx-community/Qwen2.5-3B-Instruct', 'qwen'],
    ['meta-llama/Llama-2-7b', 'llama'],
    ['mistralai/Mixtral-8x7B', 'mistral'],
    ['microsoft/Phi-3.5-mini', 'phi'],
    ['mlx-community/Phi-2', 'phi'],
    ['google/gemma-2-9b', 'gemma'],
    ['mlx-community/SmolLM2-135M-Instruct', 'smollm'],
    ['some-random-model', 'chatml'],
  ])('%s → %s', (modelId, expected) => {
    expect(detectModelLine(modelId)).toBe(expected);
  });
});
