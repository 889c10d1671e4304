import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('../config/loader.js', () => ({
  loadConfig: vi.fn(),
  getActiveProfile: vi.fn(),
  resolveModelsDir: vi.fn(),
}));

vi.mock('../providers/factory.js', () => ({
  createEngine: vi.fn(),
}));

import { loadConfig, getActiveProfile, resolveModelsDir } from '../config/loader.js';
import { createEngine } from '../providers/factory.js';
import { CONFIG_DEFAULTS } from '../config/defaults.js';
import type { GenerationEngine } from '../providers/base.js';
import { runChat } from './chat.js';

function fakeEngine(model: string, text: string): GenerationEngine {
  return {
    info: { name: 'fake', model },
    health: () => Promise.resolve(),
    async *generate() {
      yield await Promise.resolve({ delta: text, done: false });
      yield { delta: '', done: true, doneReason: 'stop' };
    },
  };
}

describe('runChat', () => {
  let dir: string;
  let stdout: MockInstance<typeof process.stdout.write>;
  let stderr: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chatmark-chat-'));
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    vi.mocked(loadConfig).mockResolvedValue(CONFIG_DEFAULTS);
    vi.mocked(resolveModelsDir).mockReturnValue(dir);
    vi.mocked(getActiveProfile).mockReturnValue({
      engine: 'runner',
      model: 'mlx-community/Qwen2.5-3B',
      temperature: 0.3,
    });
    vi.mocked(createEngine).mockImplementation((profile) =>
      Promise.resolve(fakeEngine(profile.model ?? '', '{"name":"get_time","arguments":{}}'))
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.clearAllMocks();
    rmSync(dir, { recursive: true });
  });

  it('prints the assistant message with extracted tool calls', async () => {
    const file = join(dir, 'req.json');
    writeFileSync(file, '{"messages":[{"role":"user","content":"What time is it?"}]}');

    await runChat(file, {});

    expect(createEngine).toHaveBeenCalledWith({
      engine: 'runner',
      model: 'mlx-community/Qwen2.5-3B',
      temperature: 0.3,
    });
    const printed: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      model: 'mlx-community/Qwen2.5-3B',
      family: 'qwen',
      done_reason: 'stop',
      message: {
        role: 'assistant',
        content: '{"name":"get_time","arguments":{}}',
        tool_calls: [{ type: 'function', function: { name: 'get_time', arguments: {} } }],
      },
    });
  });

  it('lets --model pick the engine model', async () => {
    const file = join(dir, 'req.json');
    writeFileSync(file, '{"model":"ignored","messages":[{"role":"user","content":"Hi"}]}');

    await runChat(file, { model: 'google/gemma-2-2b-it' });

    expect(vi.mocked(createEngine).mock.calls[0]?.[0].model).toBe('google/gemma-2-2b-it');
  });

  it('warns when the model is neither an MLX reference nor installed', async () => {
    const file = join(dir, 'req.json');
    writeFileSync(file, '{"messages":[{"role":"user","content":"Hi"}]}');

    await runChat(file, { model: 'google/gemma-2-2b-it' });

    expect(stderr).toHaveBeenCalledWith(
      `[WARN]  google/gemma-2-2b-it is neither an MLX model reference nor present in ${dir}\n`
    );
  });

  it('does not warn for an mlx-community model', async () => {
    const file = join(dir, 'req.json');
    writeFileSync(file, '{"messages":[{"role":"user","content":"Hi"}]}');

    await runChat(file, {});

    expect(stderr).not.toHaveBeenCalled();
  });

  it('reports errors and exits 1', async () => {
    await expect(runChat(join(dir, 'missing.json'), {})).rejects.toThrow('exit 1');
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('Cannot read file'));
  });
});
