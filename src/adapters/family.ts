/**
 * Model family detection
 *
 * Single source of truth for mapping a model identifier to the chat markup
 * convention it was trained on. Used by the prompt renderer, the image token
 * selector and the `inspect` command.
 */

import type { ModelFamily } from './types.js';

/**
 * Finer-grained model line. Recognises lines that have no markup of their own
 * (phi, smollm) so listings can show them; they render as chatml.
 */
export type ModelLine = 'qwen' | 'llama' | 'mistral' | 'phi' | 'gemma' | 'smollm' | 'chatml';

/**
 * Determine the model family from a model identifier.
 *
 * Handles the identifier formats seen in practice:
 * - mlx-community/Qwen2.5-3B-Instruct-4bit
 * - meta-llama/Llama-3.2-1B-Instruct, mlx-community/Meta-Llama3-8B-Instruct
 * - meta-llama/Llama-2-7b-chat
 * - mistralai/Mixtral-8x7B-Instruct
 * - google/gemma-2-9b-it
 *
 * Never fails: anything unrecognised is `chatml`.
 */
export function detectFamily(modelId: string): ModelFamily {
  const id = modelId.toLowerCase();

  if (id.includes('qwen')) {
    return 'qwen';
  }
  if (id.includes('llama')) {
    return id.includes('llama-3') || id.includes('llama3') ? 'llama3' : 'llama2';
  }
  if (id.includes('mistral') || id.includes('mixtral')) {
    return 'mistral';
  }
  if (id.includes('gemma')) {
    return 'gemma';
  }

  return 'chatml';
}

export function detectModelLine(modelId: string): ModelLine {
  const id = modelId.toLowerCase();

  if (id.includes('qwen')) return 'qwen';
  if (id.includes('llama')) return 'llama';
  if (id.includes('mistral') || id.includes('mixtral')) return 'mistral';
  if (id.includes('phi')) return 'phi';
  if (id.includes('gemma')) return 'gemma';
  if (id.includes('smollm')) return 'smollm';

  return 'chatml';
}
