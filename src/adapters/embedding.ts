import type { EmbeddingStrategy } from './types.js';

// "e5" as its own name segment: intfloat/e5-large-v2, multilingual-e5-base
const E5_SEGMENT = /(?:^|[/_-])e5(?:[/_-]|$)/;

/**
 * Pooling rule for turning per-token hidden states into one vector.
 *
 * Encoder models (BERT and its derivatives, E5) are trained with the CLS
 * token as the sentence representation; causal GPT-style models only see the
 * whole input at the last token. Everything else gets a mean over the
 * non-special tokens.
 *
 * The caller passes the id of the model it has loaded.
 */
export function selectEmbeddingStrategy(modelId: string): EmbeddingStrategy {
  const id = modelId.toLowerCase();

  if (id.includes('bert') || E5_SEGMENT.test(id)) {
    return 'cls';
  }
  if (id.includes('gpt')) {
    return 'last_token';
  }
  return 'mean_no_special';
}
