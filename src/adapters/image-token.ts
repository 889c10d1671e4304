export const DEFAULT_IMAGE_TOKEN = '<image>';

/**
 * Placeholder a vision model expects for the image at `index` (zero-based)
 * within a message. Qwen-VL numbers its images from 1; LLaVA, Pixtral,
 * PaliGemma and everything else use a single constant token.
 */
export function imageToken(modelId: string, index: number): string {
  const id = modelId.toLowerCase();
  if (id.includes('qwen') && id.includes('vl')) {
    return `<image_${index + 1}>`;
  }
  return DEFAULT_IMAGE_TOKEN;
}

/** One token per image, each on its own line, ready to precede the message text. */
export function imagePlaceholders(modelId: string, count: number): string {
  let out = '';
  for (let i = 0; i < count; i++) {
    out += `${imageToken(modelId, i)}\n`;
  }
  return out;
}
