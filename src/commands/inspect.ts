import { detectFamily, detectModelLine } from '../adapters/family.js';
import type { ModelLine } from '../adapters/family.js';
import { imageToken } from '../adapters/image-token.js';
import { selectEmbeddingStrategy } from '../adapters/embedding.js';
import type { EmbeddingStrategy, ModelFamily } from '../adapters/types.js';
import { formatTable, printJson, writeOut } from '../ui/renderer.js';

export interface ModelProfile {
  model: string;
  family: ModelFamily;
  modelLine: ModelLine;
  imageToken: string;
  embeddingStrategy: EmbeddingStrategy;
}

export function inspectModel(model: string): ModelProfile {
  return {
    model,
    family: detectFamily(model),
    modelLine: detectModelLine(model),
    imageToken: imageToken(model, 0),
    embeddingStrategy: selectEmbeddingStrategy(model),
  };
}

export function formatModelProfile(profile: ModelProfile): string {
  return formatTable([
    ['model', profile.model],
    ['family', profile.family],
    ['line', profile.modelLine],
    ['image token', profile.imageToken],
    ['embedding', profile.embeddingStrategy],
  ]);
}

export function runInspect(models: string[], options: { json?: boolean } = {}): void {
  const profiles = models.map(inspectModel);
  if (options.json) {
    printJson(profiles.length === 1 ? profiles[0] : profiles);
    return;
  }
  writeOut(profiles.map(formatModelProfile).join('\n\n'));
}
