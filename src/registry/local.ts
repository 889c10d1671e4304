import { createHash } from 'node:crypto';
import { readdir, readFile, stat } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { detectFamily } from '../adapters/family.js';
import { parseParamCount } from '../adapters/param-count.js';
import type { ModelFamily } from '../adapters/types.js';
import { ChatmarkError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Curated starting points for the `models popular` listing. */
export const POPULAR_MODELS: readonly string[] = [
  'mlx-community/Llama-3.2-3B-Instruct-4bit',
  'mlx-community/Llama-3.2-1B-Instruct-4bit',
  'mlx-community/Mistral-7B-Instruct-v0.3-4bit',
  'mlx-community/Qwen2.5-7B-Instruct-4bit',
  'mlx-community/SmolLM2-1.7B-Instruct-4bit',
  'mlx-community/Phi-3.5-mini-instruct-4bit',
  'mlx-community/gemma-2-2b-it-4bit',
];

// Organisations whose first underscore stands for the "/" of a hub id
const ORG_PREFIXES = [
  'mlx-community_',
  'huggingface_',
  'meta-llama_',
  'mistralai_',
  'Qwen_',
  'google_',
  'microsoft_',
];

// Shared with other tooling in the models directory; never models
const INTERNAL_DIRS = new Set(['blobs', 'manifests', 'mlx', 'ollama']);

const WEIGHT_FILES = ['model.safetensors', 'weights.npz'];

const ModelConfigSchema = z
  .object({
    architectures: z.array(z.string()).optional(),
    hidden_size: z.number().optional(),
  })
  .passthrough();

export interface LocalModel {
  /** Hub-style display name, e.g. "mlx-community/Qwen2.5-3B". */
  name: string;
  localPath: string;
  format: 'MLX';
  /** Total bytes on disk. */
  size: number;
  /** "sha256:<hex>" over the file layout. */
  digest: string;
  modifiedAt: Date;
  /** First entry of `architectures` in config.json, when present. */
  architecture?: string;
  /** Rough size estimated from the hidden size, e.g. "1500M". */
  parameterSize?: string;
  parameterCount: number;
  family: ModelFamily;
}

export function toDisplayName(fsName: string): string {
  for (const prefix of ORG_PREFIXES) {
    if (fsName.startsWith(prefix)) {
      return `${prefix.slice(0, -1)}/${fsName.slice(prefix.length)}`;
    }
  }
  return fsName;
}

export function toLocalName(modelId: string): string {
  return modelId.replaceAll('/', '_');
}

async function listFiles(root: string, dir: string = root, prefix = ''): Promise<Array<{ rel: string; size: number }>> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: Array<{ rel: string; size: number }> = [];
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, full, rel)));
    } else if (entry.isFile()) {
      files.push({ rel, size: (await stat(full)).size });
    }
  }
  return files;
}

/** Digest over names and sizes; weights are never read. */
export function layoutDigest(files: ReadonlyArray<{ rel: string; size: number }>): string {
  const hash = createHash('sha256');
  for (const file of files) {
    hash.update(`${file.rel}:${file.size}\n`);
  }
  return `sha256:${hash.digest('hex')}`;
}

function nameDigest(name: string): string {
  return `sha256:${createHash('sha256').update(name).digest('hex')}`;
}

async function readModelConfig(path: string): Promise<z.infer<typeof ModelConfigSchema> | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch {
    return undefined;
  }
  try {
    const parsed = ModelConfigSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    logger.debug(`unreadable model config: ${path}`);
    return undefined;
  }
}

/** Read-only view of a directory of locally stored models. */
export class LocalModelRegistry {
  constructor(readonly modelsDir: string) {}

  modelPath(modelName: string): string {
    return join(this.modelsDir, toLocalName(modelName));
  }

  modelExists(modelName: string): boolean {
    const dir = this.modelPath(modelName);
    if (!existsSync(join(dir, 'config.json'))) return false;
    return WEIGHT_FILES.some((file) => existsSync(join(dir, file)));
  }

  async getModelInfo(modelName: string): Promise<LocalModel> {
    const localPath = this.modelPath(modelName);
    let modifiedAt: Date;
    try {
      modifiedAt = (await stat(localPath)).mtime;
    } catch (err) {
      throw new ChatmarkError(`Model not found locally: ${modelName}`, 'REGISTRY_ERROR', { cause: err });
    }

    const name = toDisplayName(toLocalName(modelName));
    const config = await readModelConfig(join(localPath, 'config.json'));
    const architecture = config?.architectures?.[0];
    const parameterSize =
      config?.hidden_size !== undefined ? `${Math.trunc((config.hidden_size * 1000) / 1024)}M` : undefined;

    let size = 0;
    let digest: string;
    try {
      const files = await listFiles(localPath);
      size = files.reduce((total, file) => total + file.size, 0);
      digest = layoutDigest(files);
    } catch (err) {
      logger.debug(`falling back to a name digest for ${modelName}`, String(err));
      digest = nameDigest(modelName);
    }

    return {
      name,
      localPath,
      format: 'MLX',
      size,
      digest,
      modifiedAt,
      ...(architecture !== undefined ? { architecture } : {}),
      ...(parameterSize !== undefined ? { parameterSize } : {}),
      parameterCount: parameterSize !== undefined ? parseParamCount(parameterSize) : 0,
      family: detectFamily(name),
    };
  }

  /** Complete local models, largest first, then by name. */
  async listModels(): Promise<LocalModel[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.modelsDir, { withFileTypes: true });
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw new ChatmarkError(`Cannot read models directory ${this.modelsDir}`, 'REGISTRY_ERROR', {
        cause: err,
      });
    }

    const models: LocalModel[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || INTERNAL_DIRS.has(entry.name)) continue;
      if (!this.modelExists(entry.name)) continue;
      models.push(await this.getModelInfo(entry.name));
    }

    return models.sort(
      (a, b) => b.parameterCount - a.parameterCount || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
    );
  }

  /** Whether a name refers to a model this registry can serve. */
  isModelReference(modelName: string): boolean {
    if (modelName.startsWith('mlx-community/')) return true;
    if (modelName.toLowerCase().includes('-mlx')) return true;
    return this.modelExists(modelName);
  }
}
