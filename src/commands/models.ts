import { loadConfig, resolveModelsDir } from '../config/loader.js';
import { LocalModelRegistry, POPULAR_MODELS } from '../registry/local.js';
import type { LocalModel } from '../registry/local.js';
import { formatParamCount } from '../adapters/param-count.js';
import { formatTable, printError, printJson, writeOut } from '../ui/renderer.js';
import { ChatmarkError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';

function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit] ?? ''}`;
}

export function formatModelTable(models: readonly LocalModel[]): string {
  return formatTable([
    ['NAME', 'PARAMS', 'FAMILY', 'SIZE', 'DIGEST'],
    ...models.map((m) => [
      m.name,
      m.parameterCount > 0 ? formatParamCount(m.parameterCount) : '-',
      m.family,
      formatBytes(m.size),
      m.digest.slice('sha256:'.length, 'sha256:'.length + 12),
    ]),
  ]);
}

export async function runModelsList(options: CliOverrides = {}): Promise<void> {
  try {
    const config = await loadConfig(process.cwd(), options);
    const dir = resolveModelsDir(config);
    const models = await new LocalModelRegistry(dir).listModels();

    if (options.json) {
      printJson(models);
      return;
    }
    if (models.length === 0) {
      writeOut(`No models found in ${dir}.`);
      return;
    }
    writeOut(formatModelTable(models));
  } catch (err) {
    await printError(ChatmarkError.fromUnknown(err, 'REGISTRY_ERROR').message);
    process.exit(1);
  }
}

export function runModelsPopular(options: { json?: boolean } = {}): void {
  if (options.json) {
    printJson(POPULAR_MODELS);
    return;
  }
  writeOut(POPULAR_MODELS.join('\n'));
}
