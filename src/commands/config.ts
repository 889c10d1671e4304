import { writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { loadConfig, getActiveProfile, resolveModelsDir } from '../config/loader.js';
import { CONFIG_DEFAULTS } from '../config/defaults.js';
import { printError, printJson, printSuccess } from '../ui/renderer.js';
import { ChatmarkError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';

export async function runConfigShow(options: CliOverrides = {}): Promise<void> {
  try {
    const config = await loadConfig(process.cwd(), options);
    const profile = getActiveProfile(config);

    printJson({
      config,
      activeProfile: { name: config.defaultProfile, ...profile },
      modelsDir: resolveModelsDir(config),
    });
  } catch (err) {
    await printError(ChatmarkError.fromUnknown(err).message);
    process.exit(1);
  }
}

export async function runConfigInit(options: { global?: boolean; force?: boolean } = {}): Promise<void> {
  try {
    const configDir = options.global ? join(homedir(), '.chatmark') : join(process.cwd(), '.chatmark');
    const configPath = join(configDir, 'config.json');

    if (existsSync(configPath) && !options.force) {
      throw new ChatmarkError(`Config already exists at ${configPath}. Use --force to overwrite.`, 'CONFIG_INVALID');
    }

    await mkdir(configDir, { recursive: true });
    const initialConfig = {
      defaultProfile: CONFIG_DEFAULTS.defaultProfile,
      profiles: CONFIG_DEFAULTS.profiles,
    };
    await writeFile(configPath, JSON.stringify(initialConfig, null, 2) + '\n');
    await printSuccess(`Config initialized at: ${configPath}`);
  } catch (err) {
    await printError(ChatmarkError.fromUnknown(err).message);
    process.exit(1);
  }
}
