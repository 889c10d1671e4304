import { cosmiconfig } from 'cosmiconfig';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { ChatmarkConfigSchema } from './schema.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import type { ChatmarkConfig, CliOverrides, Profile } from './schema.js';
import { ChatmarkError } from '../utils/errors.js';

const MODULE_NAME = 'chatmark';

/** Environment variable that points the registry at a different models directory. */
export const MODELS_DIR_ENV = 'CHATMARK_MODELS';

type PartialConfig = Partial<ChatmarkConfig>;

export interface LoadOptions {
  /** Home directory used for the user-level config files. */
  home?: string;
}

function mergeProfiles(
  base: Record<string, Profile>,
  override: Record<string, Profile>
): Record<string, Profile> {
  const result: Record<string, Profile> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key];
    result[key] = existing ? { ...existing, ...val } : val;
  }
  return result;
}

function mergeConfigs(base: ChatmarkConfig, override: PartialConfig): ChatmarkConfig {
  return {
    ...base,
    ...override,
    profiles: mergeProfiles(base.profiles, override.profiles ?? {}),
    redactPatterns: override.redactPatterns ?? base.redactPatterns,
  };
}

async function search(dir: string, searchPlaces: string[], label: string): Promise<PartialConfig> {
  const explorer = cosmiconfig(MODULE_NAME, { searchPlaces, stopDir: dir });
  const result = await explorer.search(dir);
  if (!result) return {};

  // Partial parse: keys left out must not be filled by schema defaults and
  // then override a lower layer.
  const parsed = ChatmarkConfigSchema.partial().safeParse(result.config);
  if (!parsed.success) {
    throw new ChatmarkError(
      `Invalid ${label} at ${result.filepath}: ${parsed.error.message}`,
      'CONFIG_INVALID'
    );
  }
  return parsed.data;
}

async function loadUserDir(dir: string): Promise<PartialConfig> {
  if (!existsSync(dir)) return {};
  return search(dir, ['config.json', 'config.yaml', 'config.yml'], 'user config');
}

async function loadRepoConfig(cwd: string): Promise<PartialConfig> {
  return search(
    cwd,
    [
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}/config.json`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
    'config'
  );
}

export async function loadConfig(
  cwd: string = process.cwd(),
  cliOverrides: CliOverrides = {},
  options: LoadOptions = {}
): Promise<ChatmarkConfig> {
  const home = options.home ?? homedir();

  // Lowest to highest priority:
  //   built-in defaults
  //   ~/.config/chatmark/config.json
  //   ~/.chatmark/config.json
  //   .chatmarkrc / .chatmark/config.json in the working directory
  //   CLI flags
  const xdgConfig = await loadUserDir(join(home, '.config', MODULE_NAME));
  const dotConfig = await loadUserDir(join(home, `.${MODULE_NAME}`));
  const repoConfig = await loadRepoConfig(cwd);

  let config = mergeConfigs(CONFIG_DEFAULTS, xdgConfig);
  config = mergeConfigs(config, dotConfig);
  config = mergeConfigs(config, repoConfig);

  const profileName = cliOverrides.profile ?? config.defaultProfile;
  if (cliOverrides.model || cliOverrides.baseUrl) {
    const existing: Profile = config.profiles[profileName] ?? { engine: 'runner' };
    config = {
      ...config,
      defaultProfile: profileName,
      profiles: {
        ...config.profiles,
        [profileName]: {
          ...existing,
          ...(cliOverrides.model ? { model: cliOverrides.model } : {}),
          ...(cliOverrides.baseUrl ? { baseUrl: cliOverrides.baseUrl } : {}),
        },
      },
    };
  } else if (cliOverrides.profile) {
    config = { ...config, defaultProfile: profileName };
  }

  return config;
}

export function getActiveProfile(config: ChatmarkConfig): Profile {
  const profile = config.profiles[config.defaultProfile];
  if (!profile) {
    throw new ChatmarkError(
      `Profile "${config.defaultProfile}" not found in config`,
      'CONFIG_NOT_FOUND'
    );
  }
  return profile;
}

/**
 * Directory holding locally stored models. CHATMARK_MODELS wins over the
 * config file; both fall back to ~/.chatmark/models.
 */
export function resolveModelsDir(
  config: Pick<ChatmarkConfig, 'modelsDir'>,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  const fromEnv = env[MODELS_DIR_ENV];
  if (fromEnv) return resolve(fromEnv);
  if (config.modelsDir) return resolve(config.modelsDir.replace(/^~(?=$|\/)/, home));
  return join(home, `.${MODULE_NAME}`, 'models');
}
