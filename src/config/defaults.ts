import type { ChatmarkConfig } from './schema.js';
import { DEFAULT_BASE_URL } from '../providers/runner.js';

export const DEFAULT_RUNNER_URL = DEFAULT_BASE_URL;

export const CONFIG_DEFAULTS: ChatmarkConfig = {
  defaultProfile: 'default',
  profiles: {
    default: {
      engine: 'runner',
      model: 'mlx-community/Qwen2.5-3B-Instruct-4bit',
      baseUrl: DEFAULT_RUNNER_URL,
    },
  },
  logLevel: 'warn',
  redactPatterns: ['hf_[A-Za-z0-9]{8,}'],
};
