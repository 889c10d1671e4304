import type { GenerationEngine } from './base.js';
import type { Profile } from '../config/schema.js';
import { ChatmarkError } from '../utils/errors.js';

export async function createEngine(profile: Profile): Promise<GenerationEngine> {
  if (!profile.model) {
    throw new ChatmarkError('No model configured. Pass --model or set it in the profile.', 'CONFIG_INVALID');
  }

  switch (profile.engine) {
    case 'runner': {
      const { RunnerEngine } = await import('./runner.js');
      return new RunnerEngine({ baseUrl: profile.baseUrl, model: profile.model });
    }
    default: {
      const unknown: never = profile.engine;
      throw new ChatmarkError(`Unknown engine: "${String(unknown)}"`, 'CONFIG_INVALID');
    }
  }
}
