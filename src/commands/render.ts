import { loadConfig, getActiveProfile } from '../config/loader.js';
import { detectFamily } from '../adapters/family.js';
import { renderForFamily } from '../adapters/templates.js';
import type { ChatRequest, ModelFamily } from '../adapters/types.js';
import { printError, printJson, writeOut } from '../ui/renderer.js';
import { ChatmarkError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';
import { loadChatRequest } from './input.js';

export interface RenderedRequest {
  model: string;
  family: ModelFamily;
  prompt: string;
}

export function renderRequest(request: ChatRequest, model: string): RenderedRequest {
  const family = detectFamily(model);
  return { model, family, prompt: renderForFamily(family, request.messages, request.tools, model) };
}

/** The --model flag wins over the request's own model, which wins over the profile. */
export async function resolveModel(
  request: ChatRequest,
  options: CliOverrides
): Promise<string> {
  if (options.model) return options.model;
  if (request.model) return request.model;
  const config = await loadConfig(process.cwd(), options);
  const model = getActiveProfile(config).model;
  if (!model) {
    throw new ChatmarkError(
      'No model given. Set "model" in the request, pass --model, or configure one.',
      'INPUT_MISSING'
    );
  }
  return model;
}

export async function runRender(file: string | undefined, options: CliOverrides = {}): Promise<void> {
  try {
    const request = await loadChatRequest(file);
    const rendered = renderRequest(request, await resolveModel(request, options));
    if (options.json) {
      printJson(rendered);
    } else {
      writeOut(rendered.prompt);
    }
  } catch (err) {
    await printError(ChatmarkError.fromUnknown(err).message);
    process.exit(1);
  }
}
