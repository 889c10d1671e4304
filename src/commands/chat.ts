import { loadConfig, getActiveProfile, resolveModelsDir } from '../config/loader.js';
import { createEngine } from '../providers/factory.js';
import { runChatRequest } from '../pipeline/chat.js';
import { LocalModelRegistry } from '../registry/local.js';
import { printError, printJson } from '../ui/renderer.js';
import { ChatmarkError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CliOverrides } from '../config/schema.js';
import { loadChatRequest } from './input.js';

export async function runChat(file: string | undefined, options: CliOverrides = {}): Promise<void> {
  try {
    const request = await loadChatRequest(file);
    const config = await loadConfig(process.cwd(), options);
    const profile = getActiveProfile(config);
    const model = options.model ?? request.model ?? profile.model;
    const engine = await createEngine({ ...profile, ...(model ? { model } : {}) });

    const registry = new LocalModelRegistry(resolveModelsDir(config));
    if (!registry.isModelReference(engine.info.model)) {
      logger.warn(
        `${engine.info.model} is neither an MLX model reference nor present in ${registry.modelsDir}`
      );
    }

    const result = await runChatRequest({ ...request, model: engine.info.model }, engine, {
      ...(profile.temperature !== undefined ? { temperature: profile.temperature } : {}),
      ...(profile.maxTokens !== undefined ? { maxTokens: profile.maxTokens } : {}),
      ...(profile.systemPrompt !== undefined ? { systemPrompt: profile.systemPrompt } : {}),
    });

    printJson({
      model: result.model,
      family: result.family,
      message: result.message,
      ...(result.doneReason !== undefined ? { done_reason: result.doneReason } : {}),
      ...(result.usage !== undefined ? { usage: result.usage } : {}),
    });
  } catch (err) {
    await printError(ChatmarkError.fromUnknown(err).message);
    process.exit(1);
  }
}
