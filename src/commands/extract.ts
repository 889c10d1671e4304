import { extractToolCalls } from '../adapters/tool-calls.js';
import { toAssistantMessage } from '../adapters/response.js';
import { printError, printJson } from '../ui/renderer.js';
import { ChatmarkError } from '../utils/errors.js';
import { readInput } from './input.js';

export interface ExtractOptions {
  /** Print the assembled assistant message instead of the raw extraction. */
  message?: boolean;
}

export async function runExtract(file: string | undefined, options: ExtractOptions = {}): Promise<void> {
  try {
    const result = extractToolCalls(await readInput(file));
    printJson(options.message ? toAssistantMessage(result) : result);
  } catch (err) {
    await printError(ChatmarkError.fromUnknown(err).message);
    process.exit(1);
  }
}
