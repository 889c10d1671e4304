import { readFile } from 'node:fs/promises';
import { ChatRequestSchema } from '../adapters/types.js';
import type { ChatRequest } from '../adapters/types.js';
import { ChatmarkError } from '../utils/errors.js';

async function readStdin(): Promise<string | null> {
  if (process.stdin.isTTY) return null;
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    process.stdin.on('data', (chunk: Buffer) => chunks.push(chunk));
    process.stdin.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    process.stdin.on('error', reject);
  });
}

/** Text from a file, or from stdin when no file (or "-") is given. Not trimmed. */
export async function readInput(file?: string): Promise<string> {
  if (file && file !== '-') {
    try {
      return await readFile(file, 'utf-8');
    } catch (err) {
      throw new ChatmarkError(`Cannot read file: ${file}`, 'INPUT_FILE_NOT_FOUND', { cause: err });
    }
  }

  const stdin = await readStdin();
  if (stdin === null || stdin.length === 0) {
    throw new ChatmarkError('No input provided. Pass a file or pipe to stdin.', 'INPUT_MISSING');
  }
  return stdin;
}

export function parseChatRequest(text: string, source = 'input'): ChatRequest {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ChatmarkError(`${source} is not valid JSON`, 'INPUT_INVALID', { cause: err });
  }

  const parsed = ChatRequestSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ChatmarkError(`Invalid chat request in ${source}: ${issues}`, 'INPUT_INVALID');
  }
  return parsed.data;
}

export async function loadChatRequest(file?: string): Promise<ChatRequest> {
  return parseChatRequest(await readInput(file), file && file !== '-' ? file : 'stdin');
}
