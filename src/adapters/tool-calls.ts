/**
 * Tool call recovery from raw model output.
 *
 * Small local models do not have native function calling; they are asked to
 * answer with JSON and reply in whatever shape they like best. Each shape has
 * its own matcher, tried in order, first match wins:
 *
 *   1. {"tool_calls": [{"function": {...}} | {"name", "arguments"}, ...]}
 *   2. [{"name", "arguments"}, ...]
 *   3. {"name", "arguments"}
 *   4. {"<tool_name>": {<arguments>}}
 *
 * When the text as a whole is not one of these, the first JSON object found
 * inside it is tried instead. Nothing here throws, and the returned content is
 * always the full input text.
 */

import type { ExtractionResult, JsonObject, ToolCall } from './types.js';

export type ToolCallMatcher = (value: unknown) => ToolCall[] | undefined;

const RESERVED_KEYS = new Set(['tool_calls', 'name', 'arguments', 'function']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Matchers only ever see values produced by JSON.parse, so an object's members
 * are JSON already and need no recursive walk.
 */
function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function toArguments(raw: unknown): JsonObject | undefined {
  if (raw === undefined || raw === null) return {};

  // OpenAI's wire format carries arguments as a JSON-encoded string.
  let value: unknown = raw;
  if (typeof raw === 'string') {
    const parsed = tryParseJson(raw);
    if (!parsed.ok) return undefined;
    value = parsed.value;
  }

  return isJsonObject(value) ? value : undefined;
}

function toCall(name: unknown, args: unknown, id: unknown): ToolCall | undefined {
  if (typeof name !== 'string' || !name) return undefined;
  const parsedArgs = toArguments(args);
  if (!parsedArgs) return undefined;

  const call: ToolCall = { function: { name, arguments: parsedArgs } };
  if (typeof id === 'string' && id) call.id = id;
  return call;
}

/** Normalises one element of a call list, with or without a `function` wrapper. */
function toCanonical(element: unknown): ToolCall | undefined {
  if (!isPlainObject(element)) return undefined;

  const fn = element['function'];
  if (isPlainObject(fn)) {
    return toCall(fn['name'], fn['arguments'], element['id']);
  }
  if ('name' in element) {
    return toCall(element['name'], element['arguments'], element['id']);
  }
  return undefined;
}

function toCallList(elements: readonly unknown[]): ToolCall[] | undefined {
  if (elements.length === 0) return undefined;

  const calls: ToolCall[] = [];
  for (const element of elements) {
    const call = toCanonical(element);
    if (!call) return undefined;
    calls.push(call);
  }
  return calls;
}

// ── Matchers ─────────────────────────────────────────────────────────────────

export const matchToolCallsWrapper: ToolCallMatcher = (value) => {
  if (!isPlainObject(value)) return undefined;
  const list = value['tool_calls'];
  return Array.isArray(list) ? toCallList(list) : undefined;
};

export const matchCallArray: ToolCallMatcher = (value) => {
  if (!Array.isArray(value)) return undefined;
  if (!value.every((el) => isPlainObject(el) && typeof el['name'] === 'string')) return undefined;
  return toCallList(value);
};

export const matchSingleCall: ToolCallMatcher = (value) => {
  if (!isPlainObject(value) || typeof value['name'] !== 'string') return undefined;
  const call = toCall(value['name'], value['arguments'], value['id']);
  return call ? [call] : undefined;
};

export const matchNameAsKey: ToolCallMatcher = (value) => {
  if (!isPlainObject(value)) return undefined;
  const keys = Object.keys(value);
  const name = keys[0];
  if (keys.length !== 1 || name === undefined || RESERVED_KEYS.has(name)) return undefined;

  const args = value[name];
  if (!isPlainObject(args)) return undefined;
  const call = toCall(name, args, undefined);
  return call ? [call] : undefined;
};

export const TOOL_CALL_MATCHERS: readonly ToolCallMatcher[] = [
  matchToolCallsWrapper,
  matchCallArray,
  matchSingleCall,
  matchNameAsKey,
];

export function matchParsed(value: unknown): ToolCall[] | undefined {
  for (const matcher of TOOL_CALL_MATCHERS) {
    const calls = matcher(value);
    if (calls) return calls;
  }
  return undefined;
}

// ── Embedded JSON ────────────────────────────────────────────────────────────

/**
 * Every balanced `{...}` span in `text`, ordered by opening position. One pass
 * with a stack of open braces; quotes count only inside an open brace.
 */
function balancedSpans(text: string): Array<[number, number]> {
  const open: number[] = [];
  const closeAt = new Map<number, number>();
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && open.length > 0) inString = true;
    else if (ch === '{') open.push(i);
    else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) closeAt.set(start, i);
    }
  }

  return [...closeAt.entries()].sort((a, b) => a[0] - b[0]);
}

/** First balanced `{...}` substring of `text` that parses as a JSON object. */
export function findEmbeddedObject(text: string): Record<string, unknown> | undefined {
  for (const [start, end] of balancedSpans(text)) {
    const parsed = tryParseJson(text.slice(start, end + 1));
    if (parsed.ok && isPlainObject(parsed.value)) return parsed.value;
  }
  return undefined;
}

// ── Public API ───────────────────────────────────────────────────────────────

/** Tool calls found in `text`, in discovery order, or undefined. */
export function parseToolCalls(text: string): ToolCall[] | undefined {
  const whole = tryParseJson(text.trim());
  if (whole.ok) {
    const calls = matchParsed(whole.value);
    if (calls) return calls;
  }

  const embedded = findEmbeddedObject(text);
  return embedded ? matchParsed(embedded) : undefined;
}

export function extractToolCalls(text: string): ExtractionResult {
  const toolCalls = parseToolCalls(text);
  return toolCalls ? { content: text, toolCalls } : { content: text };
}
