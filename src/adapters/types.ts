import { z } from 'zod';

// ── JSON values ───────────────────────────────────────────────────────────────

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

// ── Tool calls ────────────────────────────────────────────────────────────────

/** Canonical tool call, independent of the JSON shape the model emitted. */
export interface ToolCall {
  id?: string;
  function: {
    name: string;
    arguments: JsonObject;
  };
}

export const ToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: JsonObjectSchema,
  }),
});

export interface ExtractionResult {
  /** Always the complete raw text the extractor was given. */
  content: string;
  toolCalls?: ToolCall[];
}

// ── Messages and tools ────────────────────────────────────────────────────────

export const RoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);
export type Role = z.infer<typeof RoleSchema>;

export const ChatMessageSchema = z.object({
  role: RoleSchema,
  content: z.string().default(''),
  images: z.array(z.string()).optional(),
  tool_calls: z.array(ToolCallSchema).optional(),
});

export interface ChatMessage {
  role: Role;
  content: string;
  /** Opaque image references; only their count and order matter here. */
  images?: string[];
  tool_calls?: ToolCall[];
}

export const ToolDefinitionSchema = z.object({
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    parameters: JsonObjectSchema.default({ type: 'object', properties: {} }),
  }),
});

export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonObject;
  };
}

export const ChatRequestSchema = z.object({
  model: z.string().optional(),
  messages: z.array(ChatMessageSchema).min(1),
  tools: z.array(ToolDefinitionSchema).default([]),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

// ── Tags ──────────────────────────────────────────────────────────────────────

export const MODEL_FAMILIES = ['qwen', 'llama2', 'llama3', 'mistral', 'gemma', 'chatml'] as const;
export type ModelFamily = (typeof MODEL_FAMILIES)[number];

export const EMBEDDING_STRATEGIES = ['cls', 'last_token', 'mean_no_special'] as const;
export type EmbeddingStrategy = (typeof EMBEDDING_STRATEGIES)[number];
