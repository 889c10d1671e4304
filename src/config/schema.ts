import { z } from 'zod';

export const EngineKindSchema = z.enum(['runner']);
export type EngineKind = z.infer<typeof EngineKindSchema>;

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const ProfileSchema = z.object({
  engine: EngineKindSchema.default('runner'),
  model: z.string().optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  systemPrompt: z.string().optional(),
});
export type Profile = z.infer<typeof ProfileSchema>;

export const ChatmarkConfigSchema = z.object({
  defaultProfile: z.string().default('default'),
  profiles: z.record(ProfileSchema).default({}),
  modelsDir: z.string().optional(),
  logLevel: LogLevelSchema.default('warn'),
  redactPatterns: z.array(z.string()).default([]),
});
export type ChatmarkConfig = z.infer<typeof ChatmarkConfigSchema>;

export type CliOverrides = {
  profile?: string;
  model?: string;
  baseUrl?: string;
  json?: boolean;
  noColor?: boolean;
};
