export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface StreamChunk {
  delta: string;
  done: boolean;
  doneReason?: string;
  usage?: TokenUsage;
}

/** A literal, already-rendered prompt and the sampling options for it. */
export interface GenerationRequest {
  prompt: string;
  /** Opaque image payloads, in the order their placeholders appear in the prompt. */
  images?: string[];
  temperature?: number;
  maxTokens?: number;
  stop?: string[];
}

export interface EngineInfo {
  name: string;
  model: string;
}

/**
 * The runtime that turns a rendered prompt into text. It performs the
 * tokenization and inference; this project only talks to it.
 */
export interface GenerationEngine {
  info: EngineInfo;
  health(): Promise<void>;
  generate(request: GenerationRequest): AsyncIterable<StreamChunk>;
}
