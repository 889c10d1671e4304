export * from './types.js';
export { detectFamily, detectModelLine } from './family.js';
export type { ModelLine } from './family.js';
export { imageToken, imagePlaceholders, DEFAULT_IMAGE_TOKEN } from './image-token.js';
export { renderPrompt, renderForFamily, DEFAULT_SYSTEM_PROMPT } from './templates.js';
export { toolPromptBlock, formatToolCallHistory } from './tool-prompt.js';
export {
  extractToolCalls,
  parseToolCalls,
  matchParsed,
  findEmbeddedObject,
  TOOL_CALL_MATCHERS,
} from './tool-calls.js';
export type { ToolCallMatcher } from './tool-calls.js';
export { parseParamCount, formatParamCount } from './param-count.js';
export { selectEmbeddingStrategy } from './embedding.js';
export { toAssistantMessage, newCallId } from './response.js';
export type { AssistantMessage, ResponseToolCall } from './response.js';
