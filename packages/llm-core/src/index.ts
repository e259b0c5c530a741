export type {
  LLMClient,
  LLMRequest,
  LLMResponse,
  MessagesRequestBody,
  StopStatus,
  StreamEvent,
} from './llm/types.js';
export {
  BedrockAnthropicClient,
  createBedrockClient,
} from './llm/bedrockAnthropicClient.js';
export type {
  BedrockConnectionOptions,
  ResponseStreamSender,
} from './llm/bedrockAnthropicClient.js';
export { LLMClientError, StreamDecodeError } from './llm/errors.js';
export {
  ANTHROPIC_BEDROCK_VERSION,
  buildRequestBody,
  composeUserPrompt,
} from './llm/requestBuilder.js';
export { accumulateStream, decodeStreamChunk } from './llm/streamAccumulator.js';
export type {
  GenerationOptions,
  GenerationResult,
  PromptCompletionOptions,
} from './usecases/usecases.types.js';
export { completePrompt } from './usecases/promptCompletion.js';
export { reviewCode } from './usecases/codeReview.js';
export {
  REVIEW_MAX_TOKENS,
  REVIEW_SYSTEM_PROMPT,
  REVIEW_USER_PROMPT,
} from './usecases/reviewPrompts.js';
