import { composeUserPrompt } from '../llm/requestBuilder.js';
import type { LLMClient } from '../llm/types.js';
import type { GenerationResult, PromptCompletionOptions } from './usecases.types.js';

/**
 * Sends `content` (file or stdin text) to the model, prefixed with the base
 * user prompt when one is configured.
 */
export async function completePrompt(
  llm: LLMClient,
  content: string,
  options: PromptCompletionOptions,
): Promise<GenerationResult> {
  const prompt = composeUserPrompt(options.userPrompt, content);

  const response = await llm.complete({
    model: options.model,
    prompt,
    systemPrompt: options.systemPrompt,
    maxTokens: options.maxTokens,
  });

  return {
    text: response.text,
    status: response.status,
    prompt,
  };
}
