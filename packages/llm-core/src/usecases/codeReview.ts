import { composeUserPrompt } from '../llm/requestBuilder.js';
import type { LLMClient } from '../llm/types.js';
import { REVIEW_SYSTEM_PROMPT, REVIEW_USER_PROMPT } from './reviewPrompts.js';
import type { GenerationOptions, GenerationResult } from './usecases.types.js';

export async function reviewCode(
  llm: LLMClient,
  code: string,
  options: GenerationOptions,
): Promise<GenerationResult> {
  const prompt = composeUserPrompt(REVIEW_USER_PROMPT, code);

  const response = await llm.complete({
    model: options.model,
    prompt,
    systemPrompt: REVIEW_SYSTEM_PROMPT,
    maxTokens: options.maxTokens,
  });

  return {
    text: response.text,
    status: response.status,
    prompt,
  };
}
