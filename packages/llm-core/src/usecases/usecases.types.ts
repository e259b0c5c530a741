import type { StopStatus } from '../llm/types.js';

export interface GenerationOptions {
  model: string;
  maxTokens: number;
}

export interface PromptCompletionOptions extends GenerationOptions {
  systemPrompt?: string;
  userPrompt?: string;
}

export interface GenerationResult {
  text: string;
  status: StopStatus | null;
  prompt: string;
}
