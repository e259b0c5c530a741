import type { MessagesRequestBody } from './types.js';

export const ANTHROPIC_BEDROCK_VERSION = 'bedrock-2023-05-31';

// Service defaults, sent explicitly so every request is reproducible.
export const DEFAULT_TEMPERATURE = 1;
export const DEFAULT_TOP_P = 0.999;

export interface RequestBodyInput {
  prompt: string;
  systemPrompt?: string;
  maxTokens: number;
}

export function composeUserPrompt(basePrompt: string | undefined, content: string): string {
  return basePrompt === undefined ? content : `${basePrompt}\n${content}`;
}

export function buildRequestBody(input: RequestBodyInput): MessagesRequestBody {
  const body: MessagesRequestBody = {
    anthropic_version: ANTHROPIC_BEDROCK_VERSION,
    max_tokens: input.maxTokens,
    temperature: DEFAULT_TEMPERATURE,
    top_p: DEFAULT_TOP_P,
    messages: [
      {
        role: 'user',
        content: [{ type: 'text', text: input.prompt }],
      },
    ],
  };

  if (input.systemPrompt !== undefined) {
    body.system = input.systemPrompt;
  }

  return body;
}
