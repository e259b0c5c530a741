export interface LLMRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  maxTokens: number;
}

export interface StopStatus {
  stop_reason: string | null;
  stop_sequence: string | null;
  output_tokens: number;
}

export interface LLMResponse {
  text: string;
  status: StopStatus | null;
}

export interface LLMClient {
  complete(req: LLMRequest): Promise<LLMResponse>;
}

export interface TextContentBlock {
  type: 'text';
  text: string;
}

export interface UserMessage {
  role: 'user';
  content: TextContentBlock[];
}

export interface MessagesRequestBody {
  anthropic_version: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  system?: string;
  messages: UserMessage[];
}

export type StreamEvent =
  | { kind: 'text-delta'; text: string }
  | { kind: 'status-delta'; status: StopStatus }
  | { kind: 'other'; type: string };
