import { StreamDecodeError } from './errors.js';
import type { LLMResponse, StopStatus, StreamEvent } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

interface TaggedChunk {
  type: string;
  payload: Record<string, unknown>;
}

function parsePayload(bytes: Uint8Array): TaggedChunk {
  let parsed: unknown;

  try {
    parsed = JSON.parse(utf8.decode(bytes));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StreamDecodeError(`stream chunk is not valid JSON: ${reason}`);
  }

  if (!isRecord(parsed) || typeof parsed.type !== 'string') {
    throw new StreamDecodeError('stream chunk has no "type" discriminant');
  }

  return { type: parsed.type, payload: parsed };
}

function toStatus(chunk: Record<string, unknown>): StopStatus {
  const { delta, usage } = chunk;

  if (!isRecord(delta) || !isRecord(usage)) {
    throw new StreamDecodeError('message_delta chunk is missing delta or usage');
  }

  const stopReason = delta.stop_reason ?? null;
  const stopSequence = delta.stop_sequence ?? null;
  const outputTokens = usage.output_tokens;

  if (!isNullableString(stopReason) || !isNullableString(stopSequence)) {
    throw new StreamDecodeError('message_delta chunk has a malformed stop reason or stop sequence');
  }

  if (typeof outputTokens !== 'number') {
    throw new StreamDecodeError('message_delta chunk has no output token count');
  }

  return {
    stop_reason: stopReason,
    stop_sequence: stopSequence,
    output_tokens: outputTokens,
  };
}

export function decodeStreamChunk(bytes: Uint8Array): StreamEvent {
  const { type, payload: chunk } = parsePayload(bytes);

  if (type === 'message_delta') {
    return { kind: 'status-delta', status: toStatus(chunk) };
  }

  if (type === 'content_block_delta') {
    const { delta } = chunk;

    if (!isRecord(delta)) {
      throw new StreamDecodeError('content_block_delta chunk has no delta');
    }

    if (delta.type === 'text_delta') {
      if (typeof delta.text !== 'string') {
        throw new StreamDecodeError('text_delta chunk has no text');
      }
      return { kind: 'text-delta', text: delta.text };
    }
  }

  return { kind: 'other', type };
}

export async function accumulateStream(events: AsyncIterable<StreamEvent>): Promise<LLMResponse> {
  let text = '';
  let status: StopStatus | null = null;

  for await (const event of events) {
    switch (event.kind) {
      case 'text-delta':
        text += event.text;
        break;
      case 'status-delta':
        status = event.status;
        break;
      default:
        break;
    }
  }

  return { text, status };
}
