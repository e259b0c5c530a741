import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  InvokeModelWithResponseStreamCommand,
  type InvokeModelWithResponseStreamCommandOutput,
  type ResponseStream,
} from '@aws-sdk/client-bedrock-runtime';

import { LLMClientError, StreamDecodeError } from './errors.js';
import { buildRequestBody } from './requestBuilder.js';
import { accumulateStream, decodeStreamChunk } from './streamAccumulator.js';
import type { LLMClient, LLMRequest, LLMResponse, StreamEvent } from './types.js';

/** The single capability the client needs from the SDK, so tests can pass a fake. */
export interface ResponseStreamSender {
  send(
    command: InvokeModelWithResponseStreamCommand,
  ): Promise<InvokeModelWithResponseStreamCommandOutput>;
}

export interface BedrockConnectionOptions {
  accessKeyId?: string;
  secretAccessKey?: string;
  region?: string;
}

/**
 * Uses static credentials only when key, secret and region are all present;
 * otherwise the SDK resolves credentials (and region, when none is given)
 * from the environment, shared config files or instance metadata.
 */
export function createBedrockClient(options: BedrockConnectionOptions): BedrockRuntimeClient {
  const { accessKeyId, secretAccessKey, region } = options;

  if (accessKeyId && secretAccessKey && region) {
    return new BedrockRuntimeClient({
      region,
      credentials: { accessKeyId, secretAccessKey },
    });
  }

  return new BedrockRuntimeClient(region ? { region } : {});
}

async function* decodeEvents(
  body: AsyncIterable<ResponseStream>,
): AsyncGenerator<StreamEvent> {
  for await (const event of body) {
    const bytes = event.chunk?.bytes;

    if (!bytes) {
      throw new StreamDecodeError('response stream event carried no chunk payload');
    }

    yield decodeStreamChunk(bytes);
  }
}

export class BedrockAnthropicClient implements LLMClient {
  private readonly sender: ResponseStreamSender;

  constructor(sender: ResponseStreamSender) {
    this.sender = sender;
  }

  static fromConnection(options: BedrockConnectionOptions): BedrockAnthropicClient {
    const runtime = createBedrockClient(options);
    return new BedrockAnthropicClient({
      send: (command) => runtime.send(command),
    });
  }

  async complete(req: LLMRequest): Promise<LLMResponse> {
    if (!req.model) {
      throw new Error('Model id is required to invoke Bedrock.');
    }

    const body = buildRequestBody({
      prompt: req.prompt,
      systemPrompt: req.systemPrompt,
      maxTokens: req.maxTokens,
    });

    const command = new InvokeModelWithResponseStreamCommand({
      modelId: req.model,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(body),
    });

    try {
      const response = await this.sender.send(command);

      if (!response.body) {
        throw new StreamDecodeError('Bedrock response did not include an event stream.');
      }

      return await accumulateStream(decodeEvents(response.body));
    } catch (error) {
      if (error instanceof BedrockRuntimeServiceException) {
        throw new LLMClientError(error.message, {
          errorName: error.name,
          httpStatus: error.$metadata.httpStatusCode,
        });
      }
      throw error;
    }
  }
}

export default BedrockAnthropicClient;
