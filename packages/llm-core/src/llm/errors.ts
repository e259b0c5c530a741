export interface LLMClientErrorDetails {
  errorName?: string;
  httpStatus?: number;
}

/**
 * Request-level failure reported by the inference service: bad credentials,
 * unknown model id, throttling, validation or an exception raised mid-stream.
 */
export class LLMClientError extends Error {
  readonly errorName?: string;

  readonly httpStatus?: number;

  constructor(message: string, details: LLMClientErrorDetails = {}) {
    super(message);
    this.name = 'LLMClientError';
    this.errorName = details.errorName;
    this.httpStatus = details.httpStatus;
  }
}

export class StreamDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamDecodeError';
  }
}
