export type LlmErrorCode =
  | 'not_configured'
  | 'auth_error'
  | 'rate_limit'
  | 'timeout'
  | 'server_error'
  | 'bad_request'
  | 'network_error'
  | 'invalid_response'
  | 'unknown';

export class LlmRequestError extends Error {
  constructor(
    message: string,
    public readonly options: {
      code: LlmErrorCode;
      statusCode?: number;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'LlmRequestError';
    this.cause = options.cause;
  }

  declare cause: unknown;

  get code(): LlmErrorCode {
    return this.options.code;
  }

  get retryable(): boolean {
    if (typeof this.options.retryable === 'boolean') {
      return this.options.retryable;
    }
    return ['timeout', 'rate_limit', 'server_error', 'network_error'].includes(this.options.code);
  }
}

const STATUS_CODES: ReadonlyMap<number, LlmErrorCode> = new Map<number, LlmErrorCode>([
  [401, 'auth_error'],
  [403, 'auth_error'],
  [408, 'timeout'],
  [429, 'rate_limit'],
]);

/**
 * Error code for a non-2xx chat-completion response. Whether the hint may ask
 * again follows from the code through {@link LlmRequestError.retryable}.
 */
export function completionStatusCode(statusCode: number): LlmErrorCode {
  const known = STATUS_CODES.get(statusCode);
  if (known) {
    return known;
  }
  if (statusCode >= 500) {
    return 'server_error';
  }
  return statusCode >= 400 ? 'bad_request' : 'unknown';
}
