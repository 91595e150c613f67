import { z } from 'zod';
import { LlmRequestError, completionStatusCode } from './errors';

export interface HttpResponseLike {
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetcher = (input: {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}) => Promise<HttpResponseLike>;

export const fetchHttp: HttpFetcher = (input) =>
  fetch(input.url, { method: input.method, headers: input.headers, body: input.body, signal: input.signal });

export interface ChatCompletionRequest {
  systemPrompt?: string;
  prompt: string;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

export interface OpenAiChatClientOptions {
  apiKey?: string;
  model?: string;
  endpoint?: string;
  timeoutMs?: number;
  fetcher?: HttpFetcher;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/** Minimal client for OpenAI-compatible `/chat/completions` endpoints, at temperature 0. */
export class OpenAiChatClient {
  readonly model: string;
  readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetcher: HttpFetcher;

  constructor(options: OpenAiChatClientOptions = {}) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.endpoint = options.endpoint ?? 'https://api.openai.com/v1/chat/completions';
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetcher = options.fetcher ?? fetchHttp;
  }

  async complete(request: ChatCompletionRequest): Promise<string> {
    if (!this.apiKey) {
      throw new LlmRequestError('API key is missing for chat completion request.', {
        code: 'not_configured',
        retryable: false,
      });
    }

    const messages = request.systemPrompt
      ? [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ]
      : [{ role: 'user', content: request.prompt }];
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const linked = linkSignals(timeout, request.signal);
    const signal = linked.signal;

    let raw: unknown;
    try {
      const response = await this.fetcher({
        url: this.endpoint,
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: 0,
          max_tokens: request.maxOutputTokens ?? 16,
        }),
        signal,
      });

      if (response.status < 200 || response.status >= 300) {
        const text = await response.text();
        throw new LlmRequestError(`chat completion failed with HTTP ${response.status}: ${text}`, {
          code: completionStatusCode(response.status),
          statusCode: response.status,
        });
      }

      raw = await response.json();
    } catch (error) {
      if (error instanceof LlmRequestError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      const isTimeout = timeout.aborted || /timeout|aborted|abort/i.test(message);
      throw new LlmRequestError(`chat completion network request failed: ${message}`, {
        code: isTimeout ? 'timeout' : 'network_error',
        retryable: true,
        cause: error,
      });
    } finally {
      linked.release();
    }

    const parsed = chatCompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LlmRequestError(`chat completion returned an unexpected payload: ${parsed.error.message}`, {
        code: 'invalid_response',
        retryable: false,
      });
    }
    return (parsed.data.choices[0].message.content ?? '').trim();
  }
}

/**
 * Signal that aborts when any input does. `release` detaches it from the
 * inputs, which may outlive the request (a search run's signal does).
 */
function linkSignals(...inputs: Array<AbortSignal | undefined>): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];
  const release = (): void => {
    for (const detach of detachers.splice(0)) {
      detach();
    }
  };

  for (const input of inputs) {
    if (!input) {
      continue;
    }
    if (input.aborted) {
      controller.abort(input.reason);
      break;
    }
    const onAbort = (): void => {
      controller.abort(input.reason);
      release();
    };
    input.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => input.removeEventListener('abort', onAbort));
  }
  if (controller.signal.aborted) {
    release();
  }
  return { signal: controller.signal, release };
}
