import type { ServerConfig } from '../config';
import { LlmRequestError } from '../llm/errors';
import { OpenAiChatClient, type HttpFetcher } from '../llm/openai';
import type { Logger } from '../logging';

export interface ChatModelAdapter {
  provider: 'openai' | 'none';
  generate(prompt: string, options?: { systemPrompt?: string; signal?: AbortSignal }): Promise<string>;
}

export class NoopChatModelAdapter implements ChatModelAdapter {
  provider: 'none' = 'none';

  async generate(_prompt: string): Promise<string> {
    throw new LlmRequestError('No chat model configured. Planning runs without an LLM hint.', {
      code: 'not_configured',
      retryable: false,
    });
  }
}

export class OpenAiChatModelAdapter implements ChatModelAdapter {
  provider: 'openai' = 'openai';

  constructor(private readonly client: OpenAiChatClient) {}

  generate(prompt: string, options: { systemPrompt?: string; signal?: AbortSignal } = {}): Promise<string> {
    return this.client.complete({ prompt, systemPrompt: options.systemPrompt, signal: options.signal });
  }
}

export function createChatModelAdapter(config: ServerConfig, logger: Logger, fetcher?: HttpFetcher): ChatModelAdapter {
  if (config.hint !== 'llm') {
    return new NoopChatModelAdapter();
  }

  if (!config.llm.apiKey) {
    logger.warn('llm.adapter.disabled', { reason: 'OPENAI_API_KEY is not set' });
    return new NoopChatModelAdapter();
  }

  const client = new OpenAiChatClient({
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    endpoint: config.llm.endpoint,
    timeoutMs: config.llm.timeoutMs,
    fetcher,
  });
  logger.info('llm.adapter.enabled', { provider: 'openai', model: client.model, endpoint: client.endpoint });
  return new OpenAiChatModelAdapter(client);
}
