import axios from 'axios';
import { TextGenerationParams, TextGenerationProvider } from '../../types/providers';
import { ProviderError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { RetryPolicy, withRetry } from './providerErrors';

export interface OpenAITextProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  retry?: RetryPolicy;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
}

/** OpenAI-compatible chat completions endpoint. */
export class OpenAITextProvider implements TextGenerationProvider {
  readonly name = 'openai';

  constructor(private readonly options: OpenAITextProviderOptions) {}

  async generate(prompt: string, params: TextGenerationParams = {}): Promise<string> {
    const model = params.model ?? this.options.model;
    const messages: ChatMessage[] = [];
    if (params.systemMessage) messages.push({ role: 'system', content: params.systemMessage });
    messages.push({ role: 'user', content: prompt });

    const data = await withRetry(
      this.name,
      async () => {
        const response = await axios.post<ChatCompletionResponse>(
          `${this.options.baseUrl}/chat/completions`,
          {
            model,
            messages,
            temperature: params.temperature ?? 0.7,
            ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
          },
          {
            timeout: this.options.timeoutMs,
            headers: {
              Authorization: `Bearer ${this.options.apiKey}`,
              'Content-Type': 'application/json',
            },
          }
        );
        return response.data;
      },
      this.options.retry
    );

    const content = data?.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new ProviderError(this.name, 'malformed response: no message content in first choice');
    }
    logger.debug({ model, length: content.length }, '[OpenAIText] Generated text');
    return content;
  }
}
