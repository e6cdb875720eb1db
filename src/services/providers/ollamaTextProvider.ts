import axios from 'axios';
import { TextGenerationParams, TextGenerationProvider } from '../../types/providers';
import { ProviderError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { RetryPolicy, withRetry } from './providerErrors';

export interface OllamaTextProviderOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  retry?: RetryPolicy;
}

interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  system?: string;
  options?: { temperature?: number; num_predict?: number };
}

interface OllamaGenerateResponse {
  response?: unknown;
}

/** Local models served by Ollama (`POST /api/generate`, non-streaming). */
export class OllamaTextProvider implements TextGenerationProvider {
  readonly name = 'ollama';

  constructor(private readonly options: OllamaTextProviderOptions) {}

  async generate(prompt: string, params: TextGenerationParams = {}): Promise<string> {
    const model = params.model ?? this.options.model;
    const body: OllamaGenerateRequest = { model, prompt, stream: false };
    if (params.systemMessage) body.system = params.systemMessage;
    if (params.temperature !== undefined || params.maxTokens !== undefined) {
      body.options = {};
      if (params.temperature !== undefined) body.options.temperature = params.temperature;
      if (params.maxTokens !== undefined) body.options.num_predict = params.maxTokens;
    }

    const started = Date.now();
    const data = await withRetry(
      this.name,
      async () => {
        const response = await axios.post<OllamaGenerateResponse>(`${this.options.baseUrl}/api/generate`, body, {
          timeout: this.options.timeoutMs,
          headers: { 'Content-Type': 'application/json' },
        });
        return response.data;
      },
      this.options.retry
    );

    if (typeof data?.response !== 'string') {
      throw new ProviderError(this.name, 'malformed response: missing "response" text');
    }
    logger.debug(
      { model, ms: Date.now() - started, length: data.response.length },
      '[Ollama] Generated text'
    );
    return data.response;
  }
}
