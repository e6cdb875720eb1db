import { GoogleGenAI } from '@google/genai';
import { TextGenerationParams, TextGenerationProvider } from '../../types/providers';
import { ProviderError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { RetryPolicy, withRetry } from './providerErrors';

export interface GeminiTextProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  retry?: RetryPolicy;
}

export class GeminiTextProvider implements TextGenerationProvider {
  readonly name = 'gemini';
  private readonly ai: GoogleGenAI;

  constructor(private readonly options: GeminiTextProviderOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey, httpOptions: { timeout: options.timeoutMs } });
  }

  async generate(prompt: string, params: TextGenerationParams = {}): Promise<string> {
    const model = params.model ?? this.options.model;
    const response = await withRetry(
      this.name,
      () =>
        this.ai.models.generateContent({
          model,
          contents: prompt,
          config: {
            ...(params.systemMessage ? { systemInstruction: params.systemMessage } : {}),
            ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
            ...(params.maxTokens !== undefined ? { maxOutputTokens: params.maxTokens } : {}),
          },
        }),
      this.options.retry
    );

    const text = response.text;
    if (!text) {
      throw new ProviderError(this.name, 'malformed response: no text in candidates');
    }
    logger.debug({ model, length: text.length }, '[GeminiText] Generated text');
    return text;
  }
}
