import { EnvConfig, env as defaultEnv } from '../../config/env';
import { ImageGenerationProvider, TextGenerationProvider } from '../../types/providers';
import { ApiError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { GeminiTextProvider } from './geminiTextProvider';
import { OllamaTextProvider } from './ollamaTextProvider';
import { OpenAIImageProvider } from './openaiImageProvider';
import { OpenAITextProvider } from './openaiTextProvider';
import { RetryPolicy } from './providerErrors';
import { StubImageProvider } from './stubImageProvider';

function retryPolicy(config: EnvConfig): RetryPolicy {
  return { maxRetries: config.providerMaxRetries, delayMs: config.providerRetryDelayMs };
}

function requireKey(value: string | undefined, variable: string, provider: string): string {
  if (!value) {
    throw new ApiError(`${variable} is required when using the ${provider} provider`, 500);
  }
  return value;
}

export function createTextProvider(config: EnvConfig = defaultEnv): TextGenerationProvider {
  logger.info({ provider: config.textProvider }, '[Providers] Text provider selected');
  switch (config.textProvider) {
    case 'openai':
      return new OpenAITextProvider({
        apiKey: requireKey(config.openaiApiKey, 'OPENAI_API_KEY', 'openai'),
        baseUrl: config.openaiBaseUrl,
        model: config.openaiTextModel,
        timeoutMs: config.providerTimeoutMs,
        retry: retryPolicy(config),
      });
    case 'gemini':
      return new GeminiTextProvider({
        apiKey: requireKey(config.geminiApiKey, 'GEMINI_API_KEY', 'gemini'),
        model: config.geminiTextModel,
        timeoutMs: config.providerTimeoutMs,
        retry: retryPolicy(config),
      });
    case 'ollama':
      return new OllamaTextProvider({
        baseUrl: config.ollamaBaseUrl,
        model: config.ollamaModel,
        timeoutMs: config.providerTimeoutMs,
        retry: retryPolicy(config),
      });
  }
}

export function createImageProvider(config: EnvConfig = defaultEnv): ImageGenerationProvider {
  logger.info({ provider: config.imageProvider }, '[Providers] Image provider selected');
  if (config.imageProvider === 'openai') {
    return new OpenAIImageProvider({
      apiKey: requireKey(config.openaiApiKey, 'OPENAI_API_KEY', 'openai'),
      baseUrl: config.openaiBaseUrl,
      model: config.openaiImageModel,
      timeoutMs: config.imageProviderTimeoutMs,
      retry: retryPolicy(config),
    });
  }
  return new StubImageProvider();
}
