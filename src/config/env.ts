// Centralized environment configuration
// Loads .env via index.ts (dotenv.config) at process start

export type TextProviderName = 'ollama' | 'openai' | 'gemini';
export type ImageProviderName = 'openai' | 'stub';

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  // Logging
  logLevel: string;
  // Provider selection
  textProvider: TextProviderName;
  imageProvider: ImageProviderName;
  // OpenAI (text + conversation image generation)
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiTextModel: string;
  openaiImageModel: string;
  // Gemini
  geminiApiKey?: string;
  geminiTextModel: string;
  // Ollama
  ollamaBaseUrl: string;
  ollamaModel: string;
  // Provider call policy
  providerTimeoutMs: number;
  imageProviderTimeoutMs: number;
  providerMaxRetries: number; // 0 disables retries
  providerRetryDelayMs: number;
  // Task orchestrator
  taskWorkerConcurrency: number;
  taskRetentionMs: number; // 0 keeps terminal tasks for the life of the process
  taskRunningTimeoutMs: number; // 0 lets running tasks run forever
  // Project store
  dataDir: string;
  // CORS
  corsOrigins: string[];
}

function normalizeInt(value: string | undefined, fallback: number, min = 0): number {
  if (value == null || value.trim() === '') return fallback;
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) return fallback;
  return Math.max(min, n);
}

function normalizeTextProvider(value: string | undefined): TextProviderName {
  const v = (value || '').toLowerCase();
  if (v === 'openai' || v === 'gemini') return v;
  return 'ollama';
}

function normalizeImageProvider(value: string | undefined): ImageProviderName {
  return (value || '').toLowerCase() === 'openai' ? 'openai' : 'stub';
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const nodeEnv = source.NODE_ENV || 'development';
  return {
    nodeEnv,
    port: normalizeInt(source.PORT, 5001, 1),
    logLevel: source.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
    textProvider: normalizeTextProvider(source.TEXT_PROVIDER),
    imageProvider: normalizeImageProvider(source.IMAGE_PROVIDER),
    openaiApiKey: source.OPENAI_API_KEY,
    openaiBaseUrl: (source.OPENAI_BASE_URL || 'https://api.openai.com/v1').replace(/\/$/, ''),
    openaiTextModel: source.OPENAI_TEXT_MODEL || 'gpt-4o-mini',
    openaiImageModel: source.OPENAI_IMAGE_MODEL || 'gpt-4o',
    // Accept the Google SDK's own variable name as well
    geminiApiKey: source.GEMINI_API_KEY || source.GOOGLE_GENAI_API_KEY,
    geminiTextModel: source.GEMINI_TEXT_MODEL || 'gemini-2.5-flash',
    ollamaBaseUrl: (source.OLLAMA_BASE_URL || 'http://localhost:11434').replace(/\/$/, ''),
    ollamaModel: source.OLLAMA_MODEL || 'granite4:small-h',
    providerTimeoutMs: normalizeInt(source.PROVIDER_TIMEOUT_MS, 120000, 1000),
    // Conversation image turns regularly take 2-4 minutes
    imageProviderTimeoutMs: normalizeInt(source.IMAGE_PROVIDER_TIMEOUT_MS, 300000, 1000),
    providerMaxRetries: normalizeInt(source.PROVIDER_MAX_RETRIES, 0),
    providerRetryDelayMs: normalizeInt(source.PROVIDER_RETRY_DELAY_MS, 2000),
    taskWorkerConcurrency: normalizeInt(source.TASK_WORKER_CONCURRENCY, 4, 1),
    taskRetentionMs: normalizeInt(source.TASK_RETENTION_MS, 0),
    taskRunningTimeoutMs: normalizeInt(source.TASK_RUNNING_TIMEOUT_MS, 0),
    dataDir: source.DATA_DIR || './data',
    corsOrigins: (source.CORS_ORIGINS || '')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
  };
}

export const env: EnvConfig = loadEnv();
