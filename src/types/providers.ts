export interface TextGenerationParams {
  /** Overrides the provider's configured model for this call. */
  model?: string;
  systemMessage?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface TextGenerationProvider {
  readonly name: string;
  generate(prompt: string, params?: TextGenerationParams): Promise<string>;
}

export type ImageSize = '1024x1024' | '1024x1536' | '1536x1024' | 'auto';
export type ImageQuality = 'low' | 'medium' | 'high';

export interface ImageGenerationOptions {
  size?: ImageSize;
  quality?: ImageQuality;
}

export interface ImageResult {
  // http(s) URL or data: URL
  imageUrl: string;
}

/**
 * Conversational image provider. A session handle returned by `openSession`
 * stays the same for the life of the conversation; the adapter tracks any
 * per-turn ids internally.
 */
export interface ImageGenerationProvider {
  readonly name: string;
  openSession(): Promise<string>;
  /** Text-only turn that establishes context; produces no image. */
  prime(sessionId: string, prompt: string): Promise<void>;
  generateInSession(sessionId: string, prompt: string, options?: ImageGenerationOptions): Promise<ImageResult>;
  generate(prompt: string, options?: ImageGenerationOptions): Promise<ImageResult>;
  /** Drops any adapter-side state for the handle. */
  closeSession(sessionId: string): void;
}
