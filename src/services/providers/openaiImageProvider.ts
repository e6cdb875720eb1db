import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ImageGenerationOptions, ImageGenerationProvider, ImageResult } from '../../types/providers';
import { ProviderError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { RetryPolicy, withRetry } from './providerErrors';

export interface OpenAIImageProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  retry?: RetryPolicy;
}

const contentItemSchema = z
  .object({
    type: z.string().optional(),
    image_url: z.union([z.string(), z.object({ url: z.string() })]).optional(),
    url: z.string().optional(),
  })
  .passthrough();

const outputItemSchema = z
  .object({
    type: z.string().optional(),
    result: z.string().nullish(),
    content: z.array(contentItemSchema).optional(),
  })
  .passthrough();

const responsesApiSchema = z
  .object({
    id: z.string().min(1),
    output: z.array(outputItemSchema).default([]),
  })
  .passthrough();

export type ResponsesApiOutputItem = z.infer<typeof outputItemSchema>;

function toImageUrl(value: string): string {
  if (value.startsWith('http') || value.startsWith('data:')) return value;
  return `data:image/png;base64,${value}`;
}

/**
 * Finds the generated image in a Responses API output list. Raw base64
 * results are returned as PNG data URLs.
 */
export function extractImageUrl(output: readonly ResponsesApiOutputItem[]): string | null {
  for (const item of output) {
    if (item.type === 'image_generation_call' && item.result) {
      return toImageUrl(item.result);
    }
    for (const content of item.content ?? []) {
      if (content.type !== 'image' && content.type !== 'output_image') continue;
      if (typeof content.image_url === 'string') return toImageUrl(content.image_url);
      if (content.image_url) return content.image_url.url;
      if (content.url) return content.url;
    }
  }
  return null;
}

/**
 * Conversation-based image generation over the OpenAI Responses API.
 *
 * Every turn returns a new response id that the next turn must reference via
 * `previous_response_id`. Callers hold a stable handle instead; this adapter
 * maps the handle to the latest response id so session identity never
 * changes between turns. Concurrent turns on one handle branch from the same
 * parent and the last to finish becomes the head.
 */
export class OpenAIImageProvider implements ImageGenerationProvider {
  readonly name = 'openai-image';
  // session handle -> latest response id (null before the first turn)
  private readonly heads = new Map<string, string | null>();

  constructor(private readonly options: OpenAIImageProviderOptions) {}

  async openSession(): Promise<string> {
    const handle = `conv_${uuidv4()}`;
    this.heads.set(handle, null);
    logger.info({ sessionId: handle, model: this.options.model }, '[OpenAIImage] Opened conversation');
    return handle;
  }

  async prime(sessionId: string, prompt: string): Promise<void> {
    const previous = this.headOf(sessionId);
    const response = await this.createResponse({ input: prompt, previousResponseId: previous });
    this.advance(sessionId, response.id);
    logger.info({ sessionId, responseId: response.id }, '[OpenAIImage] Primed conversation');
  }

  async generateInSession(
    sessionId: string,
    prompt: string,
    options: ImageGenerationOptions = {}
  ): Promise<ImageResult> {
    const previous = this.headOf(sessionId);
    const response = await this.createResponse({ input: prompt, previousResponseId: previous, image: options });
    this.advance(sessionId, response.id);
    return { imageUrl: this.imageFrom(response.output, response.id) };
  }

  async generate(prompt: string, options: ImageGenerationOptions = {}): Promise<ImageResult> {
    const response = await this.createResponse({ input: prompt, previousResponseId: null, image: options });
    return { imageUrl: this.imageFrom(response.output, response.id) };
  }

  closeSession(sessionId: string): void {
    this.heads.delete(sessionId);
  }

  get openSessionCount(): number {
    return this.heads.size;
  }

  // a turn that finishes after its handle was closed must not reopen it
  private advance(sessionId: string, responseId: string): void {
    if (this.heads.has(sessionId)) {
      this.heads.set(sessionId, responseId);
    }
  }

  private headOf(sessionId: string): string | null {
    const head = this.heads.get(sessionId);
    if (head === undefined) {
      throw new ProviderError(this.name, `unknown session ${sessionId}`);
    }
    return head;
  }

  private imageFrom(output: readonly ResponsesApiOutputItem[], responseId: string): string {
    const imageUrl = extractImageUrl(output);
    if (!imageUrl) {
      logger.error({ responseId, items: output.map((item) => item.type) }, '[OpenAIImage] No image in response');
      throw new ProviderError(this.name, 'malformed response: no image was generated');
    }
    return imageUrl;
  }

  private async createResponse(request: {
    input: string;
    previousResponseId: string | null;
    image?: ImageGenerationOptions;
  }): Promise<z.infer<typeof responsesApiSchema>> {
    const body = {
      model: this.options.model,
      input: request.input,
      ...(request.previousResponseId ? { previous_response_id: request.previousResponseId } : {}),
      ...(request.image
        ? {
            tools: [
              {
                type: 'image_generation',
                size: request.image.size ?? '1024x1024',
                quality: request.image.quality ?? 'high',
              },
            ],
          }
        : {}),
    };

    const started = Date.now();
    const data = await withRetry(
      this.name,
      async () => {
        const response = await axios.post<unknown>(`${this.options.baseUrl}/responses`, body, {
          timeout: this.options.timeoutMs,
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
          },
        });
        return response.data;
      },
      this.options.retry
    );

    const parsed = responsesApiSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(this.name, `malformed response: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`);
    }
    logger.debug(
      { responseId: parsed.data.id, ms: Date.now() - started, chained: !!request.previousResponseId },
      '[OpenAIImage] Response received'
    );
    return parsed.data;
  }
}
