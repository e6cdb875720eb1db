import { v4 as uuidv4 } from 'uuid';
import { ImageGenerationOptions, ImageGenerationProvider, ImageResult } from '../../types/providers';
import { ProviderError } from '../../utils/errorHandler';

/**
 * Placeholder images for development without an image API. Keeps the same
 * session bookkeeping as a real provider so the session flow is exercised.
 */
export class StubImageProvider implements ImageGenerationProvider {
  readonly name = 'stub-image';
  private readonly sessions = new Set<string>();

  async openSession(): Promise<string> {
    const handle = `stub_${uuidv4()}`;
    this.sessions.add(handle);
    return handle;
  }

  async prime(sessionId: string, _prompt: string): Promise<void> {
    this.assertKnown(sessionId);
  }

  async generateInSession(sessionId: string, prompt: string, options?: ImageGenerationOptions): Promise<ImageResult> {
    this.assertKnown(sessionId);
    return this.generate(prompt, options);
  }

  async generate(prompt: string, options: ImageGenerationOptions = {}): Promise<ImageResult> {
    return { imageUrl: placeholderUrl(prompt, options) };
  }

  closeSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private assertKnown(sessionId: string): void {
    if (!this.sessions.has(sessionId)) {
      throw new ProviderError(this.name, `unknown session ${sessionId}`);
    }
  }
}

export function placeholderUrl(prompt: string, options: ImageGenerationOptions = {}): string {
  const size = !options.size || options.size === 'auto' ? '1024x1024' : options.size;
  const words = prompt.split(/\s+/).filter(Boolean).slice(0, 3).map(encodeURIComponent);
  const text = words.length ? words.join('+') : 'Story+Image';
  return `https://via.placeholder.com/${size}?text=${text}`;
}
