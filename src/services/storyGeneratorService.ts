import { v4 as uuidv4 } from 'uuid';
import { TextGenerationProvider } from '../types/providers';
import { Story, StoryMetadata, StoryPage } from '../types/story';
import { ProviderError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { buildStoryPrompt } from './promptAssembler';

const MIN_STORY_TOKENS = 1000;
const MAX_STORY_TOKENS = 8000;
const STORY_TEMPERATURE = 0.8;

const PAGE_MARKER = /(?:Page|Página)\s+(\d+):\s*/giu;

/** ~1.5 tokens per word plus 50% for page headers, clamped. */
export function storyTokenBudget(metadata: Pick<StoryMetadata, 'num_pages' | 'words_per_page'>): number {
  const words = metadata.num_pages * metadata.words_per_page;
  const tokens = Math.floor(words * 1.5 * 1.5);
  return Math.max(MIN_STORY_TOKENS, Math.min(tokens, MAX_STORY_TOKENS));
}

/**
 * Splits model output on "Page N:" / "Página N:" markers. Text before the
 * first marker is dropped, as are pages with no text.
 */
export function parseStoryPages(text: string): StoryPage[] {
  const pages: StoryPage[] = [];
  const markers = Array.from(text.matchAll(PAGE_MARKER));

  markers.forEach((marker, i) => {
    const start = (marker.index ?? 0) + marker[0].length;
    const end = markers[i + 1]?.index ?? text.length;
    const body = text.slice(start, end).trim();
    const pageNumber = Number.parseInt(marker[1] ?? '', 10);
    if (body && !Number.isNaN(pageNumber)) {
      pages.push({ page_number: pageNumber, text: body });
    }
  });
  return pages;
}

export interface GenerateStoryOptions {
  theme?: string;
  customPrompt?: string;
  /** Text model for this story instead of the configured one. */
  model?: string;
}

export function createStoryGeneratorService(textProvider: TextGenerationProvider) {
  async function generateStory(metadata: StoryMetadata, options: GenerateStoryOptions = {}): Promise<Story> {
    const prompt = buildStoryPrompt(metadata, options.theme, options.customPrompt);
    const maxTokens = storyTokenBudget(metadata);
    logger.info(
      {
        title: metadata.title,
        pages: metadata.num_pages,
        wordsPerPage: metadata.words_per_page,
        maxTokens,
        ...(options.model ? { model: options.model } : {}),
      },
      '[StoryGenerator] Generating story'
    );

    const text = await textProvider.generate(prompt, {
      temperature: STORY_TEMPERATURE,
      maxTokens,
      ...(options.model ? { model: options.model } : {}),
    });
    const pages = parseStoryPages(text);
    if (!pages.length) {
      logger.error({ length: text.length, preview: text.slice(0, 200) }, '[StoryGenerator] No pages in story text');
      throw new ProviderError(textProvider.name, 'malformed response: story text contains no "Page N:" sections');
    }

    const now = new Date().toISOString();
    logger.info({ title: metadata.title, parsedPages: pages.length }, '[StoryGenerator] Story generated');
    // characters are extracted on demand by a separate task
    return {
      id: uuidv4(),
      metadata: { ...metadata, ...(options.customPrompt ? { user_prompt: options.customPrompt } : {}) },
      pages,
      characters: [],
      created_at: now,
      updated_at: now,
    };
  }

  return { generateStory, parseStoryPages };
}

export type StoryGeneratorService = ReturnType<typeof createStoryGeneratorService>;
