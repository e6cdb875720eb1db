import speciesData from '../data/species.json';
import { TextGenerationProvider } from '../types/providers';
import { Character, CharacterProfile, StoryPage } from '../types/story';
import { errorMessage, ProviderError, ValidationError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

const EXTRACTION_SYSTEM_MESSAGE = `You identify the characters of children's stories for an illustrator.
Return valid JSON only, exactly in this shape:
{"characters": [{"name": "Character Name", "description": "Short physical description"}]}
Use the field names "name" and "description" for every character.
List every character in the order they first appear, using the names from the story.
Keep descriptions short and visual: species, colors, size and anything distinctive.`;

const PROFILE_SYSTEM_MESSAGE = `You write visual character profiles so an illustrator can draw a character the same way on every page.
Return valid JSON only, exactly in this shape:
{"species": "...", "physical_description": "...", "clothing": "...", "distinctive_features": "...", "personality_traits": "..."}
"species" must be concrete (human, girl, dog, mouse, dragon, butterfly), never "character" or "creature".
"clothing" is never empty; for animals without clothes say so ("no clothing, natural fur").
"distinctive_features" names at least one recognizable visual trait.
Be specific about colors, sizes and proportions and keep everything child-appropriate.`;

const GENERIC_SPECIES = new Set(speciesData.genericTerms);

const SPECIES_PATTERNS = speciesData.groups.map(
  (words) => new RegExp(`(?<!\\p{L})(${words.join('|')})(?!\\p{L})`, 'iu')
);

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(record: JsonRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return undefined;
}

/**
 * Parses the JSON object in a model reply, tolerating a surrounding markdown
 * code fence or chatter before and after the object.
 */
export function parseJsonObject(text: string): JsonRecord | null {
  let body = text.trim();
  if (body.startsWith('```')) {
    const lines = body.split('\n');
    body = lines.slice(1, lines[lines.length - 1]?.trim() === '```' ? -1 : undefined).join('\n');
  }
  const candidates = [body];
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start >= 0 && end > start) candidates.push(body.slice(start, end + 1));

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isRecord(parsed)) return parsed;
    } catch (err) {
      logger.debug({ reason: errorMessage(err) }, '[CharacterExtractor] Reply is not plain JSON');
    }
  }
  return null;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function findSpecies(text: string): string | undefined {
  for (const pattern of SPECIES_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) return match[1].toLowerCase();
  }
  return undefined;
}

/**
 * Concrete, capitalised species. A missing or generic answer is replaced by
 * the first known species word in the description, then in the name, then
 * "human".
 */
export function resolveSpecies(raw: string | undefined, description: string, name: string): string {
  const species = (raw ?? '').trim().toLowerCase();
  if (species && !GENERIC_SPECIES.has(species)) return capitalize(species);
  return capitalize(findSpecies(description) ?? findSpecies(name) ?? 'human');
}

export function storyContextOf(pages: readonly StoryPage[]): string {
  return pages.map((page) => `Page ${page.page_number}:\n${page.text}`).join('\n\n');
}

export interface ExtractionOptions {
  model?: string;
}

function modelParam(options: ExtractionOptions): { model?: string } {
  return options.model ? { model: options.model } : {};
}

export function createCharacterExtractorService(textProvider: TextGenerationProvider) {
  async function extractCharacters(pages: readonly StoryPage[], options: ExtractionOptions = {}): Promise<Character[]> {
    if (!pages.length || pages.every((page) => !page.text.trim())) {
      throw new ValidationError('Cannot extract characters from an empty story');
    }
    const story = pages.map((page) => `Page ${page.page_number}: ${page.text}`).join('\n\n');
    const reply = await textProvider.generate(
      `Extract all characters from this story:\n\n${story}\n\nReturn only the JSON object.`,
      { systemMessage: EXTRACTION_SYSTEM_MESSAGE, temperature: 0.3, ...modelParam(options) }
    );

    const data = parseJsonObject(reply);
    if (!data) {
      throw new ProviderError(textProvider.name, 'malformed response: character list is not valid JSON');
    }
    const list = data.characters;
    if (!Array.isArray(list)) {
      throw new ProviderError(textProvider.name, 'malformed response: missing "characters" array');
    }

    const characters = list.filter(isRecord).map((entry) => ({
      name: firstString(entry, ['name', 'character_name', 'character']) ?? 'Unknown',
      description:
        firstString(entry, ['description', 'physical_description', 'brief_description', 'desc']) ??
        'No description provided',
    }));
    logger.info({ count: characters.length }, '[CharacterExtractor] Characters extracted');
    return characters;
  }

  async function createCharacterProfile(
    character: Character,
    storyContext?: string,
    options: ExtractionOptions = {}
  ): Promise<CharacterProfile> {
    const prompt = [
      'Create a detailed character profile for illustration.',
      '',
      `Character Name: ${character.name}`,
      `Basic Description: ${character.description}`,
      ...(storyContext ? ['', `Story Context: ${storyContext}`] : []),
      '',
      'Return only the JSON object.',
    ].join('\n');

    const reply = await textProvider.generate(prompt, {
      systemMessage: PROFILE_SYSTEM_MESSAGE,
      temperature: 0.3,
      ...modelParam(options),
    });
    const data = parseJsonObject(reply);
    if (!data) {
      throw new ProviderError(textProvider.name, `malformed response: profile for ${character.name} is not valid JSON`);
    }

    const clothing = firstString(data, ['clothing']);
    const distinctive = firstString(data, ['distinctive_features']);
    const personality = firstString(data, ['personality_traits']);
    const profile: CharacterProfile = {
      name: character.name,
      species: resolveSpecies(firstString(data, ['species']), character.description, character.name),
      physical_description: firstString(data, ['physical_description']) ?? character.description,
      ...(clothing ? { clothing } : {}),
      ...(distinctive ? { distinctive_features: distinctive } : {}),
      ...(personality ? { personality_traits: personality } : {}),
    };
    logger.debug({ name: profile.name, species: profile.species }, '[CharacterExtractor] Profile created');
    return profile;
  }

  /** Extracts then profiles every character; characters whose profile fails are skipped. */
  async function extractAndProfile(
    pages: readonly StoryPage[],
    options: ExtractionOptions = {}
  ): Promise<CharacterProfile[]> {
    const characters = await extractCharacters(pages, options);
    const context = storyContextOf(pages);
    const profiles: CharacterProfile[] = [];
    for (const character of characters) {
      try {
        profiles.push(await createCharacterProfile(character, context, options));
      } catch (err) {
        logger.warn({ name: character.name, reason: errorMessage(err) }, '[CharacterExtractor] Skipping character');
      }
    }
    return profiles;
  }

  return { extractCharacters, createCharacterProfile, extractAndProfile };
}

export type CharacterExtractorService = ReturnType<typeof createCharacterExtractorService>;
