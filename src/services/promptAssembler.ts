/**
 * Consistency Prompt Assembler
 *
 * Turns character profiles, an art bible and a scene into the exact prompt
 * text sent to the providers. Every function here is pure: identical inputs
 * always produce byte-identical output, which is what lets a rebuilt image
 * session reproduce the conditions of the original one.
 *
 * Section order is fixed: style / art-bible framing, then the character block
 * (story-introduction order), then the scene.
 */

import { ArtBible, CharacterReference } from '../types/artBible';
import { CharacterProfile, StoryMetadata } from '../types/story';
import { ValidationError } from '../utils/errorHandler';

const SECTION_SEPARATOR = '\n\n';
const PHYSICAL_DESCRIPTION_LIMIT = 100;
const DETAIL_LIMIT = 60;
const SCENE_LIMIT = 400;
const SCENE_FALLBACK_LIMIT = 200;

const ILLUSTRATION_QUALITY = "Vibrant colors, child-friendly, professional children's book illustration style.";

// character name -> reference prompt
export type CharacterReferenceMap = Readonly<Record<string, string>>;

/**
 * Truncates without cutting a word in half. Falls back to a hard cut when the
 * head of the text has no spaces.
 */
export function smartTruncate(text: string, maxLength: number): string {
  if (!text || text.length <= maxLength) return text;
  const truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  return lastSpace > 0 ? truncated.slice(0, lastSpace) : truncated;
}

function present(value: string | undefined | null): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * One-line visual description of a character. Optional fields that are
 * missing are left out entirely.
 */
export function describeCharacter(profile: CharacterProfile): string {
  const details: string[] = [];
  if (present(profile.species)) details.push(`a ${profile.species.trim()}`);
  if (present(profile.physical_description)) {
    details.push(smartTruncate(profile.physical_description.trim(), PHYSICAL_DESCRIPTION_LIMIT));
  }
  if (present(profile.distinctive_features)) {
    details.push(smartTruncate(profile.distinctive_features.trim(), DETAIL_LIMIT));
  }
  if (present(profile.clothing)) details.push(smartTruncate(profile.clothing.trim(), DETAIL_LIMIT));
  if (present(profile.personality_traits)) {
    details.push(smartTruncate(profile.personality_traits.trim(), DETAIL_LIMIT));
  }

  const name = present(profile.name) ? profile.name.trim() : '';
  if (!name) return details.join(', ');
  return details.length ? `${name} (${details.join(', ')})` : name;
}

function styleDetails(artBible: ArtBible): string[] {
  const lines: string[] = [];
  if (present(artBible.color_palette)) lines.push(`Color palette: ${artBible.color_palette.trim()}.`);
  if (present(artBible.lighting_style)) lines.push(`Lighting: ${artBible.lighting_style.trim()}.`);
  if (present(artBible.brush_technique)) lines.push(`Brush technique: ${artBible.brush_technique.trim()}.`);
  if (present(artBible.style_notes)) lines.push(`Style notes: ${artBible.style_notes.trim()}.`);
  return lines;
}

function characterBlock(characters: readonly CharacterProfile[], references?: CharacterReferenceMap): string {
  const lines = characters
    .map((profile) => {
      const description = describeCharacter(profile);
      if (!description) return '';
      const reference = present(profile.name) ? references?.[profile.name.trim()] : undefined;
      return present(reference)
        ? `- ${description}. Match the reference sheet already established for ${profile.name.trim()}.`
        : `- ${description}.`;
    })
    .filter(Boolean);
  return lines.length ? `Characters:\n${lines.join('\n')}` : '';
}

/**
 * Prompt for a single illustration (page, cover). With zero characters the
 * character block is empty, which is valid for landscape or title artwork.
 */
export function buildImagePrompt(
  sceneDescription: string,
  characterProfiles: readonly CharacterProfile[],
  styleDescriptor: string,
  artBible?: ArtBible,
  characterReferences?: CharacterReferenceMap
): string {
  const framing = [`A ${styleDescriptor.trim() || 'cartoon'} style children's book illustration.`];
  if (artBible) {
    framing.push('Keep the look defined by the art bible established earlier in this conversation.');
    framing.push(...styleDetails(artBible));
  }
  framing.push(ILLUSTRATION_QUALITY);

  const scene = smartTruncate(sceneDescription.trim(), SCENE_LIMIT);

  return [framing.join(' '), characterBlock(characterProfiles, characterReferences), `Scene: ${scene}`]
    .filter(Boolean)
    .join(SECTION_SEPARATOR);
}

export interface PrimedCharacter {
  /** Empty for an unnamed profile. */
  name: string;
  text: string;
  fromReference: boolean;
}

/** What a priming prompt says about each character, in profile order. */
export function primedCharacters(
  characterProfiles: readonly CharacterProfile[],
  characterReferences?: CharacterReferenceMap
): PrimedCharacter[] {
  const primed: PrimedCharacter[] = [];
  for (const profile of characterProfiles) {
    const name = present(profile.name) ? profile.name.trim() : '';
    const reference = name ? characterReferences?.[name] : undefined;
    if (present(reference)) {
      primed.push({ name, text: reference.trim(), fromReference: true });
      continue;
    }
    const description = describeCharacter(profile);
    if (description) primed.push({ name, text: description, fromReference: false });
  }
  return primed;
}

/**
 * Opening turn of an image session. Establishes the art bible and every
 * character's appearance before any page is requested. A character with an
 * entry in `characterReferences` is primed with that reference prompt,
 * otherwise with its profile description.
 */
export function buildPrimingPrompt(
  artBible: ArtBible,
  characterProfiles: readonly CharacterProfile[],
  characterReferences?: CharacterReferenceMap
): string {
  const framing = [
    "You are an expert children's book illustrator creating every illustration for one story.",
    `Art style: ${artBible.art_style.trim() || 'cartoon'}.`,
  ];
  if (present(artBible.prompt)) framing.push(`Art bible: ${artBible.prompt.trim()}`);
  framing.push(...styleDetails(artBible));

  const characterLines = primedCharacters(characterProfiles, characterReferences).map((primed) =>
    primed.fromReference ? `- ${primed.name}: ${primed.text}` : `- ${primed.text}`
  );

  const guidelines = [
    'Guidelines:',
    '- Every image must keep perfect visual consistency with this art bible.',
    '- Characters must look exactly the same in every illustration.',
    '- When I refer to the art bible or to previously created characters, reuse them exactly as designed.',
    "Respond briefly to acknowledge you're ready, then wait for my requests.",
  ].join('\n');

  return [framing.join('\n'), characterLines.length ? `Characters:\n${characterLines.join('\n')}` : '', guidelines]
    .filter(Boolean)
    .join(SECTION_SEPARATOR);
}

export interface ArtBibleRequest {
  artStyle: string;
  genre?: string;
  storyTitle?: string;
  additionalNotes?: string;
}

export function buildArtBiblePrompt(request: ArtBibleRequest): ArtBible {
  const artStyle = request.artStyle.trim();
  if (!artStyle) {
    throw new ValidationError('art_style must be a non-empty string');
  }

  const subject = [
    "Create an art bible reference sheet for a children's book",
    present(request.storyTitle) ? ` titled "${request.storyTitle.trim()}"` : '',
    present(request.genre) ? ` in the ${request.genre.trim()} genre` : '',
    '.',
  ].join('');

  const parts = [
    subject,
    `Art style: ${artStyle}.`,
    'Show one sample scene, a strip of palette swatches, lighting studies and brush or texture samples that define the visual language of the whole book.',
  ];
  if (present(request.additionalNotes)) parts.push(`Additional notes: ${request.additionalNotes.trim()}.`);
  parts.push('Do not include any text or lettering in the image.');

  return {
    prompt: parts.join(' '),
    art_style: artStyle,
    ...(present(request.additionalNotes) ? { style_notes: request.additionalNotes.trim() } : {}),
  };
}

export function buildCharacterReferencePrompt(
  character: CharacterProfile,
  artStyle: string,
  includeTurnaround = true
): CharacterReference {
  if (!present(character.name)) {
    throw new ValidationError('character.name must be a non-empty string');
  }
  const name = character.name.trim();
  const view = includeTurnaround
    ? 'Show the character from the front, the side and the back in a neutral pose on a plain background.'
    : 'Show the character from the front in a neutral pose on a plain background.';

  const prompt = [
    `Create a character reference sheet for ${describeCharacter(character)}.`,
    `Art style: ${artStyle.trim() || 'cartoon'}.`,
    view,
    `Keep proportions, colors and outfit exactly as described so ${name} can be redrawn consistently.`,
  ].join(' ');

  return {
    character_name: name,
    prompt,
    ...(present(character.species) ? { species: character.species } : {}),
    ...(present(character.physical_description) ? { physical_description: character.physical_description } : {}),
    ...(present(character.clothing) ? { clothing: character.clothing } : {}),
    ...(present(character.distinctive_features) ? { distinctive_features: character.distinctive_features } : {}),
  };
}

export function buildStoryPrompt(metadata: StoryMetadata, theme?: string, customPrompt?: string): string {
  const parts: string[] = [
    `Write a ${metadata.complexity} children's story in ${metadata.language} for ages ${metadata.age_group}.`,
    `The story should have exactly ${metadata.num_pages} pages, with each page containing about ${metadata.words_per_page} words appropriate for the age group.`,
  ];
  if (present(metadata.genre)) parts.push(`Genre: ${metadata.genre}.`);
  if (present(theme)) parts.push(`Theme: ${theme}.`);
  if (present(customPrompt)) parts.push(`Story idea: ${customPrompt}.`);
  parts.push(`Title: ${metadata.title}.`);
  parts.push(`Use ${metadata.vocabulary_diversity} vocabulary appropriate for the ${metadata.age_group} age group.`);
  parts.push(
    '\n\nFormat the story with clear page breaks. For each page, write:\n' +
      'Page X:\n[Story text for that page]\n\n' +
      'Make the story engaging, age-appropriate, and complete within the specified number of pages.'
  );
  return parts.join(' ');
}

export const SCENE_SUMMARY_SYSTEM_MESSAGE = `You are an expert at analyzing children's story text and identifying the main visual scene to illustrate.
Extract the KEY VISUAL MOMENT from the story page: the main action, character positions and activities, setting and emotional tone.
Use only the character names and species provided and do not invent appearance details.
Ignore narrative commentary, internal thoughts and abstract ideas that cannot be drawn.
Return ONLY a concise scene description (30-50 words) that an illustrator could draw.`;

export function buildSceneSummaryPrompt(pageText: string, characterProfiles: readonly CharacterProfile[]): string {
  const named = characterProfiles
    .slice(0, 3)
    .filter((profile) => present(profile.name))
    .map((profile) => (present(profile.species) ? `${profile.name} (a ${profile.species})` : profile.name));
  const context = named.length ? `\n\nMain characters in this story: ${named.join(', ')}` : '';
  return `Analyze this children's story page and describe the main scene to illustrate:${context}\n\nStory page text:\n${pageText}\n\nReturn only the scene description, nothing else.`;
}

/** Used when no summary could be produced by the text provider. */
export function fallbackSceneSummary(pageText: string): string {
  return smartTruncate(pageText.trim(), SCENE_FALLBACK_LIMIT);
}
