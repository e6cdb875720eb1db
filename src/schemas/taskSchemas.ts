import { z } from 'zod';
import { getStoryConfig } from '../config/storyConfig';

const { defaults, parameters } = getStoryConfig();

export const SubmitTaskSchema = z.object({
  kind: z.string().trim().min(1),
  input: z.unknown(),
});

export const CharacterProfileSchema = z.object({
  name: z.string().trim().min(1).max(100),
  species: z.string().trim().max(100).default(''),
  physical_description: z.string().trim().max(2000).default(''),
  clothing: z.string().trim().max(1000).optional(),
  distinctive_features: z.string().trim().max(1000).optional(),
  personality_traits: z.string().trim().max(1000).optional(),
});

// model name understood by the configured text provider
const TextModelSchema = z.string().trim().min(1).max(200);

export const StoryGenerationInputSchema = z.object({
  title: z.string().trim().min(1).max(200),
  language: z.string().trim().min(1).default(defaults.language),
  complexity: z.string().trim().min(1).default(defaults.complexity),
  vocabulary_diversity: z.string().trim().min(1).default(defaults.vocabulary_diversity),
  age_group: z.string().trim().min(1).default(defaults.age_group),
  num_pages: z.number().int().min(1).max(50).default(defaults.num_pages),
  words_per_page: z
    .number()
    .int()
    .min(parameters.words_per_page.min)
    .max(parameters.words_per_page.max)
    .default(defaults.words_per_page),
  genre: z
    .string()
    .trim()
    .max(100)
    .optional()
    .transform((value) => value || defaults.genre),
  art_style: z
    .string()
    .trim()
    .max(200)
    .optional()
    .transform((value) => value || defaults.art_style),
  theme: z.string().trim().max(500).optional(),
  custom_prompt: z.string().trim().max(4000).optional(),
  text_model: TextModelSchema.optional(),
});

const StoryPageInputSchema = z.object({
  page_number: z.number().int().min(0).default(0),
  text: z.string(),
});

export const CharacterExtractionInputSchema = z.object({
  pages: z
    .array(StoryPageInputSchema)
    .min(1)
    .refine((pages) => pages.some((page) => page.text.trim() !== ''), 'at least one page must have text'),
  project_id: z.string().trim().min(1).optional(),
  text_model: TextModelSchema.optional(),
});

const ImageSizeSchema = z.enum(['1024x1024', '1024x1536', '1536x1024', 'auto']);
const ImageQualitySchema = z.enum(['low', 'medium', 'high']);
const StoryIdSchema = z.string().trim().min(1).max(128);

export const PageImageInputSchema = z.object({
  story_id: StoryIdSchema,
  page_number: z.number().int().min(1),
  scene_text: z.string().trim().max(8000).optional(),
  characters: z.array(CharacterProfileSchema).optional(),
  art_style: z.string().trim().min(1).optional(),
  custom_prompt: z.string().trim().max(4000).optional(),
  size: ImageSizeSchema.optional(),
  quality: ImageQualitySchema.optional(),
});

export const ArtBibleSchema = z.object({
  prompt: z.string().trim().min(1).max(8000),
  art_style: z.string().trim().min(1).max(200),
  style_notes: z.string().trim().optional(),
  color_palette: z.string().trim().optional(),
  lighting_style: z.string().trim().optional(),
  brush_technique: z.string().trim().optional(),
});

export const ArtBibleImageInputSchema = z.object({
  story_id: StoryIdSchema,
  art_bible: ArtBibleSchema.optional(),
  size: ImageSizeSchema.optional(),
  quality: ImageQualitySchema.optional(),
});

export const CharacterReferenceImageInputSchema = z.object({
  story_id: StoryIdSchema,
  character_name: z.string().trim().min(1).max(100),
  include_turnaround: z.boolean().default(true),
  size: ImageSizeSchema.optional(),
  quality: ImageQualitySchema.optional(),
});

/** A story plus its characters and page illustrations, as one task. */
export const ProjectCreationInputSchema = StoryGenerationInputSchema.extend({
  extract_characters: z.boolean().default(true),
  illustrate: z.boolean().default(true),
  size: ImageSizeSchema.optional(),
  quality: ImageQualitySchema.optional(),
});

export type SubmitTaskRequest = z.infer<typeof SubmitTaskSchema>;
export type StoryGenerationInput = z.infer<typeof StoryGenerationInputSchema>;
export type ProjectCreationInput = z.infer<typeof ProjectCreationInputSchema>;
export type CharacterExtractionInput = z.infer<typeof CharacterExtractionInputSchema>;
export type PageImageInput = z.infer<typeof PageImageInputSchema>;
export type ArtBibleImageInput = z.infer<typeof ArtBibleImageInputSchema>;
export type CharacterReferenceImageInput = z.infer<typeof CharacterReferenceImageInputSchema>;
