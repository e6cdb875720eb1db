import { z } from 'zod';
import { Project } from '../types/project';

const StoredProfileSchema = z.object({
  name: z.string(),
  species: z.string().default(''),
  physical_description: z.string().default(''),
  clothing: z.string().optional(),
  distinctive_features: z.string().optional(),
  personality_traits: z.string().optional(),
});

const StoredStorySchema = z.object({
  id: z.string(),
  metadata: z.object({
    title: z.string(),
    language: z.string(),
    complexity: z.string(),
    vocabulary_diversity: z.string(),
    age_group: z.string(),
    num_pages: z.number().int(),
    words_per_page: z.number().int(),
    genre: z.string().optional(),
    art_style: z.string().optional(),
    user_prompt: z.string().optional(),
  }),
  pages: z.array(
    z.object({
      page_number: z.number().int(),
      text: z.string(),
      image_url: z.string().optional(),
      image_prompt: z.string().optional(),
    })
  ),
  characters: z.array(StoredProfileSchema).default([]),
  created_at: z.string(),
  updated_at: z.string(),
});

const StoredArtBibleSchema = z.object({
  prompt: z.string(),
  art_style: z.string(),
  image_url: z.string().optional(),
  local_image_path: z.string().optional(),
  style_notes: z.string().optional(),
  color_palette: z.string().optional(),
  lighting_style: z.string().optional(),
  brush_technique: z.string().optional(),
});

const StoredReferenceSchema = z.object({
  character_name: z.string(),
  prompt: z.string(),
  image_url: z.string().optional(),
  local_image_path: z.string().optional(),
  species: z.string().optional(),
  physical_description: z.string().optional(),
  clothing: z.string().optional(),
  distinctive_features: z.string().optional(),
});

/** Shape of a project file on disk. Older files may lack the list fields. */
export const ProjectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  status: z.enum(['draft', 'story_generated', 'prompts_generated', 'images_generated', 'completed']),
  story: StoredStorySchema,
  characterProfiles: z.array(StoredProfileSchema).default([]),
  artBible: StoredArtBibleSchema.optional(),
  characterReferences: z.array(StoredReferenceSchema).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
});
