import { z } from 'zod';
import { CharacterProfileSchema } from './taskSchemas';

export const StorySessionSchema = z.object({
  story_id: z.string().trim().min(1).max(128),
});

export const ArtBiblePromptSchema = z.object({
  art_style: z.string().trim().min(1).max(200),
  genre: z.string().trim().max(100).optional(),
  story_title: z.string().trim().max(200).optional(),
  additional_notes: z.string().trim().max(2000).optional(),
});

export const CharacterReferencePromptSchema = z.object({
  character: CharacterProfileSchema,
  art_style: z.string().trim().min(1).max(200),
  include_turnaround: z.boolean().default(true),
});

export type StorySessionRequest = z.infer<typeof StorySessionSchema>;
export type ArtBiblePromptRequest = z.infer<typeof ArtBiblePromptSchema>;
export type CharacterReferencePromptRequest = z.infer<typeof CharacterReferencePromptSchema>;
