import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';

const CONFIG_DIR = path.resolve(__dirname, '../../config');

const defaultsSchema = z.object({
  language: z.string().min(1),
  complexity: z.string().min(1),
  vocabulary_diversity: z.string().min(1),
  age_group: z.string().min(1),
  num_pages: z.number().int().positive(),
  words_per_page: z.number().int().positive(),
  genre: z.string().optional(),
  art_style: z.string().optional(),
});

const parametersSchema = z.object({
  languages: z.array(z.string()).nonempty(),
  complexities: z.array(z.string()).nonempty(),
  vocabulary_levels: z.array(z.string()).nonempty(),
  age_groups: z.array(z.string()).nonempty(),
  page_counts: z.array(z.number().int().positive()).nonempty(),
  words_per_page: z.object({ min: z.number().int().positive(), max: z.number().int().positive() }),
  genres: z.array(z.string()),
  art_styles: z.array(z.string()),
});

export type StoryDefaults = z.infer<typeof defaultsSchema>;
export type StoryParameters = z.infer<typeof parametersSchema>;

export interface StoryConfig {
  defaults: StoryDefaults;
  parameters: StoryParameters;
}

function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const fullPath = path.join(CONFIG_DIR, file);
  const parsed = schema.safeParse(JSON.parse(fs.readFileSync(fullPath, 'utf8')));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${file}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`);
  }
  return parsed.data;
}

let cached: StoryConfig | null = null;

/** Story defaults and allowed parameter lists from config/*.json, read once. */
export function getStoryConfig(): StoryConfig {
  if (cached) return cached;
  cached = {
    defaults: readJson('defaults.json', defaultsSchema),
    parameters: readJson('parameters.json', parametersSchema),
  };
  logger.debug({ dir: CONFIG_DIR }, '[Config] Story configuration loaded');
  return cached;
}
