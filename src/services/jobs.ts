import { ProjectRepository } from '../repository/projectRepository';
import {
  ArtBibleImageInputSchema,
  CharacterExtractionInputSchema,
  CharacterReferenceImageInputSchema,
  PageImageInputSchema,
  ProjectCreationInputSchema,
  StoryGenerationInput,
  StoryGenerationInputSchema,
} from '../schemas/taskSchemas';
import { Project, ProjectStatus } from '../types/project';
import { CharacterProfile, Story, StoryMetadata } from '../types/story';
import { NotFoundError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { CharacterExtractorService } from './characterExtractorService';
import { ImageGeneratorService } from './imageGeneratorService';
import { StoryGeneratorService } from './storyGeneratorService';
import { defineJob, JobRegistry } from './taskOrchestrator';

export interface JobDependencies {
  storyGenerator: StoryGeneratorService;
  characterExtractor: CharacterExtractorService;
  imageGenerator: ImageGeneratorService;
  projects: ProjectRepository;
}

export type StoryGenerationResult = Story & { project_id: string };

export interface CharacterExtractionResult {
  characters: CharacterProfile[];
  project_id?: string;
  saved: boolean;
}

export interface ProjectCreationResult {
  project_id: string;
  status: ProjectStatus;
  title: string;
  characters: string[];
  pages: Array<{ page_number: number; image_url: string | null }>;
}

export function createJobRegistry(deps: JobDependencies): JobRegistry {
  const { storyGenerator, characterExtractor, imageGenerator, projects } = deps;

  // every generated story is saved as a project under the story id
  async function generateAndSave(input: StoryGenerationInput): Promise<Story> {
    const metadata: StoryMetadata = {
      title: input.title,
      language: input.language,
      complexity: input.complexity,
      vocabulary_diversity: input.vocabulary_diversity,
      age_group: input.age_group,
      num_pages: input.num_pages,
      words_per_page: input.words_per_page,
      genre: input.genre,
      art_style: input.art_style,
    };
    const story = await storyGenerator.generateStory(metadata, {
      theme: input.theme,
      customPrompt: input.custom_prompt,
      model: input.text_model,
    });
    const project: Project = {
      id: story.id,
      name: metadata.title,
      status: 'story_generated',
      story,
      characterProfiles: [],
      characterReferences: [],
      createdAt: story.created_at,
      updatedAt: story.updated_at,
    };
    await projects.save(project);
    return story;
  }

  return {
    'story-generation': defineJob(StoryGenerationInputSchema, async (input): Promise<StoryGenerationResult> => {
      const story = await generateAndSave(input);
      return { ...story, project_id: story.id };
    }),

    'project-creation': defineJob(ProjectCreationInputSchema, async (input): Promise<ProjectCreationResult> => {
      const story = await generateAndSave(input);
      const projectId = story.id;
      logger.info({ projectId, pages: story.pages.length }, '[Jobs] Building project');

      if (input.extract_characters) {
        const characters = await characterExtractor.extractAndProfile(story.pages, { model: input.text_model });
        await projects.update(projectId, (current) => ({
          ...current,
          characterProfiles: characters,
          story: { ...current.story, characters },
        }));
      }

      if (input.illustrate) {
        // pages go one at a time so each turn builds on the last in the session
        for (const page of story.pages) {
          if (!page.text.trim()) continue;
          await imageGenerator.generatePageImage({
            storyId: projectId,
            pageNumber: page.page_number,
            size: input.size,
            quality: input.quality,
          });
        }
      }

      const project = await projects.update(projectId, (current) => ({ ...current, status: 'completed' }));
      logger.info({ projectId }, '[Jobs] Project complete');
      return {
        project_id: projectId,
        status: project.status,
        title: project.name,
        characters: project.characterProfiles.map((profile) => profile.name),
        pages: project.story.pages.map((page) => ({ page_number: page.page_number, image_url: page.image_url ?? null })),
      };
    }),

    'character-extraction': defineJob(
      CharacterExtractionInputSchema,
      async (input): Promise<CharacterExtractionResult> => {
        const characters = await characterExtractor.extractAndProfile(input.pages, { model: input.text_model });
        if (!input.project_id) return { characters, saved: false };

        try {
          await projects.update(input.project_id, (current) => ({
            ...current,
            characterProfiles: characters,
            story: { ...current.story, characters },
          }));
          return { characters, project_id: input.project_id, saved: true };
        } catch (err) {
          if (!(err instanceof NotFoundError)) throw err;
          logger.warn({ projectId: input.project_id }, '[Jobs] Project not found; characters not saved');
          return { characters, project_id: input.project_id, saved: false };
        }
      }
    ),

    'page-image': defineJob(PageImageInputSchema, (input) =>
      imageGenerator.generatePageImage({
        storyId: input.story_id,
        pageNumber: input.page_number,
        sceneText: input.scene_text,
        characters: input.characters,
        artStyle: input.art_style,
        customPrompt: input.custom_prompt,
        size: input.size,
        quality: input.quality,
      })
    ),

    'art-bible-image': defineJob(ArtBibleImageInputSchema, (input) =>
      imageGenerator.generateArtBibleImage({
        storyId: input.story_id,
        artBible: input.art_bible,
        size: input.size,
        quality: input.quality,
      })
    ),

    'character-reference-image': defineJob(CharacterReferenceImageInputSchema, (input) =>
      imageGenerator.generateCharacterReferenceImage({
        storyId: input.story_id,
        characterName: input.character_name,
        includeTurnaround: input.include_turnaround,
        size: input.size,
        quality: input.quality,
      })
    ),
  };
}
