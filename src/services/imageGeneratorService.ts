import { ProjectRepository } from '../repository/projectRepository';
import { ArtBible, CharacterReference } from '../types/artBible';
import { Project } from '../types/project';
import { ImageGenerationOptions, TextGenerationProvider } from '../types/providers';
import { CharacterProfile } from '../types/story';
import { errorMessage, NotFoundError, ValidationError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import {
  buildArtBiblePrompt,
  buildCharacterReferencePrompt,
  buildImagePrompt,
  buildSceneSummaryPrompt,
  fallbackSceneSummary,
  SCENE_SUMMARY_SYSTEM_MESSAGE,
} from './promptAssembler';
import { VisualSessionManager } from './sessionManager';

const DEFAULT_ART_STYLE = 'cartoon';

export interface PageImageRequest extends ImageGenerationOptions {
  storyId: string;
  pageNumber: number;
  sceneText?: string;
  characters?: CharacterProfile[];
  artStyle?: string;
  customPrompt?: string;
}

export interface PageImageResult {
  storyId: string;
  pageNumber: number;
  imageUrl: string;
  prompt: string;
  sessionId: string;
}

export interface ArtBibleImageRequest extends ImageGenerationOptions {
  storyId: string;
  artBible?: ArtBible;
}

export interface CharacterReferenceImageRequest extends ImageGenerationOptions {
  storyId: string;
  characterName: string;
  includeTurnaround?: boolean;
}

export function artStyleOf(project: Project, override?: string): string {
  return (
    override?.trim() ||
    project.artBible?.art_style ||
    project.story.metadata.art_style ||
    DEFAULT_ART_STYLE
  );
}

/** The project's art bible, or a default one derived from the story metadata. */
export function artBibleOf(project: Project, artStyle: string): ArtBible {
  if (project.artBible) return project.artBible;
  return buildArtBiblePrompt({
    artStyle,
    genre: project.story.metadata.genre,
    storyTitle: project.story.metadata.title,
  });
}

/** Characters named in the page text, or all of them when none is named. */
export function charactersInScene(text: string, characters: readonly CharacterProfile[]): CharacterProfile[] {
  const named = characters.filter((profile) => {
    const name = profile.name.trim();
    return name !== '' && new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(name)}(?![\\p{L}\\p{N}])`, 'iu').test(text);
  });
  return named.length ? named : [...characters];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sizeOptions(request: ImageGenerationOptions): ImageGenerationOptions {
  return {
    ...(request.size ? { size: request.size } : {}),
    ...(request.quality ? { quality: request.quality } : {}),
  };
}

export function createImageGeneratorService(deps: {
  textProvider: TextGenerationProvider;
  sessions: VisualSessionManager;
  projects: ProjectRepository;
}) {
  const { textProvider, sessions, projects } = deps;

  async function loadProject(storyId: string): Promise<Project> {
    const project = await projects.get(storyId);
    if (!project) {
      throw new NotFoundError(`Project ${storyId} not found`);
    }
    return project;
  }

  async function summarizeScene(pageText: string, characters: readonly CharacterProfile[]): Promise<string> {
    try {
      const summary = await textProvider.generate(buildSceneSummaryPrompt(pageText, characters), {
        systemMessage: SCENE_SUMMARY_SYSTEM_MESSAGE,
        temperature: 0.3,
        maxTokens: 150,
      });
      if (summary.trim()) return summary.trim();
      logger.warn({ length: pageText.length }, '[ImageGenerator] Empty scene summary, using page text');
    } catch (err) {
      logger.warn({ reason: errorMessage(err) }, '[ImageGenerator] Scene summary failed, using page text');
    }
    return fallbackSceneSummary(pageText);
  }

  async function generatePageImage(request: PageImageRequest): Promise<PageImageResult> {
    const project = await loadProject(request.storyId);
    const page = project.story.pages.find((p) => p.page_number === request.pageNumber);
    const sceneText = request.sceneText?.trim() || page?.text;
    if (!sceneText) {
      throw new ValidationError(`Page ${request.pageNumber} has no text to illustrate`);
    }

    const allCharacters = request.characters ?? project.characterProfiles;
    const artStyle = artStyleOf(project, request.artStyle);
    const artBible = artBibleOf(project, artStyle);
    const sceneCharacters = charactersInScene(sceneText, allCharacters);

    const scene = request.customPrompt?.trim() || (await summarizeScene(sceneText, sceneCharacters));
    const sessionId = await sessions.ensureSession(request.storyId, artBible, allCharacters, project.characterReferences);
    const references = sessions.establishedReferences(request.storyId, project.characterReferences);
    const prompt = buildImagePrompt(scene, sceneCharacters, artStyle, artBible, references);

    const image = await sessions.continueGeneration(request.storyId, prompt, sizeOptions(request));

    await projects.update(request.storyId, (current) => {
      const pages = current.story.pages.map((p) =>
        p.page_number === request.pageNumber ? { ...p, image_url: image.imageUrl, image_prompt: prompt } : p
      );
      const allIllustrated = pages.length > 0 && pages.every((p) => !!p.image_url);
      return {
        ...current,
        status: allIllustrated && current.status !== 'completed' ? 'images_generated' : current.status,
        story: { ...current.story, pages, updated_at: new Date().toISOString() },
      };
    });

    logger.info({ storyId: request.storyId, pageNumber: request.pageNumber, sessionId }, '[ImageGenerator] Page illustrated');
    return { storyId: request.storyId, pageNumber: request.pageNumber, imageUrl: image.imageUrl, prompt, sessionId };
  }

  async function generateArtBibleImage(request: ArtBibleImageRequest): Promise<ArtBible> {
    const project = await loadProject(request.storyId);
    const artBible = request.artBible ?? artBibleOf(project, artStyleOf(project));

    await sessions.ensureSession(request.storyId, artBible, project.characterProfiles, project.characterReferences);
    const image = await sessions.continueGeneration(request.storyId, artBible.prompt, sizeOptions(request));
    const generated: ArtBible = { ...artBible, image_url: image.imageUrl };

    await sessions.recordReference(request.storyId, { artBible: generated });
    await projects.update(request.storyId, (current) => ({ ...current, artBible: generated }));
    logger.info({ storyId: request.storyId, artStyle: generated.art_style }, '[ImageGenerator] Art bible illustrated');
    return generated;
  }

  async function generateCharacterReferenceImage(request: CharacterReferenceImageRequest): Promise<CharacterReference> {
    const project = await loadProject(request.storyId);
    const wanted = request.characterName.trim().toLowerCase();
    const profile = project.characterProfiles.find((p) => p.name.trim().toLowerCase() === wanted);
    if (!profile) {
      throw new NotFoundError(`Character ${request.characterName} not found in project ${request.storyId}`);
    }

    const artStyle = artStyleOf(project);
    const reference = buildCharacterReferencePrompt(profile, artStyle, request.includeTurnaround ?? true);
    await sessions.ensureSession(
      request.storyId,
      artBibleOf(project, artStyle),
      project.characterProfiles,
      project.characterReferences
    );
    const image = await sessions.continueGeneration(request.storyId, reference.prompt, sizeOptions(request));
    const generated: CharacterReference = { ...reference, image_url: image.imageUrl };

    await sessions.recordReference(request.storyId, { characterReference: generated });
    await projects.update(request.storyId, (current) => ({
      ...current,
      characterReferences: [
        ...current.characterReferences.filter((r) => r.character_name !== generated.character_name),
        generated,
      ],
    }));
    logger.info({ storyId: request.storyId, character: generated.character_name }, '[ImageGenerator] Character reference illustrated');
    return generated;
  }

  return { generatePageImage, generateArtBibleImage, generateCharacterReferenceImage, summarizeScene };
}

export type ImageGeneratorService = ReturnType<typeof createImageGeneratorService>;
