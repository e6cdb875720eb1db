import { Request, Response, NextFunction } from 'express';
import { ProjectRepository } from '../repository/projectRepository';
import {
  ArtBiblePromptRequest,
  CharacterReferencePromptRequest,
  StorySessionRequest,
} from '../schemas/sessionSchemas';
import { artBibleOf, artStyleOf } from '../services/imageGeneratorService';
import { buildArtBiblePrompt, buildCharacterReferencePrompt } from '../services/promptAssembler';
import { VisualSessionManager } from '../services/sessionManager';
import { Project } from '../types/project';
import { NotFoundError } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';

export function createVisualConsistencyController(deps: {
  sessions: VisualSessionManager;
  projects: ProjectRepository;
}) {
  const { sessions, projects } = deps;

  async function loadProject(storyId: string): Promise<Project> {
    const project = await projects.get(storyId);
    if (!project) {
      throw new NotFoundError(`Project ${storyId} not found`);
    }
    return project;
  }

  function sessionView(storyId: string, sessionId?: string) {
    const status = sessions.status(storyId);
    return {
      story_id: storyId,
      ...(sessionId ? { session_id: sessionId } : {}),
      state: status.state,
      has_session: status.hasSession,
      context_initialized: status.contextInitialized,
    };
  }

  function generateArtBiblePrompt(req: Request, res: Response, next: NextFunction) {
    try {
      const body: ArtBiblePromptRequest = req.body;
      const artBible = buildArtBiblePrompt({
        artStyle: body.art_style,
        genre: body.genre,
        storyTitle: body.story_title,
        additionalNotes: body.additional_notes,
      });
      return res.json(
        formatApiResponse('success', 'Art bible prompt generated', {
          prompt: artBible.prompt,
          art_style: artBible.art_style,
          style_notes: artBible.style_notes ?? null,
        })
      );
    } catch (err) {
      return next(err);
    }
  }

  function generateCharacterReferencePrompt(req: Request, res: Response, next: NextFunction) {
    try {
      const body: CharacterReferencePromptRequest = req.body;
      const reference = buildCharacterReferencePrompt(body.character, body.art_style, body.include_turnaround);
      return res.json(formatApiResponse('success', 'Character reference prompt generated', reference));
    } catch (err) {
      return next(err);
    }
  }

  /** GET /api/visual-consistency/session/:storyId - absence of a session is a normal answer. */
  function getSessionStatus(req: Request, res: Response, next: NextFunction) {
    try {
      return res.json(formatApiResponse('success', 'OK', sessionView(req.params.storyId)));
    } catch (err) {
      return next(err);
    }
  }

  // ensure and rebuild prime from what the project store holds, never from the request
  async function ensureSession(req: Request, res: Response, next: NextFunction) {
    try {
      const { story_id }: StorySessionRequest = req.body;
      const project = await loadProject(story_id);
      const artStyle = artStyleOf(project);
      const sessionId = await sessions.ensureSession(
        story_id,
        artBibleOf(project, artStyle),
        project.characterProfiles,
        project.characterReferences
      );
      return res.json(formatApiResponse('success', 'Session ready', sessionView(story_id, sessionId)));
    } catch (err) {
      return next(err);
    }
  }

  async function rebuildSession(req: Request, res: Response, next: NextFunction) {
    try {
      const { story_id }: StorySessionRequest = req.body;
      const project = await loadProject(story_id);
      const artStyle = artStyleOf(project);
      const sessionId = await sessions.rebuild(
        story_id,
        artBibleOf(project, artStyle),
        project.characterProfiles,
        project.characterReferences
      );
      return res.json(formatApiResponse('success', 'Session rebuilt', sessionView(story_id, sessionId)));
    } catch (err) {
      return next(err);
    }
  }

  async function clearSession(req: Request, res: Response, next: NextFunction) {
    try {
      const { story_id }: StorySessionRequest = req.body;
      const cleared = await sessions.clear(story_id);
      return res.json(formatApiResponse('success', cleared ? 'Session cleared' : 'No session', sessionView(story_id)));
    } catch (err) {
      return next(err);
    }
  }

  return {
    generateArtBiblePrompt,
    generateCharacterReferencePrompt,
    getSessionStatus,
    ensureSession,
    rebuildSession,
    clearSession,
  };
}

export type VisualConsistencyController = ReturnType<typeof createVisualConsistencyController>;
