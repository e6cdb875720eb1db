import { Request, Response, NextFunction } from 'express';
import { ProjectRepository } from '../repository/projectRepository';
import { VisualSessionManager } from '../services/sessionManager';
import { Project, ProjectStatus } from '../types/project';
import { NotFoundError } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';

export interface ProjectSummary {
  id: string;
  name: string;
  status: ProjectStatus;
  page_count: number;
  illustrated_pages: number;
  character_count: number;
  created_at: string;
  updated_at: string;
}

export function toProjectSummary(project: Project): ProjectSummary {
  return {
    id: project.id,
    name: project.name,
    status: project.status,
    page_count: project.story.pages.length,
    illustrated_pages: project.story.pages.filter((page) => page.image_url).length,
    character_count: project.characterProfiles.length,
    created_at: project.createdAt,
    updated_at: project.updatedAt,
  };
}

export function createProjectController(deps: { projects: ProjectRepository; sessions: VisualSessionManager }) {
  const { projects, sessions } = deps;

  async function loadProject(projectId: string): Promise<Project> {
    const project = await projects.get(projectId);
    if (!project) {
      throw new NotFoundError(`Project ${projectId} not found`);
    }
    return project;
  }

  async function listProjects(_req: Request, res: Response, next: NextFunction) {
    try {
      const summaries = (await projects.list()).map(toProjectSummary);
      return res.json(formatApiResponse('success', 'OK', { projects: summaries }));
    } catch (err) {
      return next(err);
    }
  }

  async function getProject(req: Request, res: Response, next: NextFunction) {
    try {
      const project = await loadProject(req.params.projectId);
      return res.json(formatApiResponse('success', 'OK', { project }));
    } catch (err) {
      return next(err);
    }
  }

  /** DELETE /api/projects/:projectId. The story's image session goes with it. */
  async function deleteProject(req: Request, res: Response, next: NextFunction) {
    try {
      const { projectId } = req.params;
      if (!(await projects.delete(projectId))) {
        throw new NotFoundError(`Project ${projectId} not found`);
      }
      const sessionCleared = await sessions.clear(projectId);
      return res.json(formatApiResponse('success', 'Project deleted', { id: projectId, session_cleared: sessionCleared }));
    } catch (err) {
      return next(err);
    }
  }

  // GET /api/stories/:storyId
  async function getStory(req: Request, res: Response, next: NextFunction) {
    try {
      const { storyId } = req.params;
      const project = await projects.get(storyId);
      if (!project) {
        throw new NotFoundError(`Story ${storyId} not found`);
      }
      return res.json(formatApiResponse('success', 'OK', { story: project.story }));
    } catch (err) {
      return next(err);
    }
  }

  return { listProjects, getProject, deleteProject, getStory };
}

export type ProjectController = ReturnType<typeof createProjectController>;
