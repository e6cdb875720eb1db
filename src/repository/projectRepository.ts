import { promises as fs } from 'fs';
import path from 'path';
import { ProjectSchema } from '../schemas/projectSchemas';
import { Project } from '../types/project';
import { ApiError, NotFoundError } from '../utils/errorHandler';
import { KeyedLock } from '../utils/keyedLock';
import { logger } from '../utils/logger';

/**
 * Durable store for story projects. Holds the inputs an image session is
 * rebuilt from (art bible, character profiles and references, art style);
 * session handles themselves are never treated as durable.
 */
export interface ProjectRepository {
  save(project: Project): Promise<string>;
  get(projectId: string): Promise<Project | null>;
  /** Read-modify-write under a per-project lock. Throws NotFoundError. */
  update(projectId: string, mutate: (project: Project) => Project): Promise<Project>;
  list(): Promise<Project[]>;
  delete(projectId: string): Promise<boolean>;
}

const SAFE_ID = /^[A-Za-z0-9_-]{1,128}$/;

export class FileProjectRepository implements ProjectRepository {
  private readonly projectsDir: string;
  private readonly locks = new KeyedLock();

  constructor(dataDir: string) {
    this.projectsDir = path.resolve(dataDir, 'projects');
  }

  async save(project: Project): Promise<string> {
    await this.withLock(project.id, () => this.write(project));
    logger.info({ projectId: project.id, status: project.status }, '[Projects] Saved project');
    return project.id;
  }

  async get(projectId: string): Promise<Project | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(projectId), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return parseProject(projectId, raw);
  }

  async update(projectId: string, mutate: (project: Project) => Project): Promise<Project> {
    return this.withLock(projectId, async () => {
      const current = await this.get(projectId);
      if (!current) {
        throw new NotFoundError(`Project ${projectId} not found`);
      }
      const next: Project = { ...mutate(current), id: projectId, updatedAt: new Date().toISOString() };
      await this.write(next);
      return next;
    });
  }

  async list(): Promise<Project[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.projectsDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const projects: Project[] = [];
    for (const entry of entries.filter((e) => e.endsWith('.json')).sort()) {
      const project = await this.get(entry.slice(0, -'.json'.length));
      if (project) projects.push(project);
    }
    return projects;
  }

  async delete(projectId: string): Promise<boolean> {
    return this.withLock(projectId, async () => {
      try {
        await fs.unlink(this.fileFor(projectId));
        logger.info({ projectId }, '[Projects] Deleted project');
        return true;
      } catch (err) {
        if (isMissingFile(err)) return false;
        throw err;
      }
    });
  }

  private async write(project: Project): Promise<void> {
    const target = this.fileFor(project.id);
    await fs.mkdir(this.projectsDir, { recursive: true });
    // temp file + rename so readers never see a half-written project
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    await fs.writeFile(temp, JSON.stringify(project, null, 2), 'utf8');
    await fs.rename(temp, target);
  }

  private fileFor(projectId: string): string {
    if (!SAFE_ID.test(projectId)) {
      throw new NotFoundError(`Project ${projectId} not found`);
    }
    return path.join(this.projectsDir, `${projectId}.json`);
  }

  /** Number of projects with a write in flight. */
  get lockCount(): number {
    return this.locks.size;
  }

  private withLock<T>(projectId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(projectId, fn);
  }
}

function parseProject(projectId: string, raw: string): Project {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error({ projectId, reason }, '[Projects] Project file is not valid JSON');
    throw new ApiError(`Project ${projectId} is corrupt: ${reason}`, 500);
  }
  const parsed = ProjectSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'project'}: ${i.message}`);
    logger.error({ projectId, issues }, '[Projects] Project file failed validation');
    throw new ApiError(`Project ${projectId} is corrupt: ${issues.join('; ')}`, 500);
  }
  return parsed.data;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
