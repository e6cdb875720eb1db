import { EnvConfig, env as defaultEnv } from '../config/env';
import { FileProjectRepository, ProjectRepository } from '../repository/projectRepository';
import { SessionStore } from '../repository/sessionStore';
import { TaskStore } from '../repository/taskStore';
import { CharacterExtractorService, createCharacterExtractorService } from '../services/characterExtractorService';
import { createImageGeneratorService, ImageGeneratorService } from '../services/imageGeneratorService';
import { createJobRegistry } from '../services/jobs';
import { createImageProvider, createTextProvider } from '../services/providers/providerFactory';
import { VisualSessionManager } from '../services/sessionManager';
import { createStoryGeneratorService, StoryGeneratorService } from '../services/storyGeneratorService';
import { TaskOrchestrator } from '../services/taskOrchestrator';
import { ImageGenerationProvider, TextGenerationProvider } from '../types/providers';

export interface AppContainer {
  config: EnvConfig;
  textProvider: TextGenerationProvider;
  imageProvider: ImageGenerationProvider;
  projects: ProjectRepository;
  sessionStore: SessionStore;
  sessions: VisualSessionManager;
  storyGenerator: StoryGeneratorService;
  characterExtractor: CharacterExtractorService;
  imageGenerator: ImageGeneratorService;
  orchestrator: TaskOrchestrator;
}

export type ContainerOverrides = Partial<
  Pick<AppContainer, 'config' | 'textProvider' | 'imageProvider' | 'projects'>
>;

/** Wires stores, providers and services. Tests pass fakes through `overrides`. */
export function createContainer(overrides: ContainerOverrides = {}): AppContainer {
  const config = overrides.config ?? defaultEnv;
  const textProvider = overrides.textProvider ?? createTextProvider(config);
  const imageProvider = overrides.imageProvider ?? createImageProvider(config);
  const projects = overrides.projects ?? new FileProjectRepository(config.dataDir);

  const sessionStore = new SessionStore();
  const sessions = new VisualSessionManager(sessionStore, imageProvider);
  const storyGenerator = createStoryGeneratorService(textProvider);
  const characterExtractor = createCharacterExtractorService(textProvider);
  const imageGenerator = createImageGeneratorService({ textProvider, sessions, projects });

  const orchestrator = new TaskOrchestrator(
    new TaskStore(),
    createJobRegistry({ storyGenerator, characterExtractor, imageGenerator, projects }),
    {
      concurrency: config.taskWorkerConcurrency,
      retentionMs: config.taskRetentionMs,
      runningTimeoutMs: config.taskRunningTimeoutMs,
    }
  );

  return {
    config,
    textProvider,
    imageProvider,
    projects,
    sessionStore,
    sessions,
    storyGenerator,
    characterExtractor,
    imageGenerator,
    orchestrator,
  };
}
