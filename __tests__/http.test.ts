import axios, { AxiosInstance } from 'axios';
import { createApp } from '../src/app/app';
import { AppContainer, createContainer } from '../src/app/container';
import { loadEnv } from '../src/config/env';
import { FakeImageProvider, FakeTextProvider, InMemoryProjectRepository, makeProject } from './helpers/fakes';
import { FakeServer, listen } from './helpers/fakeServer';

const STORY_TEXT = 'Page 1:\nMilo found a key.\n\nPage 2:\nRosa helped him.\n\nPage 3:\nThey opened the door.';

describe('HTTP API', () => {
  let server: FakeServer;
  let client: AxiosInstance;
  let container: AppContainer;
  let images: FakeImageProvider;
  let projects: InMemoryProjectRepository;

  beforeEach(async () => {
    images = new FakeImageProvider();
    projects = new InMemoryProjectRepository();
    container = createContainer({
      config: loadEnv({ NODE_ENV: 'test' }),
      textProvider: new FakeTextProvider([STORY_TEXT]),
      imageProvider: images,
      projects,
    });
    server = await listen(createApp(container));
    client = axios.create({ baseURL: server.baseUrl, validateStatus: () => true });
  });

  afterEach(() => server.close());

  it('reports health with task and session counts', async () => {
    const res = await client.get('/health');
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({
      responseStatus: 'success',
      message: 'OK',
      data: { textProvider: 'fake-text', imageProvider: 'fake-image', sessions: 0, tasks: { total: 0 } },
    });
  });

  it('serves the story configuration', async () => {
    const res = await client.get('/api/config');
    expect(res.status).toBe(200);
    expect(res.data.data.defaults).toEqual({
      language: 'English',
      complexity: 'simple',
      vocabulary_diversity: 'moderate',
      age_group: '4-6',
      num_pages: 8,
      words_per_page: 50,
      genre: 'adventure',
      art_style: 'watercolor',
    });
    expect(res.data.data.parameters.words_per_page).toEqual({ min: 10, max: 300 });
  });

  it('runs a story task submitted through the story alias', async () => {
    const submitted = await client.post('/api/stories/async', { title: 'The Brave Little Mouse', num_pages: 3 });
    expect(submitted.status).toBe(202);
    expect(submitted.data.data.status).toBe('pending');

    const taskId: string = submitted.data.data.taskId;
    await container.orchestrator.waitFor(taskId);

    const res = await client.get(`/api/stories/status/${taskId}`);
    expect(res.status).toBe(200);
    expect(res.data.message).toBe('Task completed');
    expect(res.data.data).toMatchObject({ taskId, kind: 'story-generation', status: 'completed' });
    expect(res.data.data.result.pages).toHaveLength(3);
    expect(res.data.data.error).toBeUndefined();
  });

  it('rejects invalid task input at submission', async () => {
    const res = await client.post('/api/tasks', { kind: 'story-generation', input: { num_pages: 3 } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      responseStatus: 'error',
      message: 'Invalid job input',
      data: [{ path: 'title', message: 'Required' }],
    });
    expect(container.orchestrator.stats().total).toBe(0);
  });

  it('rejects unknown task kinds', async () => {
    const res = await client.post('/api/tasks', { kind: 'video', input: {} });
    expect(res.status).toBe(400);
    expect(res.data.message).toBe('Unknown task kind: video');
  });

  it('reports unknown task ids as not found', async () => {
    const unknown = await client.get('/api/tasks/not-a-uuid');
    expect(unknown.status).toBe(404);
    expect(unknown.data.message).toBe('Task not-a-uuid not found');
    expect((await client.get(`/api/tasks/${'x'.repeat(129)}`)).status).toBe(400);

    const missing = '6f1c8a52-3b1e-4c39-9a57-2f1f1d3c9b10';
    const res = await client.get(`/api/tasks/${missing}`);
    expect(res.status).toBe(404);
    expect(res.data.message).toBe(`Task ${missing} not found`);
  });

  it('reports, ensures and rebuilds image sessions', async () => {
    await projects.save(makeProject());

    const before = await client.get('/api/visual-consistency/session/story-1');
    expect(before.data.data).toEqual({
      story_id: 'story-1',
      state: 'none',
      has_session: false,
      context_initialized: false,
    });

    const ensured = await client.post('/api/visual-consistency/session/ensure', { story_id: 'story-1' });
    expect(ensured.status).toBe(200);
    expect(ensured.data.data).toEqual({
      story_id: 'story-1',
      session_id: 'session-1',
      state: 'active',
      has_session: true,
      context_initialized: true,
    });

    const rebuilt = await client.post('/api/visual-consistency/session/rebuild', { story_id: 'story-1' });
    expect(rebuilt.data.data.session_id).toBe('session-2');
    expect(images.primes).toHaveLength(2);

    const cleared = await client.post('/api/visual-consistency/session/clear', { story_id: 'story-1' });
    expect(cleared.data.message).toBe('Session cleared');
    expect(cleared.data.data.state).toBe('none');
  });

  it('answers 404 when ensuring a session for an unknown story', async () => {
    const res = await client.post('/api/visual-consistency/session/ensure', { story_id: 'missing' });
    expect(res.status).toBe(404);
    expect(res.data.message).toBe('Project missing not found');
    expect(images.callCount).toBe(0);
  });

  it('builds an art bible prompt', async () => {
    const res = await client.post('/api/visual-consistency/art-bible/generate-prompt', {
      art_style: 'watercolor',
      additional_notes: 'soft edges',
    });
    expect(res.status).toBe(200);
    expect(res.data.data.art_style).toBe('watercolor');
    expect(res.data.data.style_notes).toBe('soft edges');
  });

  it('rejects a session request without a story id', async () => {
    const res = await client.post('/api/visual-consistency/session/ensure', {});
    expect(res.status).toBe(400);
    expect(res.data.data.errors[0].path).toBe('story_id');
  });

  it('lists, reads and deletes projects', async () => {
    await projects.save(makeProject());
    await client.post('/api/visual-consistency/session/ensure', { story_id: 'story-1' });

    const list = await client.get('/api/projects');
    expect(list.status).toBe(200);
    expect(list.data.data.projects).toEqual([
      {
        id: 'story-1',
        name: 'The Brave Little Mouse',
        status: 'story_generated',
        page_count: 2,
        illustrated_pages: 0,
        character_count: 2,
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: '2024-01-01T00:00:00.000Z',
      },
    ]);

    const one = await client.get('/api/projects/story-1');
    expect(one.status).toBe(200);
    expect(one.data.data.project).toEqual(makeProject());

    const deleted = await client.delete('/api/projects/story-1');
    expect(deleted.status).toBe(200);
    expect(deleted.data).toEqual({
      responseStatus: 'success',
      message: 'Project deleted',
      data: { id: 'story-1', session_cleared: true },
    });
    expect(images.closed).toEqual(['session-1']);
    expect(container.sessions.status('story-1').state).toBe('none');

    const gone = await client.get('/api/projects/story-1');
    expect(gone.status).toBe(404);
    expect(gone.data.message).toBe('Project story-1 not found');
    expect((await client.delete('/api/projects/story-1')).status).toBe(404);
  });

  it('serves a saved story by id', async () => {
    await projects.save(makeProject());

    const res = await client.get('/api/stories/story-1');
    expect(res.status).toBe(200);
    expect(res.data.data.story).toEqual(makeProject().story);

    const missing = await client.get('/api/stories/nobody');
    expect(missing.status).toBe(404);
    expect(missing.data.message).toBe('Story nobody not found');
  });

  it('creates a project through a task', async () => {
    const submitted = await client.post('/api/projects', {
      title: 'The Brave Little Mouse',
      num_pages: 3,
      extract_characters: false,
      illustrate: false,
    });
    expect(submitted.status).toBe(202);

    const taskId: string = submitted.data.data.taskId;
    await container.orchestrator.waitFor(taskId);
    const res = await client.get(`/api/projects/status/${taskId}`);
    expect(res.data.data).toMatchObject({ kind: 'project-creation', status: 'completed' });
    expect(res.data.data.result.status).toBe('completed');
    expect((await projects.list()).map((p) => p.name)).toEqual(['The Brave Little Mouse']);
  });

  it('answers unknown routes with 404', async () => {
    const res = await client.get('/api/nope');
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ responseStatus: 'error', message: 'Route GET /api/nope not found', data: null });
  });
});
