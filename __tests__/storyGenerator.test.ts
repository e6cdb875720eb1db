import { createContainer } from '../src/app/container';
import { loadEnv } from '../src/config/env';
import { createStoryGeneratorService, parseStoryPages, storyTokenBudget } from '../src/services/storyGeneratorService';
import { StoryMetadata } from '../src/types/story';
import { ProviderError } from '../src/utils/errorHandler';
import { FakeImageProvider, FakeTextProvider, InMemoryProjectRepository } from './helpers/fakes';

const STORY_TEXT = [
  'Here is your story!',
  '',
  'Page 1:',
  'Milo the mouse found a shiny key under the oak tree.',
  '',
  'Page 2:',
  'He searched the garden for a door small enough for the key.',
  '',
  'Page 3:',
  'Behind the roses Milo found a tiny door and opened it.',
].join('\n');

const metadata: StoryMetadata = {
  title: 'The Brave Little Mouse',
  language: 'English',
  complexity: 'simple',
  vocabulary_diversity: 'moderate',
  age_group: '4-6',
  num_pages: 3,
  words_per_page: 40,
  genre: 'adventure',
};

describe('parseStoryPages', () => {
  it('splits on page markers and drops the preamble', () => {
    expect(parseStoryPages(STORY_TEXT)).toEqual([
      { page_number: 1, text: 'Milo the mouse found a shiny key under the oak tree.' },
      { page_number: 2, text: 'He searched the garden for a door small enough for the key.' },
      { page_number: 3, text: 'Behind the roses Milo found a tiny door and opened it.' },
    ]);
  });

  it('understands Spanish markers and skips empty pages', () => {
    expect(parseStoryPages('Página 1: Hola.\nPágina 2:\nPágina 3: Adiós.')).toEqual([
      { page_number: 1, text: 'Hola.' },
      { page_number: 3, text: 'Adiós.' },
    ]);
  });

  it('returns no pages for text without markers', () => {
    expect(parseStoryPages('Once upon a time.')).toEqual([]);
  });
});

describe('storyTokenBudget', () => {
  it('clamps to the minimum for short stories', () => {
    expect(storyTokenBudget({ num_pages: 3, words_per_page: 40 })).toBe(1000);
  });

  it('scales with length', () => {
    expect(storyTokenBudget({ num_pages: 10, words_per_page: 100 })).toBe(2250);
  });

  it('clamps to the maximum for long stories', () => {
    expect(storyTokenBudget({ num_pages: 50, words_per_page: 300 })).toBe(8000);
  });
});

describe('StoryGeneratorService', () => {
  it('generates a story from the provider text', async () => {
    const text = new FakeTextProvider([STORY_TEXT]);
    const story = await createStoryGeneratorService(text).generateStory(metadata, { customPrompt: 'a lost key' });

    expect(story.pages).toHaveLength(3);
    expect(story.characters).toEqual([]);
    expect(story.metadata).toEqual({ ...metadata, user_prompt: 'a lost key' });
    expect(text.calls[0]?.params).toEqual({ temperature: 0.8, maxTokens: 1000 });
    expect(text.calls[0]?.prompt).toContain('Story idea: a lost key.');
  });

  it('fails when the text has no pages', async () => {
    const text = new FakeTextProvider(['I cannot write that story.']);
    const failure = createStoryGeneratorService(text).generateStory(metadata);
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('fake-text: malformed response: story text contains no "Page N:" sections');
  });
});

describe('story pipeline through the task orchestrator', () => {
  function setup(replies: Array<string | Error>) {
    const text = new FakeTextProvider(replies);
    const images = new FakeImageProvider();
    const projects = new InMemoryProjectRepository();
    const container = createContainer({
      config: loadEnv({ NODE_ENV: 'test' }),
      textProvider: text,
      imageProvider: images,
      projects,
    });
    return { text, images, projects, orchestrator: container.orchestrator };
  }

  it('generates, extracts characters and illustrates a page', async () => {
    const { text, images, projects, orchestrator } = setup([
      STORY_TEXT,
      '```json\n{"characters": [{"name": "Milo", "description": "a small grey mouse"}]}\n```',
      '{"species": "mouse", "physical_description": "small grey mouse with big round ears", "clothing": "a red scarf"}',
      'Milo holds up a shiny key under a large oak tree.',
    ]);

    const storyTask = orchestrator.submit('story-generation', {
      title: 'The Brave Little Mouse',
      num_pages: 3,
      words_per_page: 40,
    });
    const story = await orchestrator.waitFor(storyTask);
    expect(story.status).toBe('completed');

    const project = (await projects.list())[0];
    if (!project) throw new Error('project was not saved');
    expect(project.status).toBe('story_generated');
    expect(project.story.metadata).toMatchObject({ genre: 'adventure', art_style: 'watercolor', language: 'English' });
    expect(story.result).toMatchObject({ id: project.id, project_id: project.id });

    const extraction = orchestrator.submit('character-extraction', {
      pages: project.story.pages,
      project_id: project.id,
    });
    expect((await orchestrator.waitFor(extraction)).result).toEqual({
      characters: [
        {
          name: 'Milo',
          species: 'Mouse',
          physical_description: 'small grey mouse with big round ears',
          clothing: 'a red scarf',
        },
      ],
      project_id: project.id,
      saved: true,
    });

    const pageTask = orchestrator.submit('page-image', { story_id: project.id, page_number: 1 });
    const page = await orchestrator.waitFor(pageTask);

    expect(page.status).toBe('completed');
    expect(page.result).toMatchObject({
      storyId: project.id,
      pageNumber: 1,
      imageUrl: 'https://images.test/session-1/1.png',
      sessionId: 'session-1',
    });
    expect(images.opened).toEqual(['session-1']);
    expect(images.primes).toHaveLength(1);
    expect(images.turns[0]?.prompt.endsWith('Scene: Milo holds up a shiny key under a large oak tree.')).toBe(true);
    expect(text.calls[3]?.params).toEqual({
      systemMessage: expect.stringContaining('KEY VISUAL MOMENT'),
      temperature: 0.3,
      maxTokens: 150,
    });

    const saved = await projects.get(project.id);
    expect(saved?.story.pages[0]?.image_url).toBe('https://images.test/session-1/1.png');
    expect(saved?.status).toBe('story_generated');
  });

  it('builds a whole project in one task with a per-request text model', async () => {
    const { text, images, projects, orchestrator } = setup([
      STORY_TEXT,
      '{"characters": [{"name": "Milo", "description": "a small grey mouse"}]}',
      '{"species": "mouse", "physical_description": "small grey mouse with big round ears"}',
      'Milo finds the key.',
      'Milo searches the garden.',
      'Milo opens the tiny door.',
    ]);

    const id = orchestrator.submit('project-creation', {
      title: 'The Brave Little Mouse',
      num_pages: 3,
      words_per_page: 40,
      text_model: 'tiny-model',
      size: '1536x1024',
    });
    const task = await orchestrator.waitFor(id);
    expect(task.status).toBe('completed');

    const project = (await projects.list())[0];
    if (!project) throw new Error('project was not saved');
    expect(task.result).toEqual({
      project_id: project.id,
      status: 'completed',
      title: 'The Brave Little Mouse',
      characters: ['Milo'],
      pages: [
        { page_number: 1, image_url: 'https://images.test/session-1/1.png' },
        { page_number: 2, image_url: 'https://images.test/session-1/2.png' },
        { page_number: 3, image_url: 'https://images.test/session-1/3.png' },
      ],
    });
    expect(project.status).toBe('completed');
    expect(project.characterProfiles.map((p) => p.species)).toEqual(['Mouse']);

    expect(images.opened).toEqual(['session-1']);
    expect(images.primes).toHaveLength(1);
    expect(images.turns.map((t) => t.options)).toEqual([{ size: '1536x1024' }, { size: '1536x1024' }, { size: '1536x1024' }]);
    expect(images.turns[2]?.prompt.endsWith('Scene: Milo opens the tiny door.')).toBe(true);
    expect(text.calls.slice(0, 3).map((call) => call.params?.model)).toEqual(['tiny-model', 'tiny-model', 'tiny-model']);
  });

  it('skips characters and illustrations when the project asks for neither', async () => {
    const { text, images, projects, orchestrator } = setup([STORY_TEXT]);
    const id = orchestrator.submit('project-creation', {
      title: 'The Brave Little Mouse',
      num_pages: 3,
      extract_characters: false,
      illustrate: false,
    });

    expect((await orchestrator.waitFor(id)).result).toMatchObject({
      status: 'completed',
      characters: [],
      pages: [
        { page_number: 1, image_url: null },
        { page_number: 2, image_url: null },
        { page_number: 3, image_url: null },
      ],
    });
    expect(text.calls).toHaveLength(1);
    expect(text.calls[0]?.params?.model).toBeUndefined();
    expect(images.callCount).toBe(0);
    expect((await projects.list()).map((p) => p.status)).toEqual(['completed']);
  });

  it('ends the task in error when the story cannot be parsed', async () => {
    const { orchestrator } = setup(['Sorry, no story today.']);
    const id = orchestrator.submit('story-generation', { title: 'Nothing' });
    await orchestrator.waitFor(id);
    expect(orchestrator.result(id)).toEqual({
      ok: false,
      error: 'fake-text: malformed response: story text contains no "Page N:" sections',
    });
  });

  it('fails a page task for an unknown story without touching the image provider', async () => {
    const { images, orchestrator } = setup([]);
    const id = orchestrator.submit('page-image', { story_id: 'missing-story', page_number: 1 });
    await orchestrator.waitFor(id);
    expect(orchestrator.result(id)).toEqual({ ok: false, error: 'Project missing-story not found' });
    expect(images.callCount).toBe(0);
  });
});
