import { SessionStore } from '../src/repository/sessionStore';
import { charactersInScene, createImageGeneratorService } from '../src/services/imageGeneratorService';
import { buildArtBiblePrompt, buildCharacterReferencePrompt } from '../src/services/promptAssembler';
import { VisualSessionManager } from '../src/services/sessionManager';
import { NotFoundError, ValidationError } from '../src/utils/errorHandler';
import { FakeImageProvider, FakeTextProvider, InMemoryProjectRepository, makeProject } from './helpers/fakes';

async function setup(replies: Array<string | Error> = []) {
  const text = new FakeTextProvider(replies);
  const images = new FakeImageProvider();
  const projects = new InMemoryProjectRepository();
  const sessions = new VisualSessionManager(new SessionStore(), images);
  await projects.save(makeProject());
  const service = createImageGeneratorService({ textProvider: text, sessions, projects });
  return { text, images, projects, sessions, service };
}

describe('charactersInScene', () => {
  const cast = makeProject().characterProfiles;

  it('picks the characters named in the text', () => {
    expect(charactersInScene('Rosa flew over the hill.', cast).map((c) => c.name)).toEqual(['Rosa']);
  });

  it('matches whole names only', () => {
    const names = (text: string, profiles = cast) => charactersInScene(text, profiles).map((c) => c.name);
    expect(names('Rosalind waved at Milo.')).toEqual(['Milo']);
    expect(names('MILO, look!')).toEqual(['Milo']);
    const withAl = [...cast, { name: 'Al', species: 'Fox', physical_description: 'red fox' }];
    expect(names('Also, Rosa slept.', withAl)).toEqual(['Rosa']);
    const titled = [{ name: 'Mr. Al', species: 'Fox', physical_description: '' }, cast[0]];
    expect(names('MrX Al met Milo.', titled)).toEqual(['Milo']);
    expect(names('Mr. Al met Milo.', titled)).toEqual(['Mr. Al', 'Milo']);
  });

  it('uses everyone when nobody is named', () => {
    expect(charactersInScene('The sun rose.', cast).map((c) => c.name)).toEqual(['Milo', 'Rosa']);
  });
});

describe('ImageGeneratorService', () => {
  it('illustrates every page inside one session and marks the project illustrated', async () => {
    const { images, projects, service } = await setup();

    await service.generatePageImage({ storyId: 'story-1', pageNumber: 1, customPrompt: 'Milo finds a key.' });
    await service.generatePageImage({ storyId: 'story-1', pageNumber: 2, customPrompt: 'Rosa opens a door.' });

    expect(images.opened).toEqual(['session-1']);
    expect(images.turns.map((t) => t.sessionId)).toEqual(['session-1', 'session-1']);
    const project = await projects.get('story-1');
    expect(project?.status).toBe('images_generated');
    expect(project?.story.pages.map((p) => p.image_url)).toEqual([
      'https://images.test/session-1/1.png',
      'https://images.test/session-1/2.png',
    ]);
  });

  it('falls back to the page text when the scene summary fails', async () => {
    const { images, service } = await setup([new Error('ollama: connection failed')]);

    const result = await service.generatePageImage({ storyId: 'story-1', pageNumber: 1 });

    expect(result.prompt.endsWith('Scene: Milo the mouse found a shiny key under the oak tree.')).toBe(true);
    expect(images.turns[0]?.prompt).toBe(result.prompt);
  });

  it('rejects a page without text', async () => {
    const { images, service } = await setup();
    await expect(service.generatePageImage({ storyId: 'story-1', pageNumber: 9 })).rejects.toThrow(
      new ValidationError('Page 9 has no text to illustrate')
    );
    expect(images.callCount).toBe(0);
  });

  it('generates the art bible in the session and stores it on the project', async () => {
    const { images, projects, sessions, service } = await setup();
    const expected = buildArtBiblePrompt({
      artStyle: 'watercolor',
      genre: 'adventure',
      storyTitle: 'The Brave Little Mouse',
    });

    const artBible = await service.generateArtBibleImage({ storyId: 'story-1' });

    expect(artBible).toEqual({ ...expected, image_url: 'https://images.test/session-1/1.png' });
    expect(images.turns[0]?.prompt).toBe(expected.prompt);
    expect(sessions.get('story-1')?.artBibleSnapshot).toEqual({
      prompt: expected.prompt,
      artStyle: 'watercolor',
      imagePath: 'https://images.test/session-1/1.png',
    });
    expect((await projects.get('story-1'))?.artBible).toEqual(artBible);
  });

  it('generates a character reference by name and records its snapshot', async () => {
    const { projects, sessions, service } = await setup();
    const milo = makeProject().characterProfiles[0];
    if (!milo) throw new Error('fixture has no characters');
    const expected = buildCharacterReferencePrompt(milo, 'watercolor', true);

    const reference = await service.generateCharacterReferenceImage({ storyId: 'story-1', characterName: 'milo' });

    expect(reference).toEqual({ ...expected, image_url: 'https://images.test/session-1/1.png' });
    expect(sessions.get('story-1')?.characterReferenceSnapshots).toEqual({
      Milo: expected.prompt,
      Rosa: 'Rosa (a Owl, brown owl with golden eyes)',
    });
    expect((await projects.get('story-1'))?.characterReferences).toEqual([reference]);
  });

  it('points page prompts at reference sheets only for characters that have one', async () => {
    const { service } = await setup();
    await service.generateCharacterReferenceImage({ storyId: 'story-1', characterName: 'Milo' });

    const page = await service.generatePageImage({
      storyId: 'story-1',
      pageNumber: 2,
      sceneText: 'Milo and Rosa open the tiny door.',
      customPrompt: 'Two friends at a door.',
    });

    expect(page.prompt).toContain(
      '- Milo (a Mouse, small grey mouse with big round ears). Match the reference sheet already established for Milo.'
    );
    expect(page.prompt).toContain('- Rosa (a Owl, brown owl with golden eyes).\n');
  });

  it('reports an unknown character', async () => {
    const { service } = await setup();
    await expect(
      service.generateCharacterReferenceImage({ storyId: 'story-1', characterName: 'Zed' })
    ).rejects.toThrow(new NotFoundError('Character Zed not found in project story-1'));
  });
});
