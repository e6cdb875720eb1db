import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileProjectRepository } from '../src/repository/projectRepository';
import { NotFoundError } from '../src/utils/errorHandler';
import { makeProject } from './helpers/fakes';

describe('FileProjectRepository', () => {
  let dataDir: string;
  let repository: FileProjectRepository;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'story-projects-'));
    repository = new FileProjectRepository(dataDir);
  });

  afterEach(() => fs.rm(dataDir, { recursive: true, force: true }));

  it('saves and reads a project back', async () => {
    const project = makeProject();
    expect(await repository.save(project)).toBe('story-1');
    expect(await repository.get('story-1')).toEqual(project);
    expect(await fs.readdir(path.join(dataDir, 'projects'))).toEqual(['story-1.json']);
  });

  it('returns null for a missing project', async () => {
    expect(await repository.get('nobody')).toBeNull();
    expect(await repository.list()).toEqual([]);
  });

  it('refuses ids that would leave the projects directory', async () => {
    await expect(repository.get('../etc/passwd')).rejects.toThrow(NotFoundError);
  });

  it('applies concurrent updates one after another', async () => {
    await repository.save(makeProject());

    await Promise.all(
      [1, 2].map((pageNumber) =>
        repository.update('story-1', (current) => ({
          ...current,
          story: {
            ...current.story,
            pages: current.story.pages.map((p) =>
              p.page_number === pageNumber ? { ...p, image_url: `https://img.test/${pageNumber}.png` } : p
            ),
          },
        }))
      )
    );

    const saved = await repository.get('story-1');
    expect(saved?.story.pages.map((p) => p.image_url)).toEqual(['https://img.test/1.png', 'https://img.test/2.png']);
  });

  it('fails to update a missing project', async () => {
    await expect(repository.update('nobody', (p) => p)).rejects.toThrow('Project nobody not found');
  });

  it('fills missing list fields when reading an older project file', async () => {
    const { characterReferences, characterProfiles, ...legacy } = makeProject();
    expect(characterReferences).toEqual([]);
    expect(characterProfiles).toHaveLength(2);
    await fs.mkdir(path.join(dataDir, 'projects'), { recursive: true });
    await fs.writeFile(path.join(dataDir, 'projects', 'story-1.json'), JSON.stringify(legacy), 'utf8');

    const project = await repository.get('story-1');
    expect(project?.characterReferences).toEqual([]);
    expect(project?.characterProfiles).toEqual([]);
  });

  it('rejects a project file that does not hold a project', async () => {
    await fs.mkdir(path.join(dataDir, 'projects'), { recursive: true });
    await fs.writeFile(path.join(dataDir, 'projects', 'broken.json'), '{"id": "broken"', 'utf8');
    await fs.writeFile(path.join(dataDir, 'projects', 'odd.json'), JSON.stringify({ ...makeProject({ id: 'odd' }), status: 'lost' }), 'utf8');

    await expect(repository.get('broken')).rejects.toMatchObject({ statusCode: 500 });
    await expect(repository.get('broken')).rejects.toThrow('Project broken is corrupt: ');
    await expect(repository.get('odd')).rejects.toThrow(/^Project odd is corrupt: status: /);
  });

  it('drops per-project locks once writes finish', async () => {
    await Promise.all([repository.save(makeProject()), repository.save(makeProject({ id: 'story-2' }))]);
    await repository.update('story-1', (p) => p);
    await repository.delete('story-2');
    expect(repository.lockCount).toBe(0);
  });

  it('lists and deletes projects', async () => {
    await repository.save(makeProject({ id: 'b-story' }));
    await repository.save(makeProject({ id: 'a-story' }));

    expect((await repository.list()).map((p) => p.id)).toEqual(['a-story', 'b-story']);
    expect(await repository.delete('a-story')).toBe(true);
    expect(await repository.delete('a-story')).toBe(false);
    expect((await repository.list()).map((p) => p.id)).toEqual(['b-story']);
  });
});
