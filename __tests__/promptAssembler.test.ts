import {
  buildArtBiblePrompt,
  buildCharacterReferencePrompt,
  buildImagePrompt,
  buildPrimingPrompt,
  buildSceneSummaryPrompt,
  describeCharacter,
  fallbackSceneSummary,
  smartTruncate,
} from '../src/services/promptAssembler';
import { CharacterProfile } from '../src/types/story';
import { ValidationError } from '../src/utils/errorHandler';

const QUALITY = "Vibrant colors, child-friendly, professional children's book illustration style.";

const milo: CharacterProfile = {
  name: 'Milo',
  species: 'Mouse',
  physical_description: 'small grey mouse with big round ears',
};
const rosa: CharacterProfile = { name: 'Rosa', species: 'Owl', physical_description: 'brown owl with golden eyes' };

describe('smartTruncate', () => {
  it('cuts at the last space inside the limit', () => {
    expect(smartTruncate('hello world again', 12)).toBe('hello world');
  });

  it('hard-cuts text without spaces', () => {
    expect(smartTruncate('abcdefgh', 4)).toBe('abcd');
  });

  it('leaves short text untouched', () => {
    expect(smartTruncate('short', 10)).toBe('short');
  });
});

describe('describeCharacter', () => {
  it('joins the present fields after the name', () => {
    expect(describeCharacter(milo)).toBe('Milo (a Mouse, small grey mouse with big round ears)');
  });

  it('omits missing optional fields entirely', () => {
    expect(describeCharacter({ name: 'Pip', species: '', physical_description: '' })).toBe('Pip');
  });

  it('includes features, clothing and personality in that order', () => {
    expect(
      describeCharacter({
        ...milo,
        clothing: 'red scarf',
        distinctive_features: 'a notch in one ear',
        personality_traits: 'curious',
      })
    ).toBe('Milo (a Mouse, small grey mouse with big round ears, a notch in one ear, red scarf, curious)');
  });
});

describe('buildImagePrompt', () => {
  it('orders style, characters, then scene', () => {
    expect(buildImagePrompt('Milo finds a key.', [milo], 'watercolor')).toBe(
      `A watercolor style children's book illustration. ${QUALITY}\n\n` +
        'Characters:\n- Milo (a Mouse, small grey mouse with big round ears).\n\n' +
        'Scene: Milo finds a key.'
    );
  });

  it('keeps characters in the order given', () => {
    const prompt = buildImagePrompt('They meet.', [rosa, milo], 'watercolor');
    expect(prompt.indexOf('- Rosa')).toBeLessThan(prompt.indexOf('- Milo'));
  });

  it('has no character block without characters', () => {
    expect(buildImagePrompt('A quiet meadow.', [], '')).toBe(
      `A cartoon style children's book illustration. ${QUALITY}\n\nScene: A quiet meadow.`
    );
  });

  it('refers back to the art bible and established references', () => {
    const prompt = buildImagePrompt(
      'Milo finds a key.',
      [milo],
      'watercolor',
      { prompt: 'Soft washes.', art_style: 'watercolor', color_palette: 'soft pastels' },
      { Milo: 'Reference sheet for Milo.' }
    );
    expect(prompt.split('\n\n')[0]).toBe(
      "A watercolor style children's book illustration. " +
        'Keep the look defined by the art bible established earlier in this conversation. ' +
        `Color palette: soft pastels. ${QUALITY}`
    );
    expect(prompt).toContain(
      '- Milo (a Mouse, small grey mouse with big round ears). Match the reference sheet already established for Milo.'
    );
  });

  it('is deterministic', () => {
    const a = buildImagePrompt('Scene.', [milo, rosa], 'watercolor', { prompt: 'p', art_style: 'watercolor' });
    const b = buildImagePrompt('Scene.', [milo, rosa], 'watercolor', { prompt: 'p', art_style: 'watercolor' });
    expect(a).toBe(b);
  });
});

describe('buildPrimingPrompt', () => {
  it('establishes the art bible before the characters', () => {
    const prompt = buildPrimingPrompt({ prompt: 'Soft watercolor washes.', art_style: 'watercolor' }, [milo]);
    expect(prompt.startsWith(
      "You are an expert children's book illustrator creating every illustration for one story.\n" +
        'Art style: watercolor.\nArt bible: Soft watercolor washes.\n\n' +
        'Characters:\n- Milo (a Mouse, small grey mouse with big round ears)\n\nGuidelines:'
    )).toBe(true);
  });

  it('primes a referenced character with its reference prompt', () => {
    const prompt = buildPrimingPrompt({ prompt: 'p', art_style: 'watercolor' }, [milo, rosa], {
      Rosa: 'Rosa reference sheet.',
    });
    expect(prompt).toContain('- Milo (a Mouse, small grey mouse with big round ears)\n- Rosa: Rosa reference sheet.');
  });
});

describe('buildArtBiblePrompt', () => {
  it('builds the reference sheet prompt', () => {
    const artBible = buildArtBiblePrompt({ artStyle: 'watercolor', genre: 'adventure', storyTitle: 'The Key' });
    expect(artBible).toEqual({
      prompt:
        'Create an art bible reference sheet for a children\'s book titled "The Key" in the adventure genre. ' +
        'Art style: watercolor. ' +
        'Show one sample scene, a strip of palette swatches, lighting studies and brush or texture samples that define the visual language of the whole book. ' +
        'Do not include any text or lettering in the image.',
      art_style: 'watercolor',
    });
  });

  it('keeps additional notes as style notes', () => {
    expect(buildArtBiblePrompt({ artStyle: 'crayon', additionalNotes: ' thick outlines ' }).style_notes).toBe(
      'thick outlines'
    );
  });

  it('rejects an empty art style', () => {
    expect(() => buildArtBiblePrompt({ artStyle: '  ' })).toThrow(ValidationError);
  });
});

describe('buildCharacterReferencePrompt', () => {
  it('describes a front-only sheet without turnaround', () => {
    expect(buildCharacterReferencePrompt(milo, 'watercolor', false)).toEqual({
      character_name: 'Milo',
      prompt:
        'Create a character reference sheet for Milo (a Mouse, small grey mouse with big round ears). ' +
        'Art style: watercolor. ' +
        'Show the character from the front in a neutral pose on a plain background. ' +
        'Keep proportions, colors and outfit exactly as described so Milo can be redrawn consistently.',
      species: 'Mouse',
      physical_description: 'small grey mouse with big round ears',
    });
  });

  it('rejects a character without a name', () => {
    expect(() => buildCharacterReferencePrompt({ ...milo, name: ' ' }, 'watercolor')).toThrow(
      'character.name must be a non-empty string'
    );
  });
});

describe('scene summary prompts', () => {
  it('names at most three characters with their species', () => {
    const prompt = buildSceneSummaryPrompt('Text.', [milo, rosa, { ...milo, name: 'Tom' }, { ...rosa, name: 'Ann' }]);
    expect(prompt).toContain('Main characters in this story: Milo (a Mouse), Rosa (a Owl), Tom (a Mouse)\n\n');
    expect(prompt).not.toContain('Ann');
  });

  it('falls back to the trimmed page text', () => {
    expect(fallbackSceneSummary('  Milo runs home.  ')).toBe('Milo runs home.');
  });
});
