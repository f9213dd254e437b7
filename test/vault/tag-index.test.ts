/**
 * Tests for the run-scoped tag index
 */

import { describe, it, expect } from 'vitest';
import { TagIndex, tagTitle } from '../../src/vault/tag-index.js';
import { StateError } from '../../src/lib/errors.js';

describe('tagTitle', () => {
  it('should title-case the words of a tag', () => {
    expect(tagTitle('fictional_character')).toBe('Fictional Character');
    expect(tagTitle('characters')).toBe('Characters');
  });
});

describe('TagIndex', () => {
  it('should list pages per tag in sorted order', () => {
    const index = new TagIndex();
    index.record(['characters'], { title: 'Gandalf', note: 'Gandalf' });
    index.record(['wizards', 'characters'], { title: 'Frodo', note: 'Frodo' });

    expect(index.tags()).toEqual(['characters', 'wizards']);
    expect(index.pagesFor('characters')).toEqual(['Frodo', 'Gandalf']);
    expect(index.pagesFor('unknown')).toEqual([]);
  });

  it('should only grow as pages are recorded', () => {
    const index = new TagIndex();
    index.record(['characters'], { title: 'Gandalf', note: 'Gandalf' });
    const before = index.pagesFor('characters');
    index.record(['characters'], { title: 'Aragorn', note: 'Aragorn' });
    index.record(['characters'], { title: 'Gandalf', note: 'Gandalf' });

    const after = index.pagesFor('characters');
    expect(after).toEqual(['Aragorn', 'Gandalf']);
    expect(before.every((title) => after.includes(title))).toBe(true);
  });

  it('should build one index document per tag', () => {
    const index = new TagIndex();
    index.record(['characters'], { title: 'Gandalf', note: 'Gandalf' });
    index.record(['characters'], { title: 'Frodo', note: 'Frodo' });

    expect(index.build('_indexes')).toEqual([
      {
        tag: 'characters',
        path: '_indexes/_characters.md',
        content: '# Characters Index\n\n- [[Frodo]]\n- [[Gandalf]]\n',
        pages: ['Frodo', 'Gandalf'],
      },
    ]);
    expect(index.isBuilt).toBe(true);
  });

  it('should link by note name when it differs from the title', () => {
    const index = new TagIndex();
    index.record(['places'], { title: 'Minas Tirith/Citadel', note: 'Minas Tirith_Citadel' });

    const [document] = index.build('_indexes');
    expect(document?.content).toBe('# Places Index\n\n- [[Minas Tirith_Citadel|Minas Tirith/Citadel]]\n');
  });

  it('should refuse to record after build', () => {
    const index = new TagIndex();
    index.build('_indexes');
    expect(() => index.record(['late'], { title: 'Late', note: 'Late' })).toThrow(StateError);
  });

  it('should build nothing when empty', () => {
    expect(new TagIndex().build('_indexes')).toEqual([]);
  });
});
