import { describe, it, expect } from 'vitest';
import { collectAncestors } from '../src/pedigree/ancestors';
import { parentIndex, isFatherIndex } from '../src/pedigree/sosa';
import { family, fullTree } from './helpers/fixtures';

describe('collectAncestors', () => {
  it('allocates 2^g - 1 slots even when no ancestor is known', () => {
    const lonely = fullTree(1);
    for (let g = 2; g <= 8; g++) {
      const { slots, hasAncestorsBeyondChart } = collectAncestors(1, g, lonely);
      expect(slots.length).toBe(2 ** g - 1);
      expect(slots.filter(s => s.individual !== null)).toHaveLength(1);
      expect(hasAncestorsBeyondChart).toBe(false);
    }
  });

  it('places ancestors by sosa number with unknown ones left null', () => {
    const { ancestry, get } = family();
    const { slots } = collectAncestors(get('r'), 3, ancestry);
    expect(slots.map(s => s.individual?.id ?? null)).toEqual(['r', 'f', 'm', 'pgf', 'pgm', null, 'mgm']);
    expect(slots.every(s => s.x === 0 && s.y === 0)).toBe(true);
  });

  it('keeps every slot the father or mother of its parent slot', () => {
    const lookup = fullTree(8);
    const { slots } = collectAncestors(1, 6, lookup);
    slots.forEach((s, i) => {
      expect(s.individual).toBe(i + 1);
      const parent = parentIndex(i);
      if (parent === null) return;
      const child = slots[parent].individual;
      if (child === null) throw new Error('full tree has no gaps');
      expect(s.individual).toBe(isFatherIndex(i) ? lookup.father(child) : lookup.mother(child));
    });
  });

  it('flags a truncated chart', () => {
    const { ancestry, get } = family();
    expect(collectAncestors(get('r'), 2, ancestry).hasAncestorsBeyondChart).toBe(true);
    expect(collectAncestors(get('r'), 3, ancestry).hasAncestorsBeyondChart).toBe(true);
  });

  it('does not flag an exhausted chart', () => {
    const { ancestry, get } = family();
    const { slots, hasAncestorsBeyondChart } = collectAncestors(get('r'), 4, ancestry);
    expect(slots[7].individual?.id).toBe('ggf');
    expect(hasAncestorsBeyondChart).toBe(false);
  });
});
