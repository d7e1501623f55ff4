import type { AncestorSlot, AncestryLookup } from './types';
import { childIndices, generationRange, treeSize } from './sosa';

export interface AncestorCollection<T> {
  slots: AncestorSlot<T>[];
  hasAncestorsBeyondChart: boolean;
}

export function collectAncestors<T>(root: T, generations: number, lookup: AncestryLookup<T>): AncestorCollection<T> {
  const size = treeSize(generations);
  const slots: AncestorSlot<T>[] = Array.from({ length: size }, () => ({ individual: null, x: 0, y: 0 }));
  slots[0].individual = root;

  // Parents always sit after their child, so one forward pass fills the tree
  for (let i = 0; i < size; i++) {
    const individual = slots[i].individual;
    const parents = childIndices(i, size);
    if (individual === null || !parents) continue;
    slots[parents.father].individual = lookup.father(individual);
    slots[parents.mother].individual = lookup.mother(individual);
  }

  // Is the chart truncated rather than exhausted?
  const { start } = generationRange(generations);
  const hasAncestorsBeyondChart = slots
    .slice(start)
    .some(s => s.individual !== null && lookup.hasParents(s.individual));

  return { slots, hasAncestorsBeyondChart };
}
