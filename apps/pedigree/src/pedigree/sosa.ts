// Index arithmetic over the flat Sosa-ordered slot array.
// Index i <-> Sosa number i + 1; father of index i is 2i + 1, mother 2i + 2.

export function treeSize(generations: number): number {
  return 2 ** generations - 1;
}

export function sosaOf(index: number): number { return index + 1; }
export function indexOfSosa(sosa: number): number { return sosa - 1; }

export function parentIndex(index: number): number | null {
  return index > 0 ? Math.floor((index - 1) / 2) : null;
}

export function childIndices(index: number, size: number): { father: number; mother: number } | null {
  const father = 2 * index + 1;
  const mother = father + 1;
  return mother < size ? { father, mother } : null;
}

export function isFatherIndex(index: number): boolean {
  return index > 0 && index % 2 === 1;
}

/** Generation of a slot, root = 1. */
export function generationOf(index: number): number {
  return 32 - Math.clz32(sosaOf(index));
}

/** Inclusive index range of one generation (root = 1). */
export function generationRange(generation: number): { start: number; end: number } {
  return { start: 2 ** (generation - 1) - 1, end: 2 ** generation - 2 };
}

/**
 * Slot that becomes the new chart root when following the "previous generation"
 * arrow from a last-generation slot: the root's father for the paternal half,
 * the root's mother for the maternal half.
 */
export function previousGenerationIndex(index: number, size: number): number {
  return index > Math.floor(size / 2) + Math.floor(size / 4) ? 2 : 1;
}
