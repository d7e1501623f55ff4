import pino from 'pino';
import type { AncestryLookup } from '../../src/pedigree/types';
import type { ChartTheme } from '../../src/schemas/pedigree';
import { MemoryAncestry } from '../../src/services/ancestry';
import type { RawEdge, RawPerson } from '../../src/services/ancestry';

export const theme: ChartTheme = { box: { width: 100, height: 50 }, spacingX: 10, spacingY: 10 };

export const silent = pino({ level: 'silent' });

// Individuals are their own Sosa numbers; every ancestor below 2^depth is known
export function fullTree(depth: number, rootHasSpouseFamily = false): AncestryLookup<number> {
  const known = (n: number) => n < 2 ** depth;
  return {
    father: n => (known(2 * n) ? 2 * n : null),
    mother: n => (known(2 * n + 1) ? 2 * n + 1 : null),
    hasParents: n => known(2 * n),
    hasSpouseFamily: n => (n === 1 ? rootHasSpouseFamily : true),
  };
}

export function capturingLogger() {
  const lines: Record<string, unknown>[] = [];
  const log = pino({ level: 'debug' }, { write: (msg: string) => { lines.push(JSON.parse(msg)); } });
  return { log, lines };
}

/*
 *            ggf
 *             |
 *     pgf + pgm     mgm
 *        |           |
 *        f     +     m
 *              |
 *              r ---- spouse
 */
export const people: RawPerson[] = [
  { id: 'r', name: 'Root', gender: 'FEMALE' },
  { id: 'sp', name: 'Spouse', gender: 'MALE' },
  { id: 'f', name: 'Father', gender: 'MALE' },
  { id: 'm', name: 'Mother', gender: 'FEMALE' },
  { id: 'pgf', name: 'Paternal Grandfather', gender: 'MALE' },
  { id: 'pgm', name: 'Paternal Grandmother', gender: 'FEMALE' },
  { id: 'mgm', name: 'Maternal Grandmother', gender: 'FEMALE' },
  { id: 'ggf', name: 'Great Grandfather', gender: 'MALE' },
];

export const edges: RawEdge[] = [
  { type: 'SPOUSE_OF', sourceId: 'r', targetId: 'sp' },
  { type: 'SPOUSE_OF', sourceId: 'f', targetId: 'm' },
  { type: 'PARENT_OF', sourceId: 'm', targetId: 'r' },
  { type: 'PARENT_OF', sourceId: 'f', targetId: 'r' },
  { type: 'PARENT_OF', sourceId: 'pgf', targetId: 'f' },
  { type: 'PARENT_OF', sourceId: 'pgm', targetId: 'f' },
  { type: 'PARENT_OF', sourceId: 'mgm', targetId: 'm' },
  { type: 'PARENT_OF', sourceId: 'ggf', targetId: 'pgf' },
];

export function family() {
  const ancestry = new MemoryAncestry(people, edges);
  const get = (id: string) => {
    const p = ancestry.get(id);
    if (!p) throw new Error(`fixture person ${id} missing`);
    return p;
  };
  return { ancestry, get };
}
