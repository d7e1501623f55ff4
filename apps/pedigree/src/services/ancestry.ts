import type { AncestryLookup } from '../pedigree/types';

// Record shapes served by the family tree API
export type RawPerson = {
  id: string;
  name: string;
  gender?: string | null;
  birthDate?: string | null;
  deathDate?: string | null;
};

export type RawEdge = { id?: string; type: 'PARENT_OF' | 'SPOUSE_OF'; sourceId: string; targetId: string };

interface Parents { father: string | null; mother: string | null; }

// In-memory lookup over a loaded family: PARENT_OF runs parent -> child.
export class MemoryAncestry implements AncestryLookup<RawPerson> {
  readonly warnings: string[] = [];
  private readonly people = new Map<string, RawPerson>();
  private readonly parents = new Map<string, Parents>();
  private readonly spouses = new Set<string>();

  constructor(rawPeople: RawPerson[], rawEdges: RawEdge[]) {
    rawPeople.forEach(p => this.people.set(p.id, p));
    const known = (e: RawEdge) => {
      if (this.people.has(e.sourceId) && this.people.has(e.targetId)) return true;
      this.warnings.push(`Edge ${e.sourceId} -> ${e.targetId} references an unknown person`);
      return false;
    };

    rawEdges.filter(e => e.type === 'SPOUSE_OF' && known(e)).forEach(e => {
      this.spouses.add(e.sourceId);
      this.spouses.add(e.targetId);
    });

    // Gendered parents first so an unknown-gender parent takes whichever role is left
    const parentEdges = rawEdges.filter(e => e.type === 'PARENT_OF' && known(e));
    const gendered = parentEdges.filter(e => this.genderOf(e.sourceId) !== null);
    const other = parentEdges.filter(e => this.genderOf(e.sourceId) === null);
    [...gendered, ...other].forEach(e => this.addParent(e.sourceId, e.targetId));
  }

  get(id: string): RawPerson | null {
    return this.people.get(id) ?? null;
  }

  father(individual: RawPerson): RawPerson | null {
    return this.lookup(this.parents.get(individual.id)?.father);
  }

  mother(individual: RawPerson): RawPerson | null {
    return this.lookup(this.parents.get(individual.id)?.mother);
  }

  hasParents(individual: RawPerson): boolean {
    const p = this.parents.get(individual.id);
    return !!p && (p.father !== null || p.mother !== null);
  }

  // A spouse family exists once someone is recorded as partner or parent
  hasSpouseFamily(individual: RawPerson): boolean {
    return this.spouses.has(individual.id);
  }

  private lookup(id: string | null | undefined): RawPerson | null {
    return id ? this.get(id) : null;
  }

  private genderOf(id: string): 'MALE' | 'FEMALE' | null {
    const g = this.people.get(id)?.gender;
    return g === 'MALE' || g === 'FEMALE' ? g : null;
  }

  private addParent(parentId: string, childId: string) {
    this.spouses.add(parentId);
    const entry = this.parents.get(childId) ?? { father: null, mother: null };
    this.parents.set(childId, entry);
    const gender = this.genderOf(parentId);
    const role = gender === 'MALE' ? 'father' : gender === 'FEMALE' ? 'mother' : entry.father === null ? 'father' : 'mother';
    if (entry[role] !== null) {
      this.warnings.push(`"${this.people.get(childId)?.name ?? childId}" already has a ${role}; ignoring ${parentId}`);
      return;
    }
    entry[role] = parentId;
  }
}
