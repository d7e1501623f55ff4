import type { ArrowIcon, Orientation } from '../constants/orientation';

// What the chart needs to know about an individual; storage stays outside
export interface AncestryLookup<T> {
  father(individual: T): T | null;
  mother(individual: T): T | null;
  hasParents(individual: T): boolean;
  hasSpouseFamily(individual: T): boolean;
}

// Slot i holds Sosa number i + 1. Unknown ancestors keep a null individual.
export interface AncestorSlot<T> {
  individual: T | null;
  x: number;
  y: number;
}

export interface OrientationPolicy {
  orientation: Orientation;
  prevGenIcon: ArrowIcon;
  menuIcon: ArrowIcon;
  extraOffsetX: number;
  extraOffsetY: number;
}

export interface ChartGeometry<T> {
  nodes: readonly AncestorSlot<T>[];
  width: number;
  height: number;
  hasAncestorsBeyondChart: boolean;
  generations: number;
  orientation: Orientation;
  treeSize: number;
  policy: OrientationPolicy;
}
