// Offset math depends on this order: codes below OldestAtTop lay generations
// out along x, the rest along y.
export const Orientation = {
  Portrait: 0,
  Landscape: 1,
  OldestAtTop: 2,
  OldestAtBottom: 3,
} as const;
export type Orientation = typeof Orientation[keyof typeof Orientation];

export const ORIENTATION_NAMES: Record<Orientation, string> = {
  [Orientation.Portrait]: 'portrait',
  [Orientation.Landscape]: 'landscape',
  [Orientation.OldestAtTop]: 'oldestAtTop',
  [Orientation.OldestAtBottom]: 'oldestAtBottom',
};

export function isOrientation(v: number): v is Orientation {
  return v === Orientation.Portrait || v === Orientation.Landscape || v === Orientation.OldestAtTop || v === Orientation.OldestAtBottom;
}

export const MIN_GENERATIONS = 2;
// Beyond 8 generations the canvas runs out of pixels
export const MAX_GENERATIONS = 8;

// Next/previous generation arrow size in pixels
export const ARROW_SIZE = 22;

export const LANDSCAPE_OLDEST_OFFSET = 10;

export const ARROW_ICONS = {
  start: 'fas fa-arrow-start',
  end: 'fas fa-arrow-end',
  up: 'fas fa-arrow-up',
  down: 'fas fa-arrow-down',
} as const;
export type ArrowIcon = typeof ARROW_ICONS[keyof typeof ARROW_ICONS];
