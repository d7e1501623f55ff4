import { ARROW_SIZE, LANDSCAPE_OLDEST_OFFSET, Orientation } from '../constants/orientation';
import type { ChartTheme } from '../schemas/pedigree';
import type { AncestorSlot } from './types';
import { isVerticalCanvas } from './orientation';
import { parentIndex, treeSize } from './sosa';

// curgen counts displayed generations from the oldest one: 1 for the last
// generation of the chart, `generations` for the root.
interface Placement {
  index: number;
  curgen: number;
  generations: number;
  theme: ChartTheme;
  boxspacing: number;
  rootHasSpouseFamily: boolean;
  y: number;
}

type Place = (p: Placement) => { x: number; y: number };

export function genOffset(curgen: number, orientation: Orientation): number {
  return isVerticalCanvas(orientation) ? 2 ** (curgen - orientation) : 2 ** (curgen - 1);
}

export function boxSpacing(orientation: Orientation, theme: ChartTheme): number {
  return (isVerticalCanvas(orientation) ? theme.box.height : theme.box.width) + theme.spacingY;
}

/** Sum of 2^j - 1 for j in 1..gen-3; counters drift from the fourth generation on. */
export function driftCorrection(gen: number): number {
  let sum = 0;
  for (let j = 1; j < gen - 2; j++) sum += 2 ** j - 1;
  return sum;
}

const nudge = (index: number, amount: number) => (index % 2 === 0 ? -amount : amount);

/**
 * Pulls portrait boxes towards their child. Each box moves by half a band per
 * generation according to its own parity, then again for every ancestor
 * position on the way back to the root.
 */
export function compactPortrait(y: number, index: number, curgen: number, boxspacing: number): number {
  const half = boxspacing / 2;
  let offset = y + nudge(index, half * (curgen - 1));
  let pgen = curgen;
  for (let parent = parentIndex(index) ?? 0; parent > 0; parent = parentIndex(parent) ?? 0) {
    offset += nudge(parent, half * pgen);
    pgen++;
    if (pgen > 3) offset += nudge(parent, half * driftCorrection(pgen));
  }
  if (curgen > 3) offset += nudge(index, half * driftCorrection(curgen));
  return offset;
}

const placePortrait: Place = ({ index, curgen, generations, theme, boxspacing, rootHasSpouseFamily, y }) => {
  let x = (generations - curgen) * ((theme.box.width + theme.spacingX) / 1.8);
  if (index === 0 && rootHasSpouseFamily) x -= ARROW_SIZE;
  let yoffset = curgen < generations ? compactPortrait(y, index, curgen, boxspacing) : y;
  yoffset -= (boxspacing / 2) * 2 ** (generations - 2) - boxspacing / 2;
  return { x, y: yoffset };
};

const placeLandscape: Place = ({ curgen, generations, theme, y }) => {
  let x = (generations - curgen) * (theme.box.width + theme.spacingX);
  if (curgen === 1) x += LANDSCAPE_OLDEST_OFFSET;
  return { x, y };
};

// Rotated charts: the band position moves to x
const placeOldestAtTop: Place = ({ curgen, theme, y }) => ({
  x: y,
  y: curgen * (theme.box.height + theme.spacingY * 4),
});

const placeOldestAtBottom: Place = ({ index, curgen, generations, theme, rootHasSpouseFamily, y }) => {
  let yoffset = (generations - curgen) * (theme.box.height + theme.spacingY * 2);
  if (index !== 0 && rootHasSpouseFamily) yoffset += ARROW_SIZE;
  return { x: y, y: yoffset };
};

const PLACEMENTS: Record<Orientation, Place> = {
  [Orientation.Portrait]: placePortrait,
  [Orientation.Landscape]: placeLandscape,
  [Orientation.OldestAtTop]: placeOldestAtTop,
  [Orientation.OldestAtBottom]: placeOldestAtBottom,
};

function toPixel(v: number): number {
  const n = Math.trunc(v);
  return n === 0 ? 0 : n;
}

export function computeOffsets<T>(slots: AncestorSlot<T>[], generations: number, orientation: Orientation, theme: ChartTheme, rootHasSpouseFamily: boolean): void {
  const size = treeSize(generations);
  const place = PLACEMENTS[orientation];
  const boxspacing = boxSpacing(orientation, theme);
  let curgen = 1;

  for (let i = size - 1; i >= 0; i--) {
    if (i < Math.floor(size / 2 ** curgen)) curgen++;

    const boxpos = i - 2 ** (generations - curgen);
    const genoffset = genOffset(curgen, orientation);
    // Centre the box in its band; bands double in size every generation back
    const y = (boxpos * (boxspacing * genoffset)) + ((boxspacing / 2) * genoffset) + (boxspacing * genoffset);

    const pos = place({ index: i, curgen, generations, theme, boxspacing, rootHasSpouseFamily, y });
    slots[i].x = toPixel(pos.x);
    slots[i].y = toPixel(pos.y);
  }
}
