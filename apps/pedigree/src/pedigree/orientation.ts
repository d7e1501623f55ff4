import { ARROW_ICONS, ARROW_SIZE, Orientation } from '../constants/orientation';
import type { OrientationPolicy } from './types';

interface PolicyInput { hasAncestorsBeyondChart: boolean; rootHasSpouseFamily: boolean; }

const POLICIES: Record<Orientation, (input: PolicyInput) => Omit<OrientationPolicy, 'orientation'>> = {
  [Orientation.Portrait]: ({ hasAncestorsBeyondChart }) => ({
    prevGenIcon: ARROW_ICONS.end,
    menuIcon: ARROW_ICONS.start,
    extraOffsetX: hasAncestorsBeyondChart ? ARROW_SIZE : 0,
    extraOffsetY: 0,
  }),
  [Orientation.Landscape]: () => ({
    prevGenIcon: ARROW_ICONS.end,
    menuIcon: ARROW_ICONS.start,
    extraOffsetX: 0,
    extraOffsetY: 0,
  }),
  [Orientation.OldestAtTop]: ({ rootHasSpouseFamily }) => ({
    prevGenIcon: ARROW_ICONS.up,
    menuIcon: ARROW_ICONS.down,
    extraOffsetX: 0,
    extraOffsetY: rootHasSpouseFamily ? ARROW_SIZE : 0,
  }),
  [Orientation.OldestAtBottom]: ({ hasAncestorsBeyondChart }) => ({
    prevGenIcon: ARROW_ICONS.down,
    menuIcon: ARROW_ICONS.up,
    extraOffsetX: 0,
    extraOffsetY: hasAncestorsBeyondChart ? ARROW_SIZE : 0,
  }),
};

export function resolveOrientation(mode: Orientation, hasAncestorsBeyondChart: boolean, rootHasSpouseFamily: boolean): OrientationPolicy {
  return { orientation: mode, ...POLICIES[mode]({ hasAncestorsBeyondChart, rootHasSpouseFamily }) };
}

/** Portrait and Landscape lay generations out horizontally on a tall canvas. */
export function isVerticalCanvas(mode: Orientation): boolean {
  return mode < Orientation.OldestAtTop;
}
