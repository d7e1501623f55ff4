import type { ChartTheme } from '../schemas/pedigree';
import type { AncestorSlot, OrientationPolicy } from './types';

export interface NormalizedLayout<T> {
  nodes: AncestorSlot<T>[];
  width: number;
  height: number;
}

// Shifts every slot so the top-left-most box sits at the origin, then sizes the canvas.
export function normalize<T>(slots: AncestorSlot<T>[], theme: ChartTheme, policy: Pick<OrientationPolicy, 'extraOffsetX' | 'extraOffsetY'>): NormalizedLayout<T> {
  const minX = Math.min(...slots.map(s => s.x));
  const minY = Math.min(...slots.map(s => s.y));
  slots.forEach(s => { s.x -= minX; s.y -= minY; });

  const maxX = Math.max(...slots.map(s => s.x));
  const maxY = Math.max(...slots.map(s => s.y));
  return {
    nodes: slots,
    width: maxX + theme.spacingX + theme.box.width + policy.extraOffsetX,
    height: maxY + theme.spacingY + theme.box.height + policy.extraOffsetY,
  };
}
