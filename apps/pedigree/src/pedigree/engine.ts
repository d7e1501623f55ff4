import { MAX_GENERATIONS, MIN_GENERATIONS, ORIENTATION_NAMES, Orientation, isOrientation } from '../constants/orientation';
import { env } from '../config/env';
import type { Env } from '../config/env';
import { InvalidArgumentError } from '../errors/AppError';
import { logger as rootLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { ChartThemeSchema, resolveChartRequest } from '../schemas/pedigree';
import type { ChartTheme, TreePreferences } from '../schemas/pedigree';
import { collectAncestors } from './ancestors';
import { normalize } from './normalize';
import { computeOffsets } from './offsets';
import { resolveOrientation } from './orientation';
import { generationRange, previousGenerationIndex } from './sosa';
import type { AncestryLookup, ChartGeometry } from './types';

export interface PedigreeLayoutOptions {
  theme: ChartTheme;
  /** Reject out-of-range input instead of clamping it. Defaults to true. */
  strict?: boolean;
  logger?: Logger;
}

export class PedigreeLayoutEngine<T> {
  private readonly theme: ChartTheme;
  private readonly strict: boolean;
  private readonly log: Logger;

  constructor(private readonly lookup: AncestryLookup<T>, options: PedigreeLayoutOptions) {
    const theme = ChartThemeSchema.safeParse(options.theme);
    if (!theme.success) {
      const detail = theme.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new InvalidArgumentError(`Invalid chart theme (${detail})`);
    }
    this.theme = theme.data;
    this.strict = options.strict ?? true;
    this.log = (options.logger ?? rootLogger).child({ module: 'pedigree-layout' });
  }

  static fromEnv<T>(lookup: AncestryLookup<T>, config: Env = env, logger?: Logger): PedigreeLayoutEngine<T> {
    return new PedigreeLayoutEngine(lookup, { theme: config.CHART_THEME, strict: config.PEDIGREE_STRICT, logger });
  }

  layout(root: T, generations: number, orientation: number): ChartGeometry<T> {
    const t0 = Date.now();
    const gens = this.checkGenerations(generations);
    const mode = this.checkOrientation(orientation);

    const { slots, hasAncestorsBeyondChart } = collectAncestors(root, gens, this.lookup);
    const rootHasSpouseFamily = this.lookup.hasSpouseFamily(root);
    const policy = resolveOrientation(mode, hasAncestorsBeyondChart, rootHasSpouseFamily);
    computeOffsets(slots, gens, mode, this.theme, rootHasSpouseFamily);
    const { nodes, width, height } = normalize(slots, this.theme, policy);

    this.log.debug({ evt: 'pedigree_layout', generations: gens, orientation: ORIENTATION_NAMES[mode], nodes: nodes.length, known: nodes.filter(n => n.individual !== null).length, width, height, tookMs: Date.now() - t0 });
    return { nodes, width, height, hasAncestorsBeyondChart, generations: gens, orientation: mode, treeSize: nodes.length, policy };
  }

  /** Lays out a chart from raw request parameters, falling back to the tree preferences. */
  fromRequest(root: T, query: unknown, prefs: TreePreferences): ChartGeometry<T> {
    const req = resolveChartRequest(query, prefs);
    return this.layout(root, req.generations, req.orientation);
  }

  /**
   * Individual the chart re-roots on when the "previous generation" arrow of a
   * last-generation slot is followed. Null where no arrow is drawn.
   */
  previousGeneration(geometry: ChartGeometry<T>, index: number): T | null {
    if (!Number.isInteger(index) || index < 0 || index >= geometry.treeSize) {
      throw new InvalidArgumentError(`Slot index ${index} is outside the chart (0..${geometry.treeSize - 1})`);
    }
    if (!geometry.hasAncestorsBeyondChart) return null;
    if (index < generationRange(geometry.generations).start) return null;
    const individual = geometry.nodes[index].individual;
    if (individual === null || !this.lookup.hasParents(individual)) return null;
    return geometry.nodes[previousGenerationIndex(index, geometry.treeSize)].individual;
  }

  private checkGenerations(generations: number): number {
    if (!Number.isFinite(generations)) {
      throw new InvalidArgumentError(`Generations must be a finite number, got ${generations}`);
    }
    const inRange = Number.isInteger(generations) && generations >= MIN_GENERATIONS && generations <= MAX_GENERATIONS;
    if (inRange) return generations;
    if (this.strict) {
      throw new InvalidArgumentError(`Generations must be an integer between ${MIN_GENERATIONS} and ${MAX_GENERATIONS}, got ${generations}`);
    }
    const clamped = Math.min(Math.max(Math.trunc(generations), MIN_GENERATIONS), MAX_GENERATIONS);
    this.log.warn({ evt: 'pedigree_clamp', param: 'generations', requested: generations, used: clamped });
    return clamped;
  }

  private checkOrientation(orientation: number): Orientation {
    if (isOrientation(orientation)) return orientation;
    if (this.strict || !Number.isFinite(orientation)) {
      throw new InvalidArgumentError(`Orientation must be one of 0, 1, 2, 3, got ${orientation}`);
    }
    const code = Math.min(Math.max(Math.trunc(orientation), Orientation.Portrait), Orientation.OldestAtBottom);
    const clamped = isOrientation(code) ? code : Orientation.Portrait;
    this.log.warn({ evt: 'pedigree_clamp', param: 'orientation', requested: orientation, used: clamped });
    return clamped;
  }
}
