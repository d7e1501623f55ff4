export { PedigreeLayoutEngine } from './pedigree/engine';
export type { PedigreeLayoutOptions } from './pedigree/engine';
export { collectAncestors } from './pedigree/ancestors';
export type { AncestorCollection } from './pedigree/ancestors';
export { resolveOrientation, isVerticalCanvas } from './pedigree/orientation';
export { computeOffsets, compactPortrait, driftCorrection, genOffset, boxSpacing } from './pedigree/offsets';
export { normalize } from './pedigree/normalize';
export type { NormalizedLayout } from './pedigree/normalize';
export * from './pedigree/sosa';
export type { AncestorSlot, AncestryLookup, ChartGeometry, OrientationPolicy } from './pedigree/types';
export { MemoryAncestry } from './services/ancestry';
export type { RawPerson, RawEdge } from './services/ancestry';
export { Orientation, ARROW_ICONS, ARROW_SIZE, MAX_GENERATIONS, MIN_GENERATIONS, isOrientation } from './constants/orientation';
export { AppError, InvalidArgumentError, toErrorPayload } from './errors/AppError';
export type { ErrorPayload } from './errors/AppError';
export { ChartThemeSchema, TreePreferencesSchema, PedigreeQuerySchema, resolveChartRequest, filterInteger } from './schemas/pedigree';
export type { BoxDimensions, ChartTheme, ChartRequest, PedigreeQuery, TreePreferences } from './schemas/pedigree';
export { env, loadEnv } from './config/env';
export type { Env } from './config/env';
export { logger } from './lib/logger';
