import { z } from 'zod';
import { MAX_GENERATIONS, MIN_GENERATIONS, Orientation, isOrientation } from '../constants/orientation';

const Pixels = z.number().int().positive();

export const BoxDimensionsSchema = z.object({ width: Pixels, height: Pixels });
export const ChartThemeSchema = z.object({
  box: BoxDimensionsSchema,
  spacingX: Pixels,
  spacingY: Pixels,
});

export const TreePreferencesSchema = z.object({
  defaultOrientation: z.nativeEnum(Orientation),
  defaultGenerations: z.number().int().min(MIN_GENERATIONS),
  maxGenerations: z.number().int().min(MIN_GENERATIONS),
}).refine(p => p.defaultGenerations <= p.maxGenerations, {
  message: 'defaultGenerations must not exceed maxGenerations',
  path: ['defaultGenerations'],
});

// Raw query values: anything a request parser may hand over
export const PedigreeQuerySchema = z.object({
  orientation: z.unknown().optional(),
  generations: z.unknown().optional(),
});

const IntegerParam = z.union([
  z.number().int(),
  z.string().trim().regex(/^[+-]?\d+$/).transform(Number),
]);

export type BoxDimensions = z.infer<typeof BoxDimensionsSchema>;
export type ChartTheme = z.infer<typeof ChartThemeSchema>;
export type TreePreferences = z.infer<typeof TreePreferencesSchema>;
export type PedigreeQuery = z.infer<typeof PedigreeQuerySchema>;

export interface ChartRequest { orientation: Orientation; generations: number; }

// Missing, malformed or out-of-range values fall back to the default
export function filterInteger(raw: unknown, min: number, max: number, fallback: number): number {
  const parsed = IntegerParam.safeParse(raw);
  if(!parsed.success) return fallback;
  return parsed.data >= min && parsed.data <= max ? parsed.data : fallback;
}

export function resolveChartRequest(query: unknown, prefs: TreePreferences): ChartRequest {
  const q = PedigreeQuerySchema.parse(query);
  const code = filterInteger(q.orientation, Orientation.Portrait, Orientation.OldestAtBottom, prefs.defaultOrientation);
  const orientation = isOrientation(code) ? code : prefs.defaultOrientation;
  const generations = filterInteger(q.generations, MIN_GENERATIONS, prefs.maxGenerations, prefs.defaultGenerations);
  return { orientation, generations: Math.min(generations, MAX_GENERATIONS) };
}
