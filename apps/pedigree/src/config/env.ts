import 'dotenv/config';
import { z } from 'zod';
import { ChartThemeSchema, TreePreferencesSchema } from '../schemas/pedigree';

export type EnvSource = Record<string, string | undefined>;

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function int(source: EnvSource, name: string, fallback: number): number {
  const v = source[name];
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid env: ${name} must be an integer`);
  return n;
}

function flag(source: EnvSource, name: string, fallback: boolean): boolean {
  const v = source[name]?.trim().toLowerCase();
  if (!v) return fallback;
  if (v === 'true' || v === '1') return true;
  if (v === 'false' || v === '0') return false;
  throw new Error(`Invalid env: ${name} must be true or false`);
}

export function loadEnv(source: EnvSource = process.env) {
  return {
    LOG_LEVEL: LogLevelSchema.parse(source.LOG_LEVEL || 'info'),
    // Box size and gaps come from the presentation theme
    CHART_THEME: ChartThemeSchema.parse({
      box: {
        width: int(source, 'CHART_BOX_WIDTH', 225),
        height: int(source, 'CHART_BOX_HEIGHT', 80),
      },
      spacingX: int(source, 'CHART_SPACING_X', 15),
      spacingY: int(source, 'CHART_SPACING_Y', 10),
    }),
    TREE_PREFERENCES: TreePreferencesSchema.parse({
      defaultOrientation: int(source, 'PEDIGREE_LAYOUT', 1),
      defaultGenerations: int(source, 'DEFAULT_PEDIGREE_GENERATIONS', 4),
      maxGenerations: int(source, 'MAX_PEDIGREE_GENERATIONS', 10),
    }),
    PEDIGREE_STRICT: flag(source, 'PEDIGREE_STRICT', true),
  };
}

export type Env = ReturnType<typeof loadEnv>;

export const env = loadEnv();
