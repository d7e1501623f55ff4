import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadEnv } from '../src/config/env';

describe('loadEnv', () => {
  it('has defaults for every setting', () => {
    const config = loadEnv({});
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.CHART_THEME).toEqual({ box: { width: 225, height: 80 }, spacingX: 15, spacingY: 10 });
    expect(config.TREE_PREFERENCES).toEqual({ defaultOrientation: 1, defaultGenerations: 4, maxGenerations: 10 });
    expect(config.PEDIGREE_STRICT).toBe(true);
  });

  it('reads overrides', () => {
    const config = loadEnv({ LOG_LEVEL: 'debug', CHART_BOX_WIDTH: '180', PEDIGREE_LAYOUT: '3', PEDIGREE_STRICT: '0' });
    expect(config.LOG_LEVEL).toBe('debug');
    expect(config.CHART_THEME.box.width).toBe(180);
    expect(config.TREE_PREFERENCES.defaultOrientation).toBe(3);
    expect(config.PEDIGREE_STRICT).toBe(false);
  });

  it('rejects malformed values', () => {
    expect(() => loadEnv({ CHART_SPACING_X: 'wide' })).toThrow('Invalid env: CHART_SPACING_X must be an integer');
    expect(() => loadEnv({ PEDIGREE_STRICT: 'maybe' })).toThrow('Invalid env: PEDIGREE_STRICT must be true or false');
    expect(() => loadEnv({ CHART_BOX_HEIGHT: '0' })).toThrow(ZodError);
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});
