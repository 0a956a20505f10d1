import { describe, expect, it } from 'vitest';
import { buildAppConfig, buildGameDefaults, validateConfig } from './config.js';

describe('game config', () => {
  it('rolls random dice unless a seed is set', () => {
    expect(buildGameDefaults({}).diceSeed).toBeNull();
    expect(buildGameDefaults({ DICE_SEED: '42' }).diceSeed).toBe(42);
  });

  it('reports a seed that is not a number', () => {
    expect(validateConfig(buildAppConfig({ DICE_SEED: 'lucky' }))).toEqual(['DICE_SEED must be an integer']);
    expect(validateConfig(buildAppConfig({ DICE_SEED: '7' }))).toEqual([]);
  });
});
