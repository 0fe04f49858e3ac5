import { describe, it, expect } from 'vitest';
import { decide } from '../decision';
import { validateGateConfig } from '../config';
import { ConfigError } from '../errors';
import { gateConfig } from './fixtures';

describe('decide', () => {
  it('should accept a score equal to the threshold', () => {
    expect(decide(8.5, 8.5, 1, 3)).toEqual({ outcome: 'STOP_ACCEPT', reason: 'Score 8.5 >= threshold 8.5' });
  });

  it('should continue below the threshold before the last round', () => {
    expect(decide(8.1, 8.5, 1, 3)).toEqual({
      outcome: 'CONTINUE',
      reason: 'Score 8.1 < threshold 8.5; continuing to round 02',
    });
  });

  it('should stop at the last round with ThresholdNeverMet', () => {
    expect(decide(8.1, 8.5, 3, 3)).toEqual({
      outcome: 'STOP_MAX_ROUNDS',
      reason: 'ThresholdNeverMet: score 8.1 < threshold 8.5 after 3/3 rounds',
    });
  });

  it('should prefer acceptance on the last round', () => {
    expect(decide(9, 8.5, 3, 3).outcome).toBe('STOP_ACCEPT');
  });

  it('should stop after a single round when maxRounds is 1', () => {
    expect(decide(2, 8.5, 1, 1).outcome).toBe('STOP_MAX_ROUNDS');
  });
});

describe('validateGateConfig', () => {
  it('should return a copy of a valid config', () => {
    const cfg = gateConfig();
    const checked = validateGateConfig(cfg);

    expect(checked).toEqual(cfg);
    expect(checked).not.toBe(cfg);
  });

  it.each([
    [{ threshold: -1 }, 'threshold must be within [0, 10], got -1'],
    [{ maxRounds: 0 }, 'maxRounds must be a positive integer, got 0'],
    [{ maxRounds: 1.5 }, 'maxRounds must be a positive integer, got 1.5'],
    [{ categories: [] }, 'at least one asset category is required'],
    [{ categories: ['brb', 'brb'] }, 'duplicate categories: brb, brb'],
  ])('should reject %o', (overrides, message) => {
    expect(() => validateGateConfig(gateConfig(overrides))).toThrow(ConfigError);
    expect(() => validateGateConfig(gateConfig(overrides))).toThrow(message);
  });
});
