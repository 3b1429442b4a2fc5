import { describe, expect, it, vi } from 'vitest';
import { GaussianPacer, MIN_PACE_MS } from '../src/pacing.js';

const sequence = (...values: number[]) => {
  let i = 0;
  return () => values[i++ % values.length];
};

describe('GaussianPacer', () => {
  it('centres each profile on its mean', () => {
    // v = 0.25 puts the cosine at zero
    const pacer = new GaussianPacer({ random: sequence(0.5, 0.25) });
    expect(pacer.delayFor('generic')).toBeCloseTo(300, 6);
    expect(pacer.delayFor('tile')).toBeCloseTo(500, 6);
  });

  it('scales the deviation by the profile sigma', () => {
    // u = 0.5, v = 0: z = sqrt(2 ln 2) ≈ 1.17741
    const pacer = new GaussianPacer({ random: sequence(0.5, 0) });
    expect(pacer.delayFor('verify')).toBeCloseTo(2235.48, 1);
  });

  it('never pauses for less than the floor', () => {
    // u = 0.01, v = 0.5: z ≈ -3.03
    const pacer = new GaussianPacer({ random: sequence(0.99, 0.5) });
    expect(pacer.delayFor('generic')).toBe(MIN_PACE_MS);
  });

  it('accepts custom profiles', () => {
    const pacer = new GaussianPacer({ random: sequence(0.5, 0.25), profiles: { verify: { meanMs: 50, sigmaMs: 0 } } });
    expect(pacer.delayFor('verify')).toBe(MIN_PACE_MS);
    expect(pacer.delayFor('generic')).toBeCloseTo(300, 6);
  });

  it('waits for the sampled delay', async () => {
    const wait = vi.fn<(ms: number) => Promise<void>>(async () => {});
    const pacer = new GaussianPacer({ random: sequence(0.5, 0.25), wait });
    await pacer.pause('dynamicTile');
    expect(wait).toHaveBeenCalledTimes(1);
    expect(wait.mock.calls[0][0]).toBeCloseTo(500, 6);
  });
});
