import type { PaceKind, Pacer } from './types.js';

export interface PaceProfile {
  meanMs: number;
  sigmaMs: number;
}

export const DEFAULT_PACE_PROFILES: Readonly<Record<PaceKind, PaceProfile>> = {
  generic: { meanMs: 300, sigmaMs: 100 },
  tile: { meanMs: 500, sigmaMs: 200 },
  dynamicTile: { meanMs: 500, sigmaMs: 100 },
  verify: { meanMs: 2000, sigmaMs: 200 },
};

export const MIN_PACE_MS = 100;

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Human-like pauses drawn from a normal distribution and clamped to a floor.
 * Only timing camouflage; nothing depends on the exact values.
 */
export class GaussianPacer implements Pacer {
  private readonly profiles: Record<PaceKind, PaceProfile>;
  private readonly random: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(opts: {
    profiles?: Partial<Record<PaceKind, PaceProfile>>;
    random?: () => number;
    wait?: (ms: number) => Promise<void>;
  } = {}) {
    this.profiles = { ...DEFAULT_PACE_PROFILES, ...opts.profiles };
    this.random = opts.random ?? Math.random;
    this.wait = opts.wait ?? sleep;
  }

  delayFor(kind: PaceKind): number {
    const { meanMs, sigmaMs } = this.profiles[kind];
    return Math.max(MIN_PACE_MS, meanMs + sigmaMs * this.standardNormal());
  }

  async pause(kind: PaceKind): Promise<void> {
    await this.wait(this.delayFor(kind));
  }

  // Box–Muller
  private standardNormal(): number {
    const u = 1 - this.random(); // (0, 1], keeps log() finite
    const v = this.random();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }
}

export const instantPacer: Pacer = {
  pause: async () => {},
};
