import { z } from 'zod';
import type { TargetTerm } from './types.js';

export interface SolverConfig {
  frameTimeoutMs: number;
  elementTimeoutMs: number;
  autoSolveProbeMs: number;
  verifyProbeMs: number;
  refreshTimeoutMs: number;
  maxRounds: number;
  maxDynamicRounds: number;
  maxCompositeAttempts: number;
  maxConsecutiveErrors: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Checked in order; the first term found in the instruction wins. */
  targetTerms: TargetTerm[];
  verbose: boolean;
}

// Class ids follow the COCO ordering the bundled YOLO weights were exported with.
export const DEFAULT_TARGET_TERMS: readonly TargetTerm[] = [
  { term: 'bicycle', classId: 1 },
  { term: 'bus', classId: 5 },
  { term: 'boat', classId: 8 },
  { term: 'car', classId: 2 },
  { term: 'hydrant', classId: 10 },
  { term: 'motorcycle', classId: 3 },
  { term: 'traffic', classId: 9 },
];

export const DEFAULT_CONFIG: Readonly<SolverConfig> = {
  frameTimeoutMs: 20_000,
  elementTimeoutMs: 10_000,
  autoSolveProbeMs: 3_000,
  verifyProbeMs: 4_000,
  refreshTimeoutMs: 10_000,
  maxRounds: 25,
  maxDynamicRounds: 15,
  maxCompositeAttempts: 5,
  maxConsecutiveErrors: 5,
  backoffBaseMs: 500,
  backoffMaxMs: 8_000,
  targetTerms: [...DEFAULT_TARGET_TERMS],
  verbose: false,
};

export function resolveConfig(overrides: Partial<SolverConfig> = {}): SolverConfig {
  const config: SolverConfig = { ...DEFAULT_CONFIG, targetTerms: [...DEFAULT_CONFIG.targetTerms] };
  // Explicit `undefined` in overrides must not wipe a default.
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }
  return config;
}

const positiveInt = z.coerce.number().int().positive();

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const EnvSchema = z.object({
  CAPTCHA_SOLVER_MAX_ROUNDS: positiveInt.optional(),
  CAPTCHA_SOLVER_MAX_DYNAMIC_ROUNDS: positiveInt.optional(),
  CAPTCHA_SOLVER_MAX_CONSECUTIVE_ERRORS: positiveInt.optional(),
  CAPTCHA_SOLVER_FRAME_TIMEOUT_MS: positiveInt.optional(),
  CAPTCHA_SOLVER_ELEMENT_TIMEOUT_MS: positiveInt.optional(),
  CAPTCHA_SOLVER_REFRESH_TIMEOUT_MS: positiveInt.optional(),
  CAPTCHA_SOLVER_VERBOSE: flag.optional(),
});

/**
 * Read overrides from `CAPTCHA_SOLVER_*` environment variables.
 * Throws a ZodError when a variable is set to something unusable.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SolverConfig> {
  const parsed = EnvSchema.parse(env);
  const out: Partial<SolverConfig> = {};
  if (parsed.CAPTCHA_SOLVER_MAX_ROUNDS !== undefined) out.maxRounds = parsed.CAPTCHA_SOLVER_MAX_ROUNDS;
  if (parsed.CAPTCHA_SOLVER_MAX_DYNAMIC_ROUNDS !== undefined) out.maxDynamicRounds = parsed.CAPTCHA_SOLVER_MAX_DYNAMIC_ROUNDS;
  if (parsed.CAPTCHA_SOLVER_MAX_CONSECUTIVE_ERRORS !== undefined) {
    out.maxConsecutiveErrors = parsed.CAPTCHA_SOLVER_MAX_CONSECUTIVE_ERRORS;
  }
  if (parsed.CAPTCHA_SOLVER_FRAME_TIMEOUT_MS !== undefined) out.frameTimeoutMs = parsed.CAPTCHA_SOLVER_FRAME_TIMEOUT_MS;
  if (parsed.CAPTCHA_SOLVER_ELEMENT_TIMEOUT_MS !== undefined) out.elementTimeoutMs = parsed.CAPTCHA_SOLVER_ELEMENT_TIMEOUT_MS;
  if (parsed.CAPTCHA_SOLVER_REFRESH_TIMEOUT_MS !== undefined) out.refreshTimeoutMs = parsed.CAPTCHA_SOLVER_REFRESH_TIMEOUT_MS;
  if (parsed.CAPTCHA_SOLVER_VERBOSE !== undefined) out.verbose = parsed.CAPTCHA_SOLVER_VERBOSE;
  return out;
}
