import { Locators } from './locators.js';
import type { BrowserPort, Challenge, ChallengeVariant, Classification, TargetTerm } from './types.js';

export function matchTarget(term: string, table: readonly TargetTerm[]): number | null {
  const text = term.toLowerCase();
  for (const entry of table) {
    if (text.includes(entry.term)) return entry.classId;
  }
  return null;
}

/**
 * Variant from the instruction wording: "...squares with..." is the 4x4
 * challenge, "...click verify once there are none left" is the dynamic one.
 */
export function detectVariant(instruction: string): ChallengeVariant {
  const text = instruction.toLowerCase();
  if (text.includes('squares')) return 'squares';
  if (text.includes('none')) return 'dynamic';
  return 'selection';
}

export function buildChallenge(targetClass: number, variant: ChallengeVariant): Challenge {
  return { targetClass, variant, gridSize: variant === 'squares' ? 4 : 3 };
}

/** Reads the challenge frame's instruction block. Expects to be inside the challenge frame. */
export class ChallengeClassifier<E> {
  constructor(
    private readonly browser: BrowserPort<E>,
    private readonly terms: readonly TargetTerm[],
    private readonly timeoutMs: number,
  ) {}

  async classify(): Promise<Classification> {
    const wrapper = await this.browser.find(Locators.instructions, this.timeoutMs);
    const target = await this.browser.find(Locators.targetTerm, this.timeoutMs);
    const instruction = await this.browser.textOf(wrapper);
    const term = await this.browser.textOf(target);

    const targetClass = matchTarget(term, this.terms);
    if (targetClass === null) return { kind: 'unrecognized', instruction };
    return { kind: 'recognized', challenge: buildChallenge(targetClass, detectVariant(instruction)), instruction };
  }
}
