import { NotFoundError, StaleElementError } from '../../src/errors.js';
import { Locators, tileCell } from '../../src/locators.js';
import type { BrowserPort } from '../../src/types.js';

type FrameId = 'top' | 'checkbox' | 'challenge';

export interface FakeElement {
  locator: string;
  text?: string;
  src?: string;
  frame?: FrameId;
  onClick?: () => void;
}

export interface ScriptedChallenge {
  /** Text of the emphasised target term, e.g. "traffic lights". */
  target: string;
  instruction?: string;
  /** Whether clicking verify on this challenge solves the widget. */
  passes?: boolean;
  /** Tile image sources; defaults to one shared full-image URL per cell. */
  urls?: string[];
  /** Sources a tile takes on successive clicks. */
  replacements?: Record<number, string[]>;
  /** Tile-image reads that go by before a clicked tile shows its replacement. */
  refreshLag?: number;
}

interface PendingSwap {
  tile: number;
  url: string;
  remaining: number;
}

/**
 * In-process stand-in for the reCAPTCHA widget, driven through the same port
 * the engine uses on a real page. Challenges are served in order; the last
 * one repeats when the script runs out.
 */
export class FakeWidget implements BrowserPort<FakeElement> {
  frame: FrameId = 'top';
  checked = false;
  autoSolve = false;
  readonly missingFrames = new Set<'checkbox' | 'challenge'>();
  readonly clicks: string[] = [];
  readonly navigations: string[] = [];
  readonly clickTimeouts: number[] = [];
  /** Error thrown by the next navigate() call. */
  navigationError: Error | null = null;
  /** Attribute reads that throw StaleElementError before reads succeed again. */
  staleReads = 0;

  private index = 0;
  private urls: string[] = [];
  private pendingSwaps: PendingSwap[] = [];
  private replacements: Record<number, string[]> = {};

  constructor(private readonly challenges: ScriptedChallenge[]) {
    this.load(0);
  }

  get current(): ScriptedChallenge {
    return this.challenges[Math.min(this.index, this.challenges.length - 1)];
  }

  get challengeIndex(): number {
    return this.index;
  }

  tileUrls(): string[] {
    return [...this.urls];
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    if (this.navigationError) throw this.navigationError;
    this.frame = 'top';
  }

  async find(locator: string, timeoutMs: number): Promise<FakeElement> {
    const found = this.resolve(locator);
    if (found.length === 0) throw new NotFoundError(locator, timeoutMs);
    return found[0];
  }

  async findAll(locator: string, timeoutMs: number): Promise<FakeElement[]> {
    if (locator === Locators.tileImages) this.tickSwaps();
    const found = this.resolve(locator);
    if (found.length === 0) throw new NotFoundError(locator, timeoutMs);
    return found;
  }

  async click(element: FakeElement, timeoutMs: number): Promise<void> {
    this.clickTimeouts.push(timeoutMs);
    element.onClick?.();
  }

  async switchFrame(target: FakeElement | 'default'): Promise<void> {
    this.frame = target === 'default' ? 'top' : target.frame ?? 'top';
  }

  async waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
    // One poll per 100ms of timeout, without actually sleeping.
    const polls = Math.max(1, Math.ceil(timeoutMs / 100));
    for (let i = 0; i < polls; i++) {
      if (await predicate()) return true;
    }
    return false;
  }

  async textOf(element: FakeElement): Promise<string> {
    return element.text ?? '';
  }

  async attributeOf(element: FakeElement, name: string): Promise<string | null> {
    if (this.staleReads > 0) {
      this.staleReads--;
      throw new StaleElementError(`attribute "${name}"`);
    }
    return name === 'src' ? element.src ?? null : null;
  }

  private load(index: number): void {
    this.index = index;
    const challenge = this.current;
    const squares = (challenge.instruction ?? '').includes('squares');
    const cells = squares ? 16 : 9;
    this.urls = challenge.urls ? [...challenge.urls] : Array.from({ length: cells }, () => `c${index}/full.png`);
    this.replacements = Object.fromEntries(
      Object.entries(challenge.replacements ?? {}).map(([tile, list]) => [tile, [...list]]),
    );
    this.pendingSwaps = [];
  }

  private nextChallenge(): void {
    this.load(this.index + 1);
  }

  private clickTile(tile: number): void {
    this.clicks.push(`tile:${tile}`);
    const queue = this.replacements[tile];
    const url = queue?.shift();
    if (!url) return;
    const lag = this.current.refreshLag ?? 0;
    if (lag === 0) this.urls[tile - 1] = url;
    else this.pendingSwaps.push({ tile, url, remaining: lag });
  }

  private tickSwaps(): void {
    for (const swap of this.pendingSwaps) {
      swap.remaining--;
      if (swap.remaining <= 0) this.urls[swap.tile - 1] = swap.url;
    }
    this.pendingSwaps = this.pendingSwaps.filter((s) => s.remaining > 0);
  }

  private resolve(locator: string): FakeElement[] {
    if (this.frame === 'top') {
      if (locator === Locators.checkboxFrame && !this.missingFrames.has('checkbox')) {
        return [{ locator, frame: 'checkbox' }];
      }
      if (locator === Locators.challengeFrame && !this.missingFrames.has('challenge')) {
        return [{ locator, frame: 'challenge' }];
      }
      return [];
    }

    if (this.frame === 'checkbox') {
      if (locator === Locators.checkbox) {
        return [{
          locator,
          onClick: () => {
            this.clicks.push('checkbox');
            if (this.autoSolve) this.checked = true;
          },
        }];
      }
      if (locator === Locators.checkedIndicator && this.checked) return [{ locator }];
      return [];
    }

    const challenge = this.current;
    switch (locator) {
      case Locators.instructions:
        return [{ locator, text: challenge.instruction ?? `Select all images with ${challenge.target}` }];
      case Locators.targetTerm:
        return [{ locator, text: challenge.target }];
      case Locators.tileImages:
        return this.urls.map((src) => ({ locator, src }));
      case Locators.reloadButton:
        return [{
          locator,
          onClick: () => {
            this.clicks.push('reload');
            this.nextChallenge();
          },
        }];
      case Locators.verifyButton:
        return [{
          locator,
          onClick: () => {
            this.clicks.push('verify');
            if (challenge.passes) this.checked = true;
            else this.nextChallenge();
          },
        }];
    }
    for (let tile = 1; tile <= this.urls.length; tile++) {
      if (locator === tileCell(tile)) return [{ locator, onClick: () => this.clickTile(tile) }];
    }
    return [];
  }
}
