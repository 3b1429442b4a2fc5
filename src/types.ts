/**
 * Shared data model and the ports the engine is driven through.
 *
 * The engine never talks to Playwright, the network or a model directly; the
 * caller hands it a BrowserPort, an ObjectDetector and an ImageFetcher.
 */

export type ChallengeVariant = 'selection' | 'dynamic' | 'squares';

export type GridSize = 3 | 4;

export interface Challenge {
  readonly variant: ChallengeVariant;
  readonly targetClass: number;
  readonly gridSize: GridSize;
}

export type Classification =
  | { kind: 'recognized'; challenge: Challenge; instruction: string }
  | { kind: 'unrecognized'; instruction: string };

/** One row of the term table: a word in the instruction and its detector class id. */
export interface TargetTerm {
  term: string;
  classId: number;
}

/** [x1, y1, x2, y2] in canvas pixels */
export type BoundingBox = [number, number, number, number];

export interface Detection {
  classId: number;
  box: BoundingBox;
  confidence?: number;
}

export type FrameName = 'checkbox' | 'challenge';

/**
 * Minimal browser surface the engine needs. `E` is the adapter's element
 * handle type; the engine only passes handles back to the port.
 */
export interface BrowserPort<E> {
  navigate(url: string): Promise<void>;
  /** Throws NotFoundError when nothing matches within the timeout. */
  find(locator: string, timeoutMs: number): Promise<E>;
  /** Waits for at least one match, then returns all of them. */
  findAll(locator: string, timeoutMs: number): Promise<E[]>;
  /** Throws StaleElementError when the handle went away before the click landed. */
  click(element: E, timeoutMs: number): Promise<void>;
  switchFrame(target: E | 'default'): Promise<void>;
  waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean>;
  textOf(element: E): Promise<string>;
  /** Throws StaleElementError when the handle is no longer attached. */
  attributeOf(element: E, name: string): Promise<string | null>;
}

export interface ObjectDetector {
  detect(png: Buffer): Promise<Detection[]>;
}

export interface ImageFetcher {
  fetch(url: string): Promise<Buffer>;
}

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export type PaceKind = 'generic' | 'tile' | 'dynamicTile' | 'verify';

export interface Pacer {
  pause(kind: PaceKind): Promise<void>;
}

export type SolveResult =
  | { status: 'solved'; autoSolved: boolean; rounds: number }
  | {
      status: 'failed';
      reason: 'fatal' | 'round-limit' | 'error-limit';
      rounds: number;
      error?: Error;
    };
