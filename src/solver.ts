/**
 * Challenge-resolution loop.
 *
 * checkbox ──► solved (auto)
 *    │
 *    ▼
 * classifying ──► solving ──► selecting ──► verifying ──► solved
 *    ▲   │            │           │             │
 *    │   ▼            ▼           ▼             │
 *    └── reload ◄─────┴───────────┘             │
 *    ▲                                          │
 *    └──────────────────────────────────────────┘  (new challenge shown)
 *
 * Each state has one transition method that returns the next state. Thrown
 * errors are sorted by kind: fatal ends the run, reload asks for a new
 * challenge, anything else backs off and re-classifies.
 */

import { Canvas } from './canvas.js';
import { ChallengeClassifier } from './classifier.js';
import { TileCompositor } from './compositor.js';
import { resolveConfig, type SolverConfig } from './config.js';
import { NotFoundError, UnsolvableChallengeError, errorMessage, failureKind, toError } from './errors.js';
import { FrameNavigator } from './frames.js';
import { isSolvable, mapDetections, centroidTiles } from './grid.js';
import { Locators, tileCell } from './locators.js';
import { silentLogger } from './logger.js';
import { GaussianPacer, sleep } from './pacing.js';
import type {
  BrowserPort,
  Challenge,
  ImageFetcher,
  Logger,
  ObjectDetector,
  PaceKind,
  Pacer,
  SolveResult,
} from './types.js';

export type SolverState =
  | { name: 'checkbox' }
  | { name: 'classifying' }
  | { name: 'solving'; challenge: Challenge }
  | { name: 'selecting'; challenge: Challenge; tiles: number[]; urls: string[]; canvas: Canvas }
  | { name: 'verifying' }
  | { name: 'reload'; reason: string }
  | { name: 'solved'; autoSolved: boolean };

export type SolverStateName = SolverState['name'];

export interface SolverDeps<E> {
  browser: BrowserPort<E>;
  detector: ObjectDetector;
  fetcher: ImageFetcher;
  pacer?: Pacer;
  logger?: Logger;
  config?: Partial<SolverConfig>;
  /** Used for error backoff; tests pass a no-op. */
  wait?: (ms: number) => Promise<void>;
  /** Called on every transition, before the new state runs. */
  onTransition?: (from: SolverStateName, to: SolverStateName) => void;
}

export class ChallengeSolver<E> {
  private readonly browser: BrowserPort<E>;
  private readonly detector: ObjectDetector;
  private readonly fetcher: ImageFetcher;
  private readonly pacer: Pacer;
  private readonly log: Logger;
  private readonly config: SolverConfig;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly onTransition?: (from: SolverStateName, to: SolverStateName) => void;

  private readonly frames: FrameNavigator<E>;
  private readonly classifier: ChallengeClassifier<E>;
  private readonly compositor: TileCompositor<E>;

  constructor(deps: SolverDeps<E>) {
    this.browser = deps.browser;
    this.detector = deps.detector;
    this.fetcher = deps.fetcher;
    this.pacer = deps.pacer ?? new GaussianPacer();
    this.log = deps.logger ?? silentLogger;
    this.config = resolveConfig(deps.config);
    this.wait = deps.wait ?? sleep;
    this.onTransition = deps.onTransition;

    this.frames = new FrameNavigator(this.browser, this.config.frameTimeoutMs, this.log);
    this.classifier = new ChallengeClassifier(this.browser, this.config.targetTerms, this.config.elementTimeoutMs);
    this.compositor = new TileCompositor(
      this.browser,
      this.fetcher,
      {
        elementTimeoutMs: this.config.elementTimeoutMs,
        refreshTimeoutMs: this.config.refreshTimeoutMs,
        maxCompositeAttempts: this.config.maxCompositeAttempts,
      },
      this.log,
    );
  }

  async solve(url?: string): Promise<SolveResult> {
    if (url) {
      try {
        await this.browser.navigate(url);
      } catch (err) {
        this.log.error(`[Solver] Could not open ${url}: ${errorMessage(err)}`);
        return { status: 'failed', reason: 'fatal', rounds: 0, error: toError(err) };
      }
    }

    let state: SolverState = { name: 'checkbox' };
    let rounds = 0;
    // Transient failures since the last completed tile selection.
    let errorStreak = 0;

    for (;;) {
      if (state.name === 'solved') {
        this.log.info(state.autoSolved ? '[Solver] Solved without a challenge' : `[Solver] Solved after ${rounds} round(s)`);
        return { status: 'solved', autoSolved: state.autoSolved, rounds };
      }
      if (state.name === 'classifying') {
        rounds++;
        if (rounds > this.config.maxRounds) {
          this.log.warn(`[Solver] Giving up after ${this.config.maxRounds} rounds`);
          return { status: 'failed', reason: 'round-limit', rounds: this.config.maxRounds };
        }
      }

      let next: SolverState;
      try {
        next = await this.step(state);
        if (next.name === 'verifying') errorStreak = 0;
      } catch (err) {
        const kind = failureKind(err);
        if (kind === 'fatal') {
          this.log.error(`[Solver] ${errorMessage(err)}`);
          return { status: 'failed', reason: 'fatal', rounds, error: toError(err) };
        }
        if (kind === 'reload') {
          next = { name: 'reload', reason: errorMessage(err) };
        } else {
          errorStreak++;
          this.log.warn(`[Solver] ${state.name} failed (${errorStreak}/${this.config.maxConsecutiveErrors}): ${errorMessage(err)}`);
          if (errorStreak >= this.config.maxConsecutiveErrors) {
            return { status: 'failed', reason: 'error-limit', rounds, error: toError(err) };
          }
          await this.wait(this.backoffMs(errorStreak));
          next = state.name === 'checkbox' ? { name: 'checkbox' } : { name: 'classifying' };
        }
      }

      this.onTransition?.(state.name, next.name);
      state = next;
    }
  }

  backoffMs(attempt: number): number {
    return Math.min(this.config.backoffMaxMs, this.config.backoffBaseMs * 2 ** (attempt - 1));
  }

  private step(state: SolverState): Promise<SolverState> {
    switch (state.name) {
      case 'checkbox':
        return this.clickCheckbox();
      case 'classifying':
        return this.classify();
      case 'solving':
        return this.solveGrid(state.challenge);
      case 'selecting':
        return this.select(state.challenge, state.tiles, state.urls, state.canvas);
      case 'verifying':
        return this.verify();
      case 'reload':
        return this.reload(state.reason);
      case 'solved':
        return Promise.resolve(state);
    }
  }

  private async clickCheckbox(): Promise<SolverState> {
    await this.frames.enter('checkbox');
    const checkbox = await this.browser.find(Locators.checkbox, this.config.elementTimeoutMs);
    await this.browser.click(checkbox, this.config.elementTimeoutMs);

    await this.frames.enter('checkbox');
    if (await this.probeChecked(this.config.autoSolveProbeMs)) {
      await this.frames.leave();
      return { name: 'solved', autoSolved: true };
    }
    return { name: 'classifying' };
  }

  private async classify(): Promise<SolverState> {
    await this.frames.enter('challenge');
    const result = await this.classifier.classify();
    if (result.kind === 'unrecognized') {
      await this.pacer.pause('generic');
      return { name: 'reload', reason: `unrecognized target in "${result.instruction}"` };
    }
    this.log.debug(`[Solver] ${result.challenge.variant} challenge, class ${result.challenge.targetClass}`);
    return { name: 'solving', challenge: result.challenge };
  }

  private async solveGrid(challenge: Challenge): Promise<SolverState> {
    const urls = await this.compositor.readUrls();
    const first = urls[0];
    if (!first) throw new NotFoundError(Locators.tileImages, this.config.elementTimeoutMs);

    // A fresh canvas per challenge; nothing carries over from the previous one.
    const canvas = await Canvas.fromImage(await this.fetcher.fetch(first), challenge.gridSize);
    const detections = await this.detector.detect(await canvas.toPng());
    const tiles = mapDetections(challenge.variant, detections, challenge.targetClass);

    if (!isSolvable(challenge.variant, tiles)) {
      return { name: 'reload', reason: `${tiles.length} matching tile(s) on a ${challenge.variant} challenge` };
    }
    return { name: 'selecting', challenge, tiles, urls, canvas };
  }

  private async select(challenge: Challenge, tiles: number[], urls: string[], canvas: Canvas): Promise<SolverState> {
    if (challenge.variant !== 'dynamic') {
      await this.clickTiles(tiles, 'generic');
      return { name: 'verifying' };
    }

    await this.clickTiles(tiles, 'tile');
    let selected = tiles;
    let previous = urls;
    for (let pass = 1; pass <= this.config.maxDynamicRounds; pass++) {
      previous = await this.compositor.refreshAndComposite(canvas, selected, previous);
      const detections = await this.detector.detect(await canvas.toPng());
      selected = centroidTiles(detections, challenge.targetClass);
      if (selected.length === 0) return { name: 'verifying' };
      this.log.debug(`[Solver] Dynamic pass ${pass}: tiles ${selected.join(', ')}`);
      await this.clickTiles(selected, 'dynamicTile');
    }
    throw new UnsolvableChallengeError(`Dynamic challenge still matching after ${this.config.maxDynamicRounds} passes`);
  }

  private async verify(): Promise<SolverState> {
    const button = await this.browser.find(Locators.verifyButton, this.config.elementTimeoutMs);
    await this.pacer.pause('verify');
    await this.browser.click(button, this.config.elementTimeoutMs);

    await this.frames.enter('checkbox');
    if (await this.probeChecked(this.config.verifyProbeMs)) {
      await this.frames.leave();
      return { name: 'solved', autoSolved: false };
    }
    // The widget served another challenge instead.
    return { name: 'classifying' };
  }

  private async reload(reason: string): Promise<SolverState> {
    this.log.info(`[Solver] Reloading: ${reason}`);
    await this.frames.enter('challenge');
    const button = await this.browser.find(Locators.reloadButton, this.config.elementTimeoutMs);
    await this.browser.click(button, this.config.elementTimeoutMs);
    await this.browser.find(tileCell(1), this.config.elementTimeoutMs);
    return { name: 'classifying' };
  }

  private async clickTiles(tiles: readonly number[], pace: PaceKind): Promise<void> {
    for (const tile of tiles) {
      const cell = await this.browser.find(tileCell(tile), this.config.elementTimeoutMs);
      await this.browser.click(cell, this.config.elementTimeoutMs);
      await this.pacer.pause(pace);
    }
  }

  private async probeChecked(timeoutMs: number): Promise<boolean> {
    try {
      await this.browser.find(Locators.checkedIndicator, timeoutMs);
      return true;
    } catch (err) {
      if (err instanceof NotFoundError) return false;
      throw err;
    }
  }
}
