/**
 * Grid challenge solver: resolves reCAPTCHA v2 image-grid challenges on a
 * Playwright page using an injected object detector.
 *
 *   const detector = new YoloProcessDetector({ modelPath: './model.onnx' });
 *   const result = await solveRecaptcha(page, 'https://example.com/form', { detector });
 *   await detector.close();
 */

import type { Page } from 'playwright';
import { configFromEnv, resolveConfig, type SolverConfig } from './config.js';
import { HttpImageFetcher } from './fetcher.js';
import { createConsoleLogger } from './logger.js';
import { PlaywrightPort } from './playwright-port.js';
import { ChallengeSolver } from './solver.js';
import type { ImageFetcher, Logger, ObjectDetector, Pacer, SolveResult } from './types.js';

export interface SolveRecaptchaOptions {
  detector: ObjectDetector;
  fetcher?: ImageFetcher;
  pacer?: Pacer;
  logger?: Logger;
  /** Merged over CAPTCHA_SOLVER_* environment overrides, which are merged over the defaults. */
  config?: Partial<SolverConfig>;
}

/**
 * Solve the widget on `page`. Navigates to `url` first when one is given,
 * otherwise works on whatever the page currently shows.
 */
export async function solveRecaptcha(page: Page, url: string | undefined, opts: SolveRecaptchaOptions): Promise<SolveResult> {
  const config = resolveConfig({ ...configFromEnv(), ...opts.config });
  const solver = new ChallengeSolver({
    browser: new PlaywrightPort(page),
    detector: opts.detector,
    fetcher: opts.fetcher ?? new HttpImageFetcher(config.elementTimeoutMs),
    pacer: opts.pacer,
    logger: opts.logger ?? createConsoleLogger({ verbose: config.verbose }),
    config,
  });
  return solver.solve(url);
}

export { ChallengeSolver, type SolverDeps, type SolverState, type SolverStateName } from './solver.js';
export { FrameNavigator } from './frames.js';
export { ChallengeClassifier, buildChallenge, detectVariant, matchTarget } from './classifier.js';
export {
  CANVAS_SIZE,
  centroidTiles,
  cornerCells,
  fillSpan,
  isSolvable,
  mapDetections,
  overlapBand,
  overlapTiles,
} from './grid.js';
export { Canvas, decodeRgb, type TileRect } from './canvas.js';
export { TileCompositor, type CompositorOptions, type RefreshCheck } from './compositor.js';
export { DEFAULT_CONFIG, DEFAULT_TARGET_TERMS, configFromEnv, resolveConfig, type SolverConfig } from './config.js';
export {
  NotFoundError,
  RootSurfaceMissingError,
  SolverError,
  StaleElementError,
  UnsolvableChallengeError,
  failureKind,
  type FailureKind,
} from './errors.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export { DEFAULT_PACE_PROFILES, GaussianPacer, instantPacer, type PaceProfile } from './pacing.js';
export { Locators, tileCell } from './locators.js';
export { PlaywrightPort, launchStealthChrome, type LaunchOptions, type LaunchedBrowser, type PlaywrightElement } from './playwright-port.js';
export { HttpImageFetcher } from './fetcher.js';
export { YoloProcessDetector, parseWorkerLine, type WorkerLine, type YoloDetectorOptions } from './detector.js';
export type * from './types.js';
