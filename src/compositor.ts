import { Canvas, decodeRgb } from './canvas.js';
import { SolverError, StaleElementError, UnsolvableChallengeError, errorMessage } from './errors.js';
import { Locators } from './locators.js';
import type { BrowserPort, ImageFetcher, Logger } from './types.js';

export interface CompositorOptions {
  elementTimeoutMs: number;
  refreshTimeoutMs: number;
  maxCompositeAttempts: number;
}

export interface RefreshCheck {
  changed: boolean;
  urls: string[];
}

/**
 * Tracks tile replacement in the dynamic challenge. After a tile is clicked
 * the widget swaps its <img> for a new image; this class waits for every
 * clicked tile to swap, then pastes the new images into the canvas.
 */
export class TileCompositor<E> {
  constructor(
    private readonly browser: BrowserPort<E>,
    private readonly fetcher: ImageFetcher,
    private readonly opts: CompositorOptions,
    private readonly log: Logger,
  ) {}

  async readUrls(): Promise<string[]> {
    const images = await this.browser.findAll(Locators.tileImages, this.opts.elementTimeoutMs);
    const urls: string[] = [];
    for (const img of images) {
      urls.push((await this.browser.attributeOf(img, 'src')) ?? '');
    }
    return urls;
  }

  /**
   * A refresh is complete only when every selected tile shows a new source.
   * Unreadable tiles (stale handles, missing src) count as not refreshed.
   */
  async hasRefreshed(selected: readonly number[], previousUrls: readonly string[]): Promise<RefreshCheck> {
    let urls: string[];
    try {
      urls = await this.readUrls();
    } catch (err) {
      if (err instanceof StaleElementError) return { changed: false, urls: [] };
      throw err;
    }
    for (const tile of selected) {
      const current = urls[tile - 1];
      if (!current || current === previousUrls[tile - 1]) return { changed: false, urls };
    }
    return { changed: true, urls };
  }

  async waitForRefresh(selected: readonly number[], previousUrls: readonly string[]): Promise<string[]> {
    let latest: RefreshCheck = { changed: false, urls: [] };
    const refreshed = await this.browser.waitUntil(async () => {
      latest = await this.hasRefreshed(selected, previousUrls);
      return latest.changed;
    }, this.opts.refreshTimeoutMs);
    if (!refreshed) {
      throw new SolverError(`Tiles ${selected.join(', ')} did not refresh within ${this.opts.refreshTimeoutMs}ms`);
    }
    return latest.urls;
  }

  async composite(canvas: Canvas, selected: readonly number[], urls: readonly string[]): Promise<void> {
    for (const tile of selected) {
      const url = urls[tile - 1];
      if (!url) throw new SolverError(`No image source for tile ${tile}`);
      const bytes = await this.fetcher.fetch(url);
      canvas.paste(tile, await decodeRgb(bytes, canvas.tileSize));
    }
  }

  /**
   * Wait for the clicked tiles to be replaced and paste the replacements.
   * A failed fetch or decode usually means the new image is not served yet,
   * so the refresh is re-read and the tiles fetched again.
   */
  async refreshAndComposite(canvas: Canvas, selected: readonly number[], previousUrls: readonly string[]): Promise<string[]> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.opts.maxCompositeAttempts; attempt++) {
      const urls = await this.waitForRefresh(selected, previousUrls);
      try {
        await this.composite(canvas, selected, urls);
        this.log.debug(`[Compositor] Pasted tiles ${selected.join(', ')}`);
        return urls;
      } catch (err) {
        lastError = err;
        this.log.warn(`[Compositor] Attempt ${attempt} failed: ${errorMessage(err)}`);
      }
    }
    throw new UnsolvableChallengeError(
      `Could not composite tiles after ${this.opts.maxCompositeAttempts} attempts`,
      { cause: lastError },
    );
  }
}
