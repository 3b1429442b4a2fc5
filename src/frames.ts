import { NotFoundError, RootSurfaceMissingError } from './errors.js';
import { Locators } from './locators.js';
import type { BrowserPort, FrameName, Logger } from './types.js';

const FRAME_LOCATORS: Record<FrameName, string> = {
  checkbox: Locators.checkboxFrame,
  challenge: Locators.challengeFrame,
};

/**
 * Moves the browser context between the widget's two iframes. Always goes
 * through the top-level document first so contexts never nest.
 */
export class FrameNavigator<E> {
  constructor(
    private readonly browser: BrowserPort<E>,
    private readonly timeoutMs: number,
    private readonly log: Logger,
  ) {}

  async enter(which: FrameName): Promise<void> {
    await this.browser.switchFrame('default');
    let frame: E;
    try {
      frame = await this.browser.find(FRAME_LOCATORS[which], this.timeoutMs);
    } catch (err) {
      if (err instanceof NotFoundError) throw new RootSurfaceMissingError(which, { cause: err });
      throw err;
    }
    await this.browser.switchFrame(frame);
    this.log.debug(`[Frames] Entered ${which} frame`);
  }

  async leave(): Promise<void> {
    await this.browser.switchFrame('default');
  }
}
