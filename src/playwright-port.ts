/**
 * Playwright implementation of the BrowserPort, plus a stealth-enabled
 * Chrome launcher for callers that do not bring their own page.
 *
 * Playwright has no "current frame"; the port keeps one and resolves every
 * selector against it, which gives the engine the switch-into-iframe model
 * it is written against.
 */

import { errors } from 'playwright';
import type { Browser, BrowserContext, ElementHandle, Frame, Page } from 'playwright';
import { NotFoundError, StaleElementError } from './errors.js';
import { sleep } from './pacing.js';
import type { BrowserPort } from './types.js';

export type PlaywrightElement = ElementHandle<SVGElement | HTMLElement>;

const POLL_INTERVAL_MS = 100;

let stealthApplied = false;

export class PlaywrightPort implements BrowserPort<PlaywrightElement> {
  private frame: Frame;

  constructor(private readonly page: Page) {
    this.frame = page.mainFrame();
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    this.frame = this.page.mainFrame();
  }

  async find(locator: string, timeoutMs: number): Promise<PlaywrightElement> {
    try {
      return await this.frame.waitForSelector(locator, { state: 'attached', timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) throw new NotFoundError(locator, timeoutMs, { cause: err });
      throw err;
    }
  }

  async findAll(locator: string, timeoutMs: number): Promise<PlaywrightElement[]> {
    await this.find(locator, timeoutMs);
    return this.frame.$$(locator);
  }

  async click(element: PlaywrightElement, timeoutMs: number): Promise<void> {
    try {
      await element.click({ timeout: timeoutMs });
    } catch (err) {
      if (isDetached(err)) throw new StaleElementError('click target', { cause: err });
      if (err instanceof errors.TimeoutError) throw new NotFoundError('clickable element', timeoutMs, { cause: err });
      throw err;
    }
  }

  async switchFrame(target: PlaywrightElement | 'default'): Promise<void> {
    if (target === 'default') {
      this.frame = this.page.mainFrame();
      return;
    }
    const frame = await target.contentFrame();
    if (!frame) throw new NotFoundError('iframe content', 0);
    this.frame = frame;
  }

  async waitUntil(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (await predicate()) return true;
      if (Date.now() >= deadline) return false;
      await sleep(POLL_INTERVAL_MS);
    }
  }

  async textOf(element: PlaywrightElement): Promise<string> {
    try {
      return await element.innerText();
    } catch (err) {
      if (isDetached(err)) throw new StaleElementError('text read', { cause: err });
      throw err;
    }
  }

  async attributeOf(element: PlaywrightElement, name: string): Promise<string | null> {
    try {
      return await element.getAttribute(name);
    } catch (err) {
      if (isDetached(err)) throw new StaleElementError(`attribute "${name}"`, { cause: err });
      throw err;
    }
  }
}

function isDetached(err: unknown): boolean {
  const msg = err instanceof Error ? err.message : String(err);
  return msg.includes('not attached to the DOM') || msg.includes('Target closed') || msg.includes('has been disposed');
}

export interface LaunchOptions {
  headless?: boolean;
  /** Use the installed Chrome instead of Playwright's Chromium build. */
  useSystemChrome?: boolean;
  viewport?: { width: number; height: number };
}

export interface LaunchedBrowser {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close(): Promise<void>;
}

/**
 * Launch Chrome through playwright-extra with the stealth plugin applied.
 */
export async function launchStealthChrome(opts: LaunchOptions = {}): Promise<LaunchedBrowser> {
  const { chromium } = await import('playwright-extra');
  // playwright-extra's launcher is a module singleton; register the plugin once.
  if (!stealthApplied) {
    const StealthPlugin = (await import('puppeteer-extra-plugin-stealth')).default;
    chromium.use(StealthPlugin());
    stealthApplied = true;
  }

  const browser = await chromium.launch({
    headless: opts.headless ?? false,
    channel: opts.useSystemChrome ? 'chrome' : undefined,
    args: getChromiumArgs(),
  });
  const context = await browser.newContext({ viewport: opts.viewport ?? { width: 1024, height: 768 } });
  const page = await context.newPage();

  return {
    browser,
    context,
    page,
    close: async () => {
      await context.close();
      await browser.close();
    },
  };
}

function getChromiumArgs(): string[] {
  return [
    '--disable-blink-features=AutomationControlled',
    '--no-first-run',
    '--no-default-browser-check',
    '--disable-infobars',
    '--disable-popup-blocking',
  ];
}
