/**
 * Page Driver: owns one headless Chromium session per scrape.
 *
 * A session is opened against a single target URL and is only handed out once
 * the page shows its readiness landmark. Filter clicks and "load more"
 * pagination are best-effort; row lookups go through `RowHandle`, which
 * separates "element absent" (null) from "lookup failed" (throws).
 */

import { chromium } from 'playwright-core';
import {
  BROWSER_CHANNEL,
  BROWSER_EXECUTABLE_PATH,
  BROWSER_HEADLESS,
  FIELD_TIMEOUT_MS,
  FILTER_TIMEOUT_MS,
  NAVIGATION_TIMEOUT_MS,
  READY_TIMEOUT_MS,
} from '../config.js';
import { SourceUnavailableError, describeError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

export interface PageTarget {
  url: string;
  /** DOM landmark that must be present before anything is scraped. */
  readySelector: string;
  navigationTimeoutMs?: number;
  readyTimeoutMs?: number;
  viewport?: { width: number; height: number };
}

export interface FilterAction {
  /** Human-readable name used in logs ("This Week", "Importance"). */
  label: string;
  /** CSS or XPath locator for the control. */
  selector: string;
  /** Narrows `selector` to elements containing this text. */
  hasText?: string;
  timeoutMs?: number;
  /** Delay after the click so the page can re-render. */
  settleMs?: number;
  scrollIntoView?: boolean;
}

export interface LoadMoreOptions {
  settleMs?: number;
  maxClicks?: number;
}

export interface RowHandle {
  readonly index: number;
  /** Rendered text of the first match, or null when nothing matches. */
  text(selector: string): Promise<string | null>;
  /** Rendered text of every match, in document order. */
  texts(selector: string): Promise<string[]>;
  /** Attribute of the first match, or null when nothing matches or the attribute is missing. */
  attribute(selector: string, name: string): Promise<string | null>;
}

export interface PageSession {
  readonly url: string;
  applyFilter(action: FilterAction): Promise<boolean>;
  /** Returns the number of successful "load more" clicks. */
  loadAll(selector: string, options?: LoadMoreOptions): Promise<number>;
  waitFor(selector: string, timeoutMs?: number): Promise<boolean>;
  rows(selector: string): Promise<RowHandle[]>;
  /** Text content of the first element matching `selector`, or null. */
  readText(selector: string): Promise<string | null>;
  close(): Promise<void>;
}

export interface PageDriver {
  /** Resolves once `target.readySelector` is present; rejects with `SourceUnavailableError` otherwise. */
  open(target: PageTarget): Promise<PageSession>;
}

// ---------------------------------------------------------------------------
// Session lifecycle helper
// ---------------------------------------------------------------------------

export async function closeSession(session: PageSession): Promise<void> {
  try {
    await session.close();
  } catch (err: unknown) {
    console.warn(`[page-driver] Failed to close session for ${session.url}: ${describeError(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Playwright implementation
// ---------------------------------------------------------------------------

export interface BrowserLaunchOptions {
  headless: boolean;
  executablePath?: string;
  channel?: string;
  args: string[];
  userAgent?: string;
  fieldTimeoutMs: number;
  filterTimeoutMs: number;
  navigationTimeoutMs: number;
  readyTimeoutMs: number;
}

// The slice of Playwright's Browser, BrowserContext, Page and Locator that the
// driver uses. Playwright's own objects satisfy these structurally.

export interface DriverLocator {
  first(): DriverLocator;
  nth(index: number): DriverLocator;
  locator(selector: string): DriverLocator;
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  waitFor(options: { state: 'visible'; timeout: number }): Promise<void>;
  scrollIntoViewIfNeeded(options: { timeout: number }): Promise<void>;
  click(options: { timeout: number }): Promise<void>;
  innerText(options: { timeout: number }): Promise<string>;
  allInnerTexts(): Promise<string[]>;
  getAttribute(name: string, options: { timeout: number }): Promise<string | null>;
  textContent(options: { timeout: number }): Promise<string | null>;
}

export interface DriverPage {
  locator(selector: string, options?: { hasText?: string }): DriverLocator;
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { state: 'attached'; timeout: number }): Promise<unknown>;
  waitForTimeout(timeoutMs: number): Promise<void>;
}

export interface DriverContext {
  newPage(): Promise<DriverPage>;
  close(): Promise<void>;
}

export interface DriverBrowser {
  newContext(options: { viewport: { width: number; height: number }; userAgent?: string }): Promise<DriverContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: {
  headless: boolean;
  executablePath?: string;
  channel?: string;
  args: string[];
}) => Promise<DriverBrowser>;

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

const DEFAULT_BROWSER_ARGS = ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage'];
const DEFAULT_LOAD_MORE_MAX_CLICKS = 50;

export function defaultBrowserLaunchOptions(): BrowserLaunchOptions {
  return {
    headless: BROWSER_HEADLESS,
    executablePath: BROWSER_EXECUTABLE_PATH || undefined,
    channel: BROWSER_CHANNEL || undefined,
    args: DEFAULT_BROWSER_ARGS,
    fieldTimeoutMs: FIELD_TIMEOUT_MS,
    filterTimeoutMs: FILTER_TIMEOUT_MS,
    navigationTimeoutMs: NAVIGATION_TIMEOUT_MS,
    readyTimeoutMs: READY_TIMEOUT_MS,
  };
}

class LocatorRowHandle implements RowHandle {
  constructor(
    readonly index: number,
    private readonly locator: DriverLocator,
    private readonly timeoutMs: number,
  ) {}

  async text(selector: string): Promise<string | null> {
    const target = this.locator.locator(selector);
    if ((await target.count()) === 0) return null;
    return target.first().innerText({ timeout: this.timeoutMs });
  }

  async texts(selector: string): Promise<string[]> {
    return this.locator.locator(selector).allInnerTexts();
  }

  async attribute(selector: string, name: string): Promise<string | null> {
    const target = this.locator.locator(selector);
    if ((await target.count()) === 0) return null;
    return target.first().getAttribute(name, { timeout: this.timeoutMs });
  }
}

class PlaywrightPageSession implements PageSession {
  private closed = false;

  constructor(
    readonly url: string,
    private readonly browser: DriverBrowser,
    private readonly context: DriverContext,
    private readonly page: DriverPage,
    private readonly options: BrowserLaunchOptions,
  ) {}

  async applyFilter(action: FilterAction): Promise<boolean> {
    const timeout = action.timeoutMs ?? this.options.filterTimeoutMs;
    try {
      const control = this.page.locator(action.selector, action.hasText ? { hasText: action.hasText } : {}).first();
      await control.waitFor({ state: 'visible', timeout });
      if (action.scrollIntoView) {
        await control.scrollIntoViewIfNeeded({ timeout });
      }
      await control.click({ timeout });
      if (action.settleMs && action.settleMs > 0) {
        await this.page.waitForTimeout(action.settleMs);
      }
      console.log(`[page-driver] Applied filter "${action.label}"`);
      return true;
    } catch (err: unknown) {
      console.error(`[page-driver] Failed to apply filter "${action.label}": ${describeError(err)}`);
      return false;
    }
  }

  async loadAll(selector: string, options: LoadMoreOptions = {}): Promise<number> {
    const settleMs = Math.max(0, options.settleMs ?? 1_000);
    const maxClicks = Math.max(0, options.maxClicks ?? DEFAULT_LOAD_MORE_MAX_CLICKS);
    let clicks = 0;
    while (clicks < maxClicks) {
      try {
        const button = this.page.locator(selector).first();
        if (!(await button.isVisible())) break;
        await button.click({ timeout: this.options.filterTimeoutMs });
        clicks += 1;
        await this.page.waitForTimeout(settleMs);
      } catch (err: unknown) {
        console.log(`[page-driver] No more data to load after ${clicks} click(s): ${describeError(err)}`);
        break;
      }
    }
    if (clicks >= maxClicks) {
      console.warn(`[page-driver] Stopped "load more" pagination at the ${maxClicks}-click bound`);
    }
    return clicks;
  }

  async waitFor(selector: string, timeoutMs?: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs ?? this.options.readyTimeoutMs });
      return true;
    } catch (err: unknown) {
      console.warn(`[page-driver] "${selector}" did not appear: ${describeError(err)}`);
      return false;
    }
  }

  async rows(selector: string): Promise<RowHandle[]> {
    const all = this.page.locator(selector);
    const count = await all.count();
    const handles: RowHandle[] = [];
    for (let index = 0; index < count; index += 1) {
      handles.push(new LocatorRowHandle(index, all.nth(index), this.options.fieldTimeoutMs));
    }
    return handles;
  }

  async readText(selector: string): Promise<string | null> {
    const target = this.page.locator(selector);
    if ((await target.count()) === 0) return null;
    return target.first().textContent({ timeout: this.options.fieldTimeoutMs });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export class PlaywrightPageDriver implements PageDriver {
  private readonly options: BrowserLaunchOptions;

  constructor(
    options: Partial<BrowserLaunchOptions> = {},
    private readonly launch: BrowserLauncher = launchChromium,
  ) {
    this.options = { ...defaultBrowserLaunchOptions(), ...options };
  }

  async open(target: PageTarget): Promise<PageSession> {
    const startedAt = Date.now();
    let browser: DriverBrowser;
    try {
      browser = await this.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
        channel: this.options.channel,
        args: this.options.args,
      });
    } catch (err: unknown) {
      throw new SourceUnavailableError(target.url, err);
    }

    try {
      const context = await browser.newContext({
        viewport: target.viewport ?? { width: 1920, height: 1080 },
        userAgent: this.options.userAgent,
      });
      const page = await context.newPage();
      await page.goto(target.url, {
        waitUntil: 'domcontentloaded',
        timeout: target.navigationTimeoutMs ?? this.options.navigationTimeoutMs,
      });
      await page.waitForSelector(target.readySelector, {
        state: 'attached',
        timeout: target.readyTimeoutMs ?? this.options.readyTimeoutMs,
      });
      console.log(`[page-driver] ${target.url} ready in ${((Date.now() - startedAt) / 1000).toFixed(2)}s`);
      return new PlaywrightPageSession(target.url, browser, context, page, this.options);
    } catch (err: unknown) {
      try {
        await browser.close();
      } catch (closeErr: unknown) {
        console.warn(`[page-driver] Failed to close browser after open error: ${describeError(closeErr)}`);
      }
      throw new SourceUnavailableError(target.url, err);
    }
  }
}
