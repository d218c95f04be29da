import { chromium, type Browser } from 'playwright-core';
import { errorMessage } from '../errors.js';
import { debug } from '../utils/log.js';

/**
 * Renders a page in a browser so forms injected by JavaScript end up in the
 * HTML. The inspector only sees this interface; swap or omit it freely.
 */
export interface PageRenderer {
  render(url: string): Promise<string>;
  /** Never rejects; a browser that failed to start or stop is only logged. */
  close(): Promise<void>;
}

export interface PlaywrightRendererOptions {
  timeoutMs?: number;
  /** Chromium binary; playwright-core ships no browser of its own. */
  executablePath?: string;
  userAgent?: string;
}

/**
 * Headless Chromium through playwright-core. The browser is launched on the
 * first render and shared by every worker until `close()`. A failed launch
 * is retried on the next render.
 */
export class PlaywrightRenderer implements PageRenderer {
  private browser?: Promise<Browser>;

  constructor(private readonly opts: PlaywrightRendererOptions = {}) {}

  async render(url: string): Promise<string> {
    const browser = await this.launch();
    const context = await browser.newContext({ userAgent: this.opts.userAgent });
    try {
      const page = await context.newPage();
      await page.goto(url, { timeout: this.opts.timeoutMs ?? 20_000, waitUntil: 'networkidle' });
      const html = await page.content();
      debug('render', `Rendered ${url} len=${html.length}`);
      return html;
    } finally {
      await context.close();
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = undefined;
    if (!pending) return;
    try {
      const browser = await pending;
      await browser.close();
    } catch (e) {
      debug('render', `close failed: ${errorMessage(e)}`);
    }
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      debug('render', 'Launching headless Chromium');
      this.browser = chromium
        .launch({
          headless: true,
          executablePath: this.opts.executablePath || process.env.CHROMIUM_PATH || undefined,
        })
        .catch((e: unknown) => {
          this.browser = undefined;
          throw e;
        });
    }
    return this.browser;
  }
}
