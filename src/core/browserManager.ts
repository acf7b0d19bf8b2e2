/**
 * browserManager.ts — Owns the one Chromium process a run uses.
 *
 * Login, listing and detail pages all share the browser's default context,
 * so the cookies set by the login are visible to every tab (detail pages open
 * as popups of the listing page).  `close()` shuts the browser down and is
 * also wired to SIGINT/SIGTERM so an interrupted run leaves no Chromium behind.
 */

import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, Page } from 'puppeteer';
import type { TrackerConfig } from './config';
import { Logger, describeError } from './logger';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
puppeteer.use(StealthPlugin());

const VIEWPORT = { width: 1366, height: 768 } as const;
const ACCEPT_LANGUAGE = 'en-IN,en;q=0.9';

export class BrowserManager {
  private browser: Browser | null = null;
  private readonly options: TrackerConfig['browser'];
  private exitHooksRegistered = false;

  constructor(options: TrackerConfig['browser']) {
    this.options = options;
  }

  /** Open a configured page in the shared context.  The caller closes it. */
  async newPage(): Promise<Page> {
    const browser = await this.ensureBrowser();
    const page = await browser.newPage();
    await page.setViewport(VIEWPORT);
    await page.setExtraHTTPHeaders({ 'accept-language': ACCEPT_LANGUAGE });
    return page;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser) return;

    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (err) {
      logger.warn(`Browser did not close cleanly: ${describeError(err)}`);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (!this.browser || !this.browser.connected) {
      logger.info(`Launching ${this.options.headless ? 'headless' : 'headed'} browser…`);
      this.browser = await puppeteer.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--lang=en-IN'],
      });
      this.registerExitHooks();
    }
    return this.browser;
  }

  private registerExitHooks(): void {
    if (this.exitHooksRegistered) return;
    this.exitHooksRegistered = true;

    const shutdown = (signal: NodeJS.Signals) => {
      logger.warn(`Received ${signal} — closing the browser`);
      void this.close().finally(() => process.exit(130));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}
