/**
 * listingSource.ts — The public tender listing, driven through Puppeteer.
 *
 * The search page opens on a default tab; the tracker always switches to
 * "All Active Tenders" first.  Pagination links are found by their
 * accessible name ("Next", "»" or ">") and treated as the end of the listing
 * when missing or styled as disabled.
 */

import type { ElementHandle, Page } from 'puppeteer';
import type { ListingSource } from '../scrapers/listingHarvester';
import { Logger, describeError } from '../core/logger';
import { sleep as realSleep, type Sleep } from '../core/timing';
import { ALL_ACTIVE_TAB, NEXT_PAGE_TEXTS, NO_RESULTS_TEXT } from './locators';

const logger = new Logger('ListingSource');

const NAVIGATION_TIMEOUT_MS = 30_000;

export interface PortalListingOptions {
  /** Pause after a navigation or a click for the results to render. */
  settleMs?: number;
  sleep?: Sleep;
}

export class PortalListingSource implements ListingSource {
  private readonly page: Page;
  private readonly searchUrl: string;
  private readonly settleMs: number;
  private readonly sleep: Sleep;

  constructor(page: Page, searchUrl: string, options: PortalListingOptions = {}) {
    this.page = page;
    this.searchUrl = searchUrl;
    this.settleMs = options.settleMs ?? 3_000;
    this.sleep = options.sleep ?? realSleep;
  }

  async open(): Promise<void> {
    logger.info(`Opening ${this.searchUrl}…`);
    await this.page.goto(this.searchUrl, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
    await this.sleep(this.settleMs);
    await this.selectAllActiveTab();
  }

  currentPageHtml(): Promise<string> {
    return this.page.content();
  }

  async nextPage(): Promise<boolean> {
    for (const name of NEXT_PAGE_TEXTS) {
      const link = await this.page.$(`::-p-aria([name="${name}"][role="link"])`);
      if (!link) continue;

      if (await this.isDisabled(link)) return false;
      await link.click();
      await this.sleep(this.settleMs);
      return true;
    }

    const nextButton = await this.page.$('::-p-aria([name="Next"][role="button"])');
    if (!nextButton) return false;
    await nextButton.click();
    await this.sleep(this.settleMs);
    return true;
  }

  // ── Internals ──────────────────────────────────────────

  private async selectAllActiveTab(): Promise<void> {
    const candidates = [
      `::-p-text(${ALL_ACTIVE_TAB})`,
      `::-p-aria([name="${ALL_ACTIVE_TAB}"][role="link"])`,
      `::-p-aria([name="${ALL_ACTIVE_TAB}"][role="button"])`,
    ];

    for (const selector of candidates) {
      try {
        const tab = await this.page.$(selector);
        if (!tab) continue;
        await tab.click();
        logger.info(`Selected the "${ALL_ACTIVE_TAB}" tab`);
        await this.sleep(this.settleMs);

        if (await this.page.$(`::-p-text(${NO_RESULTS_TEXT})`)) {
          logger.warn(`"${NO_RESULTS_TEXT}" shown after selecting the tab`);
        }
        return;
      } catch (err) {
        logger.debug(`Tab selector ${selector} failed: ${describeError(err)}`);
      }
    }
    logger.warn(`Could not find the "${ALL_ACTIVE_TAB}" tab — reading the current view`);
  }

  private async isDisabled(link: ElementHandle): Promise<boolean> {
    const className = await (await link.getProperty('className')).jsonValue();
    return typeof className === 'string' && className.toLowerCase().includes('disabled');
  }
}
