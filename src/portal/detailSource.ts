/**
 * detailSource.ts — Open tender detail pages as the portal does.
 *
 * The listing's "View Tender Details" control calls the page's own
 * `postRequestNewWindow(path)`, which POSTs into a new tab; a plain GET of the
 * same path does not load the tender.  The source therefore replays that call
 * on the listing page and waits for the popup it opens.  A hint that came
 * from a plain href is opened in a new tab directly.
 */

import type { Page, Target } from 'puppeteer';
import type { DetailSource, DetailView } from '../scrapers/detailEnricher';
import type { HarvestedRecord } from '../core/types';
import { Logger, describeError } from '../core/logger';
import { absoluteUrl } from '../scrapers/detailExtractor';
import { DOWNLOAD_CONTROL_SELECTOR, DOWNLOAD_CONTROL_TEXT } from './locators';

const logger = new Logger('DetailSource');

const POPUP_TIMEOUT_MS = 15_000;
const DOWNLOAD_POPUP_TIMEOUT_MS = 10_000;
const NETWORK_IDLE_TIMEOUT_MS = 15_000;

/** Wait for a tab opened by `opener` to leave about:blank while `trigger` runs. */
async function popupOf(opener: Page, trigger: () => Promise<unknown>, timeoutMs: number): Promise<Target> {
  const [target] = await Promise.all([
    opener
      .browser()
      .waitForTarget(
        (candidate) => candidate.opener() === opener.target() && candidate.url() !== 'about:blank',
        { timeout: timeoutMs },
      ),
    trigger(),
  ]);
  return target;
}

class PortalDetailView implements DetailView {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  get url(): string {
    return this.page.url();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async interceptPrimaryDocumentNavigation(): Promise<string | null> {
    const control =
      (await this.page.$(DOWNLOAD_CONTROL_SELECTOR)) ??
      (await this.page.$(`::-p-text(${DOWNLOAD_CONTROL_TEXT})`));
    if (!control) return null;

    try {
      const target = await popupOf(this.page, () => control.click(), DOWNLOAD_POPUP_TIMEOUT_MS);
      const url = target.url();
      const popup = await target.page();
      await popup?.close();
      return url && url !== '#' ? url : null;
    } catch (err) {
      logger.debug(`No document tab opened: ${describeError(err)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) await this.page.close();
  }
}

export class PortalDetailSource implements DetailSource {
  private readonly listingPage: Page;
  private readonly baseUrl: string;

  /** `listingPage` must be showing the search page, which defines the popup helper. */
  constructor(listingPage: Page, baseUrl: string) {
    this.listingPage = listingPage;
    this.baseUrl = baseUrl;
  }

  async open(record: HarvestedRecord): Promise<DetailView> {
    const page = (await this.hasPopupHelper())
      ? await this.openThroughPortal(record.navigationHint)
      : await this.openDirectly(record.navigationHint);

    try {
      await page.waitForNetworkIdle({ idleTime: 500, timeout: NETWORK_IDLE_TIMEOUT_MS });
    } catch (err) {
      logger.debug(`${record.tenderNo}: network did not go idle (${describeError(err)}) — reading anyway`);
    }
    return new PortalDetailView(page);
  }

  // ── Internals ──────────────────────────────────────────

  private async hasPopupHelper(): Promise<boolean> {
    return (await this.listingPage.evaluate("typeof postRequestNewWindow === 'function'")) === true;
  }

  private async openThroughPortal(hint: string): Promise<Page> {
    const target = await popupOf(
      this.listingPage,
      () => this.listingPage.evaluate(`postRequestNewWindow(${JSON.stringify(hint)})`),
      POPUP_TIMEOUT_MS,
    );
    const page = await target.page();
    if (!page) throw new Error(`Detail popup for ${hint} is not a page`);
    return page;
  }

  private async openDirectly(hint: string): Promise<Page> {
    const url = absoluteUrl(hint, this.baseUrl);
    if (!url) throw new Error(`Unusable detail link: ${hint}`);

    const page = await this.listingPage.browser().newPage();
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: POPUP_TIMEOUT_MS });
    } catch (err) {
      await page.close();
      throw err;
    }
    return page;
  }
}
