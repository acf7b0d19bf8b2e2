/**
 * loginDriver.ts — Puppeteer implementation of the login form and of the
 * persisted session.
 *
 * Elements are located by what a user sees (placeholders, button names, the
 * "Verification Code" label) through Puppeteer's `::-p-aria` and `::-p-text`
 * selectors.  On some deployments the portal renders the form inside an
 * iframe; every lookup therefore goes through `formRoot()`, which returns
 * whichever frame holds the mobile field.
 */

import * as cheerio from 'cheerio';
import type { GhostCursor } from 'ghost-cursor';
import type { Cookie, CookieParam, ElementHandle, Frame, Page } from 'puppeteer';
import type { LoginDriver } from '../agents/loginFlow';
import type { SessionDriver } from '../agents/sessionManager';
import type { SessionState, StoredCookie } from '../agents/sessionStore';
import type { TrackerConfig } from '../core/config';
import { Logger, describeError } from '../core/logger';
import { sleep as realSleep, type Sleep } from '../core/timing';
import { createHumanCursor, humanClick, humanType } from '../middleware/humanBehavior';
import { CHALLENGE_IMAGE_BOUNDS, LOGIN } from './locators';

const logger = new Logger('LoginDriver');

const NAVIGATION_TIMEOUT_MS = 30_000;
const FORM_TIMEOUT_MS = 30_000;
const CHALLENGE_IMAGE_TIMEOUT_MS = 5_000;

const byPlaceholder = (placeholder: string) => `input[placeholder="${placeholder}"]`;
const button = (name: string) => `::-p-aria([name="${name}"][role="button"])`;
const text = (value: string) => `::-p-text(${value})`;

// ─── Cookies ⇄ stored session ──────────────────────────────

function toCookieParam(cookie: StoredCookie): CookieParam {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  };
}

function fromCookie(cookie: Cookie): StoredCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  };
}

/** Visible text of a frame, scripts excluded. */
async function visibleText(root: Frame): Promise<string> {
  const $ = cheerio.load(await root.content());
  $('script, style').remove();
  return $('body').text();
}

// ─── Driver ────────────────────────────────────────────────

export interface PortalSessionOptions {
  /** Pause after "Get OTP" and "Proceed" for the portal to respond. */
  settleMs?: number;
  sleep?: Sleep;
}

export class PortalSession implements LoginDriver, SessionDriver {
  private readonly page: Page;
  private readonly portal: TrackerConfig['portal'];
  private readonly settleMs: number;
  private readonly sleep: Sleep;
  private cursor: GhostCursor | null = null;

  constructor(page: Page, portal: TrackerConfig['portal'], options: PortalSessionOptions = {}) {
    this.page = page;
    this.portal = portal;
    this.settleMs = options.settleMs ?? 3_000;
    this.sleep = options.sleep ?? realSleep;
  }

  // ── LoginDriver ────────────────────────────────────────

  async openLoginForm(): Promise<void> {
    logger.info('Opening the login form…');
    await this.page.goto(this.portal.loginUrl, {
      waitUntil: 'domcontentloaded',
      timeout: NAVIGATION_TIMEOUT_MS,
    });
    await this.sleep(this.settleMs);
    this.cursor = createHumanCursor(this.page);

    const root = await this.formRoot();
    await root.waitForSelector(byPlaceholder(LOGIN.mobilePlaceholder), { timeout: FORM_TIMEOUT_MS });
  }

  async fillCredential(mobile: string): Promise<void> {
    await humanType(this.page, await this.required(byPlaceholder(LOGIN.mobilePlaceholder)), mobile);
  }

  async refreshChallenge(): Promise<void> {
    const root = await this.formRoot();
    const container = await this.challengeContainer(root);
    const icons = container ? await container.$$(LOGIN.refreshChallenge) : [];
    const icon = icons.at(-1) ?? (await root.$(LOGIN.refreshChallenge));
    if (!icon) {
      logger.debug('No refresh control beside the challenge image');
      return;
    }
    await icon.click();
    await this.sleep(2_000);
    logger.info('Challenge image refreshed');
  }

  async captureChallenge(): Promise<Uint8Array> {
    const image = (await this.challengeBesideLabel()) ?? (await this.challengeBySize());
    if (!image) throw new Error('Could not locate the challenge image');
    return image.screenshot();
  }

  async fillChallenge(answer: string): Promise<void> {
    await humanType(this.page, await this.required(byPlaceholder(LOGIN.challengePlaceholder)), answer);
  }

  async requestOtp(): Promise<boolean> {
    await this.clickButton(LOGIN.getOtpButton);
    await this.sleep(this.settleMs);

    const pageText = (await visibleText(await this.formRoot())).toLowerCase();
    return !LOGIN.challengeErrors.some((marker) => pageText.includes(marker));
  }

  async submitOtp(code: string): Promise<void> {
    await humanType(this.page, await this.required(byPlaceholder(LOGIN.otpPlaceholder)), code);
    await this.clickButton(LOGIN.proceedButton);
    await this.sleep(this.settleMs);
  }

  async isAuthenticated(): Promise<boolean> {
    const root = await this.formRoot();
    return (await root.$(text(LOGIN.authMarker))) === null;
  }

  // ── SessionDriver ──────────────────────────────────────

  async applySession(state: SessionState): Promise<void> {
    await this.page.setCookie(...state.cookies.map(toCookieParam));
    logger.info(`Applied ${state.cookies.length} saved cookie(s)`);
  }

  async exportSession(): Promise<SessionState> {
    const cookies = await this.page.cookies(
      this.portal.baseUrl,
      this.portal.loginUrl,
      this.portal.searchUrl,
    );
    return { cookies: cookies.map(fromCookie) };
  }

  async verifySession(): Promise<boolean> {
    await this.page.goto(this.portal.searchUrl, {
      waitUntil: 'domcontentloaded',
      timeout: NAVIGATION_TIMEOUT_MS,
    });
    await this.sleep(this.settleMs);
    return this.isAuthenticated();
  }

  // ── Internals ──────────────────────────────────────────

  /** The frame holding the login form: an iframe when the portal uses one, else the main frame. */
  private async formRoot(): Promise<Frame> {
    const main = this.page.mainFrame();
    for (const frame of main.childFrames()) {
      try {
        if (await frame.$(byPlaceholder(LOGIN.mobilePlaceholder))) {
          logger.debug(`Login form found inside iframe ${frame.url()}`);
          return frame;
        }
      } catch (err) {
        logger.debug(`Skipping frame ${frame.url()}: ${describeError(err)}`);
      }
    }
    return main;
  }

  private async required(selector: string): Promise<ElementHandle> {
    const element = await (await this.formRoot()).$(selector);
    if (!element) throw new Error(`Login form element not found: ${selector}`);
    return element;
  }

  private async clickButton(name: string): Promise<void> {
    const target = await this.required(button(name));
    if (this.cursor) {
      await humanClick(this.cursor, target);
    } else {
      await target.click();
    }
  }

  /** Parent element of the "Verification Code" label. */
  private async challengeContainer(root: Frame): Promise<ElementHandle | null> {
    try {
      const label = await root.waitForSelector(text(LOGIN.challengeLabel), {
        timeout: CHALLENGE_IMAGE_TIMEOUT_MS,
      });
      return label ? await label.$('::-p-xpath(..)') : null;
    } catch (err) {
      logger.debug(`Challenge label lookup failed: ${describeError(err)}`);
      return null;
    }
  }

  /** First image in the container of the "Verification Code" label. */
  private async challengeBesideLabel(): Promise<ElementHandle | null> {
    const container = await this.challengeContainer(await this.formRoot());
    if (!container) return null;
    return (await container.$$('img'))[0] ?? null;
  }

  /** Any image whose rendered size fits a challenge image. */
  private async challengeBySize(): Promise<ElementHandle | null> {
    const { minWidth, maxWidth, minHeight, maxHeight } = CHALLENGE_IMAGE_BOUNDS;
    for (const image of await (await this.formRoot()).$$('img')) {
      const box = await image.boundingBox();
      if (box && box.width > minWidth && box.width < maxWidth && box.height > minHeight && box.height < maxHeight) {
        return image;
      }
    }
    return null;
  }
}
