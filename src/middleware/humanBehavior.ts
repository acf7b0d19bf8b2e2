/**
 * humanBehavior.ts — Human-like clicks and typing on the login form.
 *
 * The login form is the one place where the portal watches input telemetry
 * closely, so clicks travel along ghost-cursor's Bezier paths and typing
 * follows a Gaussian inter-key rhythm instead of Puppeteer's fixed delay.
 *
 * Both helpers take element handles rather than selectors: the form may
 * live in an iframe, and handles carry their frame with them.
 */

import { createCursor, type GhostCursor } from 'ghost-cursor';
import type { ElementHandle, Page } from 'puppeteer';
import { Logger } from '../core/logger';
import { randomBetween, sleep } from '../core/timing';

const logger = new Logger('HumanBehavior');

export function createHumanCursor(page: Page): GhostCursor {
  return createCursor(page);
}

/** Move to the element along a curved path, pause briefly, click. */
export async function humanClick(cursor: GhostCursor, target: ElementHandle): Promise<void> {
  await sleep(randomBetween(50, 150));
  await cursor.click(target);
}

/**
 * Replace the field's contents, typing character by character with
 * normally distributed inter-key delays.
 */
export async function humanType(page: Page, field: ElementHandle, text: string): Promise<void> {
  logger.debug(`Human-typing ${text.length} characters`);

  await field.click({ count: 3 });
  await page.keyboard.press('Backspace');
  await sleep(randomBetween(100, 300));

  for (const char of text) {
    await page.keyboard.type(char);
    await sleep(Math.max(20, Math.min(gaussianRandom(80, 30), 500)));
  }
}

/** Box-Muller transform. */
export function gaussianRandom(mean: number, stdDev: number): number {
  const u1 = Math.random() || Number.MIN_VALUE;
  const u2 = Math.random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return z * stdDev + mean;
}
