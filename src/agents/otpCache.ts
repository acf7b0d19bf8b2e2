/**
 * otpCache.ts — Remember the last accepted OTP between runs.
 *
 * The portal accepts the same OTP for a while after it was issued, so a run
 * that starts shortly after the previous login can skip the SMS round trip.
 * The file holds `{ code, timestamp }` (epoch ms); entries older than the
 * configured window are ignored.
 */

import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Logger, describeError, maskSecret } from '../core/logger';
import { HOUR_MS, formatAge } from '../core/timing';

const logger = new Logger('OtpCache');

const cacheFileSchema = z.object({
  code: z.string().regex(/^\d{4,8}$/),
  timestamp: z.number(),
});

export class OtpCache {
  private readonly filePath: string;
  private readonly maxAgeMs: number;
  private readonly now: () => number;

  constructor(filePath: string, maxAgeHours: number, now: () => number = Date.now) {
    this.filePath = filePath;
    this.maxAgeMs = maxAgeHours * HOUR_MS;
    this.now = now;
  }

  /** The cached code while it is inside the window, else null. */
  async load(): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn(`Ignoring unreadable OTP cache: ${describeError(err)}`);
      return null;
    }

    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Ignoring OTP cache with an unexpected shape');
      return null;
    }

    const age = this.now() - parsed.data.timestamp;
    if (age >= this.maxAgeMs) {
      logger.info(`Cached OTP is ${formatAge(age)} old — too old to reuse`);
      return null;
    }

    logger.info(`Using cached OTP ${maskSecret(parsed.data.code)} (${formatAge(age)} old)`);
    return parsed.data.code;
  }

  async save(code: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(
      this.filePath,
      JSON.stringify({ code, timestamp: this.now() }, null, 2),
      'utf-8',
    );
    logger.debug(`Cached OTP ${maskSecret(code)}`);
  }

  async invalidate(): Promise<void> {
    await rm(this.filePath, { force: true });
    logger.info('OTP cache invalidated');
  }
}
