/**
 * healthNotifier.ts — Tell an external monitor how the run ended.
 *
 * Best effort: a missing URL makes this a no-op, and a failed POST is logged
 * and forgotten.  A monitoring outage must never fail a tracking run.
 */

import { Logger, describeError } from '../core/logger';

const logger = new Logger('HealthNotifier');

export type HealthStatus = 'success' | 'failure';

export interface HealthPayload {
  status: HealthStatus;
  message: string;
  timestamp: string;
  source: string;
}

export class HealthNotifier {
  private readonly url: string | undefined;
  private readonly source: string;
  private readonly now: () => Date;

  constructor(url: string | undefined, options: { source?: string; now?: () => Date } = {}) {
    this.url = url;
    this.source = options.source ?? 'tender-tracker';
    this.now = options.now ?? (() => new Date());
  }

  /** Resolves true when the monitor acknowledged the notification. */
  async notify(status: HealthStatus, message: string): Promise<boolean> {
    if (!this.url) {
      logger.debug(`No health webhook configured — skipping ${status} notification`);
      return false;
    }

    const payload: HealthPayload = {
      status,
      message,
      timestamp: this.now().toISOString(),
      source: this.source,
    };

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(10_000),
      });
      if (!response.ok) {
        logger.warn(`Health webhook answered HTTP ${response.status}`);
        return false;
      }
      logger.info(`Health notification sent (${status})`);
      return true;
    } catch (err) {
      logger.warn(`Health notification failed: ${describeError(err)}`);
      return false;
    }
  }
}
