/**
 * sessionManager.ts — Keep one authenticated portal session per run.
 *
 * WHY reuse sessions at all?
 * ──────────────────────────
 * Every fresh login spends an OTP generation, and the portal only hands out a
 * couple per hour.  A run therefore first tries the session saved by the
 * previous run:
 *
 *   1. **Load** the saved cookies (if younger than SESSION_MAX_AGE_HOURS).
 *   2. **Verify** them by loading the search page and looking for the
 *      "Authenticate Yourself" wall.
 *   3. **Log in** through the state machine only when either step fails, then
 *      save the new session for the next run.
 *
 * The outcome is returned as a tagged value; the pipeline decides whether a
 * failed session is fatal.
 */

import type { LoginOutcome } from './loginFlow';
import type { SessionState, SessionStore } from './sessionStore';
import { Logger, describeError } from '../core/logger';
import { HOUR_MS, formatAge } from '../core/timing';

const logger = new Logger('SessionManager');

/** Browser-side handling of the persisted session. */
export interface SessionDriver {
  applySession(state: SessionState): Promise<void>;
  exportSession(): Promise<SessionState>;
  /** Load a protected page and report whether it is served without the login wall. */
  verifySession(): Promise<boolean>;
}

export interface LoginRunner {
  run(): Promise<LoginOutcome>;
}

export type SessionOutcome =
  | { kind: 'reused'; ageMs: number }
  | { kind: 'renewed'; attempts: number }
  | { kind: 'failed'; reason: 'exhausted' | 'otp-timeout'; attempts: number };

export class SessionManager {
  private readonly store: SessionStore;
  private readonly driver: SessionDriver;
  private readonly loginFlow: LoginRunner;
  private readonly maxAgeMs: number;

  constructor(
    store: SessionStore,
    driver: SessionDriver,
    loginFlow: LoginRunner,
    options: { maxAgeHours: number },
  ) {
    this.store = store;
    this.driver = driver;
    this.loginFlow = loginFlow;
    this.maxAgeMs = options.maxAgeHours * HOUR_MS;
  }

  /** Reuse the saved session when it still works, otherwise log in. */
  async ensureValidSession(): Promise<SessionOutcome> {
    const saved = await this.store.load();

    if (saved && saved.ageMs < this.maxAgeMs) {
      logger.info(`Found saved session (${formatAge(saved.ageMs)} old) — verifying…`);
      if (await this.tryReuse(saved.state)) {
        logger.info('Saved session is valid — skipping login');
        return { kind: 'reused', ageMs: saved.ageMs };
      }
      logger.warn('Saved session was rejected by the portal — discarding it and logging in again');
      await this.store.discard();
    } else if (saved) {
      logger.info(
        `Saved session is ${formatAge(saved.ageMs)} old ` +
          `(limit ${formatAge(this.maxAgeMs)}) — logging in again`,
      );
    }

    return this.login();
  }

  /** Run the login state machine unconditionally and persist the result. */
  async login(): Promise<SessionOutcome> {
    const outcome = await this.loginFlow.run();

    if (outcome.kind !== 'success') {
      return { kind: 'failed', reason: outcome.kind, attempts: outcome.attempts };
    }

    await this.store.save(await this.driver.exportSession());
    return { kind: 'renewed', attempts: outcome.attempts };
  }

  private async tryReuse(state: SessionState): Promise<boolean> {
    try {
      await this.driver.applySession(state);
      return await this.driver.verifySession();
    } catch (err) {
      logger.warn(`Session verification failed: ${describeError(err)}`);
      return false;
    }
  }
}
