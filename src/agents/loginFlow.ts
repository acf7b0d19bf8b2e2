/**
 * loginFlow.ts — The OTP login state machine.
 *
 * One attempt walks:
 *
 *   NAV_LOGIN → FILL_CREDENTIAL → SOLVE_CHALLENGE → REQUEST_OTP
 *     → AWAIT_OTP → SUBMIT_OTP → VERIFY → SUCCESS | RETRY | FAILED
 *
 * The portal throttles OTP generation, so the whole login is capped at
 * `maxAttempts` (each attempt clicks "Get OTP" once).  A cached code from an
 * earlier run is tried first; if the portal rejects it, the code generated by
 * this attempt's "Get OTP" click is awaited and submitted on the same form.
 *
 * Browser specifics live behind `LoginDriver` (see portal/loginDriver.ts).
 */

import type { ChallengeSolver } from '../services/captchaSolver';
import type { OtpCoordinator } from './otpCoordinator';
import type { OtpCache } from './otpCache';
import { ConfigError } from '../core/errors';
import { Logger, describeError, maskSecret } from '../core/logger';
import { withRetry } from '../core/retry';
import type { Sleep } from '../core/timing';

const logger = new Logger('LoginFlow');

/** Browser-side steps of the login form. */
export interface LoginDriver {
  openLoginForm(): Promise<void>;
  fillCredential(mobile: string): Promise<void>;
  /** Load a new challenge image in place of the current one. */
  refreshChallenge(): Promise<void>;
  captureChallenge(): Promise<Uint8Array>;
  fillChallenge(answer: string): Promise<void>;
  /** Click "Get OTP".  Resolves false when the portal rejected the challenge answer. */
  requestOtp(): Promise<boolean>;
  submitOtp(code: string): Promise<void>;
  /** True once the authentication marker is gone. */
  isAuthenticated(): Promise<boolean>;
}

export type LoginState =
  | 'NAV_LOGIN'
  | 'FILL_CREDENTIAL'
  | 'SOLVE_CHALLENGE'
  | 'REQUEST_OTP'
  | 'AWAIT_OTP'
  | 'SUBMIT_OTP'
  | 'VERIFY'
  | 'SUCCESS'
  | 'RETRY'
  | 'FAILED';

export type LoginOutcome =
  | { kind: 'success'; attempts: number }
  | { kind: 'exhausted'; attempts: number }
  | { kind: 'otp-timeout'; attempts: number };

export interface LoginFlowOptions {
  mobile?: string;
  maxAttempts: number;
  challengeAttempts: number;
  challengeRetryDelayMs: number;
  otpTimeoutMs: number;
  freshOtpTimeoutMs: number;
  sleep?: Sleep;
}

type AttemptEnd = 'SUCCESS' | 'RETRY' | 'FAILED';

export class LoginFlow {
  private readonly driver: LoginDriver;
  private readonly solver: ChallengeSolver;
  private readonly coordinator: OtpCoordinator;
  private readonly cache: OtpCache;
  private readonly options: LoginFlowOptions;

  /** Every state entered during the last `run()`, for diagnostics. */
  readonly trace: LoginState[] = [];

  constructor(
    driver: LoginDriver,
    solver: ChallengeSolver,
    coordinator: OtpCoordinator,
    cache: OtpCache,
    options: LoginFlowOptions,
  ) {
    this.driver = driver;
    this.solver = solver;
    this.coordinator = coordinator;
    this.cache = cache;
    this.options = options;
  }

  async run(): Promise<LoginOutcome> {
    const mobile = this.options.mobile;
    if (!mobile) {
      throw new ConfigError(['PORTAL_MOBILE is required to log in']);
    }

    this.trace.length = 0;
    const max = this.options.maxAttempts;
    logger.info(`Starting login (at most ${max} attempt(s), mobile ${maskSecret(mobile)})`);

    for (let attempt = 1; attempt <= max; attempt++) {
      logger.info(`Login attempt ${attempt}/${max}…`);

      let end: AttemptEnd;
      try {
        end = await this.attempt(attempt, mobile);
      } catch (err) {
        logger.error(`Login attempt ${attempt} failed: ${describeError(err)}`, err);
        end = 'RETRY';
      }

      if (end === 'SUCCESS') {
        logger.info(`Login successful on attempt ${attempt}`);
        return { kind: 'success', attempts: attempt };
      }
      if (end === 'FAILED') {
        logger.error(`No OTP arrived — giving up after attempt ${attempt}`);
        return { kind: 'otp-timeout', attempts: attempt };
      }
    }

    logger.error(`All ${max} login attempts exhausted`);
    return { kind: 'exhausted', attempts: max };
  }

  // ── One attempt ────────────────────────────────────────

  private async attempt(attempt: number, mobile: string): Promise<AttemptEnd> {
    let state: LoginState = 'NAV_LOGIN';
    let code = '';
    let usedCache = false;

    for (;;) {
      this.trace.push(state);

      switch (state) {
        case 'NAV_LOGIN':
          await this.driver.openLoginForm();
          state = 'FILL_CREDENTIAL';
          break;

        case 'FILL_CREDENTIAL':
          await this.driver.fillCredential(mobile);
          state = 'SOLVE_CHALLENGE';
          break;

        case 'SOLVE_CHALLENGE':
          state = (await this.solveChallenge(attempt > 1)) ? 'REQUEST_OTP' : 'RETRY';
          break;

        case 'REQUEST_OTP':
          // Register before clicking so an SMS that beats the click is still accepted.
          this.coordinator.registerPendingRequest();
          if (await this.driver.requestOtp()) {
            state = 'AWAIT_OTP';
          } else {
            logger.warn(`Challenge answer rejected on attempt ${attempt}`);
            state = 'RETRY';
          }
          break;

        case 'AWAIT_OTP': {
          const cached = await this.cache.load();
          if (cached) {
            code = cached;
            usedCache = true;
            state = 'SUBMIT_OTP';
            break;
          }

          logger.info('Waiting for the OTP…');
          const delivered = await this.coordinator.awaitTicket(this.options.otpTimeoutMs);
          if (delivered === null) {
            state = 'FAILED';
            break;
          }
          code = delivered;
          await this.cache.save(code);
          state = 'SUBMIT_OTP';
          break;
        }

        case 'SUBMIT_OTP':
          await this.driver.submitOtp(code);
          state = 'VERIFY';
          break;

        case 'VERIFY':
          if (await this.driver.isAuthenticated()) {
            state = 'SUCCESS';
          } else if (usedCache) {
            usedCache = false;
            const fresh = await this.awaitReplacementCode(code);
            if (fresh) {
              code = fresh;
              state = 'SUBMIT_OTP';
            } else {
              state = 'RETRY';
            }
          } else {
            logger.warn(`OTP ${maskSecret(code)} was rejected by the portal`);
            await this.cache.invalidate();
            state = 'RETRY';
          }
          break;

        case 'SUCCESS':
          // Re-stamp so the reuse window counts from the last good login.
          await this.cache.save(code);
          return 'SUCCESS';

        case 'RETRY':
        case 'FAILED':
          return state;
      }
    }
  }

  /**
   * The cached code was refused.  The "Get OTP" click of this attempt already
   * asked the portal for a new code, so wait for that one.
   */
  private async awaitReplacementCode(rejected: string): Promise<string | null> {
    logger.warn(`Cached OTP ${maskSecret(rejected)} was rejected — waiting for a fresh one`);
    await this.cache.invalidate();

    const fresh = await this.coordinator.awaitTicket(this.options.freshOtpTimeoutMs);
    if (fresh === null) {
      logger.warn('No fresh OTP arrived');
      return null;
    }
    if (fresh === rejected) {
      logger.warn('Fresh OTP matches the rejected cached one');
      return null;
    }

    await this.cache.save(fresh);
    return fresh;
  }

  /** Solve and fill the challenge, retrying the solver with a new image each time. */
  private async solveChallenge(refreshFirst: boolean): Promise<boolean> {
    const result = await withRetry(
      async (attempt) => {
        if (refreshFirst || attempt > 1) await this.driver.refreshChallenge();
        const image = await this.driver.captureChallenge();
        const answer = await this.solver.solve(image);
        await this.driver.fillChallenge(answer);
        return answer;
      },
      {
        attempts: this.options.challengeAttempts,
        baseDelayMs: this.options.challengeRetryDelayMs,
        sleep: this.options.sleep,
      },
      {
        onRetry: (err, attempt) =>
          logger.warn(`Challenge solve attempt ${attempt} failed: ${describeError(err)}`),
      },
    );

    if (!result.ok) {
      logger.error(`Challenge unsolved after ${result.attempts} attempt(s): ${describeError(result.error)}`);
      return false;
    }
    return true;
  }
}
