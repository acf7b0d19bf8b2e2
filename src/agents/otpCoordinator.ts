/**
 * otpCoordinator.ts — Hand an asynchronously delivered OTP to the login flow.
 *
 * THE RENDEZVOUS CELL
 * ───────────────────
 * One writer (the SMS webhook) and one reader (the login flow) share a single
 * slot.  The reader first calls `registerPendingRequest()` (just before it
 * clicks "Get OTP"), then `awaitTicket()`.  A ticket delivered between those
 * two calls sits in the slot and is picked up without waiting; a ticket
 * delivered before registration is discarded by it.
 *
 * Node's event loop serialises every access to the slot, so the "is a ticket
 * already here?" check and the registration of the waiter cannot interleave
 * with a delivery.
 *
 * TWO DELIVERY PATHS
 * ──────────────────
 *   - Local: this process owns the webhook listener and `deliver()` fills the slot.
 *   - Remote: another instance owns the port.  `useRemoteReader()` switches
 *     `awaitTicket()` to polling that instance's `/get-otp`.
 *
 * When a wait times out and a human is watching, the operator is asked to type
 * the code in.  Unattended runs never prompt.
 */

import type { OtpTicket } from '../core/types';
import { promptOnConsole, type Prompt } from '../core/prompt';
import { Logger, describeError, maskSecret } from '../core/logger';
import { sleep as realSleep, type Sleep } from '../core/timing';

const logger = new Logger('OtpCoordinator');

const MANUAL_CODE_PATTERN = /^\d{4,8}$/;

/** Read side of another instance's delivery surface. */
export interface TicketReader {
  fetchLatest(): Promise<OtpTicket | null>;
}

export interface OtpCoordinatorOptions {
  /** Epoch-millisecond clock. */
  now?: () => number;
  /** Offer manual entry after a timed-out wait. */
  interactive?: boolean;
  pollIntervalMs?: number;
  prompt?: Prompt;
  sleep?: Sleep;
}

export class OtpCoordinator {
  private readonly now: () => number;
  private readonly interactive: boolean;
  private readonly pollIntervalMs: number;
  private readonly prompt: Prompt;
  private readonly sleep: Sleep;

  /** The wake signal: set by `deliver`, cleared by registration and by consumption. */
  private pending: OtpTicket | null = null;
  /** Last ticket ever delivered, for the `/get-otp` read side. */
  private latest: OtpTicket | null = null;
  private requestedAt = 0;
  private waiter: ((ticket: OtpTicket) => void) | null = null;
  private remote: TicketReader | null = null;

  constructor(options: OtpCoordinatorOptions = {}) {
    this.now = options.now ?? Date.now;
    this.interactive = options.interactive ?? false;
    this.pollIntervalMs = options.pollIntervalMs ?? 3_000;
    this.prompt = options.prompt ?? promptOnConsole;
    this.sleep = options.sleep ?? realSleep;
  }

  get isRemote(): boolean {
    return this.remote !== null;
  }

  /** Poll another instance instead of waiting for local deliveries. */
  useRemoteReader(reader: TicketReader): void {
    this.remote = reader;
    logger.info('OTP delivery handled by another instance — polling its /get-otp endpoint');
  }

  /** From now on only tickets produced strictly after this instant are accepted. */
  registerPendingRequest(): void {
    this.requestedAt = this.now();
    this.pending = null;
    logger.debug(`Registered OTP request at ${new Date(this.requestedAt).toISOString()}`);
  }

  /** Writer entry point.  Returns true when the ticket was accepted into the slot. */
  deliver(code: string, producedAt: number = this.now()): boolean {
    const ticket: OtpTicket = { code, producedAt };
    this.latest = ticket;

    if (!this.isAfterRequest(producedAt)) {
      logger.warn(`Ignoring OTP ${maskSecret(code)} not produced after the pending request`);
      return false;
    }

    logger.info(`Received OTP ${maskSecret(code)}`);
    if (this.waiter) {
      this.waiter(ticket);
    } else {
      this.pending = ticket;
    }
    return true;
  }

  /** Most recent delivery if it is younger than `maxAgeMs`. */
  latestTicket(maxAgeMs: number): OtpTicket | null {
    if (!this.latest) return null;
    return this.now() - this.latest.producedAt <= maxAgeMs ? this.latest : null;
  }

  /**
   * Wait for the first ticket produced after the last registration.
   * Resolves with `null` when nothing arrives in time (and the operator, if
   * asked, did not supply a valid code).
   */
  async awaitTicket(timeoutMs: number): Promise<string | null> {
    const code = this.remote
      ? await this.pollRemote(this.remote, timeoutMs)
      : await this.waitLocally(timeoutMs);

    if (code !== null) return code;

    logger.warn(`No OTP arrived within ${Math.round(timeoutMs / 1000)}s`);
    return this.interactive ? this.askOperator() : null;
  }

  // ── Internals ──────────────────────────────────────────

  private isAfterRequest(producedAt: number): boolean {
    return producedAt > this.requestedAt;
  }

  private waitLocally(timeoutMs: number): Promise<string | null> {
    if (this.waiter) {
      return Promise.reject(new Error('An OTP wait is already in progress'));
    }

    const ready = this.pending;
    if (ready) {
      this.pending = null;
      return Promise.resolve(ready.code);
    }

    return new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);

      this.waiter = (ticket) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(ticket.code);
      };
    });
  }

  private async pollRemote(reader: TicketReader, timeoutMs: number): Promise<string | null> {
    const deadline = this.now() + timeoutMs;

    while (this.now() < deadline) {
      try {
        const ticket = await reader.fetchLatest();
        if (ticket && this.isAfterRequest(ticket.producedAt)) {
          logger.info(`Picked up OTP ${maskSecret(ticket.code)} from the other instance`);
          this.latest = ticket;
          return ticket.code;
        }
      } catch (err) {
        logger.debug(`OTP poll failed: ${describeError(err)}`);
      }
      await this.sleep(this.pollIntervalMs);
    }
    return null;
  }

  private async askOperator(): Promise<string | null> {
    const answer = (await this.prompt('Enter the OTP received on the registered mobile: ')).trim();
    if (MANUAL_CODE_PATTERN.test(answer)) return answer;

    logger.warn('Manual OTP must be 4 to 8 digits — ignoring input');
    return null;
  }
}
