/**
 * otpWebhookServer.ts — The HTTP surface an SMS forwarder posts OTPs to.
 *
 * ROUTES
 * ──────
 *   GET|POST /sms-webhook  — any request carrying the SMS text: query string,
 *                            JSON, form fields or a plain-text body.
 *   GET      /get-otp      — the latest OTP if younger than five minutes.
 *                            Another instance polls this when it could not
 *                            bind the port itself.
 *   GET      /health       — liveness.
 *
 * Forwarder apps differ in how they send the message, so the handler gathers
 * every string it can find and takes the first one containing an OTP.
 */

import type { Server } from 'http';
import express, { type Express, type Request, type Response } from 'express';
import { z } from 'zod';
import type { OtpCoordinator, TicketReader } from '../agents/otpCoordinator';
import type { OtpTicket } from '../core/types';
import { Logger, describeError, maskSecret } from '../core/logger';

const logger = new Logger('OtpWebhook');

/** Tried in order: a standard 6-digit code first, then any 4 to 8 digit number. */
const OTP_PATTERNS = [/\b(\d{6})\b/, /\b(\d{4,8})\b/];

const PREFERRED_QUERY_KEYS = ['msg', 'message', 'text', 'body', 'sms'] as const;

export const FRESH_OTP_WINDOW_MS = 5 * 60 * 1000;

export function extractOtp(message: string): string | null {
  for (const pattern of OTP_PATTERNS) {
    const match = pattern.exec(message);
    if (match) return match[1];
  }
  return null;
}

/** Every candidate SMS text in the request, preferred query keys first, without repeats. */
export function collectMessageParts(req: Request): string[] {
  const parts: string[] = [];
  const add = (value: unknown) => {
    if (typeof value === 'string' && value !== '' && !parts.includes(value)) parts.push(value);
  };

  for (const key of PREFERRED_QUERY_KEYS) add(req.query[key]);
  for (const value of Object.values(req.query)) add(value);

  if (req.method === 'POST') {
    const body: unknown = req.body;
    if (typeof body === 'string') {
      add(body);
    } else if (body !== null && typeof body === 'object' && !Array.isArray(body)) {
      for (const value of Object.values(body)) add(value);
    }
  }
  return parts;
}

// ─── App ───────────────────────────────────────────────────

export function createOtpWebhookApp(coordinator: OtpCoordinator, now: () => number = Date.now): Express {
  const app = express();

  app.use(express.json({ strict: false }));
  app.use(express.urlencoded({ extended: false }));
  app.use(express.text({ type: ['text/*', 'application/octet-stream'] }));

  const receive = (req: Request, res: Response) => {
    const parts = collectMessageParts(req);
    const combined = parts.join(' | ').slice(0, 500);

    let otp: string | null = null;
    for (const part of parts) {
      otp = extractOtp(part);
      if (otp) break;
    }

    if (!otp) {
      logger.warn(`Webhook ${req.method} carried no OTP: ${combined || '(empty)'}`);
      res.status(200).json({ status: 'error', detail: 'no OTP found in message' });
      return;
    }

    const accepted = coordinator.deliver(otp, now());
    logger.info(`Webhook ${req.method} delivered OTP ${maskSecret(otp)}${accepted ? '' : ' (stale)'}`);
    res.status(200).json({ status: 'ok', otp_received: otp, accepted });
  };

  app.route('/sms-webhook').get(receive).post(receive);

  app.get('/get-otp', (_req, res) => {
    const ticket = coordinator.latestTicket(FRESH_OTP_WINDOW_MS);
    if (!ticket) {
      res.status(200).json({ otp: null, detail: 'no recent OTP available', timestamp: 0 });
      return;
    }
    res.status(200).json({
      otp: ticket.code,
      age_seconds: Math.floor((now() - ticket.producedAt) / 1000),
      timestamp: ticket.producedAt,
    });
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'running' });
  });

  return app;
}

// ─── Server lifecycle ──────────────────────────────────────

export type WebhookStartResult =
  | { kind: 'listening'; server: Server; port: number }
  | { kind: 'port-in-use'; port: number };

/** Bind the app.  A port owned by another process is reported, not thrown. */
export function startOtpWebhookServer(app: Express, port: number): Promise<WebhookStartResult> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info(`OTP webhook listening on port ${port}`);
      resolve({ kind: 'listening', server, port });
    });
    server.once('error', (err: Error) => {
      if ('code' in err && err.code === 'EADDRINUSE') {
        logger.warn(`Port ${port} is already in use — another instance owns the webhook`);
        resolve({ kind: 'port-in-use', port });
      } else {
        reject(err);
      }
    });
  });
}

export function stopOtpWebhookServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

// ─── Remote reader ─────────────────────────────────────────

const getOtpResponseSchema = z.object({
  otp: z.string().nullable(),
  timestamp: z.number(),
});

/** Reads another instance's `/get-otp`.  Timestamps are epoch milliseconds. */
export class HttpTicketReader implements TicketReader {
  private readonly endpoint: string;

  constructor(baseUrl: string) {
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}/get-otp`;
  }

  async fetchLatest(): Promise<OtpTicket | null> {
    const response = await fetch(this.endpoint, { signal: AbortSignal.timeout(5_000) });
    if (!response.ok) throw new Error(`${this.endpoint} answered HTTP ${response.status}`);

    const parsed = getOtpResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected /get-otp response: ${describeError(parsed.error)}`);
    }
    const { otp, timestamp } = parsed.data;
    return otp ? { code: otp, producedAt: timestamp } : null;
  }
}
