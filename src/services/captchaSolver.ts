/**
 * captchaSolver.ts — Turn the login form's challenge image into text.
 *
 * Unattended runs send the image to 2captcha (submit, then poll for the
 * answer).  When nobody configured an API key but a human is watching the
 * headed browser, the operator types the answer instead.
 */

import { z } from 'zod';
import { ChallengeSolveError, ConfigError } from '../core/errors';
import { promptOnConsole, type Prompt } from '../core/prompt';
import { Logger, describeError } from '../core/logger';
import { sleep as realSleep, type Sleep } from '../core/timing';

const logger = new Logger('CaptchaSolver');

export interface ChallengeSolver {
  /** Resolve with the challenge text, or reject with ChallengeSolveError. */
  solve(image: Uint8Array): Promise<string>;
}

// ─── 2captcha ──────────────────────────────────────────────

const apiResponseSchema = z.object({
  status: z.number(),
  request: z.string(),
});

const NOT_READY = 'CAPCHA_NOT_READY';

export interface TwoCaptchaOptions {
  apiKey: string;
  baseUrl?: string;
  pollIntervalMs?: number;
  timeoutMs?: number;
  /** Upper bound for one HTTP round trip to the API. */
  requestTimeoutMs?: number;
  sleep?: Sleep;
}

export class TwoCaptchaSolver implements ChallengeSolver {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly sleep: Sleep;

  constructor(options: TwoCaptchaOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://2captcha.com').replace(/\/+$/, '');
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.sleep = options.sleep ?? realSleep;
  }

  async solve(image: Uint8Array): Promise<string> {
    logger.info(`Sending challenge image to 2captcha (${image.byteLength} bytes)…`);

    const submitted = await this.call(`${this.baseUrl}/in.php`, {
      method: 'POST',
      body: new URLSearchParams({
        key: this.apiKey,
        method: 'base64',
        body: Buffer.from(image).toString('base64'),
        json: '1',
      }),
    });
    if (submitted.status !== 1) {
      throw new ChallengeSolveError(`2captcha rejected the image: ${submitted.request}`);
    }

    const taskId = submitted.request;
    const resultUrl =
      `${this.baseUrl}/res.php?` +
      new URLSearchParams({ key: this.apiKey, action: 'get', id: taskId, json: '1' }).toString();

    for (let waited = 0; waited < this.timeoutMs; waited += this.pollIntervalMs) {
      await this.sleep(this.pollIntervalMs);

      const result = await this.call(resultUrl, { method: 'GET' });
      if (result.status === 1) {
        const answer = result.request.trim();
        if (!answer) throw new ChallengeSolveError('2captcha returned an empty answer');
        logger.info(`Challenge solved: "${answer}"`);
        return answer;
      }
      if (result.request !== NOT_READY) {
        throw new ChallengeSolveError(`2captcha failed: ${result.request}`);
      }
    }

    throw new ChallengeSolveError(
      `2captcha did not answer within ${Math.round(this.timeoutMs / 1000)}s`,
    );
  }

  private async call(url: string, init: RequestInit): Promise<z.infer<typeof apiResponseSchema>> {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.requestTimeoutMs) });
    } catch (err) {
      throw new ChallengeSolveError(`2captcha request failed: ${describeError(err)}`);
    }
    if (!response.ok) {
      throw new ChallengeSolveError(`2captcha HTTP ${response.status}`);
    }
    const parsed = apiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ChallengeSolveError('2captcha returned an unexpected response');
    }
    return parsed.data;
  }
}

// ─── Operator ──────────────────────────────────────────────

/** Ask the person watching the headed browser to read the challenge. */
export class ConsoleChallengeSolver implements ChallengeSolver {
  private readonly prompt: Prompt;

  constructor(prompt: Prompt = promptOnConsole) {
    this.prompt = prompt;
  }

  async solve(): Promise<string> {
    const answer = (await this.prompt('Type the verification code shown in the browser: ')).trim();
    if (!answer) throw new ChallengeSolveError('No verification code entered');
    return answer;
  }
}

export function createChallengeSolver(options: {
  captchaApiKey?: string;
  interactive: boolean;
}): ChallengeSolver {
  if (options.captchaApiKey) {
    return new TwoCaptchaSolver({ apiKey: options.captchaApiKey });
  }
  if (options.interactive) {
    logger.warn('CAPTCHA_API_KEY not set — the verification code will be asked on the console');
    return new ConsoleChallengeSolver();
  }
  throw new ConfigError(['CAPTCHA_API_KEY is required for unattended login']);
}
