/**
 * sessionStore.ts — Persist the authenticated browser context between runs.
 *
 * The stored state is opaque to everything but the login driver: a list of
 * cookies.  Freshness comes from the file's modification time, so a session
 * file copied in from elsewhere ages from when it was written here.
 */

import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Logger, describeError } from '../core/logger';

const logger = new Logger('SessionStore');

export const storedCookieSchema = z
  .object({
    name: z.string(),
    value: z.string(),
    domain: z.string().optional(),
    path: z.string().optional(),
    expires: z.number().optional(),
    httpOnly: z.boolean().optional(),
    secure: z.boolean().optional(),
    sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
  })
  .passthrough();

export type StoredCookie = z.infer<typeof storedCookieSchema>;

export const sessionStateSchema = z.object({
  cookies: z.array(storedCookieSchema),
});

/** Serialized authenticated context. */
export type SessionState = z.infer<typeof sessionStateSchema>;

export interface LoadedSession {
  state: SessionState;
  ageMs: number;
}

export class SessionStore {
  private readonly filePath: string;
  private readonly now: () => number;

  constructor(filePath: string, now: () => number = Date.now) {
    this.filePath = filePath;
    this.now = now;
  }

  async load(): Promise<LoadedSession | null> {
    let raw: string;
    let modifiedAt: number;
    try {
      const [contents, info] = await Promise.all([
        readFile(this.filePath, 'utf-8'),
        stat(this.filePath),
      ]);
      raw = contents;
      modifiedAt = info.mtimeMs;
    } catch {
      logger.info('No saved session found');
      return null;
    }

    try {
      const state = sessionStateSchema.parse(JSON.parse(raw));
      return { state, ageMs: Math.max(0, this.now() - modifiedAt) };
    } catch (err) {
      logger.warn(`Saved session is unreadable (${describeError(err)}) — ignoring it`);
      return null;
    }
  }

  async save(state: SessionState): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf-8');
    logger.info(`Saved session with ${state.cookies.length} cookie(s) to ${this.filePath}`);
  }

  async discard(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
