/**
 * snapshotStore.ts — Durable JSON snapshot of every tender ever seen.
 *
 * WRITE PROTOCOL
 * ──────────────
 *   1. Serialise the whole snapshot to `<file>.tmp`.
 *   2. Copy the current file to `<file>.bak`.
 *   3. Rename `<file>.tmp` over `<file>`.
 *
 * A crash at any point leaves either the old file or the new one in place,
 * never a truncated one.  When rename is refused (cross-device temp dir,
 * Windows file locks) the temp file is copied into place instead.
 *
 * READ PROTOCOL
 * ─────────────
 * Missing file → empty snapshot.  Unparseable file → the backup, and if that
 * is unusable too, an empty snapshot.  A bad snapshot never aborts a run.
 */

import * as fsPromises from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Logger, describeError } from '../core/logger';

const logger = new Logger('SnapshotStore');

// ─── Persisted shape ───────────────────────────────────────

export const attachedDocumentEntrySchema = z.object({
  file_name: z.string(),
  file_url: z.string(),
  description: z.string().default(''),
});

export type AttachedDocumentEntry = z.infer<typeof attachedDocumentEntrySchema>;

/**
 * One tender as stored on disk.  Every field is optional so that snapshots
 * written by older versions (or by hand) still load; unknown keys are kept.
 */
export const snapshotEntrySchema = z
  .object({
    tender_no: z.string().optional(),
    issuing_unit: z.string().optional(),
    title: z.string().optional(),
    status: z.string().optional(),
    work_area: z.string().optional(),
    due_date_time: z.string().optional(),
    due_days: z.string().optional(),
    tender_type: z.string().optional(),
    date_of_issue: z.string().optional(),
    estimated_value: z.string().optional(),
    emd_amount: z.string().optional(),
    document_cost: z.string().optional(),
    contact_officer: z.string().optional(),
    corrigendum: z.string().optional(),
    description: z.string().optional(),
    closing_date: z.string().optional(),
    primary_document_url: z.string().nullable().optional(),
    attached_documents: z.array(attachedDocumentEntrySchema).optional(),
    _last_seen: z.string().optional(),
  })
  .passthrough();

export type SnapshotEntry = z.infer<typeof snapshotEntrySchema>;

export const snapshotSchema = z.record(z.string(), snapshotEntrySchema);

/** Tender number → last known state. */
export type Snapshot = Record<string, SnapshotEntry>;

// ─── File system seam ──────────────────────────────────────

/** The subset of fs/promises the store touches; tests swap single calls. */
export type SnapshotFileSystem = Pick<
  typeof fsPromises,
  'readFile' | 'writeFile' | 'copyFile' | 'rename' | 'unlink' | 'mkdir' | 'access'
>;

/** Rename failures that the copy-into-place fallback is allowed to handle. */
const MOVE_FALLBACK_CODES = new Set(['EXDEV', 'EPERM', 'EACCES', 'EBUSY']);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// ─── Store ─────────────────────────────────────────────────

export class SnapshotStore {
  readonly filePath: string;
  private readonly fs: SnapshotFileSystem;

  constructor(filePath: string, fileSystem: SnapshotFileSystem = fsPromises) {
    this.filePath = filePath;
    this.fs = fileSystem;
  }

  get tempPath(): string {
    return `${this.filePath}.tmp`;
  }

  get backupPath(): string {
    return `${this.filePath}.bak`;
  }

  async load(): Promise<Snapshot> {
    const primary = await this.readSnapshot(this.filePath);
    if (primary.kind === 'ok') {
      logger.info(
        `Loaded snapshot with ${Object.keys(primary.snapshot).length} tender(s) from ${this.filePath}`,
      );
      return primary.snapshot;
    }
    if (primary.kind === 'missing') {
      logger.info(`No snapshot at ${this.filePath} — starting from an empty snapshot`);
      return {};
    }

    logger.warn(`Snapshot ${this.filePath} is unusable (${primary.reason}) — trying backup`);
    const backup = await this.readSnapshot(this.backupPath);
    if (backup.kind === 'ok') {
      logger.warn(
        `Recovered ${Object.keys(backup.snapshot).length} tender(s) from backup ${this.backupPath}`,
      );
      return backup.snapshot;
    }

    logger.warn('No usable backup — starting from an empty snapshot');
    return {};
  }

  async save(snapshot: Snapshot): Promise<void> {
    await this.fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Non-ASCII stays unescaped: JSON.stringify only escapes control characters.
    await this.fs.writeFile(this.tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf-8');

    if (await this.exists(this.filePath)) {
      try {
        await this.fs.copyFile(this.filePath, this.backupPath);
      } catch (err) {
        logger.warn(`Could not back up ${this.filePath}: ${describeError(err)}`);
      }
    }

    try {
      await this.fs.rename(this.tempPath, this.filePath);
    } catch (err) {
      const code = errorCode(err);
      if (!code || !MOVE_FALLBACK_CODES.has(code)) throw err;

      logger.warn(`Atomic rename refused (${code}) — copying ${this.tempPath} into place`);
      await this.fs.copyFile(this.tempPath, this.filePath);
      await this.fs.unlink(this.tempPath);
    }

    logger.info(
      `Saved snapshot with ${Object.keys(snapshot).length} tender(s) to ${this.filePath}`,
    );
  }

  // ── Internals ──────────────────────────────────────────

  private async readSnapshot(
    filePath: string,
  ): Promise<
    | { kind: 'ok'; snapshot: Snapshot }
    | { kind: 'missing' }
    | { kind: 'invalid'; reason: string }
  > {
    let raw: string;
    try {
      raw = await this.fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return { kind: 'missing' };
      return { kind: 'invalid', reason: describeError(err) };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      return { kind: 'invalid', reason: `not JSON: ${describeError(err)}` };
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      return { kind: 'invalid', reason: parsed.error.issues[0]?.message ?? 'schema mismatch' };
    }
    return { kind: 'ok', snapshot: parsed.data };
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await this.fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
