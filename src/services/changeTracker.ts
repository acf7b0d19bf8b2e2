/**
 * changeTracker.ts — Classify each run's records against the last snapshot.
 *
 * HOW IT WORKS
 * ────────────
 *   1. `ChangeTracker.open(store)` loads the snapshot once per run.
 *   2. `detect(records)` buckets every record into NEW, UPDATED,
 *      STATUS_CHANGED or UNCHANGED and logs each differing field.
 *   3. `commit(records)` merges the records into the snapshot and hands it
 *      to the store for an atomic write.
 *
 * Comparison runs over the persisted (snake_case) form of a record, so what
 * `detect` reports is exactly what `commit` would change on disk.  Keys
 * starting with `_` are bookkeeping and never compared.
 */

import type {
  AttachedDocument,
  ChangeReport,
  ClassifiedRecord,
  FieldChange,
  TenderRecord,
} from '../core/types';
import { Logger } from '../core/logger';
import type { AttachedDocumentEntry, Snapshot, SnapshotEntry, SnapshotStore } from './snapshotStore';

const logger = new Logger('ChangeTracker');

// ─── Record ⇄ snapshot entry ───────────────────────────────

function toDocumentEntry(doc: AttachedDocument): AttachedDocumentEntry {
  return { file_name: doc.fileName, file_url: doc.fileUrl, description: doc.description };
}

/** The persisted form of a record.  The navigation hint is not carried over. */
export function recordToEntry(record: TenderRecord): SnapshotEntry {
  return {
    tender_no: record.tenderNo,
    issuing_unit: record.issuingUnit,
    title: record.title,
    status: record.status,
    work_area: record.workArea,
    due_date_time: record.dueDateTime,
    due_days: record.dueDays,
    tender_type: record.tenderType,
    date_of_issue: record.dateOfIssue,
    estimated_value: record.estimatedValue,
    emd_amount: record.emdAmount,
    document_cost: record.documentCost,
    contact_officer: record.contactOfficer,
    corrigendum: record.corrigendum,
    description: record.description,
    closing_date: record.closingDate,
    primary_document_url: record.primaryDocumentUrl,
    attached_documents: record.attachedDocuments.map(toDocumentEntry),
  };
}

/** Union by `file_url`: every previous entry first, then unseen incoming ones. */
export function mergeDocuments(
  previous: AttachedDocumentEntry[],
  incoming: AttachedDocumentEntry[],
): AttachedDocumentEntry[] {
  const merged = [...previous];
  const seen = new Set(previous.map((doc) => doc.file_url).filter((url) => url !== ''));

  for (const doc of incoming) {
    if (!doc.file_url || seen.has(doc.file_url)) continue;
    seen.add(doc.file_url);
    merged.push(doc);
  }
  return merged;
}

/**
 * Apply what the snapshot already knows to a fresh entry: documents are
 * unioned (unless overwriting) and an empty primary document keeps the prior
 * one.  Every other field takes the incoming value.
 */
export function mergeWithPrior(
  entry: SnapshotEntry,
  prior: SnapshotEntry | undefined,
  overwriteDocuments = false,
): SnapshotEntry {
  if (!prior) return { ...entry };

  const merged: SnapshotEntry = { ...entry };
  if (!overwriteDocuments) {
    merged.attached_documents = mergeDocuments(
      prior.attached_documents ?? [],
      entry.attached_documents ?? [],
    );
  }
  if (!entry.primary_document_url && prior.primary_document_url) {
    merged.primary_document_url = prior.primary_document_url;
  }
  return merged;
}

// ─── Comparison ────────────────────────────────────────────

/** The snapshot key already is the identity. */
const IDENTITY_FIELD = 'tender_no';

/** Absent, null and empty lists compare as ""; strings are trimmed. */
export function normalizeValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value) && value.length === 0) return '';
  return JSON.stringify(value);
}

/** Every non-bookkeeping, non-identity field whose normalized values differ, current keys first. */
export function diffEntries(prior: SnapshotEntry, current: SnapshotEntry): FieldChange[] {
  const keys = [...Object.keys(current)];
  for (const key of Object.keys(prior)) {
    if (!keys.includes(key)) keys.push(key);
  }

  const changes: FieldChange[] = [];
  for (const key of keys) {
    if (key.startsWith('_') || key === IDENTITY_FIELD) continue;
    const previous = normalizeValue(prior[key]);
    const next = normalizeValue(current[key]);
    if (previous !== next) changes.push({ field: key, previous, current: next });
  }
  return changes;
}

// ─── Tracker ───────────────────────────────────────────────

export interface CommitOptions {
  /** Replace the stored document list instead of unioning with it. */
  overwriteDocuments?: boolean;
}

export class ChangeTracker {
  private readonly store: SnapshotStore;
  private snapshot: Snapshot;
  private readonly now: () => Date;

  constructor(store: SnapshotStore, snapshot: Snapshot, now: () => Date = () => new Date()) {
    this.store = store;
    this.snapshot = snapshot;
    this.now = now;
  }

  /** Load the snapshot (once) and return a tracker over it. */
  static async open(store: SnapshotStore, now?: () => Date): Promise<ChangeTracker> {
    return new ChangeTracker(store, await store.load(), now);
  }

  get size(): number {
    return Object.keys(this.snapshot).length;
  }

  entry(tenderNo: string): SnapshotEntry | undefined {
    return this.snapshot[tenderNo];
  }

  detect(records: TenderRecord[]): ChangeReport {
    const report: ChangeReport = {
      new: [],
      updated: [],
      statusChanged: [],
      unchanged: [],
      all: [],
      summary: { total: 0, new: 0, updated: 0, statusChanged: 0, unchanged: 0, timestamp: '' },
    };

    for (const record of records) {
      const id = record.tenderNo.trim();
      if (!id) {
        logger.warn(`Skipping record without a tender number (title: "${record.title}")`);
        continue;
      }

      const classified = this.classify(id, record);
      report.all.push(classified);
      switch (classified.changeType) {
        case 'NEW':
          report.new.push(classified);
          break;
        case 'UPDATED':
          report.updated.push(classified);
          break;
        case 'STATUS_CHANGED':
          report.statusChanged.push(classified);
          break;
        case 'UNCHANGED':
          report.unchanged.push(classified);
          break;
      }
    }

    report.summary = {
      total: report.all.length,
      new: report.new.length,
      updated: report.updated.length,
      statusChanged: report.statusChanged.length,
      unchanged: report.unchanged.length,
      timestamp: this.now().toISOString(),
    };

    const s = report.summary;
    logger.info(
      `Change detection: ${s.total} total, ${s.new} new, ${s.updated} updated, ` +
        `${s.statusChanged} status changed, ${s.unchanged} unchanged`,
    );
    return report;
  }

  /**
   * Merge the records into the snapshot and persist it.  The in-memory
   * snapshot only moves forward once the write has succeeded.
   */
  async commit(records: TenderRecord[], options: CommitOptions = {}): Promise<void> {
    const next: Snapshot = { ...this.snapshot };
    const lastSeen = this.now().toISOString();

    for (const record of records) {
      const id = record.tenderNo.trim();
      if (!id) continue;

      const merged = mergeWithPrior(recordToEntry(record), next[id], options.overwriteDocuments);
      merged._last_seen = lastSeen;
      next[id] = merged;
    }

    await this.store.save(next);
    this.snapshot = next;
  }

  // ── Internals ──────────────────────────────────────────

  private classify(id: string, record: TenderRecord): ClassifiedRecord {
    const prior = this.snapshot[id];
    const entry = mergeWithPrior(recordToEntry(record), prior);
    if (!prior) {
      logger.info(`NEW ${id}: "${record.title}" (${record.status})`);
      return { record, entry, changeType: 'NEW', changes: [] };
    }

    const changes = diffEntries(prior, entry);
    if (changes.length === 0) {
      logger.debug(`UNCHANGED ${id}`);
      return { record, entry, changeType: 'UNCHANGED', changes };
    }

    for (const change of changes) {
      logger.info(`${id} ${change.field}: "${change.previous}" → "${change.current}"`);
    }

    const statusChange = changes.find((change) => change.field === 'status');
    if (statusChange) {
      logger.info(`STATUS_CHANGED ${id}: ${statusChange.previous} → ${statusChange.current}`);
      return {
        record,
        entry,
        changeType: 'STATUS_CHANGED',
        changes,
        previousStatus: statusChange.previous,
      };
    }

    logger.info(`UPDATED ${id}: ${changes.length} field(s) changed`);
    return { record, entry, changeType: 'UPDATED', changes };
  }
}
