/**
 * types.ts — Shared type definitions for the whole tender pipeline.
 *
 * Every layer (harvester, enricher, change tracker, exporter) agrees on the
 * shape of a tender here.  Adding a detail field is a one-file change: add it
 * to `DetailFields`, give it a label in `portal/locators.ts`, and the
 * snapshot mapping picks it up.
 */

import type { SnapshotEntry } from '../services/snapshotStore';

// ─── Documents ─────────────────────────────────────────────

/** One file listed in a tender's attached-documents table.  Keyed by `fileUrl`. */
export interface AttachedDocument {
  fileName: string;
  fileUrl: string;
  description: string;
}

// ─── Records ───────────────────────────────────────────────

/**
 * A tender as it appears on the public listing (phase 1).
 *
 * `tenderNo` is the identity: trimmed, case- and whitespace-sensitive as
 * issued by the portal, and never changed once assigned.
 */
export interface HarvestedRecord {
  tenderNo: string;
  issuingUnit: string;
  title: string;
  status: string;
  /** Classification column ("Works", "Goods", "Services"). */
  workArea: string;
  dueDateTime: string;
  dueDays: string;
  /**
   * Detail-page target taken from the row's "View Tender Details" control.
   * Navigation only: never compared, never persisted.
   */
  navigationHint: string;
}

/** Labeled scalar fields read from the authenticated detail page (phase 2). */
export interface DetailFields {
  tenderType: string;
  dateOfIssue: string;
  estimatedValue: string;
  emdAmount: string;
  documentCost: string;
  contactOfficer: string;
  corrigendum: string;
  description: string;
  closingDate: string;
}

export type DetailFieldName = keyof DetailFields;

export const DETAIL_FIELD_NAMES: readonly DetailFieldName[] = [
  'tenderType',
  'dateOfIssue',
  'estimatedValue',
  'emdAmount',
  'documentCost',
  'contactOfficer',
  'corrigendum',
  'description',
  'closingDate',
];

/** A fully shaped tender: listing fields plus (possibly empty) enrichment. */
export interface TenderRecord extends HarvestedRecord, DetailFields {
  primaryDocumentUrl: string | null;
  attachedDocuments: AttachedDocument[];
}

export function emptyDetailFields(): DetailFields {
  return {
    tenderType: '',
    dateOfIssue: '',
    estimatedValue: '',
    emdAmount: '',
    documentCost: '',
    contactOfficer: '',
    corrigendum: '',
    description: '',
    closingDate: '',
  };
}

/** Shape a listing record as a complete tender whose enrichment is empty. */
export function withEmptyEnrichment(record: HarvestedRecord): TenderRecord {
  return {
    ...record,
    ...emptyDetailFields(),
    primaryDocumentUrl: null,
    attachedDocuments: [],
  };
}

// ─── Change tracking ───────────────────────────────────────

export type ChangeType = 'NEW' | 'UPDATED' | 'STATUS_CHANGED' | 'UNCHANGED';

/** One differing field, named as it is stored in the snapshot file. */
export interface FieldChange {
  field: string;
  previous: string;
  current: string;
}

export interface ClassifiedRecord {
  record: TenderRecord;
  /** The record as it will be persisted: merged with what the snapshot already holds. */
  entry: SnapshotEntry;
  changeType: ChangeType;
  /** Every differing field, including `status` for STATUS_CHANGED. */
  changes: FieldChange[];
  previousStatus?: string;
}

/** Counts per bucket, for logs and the health notification. */
export interface ChangeSummary {
  total: number;
  new: number;
  updated: number;
  statusChanged: number;
  unchanged: number;
  timestamp: string;
}

export interface ChangeReport {
  new: ClassifiedRecord[];
  updated: ClassifiedRecord[];
  statusChanged: ClassifiedRecord[];
  unchanged: ClassifiedRecord[];
  all: ClassifiedRecord[];
  summary: ChangeSummary;
}

// ─── OTP ───────────────────────────────────────────────────

/** A delivered one-time code and the wall-clock time (epoch ms) it was produced. */
export interface OtpTicket {
  code: string;
  producedAt: number;
}
