/**
 * locators.ts — Everything the code knows about the portal's markup.
 *
 * Labels and placeholders are matched by visible text rather than by CSS
 * class, which the portal renames more often than its wording.  When the
 * portal changes, this is the file to update.
 */

import type { DetailFieldName } from '../core/types';

// ─── Login form ────────────────────────────────────────────

export const LOGIN = {
  mobilePlaceholder: 'Enter Mobile No.',
  challengePlaceholder: 'Enter Verification Code',
  otpPlaceholder: 'Enter OTP',
  getOtpButton: 'Get OTP',
  proceedButton: 'Proceed',
  challengeLabel: 'Verification Code',
  /** Reload icon beside the challenge image. */
  refreshChallenge: "img[alt*='refresh'], img[alt*='reload']",
  /** Heading of the login wall; its absence means we are authenticated. */
  authMarker: 'Authenticate Yourself',
  /** Messages shown when the challenge answer was wrong. */
  challengeErrors: ['incorrect', 'invalid', 'wrong'],
} as const;

/** Fallback challenge image size window (px) when no image sits next to the label. */
export const CHALLENGE_IMAGE_BOUNDS = {
  minWidth: 50,
  maxWidth: 300,
  minHeight: 20,
  maxHeight: 100,
} as const;

// ─── Listing ───────────────────────────────────────────────

/** Both header texts appear in the results table and nowhere else together. */
export const LISTING_TABLE_HEADERS = ['Tender No', 'Deptt'] as const;

export const LISTING_COLUMNS = {
  issuingUnit: 0,
  tenderNo: 1,
  title: 2,
  status: 3,
  workArea: 4,
  dueDateTime: 5,
  dueDays: 6,
  actions: 7,
} as const;

export const MIN_LISTING_CELLS = 7;
export const MAX_IDENTITY_LENGTH = 50;

/** Header and filter captions that show up in the identity column of layout rows. */
export const JUNK_IDENTITIES: ReadonlySet<string> = new Set([
  'Tender No',
  'tender no',
  'Search Tender',
  'Organization',
  'Select Date',
  'Tender Closing Date',
  'Tender Uploading Date',
  'Deptt./Rly. Unit',
  'Actions',
]);

export const VALID_STATUSES: ReadonlySet<string> = new Set([
  'published',
  'active',
  'closed',
  'cancelled',
  'expired',
]);

export const VIEW_DETAILS_SELECTOR = 'img[title="View Tender Details"]';
export const DETAIL_WINDOW_PATTERN = /postRequestNewWindow\(\s*['"]([^'"]+)['"]/;

export const NEXT_PAGE_TEXTS = ['Next', '»', '>'] as const;
export const ALL_ACTIVE_TAB = 'All Active Tenders';
export const NO_RESULTS_TEXT = 'No Results Found';

// ─── Detail page ───────────────────────────────────────────

export const DETAIL_LABELS: Record<DetailFieldName, string> = {
  tenderType: 'Tender Type',
  dateOfIssue: 'Date of Issue',
  estimatedValue: 'Estimated Value',
  emdAmount: 'EMD Amount',
  documentCost: 'Document Cost',
  contactOfficer: 'Contact Officer',
  corrigendum: 'Corrigendum',
  description: 'Description',
  closingDate: 'Closing Date',
};

/** Column captions that land in `description` when the wrong cell is read. */
export const DESCRIPTION_HEADER_TEXTS: ReadonlySet<string> = new Set([
  'File Name',
  'file name',
  'Description',
  'Sl. No',
]);

export const ATTACHED_DOCS_SELECTOR = '#attach_docs';
export const DOWNLOAD_CONTROL_SELECTOR = '.styled-button-8';
export const DOWNLOAD_CONTROL_TEXT = 'Download Tender Doc';
export const DOWNLOAD_FUNCTION = 'downloadtenderDoc';
