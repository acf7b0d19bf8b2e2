/**
 * listingParser.ts — Turn one page of the public tender listing into records.
 *
 * The listing page nests its results table inside several layout tables, so
 * the parser picks the innermost table whose text contains both results
 * headers and reads its rows positionally.  Rows that fail any check below
 * are layout rows, not tenders, and are skipped:
 *
 *   - fewer than 7 cells
 *   - empty identity, or one of the known header/filter captions
 *   - identity longer than 50 characters or spanning several lines
 *   - status outside the portal's status vocabulary
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { HarvestedRecord } from '../core/types';
import { Logger } from '../core/logger';
import {
  DETAIL_WINDOW_PATTERN,
  JUNK_IDENTITIES,
  LISTING_COLUMNS,
  LISTING_TABLE_HEADERS,
  MAX_IDENTITY_LENGTH,
  MIN_LISTING_CELLS,
  VALID_STATUSES,
  VIEW_DETAILS_SELECTOR,
} from '../portal/locators';

const logger = new Logger('ListingParser');

export interface ParsedListingPage {
  /** Rows that passed every check and the category filter. */
  records: HarvestedRecord[];
  /** Valid tenders dropped by the category filter. */
  otherCategories: number;
  /** Tenders without a usable "View Tender Details" control. */
  missingNavigation: number;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Innermost table containing every results header, or null. */
export function findResultsTable($: cheerio.CheerioAPI): cheerio.Cheerio<Element> | null {
  const candidates = $('table')
    .toArray()
    .filter((table) => {
      const text = $(table).text();
      return LISTING_TABLE_HEADERS.every((header) => text.includes(header));
    });

  const innermost = candidates.find(
    (table) => !$(table).find('table').toArray().some((inner) => candidates.includes(inner)),
  );
  return innermost ? $(innermost) : null;
}

/**
 * Read the detail-page target from a row's action cell: the
 * `postRequestNewWindow('…')` argument, else a real href.
 */
export function navigationHintFrom(actionCell: cheerio.Cheerio<Element>): string {
  const icon = actionCell.find(VIEW_DETAILS_SELECTOR).first();
  if (icon.length === 0) return '';

  const link = icon.closest('a');
  if (link.length === 0) return '';

  const match = DETAIL_WINDOW_PATTERN.exec(link.attr('onclick') ?? '');
  if (match) return match[1];

  const href = (link.attr('href') ?? '').trim();
  return href && href !== '#' && !href.startsWith('javascript:') ? href : '';
}

/** Apply the row checks; returns the reason a row is not a tender, or null. */
export function rejectionReason(tenderNo: string, status: string): string | null {
  if (!tenderNo) return 'empty identity';
  if (JUNK_IDENTITIES.has(tenderNo)) return 'header caption';
  if (tenderNo.length > MAX_IDENTITY_LENGTH) return 'identity too long';
  if (/[\r\n]/.test(tenderNo)) return 'multi-line identity';
  if (!VALID_STATUSES.has(status.toLowerCase())) return `unknown status "${status}"`;
  return null;
}

export function parseListingPage(html: string, category: string): ParsedListingPage {
  const $ = cheerio.load(html);
  const page: ParsedListingPage = { records: [], otherCategories: 0, missingNavigation: 0 };

  const table = findResultsTable($);
  if (!table) {
    logger.warn('No results table found on the listing page');
    return page;
  }

  const rows = table.children('tbody, thead').children('tr').add(table.children('tr'));

  rows.each((_, row) => {
    const cells = $(row).children('td, th');
    if (cells.length < MIN_LISTING_CELLS) return;

    const cell = (index: number) => collapse(cells.eq(index).text());
    const tenderNo = cells.eq(LISTING_COLUMNS.tenderNo).text().trim();
    const status = cell(LISTING_COLUMNS.status);

    const reason = rejectionReason(tenderNo, status);
    if (reason) {
      logger.debug(`Skipping row "${collapse(tenderNo).slice(0, 60)}": ${reason}`);
      return;
    }

    const workArea = cell(LISTING_COLUMNS.workArea);
    if (workArea.toLowerCase() !== category.toLowerCase()) {
      logger.debug(`Skipping ${tenderNo}: category "${workArea}" is not "${category}"`);
      page.otherCategories++;
      return;
    }

    const navigationHint =
      cells.length > LISTING_COLUMNS.actions
        ? navigationHintFrom(cells.eq(LISTING_COLUMNS.actions))
        : '';
    if (!navigationHint) {
      logger.warn(`Extraction gap: no "View Tender Details" control for ${tenderNo}`);
      page.missingNavigation++;
    }

    page.records.push({
      tenderNo,
      issuingUnit: cell(LISTING_COLUMNS.issuingUnit),
      title: cell(LISTING_COLUMNS.title),
      status,
      workArea,
      dueDateTime: cell(LISTING_COLUMNS.dueDateTime),
      dueDays: cell(LISTING_COLUMNS.dueDays),
      navigationHint,
    });
  });

  return page;
}
