/**
 * detailExtractor.ts — Read enrichment fields out of a tender detail page.
 *
 * Labeled scalars go through a `LabelResolver`; documents are read from the
 * page's HTML directly.  Every function here is pure so the enricher can be
 * exercised against canned HTML.
 */

import type * as cheerio from 'cheerio';
import { DETAIL_FIELD_NAMES, type AttachedDocument, type DetailFieldName, type DetailFields } from '../core/types';
import { Logger, describeError } from '../core/logger';
import {
  ATTACHED_DOCS_SELECTOR,
  DESCRIPTION_HEADER_TEXTS,
  DETAIL_LABELS,
  DOWNLOAD_FUNCTION,
} from '../portal/locators';
import type { LabelResolver } from './labelResolver';

const logger = new Logger('DetailExtractor');

// ─── Labeled fields ────────────────────────────────────────

/** Why a resolved value cannot belong to `field`, or null when it is plausible. */
export function implausibility(field: DetailFieldName, value: string, title: string): string | null {
  switch (field) {
    case 'closingDate':
      return value.includes('/') ? null : 'not a date';
    case 'description':
      return DESCRIPTION_HEADER_TEXTS.has(value) ? 'column caption' : null;
    case 'tenderType':
      return title && value === title ? 'same as the title' : null;
    default:
      return null;
  }
}

/** Every detail field the page carries a plausible value for. */
export function extractDetailFields(resolver: LabelResolver, title: string): Partial<DetailFields> {
  const fields: Partial<DetailFields> = {};

  for (const field of DETAIL_FIELD_NAMES) {
    const label = DETAIL_LABELS[field];
    let value: string | null;
    try {
      value = resolver.valueFor(label);
    } catch (err) {
      logger.debug(`Could not read "${label}": ${describeError(err)}`);
      continue;
    }
    if (!value) continue;

    const reason = implausibility(field, value, title);
    if (reason) {
      logger.debug(`Rejected ${field} value "${value.slice(0, 60)}": ${reason}`);
      continue;
    }
    fields[field] = value;
  }
  return fields;
}

// ─── Documents ─────────────────────────────────────────────

/** Resolve a portal path against the base URL; null for non-URLs. */
export function absoluteUrl(raw: string, baseUrl: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed || trimmed === '#' || trimmed.toLowerCase().startsWith('javascript:')) return null;
  try {
    return new URL(trimmed, `${baseUrl}/`).toString();
  } catch {
    return null;
  }
}

const WINDOW_OPEN = /window\.open\(\s*['"]([^'"]+)['"]/;

/** Rows of the attached-documents table (header skipped), deduplicated by URL. */
export function extractAttachedDocuments($: cheerio.CheerioAPI, baseUrl: string): AttachedDocument[] {
  const documents: AttachedDocument[] = [];
  const seen = new Set<string>();

  $(ATTACHED_DOCS_SELECTOR)
    .find('tr')
    .slice(1)
    .each((index, row) => {
      const cells = $(row).children('td');
      if (cells.length < 2) return;

      const link = cells.eq(1).find('a').first();
      if (link.length === 0) return;

      const fileName = link.text().trim();
      const onclick = WINDOW_OPEN.exec(link.attr('onclick') ?? '');
      const fileUrl =
        (onclick ? absoluteUrl(onclick[1], baseUrl) : null) ??
        absoluteUrl(link.attr('href') ?? '', baseUrl);

      if (!fileUrl) {
        logger.debug(`Attached document row ${index + 1} ("${fileName}") has no URL`);
        return;
      }
      if (seen.has(fileUrl)) return;
      seen.add(fileUrl);

      documents.push({
        fileName,
        fileUrl,
        description: cells.length >= 3 ? cells.eq(2).text().trim() : '',
      });
    });

  return documents;
}

const DOWNLOAD_TARGET_PATTERNS = [
  new RegExp(`${DOWNLOAD_FUNCTION}[^}]*window\\.open\\(\\s*['"]([^'"]+)['"]`),
  new RegExp(`${DOWNLOAD_FUNCTION}[^}]*\\.action\\s*=\\s*['"]([^'"]+)['"]`),
  new RegExp(`${DOWNLOAD_FUNCTION}[^}]*(?:href|location)\\s*=\\s*['"]([^'"]+)['"]`),
];

/** The primary document URL written literally in the download function's source. */
export function primaryDocumentFromScripts($: cheerio.CheerioAPI, baseUrl: string): string | null {
  for (const script of $('script').toArray()) {
    const source = $(script).text();
    if (!source.includes(DOWNLOAD_FUNCTION)) continue;

    for (const pattern of DOWNLOAD_TARGET_PATTERNS) {
      const match = pattern.exec(source);
      if (match) return absoluteUrl(match[1], baseUrl);
    }
  }
  return null;
}

/** A form already pointed at the document store. */
export function primaryDocumentFromForms($: cheerio.CheerioAPI, baseUrl: string): string | null {
  for (const form of $('form').toArray()) {
    const action = $(form).attr('action') ?? '';
    if (action.includes('pdfdocs')) return absoluteUrl(action, baseUrl);
  }
  return null;
}
