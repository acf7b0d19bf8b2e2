/**
 * detailEnricher.ts — Phase 2: visit each tender's detail page behind the login.
 *
 * FAILURE HANDLING
 * ────────────────
 *   - Each visit is retried with exponential backoff (MAX_RETRIES attempts).
 *   - A record that still fails is left unenriched and counts toward the
 *     circuit breaker; MAX_CONSECUTIVE_FAILURES failures in a row stop the
 *     stage.  Any success resets the count.
 *   - A page showing the login wall means the session expired: stop at once.
 *   - A crashed browser ("Target closed", "Session closed") aborts the stage.
 *
 * Whatever happens, the outcome carries every input record: enriched ones
 * with their detail fields, the rest with empty enrichment.
 */

import * as cheerio from 'cheerio';
import { withEmptyEnrichment, type HarvestedRecord, type TenderRecord } from '../core/types';
import { Logger, describeError } from '../core/logger';
import { withRetry } from '../core/retry';
import type { Sleep } from '../core/timing';
import type { RequestPacer } from '../middleware/pacing';
import { LOGIN } from '../portal/locators';
import {
  extractAttachedDocuments,
  extractDetailFields,
  primaryDocumentFromForms,
  primaryDocumentFromScripts,
} from './detailExtractor';
import { CheerioLabelResolver } from './labelResolver';

const logger = new Logger('DetailEnricher');

// ─── Browser seam ──────────────────────────────────────────

/** An opened detail page. */
export interface DetailView {
  readonly url: string;
  content(): Promise<string>;
  /** Trigger the download control and report the URL the new tab navigated to. */
  interceptPrimaryDocumentNavigation(): Promise<string | null>;
  close(): Promise<void>;
}

export interface DetailSource {
  open(record: HarvestedRecord): Promise<DetailView>;
}

// ─── Outcomes ──────────────────────────────────────────────

export type VisitResult =
  | { kind: 'enriched'; record: TenderRecord }
  | { kind: 'auth-redirect' };

export interface EnrichmentTally {
  /** Every input record, in input order. */
  records: TenderRecord[];
  enriched: number;
  failed: number;
  /** Records without a navigation hint. */
  skipped: number;
}

export type EnrichmentOutcome =
  | ({ kind: 'completed' } & EnrichmentTally)
  | ({ kind: 'session-expired'; tenderNo: string } & EnrichmentTally)
  | ({ kind: 'circuit-open'; consecutiveFailures: number } & EnrichmentTally)
  | ({ kind: 'aborted'; error: string } & EnrichmentTally);

export interface EnricherOptions {
  baseUrl: string;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxConsecutiveFailures: number;
  sleep?: Sleep;
}

/** Errors after which the browser is gone and every further visit would fail. */
const BROWSER_GONE = /target closed|session closed|connection closed|browser has disconnected/i;

export function isBrowserCrash(err: unknown): boolean {
  return BROWSER_GONE.test(describeError(err));
}

// ─── Enricher ──────────────────────────────────────────────

export class DetailEnricher {
  private readonly pacer: RequestPacer;
  private readonly options: EnricherOptions;

  constructor(pacer: RequestPacer, options: EnricherOptions) {
    this.pacer = pacer;
    this.options = options;
  }

  async enrich(records: HarvestedRecord[], source: DetailSource): Promise<EnrichmentOutcome> {
    const tally: EnrichmentTally = {
      records: records.map(withEmptyEnrichment),
      enriched: 0,
      failed: 0,
      skipped: 0,
    };
    let consecutiveFailures = 0;

    for (const [index, record] of records.entries()) {
      const progress = `[${index + 1}/${records.length}]`;

      if (!record.navigationHint) {
        logger.warn(`${progress} ${record.tenderNo}: no detail link — left unenriched`);
        tally.skipped++;
        continue;
      }

      logger.info(`${progress} Enriching ${record.tenderNo}…`);
      const attempt = await withRetry(
        () => this.pacer.schedule(() => this.visit(record, source)),
        {
          attempts: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs,
          sleep: this.options.sleep,
        },
        {
          shouldAbort: isBrowserCrash,
          onRetry: (err, n, delayMs) =>
            logger.warn(
              `${record.tenderNo}: attempt ${n} failed (${describeError(err)}) — retrying in ${delayMs}ms`,
            ),
        },
      );

      if (!attempt.ok) {
        if (attempt.aborted) {
          logger.error(`Browser crashed while enriching ${record.tenderNo} — aborting phase 2`);
          return { kind: 'aborted', error: describeError(attempt.error), ...tally };
        }

        tally.failed++;
        consecutiveFailures++;
        logger.warn(
          `${record.tenderNo}: giving up after ${attempt.attempts} attempt(s) ` +
            `(${consecutiveFailures} consecutive failure(s))`,
        );
        if (consecutiveFailures >= this.options.maxConsecutiveFailures) {
          logger.error(`Circuit breaker open after ${consecutiveFailures} consecutive failures`);
          return { kind: 'circuit-open', consecutiveFailures, ...tally };
        }
        continue;
      }

      consecutiveFailures = 0;
      if (attempt.value.kind === 'auth-redirect') {
        logger.warn(`Session expired at ${record.tenderNo} — returning partial enrichment`);
        return { kind: 'session-expired', tenderNo: record.tenderNo, ...tally };
      }

      tally.records[index] = attempt.value.record;
      tally.enriched++;
    }

    logger.info(
      `Phase 2 complete: ${tally.enriched} enriched, ${tally.failed} failed, ${tally.skipped} skipped`,
    );
    return { kind: 'completed', ...tally };
  }

  /** Open one detail page and read everything off it. */
  async visit(record: HarvestedRecord, source: DetailSource): Promise<VisitResult> {
    const view = await source.open(record);
    try {
      const html = await view.content();
      if (html.includes(LOGIN.authMarker)) return { kind: 'auth-redirect' };

      const $ = cheerio.load(html);
      const { baseUrl } = this.options;
      const fields = extractDetailFields(new CheerioLabelResolver($), record.title);
      const attachedDocuments = extractAttachedDocuments($, baseUrl);
      const primaryDocumentUrl =
        primaryDocumentFromScripts($, baseUrl) ??
        (await view.interceptPrimaryDocumentNavigation()) ??
        primaryDocumentFromForms($, baseUrl);

      logger.info(
        `${record.tenderNo}: ${Object.keys(fields).length} field(s), ` +
          `${attachedDocuments.length} document(s), primary document ${primaryDocumentUrl ? 'found' : 'missing'}`,
      );

      return {
        kind: 'enriched',
        record: {
          ...withEmptyEnrichment(record),
          ...fields,
          primaryDocumentUrl,
          attachedDocuments,
        },
      };
    } finally {
      await view.close();
    }
  }
}
