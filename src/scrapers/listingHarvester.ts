/**
 * listingHarvester.ts — Phase 1: walk the public listing page by page.
 *
 * Pages are fetched lazily: `harvest()` is an async generator, so a caller
 * that stops early (the development record cap) never loads the remaining
 * pages.  Within a run each identity is yielded once, even when the portal
 * repeats a row on two pages.
 */

import type { HarvestedRecord } from '../core/types';
import { Logger } from '../core/logger';
import type { RequestPacer } from '../middleware/pacing';
import { parseListingPage } from './listingParser';

const logger = new Logger('ListingHarvester');

/** Browser-side access to the listing. */
export interface ListingSource {
  /** Load the first page of all active tenders. */
  open(): Promise<void>;
  currentPageHtml(): Promise<string>;
  /** Advance one page; false when already on the last one. */
  nextPage(): Promise<boolean>;
}

export interface HarvestOptions {
  category: string;
  /** Stop after this many records; 0 means no cap. */
  maxRecords: number;
}

export class ListingHarvester {
  private readonly source: ListingSource;
  private readonly pacer: RequestPacer;
  private readonly options: HarvestOptions;

  constructor(source: ListingSource, pacer: RequestPacer, options: HarvestOptions) {
    this.source = source;
    this.pacer = pacer;
    this.options = options;
  }

  async *harvest(): AsyncGenerator<HarvestedRecord> {
    const { category, maxRecords } = this.options;
    const seen = new Set<string>();
    let previousFirst: string | null = null;
    let pageNumber = 1;

    await this.pacer.schedule(() => this.source.open());

    for (;;) {
      const page = parseListingPage(await this.source.currentPageHtml(), category);
      logger.info(
        `Found ${page.records.length} ${category} tender(s) on page ${pageNumber}` +
          (page.otherCategories ? ` (${page.otherCategories} in other categories)` : ''),
      );

      const first = page.records[0]?.tenderNo ?? null;
      if (pageNumber > 1 && first !== null && first === previousFirst) {
        logger.warn(`Page ${pageNumber} repeats page ${pageNumber - 1} — stopping pagination`);
        return;
      }
      previousFirst = first;

      for (const record of page.records) {
        if (seen.has(record.tenderNo)) {
          logger.debug(`Skipping duplicate listing row ${record.tenderNo}`);
          continue;
        }
        seen.add(record.tenderNo);
        yield record;

        if (maxRecords > 0 && seen.size >= maxRecords) {
          logger.info(`Reached the record cap (${maxRecords}) — stopping pagination`);
          return;
        }
      }

      const advanced = await this.pacer.schedule(() => this.source.nextPage());
      if (!advanced) {
        logger.info(`No page after page ${pageNumber} — listing complete`);
        return;
      }
      pageNumber++;
    }
  }

  async harvestAll(): Promise<HarvestedRecord[]> {
    const records: HarvestedRecord[] = [];
    for await (const record of this.harvest()) {
      records.push(record);
    }
    logger.info(`Phase 1 complete: ${records.length} ${this.options.category} tender(s) harvested`);
    return records;
  }
}
