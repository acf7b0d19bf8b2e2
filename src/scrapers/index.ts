/**
 * scrapers/index.ts — Barrel export for the two scraping phases.
 *
 * Phase 1 (listing) works on public pages; phase 2 (detail) needs the
 * authenticated session.  Both read HTML through cheerio, and the browser
 * itself stays behind the `ListingSource` / `DetailSource` seams.
 */

export { ListingHarvester } from './listingHarvester';
export type { HarvestOptions, ListingSource } from './listingHarvester';
export { parseListingPage } from './listingParser';

export { DetailEnricher, isBrowserCrash } from './detailEnricher';
export type { DetailSource, DetailView, EnricherOptions, EnrichmentOutcome } from './detailEnricher';
