import { describe, expect, it } from 'vitest';
import { findResultsTable, parseListingPage, rejectionReason } from '../listingParser';
import * as cheerio from 'cheerio';
import { listingHtml, row, viewIcon } from './fixtures';

describe('parseListingPage', () => {
  const html = listingHtml([
    row([
      ' North   Division ',
      ' NR/2026/001 ',
      'Platform   resurfacing',
      'Active',
      'Works',
      '12/03/2026 15:00',
      '10',
      viewIcon('/portal/view.do?id=1'),
    ]),
    row(['South Division', 'SR/2026/002', 'Rail supply', 'Active', 'Goods', '13/03/2026', '11', viewIcon('/x')]),
    row([
      'East Division',
      'ER/2026/003',
      'Footbridge',
      'Published',
      'works',
      '14/03/2026',
      '12',
      '<a href="/portal/view.do?id=3"><img title="View Tender Details"></a>',
    ]),
    row(['West Division', 'WR/2026/004', 'Drainage', 'Closed', 'Works', '15/03/2026', '13', '']),
    row(['West Division', 'WR/2026/005', 'Fencing', 'Draft', 'Works', '16/03/2026', '14', '']),
    '<tr><td colspan="8">Page 1 of 3</td></tr>',
  ]);

  it('keeps only valid rows of the requested category', () => {
    const page = parseListingPage(html, 'Works');

    expect(page.records.map((r) => r.tenderNo)).toEqual(['NR/2026/001', 'ER/2026/003', 'WR/2026/004']);
    expect(page.otherCategories).toBe(1);
    expect(page.missingNavigation).toBe(1);
  });

  it('collapses whitespace in cells and trims the identity', () => {
    const [first] = parseListingPage(html, 'Works').records;

    expect(first).toEqual({
      tenderNo: 'NR/2026/001',
      issuingUnit: 'North Division',
      title: 'Platform resurfacing',
      status: 'Active',
      workArea: 'Works',
      dueDateTime: '12/03/2026 15:00',
      dueDays: '10',
      navigationHint: '/portal/view.do?id=1',
    });
  });

  it('reads the navigation hint from onclick, then href', () => {
    const hints = parseListingPage(html, 'Works').records.map((r) => r.navigationHint);
    expect(hints).toEqual(['/portal/view.do?id=1', '/portal/view.do?id=3', '']);
  });

  it('returns an empty page when there is no results table', () => {
    expect(parseListingPage('<html><body><p>Maintenance</p></body></html>', 'Works')).toEqual({
      records: [],
      otherCategories: 0,
      missingNavigation: 0,
    });
  });
});

describe('findResultsTable', () => {
  it('picks the innermost table carrying both headers', () => {
    const $ = cheerio.load(listingHtml([]));
    expect(findResultsTable($)?.attr('id')).toBe('results');
  });
});

describe('rejectionReason', () => {
  it.each([
    ['', 'Active', 'empty identity'],
    ['Tender No', 'Active', 'header caption'],
    ['X'.repeat(51), 'Active', 'identity too long'],
    ['NR/1\nNR/2', 'Active', 'multi-line identity'],
    ['NR/1', 'Draft', 'unknown status "Draft"'],
  ])('rejects %j with status %s', (tenderNo, status, reason) => {
    expect(rejectionReason(tenderNo, status)).toBe(reason);
  });

  it('accepts statuses case-insensitively', () => {
    expect(rejectionReason('NR/1', 'CANCELLED')).toBeNull();
  });
});
