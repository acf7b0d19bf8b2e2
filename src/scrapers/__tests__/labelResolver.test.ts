import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { CheerioLabelResolver, isJunkValue } from '../labelResolver';

function resolverFor(body: string): CheerioLabelResolver {
  return new CheerioLabelResolver(cheerio.load(`<html><body>${body}</body></html>`));
}

describe('CheerioLabelResolver', () => {
  it('reads the cell after the label cell', () => {
    const resolver = resolverFor(
      '<table><tr><td><b>Tender Type</b></td><td> Open </td></tr>' +
        '<tr><td>Estimated Value</td><td>1,20,000</td></tr></table>',
    );

    expect(resolver.valueFor('Tender Type')).toBe('Open');
    expect(resolver.valueFor('Estimated Value')).toBe('1,20,000');
  });

  it('prefers an exact label over one that merely contains it', () => {
    const resolver = resolverFor(
      '<table><tr><td>Closing Date (extended)</td><td>wrong</td></tr>' +
        '<tr><td>Closing Date</td><td>20/03/2026</td></tr></table>',
    );

    expect(resolver.valueFor('Closing Date')).toBe('20/03/2026');
  });

  it('falls back to the next sibling outside a table', () => {
    const resolver = resolverFor('<div><span>Contact Officer:</span><span>R. Rao</span></div>');
    expect(resolver.valueFor('Contact Officer')).toBe('R. Rao');
  });

  it('ignores labels inside select options', () => {
    const resolver = resolverFor(
      '<select><option>Corrigendum</option><option>None</option></select>' +
        '<table><tr><td>Corrigendum</td><td>Date extended</td></tr></table>',
    );

    expect(resolver.valueFor('Corrigendum')).toBe('Date extended');
  });

  it('returns null for junk values and absent labels', () => {
    const resolver = resolverFor(
      '<table><tr><td>Corrigendum</td><td>createOptorDpdw() selected</td></tr></table>',
    );

    expect(resolver.valueFor('Corrigendum')).toBeNull();
    expect(resolver.valueFor('EMD Amount')).toBeNull();
  });
});

describe('isJunkValue', () => {
  it.each([
    ['a\tb\tc\td\te', true],
    ['x'.repeat(501), true],
    ['document.getElementById("x")', true],
    ['Open', false],
    ['', false],
  ])('%j → %s', (value, junk) => {
    expect(isJunkValue(value)).toBe(junk);
  });
});
