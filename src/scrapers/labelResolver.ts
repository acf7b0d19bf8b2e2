/**
 * labelResolver.ts — "Find the label, read the value next to it."
 *
 * The detail page is a loose grid of label/value cells with no stable ids.
 * `LabelResolver` is the seam the extractor reads through; the cheerio
 * implementation works on a snapshot of the page's HTML.
 */

import type * as cheerio from 'cheerio';
import { isText, type Element } from 'domhandler';

export interface LabelResolver {
  /** The value shown beside `label`, or null when the label is absent. */
  valueFor(label: string): string | null;
}

const MAX_VALUE_LENGTH = 500;

/** Select-box dumps, inline script and wrong-element reads. */
export function isJunkValue(value: string): boolean {
  if (!value) return false;
  if ((value.match(/\t/g) ?? []).length > 3) return true;
  if (value.includes('createOptorDpdw()') || value.includes('document.getElementById')) return true;
  return value.length > MAX_VALUE_LENGTH;
}

const NON_CONTENT_TAGS = new Set(['script', 'style', 'option', 'select', 'textarea', 'title', 'head']);

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class CheerioLabelResolver implements LabelResolver {
  private readonly $: cheerio.CheerioAPI;

  constructor($: cheerio.CheerioAPI) {
    this.$ = $;
  }

  valueFor(label: string): string | null {
    const element = this.findLabel(label, true) ?? this.findLabel(label, false);
    if (!element) return null;

    const $label = this.$(element);

    // The cell after the label's cell.
    const cell = $label.closest('td, th');
    if (cell.length > 0) {
      const candidate = cell.nextAll('td').first().text().trim();
      if (candidate && candidate !== label && !isJunkValue(candidate)) return candidate;
    }

    // Otherwise the label's next sibling element.
    const sibling = $label.next().text().trim();
    if (sibling && !isJunkValue(sibling)) return sibling;

    return null;
  }

  /** First element whose own text equals (or, inexactly, contains) the label. */
  private findLabel(label: string, exact: boolean): Element | null {
    const $ = this.$;
    for (const element of $('body *').toArray()) {
      if (NON_CONTENT_TAGS.has(element.tagName)) continue;

      const ownText = collapse(
        element.children
          .filter(isText)
          .map((node) => node.data)
          .join(' '),
      );
      if (!ownText) continue;
      if (exact ? ownText === label : ownText.includes(label)) return element;
    }
    return null;
  }
}
