import { load } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createParseError } from '../../errors.js';

export interface RawAnchor {
  href: string;
  text: string;
  rel: string[];
}

export interface ExtractedDocument {
  title?: string;
  anchors: RawAnchor[];
}

/**
 * Lists `a[href]` elements in document order. Empty hrefs are dropped;
 * everything else is left for the normalizer to judge.
 */
export function extractAnchors(html: string): ExtractedDocument {
  try {
    const $ = load(html);
    const anchors: RawAnchor[] = [];

    $('a[href]').each((_idx: number, element: CheerioElement) => {
      const href = ($(element).attr('href') ?? '').trim();
      if (href.length === 0) {
        return;
      }

      anchors.push({
        href,
        text: collapseWhitespace($(element).text()),
        rel: relTokens($(element).attr('rel')),
      });
    });

    const title = collapseWhitespace($('title').first().text());

    return { title: title || undefined, anchors };
  } catch (error) {
    throw createParseError('Failed to extract anchors from HTML', { htmlLength: html.length }, { cause: error });
  }
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function relTokens(rel: string | undefined): string[] {
  if (!rel) {
    return [];
  }
  return [...new Set(rel.toLowerCase().split(/\s+/).filter(Boolean))];
}
