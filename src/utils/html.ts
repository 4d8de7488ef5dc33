/**
 * HTML section bodies to prompt text
 *
 * Case sections are often stored as HTML. Only leaf content elements are
 * read so nested markup does not repeat text.
 */

import * as cheerio from 'cheerio';

const BLOCK_SELECTORS = ['p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'blockquote', 'li', 'td', 'th'].join(', ');

export function looksLikeHtml(text: string): boolean {
  return /<\/?[a-z][a-z0-9]*(\s[^>]*)?\/?>/i.test(text);
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * One paragraph per content block, separated by blank lines. Plain text is
 * returned unchanged.
 */
export function htmlToText(html: string): string {
  if (!looksLikeHtml(html)) {
    return html;
  }

  const $ = cheerio.load(html);
  $('script, style').remove();

  const blocks: string[] = [];
  $(BLOCK_SELECTORS).each((_, element) => {
    const $el = $(element);
    if ($el.find(BLOCK_SELECTORS).length > 0) {
      return;
    }
    const text = collapseWhitespace($el.text());
    if (text) {
      blocks.push(text);
    }
  });

  if (blocks.length === 0) {
    return collapseWhitespace($.root().text());
  }
  return blocks.join('\n\n');
}
