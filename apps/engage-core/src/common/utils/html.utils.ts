/**
 * HTML utilities for the event importer.
 */
import * as cheerio from 'cheerio';

const DROPPED_BLOCKS = 'script, style, nav, footer, header, noscript, template, svg';

const LINE_BLOCKS = 'p, div, h1, h2, h3, h4, h5, h6, li, tr, section, article';

/**
 * Converts an HTML page to readable plain text for LLM extraction.
 *
 * Drops script/style and page chrome blocks, ends block-level elements with
 * a line break and collapses whitespace within each line.
 *
 * @example
 * htmlToText('<h1>Summit</h1><p>Starts&nbsp;at 9</p>');
 * // 'Summit\nStarts at 9'
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);

  $(DROPPED_BLOCKS).remove();
  $('br').replaceWith('\n');
  $(LINE_BLOCKS).append('\n');

  return $.root()
    .text()
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}
