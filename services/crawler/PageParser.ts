/**
 * PageParser
 *
 * Turns an HTML body into the plain text that gets indexed and the list of
 * hyperlink targets the crawler follows. Uses cheerio, whose parser
 * recovers from malformed markup instead of throwing.
 */

import * as cheerio from 'cheerio';
import { ParsedPage } from '../../shared/domain/models/Page.js';

export interface ParserOptions {
  /** Elements dropped before text extraction (default: none) */
  excludeSelectors?: string[];
}

/**
 * Parse collaborator used by the crawler
 */
export interface HtmlParser {
  parse(html: string): ParsedPage;
}

export class PageParser implements HtmlParser {
  private excludeSelectors: string[];

  constructor(options: ParserOptions = {}) {
    this.excludeSelectors = options.excludeSelectors ?? [];
  }

  parse(html: string): ParsedPage {
    const $ = cheerio.load(html);

    const links: string[] = [];
    $('a').each((_, element) => {
      const href = $(element).attr('href');
      if (href) {
        links.push(href);
      }
    });

    for (const selector of this.excludeSelectors) {
      $(selector).remove();
    }

    return {
      text: this.cleanText($.root().text()),
      links
    };
  }

  /**
   * Collapse whitespace runs into single spaces
   */
  private cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}
