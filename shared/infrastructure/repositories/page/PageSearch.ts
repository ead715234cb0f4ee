/**
 * Keyword search over indexed pages
 */

import { IndexedPage } from '../../../domain/models/Page.js';
import { Logger, getLogger } from '../../logging.js';

/**
 * Page search helper
 */
export class PageSearch {
  private logger: Logger;

  constructor(loggerInstance?: Logger) {
    this.logger = loggerInstance || getLogger();
  }

  /**
   * Find pages whose text contains the keyword, ignoring case.
   * Scans every page; results keep the order of the input.
   * @returns URLs of the matching pages
   */
  executeSearch(pages: Iterable<IndexedPage>, keyword: unknown): string[] {
    if (typeof keyword !== 'string' || keyword.length === 0) {
      this.logger.debug('Ignoring empty or non-string keyword', 'PageSearch.executeSearch');
      return [];
    }

    const needle = keyword.toLowerCase();
    const results: string[] = [];
    let scanned = 0;

    for (const page of pages) {
      scanned++;
      if (page.text.toLowerCase().includes(needle)) {
        results.push(page.url);
      }
    }

    this.logger.debug(`Search for "${keyword}" matched ${results.length} of ${scanned} pages`, 'PageSearch.executeSearch');
    return results;
  }
}
