/**
 * In-memory page index
 */

import { IndexedPage } from '../../../domain/models/Page.js';
import { IPageIndex } from '../../../domain/repositories/PageIndex.js';
import { Logger, getLogger } from '../../logging.js';
import { PageSearch } from './PageSearch.js';

/**
 * Map-backed index; iteration follows insertion order, which is the order
 * pages were crawled.
 */
export class InMemoryPageIndex implements IPageIndex {
  private pagesByUrl = new Map<string, IndexedPage>();
  private searcher: PageSearch;
  private logger: Logger;

  constructor(loggerInstance?: Logger) {
    this.logger = loggerInstance || getLogger();
    this.searcher = new PageSearch(this.logger);
  }

  add(page: IndexedPage): boolean {
    if (this.pagesByUrl.has(page.url)) {
      this.logger.warn(`Page already indexed, keeping first entry: ${page.url}`, 'PageIndex.add');
      return false;
    }
    this.pagesByUrl.set(page.url, page);
    this.logger.debug(`Indexed ${page.url} (${page.text.length} chars, depth ${page.depth})`, 'PageIndex.add');
    return true;
  }

  has(url: string): boolean {
    return this.pagesByUrl.has(url);
  }

  get(url: string): IndexedPage | undefined {
    return this.pagesByUrl.get(url);
  }

  get size(): number {
    return this.pagesByUrl.size;
  }

  urls(): string[] {
    return Array.from(this.pagesByUrl.keys());
  }

  pages(): IndexedPage[] {
    return Array.from(this.pagesByUrl.values());
  }

  search(keyword: unknown): string[] {
    return this.searcher.executeSearch(this.pagesByUrl.values(), keyword);
  }
}
