/**
 * Repository interface for indexed pages.
 * Entries are written once per URL and never updated or removed.
 */
import { IndexedPage } from '../models/Page.js';

export interface IPageIndex {
  /**
   * Store a page. The first write for a URL wins.
   * @returns true if the page was added, false if the URL was already indexed
   */
  add(page: IndexedPage): boolean;

  has(url: string): boolean;

  get(url: string): IndexedPage | undefined;

  /** Number of indexed pages */
  readonly size: number;

  /** Indexed URLs in insertion order */
  urls(): string[];

  /** Indexed pages in insertion order */
  pages(): IndexedPage[];

  /**
   * Case-insensitive substring search over page text.
   * Anything other than a non-empty string yields no results.
   * @returns matching URLs in insertion order
   */
  search(keyword: unknown): string[];
}
