/**
 * Page entities flowing between the fetcher, the parser, the crawler and
 * the index.
 */
import { CrawlError, CrawlTransportError, ContentTypeSkipError } from '../errors.js';

/**
 * Raw response for a fetched URL. The status code is carried for logging
 * only; the crawler decides on the content type alone.
 */
export interface FetchedPage {
  /** URL that was requested */
  url: string;

  /** HTTP status code */
  statusCode: number;

  /** Value of the content-type header, empty when absent */
  contentType: string;

  /** Response body as text */
  body: string;
}

/** Result of parsing an HTML body */
export interface ParsedPage {
  /** Plain text of the document */
  text: string;

  /** Raw href attribute values in document order */
  links: string[];
}

/**
 * A page stored in the index
 */
export interface IndexedPage {
  /** Normalized URL of the page */
  url: string;

  /** Plain text extracted from the page */
  text: string;

  /** Crawl depth the page was found at */
  depth: number;

  /** When the page was indexed */
  indexedAt: Date;
}

/**
 * What happened to a single URL once it was taken off the frontier.
 */
export type PageOutcome =
  | { kind: 'indexed'; url: string; page: IndexedPage; links: string[] }
  | { kind: 'fetch-error'; url: string; error: CrawlTransportError }
  | { kind: 'content-skip'; url: string; error: ContentTypeSkipError }
  | { kind: 'parse-error'; url: string; error: CrawlError };
