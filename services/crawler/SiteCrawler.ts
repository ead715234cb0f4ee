/**
 * SiteCrawler
 *
 * Depth-first, depth-bounded crawl of a single site. Every URL is fetched
 * at most once per crawler instance; HTML pages go into the page index and
 * their in-scope links are followed in document order.
 *
 * Events:
 * - `start`      { url, maxDepth, scopeBase }
 * - `processing` { url, depth }
 * - `indexed`    { url, depth, links }
 * - `skipped`    { url, depth, contentType }
 * - `failed`     { url, depth, error }
 * - `complete`   CrawlStatus
 */

import { EventEmitter } from 'events';
import { Logger, getLogger } from '../../shared/infrastructure/logging.js';
import { HttpClient, PageFetcher } from '../../shared/infrastructure/HttpClient.js';
import { InMemoryPageIndex } from '../../shared/infrastructure/repositories/page/PageIndex.js';
import { IPageIndex } from '../../shared/domain/repositories/PageIndex.js';
import { FetchedPage, PageOutcome, ParsedPage } from '../../shared/domain/models/Page.js';
import {
  ContentParseError,
  ContentTypeSkipError,
  CrawlError,
  CrawlNetworkError,
  CrawlTransportError,
  toError
} from '../../shared/domain/errors.js';
import { HtmlParser, PageParser } from './PageParser.js';
import { isInScope, normalizeUrl, resolveUrl } from './UrlScope.js';

export const DEFAULT_MAX_DEPTH = 3;

export interface CrawlerOptions {
  /** Depth bound used when crawl() is not given one (default: 3) */
  maxDepth?: number;
  /** Fetch collaborator (default: HttpClient) */
  fetcher?: PageFetcher;
  /** Parse collaborator (default: PageParser) */
  parser?: HtmlParser;
  /** Index pages are written to (default: InMemoryPageIndex) */
  index?: IPageIndex;
  logger?: Logger;
}

export interface CrawlOptions {
  /**
   * Prefix every followed link must start with. When omitted, links on the
   * first page must share its host and deeper pages are scoped to the
   * first URL.
   */
  scopeBase?: string;
  /** Maximum depth, inclusive */
  maxDepth?: number;
  /** Depth of the given URL (default: 0) */
  depth?: number;
}

export interface CrawlStatus {
  /** URLs handed to the crawler, the seed included */
  discovered: number;
  /** URLs a fetch was attempted for */
  processed: number;
  /** Pages added to the index */
  indexed: number;
  /** Responses skipped for not being HTML */
  skipped: number;
  /** URLs that failed to fetch or parse */
  failed: number;
  startTime?: Date;
  endTime?: Date;
  /** URL being processed */
  currentUrl?: string;
}

export class SiteCrawler extends EventEmitter {
  private fetcher: PageFetcher;
  private parser: HtmlParser;
  private pageIndex: IPageIndex;
  private logger: Logger;
  private defaultMaxDepth: number;

  private visitedUrls: Set<string> = new Set();
  private status: CrawlStatus = {
    discovered: 0,
    processed: 0,
    indexed: 0,
    skipped: 0,
    failed: 0
  };

  constructor(options: CrawlerOptions = {}) {
    super();
    this.logger = options.logger ?? getLogger();
    this.fetcher = options.fetcher ?? new HttpClient();
    this.parser = options.parser ?? new PageParser();
    this.pageIndex = options.index ?? new InMemoryPageIndex(this.logger);
    this.defaultMaxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /** URLs taken off the frontier so far, fetched or not */
  get visited(): ReadonlySet<string> {
    return this.visitedUrls;
  }

  get index(): IPageIndex {
    return this.pageIndex;
  }

  getStatus(): CrawlStatus {
    return { ...this.status };
  }

  /**
   * Crawl from a URL. Never rejects: per-page problems are logged and
   * emitted, and the page is left out of the index. A URL already visited,
   * or deeper than maxDepth, is a no-op.
   */
  async crawl(url: string, options: CrawlOptions = {}): Promise<CrawlStatus> {
    const maxDepth = options.maxDepth ?? this.defaultMaxDepth;
    const depth = options.depth ?? 0;
    // An empty scope base means no override
    const scopeBase = options.scopeBase || undefined;

    const normalized = normalizeUrl(url);
    if (normalized === null) {
      this.status.failed++;
      this.logger.error(`Error crawling ${url}: invalid URL`, 'SiteCrawler.crawl');
      this.notify('failed', { url, depth, error: new CrawlError(`Invalid URL: ${url}`, 'INVALID_URL', { url }) });
      return this.getStatus();
    }
    if (this.visitedUrls.has(normalized) || depth > maxDepth) {
      return this.getStatus();
    }

    this.status.startTime = this.status.startTime ?? new Date();
    this.status.discovered++;
    this.notify('start', { url, maxDepth, scopeBase });
    this.logger.info(`Starting crawl at ${url} (max depth ${maxDepth})`, 'SiteCrawler.crawl');

    await this.crawlPage(url, normalized, scopeBase, maxDepth, depth);

    this.status.endTime = new Date();
    this.status.currentUrl = undefined;
    this.logger.info(
      `Crawl finished: ${this.status.indexed} indexed, ${this.status.skipped} skipped, ${this.status.failed} failed`,
      'SiteCrawler.crawl'
    );
    const snapshot = this.getStatus();
    this.notify('complete', snapshot);
    return snapshot;
  }

  /**
   * Visit a URL that passed the visited and depth checks, then its links
   */
  private async crawlPage(
    url: string,
    normalized: string,
    scopeBase: string | undefined,
    maxDepth: number,
    depth: number
  ): Promise<void> {
    // Marked before fetching so links back to this page are never re-entered
    this.visitedUrls.add(normalized);

    let outcome: PageOutcome;
    try {
      outcome = await this.visit(normalized, depth);
    } catch (error: unknown) {
      const err = toError(error);
      this.status.failed++;
      this.logger.error(`Error crawling ${normalized}: ${err.message}`, 'SiteCrawler.crawlPage', err);
      this.notify('failed', { url: normalized, depth, error: err });
      return;
    }

    this.report(outcome, depth);
    if (outcome.kind !== 'indexed') {
      return;
    }

    // Descendants inherit the scope of the first call
    const base = scopeBase ?? url;
    for (const href of outcome.links) {
      const link = resolveUrl(base, href);
      if (link === null) {
        this.logger.debug(`Dropping unresolvable link ${href} on ${normalized}`, 'SiteCrawler.crawlPage');
        continue;
      }
      if (!isInScope(link, normalized, scopeBase)) {
        this.logger.debug(`Dropping out-of-scope link ${link}`, 'SiteCrawler.crawlPage');
        continue;
      }
      if (this.visitedUrls.has(link) || depth + 1 > maxDepth) {
        continue;
      }
      this.status.discovered++;
      await this.crawlPage(link, link, base, maxDepth, depth + 1);
    }
  }

  /**
   * Fetch, gate and parse one URL, indexing it on success
   */
  private async visit(url: string, depth: number): Promise<PageOutcome> {
    this.status.processed++;
    this.status.currentUrl = url;
    this.notify('processing', { url, depth });

    let fetched: FetchedPage;
    try {
      fetched = await this.fetcher.fetch(url);
    } catch (error: unknown) {
      const transportError = error instanceof CrawlTransportError ? error : new CrawlNetworkError(url, toError(error));
      return { kind: 'fetch-error', url, error: transportError };
    }

    if (!this.isHtml(fetched.contentType)) {
      return { kind: 'content-skip', url, error: new ContentTypeSkipError(url, fetched.contentType) };
    }

    let parsed: ParsedPage;
    try {
      parsed = this.parser.parse(fetched.body);
    } catch (error: unknown) {
      return { kind: 'parse-error', url, error: new ContentParseError(url, toError(error)) };
    }

    const page = { url, text: parsed.text, depth, indexedAt: new Date() };
    this.pageIndex.add(page);
    return { kind: 'indexed', url, page, links: parsed.links };
  }

  private report(outcome: PageOutcome, depth: number): void {
    switch (outcome.kind) {
      case 'indexed':
        this.status.indexed++;
        this.logger.debug(`Indexed ${outcome.url} with ${outcome.links.length} links`, 'SiteCrawler.visit');
        this.notify('indexed', { url: outcome.url, depth, links: outcome.links });
        break;
      case 'content-skip':
        this.status.skipped++;
        this.logger.info(outcome.error.message, 'SiteCrawler.visit');
        this.notify('skipped', { url: outcome.url, depth, contentType: outcome.error.details?.contentType });
        break;
      case 'fetch-error':
      case 'parse-error':
        this.status.failed++;
        this.logger.error(`Error crawling ${outcome.url}: ${outcome.error.message}`, 'SiteCrawler.visit', outcome.error);
        this.notify('failed', { url: outcome.url, depth, error: outcome.error });
        break;
    }
  }

  /**
   * Emit a crawl event. A listener that throws is logged and does not
   * change the outcome of the page being reported.
   */
  private notify(event: string, payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error: unknown) {
      const err = toError(error);
      this.logger.warn(`Listener for '${event}' failed: ${err.message}`, 'SiteCrawler.notify', err);
    }
  }

  private isHtml(contentType: string): boolean {
    return contentType.toLowerCase().includes('text/html');
  }
}
