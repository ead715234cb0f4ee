#!/usr/bin/env node
/**
 * sitesearch CLI: crawl the configured seed, search the configured keyword
 * and print the matching URLs.
 */

import { config } from '../../shared/infrastructure/config.js';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { HttpClient } from '../../shared/infrastructure/HttpClient.js';
import { SiteCrawler } from '../../services/crawler/SiteCrawler.js';
import { toError } from '../../shared/domain/errors.js';
import { printResults } from './formatResults.js';

const logger = getLogger();

async function main(): Promise<void> {
  const crawler = new SiteCrawler({
    maxDepth: config.crawler.maxDepth,
    fetcher: new HttpClient({
      timeout: config.crawler.timeout,
      userAgent: config.crawler.userAgent
    }),
    logger
  });

  await crawler.crawl(config.seedUrl);

  const results = crawler.index.search(config.keyword);
  printResults(results);
}

try {
  await main();
} catch (error: unknown) {
  logger.logError(toError(error), 'cli', 'Fatal error');
  process.exitCode = 1;
} finally {
  await logger.close();
}
