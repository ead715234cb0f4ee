/**
 * Defines custom error types for sitesearch.
 */

/**
 * Base class for all sitesearch errors.
 * Carries a machine-readable errorCode and optional details.
 */
export class SiteSearchError extends Error {
  public readonly errorCode: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Crawling Errors ---

export class CrawlError extends SiteSearchError {
  constructor(message: string, errorCode: string = 'CRAWL_ERROR', details?: Record<string, unknown>) {
    super(message, errorCode, details);
  }
}

/** Transport-level failures: the page could not be fetched at all. */
export class CrawlTransportError extends CrawlError {}

export class CrawlTimeoutError extends CrawlTransportError {
  constructor(url: string, timeoutMs: number, details?: Record<string, unknown>) {
    super(`Timeout (${timeoutMs}ms) while fetching ${url}`, 'CRAWL_TIMEOUT', { url, timeoutMs, ...details });
  }
}

export class CrawlNetworkError extends CrawlTransportError {
  constructor(url: string, originalError?: Error, details?: Record<string, unknown>) {
    super(
      `Network error while fetching ${url}${originalError ? `: ${originalError.message}` : ''}`,
      'CRAWL_NETWORK_ERROR',
      { url, originalError, ...details }
    );
  }
}

export class ContentTypeSkipError extends CrawlError {
  constructor(url: string, contentType: string) {
    super(`Skipping non-HTML content (${contentType || 'no content type'}) at ${url}`, 'CONTENT_TYPE_SKIP', { url, contentType });
  }
}

export class ContentParseError extends CrawlError {
  constructor(url: string, originalError?: Error) {
    super(
      `Failed to parse content of ${url}${originalError ? `: ${originalError.message}` : ''}`,
      'CONTENT_PARSE_ERROR',
      { url, originalError }
    );
  }
}

// --- Configuration Errors ---

export class ConfigurationError extends SiteSearchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

/** Wraps anything thrown into an Error so it can be reported uniformly. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
