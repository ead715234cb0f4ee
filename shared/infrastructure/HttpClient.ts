import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { FetchedPage } from '../domain/models/Page.js';
import { CrawlNetworkError, CrawlTimeoutError, CrawlTransportError, toError } from '../domain/errors.js';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 5000) */
  timeout?: number;

  /** User agent sent with every request */
  userAgent?: string;

  /** Maximum redirects to follow (default: 5) */
  maxRedirects?: number;

  /** Additional axios request config, applied last */
  requestConfig?: AxiosRequestConfig;
}

/**
 * Fetch collaborator used by the crawler
 */
export interface PageFetcher {
  /**
   * GET a URL. Resolves for every HTTP status; rejects with a
   * CrawlTransportError when no response was received.
   */
  fetch(url: string): Promise<FetchedPage>;
}

/**
 * axios-backed page fetcher
 */
export class HttpClient implements PageFetcher {
  private axiosInstance: AxiosInstance;
  private timeout: number;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? 5000;

    this.axiosInstance = axios.create({
      timeout: this.timeout,
      headers: {
        'User-Agent': options.userAgent || 'sitesearch-bot/1.0',
        'Accept': 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8'
      },
      maxRedirects: options.maxRedirects ?? 5,
      responseType: 'text',
      // Error statuses are content too; only the content type decides
      validateStatus: () => true,
      ...options.requestConfig
    });
  }

  async fetch(url: string): Promise<FetchedPage> {
    try {
      const response = await this.axiosInstance.get<unknown>(url);
      const contentType = response.headers['content-type'];

      return {
        url,
        statusCode: response.status,
        contentType: typeof contentType === 'string' ? contentType : '',
        body: typeof response.data === 'string' ? response.data : String(response.data ?? '')
      };
    } catch (error: unknown) {
      throw this.toTransportError(url, error);
    }
  }

  private toTransportError(url: string, error: unknown): CrawlTransportError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.message.includes('timeout')) {
        return new CrawlTimeoutError(url, this.timeout, { code: error.code });
      }
      return new CrawlNetworkError(url, error, { code: error.code });
    }
    return new CrawlNetworkError(url, toError(error));
  }
}
