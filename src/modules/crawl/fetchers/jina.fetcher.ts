/**
 * Jina Reader API Fetcher
 * Fetch collaborator for the crawl orchestrator: asks the Jina Reader API for
 * a page's markdown plus a summary of its links and images
 */

import { env } from '../../../config/env';
import { FetchedPage, PageFetcher } from '../../../lib/orchestration/orchestrator.types';

export interface JinaFetcherOptions {
  apiKey?: string;
  baseUrl?: string;
  timeout?: number;
  userAgent?: string;
}

/**
 * Raised when the reader API cannot produce a usable result for a URL
 */
export class JinaFetchError extends Error {
  constructor(
    public readonly url: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(`Failed to fetch ${url}: ${message}`);
    this.name = 'JinaFetchError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The links/images summary comes back either as `{ text: url }` or as a list
 * of `[text, url]` pairs / plain URLs depending on API version
 */
export function extractUrlList(summary: unknown): string[] {
  const urls: string[] = [];

  if (Array.isArray(summary)) {
    for (const entry of summary) {
      if (typeof entry === 'string') {
        urls.push(entry);
      } else if (Array.isArray(entry) && typeof entry[1] === 'string') {
        urls.push(entry[1]);
      }
    }
  } else if (isRecord(summary)) {
    for (const value of Object.values(summary)) {
      if (typeof value === 'string') {
        urls.push(value);
      }
    }
  }

  return urls;
}

/**
 * Map the reader API JSON body onto a fetched page
 */
export function parseJinaResponse(url: string, body: unknown): FetchedPage {
  if (!isRecord(body) || !isRecord(body.data)) {
    throw new JinaFetchError(url, 'response has no data object');
  }

  const data = body.data;
  const content = typeof data.content === 'string' ? data.content : '';
  if (!content.trim()) {
    throw new JinaFetchError(url, 'no content returned');
  }

  return {
    content,
    links: extractUrlList(data.links),
    images: extractUrlList(data.images),
    title: typeof data.title === 'string' && data.title.trim() ? data.title.trim() : undefined,
  };
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    };
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class JinaFetcher implements PageFetcher {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(options: JinaFetcherOptions = {}) {
    this.apiKey = options.apiKey ?? env.JINA_API_KEY;
    this.baseUrl = options.baseUrl ?? env.JINA_READER_URL;
    this.timeout = options.timeout ?? env.JINA_TIMEOUT;
    this.userAgent = options.userAgent ?? env.USER_AGENT;

    if (!this.apiKey) {
      console.warn('[JinaFetcher] JINA_API_KEY not set, requests will be rate limited');
    }
  }

  async fetch(url: string): Promise<FetchedPage> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': this.userAgent,
      'X-No-Cache': 'true',
      'X-With-Links-Summary': 'true',
      'X-With-Images-Summary': 'true',
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    // The timer covers the body as well as the headers
    let body: unknown;
    try {
      const response = await fetch(this.baseUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify({ url, options: 'Markdown' }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new JinaFetchError(url, `reader API returned ${response.status}`, response.status);
      }

      body = await this.readJson(url, response, controller.signal);
    } catch (error) {
      if (error instanceof JinaFetchError) {
        throw error;
      }
      if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
        throw new JinaFetchError(url, `timed out after ${this.timeout}ms`);
      }
      throw new JinaFetchError(url, error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }

    const page = parseJinaResponse(url, body);
    console.log(
      `[JinaFetcher] Fetched ${url} in ${Date.now() - startTime}ms - ${page.content.length} chars, ${page.links.length} link(s)`
    );
    return page;
  }

  /**
   * Parse the JSON body, giving up as soon as the request is aborted
   */
  private async readJson(url: string, response: Response, signal: AbortSignal): Promise<unknown> {
    try {
      return await untilAborted(response.json(), signal);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new JinaFetchError(url, 'reader API returned invalid JSON', response.status);
    }
  }
}
