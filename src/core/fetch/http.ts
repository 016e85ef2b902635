// HTTP client with per-request timeout and redirect following

import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../config/constants.js';
import { ErrorCode, ScrapeError, errorMessage } from '../errors.js';

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpResponse {
  url: string;
  status: number;
  contentType: string;
  body: Buffer;
}

export interface HttpGetOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface HttpClientOptions {
  userAgent?: string;
  timeout?: number;
  fetchImpl?: FetchImpl;
}

export class HttpClient {
  private userAgent: string;
  private timeout: number;
  private fetchImpl: FetchImpl;

  constructor(options?: HttpClientOptions) {
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    this.timeout = options?.timeout ?? DEFAULT_TIMEOUT;
    this.fetchImpl = options?.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Fetches a URL. Transport failures, timeouts and non-2xx statuses all
   * reject with a ScrapeError; nothing is retried.
   */
  async get(url: string, options?: HttpGetOptions): Promise<HttpResponse> {
    if (options?.signal?.aborted) {
      throw new ScrapeError(ErrorCode.ABORTED, `Request cancelled: ${url}`);
    }

    const timeout = options?.timeoutMs ?? this.timeout;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onAbort = () => controller.abort();
    options?.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new ScrapeError(
          ErrorCode.TRANSPORT_ERROR,
          `HTTP ${response.status}: ${response.statusText}`,
          undefined,
          { url, status: response.status }
        );
      }

      const body = Buffer.from(await response.arrayBuffer());
      return {
        url: response.url || url,
        status: response.status,
        contentType: response.headers.get('Content-Type') ?? 'application/octet-stream',
        body,
      };
    } catch (error) {
      if (error instanceof ScrapeError) {
        throw error;
      }
      if (timedOut) {
        throw new ScrapeError(ErrorCode.TIMEOUT, `Timed out after ${timeout}ms`, undefined, { url });
      }
      if (options?.signal?.aborted) {
        throw new ScrapeError(ErrorCode.ABORTED, `Request cancelled: ${url}`);
      }
      throw new ScrapeError(ErrorCode.TRANSPORT_ERROR, errorMessage(error), undefined, { url });
    } finally {
      clearTimeout(timeoutId);
      options?.signal?.removeEventListener('abort', onAbort);
    }
  }

  async getText(url: string, options?: HttpGetOptions): Promise<string> {
    const response = await this.get(url, options);
    return response.body.toString('utf-8');
  }
}
