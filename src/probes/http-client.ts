import axios, { type AxiosRequestConfig, type RawAxiosResponseHeaders, type AxiosResponseHeaders } from 'axios';
import http from 'http';
import https from 'https';
import { SocksProxyAgent } from 'socks-proxy-agent';
import type { Readable } from 'stream';
import type winston from 'winston';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { createLogger } from '../utils/logger.js';
import { delay } from '../utils/delay.js';
import { describeError } from '../errors.js';
import type {
  HttpClientOptions,
  HttpRequestOptions,
  HttpResult,
  HttpSuccessResult,
  HttpErrorResult,
} from '../types/index.js';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 5;

/** Everything that talks HTTP goes through this, so tests can swap in a fake. */
export interface HttpFetcher {
  request(url: string, options?: HttpRequestOptions): Promise<HttpResult>;
  get(url: string, options?: HttpRequestOptions): Promise<HttpResult>;
  head(url: string, options?: HttpRequestOptions): Promise<HttpResult>;
}

export class ProbeHttpClient implements HttpFetcher {
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly maxContentLength: number;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;
  private readonly limiter: ConcurrencyLimiter;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: http.Agent;
  private readonly logger: winston.Logger;

  constructor(options: HttpClientOptions & { retryAttempts?: number; retryDelay?: number } = {}) {
    this.timeout = options.timeout ?? 10000;
    this.userAgent = options.userAgent ?? 'Mozilla/5.0 (compatible; surface-risk/0.1)';
    this.maxContentLength = options.maxContentLength ?? 256 * 1024;
    this.retryAttempts = options.retryAttempts ?? 1;
    this.retryDelay = options.retryDelay ?? 1000;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent ?? 30);
    this.logger = createLogger({ name: 'http-client' });

    if (options.proxyUrl) {
      const agent = new SocksProxyAgent(options.proxyUrl);
      this.httpAgent = agent;
      this.httpsAgent = agent;
    } else {
      this.httpAgent = new http.Agent({ keepAlive: true });
      // Certificate problems are the TLS probe's business, not a reason to miss headers
      this.httpsAgent = new https.Agent({ keepAlive: true, rejectUnauthorized: false });
    }
  }

  /**
   * Read a stream up to maxBytes, then stop. Returns the content read and whether it was truncated.
   */
  private async readStreamWithLimit(stream: Readable, maxBytes: number): Promise<{ data: string; truncated: boolean }> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalBytes = 0;
      let truncated = false;

      const finish = (): void => {
        resolve({ data: Buffer.concat(chunks).toString('utf8'), truncated });
      };

      stream.on('data', (chunk: Buffer) => {
        const remaining = maxBytes - totalBytes;
        if (remaining <= 0) {
          truncated = true;
          stream.destroy();
          return;
        }

        if (chunk.length > remaining) {
          chunks.push(chunk.subarray(0, remaining));
          totalBytes = maxBytes;
          truncated = true;
          stream.destroy();
        } else {
          chunks.push(chunk);
          totalBytes += chunk.length;
        }
      });

      stream.on('end', finish);
      // destroyed after truncation
      stream.on('close', finish);
      stream.on('error', reject);
    });
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
    return this.limiter.run(() => this.requestWithRetry(url, options));
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async head(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
    return this.request(url, { ...options, method: 'HEAD' });
  }

  private async requestWithRetry(url: string, options: HttpRequestOptions): Promise<HttpResult> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        return await this.followChain(url, options);
      } catch (error) {
        lastError = error;
        this.logger.debug(`Request to ${url} failed (attempt ${attempt}/${this.retryAttempts}): ${describeError(error)}`);

        if (attempt < this.retryAttempts) {
          await delay(this.retryDelay * attempt);
        }
      }
    }

    const result: HttpErrorResult = {
      success: false,
      error: describeError(lastError),
      code: axios.isAxiosError(lastError) ? (lastError.code ?? null) : null,
      url,
      timestamp: new Date().toISOString(),
    };

    return result;
  }

  private async followChain(url: string, options: HttpRequestOptions): Promise<HttpSuccessResult> {
    const followRedirects = options.followRedirects ?? true;
    let currentUrl = url;

    for (let hop = 0; ; hop++) {
      const result = await this.fetchOnce(url, currentUrl, options);
      const location = result.headers['location'];

      if (!followRedirects || !REDIRECT_STATUSES.has(result.status) || !location || hop >= MAX_REDIRECTS) {
        return result;
      }

      currentUrl = new URL(location, currentUrl).toString();
    }
  }

  /**
   * One hop. The axios timeout only covers an idle socket, so the hop also gets a hard
   * deadline that aborts the request or destroys a body that is still trickling in.
   */
  private async fetchOnce(originalUrl: string, currentUrl: string, options: HttpRequestOptions): Promise<HttpSuccessResult> {
    const maxContentLength = options.maxContentLength ?? this.maxContentLength;
    const timeout = options.timeout ?? this.timeout;
    const controller = new AbortController();
    let body: Readable | null = null;

    const deadline = setTimeout(() => {
      const reason = new Error(`Request to ${currentUrl} exceeded ${timeout}ms`);
      controller.abort(reason);
      body?.destroy(reason);
    }, timeout);

    const config: AxiosRequestConfig = {
      url: currentUrl,
      method: options.method ?? 'GET',
      timeout,
      signal: controller.signal,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: 'stream',
      maxRedirects: 0,
      // Accept all HTTP status codes - 4xx/5xx are signal too
      validateStatus: () => true,
      headers: {
        'User-Agent': this.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        ...options.headers,
      },
    };

    try {
      const response = await axios.request<Readable>(config);
      body = response.data;
      const { data, truncated } = await this.readStreamWithLimit(response.data, maxContentLength);

      if (truncated) {
        this.logger.debug(`Content truncated at ${maxContentLength} bytes for ${currentUrl}`);
      }

      return {
        success: true,
        status: response.status,
        data,
        headers: normalizeHeaders(response.headers),
        url: originalUrl,
        finalUrl: currentUrl,
        timestamp: new Date().toISOString(),
        truncated,
      };
    } finally {
      clearTimeout(deadline);
    }
  }
}

/** Lower-cased header names, multi-valued headers joined. */
export function normalizeHeaders(headers: RawAxiosResponseHeaders | AxiosResponseHeaders): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }

  return normalized;
}
