import * as cheerio from 'cheerio';
import { SECURITY_HEADER_CHECKLIST, emptySecurityHeaders } from './security-headers.js';
import { hostForUrl } from '../utils/domain.js';
import { ProbeUnavailableError } from '../errors.js';
import type { HttpFetcher } from './http-client.js';
import type { HttpInfo, HttpSuccessResult } from '../types/index.js';

export interface HttpProber {
  inspect(host: string): Promise<HttpInfo>;
}

export function extractGenerator(html: string): string | null {
  if (!html.includes('<')) return null;
  const $ = cheerio.load(html);
  const content = $('meta[name="generator" i]').first().attr('content');
  return content ? content.trim() : null;
}

export function toHttpInfo(result: HttpSuccessResult): HttpInfo {
  const securityHeaders = emptySecurityHeaders();
  for (const header of SECURITY_HEADER_CHECKLIST) {
    securityHeaders[header.name] = result.headers[header.name] ?? null;
  }

  const contentType = result.headers['content-type'] ?? '';

  return {
    url: result.finalUrl,
    scheme: result.finalUrl.startsWith('https:') ? 'https' : 'http',
    statusCode: result.status,
    serverHeader: result.headers['server'] ?? null,
    poweredByHeader: result.headers['x-powered-by'] ?? null,
    generator: contentType.includes('html') ? extractGenerator(result.data) : null,
    securityHeaders,
  };
}

/** Fetches the root page over HTTPS, falling back to plain HTTP. */
export class HttpProbe implements HttpProber {
  private readonly client: HttpFetcher;

  constructor(client: HttpFetcher) {
    this.client = client;
  }

  async inspect(host: string): Promise<HttpInfo> {
    const urlHost = hostForUrl(host);

    const secure = await this.client.get(`https://${urlHost}/`);
    if (secure.success) {
      return toHttpInfo(secure);
    }

    const plain = await this.client.get(`http://${urlHost}/`);
    if (plain.success) {
      return toHttpInfo(plain);
    }

    throw new ProbeUnavailableError('http', `https: ${secure.error}; http: ${plain.error}`);
  }
}
