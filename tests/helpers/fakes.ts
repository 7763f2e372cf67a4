import type { HttpFetcher } from '../../src/probes/http-client.js';
import type { DnsLookup } from '../../src/probes/dns-probe.js';
import type {
  DnsRecords,
  EnrichedAsset,
  HttpErrorResult,
  HttpInfo,
  HttpRequestOptions,
  HttpResult,
  HttpSuccessResult,
  ProbeFailure,
  ProbeResult,
  TlsInfo,
} from '../../src/types/index.js';

export function ok<T>(data: T): ProbeResult<T> {
  return { success: true, data, durationMs: 1 };
}

export function unavailable(error = 'connection refused'): ProbeFailure {
  return { success: false, failure: 'unavailable', error, durationMs: 1 };
}

export function httpOk(
  url: string,
  body: string,
  headers: Record<string, string> = {},
  status = 200
): HttpSuccessResult {
  return {
    success: true,
    status,
    data: body,
    headers,
    url,
    finalUrl: url,
    timestamp: '2026-01-01T00:00:00.000Z',
    truncated: false,
  };
}

export function httpError(url: string, error = 'connect ECONNREFUSED', code: string | null = 'ECONNREFUSED'): HttpErrorResult {
  return { success: false, error, code, url, timestamp: '2026-01-01T00:00:00.000Z' };
}

export interface RecordedRequest {
  url: string;
  options: HttpRequestOptions;
}

/** Serves canned results by exact URL; anything unrouted is a 404. */
export class FakeHttpFetcher implements HttpFetcher {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, HttpResult>();

  on(url: string, result: HttpResult): this {
    this.routes.set(url, result);
    return this;
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
    this.requests.push({ url, options });
    return this.routes.get(url) ?? httpOk(url, 'Not Found', { 'content-type': 'text/plain' }, 404);
  }

  get(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
    return this.request(url, { ...options, method: 'GET' });
  }

  head(url: string, options: HttpRequestOptions = {}): Promise<HttpResult> {
    return this.request(url, { ...options, method: 'HEAD' });
  }

  get requestedUrls(): string[] {
    return this.requests.map((request) => request.url);
  }
}

/** In-memory zone: hostnames to addresses and hostnames to records. */
export class FakeDns implements DnsLookup {
  readonly addresses = new Map<string, string[]>();
  readonly records = new Map<string, DnsRecords>();
  readonly failing = new Set<string>();
  readonly resolved: string[] = [];

  address(host: string, ...ips: string[]): this {
    this.addresses.set(host, ips);
    return this;
  }

  zone(host: string, records: DnsRecords): this {
    this.records.set(host, records);
    return this;
  }

  async resolveAddresses(host: string): Promise<string[]> {
    this.resolved.push(host);
    if (this.failing.has(host)) {
      throw new Error(`SERVFAIL ${host}`);
    }
    return this.addresses.get(host) ?? [];
  }

  async lookupRecords(host: string): Promise<DnsRecords> {
    if (this.failing.has(host)) {
      throw new Error(`SERVFAIL ${host}`);
    }
    return this.records.get(host) ?? {};
  }
}

export const ALL_HEADERS: HttpInfo['securityHeaders'] = {
  'strict-transport-security': 'max-age=31536000; includeSubDomains',
  'content-security-policy': "default-src 'self'",
  'x-frame-options': 'DENY',
  'x-content-type-options': 'nosniff',
  'referrer-policy': 'no-referrer',
  'permissions-policy': 'camera=()',
};

export function httpInfo(overrides: Partial<HttpInfo> = {}): HttpInfo {
  return {
    url: 'https://example.com/',
    scheme: 'https',
    statusCode: 200,
    serverHeader: null,
    poweredByHeader: null,
    generator: null,
    securityHeaders: { ...ALL_HEADERS },
    ...overrides,
  };
}

export function tlsInfo(overrides: Partial<TlsInfo> = {}): TlsInfo {
  return {
    issuer: 'CN=Test CA, O=Test',
    subject: 'CN=example.com',
    notAfter: '2027-01-01T00:00:00.000Z',
    daysUntilExpiry: 200,
    selfSigned: false,
    valid: true,
    protocol: 'TLSv1.3',
    subjectAltNames: ['example.com'],
    ...overrides,
  };
}

/** An enriched asset where every probe failed, with optional overrides. */
export function enrichedAsset(overrides: Partial<EnrichedAsset> = {}): EnrichedAsset {
  return {
    assetValue: 'example.com',
    assetType: 'domain',
    parentDomain: 'example.com',
    discoveredVia: 'scan_request',
    openPorts: unavailable(),
    ipAddresses: [],
    dnsRecords: unavailable(),
    tlsInfo: unavailable(),
    httpInfo: unavailable(),
    breachCount: unavailable(),
    technologies: [],
    enrichedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}
