// Probe adapter types

export type ProbeName = 'ports' | 'tls' | 'http' | 'dns' | 'breach';

export type ProbeFailureKind = 'timeout' | 'unavailable' | 'not_applicable';

export interface ProbeSuccess<T> {
  success: true;
  data: T;
  durationMs: number;
}

export interface ProbeFailure {
  success: false;
  failure: ProbeFailureKind;
  error: string;
  durationMs: number;
}

/**
 * Outcome of one bounded network operation. A failure carries no data at all:
 * consumers must treat it as "signal absent", never as a negative result.
 */
export type ProbeResult<T> = ProbeSuccess<T> | ProbeFailure;

export type PortState = 'open' | 'closed' | 'filtered' | 'timeout';

export interface PortScanResult {
  port: number;
  state: PortState;
  responseTimeMs: number;
  banner: string | null;
}

export interface DetectedService {
  port: number;
  serviceName: string;
  serviceVersion: string | null;
  confidence: number;
  rawBanner: string | null;
}

export interface ServiceSignature {
  name: string;
  patterns: RegExp[];
  ports: number[];
  versionExtractor?: RegExp;
}

export interface PortProbeData {
  openPorts: number[];
  services: DetectedService[];
}

export interface TcpProbeOptions {
  timeout?: number | undefined;
  bannerTimeout?: number | undefined;
  maxConcurrent?: number | undefined;
}

export interface HttpClientOptions {
  timeout?: number | undefined;
  userAgent?: string | undefined;
  proxyUrl?: string | undefined;
  maxConcurrent?: number | undefined;
  maxContentLength?: number | undefined;
}

export interface HttpRequestOptions {
  method?: 'GET' | 'HEAD' | undefined;
  timeout?: number | undefined;
  maxContentLength?: number | undefined;
  followRedirects?: boolean | undefined;
  headers?: Record<string, string> | undefined;
}

export type HttpResult = HttpSuccessResult | HttpErrorResult;

export interface HttpSuccessResult {
  success: true;
  status: number;
  data: string;
  headers: Record<string, string>;
  url: string;
  finalUrl: string;
  timestamp: string;
  /** True if the body was cut at maxContentLength */
  truncated: boolean;
}

export interface HttpErrorResult {
  success: false;
  error: string;
  code: string | null;
  url: string;
  timestamp: string;
}
