// Asset types

import type { ProbeResult } from './probe.js';
import type { Finding } from './finding.js';
import type { FeatureVector, RiskAssessment } from './risk.js';

export type AssetType = 'domain' | 'subdomain' | 'ip_address';

export type DiscoverySource =
  | 'scan_request'
  | 'dns_bruteforce'
  | 'certificate_transparency'
  | 'dns_resolution';

export interface Asset {
  assetValue: string;
  assetType: AssetType;
  parentDomain: string;
  discoveredVia: DiscoverySource;
}

export type DnsRecordType = 'A' | 'AAAA' | 'CNAME' | 'MX' | 'TXT' | 'NS' | 'DMARC';

export type DnsRecords = Partial<Record<DnsRecordType, string[]>>;

export interface TlsInfo {
  issuer: string;
  subject: string;
  notAfter: string;
  daysUntilExpiry: number;
  selfSigned: boolean;
  valid: boolean;
  protocol: string | null;
  subjectAltNames: string[];
}

export type SecurityHeaderName =
  | 'strict-transport-security'
  | 'content-security-policy'
  | 'x-frame-options'
  | 'x-content-type-options'
  | 'referrer-policy'
  | 'permissions-policy';

export interface HttpInfo {
  url: string;
  scheme: 'https' | 'http';
  statusCode: number;
  serverHeader: string | null;
  poweredByHeader: string | null;
  generator: string | null;
  /** Header value when present, null when missing */
  securityHeaders: Record<SecurityHeaderName, string | null>;
}

export interface EnrichedAsset extends Asset {
  openPorts: ProbeResult<number[]>;
  ipAddresses: string[];
  dnsRecords: ProbeResult<DnsRecords>;
  tlsInfo: ProbeResult<TlsInfo>;
  httpInfo: ProbeResult<HttpInfo>;
  breachCount: ProbeResult<number>;
  technologies: string[];
  enrichedAt: Date;
}

/** Fully formed record handed to the persistence collaborator. */
export interface AssetRecord {
  asset: Asset;
  enrichment: EnrichedAsset | null;
  findings: Finding[];
  features: FeatureVector | null;
  risk: RiskAssessment | null;
  pipelineError: string | null;
}
