import { SECURITY_HEADER_CHECKLIST } from '../probes/security-headers.js';
import { DATABASE_PORTS, RDP_PORT, SSH_PORT } from '../probes/port-profiles.js';
import { countOutdatedSoftware } from '../enrichment/technology-detector.js';
import { FEATURE_NAMES } from '../types/index.js';
import type { AssetType, EnrichedAsset, FeatureName, FeatureVector, Finding, HttpInfo } from '../types/index.js';

/** ssl_days_until_expiry when there is no certificate to look at. */
export const SSL_EXPIRY_SENTINEL = 9999;

const BASE_EXPOSURE: Record<AssetType, number> = {
  domain: 1,
  subdomain: 2,
  ip_address: 3,
};

export function exposureTypeScore(assetType: AssetType, openPortsCount: number): number {
  let score = BASE_EXPOSURE[assetType];
  if (openPortsCount > 10) {
    score += 2;
  } else if (openPortsCount > 5) {
    score += 1;
  }
  return Math.min(score, 5);
}

/** Percentage of checklist headers present; 0 when there was no HTTP response. */
export function securityHeadersScore(http: HttpInfo | null): number {
  if (!http) return 0;
  const present = SECURITY_HEADER_CHECKLIST.filter((header) => http.securityHeaders[header.name] !== null).length;
  return Math.round((present / SECURITY_HEADER_CHECKLIST.length) * 100);
}

/**
 * The one place where an absent signal becomes a number. Every feature is
 * always defined: no certificate means the expiry sentinel and not
 * self-signed, unknown breach history means 0.
 */
export function extractFeatures(asset: EnrichedAsset, findings: readonly Finding[]): FeatureVector {
  const openPorts = asset.openPorts.success ? asset.openPorts.data : [];
  const tls = asset.tlsInfo.success ? asset.tlsInfo.data : null;
  const http = asset.httpInfo.success ? asset.httpInfo.data : null;

  return {
    open_ports_count: openPorts.length,
    has_ssh_open: openPorts.includes(SSH_PORT) ? 1 : 0,
    has_rdp_open: openPorts.includes(RDP_PORT) ? 1 : 0,
    has_database_ports_open: openPorts.some((port) => DATABASE_PORTS.includes(port)) ? 1 : 0,
    ssl_days_until_expiry: tls ? tls.daysUntilExpiry : SSL_EXPIRY_SENTINEL,
    ssl_cert_is_self_signed: tls?.selfSigned ? 1 : 0,
    outdated_software_count: countOutdatedSoftware(asset.technologies),
    breach_history_count: asset.breachCount.success ? asset.breachCount.data : 0,
    http_security_headers_score: securityHeadersScore(http),
    exposure_type_score: exposureTypeScore(asset.assetType, openPorts.length),
    dns_misconfig_count: findings.filter((finding) => finding.category === 'dns').length,
  };
}

export function toOrderedVector(features: FeatureVector, order: readonly FeatureName[] = FEATURE_NAMES): number[] {
  return order.map((name) => features[name]);
}

export class FeatureExtractor {
  extract(asset: EnrichedAsset, findings: readonly Finding[]): FeatureVector {
    return extractFeatures(asset, findings);
  }
}
