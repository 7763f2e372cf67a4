import { DetectorSkippedError } from '../errors.js';
import { SECURITY_HEADER_CHECKLIST } from '../probes/security-headers.js';
import type { Detector, EnrichedAsset, Finding, SecurityHeaderName, Severity } from '../types/index.js';

const ONE_YEAR_SECONDS = 31536000;

// Missing HSTS or CSP leaves downgrade and injection wide open
const ESCALATED_HEADERS = new Set<SecurityHeaderName>(['strict-transport-security', 'content-security-policy']);

export function missingHeaderSeverity(header: SecurityHeaderName): Severity {
  return ESCALATED_HEADERS.has(header) ? 'high' : 'medium';
}

/** Why a present header value is too weak, or null when it is fine. */
export function weakHeaderReason(header: SecurityHeaderName, value: string): string | null {
  const normalized = value.trim();

  switch (header) {
    case 'x-frame-options': {
      const upper = normalized.toUpperCase();
      return upper === 'DENY' || upper === 'SAMEORIGIN' ? null : `X-Frame-Options is "${normalized}", expected DENY or SAMEORIGIN`;
    }
    case 'x-content-type-options':
      return normalized.toLowerCase() === 'nosniff' ? null : `X-Content-Type-Options is "${normalized}", expected nosniff`;
    case 'strict-transport-security': {
      const match = normalized.match(/max-age\s*=\s*"?(\d+)"?/i);
      if (!match || !match[1]) return 'Strict-Transport-Security has no max-age';
      const maxAge = parseInt(match[1], 10);
      return maxAge < ONE_YEAR_SECONDS ? `Strict-Transport-Security max-age=${maxAge} is under one year` : null;
    }
    default:
      return null;
  }
}

export class HeaderAnalyzer implements Detector {
  readonly name = 'header_analyzer';

  async detect(asset: EnrichedAsset): Promise<Finding[]> {
    if (!asset.httpInfo.success) {
      throw new DetectorSkippedError(this.name, 'no HTTP response');
    }

    const { securityHeaders, url } = asset.httpInfo.data;
    const findings: Finding[] = [];

    for (const header of SECURITY_HEADER_CHECKLIST) {
      const value = securityHeaders[header.name];

      if (value === null) {
        findings.push({
          detectorName: this.name,
          category: 'http_headers',
          severity: missingHeaderSeverity(header.name),
          description: `Missing ${header.label} header on ${url}`,
          remediation: header.remediation,
          evidence: null,
        });
        continue;
      }

      const weakness = weakHeaderReason(header.name, value);
      if (weakness) {
        findings.push({
          detectorName: this.name,
          category: 'http_headers',
          severity: 'low',
          description: `${weakness} on ${url}`,
          remediation: header.remediation,
          evidence: `${header.label}: ${value}`,
        });
      }
    }

    return findings;
  }
}
