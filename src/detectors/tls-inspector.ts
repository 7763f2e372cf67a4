import { DetectorSkippedError } from '../errors.js';
import type { Detector, EnrichedAsset, Finding } from '../types/index.js';

export const EXPIRY_WARNING_DAYS = 30;

const LEGACY_PROTOCOLS = new Set(['SSLv2', 'SSLv3', 'TLSv1', 'TLSv1.1']);

export class TlsInspector implements Detector {
  readonly name = 'tls_inspector';

  async detect(asset: EnrichedAsset): Promise<Finding[]> {
    if (!asset.tlsInfo.success) {
      throw new DetectorSkippedError(this.name, 'no certificate');
    }

    const tls = asset.tlsInfo.data;
    const findings: Finding[] = [];
    const host = asset.assetValue;

    if (tls.daysUntilExpiry < 0) {
      findings.push({
        detectorName: this.name,
        category: 'tls',
        severity: 'critical',
        description: `TLS certificate for ${host} expired on ${tls.notAfter.substring(0, 10)}`,
        remediation: 'Renew the certificate and automate renewal.',
        evidence: `notAfter=${tls.notAfter}`,
      });
    } else if (tls.daysUntilExpiry < EXPIRY_WARNING_DAYS) {
      findings.push({
        detectorName: this.name,
        category: 'tls',
        severity: 'medium',
        description: `TLS certificate for ${host} expires in ${tls.daysUntilExpiry} days`,
        remediation: 'Renew the certificate before it expires.',
        evidence: `notAfter=${tls.notAfter}`,
      });
    }

    if (tls.selfSigned) {
      findings.push({
        detectorName: this.name,
        category: 'tls',
        severity: 'high',
        description: `TLS certificate for ${host} is self-signed`,
        remediation: 'Replace it with a certificate issued by a trusted CA.',
        evidence: `issuer=${tls.issuer}`,
      });
    }

    if (tls.protocol && LEGACY_PROTOCOLS.has(tls.protocol)) {
      findings.push({
        detectorName: this.name,
        category: 'tls',
        severity: 'high',
        description: `${host} negotiated legacy protocol ${tls.protocol}`,
        remediation: 'Disable SSLv3, TLS 1.0 and TLS 1.1; require TLS 1.2 or later.',
        evidence: tls.protocol,
      });
    }

    return findings;
  }
}
