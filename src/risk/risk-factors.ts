import { EXPIRY_WARNING_DAYS } from '../detectors/tls-inspector.js';
import type { FeatureVector } from '../types/index.js';

/** Named contributors behind a score, in a fixed order. */
export function riskFactorsOf(features: FeatureVector): string[] {
  const factors: string[] = [];

  if (features.has_ssh_open) factors.push('open_port_22');
  if (features.has_rdp_open) factors.push('open_port_3389_rdp');
  if (features.has_database_ports_open) factors.push('exposed_database');
  if (features.open_ports_count > 5) factors.push('many_open_ports');
  if (features.ssl_days_until_expiry < 0) {
    factors.push('expired_ssl_certificate');
  } else if (features.ssl_days_until_expiry < EXPIRY_WARNING_DAYS) {
    factors.push('ssl_certificate_expiring');
  }
  if (features.ssl_cert_is_self_signed) factors.push('self_signed_certificate');
  if (features.outdated_software_count > 0) factors.push('outdated_software');
  if (features.breach_history_count > 0) factors.push('breach_history');
  if (features.http_security_headers_score < 100) factors.push('missing_security_headers');
  if (features.dns_misconfig_count > 0) factors.push('dns_misconfiguration');

  return factors;
}
