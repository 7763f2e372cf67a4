import { EXPIRY_WARNING_DAYS } from '../detectors/tls-inspector.js';
import type { FeatureVector } from '../types/index.js';

/**
 * Hand-set weighted sum over the model's feature vector, used when the model
 * artifacts cannot be loaded. Unclamped; the caller clamps to 0-100.
 */
export function ruleBasedPoints(features: FeatureVector): number {
  let points = 0;

  points += Math.min(features.open_ports_count * 3, 30);
  points += features.has_ssh_open * 15;
  points += features.has_rdp_open * 25;
  points += features.has_database_ports_open * 30;

  if (features.ssl_days_until_expiry < 0) {
    points += 35;
  } else if (features.ssl_days_until_expiry < EXPIRY_WARNING_DAYS) {
    points += 20;
  }

  points += features.ssl_cert_is_self_signed * 10;
  points += features.outdated_software_count * 8;
  points += features.breach_history_count * 5;
  points += (100 - features.http_security_headers_score) / 5;
  points += features.exposure_type_score * 5;
  points += features.dns_misconfig_count * 4;

  return points;
}
