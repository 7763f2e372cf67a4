// Risk scoring types

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export type ScoringMethod = 'model' | 'rule_based';

export const FEATURE_NAMES = [
  'open_ports_count',
  'has_ssh_open',
  'has_rdp_open',
  'has_database_ports_open',
  'ssl_days_until_expiry',
  'ssl_cert_is_self_signed',
  'outdated_software_count',
  'breach_history_count',
  'http_security_headers_score',
  'exposure_type_score',
  'dns_misconfig_count',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = Record<FeatureName, number>;

export interface RiskAssessment {
  score: number;
  level: RiskLevel;
  confidence: number;
  method: ScoringMethod;
  riskFactors: string[];
}

export interface FittedScaler {
  version: string;
  mean: readonly number[];
  scale: readonly number[];
}

export interface FittedClassifier {
  version: string;
  weights: readonly number[];
  bias: number;
}

/** Loaded once per process, shared read-only by every scoring call. */
export interface ScoringContext {
  readonly featureNames: readonly FeatureName[];
  readonly scaler: Readonly<FittedScaler>;
  readonly classifier: Readonly<FittedClassifier>;
}
