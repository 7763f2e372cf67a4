// Detector finding types

import type { EnrichedAsset } from './asset.js';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type FindingCategory =
  | 'dns'
  | 'tls'
  | 'http_headers'
  | 'open_directory'
  | 'cloud_storage'
  | 'sensitive_file';

export interface Finding {
  detectorName: string;
  category: FindingCategory;
  severity: Severity;
  description: string;
  remediation: string;
  evidence: string | null;
}

export interface Detector {
  readonly name: string;
  detect(asset: EnrichedAsset): Promise<Finding[]>;
}
