// Probe types
export type {
  ProbeName,
  ProbeFailureKind,
  ProbeSuccess,
  ProbeFailure,
  ProbeResult,
  PortState,
  PortScanResult,
  DetectedService,
  ServiceSignature,
  PortProbeData,
  TcpProbeOptions,
  HttpClientOptions,
  HttpRequestOptions,
  HttpResult,
  HttpSuccessResult,
  HttpErrorResult,
} from './probe.js';

// Asset types
export type {
  AssetType,
  DiscoverySource,
  Asset,
  DnsRecordType,
  DnsRecords,
  TlsInfo,
  SecurityHeaderName,
  HttpInfo,
  EnrichedAsset,
  AssetRecord,
} from './asset.js';

// Finding types
export type {
  Severity,
  FindingCategory,
  Finding,
  Detector,
} from './finding.js';

// Risk types
export { FEATURE_NAMES } from './risk.js';
export type {
  RiskLevel,
  ScoringMethod,
  FeatureName,
  FeatureVector,
  RiskAssessment,
  FittedScaler,
  FittedClassifier,
  ScoringContext,
} from './risk.js';

// Scan types
export type {
  ScanStatus,
  ScanPhase,
  ScanRequest,
  ScanCounts,
  ScanRun,
  ScanRunUpdate,
} from './scan.js';
