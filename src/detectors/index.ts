export { DetectorBank } from './detector-bank.js';
export type { DetectorBankOptions } from './detector-bank.js';
export { DnsMisconfigDetector, takeoverProviderOf } from './dns-misconfig-detector.js';
export { TlsInspector, EXPIRY_WARNING_DAYS } from './tls-inspector.js';
export { HeaderAnalyzer, missingHeaderSeverity, weakHeaderReason } from './header-analyzer.js';
export { OpenDirectoryDetector } from './open-directory-detector.js';
export type { PathDetectorOptions } from './open-directory-detector.js';
export { SensitiveFileChecker } from './sensitive-file-checker.js';
export { CloudBucketChecker, bucketNameCandidates, azureAccountCandidates, storageCandidates } from './cloud-bucket-checker.js';
export { ResponseClassifier, toBaseline } from './response-classifier.js';
export type { BaselineResponse, PathResponse } from './response-classifier.js';
export { SENSITIVE_FILE_PATHS, DIRECTORY_LISTING_PATHS, isSensitiveFileName, generateBaselinePath } from './path-profiles.js';
