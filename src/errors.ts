// Error taxonomy for the scan pipeline. Probe- and detector-level errors never
// leave their own boundary; discovery, persistence and scoring configuration
// errors are fatal to a run.

export class ProbeTimeoutError extends Error {
  readonly probe: string;
  readonly timeoutMs: number;

  constructor(probe: string, timeoutMs: number) {
    super(`${probe} probe timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    this.probe = probe;
    this.timeoutMs = timeoutMs;
  }
}

export class ProbeUnavailableError extends Error {
  readonly probe: string;

  constructor(probe: string, message: string) {
    super(`${probe} probe unavailable: ${message}`);
    this.name = 'ProbeUnavailableError';
    this.probe = probe;
  }
}

export class DetectorSkippedError extends Error {
  readonly detector: string;

  constructor(detector: string, reason: string) {
    super(`${detector} skipped: ${reason}`);
    this.name = 'DetectorSkippedError';
    this.detector = detector;
  }
}

export class AssetPipelineError extends Error {
  readonly assetValue: string;

  constructor(assetValue: string, message: string) {
    super(`Pipeline failed for ${assetValue}: ${message}`);
    this.name = 'AssetPipelineError';
    this.assetValue = assetValue;
  }
}

export class DiscoveryError extends Error {
  constructor(domain: string, message: string) {
    super(`Discovery failed for ${domain}: ${message}`);
    this.name = 'DiscoveryError';
  }
}

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(`Persistence failed during ${operation}: ${message}`);
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ModelArtifactError extends Error {
  constructor(message: string) {
    super(`Model artifacts unusable: ${message}`);
    this.name = 'ModelArtifactError';
  }
}

export class ScoringConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoringConfigurationError';
  }
}

export class InvalidScanRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidScanRequestError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
