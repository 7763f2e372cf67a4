// Config schemas
export {
  DatabaseConfigSchema,
  ProbeConfigSchema,
  BreachServiceConfigSchema,
  EngineConfigSchema,
  type DatabaseConfig,
  type ProbeConfig,
  type BreachServiceConfig,
  type EngineConfig,
  type EngineConfigInput,
} from './config.js';

// Request schemas
export { ScanRequestSchema, type ScanRequestInput } from './request.js';

// External service payloads
export {
  CtLogEntrySchema,
  CtLogResponseSchema,
  BreachListSchema,
  type CtLogEntry,
} from './external.js';

// Model artifact schemas
export {
  ScalerArtifactSchema,
  ClassifierArtifactSchema,
  type ScalerArtifact,
  type ClassifierArtifact,
} from './model.js';

// Database schemas
export {
  ScanStatusSchema,
  ScanPhaseSchema,
  ScanRunRowSchema,
  type ScanRunRow,
} from './database.js';
