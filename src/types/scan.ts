// Scan run types

export type ScanStatus = 'pending' | 'running' | 'completed' | 'failed';

export type ScanPhase = 'queued' | 'discovery' | 'enrichment' | 'analysis' | 'persistence' | 'done';

export interface ScanRequest {
  domain: string;
  includeSubdomains: boolean;
  requester: string;
}

export interface ScanCounts {
  assetsDiscovered: number;
  highRisk: number;
  critical: number;
}

export interface ScanRun {
  id: string;
  domain: string;
  includeSubdomains: boolean;
  requester: string;
  status: ScanStatus;
  progress: number;
  currentPhase: ScanPhase;
  counts: ScanCounts;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  errorMessage: string | null;
}

export type ScanRunUpdate = Partial<Omit<ScanRun, 'id' | 'domain' | 'requester' | 'includeSubdomains' | 'createdAt'>>;
