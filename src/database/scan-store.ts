import type { AssetRecord, ScanRun, ScanRunUpdate } from '../types/index.js';

/**
 * Where scan runs and their results live. Every call is a fallible remote
 * call; callers get no implicit retry.
 */
export interface ScanStore {
  initialize(): Promise<void>;
  createScanRun(run: ScanRun): Promise<void>;
  updateScanRun(id: string, update: ScanRunUpdate): Promise<void>;
  /** Upserts fully formed records; resolves to the number saved. */
  saveAssets(scanId: string, owner: string, records: readonly AssetRecord[]): Promise<number>;
  getScanRun(id: string): Promise<ScanRun | null>;
  close(): Promise<void>;
}
