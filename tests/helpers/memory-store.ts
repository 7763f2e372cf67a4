import { PersistenceError } from '../../src/errors.js';
import type { ScanStore } from '../../src/database/scan-store.js';
import type { AssetRecord, ScanRun, ScanRunUpdate } from '../../src/types/index.js';

type StoreOperation = 'createScanRun' | 'updateScanRun' | 'saveAssets' | 'getScanRun';

export interface SavedBatch {
  scanId: string;
  owner: string;
  records: AssetRecord[];
}

/** ScanStore kept in a Map; any operation can be told to fail. */
export class InMemoryScanStore implements ScanStore {
  readonly runs = new Map<string, ScanRun>();
  readonly updates: Array<{ id: string; update: ScanRunUpdate }> = [];
  readonly saved: SavedBatch[] = [];
  readonly failing = new Set<StoreOperation>();
  saveAttempts = 0;
  initialized = false;
  closed = false;

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async createScanRun(run: ScanRun): Promise<void> {
    this.check('createScanRun');
    this.runs.set(run.id, { ...run, counts: { ...run.counts } });
  }

  async updateScanRun(id: string, update: ScanRunUpdate): Promise<void> {
    this.check('updateScanRun');
    const run = this.runs.get(id);
    if (!run) {
      throw new PersistenceError('updateScanRun', `scan run ${id} does not exist`);
    }
    this.updates.push({ id, update: { ...update } });
    this.runs.set(id, { ...run, ...update, counts: update.counts ? { ...update.counts } : run.counts });
  }

  async saveAssets(scanId: string, owner: string, records: readonly AssetRecord[]): Promise<number> {
    this.saveAttempts++;
    this.check('saveAssets');
    this.saved.push({ scanId, owner, records: [...records] });
    return records.length;
  }

  async getScanRun(id: string): Promise<ScanRun | null> {
    this.check('getScanRun');
    const run = this.runs.get(id);
    return run ? { ...run, counts: { ...run.counts } } : null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private check(operation: StoreOperation): void {
    if (this.failing.has(operation)) {
      throw new PersistenceError(operation, 'connection refused');
    }
  }
}
