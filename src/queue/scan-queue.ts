import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { describeError } from '../errors.js';

export type ScanJob = () => Promise<void>;

export interface ScanQueueOptions {
  maxConcurrent: number;
  logger?: winston.Logger | undefined;
}

interface QueueEntry {
  scanId: string;
  job: ScanJob;
  settled: Promise<void>;
  resolve: () => void;
}

/**
 * In-process job queue for scan runs. Each accepted run executes at most
 * once; its handle is the scan id.
 */
export class ScanQueue {
  private readonly maxConcurrent: number;
  private readonly logger: winston.Logger;
  private readonly pending: QueueEntry[] = [];
  private readonly handles = new Map<string, QueueEntry>();
  private running = 0;
  private isStopped = false;

  constructor(options: ScanQueueOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${options.maxConcurrent}`);
    }
    this.maxConcurrent = options.maxConcurrent;
    this.logger = options.logger ?? createLogger({ name: 'scan-queue' });
  }

  get activeCount(): number {
    return this.running;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get stopped(): boolean {
    return this.isStopped;
  }

  /** Accepts a job and returns at once; the job starts when a slot frees up. */
  enqueue(scanId: string, job: ScanJob): void {
    if (this.isStopped) {
      throw new Error('Scan queue is stopped');
    }
    if (this.handles.has(scanId)) {
      throw new Error(`Scan ${scanId} is already queued`);
    }

    let resolve: () => void = () => undefined;
    const settled = new Promise<void>((done) => {
      resolve = done;
    });

    const entry: QueueEntry = { scanId, job, settled, resolve };
    this.handles.set(scanId, entry);
    this.pending.push(entry);
    this.logger.debug(`Queued scan ${scanId} (${this.pending.length} waiting, ${this.running} running)`);
    this.pump();
  }

  /** Resolves when the job has finished, whatever its outcome; null for an unknown or finished id. */
  whenSettled(scanId: string): Promise<void> | null {
    return this.handles.get(scanId)?.settled ?? null;
  }

  async drain(): Promise<void> {
    while (this.handles.size > 0) {
      await Promise.all([...this.handles.values()].map((entry) => entry.settled));
    }
  }

  /** Refuses new submissions; jobs already accepted still run. */
  stop(): void {
    this.isStopped = true;
  }

  private pump(): void {
    while (this.running < this.maxConcurrent) {
      const entry = this.pending.shift();
      if (!entry) return;

      this.running++;
      this.execute(entry).catch((error) => {
        this.logger.error(`Scan queue bookkeeping failed for ${entry.scanId}: ${describeError(error)}`);
      });
    }
  }

  private async execute(entry: QueueEntry): Promise<void> {
    try {
      await entry.job();
    } catch (error) {
      this.logger.error(`Scan job ${entry.scanId} threw: ${describeError(error)}`);
    } finally {
      this.running--;
      this.handles.delete(entry.scanId);
      entry.resolve();
      this.pump();
    }
  }
}
