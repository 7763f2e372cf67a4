import { randomUUID } from 'crypto';
import type winston from 'winston';
import { ConcurrencyLimiter } from './utils/concurrency.js';
import { createScanLogger } from './utils/logger.js';
import {
  AssetPipelineError,
  DiscoveryError,
  PersistenceError,
  ScoringConfigurationError,
  describeError,
} from './errors.js';
import type { ScanStore } from './database/scan-store.js';
import type { CriticalAssetSummary, Notifier } from './notifications/notifier.js';
import type {
  Asset,
  AssetRecord,
  EnrichedAsset,
  FeatureVector,
  Finding,
  RiskAssessment,
  ScanCounts,
  ScanRequest,
  ScanRun,
  ScanRunUpdate,
} from './types/index.js';

// Narrow views of the pipeline stages, so tests can stand in for any of them
export interface ScanPipeline {
  discoverer: { discover(domain: string, includeSubdomains: boolean): Promise<Asset[]> };
  coordinator: { enrich(asset: Asset): Promise<EnrichedAsset> };
  detectors: { run(asset: EnrichedAsset): Promise<Finding[]> };
  extractor: { extract(asset: EnrichedAsset, findings: readonly Finding[]): FeatureVector };
  scorer: { score(features: FeatureVector): RiskAssessment };
}

export interface ScanOrchestratorOptions {
  maxConcurrentAssets: number;
  discoveryAttempts: number;
  logLevel?: string | undefined;
  logDir?: string | undefined;
  now?: (() => Date) | undefined;
}

const PROGRESS = {
  started: 5,
  discovered: 20,
  enriched: 80,
  analysed: 85,
  persisting: 90,
  done: 100,
} as const;

// Smallest per-asset progress change worth writing to the store
const PROGRESS_STEP = 5;

const ASSET_TYPE_ORDER: Record<Asset['assetType'], number> = { domain: 0, subdomain: 1, ip_address: 2 };

export function compareRecords(a: AssetRecord, b: AssetRecord): number {
  const byType = ASSET_TYPE_ORDER[a.asset.assetType] - ASSET_TYPE_ORDER[b.asset.assetType];
  if (byType !== 0) return byType;
  return a.asset.assetValue < b.asset.assetValue ? -1 : a.asset.assetValue > b.asset.assetValue ? 1 : 0;
}

export function countRisk(records: readonly AssetRecord[]): Omit<ScanCounts, 'assetsDiscovered'> {
  let highRisk = 0;
  let critical = 0;
  for (const { risk } of records) {
    if (risk?.level === 'high' || risk?.level === 'critical') highRisk++;
    if (risk?.level === 'critical') critical++;
  }
  return { highRisk, critical };
}

/**
 * Drives one scan run through pending -> running -> completed | failed.
 * Asset-level trouble is absorbed into that asset's record; only discovery,
 * persistence and scoring configuration failures end the run as failed.
 */
export class ScanOrchestrator {
  private readonly store: ScanStore;
  private readonly pipeline: ScanPipeline;
  private readonly notifier: Notifier;
  private readonly maxConcurrentAssets: number;
  private readonly discoveryAttempts: number;
  private readonly logLevel: string | undefined;
  private readonly logDir: string | undefined;
  private readonly now: () => Date;
  private readonly snapshots = new Map<string, ScanRun>();
  private readonly results = new Map<string, AssetRecord[]>();

  constructor(store: ScanStore, pipeline: ScanPipeline, notifier: Notifier, options: ScanOrchestratorOptions) {
    this.store = store;
    this.pipeline = pipeline;
    this.notifier = notifier;
    this.maxConcurrentAssets = options.maxConcurrentAssets;
    this.discoveryAttempts = Math.max(1, options.discoveryAttempts);
    this.logLevel = options.logLevel;
    this.logDir = options.logDir;
    this.now = options.now ?? (() => new Date());
  }

  /** Records a new pending run. */
  async accept(request: ScanRequest, id: string = randomUUID()): Promise<ScanRun> {
    const run: ScanRun = {
      id,
      domain: request.domain,
      includeSubdomains: request.includeSubdomains,
      requester: request.requester,
      status: 'pending',
      progress: 0,
      currentPhase: 'queued',
      counts: { assetsDiscovered: 0, highRisk: 0, critical: 0 },
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      errorMessage: null,
    };

    await this.store.createScanRun(run);
    this.snapshots.set(id, run);
    return { ...run };
  }

  /** Last state this process saw for a run. */
  snapshot(id: string): ScanRun | null {
    const run = this.snapshots.get(id);
    return run ? { ...run, counts: { ...run.counts } } : null;
  }

  /** Asset records of a finished run, handed over once. */
  takeResults(id: string): AssetRecord[] | null {
    const records = this.results.get(id) ?? null;
    this.results.delete(id);
    return records;
  }

  /** Runs an accepted run to a terminal state; pipeline errors end up on the run, not thrown. */
  async execute(scanId: string): Promise<ScanRun> {
    const run = this.snapshots.get(scanId);
    if (!run) {
      throw new Error(`Scan ${scanId} was never accepted`);
    }
    if (run.status !== 'pending') {
      throw new Error(`Scan ${scanId} is already ${run.status}`);
    }

    const logger = createScanLogger(scanId, { level: this.logLevel, logDir: this.logDir });
    const records: AssetRecord[] = [];

    try {
      await this.transition(run, {
        status: 'running',
        startedAt: this.now(),
        currentPhase: 'discovery',
        progress: PROGRESS.started,
      });
      logger.info(`Scan started for ${run.domain} (subdomains: ${run.includeSubdomains ? 'yes' : 'no'})`);

      const assets = await this.discover(run, logger);
      await this.transition(run, {
        currentPhase: 'enrichment',
        progress: PROGRESS.discovered,
        counts: { ...run.counts, assetsDiscovered: assets.length },
      });

      await this.processAssets(run, assets, records, logger);

      records.sort(compareRecords);
      await this.transition(run, {
        currentPhase: 'analysis',
        progress: PROGRESS.analysed,
        counts: { assetsDiscovered: assets.length, ...countRisk(records) },
      });

      await this.transition(run, { currentPhase: 'persistence', progress: PROGRESS.persisting });
      await this.persist(run, records);

      await this.transition(run, {
        status: 'completed',
        currentPhase: 'done',
        progress: PROGRESS.done,
        completedAt: this.now(),
      });
      logger.info(`Scan completed: ${records.length} assets, ${run.counts.highRisk} high risk, ${run.counts.critical} critical`);

      this.notifyCritical(run, records, logger);
    } catch (error) {
      await this.fail(run, records, error, logger);
    } finally {
      this.results.set(scanId, records);
      logger.close();
    }

    return this.snapshot(scanId) ?? run;
  }

  private async discover(run: ScanRun, logger: winston.Logger): Promise<Asset[]> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.discoveryAttempts; attempt++) {
      try {
        return await this.pipeline.discoverer.discover(run.domain, run.includeSubdomains);
      } catch (error) {
        lastError = error;
        logger.warn(`Discovery attempt ${attempt}/${this.discoveryAttempts} failed`, { error: describeError(error) });
      }
    }

    throw new DiscoveryError(run.domain, describeError(lastError));
  }

  private async processAssets(run: ScanRun, assets: Asset[], records: AssetRecord[], logger: winston.Logger): Promise<void> {
    const limiter = new ConcurrencyLimiter(this.maxConcurrentAssets);
    let finished = 0;
    let reported: number = PROGRESS.discovered;

    const settled = await Promise.allSettled(
      assets.map((asset) =>
        limiter.run(async () => {
          const record = await this.processAsset(asset, logger);
          records.push(record);
          finished++;
          const progress = PROGRESS.discovered +
            Math.floor(((PROGRESS.enriched - PROGRESS.discovered) * finished) / assets.length);
          run.progress = progress;
          if (progress - reported >= PROGRESS_STEP || finished === assets.length) {
            reported = progress;
            await this.reportProgress(run, progress, logger);
          }
        })
      )
    );

    // Anything still rejected here is fatal to the run
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
    }
  }

  private async processAsset(asset: Asset, logger: winston.Logger): Promise<AssetRecord> {
    try {
      const enrichment = await this.pipeline.coordinator.enrich(asset);
      const findings = await this.pipeline.detectors.run(enrichment);
      const features = this.pipeline.extractor.extract(enrichment, findings);
      const risk = this.pipeline.scorer.score(features);

      logger.debug(`Scored ${risk.score} (${risk.level}) with ${findings.length} findings`, { asset: asset.assetValue });
      return { asset, enrichment, findings, features, risk, pipelineError: null };
    } catch (error) {
      if (error instanceof ScoringConfigurationError) throw error;

      const failure = new AssetPipelineError(asset.assetValue, describeError(error));
      logger.warn('Asset pipeline failed; recording it without a risk assessment', {
        asset: asset.assetValue,
        error: failure.message,
      });
      return { asset, enrichment: null, findings: [], features: null, risk: null, pipelineError: failure.message };
    }
  }

  private async persist(run: ScanRun, records: readonly AssetRecord[]): Promise<void> {
    await this.store.saveAssets(run.id, run.requester, records);
  }

  private async fail(run: ScanRun, records: AssetRecord[], error: unknown, logger: winston.Logger): Promise<void> {
    const message = describeError(error);
    logger.error('Scan failed', { error: message });

    // Whatever was fully built before the failure is still worth keeping
    if (records.length > 0 && !(error instanceof PersistenceError)) {
      try {
        records.sort(compareRecords);
        await this.persist(run, records);
        logger.info(`Saved ${records.length} assets completed before the failure`);
      } catch (persistError) {
        logger.error('Could not save partial results', { error: describeError(persistError) });
      }
    }

    const update: ScanRunUpdate = {
      status: 'failed',
      completedAt: this.now(),
      errorMessage: message,
      counts: { ...run.counts, ...countRisk(records) },
    };
    Object.assign(run, update);

    try {
      await this.store.updateScanRun(run.id, update);
    } catch (storeError) {
      logger.error('Could not record the failed state', { error: describeError(storeError) });
    }
  }

  /** Progress inside a phase is informational; a failed write is logged, not fatal. */
  private async reportProgress(run: ScanRun, progress: number, logger: winston.Logger): Promise<void> {
    try {
      await this.store.updateScanRun(run.id, { progress });
    } catch (error) {
      logger.warn('Could not record scan progress', { progress, error: describeError(error) });
    }
  }

  private async transition(run: ScanRun, update: ScanRunUpdate): Promise<void> {
    Object.assign(run, update);
    await this.store.updateScanRun(run.id, update);
  }

  private notifyCritical(run: ScanRun, records: readonly AssetRecord[], logger: winston.Logger): void {
    const critical: CriticalAssetSummary[] = [];
    for (const { asset, risk } of records) {
      if (risk?.level === 'critical') {
        critical.push({
          assetValue: asset.assetValue,
          assetType: asset.assetType,
          score: risk.score,
          riskFactors: risk.riskFactors,
        });
      }
    }
    if (critical.length === 0) return;

    const warn = (error: unknown): void => {
      logger.warn('High-risk notification failed', { error: describeError(error) });
    };

    // The run is already completed; nothing the notifier does may change that
    let delivery: Promise<void>;
    try {
      delivery = this.notifier.notifyHighRisk(run.requester, run.id, critical);
    } catch (error) {
      warn(error);
      return;
    }
    delivery.catch(warn);
  }
}
