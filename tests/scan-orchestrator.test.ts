import { describe, it, expect, vi } from 'vitest';
import { ScanOrchestrator, type ScanPipeline } from '../src/scan-orchestrator.js';
import { FeatureExtractor } from '../src/risk/feature-extractor.js';
import { ScoringConfigurationError } from '../src/errors.js';
import type { CriticalAssetSummary, Notifier } from '../src/notifications/notifier.js';
import type { Asset, FeatureVector, RiskAssessment, ScanRequest } from '../src/types/index.js';
import { InMemoryScanStore } from './helpers/memory-store.js';
import { enrichedAsset } from './helpers/fakes.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');

const REQUEST: ScanRequest = { domain: 'example.com', includeSubdomains: false, requester: 'team-a' };

const DOMAIN: Asset = { assetValue: 'example.com', assetType: 'domain', parentDomain: 'example.com', discoveredVia: 'scan_request' };
const IP: Asset = { assetValue: '192.0.2.1', assetType: 'ip_address', parentDomain: 'example.com', discoveredVia: 'dns_resolution' };

// Address assets score critical, everything else low
function assessmentFor(features: FeatureVector): RiskAssessment {
  return features.exposure_type_score === 3
    ? { score: 90, level: 'critical', confidence: 0.9, method: 'model', riskFactors: ['exposed_database'] }
    : { score: 10, level: 'low', confidence: 0.1, method: 'model', riskFactors: [] };
}

function pipeline(overrides: Partial<ScanPipeline> = {}): ScanPipeline {
  return {
    discoverer: { discover: async () => [DOMAIN, IP] },
    coordinator: { enrich: async (asset) => enrichedAsset({ ...asset }) },
    detectors: { run: async () => [] },
    extractor: new FeatureExtractor(),
    scorer: { score: assessmentFor },
    ...overrides,
  };
}

function quietNotifier() {
  return {
    notifyHighRisk: vi.fn(async (_owner: string, _scanId: string, _assets: readonly CriticalAssetSummary[]) => undefined),
  };
}

function setup(overrides: Partial<ScanPipeline> = {}, notifier: Notifier = quietNotifier()) {
  const store = new InMemoryScanStore();
  const orchestrator = new ScanOrchestrator(store, pipeline(overrides), notifier, {
    maxConcurrentAssets: 4,
    discoveryAttempts: 2,
    logLevel: 'silent',
    now: () => NOW,
  });
  return { store, orchestrator };
}

describe('ScanOrchestrator', () => {
  it('records a pending run on accept', async () => {
    const { store, orchestrator } = setup();

    const run = await orchestrator.accept(REQUEST, 'scan-1');

    expect(run).toMatchObject({ id: 'scan-1', status: 'pending', progress: 0, currentPhase: 'queued', createdAt: NOW });
    expect(store.runs.get('scan-1')?.status).toBe('pending');
    expect(orchestrator.snapshot('scan-1')?.status).toBe('pending');
  });

  it('walks a run through every phase to completed', async () => {
    const notifier = quietNotifier();
    const { store, orchestrator } = setup({}, notifier);
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(store.updates.map(({ update }) => [update.status, update.currentPhase, update.progress])).toEqual([
      ['running', 'discovery', 5],
      [undefined, 'enrichment', 20],
      [undefined, undefined, 50],
      [undefined, undefined, 80],
      [undefined, 'analysis', 85],
      [undefined, 'persistence', 90],
      ['completed', 'done', 100],
    ]);
    expect(run).toMatchObject({
      status: 'completed',
      progress: 100,
      currentPhase: 'done',
      counts: { assetsDiscovered: 2, highRisk: 1, critical: 1 },
      startedAt: NOW,
      completedAt: NOW,
      errorMessage: null,
    });
    expect(store.runs.get('scan-1')?.status).toBe('completed');

    expect(store.saved).toHaveLength(1);
    expect(store.saved[0]?.owner).toBe('team-a');
    expect(store.saved[0]?.records.map((record) => record.asset.assetValue)).toEqual(['example.com', '192.0.2.1']);

    expect(notifier.notifyHighRisk).toHaveBeenCalledWith('team-a', 'scan-1', [
      { assetValue: '192.0.2.1', assetType: 'ip_address', score: 90, riskFactors: ['exposed_database'] },
    ]);
  });

  it('hands results over once', async () => {
    const { orchestrator } = setup();
    await orchestrator.accept(REQUEST, 'scan-1');
    await orchestrator.execute('scan-1');

    expect(orchestrator.takeResults('scan-1')).toHaveLength(2);
    expect(orchestrator.takeResults('scan-1')).toBeNull();
  });

  it('runs each accepted scan at most once', async () => {
    const { orchestrator } = setup();
    await orchestrator.accept(REQUEST, 'scan-1');
    await orchestrator.execute('scan-1');

    await expect(orchestrator.execute('scan-1')).rejects.toThrow('Scan scan-1 is already completed');
    await expect(orchestrator.execute('missing')).rejects.toThrow('Scan missing was never accepted');
  });

  it('keeps a failed asset as a record without a risk assessment', async () => {
    const { store, orchestrator } = setup({
      coordinator: {
        enrich: async (asset) => {
          if (asset.assetType === 'ip_address') throw new Error('probe crashed');
          return enrichedAsset({ ...asset });
        },
      },
    });
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(run.status).toBe('completed');
    expect(run.counts).toEqual({ assetsDiscovered: 2, highRisk: 0, critical: 0 });
    const ipRecord = store.saved[0]?.records[1];
    expect(ipRecord).toEqual({
      asset: IP,
      enrichment: null,
      findings: [],
      features: null,
      risk: null,
      pipelineError: 'Pipeline failed for 192.0.2.1: probe crashed',
    });
  });

  it('retries discovery before giving up', async () => {
    const discover = vi.fn()
      .mockRejectedValueOnce(new Error('dns down'))
      .mockResolvedValueOnce([DOMAIN]);
    const { orchestrator } = setup({ discoverer: { discover } });
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(discover).toHaveBeenCalledTimes(2);
    expect(run.status).toBe('completed');
    expect(run.counts.assetsDiscovered).toBe(1);
  });

  it('fails the run when discovery keeps failing', async () => {
    const discover = vi.fn(async (): Promise<Asset[]> => {
      throw new Error('dns down');
    });
    const { store, orchestrator } = setup({ discoverer: { discover } });
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(discover).toHaveBeenCalledTimes(2);
    expect(run).toMatchObject({
      status: 'failed',
      errorMessage: 'Discovery failed for example.com: dns down',
      completedAt: NOW,
    });
    expect(store.runs.get('scan-1')?.status).toBe('failed');
    expect(store.saveAttempts).toBe(0);
  });

  it('fails on a scoring configuration error but keeps the records already built', async () => {
    const { store, orchestrator } = setup({
      scorer: {
        score: (features) => {
          if (features.exposure_type_score === 3) throw new ScoringConfigurationError('model mismatch');
          return assessmentFor(features);
        },
      },
    });
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe('model mismatch');
    expect(store.saved[0]?.records.map((record) => record.asset.assetValue)).toEqual(['example.com']);
  });

  it('fails without a second save when persistence itself fails', async () => {
    const { store, orchestrator } = setup();
    store.failing.add('saveAssets');
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(run.status).toBe('failed');
    expect(run.errorMessage).toBe('Persistence failed during saveAssets: connection refused');
    expect(store.saveAttempts).toBe(1);
    expect(store.runs.get('scan-1')?.status).toBe('failed');
  });

  it('completes even when the notification fails', async () => {
    const notifier: Notifier = {
      notifyHighRisk: async () => {
        throw new Error('mail relay down');
      },
    };
    const { orchestrator } = setup({}, notifier);
    await orchestrator.accept(REQUEST, 'scan-1');

    await expect(orchestrator.execute('scan-1')).resolves.toMatchObject({ status: 'completed' });
  });

  it('stays completed when the notifier throws before returning a promise', async () => {
    const notifier: Notifier = {
      notifyHighRisk: () => {
        throw new Error('mail client not configured');
      },
    };
    const { store, orchestrator } = setup({}, notifier);
    await orchestrator.accept(REQUEST, 'scan-1');

    const run = await orchestrator.execute('scan-1');

    expect(run.status).toBe('completed');
    expect(store.runs.get('scan-1')?.status).toBe('completed');
    expect(store.updates.filter(({ update }) => update.status !== undefined).map(({ update }) => update.status)).toEqual([
      'running',
      'completed',
    ]);
  });

  it('persists the same records whatever order the assets finish in', async () => {
    const delayed = (slow: Asset['assetType']): Partial<ScanPipeline> => ({
      coordinator: {
        enrich: async (asset) => {
          await new Promise((resolve) => setTimeout(resolve, asset.assetType === slow ? 20 : 0));
          return enrichedAsset({ ...asset });
        },
      },
    });

    const first = setup(delayed('domain'));
    const second = setup(delayed('ip_address'));
    await first.orchestrator.accept(REQUEST, 'scan-1');
    await second.orchestrator.accept(REQUEST, 'scan-1');
    await Promise.all([first.orchestrator.execute('scan-1'), second.orchestrator.execute('scan-1')]);

    const summary = (store: InMemoryScanStore) =>
      store.saved[0]?.records.map((record) => [record.asset.assetValue, record.risk?.score]);
    expect(summary(first.store)).toEqual(summary(second.store));
    expect(summary(first.store)).toEqual([['example.com', 10], ['192.0.2.1', 90]]);
  });
});
