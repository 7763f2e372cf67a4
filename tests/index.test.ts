import { describe, it, expect, vi } from 'vitest';
import { AttackSurfaceEngine, buildPipeline, formatRiskTable, parseCliArgs } from '../src/index.js';
import { loadConfig } from '../src/config.js';
import { createLogger } from '../src/utils/logger.js';
import { FeatureExtractor } from '../src/risk/feature-extractor.js';
import { InvalidScanRequestError } from '../src/errors.js';
import type { ScanPipeline } from '../src/scan-orchestrator.js';
import type { Asset, AssetRecord } from '../src/types/index.js';
import { InMemoryScanStore } from './helpers/memory-store.js';
import { enrichedAsset } from './helpers/fakes.js';

const logger = createLogger({ name: 'test', level: 'silent' });
const config = loadConfig({ LOG_LEVEL: 'silent', MAX_CONCURRENT_SCANS: '1' });

function stubPipeline(): ScanPipeline {
  return {
    discoverer: {
      discover: async (domain: string): Promise<Asset[]> => [
        { assetValue: domain, assetType: 'domain', parentDomain: domain, discoveredVia: 'scan_request' },
      ],
    },
    coordinator: { enrich: async (asset) => enrichedAsset({ ...asset }) },
    detectors: { run: async () => [] },
    extractor: new FeatureExtractor(),
    scorer: { score: () => ({ score: 12, level: 'low', confidence: 0.12, method: 'rule_based', riskFactors: [] }) },
  };
}

function engineWith(store: InMemoryScanStore): AttackSurfaceEngine {
  return new AttackSurfaceEngine(config, {
    store,
    logger,
    pipeline: stubPipeline(),
    notifier: { notifyHighRisk: vi.fn(async () => undefined) },
  });
}

describe('AttackSurfaceEngine', () => {
  it('validates requests before accepting them', async () => {
    const store = new InMemoryScanStore();
    const engine = engineWith(store);

    await expect(engine.submitScan({ domain: 'not a domain', requester: 'team-a' })).rejects.toBeInstanceOf(
      InvalidScanRequestError
    );
    await expect(engine.submitScan({ domain: 'localhost', requester: 'team-a' })).rejects.toThrow(
      'domain must be a fully qualified hostname'
    );
    expect(store.runs.size).toBe(0);
  });

  it('runs a submitted scan to completion in the background', async () => {
    const store = new InMemoryScanStore();
    const engine = engineWith(store);
    await engine.initialize();

    const scanId = await engine.submitScan({ domain: 'Example.COM.', requester: 'team-a' });
    const run = await engine.waitForScan(scanId);

    expect(store.initialized).toBe(true);
    expect(run).toMatchObject({ id: scanId, domain: 'example.com', includeSubdomains: false, status: 'completed' });
    expect(engine.takeResults(scanId)?.map((record) => record.risk?.score)).toEqual([12]);
    await expect(engine.getScanStatus(scanId)).resolves.toMatchObject({ status: 'completed', progress: 100 });
  });

  it('serves status from memory when the store cannot be read', async () => {
    const store = new InMemoryScanStore();
    const engine = engineWith(store);
    const scanId = await engine.submitScan({ domain: 'example.com', requester: 'team-a' });
    await engine.waitForScan(scanId);

    store.failing.add('getScanRun');

    await expect(engine.getScanStatus(scanId)).resolves.toMatchObject({ id: scanId, status: 'completed' });
    await expect(engine.getScanStatus('unknown')).resolves.toBeNull();
  });

  it('closes the store on stop and refuses new scans', async () => {
    const store = new InMemoryScanStore();
    const engine = engineWith(store);

    await engine.stop();

    expect(store.closed).toBe(true);
    await expect(engine.submitScan({ domain: 'example.com', requester: 'team-a' })).rejects.toThrow('Engine is stopped');
  });
});

describe('buildPipeline', () => {
  it('wires every stage without touching the network', () => {
    const pipeline = buildPipeline(config, logger);
    expect(pipeline.scorer.score).toBeTypeOf('function');
    expect(pipeline.discoverer.discover).toBeTypeOf('function');
  });
});

describe('parseCliArgs', () => {
  it('reads the domain and options', () => {
    expect(parseCliArgs(['example.com', '--subdomains', '--owner', 'team-a'])).toEqual({
      domain: 'example.com',
      includeSubdomains: true,
      owner: 'team-a',
    });
    expect(parseCliArgs(['example.com'])).toEqual({ domain: 'example.com', includeSubdomains: false, owner: 'cli' });
  });

  it('rejects missing or unexpected arguments', () => {
    expect(() => parseCliArgs([])).toThrow('Usage: surface-risk <domain> [--subdomains] [--owner <id>]');
    expect(() => parseCliArgs(['example.com', '--owner'])).toThrow('--owner needs a value');
    expect(() => parseCliArgs(['example.com', '--fast'])).toThrow('Unknown option --fast');
    expect(() => parseCliArgs(['example.com', 'example.org'])).toThrow('Unexpected argument example.org');
  });
});

describe('formatRiskTable', () => {
  it('prints one aligned row per asset', () => {
    const finding = { detectorName: 'x', category: 'dns' as const, severity: 'low' as const, description: 'd', remediation: 'r', evidence: null };
    const records: AssetRecord[] = [
      {
        asset: { assetValue: 'example.com', assetType: 'domain', parentDomain: 'example.com', discoveredVia: 'scan_request' },
        enrichment: null,
        findings: [finding, finding],
        features: null,
        risk: { score: 10, level: 'low', confidence: 0.1, method: 'model', riskFactors: [] },
        pipelineError: null,
      },
      {
        asset: { assetValue: '192.0.2.1', assetType: 'ip_address', parentDomain: 'example.com', discoveredVia: 'dns_resolution' },
        enrichment: null,
        findings: [],
        features: null,
        risk: null,
        pipelineError: 'Pipeline failed for 192.0.2.1: boom',
      },
    ];

    expect(formatRiskTable(records)).toEqual([
      'ASSET        TYPE        SCORE  LEVEL     FINDINGS',
      'example.com  domain         10  low       2',
      '192.0.2.1    ip_address      -  error     0',
    ]);
  });
});
