#!/usr/bin/env node
import fs from 'fs';
import { pathToFileURL } from 'url';
import type winston from 'winston';
import { loadConfig } from './config.js';
import { createLogger } from './utils/index.js';
import { ScanRequestSchema, type EngineConfig, type ScanRequestInput } from './schemas/index.js';
import { InvalidScanRequestError, describeError } from './errors.js';
import { PostgresScanStore } from './database/database.js';
import { LogNotifier } from './notifications/notifier.js';
import { ScanQueue } from './queue/scan-queue.js';
import { ScanOrchestrator, type ScanPipeline } from './scan-orchestrator.js';
import {
  BreachProbe,
  CtLogProbe,
  DnsProbe,
  HttpProbe,
  ProbeHttpClient,
  TcpProbe,
  TlsProbe,
  type HttpFetcher,
} from './probes/index.js';
import { AssetDiscoverer, loadWordlist } from './discovery/index.js';
import { EnrichmentCoordinator } from './enrichment/index.js';
import {
  CloudBucketChecker,
  DetectorBank,
  DnsMisconfigDetector,
  HeaderAnalyzer,
  OpenDirectoryDetector,
  SensitiveFileChecker,
  TlsInspector,
} from './detectors/index.js';
import { FeatureExtractor, RiskScorer } from './risk/index.js';
import type { ScanStore } from './database/scan-store.js';
import type { Notifier } from './notifications/notifier.js';
import type { AssetRecord, ScanRun } from './types/index.js';

export interface EngineDependencies {
  store?: ScanStore | undefined;
  notifier?: Notifier | undefined;
  pipeline?: Partial<ScanPipeline> | undefined;
  logger?: winston.Logger | undefined;
}

/** Builds the network-facing pipeline stages from configuration. */
export function buildPipeline(config: EngineConfig, logger: winston.Logger): ScanPipeline {
  const { probes } = config;

  const httpClient: HttpFetcher = new ProbeHttpClient({
    timeout: probes.http.timeout,
    maxConcurrent: probes.http.maxConcurrent,
    userAgent: probes.userAgent,
    proxyUrl: probes.proxyUrl,
  });
  const breachClient: HttpFetcher = new ProbeHttpClient({
    timeout: probes.breach.timeout,
    maxConcurrent: probes.breach.maxConcurrent,
    userAgent: probes.userAgent,
    proxyUrl: probes.proxyUrl,
  });
  const dns = new DnsProbe({ timeout: probes.dns.timeout, maxConcurrent: probes.dns.maxConcurrent });

  const discoverer = new AssetDiscoverer(dns, new CtLogProbe(httpClient), {
    wordlist: loadWordlist(),
    maxSubdomains: config.maxSubdomains,
    logger,
  });

  const coordinator = new EnrichmentCoordinator(
    {
      ports: new TcpProbe({ timeout: probes.ports.timeout, maxConcurrent: probes.ports.maxConcurrent }),
      tls: new TlsProbe({ timeout: probes.tls.timeout, maxConcurrent: probes.tls.maxConcurrent }),
      http: new HttpProbe(httpClient),
      dns,
      breach: new BreachProbe(breachClient, {
        apiUrl: config.breach.apiUrl,
        apiKey: config.breach.apiKey,
        timeout: probes.breach.timeout,
      }),
    },
    {
      // Whole-probe budgets: ports run in parallel, HTTP may fall back to plain HTTP
      timeouts: {
        ports: probes.ports.timeout * 3,
        tls: probes.tls.timeout,
        http: probes.http.timeout * 2,
        dns: probes.dns.timeout * 2,
        breach: probes.breach.timeout,
      },
      logger,
    }
  );

  const detectors = new DetectorBank(
    [
      new DnsMisconfigDetector(dns),
      new TlsInspector(),
      new HeaderAnalyzer(),
      new OpenDirectoryDetector(httpClient),
      new CloudBucketChecker(httpClient),
      new SensitiveFileChecker(httpClient),
    ],
    { timeout: config.detectorTimeout, logger }
  );

  return {
    discoverer,
    coordinator,
    detectors,
    extractor: new FeatureExtractor(),
    scorer: RiskScorer.fromArtifacts(config.modelDir, logger),
  };
}

export class AttackSurfaceEngine {
  private readonly config: EngineConfig;
  private readonly logger: winston.Logger;
  private readonly store: ScanStore;
  private readonly orchestrator: ScanOrchestrator;
  private readonly queue: ScanQueue;

  constructor(config: EngineConfig = loadConfig(), deps: EngineDependencies = {}) {
    this.config = config;
    this.logger = deps.logger ?? createLogger({
      name: 'engine',
      level: config.logLevel,
      logFile: config.logDir ? `${config.logDir}/engine.log` : undefined,
    });
    this.store = deps.store ?? new PostgresScanStore(config.database, this.logger);

    const overrides = deps.pipeline ?? {};
    let defaults: ScanPipeline | null = null;
    const fallback = (): ScanPipeline => (defaults ??= buildPipeline(config, this.logger));
    const pipeline: ScanPipeline = {
      discoverer: overrides.discoverer ?? fallback().discoverer,
      coordinator: overrides.coordinator ?? fallback().coordinator,
      detectors: overrides.detectors ?? fallback().detectors,
      extractor: overrides.extractor ?? fallback().extractor,
      scorer: overrides.scorer ?? fallback().scorer,
    };

    this.orchestrator = new ScanOrchestrator(this.store, pipeline, deps.notifier ?? new LogNotifier(this.logger), {
      maxConcurrentAssets: config.maxConcurrentAssets,
      discoveryAttempts: config.discoveryAttempts,
      logLevel: config.logLevel,
      logDir: config.logDir,
    });
    this.queue = new ScanQueue({ maxConcurrent: config.maxConcurrentScans, logger: this.logger });
  }

  async initialize(): Promise<void> {
    if (this.config.logDir) {
      await fs.promises.mkdir(this.config.logDir, { recursive: true });
    }
    await this.store.initialize();
    this.logger.info('Attack surface engine initialized');
  }

  /** Validates and records the request, queues the run and returns its id at once. */
  async submitScan(input: ScanRequestInput): Promise<string> {
    const parsed = ScanRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidScanRequestError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    if (this.queue.stopped) {
      throw new Error('Engine is stopped');
    }

    const run = await this.orchestrator.accept(parsed.data);
    this.queue.enqueue(run.id, async () => {
      await this.orchestrator.execute(run.id);
    });
    this.logger.info(`Accepted scan ${run.id} for ${run.domain}`);
    return run.id;
  }

  /** Always a well-formed run or null; store errors fall back to the in-process view. */
  async getScanStatus(scanId: string): Promise<ScanRun | null> {
    try {
      const stored = await this.store.getScanRun(scanId);
      return stored ?? this.orchestrator.snapshot(scanId);
    } catch (error) {
      this.logger.warn(`Reading scan ${scanId} from the store failed: ${describeError(error)}`);
      return this.orchestrator.snapshot(scanId);
    }
  }

  async waitForScan(scanId: string): Promise<ScanRun | null> {
    const settled = this.queue.whenSettled(scanId);
    if (settled) {
      await settled;
    }
    return this.orchestrator.snapshot(scanId) ?? this.getScanStatus(scanId);
  }

  takeResults(scanId: string): AssetRecord[] | null {
    return this.orchestrator.takeResults(scanId);
  }

  async stop(): Promise<void> {
    this.queue.stop();
    await this.queue.drain();
    await this.store.close();
    this.logger.info('Attack surface engine stopped');
  }
}

export interface CliArguments {
  domain: string;
  includeSubdomains: boolean;
  owner: string;
}

export function parseCliArgs(argv: readonly string[]): CliArguments {
  let domain: string | null = null;
  let includeSubdomains = false;
  let owner = 'cli';

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--subdomains') {
      includeSubdomains = true;
    } else if (arg === '--owner') {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new Error('--owner needs a value');
      }
      owner = value;
      i++;
    } else if (arg?.startsWith('--')) {
      throw new Error(`Unknown option ${arg}`);
    } else if (arg !== undefined) {
      if (domain !== null) {
        throw new Error(`Unexpected argument ${arg}`);
      }
      domain = arg;
    }
  }

  if (!domain) {
    throw new Error('Usage: surface-risk <domain> [--subdomains] [--owner <id>]');
  }
  return { domain, includeSubdomains, owner };
}

export function formatRiskTable(records: readonly AssetRecord[]): string[] {
  const width = Math.max(5, ...records.map((record) => record.asset.assetValue.length));
  const lines = [`${'ASSET'.padEnd(width)}  ${'TYPE'.padEnd(10)}  SCORE  LEVEL     FINDINGS`];

  for (const { asset, risk, findings, pipelineError } of records) {
    const score = risk ? String(risk.score).padStart(5) : '    -';
    const level = (risk?.level ?? (pipelineError ? 'error' : '-')).padEnd(8);
    lines.push(`${asset.assetValue.padEnd(width)}  ${asset.assetType.padEnd(10)}  ${score}  ${level}  ${findings.length}`);
  }

  return lines;
}

// CLI entry point
async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const engine = new AttackSurfaceEngine(loadConfig());

  await engine.initialize();
  const scanId = await engine.submitScan({
    domain: args.domain,
    includeSubdomains: args.includeSubdomains,
    requester: args.owner,
  });

  const run = await engine.waitForScan(scanId);
  const records = engine.takeResults(scanId) ?? [];
  await engine.stop();

  if (!run) {
    throw new Error(`Scan ${scanId} disappeared`);
  }

  console.log(`Scan ${run.id}: ${run.status} (${run.domain})`);
  console.log(`Assets: ${run.counts.assetsDiscovered} | High risk: ${run.counts.highRisk} | Critical: ${run.counts.critical}`);
  if (run.errorMessage) {
    console.log(`Error: ${run.errorMessage}`);
  }
  if (records.length > 0) {
    console.log('');
    for (const line of formatRiskTable(records)) {
      console.log(line);
    }
  }

  process.exitCode = run.status === 'completed' ? 0 : 1;
}

// Run if this is the main module
const entryPoint = process.argv[1];
const isMainModule = entryPoint !== undefined && fs.existsSync(entryPoint)
  && import.meta.url === pathToFileURL(fs.realpathSync(entryPoint)).href;
if (isMainModule) {
  main().catch((error) => {
    console.error('Fatal error:', describeError(error));
    process.exit(1);
  });
}

export { ScanOrchestrator } from './scan-orchestrator.js';
export { ScanQueue } from './queue/scan-queue.js';
export { PostgresScanStore } from './database/database.js';
export type { ScanStore } from './database/scan-store.js';
export { LogNotifier } from './notifications/notifier.js';
export type { Notifier, CriticalAssetSummary } from './notifications/notifier.js';
export { loadConfig } from './config.js';
export * from './errors.js';
export type * from './types/index.js';
