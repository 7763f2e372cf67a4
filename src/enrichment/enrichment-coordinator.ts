import type winston from 'winston';
import { withTimeout } from '../utils/timeout.js';
import { createLogger } from '../utils/logger.js';
import { ProbeTimeoutError, describeError } from '../errors.js';
import { CANDIDATE_PORTS } from '../probes/port-profiles.js';
import { collectTechnologies } from './technology-detector.js';
import type { PortProber } from '../probes/tcp-probe.js';
import type { TlsProber } from '../probes/tls-probe.js';
import type { HttpProber } from '../probes/http-probe.js';
import type { DnsLookup } from '../probes/dns-probe.js';
import type { BreachLookup } from '../probes/breach-probe.js';
import type {
  Asset,
  DnsRecords,
  EnrichedAsset,
  PortProbeData,
  ProbeFailure,
  ProbeName,
  ProbeResult,
} from '../types/index.js';

export interface EnrichmentProbes {
  ports: PortProber;
  tls: TlsProber;
  http: HttpProber;
  dns: DnsLookup;
  breach: BreachLookup;
}

export interface EnrichmentOptions {
  timeouts: Record<ProbeName, number>;
  candidatePorts?: readonly number[] | undefined;
  logger?: winston.Logger | undefined;
  now?: (() => Date) | undefined;
}

export function notApplicable(reason: string): ProbeFailure {
  return { success: false, failure: 'not_applicable', error: reason, durationMs: 0 };
}

export function dataOf<T>(result: ProbeResult<T>): T | null {
  return result.success ? result.data : null;
}

/**
 * Fans the independent probes out for one asset and merges whatever comes back
 * within each probe's budget. No probe error escapes: each becomes a failure
 * value on the matching field.
 */
export class EnrichmentCoordinator {
  private readonly probes: EnrichmentProbes;
  private readonly timeouts: Record<ProbeName, number>;
  private readonly candidatePorts: readonly number[];
  private readonly logger: winston.Logger;
  private readonly now: () => Date;

  constructor(probes: EnrichmentProbes, options: EnrichmentOptions) {
    this.probes = probes;
    this.timeouts = options.timeouts;
    this.candidatePorts = options.candidatePorts ?? CANDIDATE_PORTS;
    this.logger = options.logger ?? createLogger({ name: 'enrichment' });
    this.now = options.now ?? (() => new Date());
  }

  async enrich(asset: Asset): Promise<EnrichedAsset> {
    const host = asset.assetValue;
    const isIp = asset.assetType === 'ip_address';

    const [ports, tlsInfo, httpInfo, dnsRecords, breachCount] = await Promise.all([
      this.runProbe('ports', host, () => this.probes.ports.scanPorts(host, this.candidatePorts)),
      this.runProbe('tls', host, () => this.probes.tls.inspect(host)),
      this.runProbe('http', host, () => this.probes.http.inspect(host)),
      isIp
        ? Promise.resolve<ProbeResult<DnsRecords>>(notApplicable('DNS records are not looked up for IP assets'))
        : this.runProbe('dns', host, () => this.probes.dns.lookupRecords(host)),
      this.runProbe('breach', host, () => this.probes.breach.countBreaches(asset.parentDomain)),
    ]);

    const openPorts: ProbeResult<number[]> = ports.success
      ? { success: true, data: ports.data.openPorts, durationMs: ports.durationMs }
      : ports;

    return {
      ...asset,
      openPorts,
      ipAddresses: this.ipAddressesOf(asset, dnsRecords),
      dnsRecords,
      tlsInfo,
      httpInfo,
      breachCount,
      technologies: collectTechnologies(dataOf(httpInfo), ports.success ? ports.data.services : []),
      enrichedAt: this.now(),
    };
  }

  private ipAddressesOf(asset: Asset, dnsRecords: ProbeResult<DnsRecords>): string[] {
    if (asset.assetType === 'ip_address') return [asset.assetValue];
    if (!dnsRecords.success) return [];
    return [...(dnsRecords.data.A ?? []), ...(dnsRecords.data.AAAA ?? [])];
  }

  private async runProbe<T>(name: ProbeName, host: string, work: () => Promise<T>): Promise<ProbeResult<T>> {
    const startTime = Date.now();
    try {
      const data = await withTimeout(work(), this.timeouts[name], name);
      return { success: true, data, durationMs: Date.now() - startTime };
    } catch (error) {
      const timedOut = error instanceof ProbeTimeoutError;
      this.logger.debug(`${name} probe on ${host} ${timedOut ? 'timed out' : 'failed'}: ${describeError(error)}`);
      return {
        success: false,
        failure: timedOut ? 'timeout' : 'unavailable',
        error: describeError(error),
        durationMs: Date.now() - startTime,
      };
    }
  }
}
