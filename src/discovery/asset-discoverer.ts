import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { describeError } from '../errors.js';
import type { DnsLookup } from '../probes/dns-probe.js';
import type { CertificateTransparencySource } from '../probes/ct-log-probe.js';
import type { Asset, AssetType, DiscoverySource } from '../types/index.js';

export interface AssetDiscovererOptions {
  wordlist: readonly string[];
  maxSubdomains: number;
  logger?: winston.Logger | undefined;
  /** Source of the random label used for the wildcard check. */
  randomLabel?: (() => string) | undefined;
}

export interface SubdomainCandidates {
  names: string[];
  bruteForced: Set<string>;
}

function defaultRandomLabel(): string {
  return `wc-${Math.random().toString(36).substring(2, 12)}`;
}

export class AssetDiscoverer {
  private readonly dns: DnsLookup;
  private readonly ctSource: CertificateTransparencySource | null;
  private readonly wordlist: readonly string[];
  private readonly maxSubdomains: number;
  private readonly logger: winston.Logger;
  private readonly randomLabel: () => string;

  constructor(dns: DnsLookup, ctSource: CertificateTransparencySource | null, options: AssetDiscovererOptions) {
    this.dns = dns;
    this.ctSource = ctSource;
    this.wordlist = options.wordlist;
    this.maxSubdomains = options.maxSubdomains;
    this.logger = options.logger ?? createLogger({ name: 'discovery' });
    this.randomLabel = options.randomLabel ?? defaultRandomLabel;
  }

  /**
   * The root domain, optionally its subdomains, and every address any of them
   * resolves to. Unique by (assetValue, assetType).
   */
  async discover(domain: string, includeSubdomains: boolean): Promise<Asset[]> {
    const assets = new Map<string, Asset>();
    const add = (assetValue: string, assetType: AssetType, discoveredVia: DiscoverySource): void => {
      const key = `${assetType}:${assetValue}`;
      if (!assets.has(key)) {
        assets.set(key, { assetValue, assetType, parentDomain: domain, discoveredVia });
      }
    };

    add(domain, 'domain', 'scan_request');

    const hostnames = [domain];
    if (includeSubdomains) {
      const candidates = await this.findSubdomains(domain);
      for (const name of candidates.names) {
        add(name, 'subdomain', candidates.bruteForced.has(name) ? 'dns_bruteforce' : 'certificate_transparency');
        hostnames.push(name);
      }
    }

    const resolved = await Promise.all(hostnames.map((host) => this.safeResolve(host)));
    for (const addresses of resolved) {
      for (const address of addresses) {
        add(address, 'ip_address', 'dns_resolution');
      }
    }

    this.logger.info(`Discovered ${assets.size} assets for ${domain}`);
    return [...assets.values()];
  }

  async findSubdomains(domain: string): Promise<SubdomainCandidates> {
    const [bruteForced, fromCt] = await Promise.all([
      this.bruteForce(domain),
      this.queryCertificateTransparency(domain),
    ]);

    const names = [...new Set([...bruteForced, ...fromCt])].sort();
    if (names.length > this.maxSubdomains) {
      this.logger.info(`Capping ${names.length} subdomains of ${domain} at ${this.maxSubdomains}`);
    }

    return {
      names: names.slice(0, this.maxSubdomains),
      bruteForced: new Set(bruteForced),
    };
  }

  private async bruteForce(domain: string): Promise<string[]> {
    if (this.wordlist.length === 0) return [];

    // Under a wildcard record every label resolves; the list would be noise
    const probe = await this.safeResolve(`${this.randomLabel()}.${domain}`);
    if (probe.length > 0) {
      this.logger.info(`Wildcard DNS on ${domain}, skipping wordlist brute force`);
      return [];
    }

    const found = await Promise.all(
      this.wordlist.map(async (label) => {
        const host = `${label}.${domain}`;
        const addresses = await this.safeResolve(host);
        return addresses.length > 0 ? host : null;
      })
    );

    return found.filter((host): host is string => host !== null);
  }

  private async queryCertificateTransparency(domain: string): Promise<string[]> {
    if (!this.ctSource) return [];
    try {
      return await this.ctSource.findSubdomains(domain);
    } catch (error) {
      this.logger.warn(`Certificate transparency lookup for ${domain} failed: ${describeError(error)}`);
      return [];
    }
  }

  private async safeResolve(host: string): Promise<string[]> {
    try {
      return await this.dns.resolveAddresses(host);
    } catch (error) {
      this.logger.debug(`Resolution of ${host} failed: ${describeError(error)}`);
      return [];
    }
  }
}
