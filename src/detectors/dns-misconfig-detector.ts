import { DetectorSkippedError } from '../errors.js';
import type { DnsLookup } from '../probes/dns-probe.js';
import type { Detector, DnsRecordType, EnrichedAsset, Finding } from '../types/index.js';

// CNAME target suffixes of services where an unclaimed name can be registered by anyone
const TAKEOVER_PROVIDERS: readonly string[] = [
  'github.io',
  'herokuapp.com',
  'azurewebsites.net',
  'cloudapp.net',
  'trafficmanager.net',
  's3.amazonaws.com',
  'amazonaws.com',
  'cloudfront.net',
  'tumblr.com',
  'wordpress.com',
  'ghost.io',
  'pantheonsite.io',
  'unbouncepages.com',
  'myshopify.com',
  'fastly.net',
  'netlify.app',
];

const DETECTOR_NAME = 'dns_misconfig';

export function takeoverProviderOf(target: string): string | null {
  const host = target.toLowerCase().replace(/\.$/, '');
  return TAKEOVER_PROVIDERS.find((provider) => host === provider || host.endsWith(`.${provider}`)) ?? null;
}

function dnsFinding(description: string, remediation: string, evidence: string | null = null): Finding {
  return {
    detectorName: DETECTOR_NAME,
    category: 'dns',
    severity: 'medium',
    description,
    remediation,
    evidence,
  };
}

export class DnsMisconfigDetector implements Detector {
  readonly name = DETECTOR_NAME;
  private readonly dns: DnsLookup;
  private readonly randomLabel: () => string;

  constructor(dns: DnsLookup, randomLabel: () => string = () => `wc-${Math.random().toString(36).substring(2, 12)}`) {
    this.dns = dns;
    this.randomLabel = randomLabel;
  }

  async detect(asset: EnrichedAsset): Promise<Finding[]> {
    if (asset.assetType === 'ip_address') {
      throw new DetectorSkippedError(this.name, 'not applicable to IP assets');
    }
    if (!asset.dnsRecords.success) {
      throw new DetectorSkippedError(this.name, 'no DNS records');
    }

    const records = asset.dnsRecords.data;
    const host = asset.assetValue;
    const findings: Finding[] = [];

    // A record type missing from the map was not answered, so nothing can be said about it
    const txt = records.TXT;
    if (txt && !txt.some((value) => value.toLowerCase().startsWith('v=spf1'))) {
      findings.push(dnsFinding(
        `No SPF record published for ${host}`,
        'Publish an SPF TXT record listing the hosts allowed to send mail for this domain.'
      ));
    }

    const dmarc = records.DMARC;
    if (dmarc && !dmarc.some((value) => /^v=DMARC1/i.test(value.trim()))) {
      findings.push(dnsFinding(
        `No DMARC policy published at _dmarc.${host}`,
        'Publish a DMARC TXT record (v=DMARC1) with at least p=quarantine.'
      ));
    }

    findings.push(...this.findDuplicates(host, records));
    findings.push(...(await this.findDanglingCnames(host, records.CNAME ?? [])));

    if (asset.assetType === 'domain' && (await this.hasWildcard(host))) {
      findings.push(dnsFinding(
        `Wildcard DNS record answers for any name under ${host}`,
        'Remove the wildcard record unless every subdomain is meant to resolve.',
        `*.${host}`
      ));
    }

    return findings;
  }

  private findDuplicates(host: string, records: Partial<Record<DnsRecordType, string[]>>): Finding[] {
    const findings: Finding[] = [];

    for (const [type, values] of Object.entries(records)) {
      if (!values) continue;
      const seen = new Set<string>();
      const duplicates = new Set<string>();
      for (const value of values) {
        const key = value.toLowerCase();
        if (seen.has(key)) duplicates.add(value);
        seen.add(key);
      }
      if (duplicates.size > 0) {
        findings.push(dnsFinding(
          `Duplicate ${type} records for ${host}`,
          `Remove the repeated ${type} values from the zone.`,
          [...duplicates].join(', ')
        ));
      }
    }

    return findings;
  }

  private async findDanglingCnames(host: string, targets: string[]): Promise<Finding[]> {
    const findings: Finding[] = [];

    for (const target of targets) {
      const provider = takeoverProviderOf(target);
      if (!provider) continue;

      let addresses: string[];
      try {
        addresses = await this.dns.resolveAddresses(target);
      } catch {
        // Resolver trouble is not evidence of a dangling record
        continue;
      }

      if (addresses.length === 0) {
        findings.push(dnsFinding(
          `Dangling CNAME: ${host} points at ${target} (${provider}), which no longer resolves`,
          'Remove the CNAME record or reclaim the resource at the provider.',
          target
        ));
      }
    }

    return findings;
  }

  private async hasWildcard(host: string): Promise<boolean> {
    try {
      const addresses = await this.dns.resolveAddresses(`${this.randomLabel()}.${host}`);
      return addresses.length > 0;
    } catch {
      return false;
    }
  }
}
