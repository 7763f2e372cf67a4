import { DetectorSkippedError } from '../errors.js';
import { firstLabel } from '../utils/domain.js';
import type { HttpFetcher } from '../probes/http-client.js';
import type { Detector, EnrichedAsset, Finding } from '../types/index.js';

const AZURE_CONTAINERS = ['assets', 'files', 'images', 'backup', 'data', 'public'];

const BUCKET_NAME = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const AZURE_ACCOUNT = /^[a-z0-9]{3,24}$/;

interface StorageCandidate {
  provider: 'AWS S3' | 'Google Cloud Storage' | 'Azure Blob Storage';
  name: string;
  url: string;
  listingMarker: RegExp;
}

export function bucketNameCandidates(domain: string): string[] {
  const label = firstLabel(domain);
  const names = [
    domain,
    domain.replace(/\./g, '-'),
    label,
    `${label}-assets`,
    `${label}-backup`,
    `${label}-data`,
  ];
  return [...new Set(names)].filter((name) => BUCKET_NAME.test(name));
}

export function azureAccountCandidates(domain: string): string[] {
  const names = [firstLabel(domain), domain.replace(/[^a-z0-9]/g, '')];
  return [...new Set(names)].filter((name) => AZURE_ACCOUNT.test(name));
}

export function storageCandidates(domain: string): StorageCandidate[] {
  const candidates: StorageCandidate[] = [];

  for (const name of bucketNameCandidates(domain)) {
    candidates.push({
      provider: 'AWS S3',
      name,
      // Path-style, so dotted names do not break the wildcard certificate
      url: `https://s3.amazonaws.com/${name}`,
      listingMarker: /<ListBucketResult/,
    });
    candidates.push({
      provider: 'Google Cloud Storage',
      name,
      url: `https://storage.googleapis.com/${name}`,
      listingMarker: /<ListBucketResult/,
    });
  }

  for (const account of azureAccountCandidates(domain)) {
    for (const container of AZURE_CONTAINERS) {
      candidates.push({
        provider: 'Azure Blob Storage',
        name: `${account}/${container}`,
        url: `https://${account}.blob.core.windows.net/${container}?restype=container&comp=list`,
        listingMarker: /<EnumerationResults/,
      });
    }
  }

  return candidates;
}

/** Publicly listable storage named after the domain. Runs for the root domain asset only. */
export class CloudBucketChecker implements Detector {
  readonly name = 'cloud_bucket';
  private readonly client: HttpFetcher;

  constructor(client: HttpFetcher) {
    this.client = client;
  }

  async detect(asset: EnrichedAsset): Promise<Finding[]> {
    if (asset.assetType !== 'domain') {
      throw new DetectorSkippedError(this.name, 'checked once per scan, on the root domain');
    }

    const candidates = storageCandidates(asset.assetValue);
    const results = await Promise.all(
      candidates.map(async (candidate) => ({ candidate, result: await this.client.get(candidate.url, { followRedirects: false }) }))
    );

    const findings: Finding[] = [];
    for (const { candidate, result } of results) {
      if (!result.success || result.status !== 200 || !candidate.listingMarker.test(result.data)) continue;

      findings.push({
        detectorName: this.name,
        category: 'cloud_storage',
        severity: 'critical',
        description: `${candidate.provider} container "${candidate.name}" is publicly listable`,
        remediation: 'Block public access on the bucket and review its access policy.',
        evidence: candidate.url,
      });
    }

    return findings;
  }
}
