import { describe, it, expect } from 'vitest';
import {
  CloudBucketChecker,
  azureAccountCandidates,
  bucketNameCandidates,
  storageCandidates,
} from '../../src/detectors/cloud-bucket-checker.js';
import { DetectorSkippedError } from '../../src/errors.js';
import { FakeHttpFetcher, enrichedAsset, httpOk } from '../helpers/fakes.js';

describe('storage name candidates', () => {
  it('derives bucket names from the domain', () => {
    expect(bucketNameCandidates('example.com')).toEqual([
      'example.com',
      'example-com',
      'example',
      'example-assets',
      'example-backup',
      'example-data',
    ]);
  });

  it('keeps only names Azure accepts as accounts', () => {
    expect(azureAccountCandidates('example.com')).toEqual(['example', 'examplecom']);
    expect(azureAccountCandidates('my-site.co.uk')).toEqual(['mysitecouk']);
  });

  it('builds one URL per provider and name', () => {
    expect(storageCandidates('example.com')).toHaveLength(24);
  });
});

describe('CloudBucketChecker', () => {
  it('reports only containers whose listing is returned', async () => {
    const client = new FakeHttpFetcher()
      .on(
        'https://s3.amazonaws.com/example-backup',
        httpOk('https://s3.amazonaws.com/example-backup', '<?xml version="1.0"?><ListBucketResult><Name>example-backup</Name></ListBucketResult>')
      )
      .on('https://s3.amazonaws.com/example', httpOk('https://s3.amazonaws.com/example', '<html>parked</html>'))
      .on(
        'https://storage.googleapis.com/example',
        httpOk('https://storage.googleapis.com/example', '<Error><Code>AccessDenied</Code></Error>', {}, 403)
      )
      .on(
        'https://examplecom.blob.core.windows.net/public?restype=container&comp=list',
        httpOk('https://examplecom.blob.core.windows.net/public?restype=container&comp=list', '<EnumerationResults><Blobs /></EnumerationResults>')
      );

    const findings = await new CloudBucketChecker(client).detect(enrichedAsset());

    expect(findings.map((finding) => [finding.severity, finding.description, finding.evidence])).toEqual([
      ['critical', 'AWS S3 container "example-backup" is publicly listable', 'https://s3.amazonaws.com/example-backup'],
      [
        'critical',
        'Azure Blob Storage container "examplecom/public" is publicly listable',
        'https://examplecom.blob.core.windows.net/public?restype=container&comp=list',
      ],
    ]);
    expect(client.requests).toHaveLength(24);
  });

  it('runs for the root domain only', async () => {
    const client = new FakeHttpFetcher();
    await expect(
      new CloudBucketChecker(client).detect(enrichedAsset({ assetValue: 'www.example.com', assetType: 'subdomain' }))
    ).rejects.toBeInstanceOf(DetectorSkippedError);
    expect(client.requests).toHaveLength(0);
  });
});
