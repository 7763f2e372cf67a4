import { describe, it, expect } from 'vitest';
import { HeaderAnalyzer, missingHeaderSeverity, weakHeaderReason } from '../../src/detectors/header-analyzer.js';
import { DetectorSkippedError } from '../../src/errors.js';
import { ALL_HEADERS, enrichedAsset, httpInfo, ok } from '../helpers/fakes.js';

describe('weakHeaderReason', () => {
  it('accepts strong values', () => {
    expect(weakHeaderReason('x-frame-options', 'sameorigin')).toBeNull();
    expect(weakHeaderReason('x-content-type-options', 'nosniff')).toBeNull();
    expect(weakHeaderReason('strict-transport-security', 'max-age=63072000; preload')).toBeNull();
    expect(weakHeaderReason('referrer-policy', 'unsafe-url')).toBeNull();
  });

  it('explains weak values', () => {
    expect(weakHeaderReason('x-frame-options', 'ALLOW-FROM https://a.test')).toBe(
      'X-Frame-Options is "ALLOW-FROM https://a.test", expected DENY or SAMEORIGIN'
    );
    expect(weakHeaderReason('strict-transport-security', 'max-age=300')).toBe(
      'Strict-Transport-Security max-age=300 is under one year'
    );
    expect(weakHeaderReason('strict-transport-security', 'includeSubDomains')).toBe(
      'Strict-Transport-Security has no max-age'
    );
  });
});

describe('missingHeaderSeverity', () => {
  it('escalates HSTS and CSP', () => {
    expect(missingHeaderSeverity('strict-transport-security')).toBe('high');
    expect(missingHeaderSeverity('content-security-policy')).toBe('high');
    expect(missingHeaderSeverity('referrer-policy')).toBe('medium');
  });
});

describe('HeaderAnalyzer', () => {
  const analyzer = new HeaderAnalyzer();

  it('is quiet when every header is present and strong', async () => {
    await expect(analyzer.detect(enrichedAsset({ httpInfo: ok(httpInfo()) }))).resolves.toEqual([]);
  });

  it('reports missing and weak headers in checklist order', async () => {
    const headers = {
      ...ALL_HEADERS,
      'strict-transport-security': null,
      'x-content-type-options': 'sniff',
      'permissions-policy': null,
    };
    const findings = await analyzer.detect(enrichedAsset({ httpInfo: ok(httpInfo({ securityHeaders: headers })) }));

    expect(findings.map((finding) => [finding.severity, finding.description])).toEqual([
      ['high', 'Missing Strict-Transport-Security header on https://example.com/'],
      ['low', 'X-Content-Type-Options is "sniff", expected nosniff on https://example.com/'],
      ['medium', 'Missing Permissions-Policy header on https://example.com/'],
    ]);
    expect(findings[1]?.evidence).toBe('X-Content-Type-Options: sniff');
  });

  it('skips assets without an HTTP response', async () => {
    await expect(analyzer.detect(enrichedAsset())).rejects.toBeInstanceOf(DetectorSkippedError);
  });
});
