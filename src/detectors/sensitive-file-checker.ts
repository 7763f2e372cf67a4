import { DetectorSkippedError } from '../errors.js';
import { ResponseClassifier, toBaseline } from './response-classifier.js';
import { SENSITIVE_FILE_PATHS, generateBaselinePath } from './path-profiles.js';
import { webOriginOf } from './web-target.js';
import type { PathDetectorOptions } from './open-directory-detector.js';
import type { HttpFetcher } from '../probes/http-client.js';
import type { Detector, EnrichedAsset, Finding } from '../types/index.js';

export class SensitiveFileChecker implements Detector {
  readonly name = 'sensitive_file';
  private readonly client: HttpFetcher;
  private readonly paths: readonly string[];
  private readonly baselinePath: () => string;

  constructor(client: HttpFetcher, options: PathDetectorOptions = {}) {
    this.client = client;
    this.paths = options.paths ?? SENSITIVE_FILE_PATHS;
    this.baselinePath = options.baselinePath ?? (() => generateBaselinePath());
  }

  async detect(asset: EnrichedAsset): Promise<Finding[]> {
    const origin = webOriginOf(asset);
    if (!origin) {
      throw new DetectorSkippedError(this.name, 'no web surface');
    }

    const classifier = new ResponseClassifier();
    const baseline = await this.client.get(`${origin}/${this.baselinePath()}`, { followRedirects: false });
    classifier.setBaseline(baseline.success ? toBaseline(baseline.status, baseline.data) : null);

    const responses = await Promise.all(
      this.paths.map(async (path) => ({ path, result: await this.client.get(`${origin}/${path}`, { followRedirects: false }) }))
    );

    const findings: Finding[] = [];

    for (const { path, result } of responses) {
      if (!result.success || result.status !== 200) continue;
      if (classifier.isSoft404({ path, statusCode: result.status, body: result.data })) continue;

      const confirmed = classifier.matchesContentSignature(path, result.data);
      findings.push({
        detectorName: this.name,
        category: 'sensitive_file',
        severity: 'critical',
        description: `Sensitive file exposed: ${origin}/${path}`,
        remediation: 'Remove the file from the web root or deny access to it.',
        evidence: `HTTP 200, ${Buffer.byteLength(result.data, 'utf8')} bytes${confirmed ? ', content matches the expected format' : ''}`,
      });
    }

    return findings;
  }
}
