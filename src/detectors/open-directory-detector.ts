import { DetectorSkippedError } from '../errors.js';
import { ResponseClassifier, toBaseline } from './response-classifier.js';
import { DIRECTORY_LISTING_PATHS, generateBaselinePath, isSensitiveFileName } from './path-profiles.js';
import { webOriginOf } from './web-target.js';
import type { HttpFetcher } from '../probes/http-client.js';
import type { Detector, EnrichedAsset, Finding } from '../types/index.js';

export interface PathDetectorOptions {
  paths?: readonly string[] | undefined;
  baselinePath?: (() => string) | undefined;
}

export class OpenDirectoryDetector implements Detector {
  readonly name = 'open_directory';
  private readonly client: HttpFetcher;
  private readonly paths: readonly string[];
  private readonly baselinePath: () => string;

  constructor(client: HttpFetcher, options: PathDetectorOptions = {}) {
    this.client = client;
    this.paths = options.paths ?? DIRECTORY_LISTING_PATHS;
    this.baselinePath = options.baselinePath ?? (() => generateBaselinePath());
  }

  async detect(asset: EnrichedAsset): Promise<Finding[]> {
    const origin = webOriginOf(asset);
    if (!origin) {
      throw new DetectorSkippedError(this.name, 'no web surface');
    }

    const classifier = new ResponseClassifier();
    const baseline = await this.client.get(`${origin}/${this.baselinePath()}/`, { followRedirects: false });
    classifier.setBaseline(baseline.success ? toBaseline(baseline.status, baseline.data) : null);

    const responses = await Promise.all(
      this.paths.map(async (path) => ({ path, result: await this.client.get(`${origin}${path}`, { followRedirects: false }) }))
    );

    const findings: Finding[] = [];

    for (const { path, result } of responses) {
      if (!result.success || result.status !== 200) continue;
      if (!classifier.isDirectoryListing(result.data)) continue;
      // A catch-all that happens to render a listing is reported once, at the root
      if (path !== '/' && classifier.isSoft404({ path, statusCode: result.status, body: result.data })) continue;

      const files = classifier.extractListedFiles(result.data);
      const sensitive = files.filter(isSensitiveFileName);
      const exposes = sensitive.length > 0 ? `; exposes sensitive files: ${sensitive.join(', ')}` : '';

      findings.push({
        detectorName: this.name,
        category: 'open_directory',
        severity: 'high',
        description: `Open directory listing at ${origin}${path} (${files.length} entries)${exposes}`,
        remediation: 'Disable directory listing (autoindex) or add an index file.',
        evidence: files.slice(0, 10).join(', ') || null,
      });
    }

    return findings;
  }
}
