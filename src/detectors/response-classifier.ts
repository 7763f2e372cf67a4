import * as cheerio from 'cheerio';

export interface BaselineResponse {
  statusCode: number;
  contentLength: number;
  bodySnippet: string;
}

export interface PathResponse {
  path: string;
  statusCode: number;
  body: string;
}

// What a genuine copy of each file looks like
const CONTENT_SIGNATURES: Array<{ pathPattern: RegExp; bodyPattern: RegExp }> = [
  { pathPattern: /\.env$/, bodyPattern: /^[A-Z_][A-Z0-9_]*=.*/m },
  { pathPattern: /\.git\/HEAD$/, bodyPattern: /ref: refs\// },
  { pathPattern: /\.git\/config$/, bodyPattern: /\[core\]/ },
  { pathPattern: /phpinfo\.php$/, bodyPattern: /PHP Version/ },
  { pathPattern: /\.htpasswd$/, bodyPattern: /^[^:\s]+:\$?[a-zA-Z0-9$./]+$/m },
  { pathPattern: /\.htaccess$/, bodyPattern: /(RewriteEngine|RewriteRule|Deny from|Require|AuthType|Options)/i },
  { pathPattern: /wp-config\.php$/, bodyPattern: /(DB_NAME|DB_USER|DB_PASSWORD)/ },
  { pathPattern: /config\.php$/, bodyPattern: /(database|password|host|user)/i },
  { pathPattern: /\.sql$/, bodyPattern: /(CREATE TABLE|INSERT INTO|DROP TABLE)/i },
  { pathPattern: /\.DS_Store$/, bodyPattern: /Bud1/ },
  { pathPattern: /\.zip$/, bodyPattern: /^PK/ },
];

// Custom error pages served with a 200
const SOFT_404_INDICATORS = [
  'not found',
  'page not found',
  'does not exist',
  'no longer available',
  'couldn\'t find',
  'could not find',
  'nothing here',
  'page is missing',
  'error 404',
  'the page you',
  'we can\'t find',
  'resource not found',
  'file not found',
];

const DIRECTORY_LISTING_PATTERNS: RegExp[] = [
  /<title>Index of \//i,
  /<h1>Index of \//i,
  /Directory listing for \//i,
  /<title>Directory Listing/i,
  /Parent Directory/i,
  /<a href="[^"]+">\.\.\/</i,
];

export class ResponseClassifier {
  private baseline: BaselineResponse | null = null;

  setBaseline(baseline: BaselineResponse | null): void {
    this.baseline = baseline;
  }

  /** A 200 that is really the site's catch-all page. */
  isSoft404(response: PathResponse): boolean {
    if (response.statusCode !== 200) return false;
    if (this.matchesContentSignature(response.path, response.body)) return false;

    if (this.baseline && this.baseline.statusCode === 200) {
      const contentLength = Buffer.byteLength(response.body, 'utf8');

      // Compare content length with 10% tolerance
      const tolerance = this.baseline.contentLength * 0.1;
      if (this.baseline.contentLength > 0 && Math.abs(contentLength - this.baseline.contentLength) <= tolerance) {
        return true;
      }

      if (this.baseline.bodySnippet.length > 50) {
        const similarity = this.calculateSimilarity(response.body.substring(0, 512), this.baseline.bodySnippet);
        if (similarity > 0.85) {
          return true;
        }
      }
    }

    return this.hasSoft404Indicators(response.body);
  }

  matchesContentSignature(path: string, body: string): boolean {
    return CONTENT_SIGNATURES.some((sig) => sig.pathPattern.test(path) && sig.bodyPattern.test(body));
  }

  isDirectoryListing(body: string): boolean {
    return DIRECTORY_LISTING_PATTERNS.some((pattern) => pattern.test(body));
  }

  /** File names linked from a listing page, parent links dropped, first 50. */
  extractListedFiles(body: string): string[] {
    const $ = cheerio.load(body);
    const files: string[] = [];

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href');
      if (!href || href === './' || href === '../' || href === '..' || href.startsWith('?')) return;

      const name = href.replace(/\/$/, '').split('/').pop();
      if (name && !files.includes(name)) {
        files.push(name);
      }
    });

    return files.slice(0, 50);
  }

  private hasSoft404Indicators(body: string): boolean {
    const lowerBody = body.toLowerCase();
    return SOFT_404_INDICATORS.some((indicator) => lowerBody.includes(indicator));
  }

  private calculateSimilarity(a: string, b: string): number {
    if (a === b) return 1;
    if (a.length === 0 || b.length === 0) return 0;

    // Character-level Jaccard similarity
    const setA = new Set(a.split(''));
    const setB = new Set(b.split(''));
    let intersection = 0;
    for (const ch of setA) {
      if (setB.has(ch)) intersection++;
    }
    const union = setA.size + setB.size - intersection;
    return union === 0 ? 0 : intersection / union;
  }
}

export function toBaseline(statusCode: number, body: string): BaselineResponse {
  return {
    statusCode,
    contentLength: Buffer.byteLength(body, 'utf8'),
    bodySnippet: body.substring(0, 512),
  };
}
