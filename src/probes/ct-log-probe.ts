import { CtLogResponseSchema } from '../schemas/external.js';
import { toSubdomainOf } from '../utils/domain.js';
import { ProbeUnavailableError } from '../errors.js';
import type { HttpFetcher } from './http-client.js';

const CRT_SH_URL = 'https://crt.sh/';

export interface CertificateTransparencySource {
  findSubdomains(domain: string): Promise<string[]>;
}

/** Subdomains named in certificates logged for `%.domain` on crt.sh. */
export class CtLogProbe implements CertificateTransparencySource {
  private readonly client: HttpFetcher;
  private readonly baseUrl: string;

  constructor(client: HttpFetcher, baseUrl: string = CRT_SH_URL) {
    this.client = client;
    this.baseUrl = baseUrl;
  }

  async findSubdomains(domain: string): Promise<string[]> {
    const url = `${this.baseUrl}?q=${encodeURIComponent(`%.${domain}`)}&output=json`;
    const result = await this.client.get(url, {
      headers: { Accept: 'application/json' },
      maxContentLength: 10 * 1024 * 1024,
    });

    if (!result.success) {
      throw new ProbeUnavailableError('ct-log', result.error);
    }
    if (result.status !== 200) {
      throw new ProbeUnavailableError('ct-log', `crt.sh returned HTTP ${result.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(result.data);
    } catch {
      throw new ProbeUnavailableError('ct-log', result.truncated ? 'response truncated' : 'response is not JSON');
    }

    const parsed = CtLogResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProbeUnavailableError('ct-log', 'unexpected response shape');
    }

    return parseCtNames(parsed.data.map((entry) => entry.name_value), domain);
  }
}

export function parseCtNames(nameValues: string[], domain: string): string[] {
  const names = new Set<string>();

  for (const value of nameValues) {
    for (const line of value.split('\n')) {
      const subdomain = toSubdomainOf(line, domain);
      if (subdomain) {
        names.add(subdomain);
      }
    }
  }

  return [...names].sort();
}
