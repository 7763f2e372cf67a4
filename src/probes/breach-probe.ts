import { BreachListSchema } from '../schemas/external.js';
import { ProbeUnavailableError } from '../errors.js';
import type { HttpFetcher } from './http-client.js';

export interface BreachLookup {
  countBreaches(domain: string): Promise<number>;
}

export interface BreachProbeOptions {
  apiUrl: string;
  apiKey?: string | undefined;
  timeout?: number | undefined;
}

/**
 * Breach-history lookup by domain. Only the count is kept. No key, a 4xx/5xx
 * or an unreadable body all mean "unknown", reported as ProbeUnavailableError.
 */
export class BreachProbe implements BreachLookup {
  private readonly client: HttpFetcher;
  private readonly apiUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeout: number | undefined;
  // Every asset of a scan asks about the same root domain
  private readonly inFlight = new Map<string, Promise<number>>();

  constructor(client: HttpFetcher, options: BreachProbeOptions) {
    this.client = client;
    this.apiUrl = options.apiUrl;
    this.apiKey = options.apiKey;
    this.timeout = options.timeout;
  }

  countBreaches(domain: string): Promise<number> {
    const pending = this.inFlight.get(domain);
    if (pending) return pending;

    const lookup = this.lookup(domain).finally(() => {
      this.inFlight.delete(domain);
    });
    this.inFlight.set(domain, lookup);
    return lookup;
  }

  private async lookup(domain: string): Promise<number> {
    if (!this.apiKey) {
      throw new ProbeUnavailableError('breach', 'no API key configured');
    }

    const result = await this.client.get(`${this.apiUrl}?domain=${encodeURIComponent(domain)}`, {
      timeout: this.timeout,
      headers: {
        'hibp-api-key': this.apiKey,
        Accept: 'application/json',
      },
    });

    if (!result.success) {
      throw new ProbeUnavailableError('breach', result.error);
    }
    if (result.status !== 200) {
      throw new ProbeUnavailableError('breach', `service returned HTTP ${result.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(result.data);
    } catch {
      throw new ProbeUnavailableError('breach', 'response is not JSON');
    }

    const parsed = BreachListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProbeUnavailableError('breach', 'unexpected response shape');
    }

    return parsed.data.length;
  }
}
