import { Resolver } from 'dns/promises';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { ProbeUnavailableError } from '../errors.js';
import type { DnsRecords, DnsRecordType } from '../types/index.js';

// "Name exists but has no such record" or "name does not exist": an answer, not a failure
const EMPTY_ANSWER_CODES = new Set(['ENODATA', 'ENOTFOUND', 'ENONAME']);

export interface DnsLookup {
  /** A and AAAA answers; [] when the name does not resolve. */
  resolveAddresses(host: string): Promise<string[]>;
  /** Record types whose lookup errored are left out; types with no answer map to []. */
  lookupRecords(host: string): Promise<DnsRecords>;
}

export interface DnsProbeOptions {
  timeout?: number | undefined;
  maxConcurrent?: number | undefined;
  servers?: string[] | undefined;
}

type LookupOutcome = { ok: true; values: string[] } | { ok: false; error: unknown };

function isEmptyAnswer(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && EMPTY_ANSWER_CODES.has(error.code);
}

export class DnsProbe implements DnsLookup {
  private readonly resolver: Resolver;
  private readonly limiter: ConcurrencyLimiter;

  constructor(options: DnsProbeOptions = {}) {
    this.resolver = new Resolver({ timeout: options.timeout ?? 5000, tries: 1 });
    if (options.servers && options.servers.length > 0) {
      this.resolver.setServers(options.servers);
    }
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent ?? 50);
  }

  async resolveAddresses(host: string): Promise<string[]> {
    const [v4, v6] = await Promise.all([
      this.safeLookup(() => this.resolver.resolve4(host)),
      this.safeLookup(() => this.resolver.resolve6(host)),
    ]);

    if (!v4.ok && !v6.ok) {
      throw new ProbeUnavailableError('dns', `address lookup for ${host} failed`);
    }

    return [...(v4.ok ? v4.values : []), ...(v6.ok ? v6.values : [])];
  }

  async lookupRecords(host: string): Promise<DnsRecords> {
    const lookups: Array<[DnsRecordType, () => Promise<string[]>]> = [
      ['A', () => this.resolver.resolve4(host)],
      ['AAAA', () => this.resolver.resolve6(host)],
      ['CNAME', () => this.resolver.resolveCname(host)],
      ['MX', async () => (await this.resolver.resolveMx(host)).map((mx) => `${mx.priority} ${mx.exchange}`)],
      ['TXT', async () => (await this.resolver.resolveTxt(host)).map((chunks) => chunks.join(''))],
      ['NS', () => this.resolver.resolveNs(host)],
      ['DMARC', async () => (await this.resolver.resolveTxt(`_dmarc.${host}`)).map((chunks) => chunks.join(''))],
    ];

    const outcomes = await Promise.all(
      lookups.map(async ([type, lookup]) => [type, await this.safeLookup(lookup)] as const)
    );

    const records: DnsRecords = {};
    let answered = 0;

    for (const [type, outcome] of outcomes) {
      if (outcome.ok) {
        records[type] = outcome.values;
        answered++;
      }
    }

    if (answered === 0) {
      throw new ProbeUnavailableError('dns', `no record lookup for ${host} succeeded`);
    }

    return records;
  }

  private async safeLookup(lookup: () => Promise<string[]>): Promise<LookupOutcome> {
    try {
      return { ok: true, values: await this.limiter.run(lookup) };
    } catch (error) {
      if (isEmptyAnswer(error)) {
        return { ok: true, values: [] };
      }
      return { ok: false, error };
    }
  }
}
